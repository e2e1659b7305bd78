import path from 'path';
import type { HarnessConfig } from '../config';
import type { BackgroundEntryCache } from '../corpus/backgroundCache';
import { assertQueriesMatchCorpus } from '../corpus/load';
import { CorpusSynthesizer, type SynthesisOptions, type SynthesisResult } from '../corpus/synthesizer';
import type { InferenceClient } from '../inference/types';
import type { Logger } from '../log';
import { openEntryStore } from '../store';
import type { EntryStore } from '../store/types';
import type { CorpusSpec, Query } from '../types';
import { createEphemeralWorkspace } from '../workspace';

export interface ExperimentDeps {
  config: HarnessConfig;
  inference: InferenceClient;
  corpus: CorpusSpec;
  queries: Query[];
  log: Logger;
  background?: BackgroundEntryCache;
  /** Defaults to the store kind named in the config. */
  openStore?: (workDir: string) => Promise<EntryStore>;
}

export interface SeededRun {
  store: EntryStore;
  synthesis: SynthesisResult;
  workDir: string;
  /** Queries whose relevant clusters all made it into the corpus. */
  queries: Query[];
  /** Ids of queries left out because skipped batches emptied one of their clusters. */
  droppedQueries: string[];
}

/**
 * Creates a fresh workspace and store, synthesizes the corpus into it, runs
 * fn over the queries the corpus still covers, and tears everything down.
 * The cluster map is written to outDir/cluster-map.tsv before fn starts.
 */
export async function withSeededCorpus<T>(
  deps: ExperimentDeps,
  options: SynthesisOptions & { outDir: string; label: string },
  fn: (run: SeededRun) => Promise<T>
): Promise<T> {
  assertQueriesMatchCorpus(deps.corpus, deps.queries);
  const log = deps.log.child({ run: options.label });
  const workspace = await createEphemeralWorkspace();
  try {
    const store = deps.openStore
      ? await deps.openStore(workspace.dir)
      : await openEntryStore({ kind: deps.config.storage.store, workDir: workspace.dir, dim: deps.config.inference.embeddingDim, log });
    try {
      const synthesizer = new CorpusSynthesizer({
        store,
        inference: deps.inference,
        log,
        dim: deps.config.inference.embeddingDim,
        embedBatchSize: deps.config.storage.embedBatchSize,
        background: deps.background,
      });
      const synthesis = await log.span('synthesize', { multiplier: options.multiplier ?? 1, target: options.targetSize ?? null }, () =>
        synthesizer.synthesize(deps.corpus, { multiplier: options.multiplier, targetSize: options.targetSize })
      );
      const { covered, uncovered } = synthesis.clusterMap.partitionByCoverage(deps.queries);
      const droppedQueries = uncovered.map((q) => q.id);
      if (droppedQueries.length > 0) log.warn('queries_dropped', { queries: droppedQueries, reason: 'cluster_lost' });
      await synthesis.clusterMap.write(path.join(options.outDir, 'cluster-map.tsv'));
      return await fn({ store, synthesis, workDir: workspace.dir, queries: covered, droppedQueries });
    } finally {
      await store.close();
    }
  } finally {
    await workspace.dispose();
  }
}
