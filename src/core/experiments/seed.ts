import fs from 'fs-extra';
import path from 'path';
import type { SynthesisReport } from '../corpus/synthesizer';
import { withSeededCorpus, type ExperimentDeps } from './context';

export interface SeedOptions {
  outDir: string;
  multiplier?: number;
  targetSize?: number;
}

export interface SeedResult {
  outDir: string;
  report: SynthesisReport;
  clusters: number;
  clusterMapFile: string;
  /** Queries that lost every entry of a relevant cluster to skipped batches. */
  droppedQueries: string[];
}

/** Synthesizes a corpus once and records what went in. */
export async function runSeed(deps: ExperimentDeps, options: SeedOptions): Promise<SeedResult> {
  return withSeededCorpus(deps, { ...options, label: 'seed' }, async ({ store, synthesis, droppedQueries }) => {
    const stored = await store.count();
    if (stored !== synthesis.report.total) {
      deps.log.warn('store_count_mismatch', { stored, reported: synthesis.report.total });
    }
    await fs.outputJSON(path.join(options.outDir, 'seed-report.json'), synthesis.report, { spaces: 2 });
    return {
      outDir: options.outDir,
      report: synthesis.report,
      clusters: synthesis.clusterMap.clusterIds().size,
      clusterMapFile: path.join(options.outDir, 'cluster-map.tsv'),
      droppedQueries,
    };
  });
}
