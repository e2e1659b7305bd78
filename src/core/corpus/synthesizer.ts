import type { InferenceClient } from '../inference/types';
import { errorMessage, type Logger } from '../log';
import type { EntryStore } from '../store/types';
import type { CorpusSpec, Entry, EntryDraft } from '../types';
import { BACKGROUND_CLUSTER_ID } from '../types';
import type { BackgroundEntryCache } from './backgroundCache';
import { ClusterMap } from './clusterMap';
import { generateParaphrases } from './paraphrase';
import { selectBaseEntries } from './selection';

export interface SynthesisOptions {
  /** Copies of each seed, counting the seed itself. 1 means base only. */
  multiplier?: number;
  /** Fill up to this size with background notes. */
  targetSize?: number;
}

export interface SynthesisReport {
  requested: { multiplier: number; targetSize: number | null };
  base: number;
  paraphrased: number;
  background: number;
  total: number;
  skipped: {
    embeddingBatches: number;
    entries: number;
    paraphrases: number;
    background: number;
  };
}

export type StoredEntry = Omit<Entry, 'vector'>;

export interface SynthesisResult {
  report: SynthesisReport;
  clusterMap: ClusterMap;
  entries: StoredEntry[];
}

export interface CorpusSynthesizerOptions {
  store: EntryStore;
  inference: InferenceClient;
  log: Logger;
  dim: number;
  embedBatchSize: number;
  background?: BackgroundEntryCache;
}

type Origin = 'base' | 'paraphrased' | 'background';

/**
 * Builds a labeled corpus in an empty store. Entries are embedded in batches;
 * a batch whose embedding fails is dropped and counted, never fatal.
 */
export class CorpusSynthesizer {
  private options: CorpusSynthesizerOptions;

  constructor(options: CorpusSynthesizerOptions) {
    this.options = options;
  }

  async synthesize(spec: CorpusSpec, options: SynthesisOptions = {}): Promise<SynthesisResult> {
    const { inference, log } = this.options;
    const multiplier = Math.max(1, Math.floor(options.multiplier ?? 1));
    const targetSize = options.targetSize;
    const report: SynthesisReport = {
      requested: { multiplier, targetSize: targetSize ?? null },
      base: 0,
      paraphrased: 0,
      background: 0,
      total: 0,
      skipped: { embeddingBatches: 0, entries: 0, paraphrases: 0, background: 0 },
    };

    const base = selectBaseEntries(spec, targetSize);
    const queue: Array<{ draft: EntryDraft; origin: Origin }> = base.map((draft) => ({ draft, origin: 'base' }));

    if (multiplier > 1) {
      const { drafts, failed } = await log.span('paraphrase', { seeds: base.length, multiplier }, () =>
        generateParaphrases(inference, base, multiplier, log)
      );
      report.skipped.paraphrases = failed;
      queue.push(...drafts.map((draft) => ({ draft, origin: 'paraphrased' as const })));
    }

    if (targetSize !== undefined && queue.length < targetSize) {
      const need = targetSize - queue.length;
      const notes = await this.backgroundNotes(need);
      report.skipped.background = need - notes.length;
      queue.push(...notes.map((text) => ({ draft: { text, clusterId: BACKGROUND_CLUSTER_ID }, origin: 'background' as const })));
    }

    const clusterMap = new ClusterMap();
    const entries: StoredEntry[] = [];
    const batchSize = Math.max(1, this.options.embedBatchSize);
    let nextId = 1;

    for (let i = 0; i < queue.length; i += batchSize) {
      const batch = queue.slice(i, i + batchSize);
      const vectors = await this.embedBatch(batch.map((b) => b.draft.text), i / batchSize);
      if (!vectors) {
        report.skipped.embeddingBatches += 1;
        report.skipped.entries += batch.length;
        continue;
      }
      const rows: Entry[] = batch.map((b, j) => ({
        id: nextId + j,
        text: b.draft.text,
        clusterId: b.draft.clusterId,
        vector: vectors[j] ?? [],
      }));
      nextId += rows.length;
      await this.options.store.insertEntries(rows);
      for (const [j, row] of rows.entries()) {
        clusterMap.set(row.id, row.clusterId);
        entries.push({ id: row.id, text: row.text, clusterId: row.clusterId });
        const origin = batch[j]?.origin ?? 'base';
        report[origin] += 1;
      }
      if (queue.length > batchSize * 10 && (i / batchSize) % 10 === 0) {
        log.info('insert_progress', { inserted: entries.length, of: queue.length });
      }
    }

    report.total = entries.length;
    const level = report.skipped.entries + report.skipped.paraphrases + report.skipped.background > 0 ? 'warn' : 'info';
    log[level]('corpus_synthesized', { ...report });
    return { report, clusterMap, entries };
  }

  private async embedBatch(texts: string[], batchIndex: number): Promise<number[][] | null> {
    const { inference, log, dim } = this.options;
    try {
      const vectors = await inference.embed(texts);
      const bad = vectors.findIndex((v) => v.length !== dim);
      if (vectors.length !== texts.length || bad >= 0) {
        log.warn('embed_batch_malformed', { batch: batchIndex, expected_dim: dim, got: vectors.length, bad_index: bad });
        return null;
      }
      return vectors;
    } catch (e) {
      log.warn('embed_batch_failed', { batch: batchIndex, size: texts.length, err: errorMessage(e) });
      return null;
    }
  }

  private async backgroundNotes(need: number): Promise<string[]> {
    const { background, log } = this.options;
    if (!background) {
      log.warn('background_cache_missing', { need });
      return [];
    }
    const reached = await background.ensure(need);
    if (reached < need) log.warn('background_short', { need, reached });
    return background.read(need);
  }
}
