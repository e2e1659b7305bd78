import type { InferenceClient } from '../inference/types';
import { errorMessage, type Logger } from '../log';
import type { EntryStore } from '../store/types';
import type { Candidate, DistanceMetric } from '../types';
import type { ChannelAdapter } from './types';

export interface VectorChannelOptions {
  store: EntryStore;
  inference: InferenceClient;
  metric: DistanceMetric;
  /** null returns the k nearest whatever their distance. */
  threshold: number | null;
  log: Logger;
}

export function createVectorChannel(options: VectorChannelOptions): ChannelAdapter {
  const log = options.log.child({ channel: 'vector' });
  return async (queryText, limit) => {
    let vector: number[] | undefined;
    try {
      [vector] = await options.inference.embed([queryText]);
    } catch (e) {
      log.warn('query_embedding_failed', { err: errorMessage(e) });
      return [];
    }
    if (!vector || vector.length === 0) return [];
    try {
      const rows = await options.store.vectorSearch(vector, limit, options.metric);
      const threshold = options.threshold;
      const kept = threshold === null ? rows : rows.filter((r) => r.distance <= threshold);
      log.debug('vector_search', { nearest: rows.length, kept: kept.length, threshold });
      return kept.map<Candidate>((row, rank) => ({
        entryId: row.entryId,
        text: row.text,
        channels: ['vector'],
        ranks: { vector: rank },
        distance: row.distance,
      }));
    } catch (e) {
      log.warn('vector_search_failed', { err: errorMessage(e) });
      return [];
    }
  };
}
