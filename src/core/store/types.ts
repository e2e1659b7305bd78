import type { DistanceMetric, Entry, Relation } from '../types';

export interface KeywordRow {
  entryId: number;
  text: string;
  score: number;
}

export interface VectorRow {
  entryId: number;
  text: string;
  distance: number;
}

export interface ScanRow {
  entryId: number;
  cosine: number;
  l2: number;
}

/**
 * Query surface of the search engine under evaluation. One instance backs
 * exactly one run and is discarded with it.
 */
export interface EntryStore {
  readonly kind: string;
  insertEntries(entries: Entry[]): Promise<void>;
  insertRelations(relations: Relation[]): Promise<void>;
  count(): Promise<number>;
  /** Disjunctive full-text match over entry text, best match first. */
  keywordSearch(terms: string[], limit: number): Promise<KeywordRow[]>;
  /** k nearest entries, ascending distance. */
  vectorSearch(vector: number[], limit: number, metric: DistanceMetric): Promise<VectorRow[]>;
  /** Cosine and L2 distance from the vector to every stored entry, ascending entry id. */
  scanDistances(vector: number[]): Promise<ScanRow[]>;
  /** Case-insensitive substring match of any term against subject or object. */
  matchRelations(terms: string[], limit: number): Promise<Relation[]>;
  close(): Promise<void>;
}
