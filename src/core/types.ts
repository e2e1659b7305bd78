export type Channel = 'keyword' | 'vector' | 'structured';

export type FusibleChannel = Exclude<Channel, 'structured'>;

export type QueryType = 'direct' | 'paraphrase' | 'negative';

export const QUERY_TYPES: readonly QueryType[] = ['direct', 'paraphrase', 'negative'];

export const NOISE_CLUSTER_ID = 0;

/** Sentinel cluster for injected background notes. */
export const BACKGROUND_CLUSTER_ID = -1;

export type DistanceMetric = 'cosine' | 'l2';

export interface Entry {
  /** Monotonic per run; a larger id is a more recent entry. */
  id: number;
  text: string;
  clusterId: number;
  vector: number[];
}

export type EntryDraft = Omit<Entry, 'id' | 'vector'>;

export interface Query {
  id: string;
  type: QueryType;
  relevantClusters: number[];
  text: string;
}

export interface QuerySet {
  version: number;
  queries: Query[];
}

export interface Candidate {
  entryId: number;
  text: string;
  channels: FusibleChannel[];
  ranks: Partial<Record<FusibleChannel, number>>;
  distance?: number;
  keywordScore?: number;
  fusedScore?: number;
  rerankScore?: number;
}

export interface Relation {
  subject: string;
  predicate: string;
  object: string;
  entryId: number;
}

export interface RelationHit {
  relation: Relation;
  matched: string;
}

export interface DistanceRecord {
  queryId: string;
  entryId: number;
  /** Under the configured metric; one of the two below. */
  distance: number;
  cosine: number;
  l2: number;
  relevant: boolean;
}

export interface CorpusCluster {
  id: number;
  name: string;
  entries: string[];
}

export interface CorpusSpec {
  version: number;
  clusters: CorpusCluster[];
  noise: string[];
}
