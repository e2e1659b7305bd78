import type { Candidate, FusibleChannel } from '../types';

export interface RankedList {
  channel: FusibleChannel;
  candidates: Candidate[];
}

export interface FusedCandidate extends Candidate {
  fusedScore: number;
  /** "keyword", "vector" or "keyword+vector". */
  channelLabel: string;
}

export interface RerankedCandidate extends Candidate {
  rerankScore: number;
  /** Position in the list handed to the reranker. */
  inputRank: number;
}

export interface RerankOutcome {
  /** Top N by rerank score. */
  results: RerankedCandidate[];
  /** Every judged candidate (first M), sorted like results. */
  judged: RerankedCandidate[];
  scored: number;
  failures: number;
  cacheHits: number;
}
