import { sha256Hex } from '../crypto';
import type { InferenceClient, TokenLogprob } from '../inference/types';
import { createLogger, errorMessage, type Logger } from '../log';
import type { Candidate } from '../types';
import type { Cache } from './cache';
import { LruCache } from './cache';
import type { RerankedCandidate, RerankOutcome } from './types';

export interface RerankerConfig {
  /** Model identity, part of the score cache key. */
  modelName: string;
  /** How many leading candidates get judged (M). */
  candidates: number;
  /** How many reranked results are returned (N). */
  limit: number;
  topLogprobs: number;
}

export interface Reranker {
  rerank(query: string, candidates: Candidate[]): Promise<RerankOutcome>;
}

export type { Cache } from './cache';

export function buildJudgePrompt(query: string, document: string): string {
  return (
    'Judge whether the Document is relevant to the Query. Answer exactly "yes" or "no", nothing else.\n\n' +
    `Query: ${query}\n\n` +
    `Document: ${document}`
  );
}

function clamp(value: number, min = 0, max = 1): number {
  if (!Number.isFinite(value)) return min;
  return Math.max(min, Math.min(max, value));
}

/**
 * P(yes) from a two-way softmax over the "yes" and "no" log-probabilities.
 * The list is probability-descending, so only the first occurrence of each
 * normalized token counts. Yes alone is 1, no alone or neither is 0.
 */
export function scoreFromLogprobs(tokens: TokenLogprob[]): number {
  let yes: number | undefined;
  let no: number | undefined;
  for (const t of tokens) {
    const token = t.token.trim().toLowerCase();
    if (token === 'yes' && yes === undefined) yes = t.logprob;
    else if (token === 'no' && no === undefined) no = t.logprob;
  }
  if (yes !== undefined && no !== undefined) {
    // exp(y) / (exp(y) + exp(n)) without overflowing either exponent
    return clamp(1 / (1 + Math.exp(no - yes)));
  }
  if (yes !== undefined) return 1;
  return 0;
}

/**
 * Cross-encoder reranking through a generative model's log-probabilities.
 * One request per (query, candidate), sequential. A failed request scores
 * 0 and is counted; the batch carries on.
 */
export class LogprobReranker implements Reranker {
  private client: InferenceClient;
  private config: RerankerConfig;
  private cache: Cache<number>;
  private log: Logger;

  constructor(client: InferenceClient, config: RerankerConfig, cache: Cache<number> = new LruCache<number>(4096), log?: Logger) {
    this.client = client;
    this.config = config;
    this.cache = cache;
    this.log = log ?? createLogger({ component: 'retrieval', kind: 'reranker' });
  }

  async rerank(query: string, candidates: Candidate[]): Promise<RerankOutcome> {
    const q = String(query ?? '').trim();
    const judged = candidates.slice(0, Math.max(0, this.config.candidates));
    const outcome: RerankOutcome = { results: [], judged: [], scored: 0, failures: 0, cacheHits: 0 };
    if (!q || judged.length === 0) return outcome;

    const scored: RerankedCandidate[] = [];
    for (const [inputRank, candidate] of judged.entries()) {
      const score = await this.judge(q, candidate.text, outcome);
      scored.push({ ...candidate, rerankScore: score, inputRank });
    }
    scored.sort((a, b) => b.rerankScore - a.rerankScore || a.inputRank - b.inputRank);
    outcome.judged = scored;
    outcome.results = scored.slice(0, Math.max(0, this.config.limit));
    outcome.scored = judged.length;
    if (outcome.failures > 0) {
      this.log.warn('rerank_partial', { candidates: judged.length, failures: outcome.failures });
    }
    return outcome;
  }

  dispose(): void {
    this.cache.clear();
  }

  private async judge(query: string, document: string, outcome: RerankOutcome): Promise<number> {
    const key = sha256Hex(JSON.stringify([this.config.modelName, query, document]));
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      outcome.cacheHits += 1;
      return cached;
    }
    try {
      const tokens = await this.client.topLogprobs(buildJudgePrompt(query, document), this.config.topLogprobs);
      const score = scoreFromLogprobs(tokens);
      this.cache.set(key, score);
      return score;
    } catch (e) {
      outcome.failures += 1;
      this.log.warn('rerank_judge_failed', { err: errorMessage(e) });
      return 0;
    }
  }
}
