import type { QueryType } from '../types';
import { QUERY_TYPES } from '../types';

/** Relevant hits among the first k, divided by k (not by the list length). */
export function precisionAtK(ids: number[], isRelevant: (entryId: number) => boolean, k: number): number {
  if (k <= 0) return 0;
  let hits = 0;
  for (const id of ids.slice(0, k)) if (isRelevant(id)) hits += 1;
  return hits / k;
}

export function recallAtK(ids: number[], isRelevant: (entryId: number) => boolean, totalRelevant: number, k: number): number {
  if (totalRelevant <= 0 || k <= 0) return 0;
  let hits = 0;
  for (const id of ids.slice(0, k)) if (isRelevant(id)) hits += 1;
  return hits / totalRelevant;
}

export function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((s, v) => s + v, 0) / values.length;
}

export function overlapCount(a: number[], b: number[]): number {
  const set = new Set(a);
  let n = 0;
  for (const id of new Set(b)) if (set.has(id)) n += 1;
  return n;
}

export interface TypeAggregate {
  type: QueryType;
  queries: number;
  mean: number;
}

/** Means per query type, always in direct, paraphrase, negative order; empty types are left out. */
export function aggregateByType<T extends { type: QueryType }>(rows: T[], value: (row: T) => number): TypeAggregate[] {
  const out: TypeAggregate[] = [];
  for (const type of QUERY_TYPES) {
    const subset = rows.filter((r) => r.type === type);
    if (subset.length === 0) continue;
    out.push({ type, queries: subset.length, mean: mean(subset.map(value)) });
  }
  return out;
}

export interface ScoreDistribution {
  count: number;
  mean: number;
  max: number;
  above: number;
}

/** Summary of scores handed out to negative-query candidates. */
export function scoreDistribution(scores: number[], cutoff = 0.5): ScoreDistribution {
  if (scores.length === 0) return { count: 0, mean: 0, max: 0, above: 0 };
  return {
    count: scores.length,
    mean: mean(scores),
    max: Math.max(...scores),
    above: scores.filter((s) => s > cutoff).length,
  };
}
