import type { ClusterMap } from '../corpus/clusterMap';
import type { InferenceClient } from '../inference/types';
import { errorMessage, type Logger } from '../log';
import type { EntryStore, ScanRow } from '../store/types';
import type { DistanceMetric, DistanceRecord, Query } from '../types';

export const DEFAULT_THRESHOLDS: number[] = Array.from({ length: 8 }, (_, i) => Math.round((0.3 + i * 0.05) * 100) / 100);

export const REFERENCE_THRESHOLD = 0.5;

export interface ClassStats {
  count: number;
  min: number | null;
  mean: number | null;
  max: number | null;
}

export interface DistanceSummary {
  relevant: ClassStats;
  irrelevant: ClassStats;
}

export interface SweepPoint {
  threshold: number;
  retrieved: number;
  truePositives: number;
  falsePositives: number;
  recall: number;
  precision: number;
}

export interface NegativeNearest {
  queryId: string;
  entryId: number | null;
  distance: number | null;
}

/** How cleanly one metric splits relevant from irrelevant pairs. */
export interface MetricSeparation {
  maxRelevant: number | null;
  minIrrelevant: number | null;
  /** Halfway between the two; the data-derived candidate threshold. */
  midpoint: number | null;
  clean: boolean;
}

export interface ScaleAnalysis {
  scale: number;
  entries: number;
  queries: number;
  skippedQueries: number;
  /** Queries left out because their clusters did not make it into the corpus. */
  droppedQueries: string[];
  summary: DistanceSummary;
  separation: Record<DistanceMetric, MetricSeparation>;
  sweep: SweepPoint[];
  negatives: NegativeNearest[];
  reference: { threshold: number; recall: number; falsePositives: number };
}

export interface ScaleStability {
  scales: number[];
  relevantMeans: Array<number | null>;
  /** (max - min) / mean over the per-scale relevant means. */
  relevantMeanSpread: number | null;
  relevantMeanStable: boolean;
  minIrrelevant: Array<number | null>;
  minIrrelevantNonIncreasing: boolean;
  negativeNearestNonIncreasing: Record<string, boolean>;
  /** Nearest irrelevant entry got closer between the smallest and largest corpus. */
  thresholdInstability: boolean;
}

export interface CandidateCheck {
  scale: number;
  entries: number;
  threshold: number;
  truePositives: number;
  falsePositives: number;
  recall: number;
  precision: number;
}

/**
 * Distance from each query to every entry in the store (exhaustive, not
 * top-k) under both metrics, labeled from the cluster map. Queries whose
 * embedding or scan fails are skipped and counted.
 */
export async function collectDistanceRecords(params: {
  store: EntryStore;
  inference: InferenceClient;
  clusterMap: ClusterMap;
  queries: Query[];
  metric: DistanceMetric;
  log: Logger;
}): Promise<{ records: DistanceRecord[]; skippedQueries: number }> {
  const records: DistanceRecord[] = [];
  let skippedQueries = 0;
  for (const query of params.queries) {
    let vector: number[] | undefined;
    try {
      [vector] = await params.inference.embed([query.text]);
    } catch (e) {
      params.log.warn('query_embedding_failed', { query: query.id, err: errorMessage(e) });
    }
    if (!vector || vector.length === 0) {
      skippedQueries += 1;
      continue;
    }
    let rows: ScanRow[];
    try {
      rows = await params.store.scanDistances(vector);
    } catch (e) {
      params.log.warn('distance_scan_failed', { query: query.id, err: errorMessage(e) });
      skippedQueries += 1;
      continue;
    }
    for (const row of rows) {
      records.push({
        queryId: query.id,
        entryId: row.entryId,
        distance: params.metric === 'l2' ? row.l2 : row.cosine,
        cosine: row.cosine,
        l2: row.l2,
        relevant: params.clusterMap.isRelevant(row.entryId, query),
      });
    }
  }
  return { records, skippedQueries };
}

function classStats(values: number[]): ClassStats {
  if (values.length === 0) return { count: 0, min: null, mean: null, max: null };
  let min = Infinity;
  let max = -Infinity;
  let sum = 0;
  for (const v of values) {
    if (v < min) min = v;
    if (v > max) max = v;
    sum += v;
  }
  return { count: values.length, min, mean: sum / values.length, max };
}

export function summarizeDistances(records: DistanceRecord[]): DistanceSummary {
  return {
    relevant: classStats(records.filter((r) => r.relevant).map((r) => r.distance)),
    irrelevant: classStats(records.filter((r) => !r.relevant).map((r) => r.distance)),
  };
}

/**
 * Recall and precision for "keep everything with distance <= t". Recall is 0
 * with no relevant records; precision is 1 when nothing is kept.
 */
export function thresholdSweep(records: DistanceRecord[], thresholds: number[] = DEFAULT_THRESHOLDS): SweepPoint[] {
  const relevantTotal = records.filter((r) => r.relevant).length;
  return thresholds
    .slice()
    .sort((a, b) => a - b)
    .map((threshold) => {
      let tp = 0;
      let fp = 0;
      for (const r of records) {
        if (r.distance > threshold) continue;
        if (r.relevant) tp += 1;
        else fp += 1;
      }
      const retrieved = tp + fp;
      return {
        threshold,
        retrieved,
        truePositives: tp,
        falsePositives: fp,
        recall: relevantTotal === 0 ? 0 : tp / relevantTotal,
        precision: retrieved === 0 ? 1 : tp / retrieved,
      };
    });
}

function round4(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

export function metricSeparation(records: DistanceRecord[], metric: DistanceMetric): MetricSeparation {
  let maxRelevant: number | null = null;
  let minIrrelevant: number | null = null;
  for (const r of records) {
    const d = r[metric];
    if (r.relevant) maxRelevant = maxRelevant === null ? d : Math.max(maxRelevant, d);
    else minIrrelevant = minIrrelevant === null ? d : Math.min(minIrrelevant, d);
  }
  if (maxRelevant === null || minIrrelevant === null) return { maxRelevant, minIrrelevant, midpoint: null, clean: false };
  return {
    maxRelevant,
    minIrrelevant,
    midpoint: round4((maxRelevant + minIrrelevant) / 2),
    clean: maxRelevant < minIrrelevant,
  };
}

/**
 * Midpoint threshold read off the smallest corpus, the one a tuner would
 * pick by looking at a small sample. Scales missing either class are passed
 * over; null when none has both.
 */
export function candidateThreshold(analyses: ScaleAnalysis[], metric: DistanceMetric): number | null {
  const smallest = analyses
    .filter((a) => a.separation[metric].midpoint !== null)
    .sort((a, b) => a.entries - b.entries || a.scale - b.scale)[0];
  return smallest?.separation[metric].midpoint ?? null;
}

export function checkCandidate(scale: number, entries: number, records: DistanceRecord[], threshold: number): CandidateCheck {
  const [point] = thresholdSweep(records, [threshold]);
  return {
    scale,
    entries,
    threshold,
    truePositives: point?.truePositives ?? 0,
    falsePositives: point?.falsePositives ?? 0,
    recall: point?.recall ?? 0,
    precision: point?.precision ?? 1,
  };
}

/** Nearest entry for every query with an empty relevant set. */
export function negativeNearest(records: DistanceRecord[], queries: Query[]): NegativeNearest[] {
  return queries
    .filter((q) => q.relevantClusters.length === 0)
    .map((q) => {
      let best: DistanceRecord | null = null;
      for (const r of records) {
        if (r.queryId !== q.id) continue;
        if (!best || r.distance < best.distance) best = r;
      }
      return { queryId: q.id, entryId: best?.entryId ?? null, distance: best?.distance ?? null };
    });
}

export function analyzeScale(params: {
  scale: number;
  entries: number;
  records: DistanceRecord[];
  queries: Query[];
  skippedQueries?: number;
  droppedQueries?: string[];
  thresholds?: number[];
  referenceThreshold?: number;
}): ScaleAnalysis {
  const referenceThreshold = params.referenceThreshold ?? REFERENCE_THRESHOLD;
  const [reference] = thresholdSweep(params.records, [referenceThreshold]);
  return {
    scale: params.scale,
    entries: params.entries,
    queries: params.queries.length,
    skippedQueries: params.skippedQueries ?? 0,
    droppedQueries: params.droppedQueries ?? [],
    summary: summarizeDistances(params.records),
    separation: {
      cosine: metricSeparation(params.records, 'cosine'),
      l2: metricSeparation(params.records, 'l2'),
    },
    sweep: thresholdSweep(params.records, params.thresholds ?? DEFAULT_THRESHOLDS),
    negatives: negativeNearest(params.records, params.queries),
    reference: {
      threshold: referenceThreshold,
      recall: reference?.recall ?? 0,
      falsePositives: reference?.falsePositives ?? 0,
    },
  };
}

function nonIncreasing(values: Array<number | null>): boolean {
  const present = values.filter((v): v is number => v !== null);
  for (let i = 1; i < present.length; i++) {
    const prev = present[i - 1];
    const cur = present[i];
    if (prev !== undefined && cur !== undefined && cur > prev) return false;
  }
  return true;
}

/**
 * Cross-scale comparison, analyses ordered by corpus size. The claim under
 * test: relevant distances hold still while the nearest irrelevant entry
 * keeps getting closer, so no fixed threshold keeps its false-positive rate.
 */
export function compareScales(analyses: ScaleAnalysis[], stableTolerance = 0.1): ScaleStability {
  const ordered = analyses.slice().sort((a, b) => a.entries - b.entries || a.scale - b.scale);
  const relevantMeans = ordered.map((a) => a.summary.relevant.mean);
  const minIrrelevant = ordered.map((a) => a.summary.irrelevant.min);

  const means = relevantMeans.filter((v): v is number => v !== null);
  let relevantMeanSpread: number | null = null;
  if (means.length > 0) {
    const avg = means.reduce((s, v) => s + v, 0) / means.length;
    relevantMeanSpread = avg === 0 ? 0 : (Math.max(...means) - Math.min(...means)) / avg;
  }

  const negativeIds = new Set(ordered.flatMap((a) => a.negatives.map((n) => n.queryId)));
  const negativeNearestNonIncreasing: Record<string, boolean> = {};
  for (const id of negativeIds) {
    const series = ordered.map((a) => a.negatives.find((n) => n.queryId === id)?.distance ?? null);
    negativeNearestNonIncreasing[id] = nonIncreasing(series);
  }

  const firstMin = minIrrelevant.find((v): v is number => v !== null);
  const lastMin = minIrrelevant.slice().reverse().find((v): v is number => v !== null);

  return {
    scales: ordered.map((a) => a.scale),
    relevantMeans,
    relevantMeanSpread,
    relevantMeanStable: relevantMeanSpread !== null && relevantMeanSpread < stableTolerance,
    minIrrelevant,
    minIrrelevantNonIncreasing: nonIncreasing(minIrrelevant),
    negativeNearestNonIncreasing,
    thresholdInstability:
      ordered.length >= 2 && firstMin !== undefined && lastMin !== undefined && lastMin < firstMin,
  };
}
