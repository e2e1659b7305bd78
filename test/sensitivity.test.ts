import test from 'node:test';
import assert from 'node:assert/strict';
import { toDistanceCsv } from '../src/core/analysis/csv';
import {
  analyzeScale,
  candidateThreshold,
  checkCandidate,
  collectDistanceRecords,
  compareScales,
  DEFAULT_THRESHOLDS,
  metricSeparation,
  negativeNearest,
  summarizeDistances,
  thresholdSweep,
} from '../src/core/analysis/sensitivity';
import { ClusterMap } from '../src/core/corpus/clusterMap';
import { MemoryEntryStore } from '../src/core/store/memory';
import type { DistanceRecord, Query } from '../src/core/types';
import { silentLog, StubInference } from './helpers/stubs';

const near = (a: number | null | undefined, b: number) => a !== null && a !== undefined && Math.abs(a - b) < 1e-9;

const d1: Query = { id: 'd1', type: 'direct', relevantClusters: [1], text: 'honeybee swarm' };
const n1: Query = { id: 'n1', type: 'negative', relevantClusters: [], text: 'quarterly earnings' };

// Unit vectors: squared l2 is twice the cosine distance.
function rec(queryId: string, entryId: number, distance: number, relevant: boolean): DistanceRecord {
  return { queryId, entryId, distance, cosine: distance, l2: distance * 2, relevant };
}

const direct: DistanceRecord[] = [
  rec('d1', 1, 0.2, true),
  rec('d1', 2, 0.3, true),
  rec('d1', 3, 0.45, false),
  rec('d1', 4, 0.6, false),
  rec('d1', 5, 0.9, false),
];

test('sensitivity: default thresholds', () => {
  assert.deepEqual(DEFAULT_THRESHOLDS, [0.3, 0.35, 0.4, 0.45, 0.5, 0.55, 0.6, 0.65]);
});

test('sensitivity: per-class distance summary', () => {
  const summary = summarizeDistances(direct);
  assert.deepEqual(summary.relevant, { count: 2, min: 0.2, mean: 0.25, max: 0.3 });
  assert.equal(summary.irrelevant.count, 3);
  assert.equal(summary.irrelevant.min, 0.45);
  assert.ok(near(summary.irrelevant.mean, 0.65));
  assert.equal(summary.irrelevant.max, 0.9);
  assert.deepEqual(summarizeDistances([]).relevant, { count: 0, min: null, mean: null, max: null });
});

test('sensitivity: sweep recall rises and precision falls with the threshold', () => {
  const sweep = thresholdSweep(direct, [1.0, 0.25, 0.7, 0.5]);
  assert.deepEqual(
    sweep.map((p) => [p.threshold, p.retrieved, p.truePositives, p.falsePositives, p.recall]),
    [
      [0.25, 1, 1, 0, 0.5],
      [0.5, 3, 2, 1, 1],
      [0.7, 4, 2, 2, 1],
      [1.0, 5, 2, 3, 1],
    ]
  );
  assert.ok(near(sweep[1]?.precision, 2 / 3));
  assert.deepEqual(
    sweep.map((p) => p.precision).filter((_, i) => i !== 1),
    [1, 0.5, 0.4]
  );
  for (let i = 1; i < sweep.length; i++) {
    const prev = sweep[i - 1];
    const cur = sweep[i];
    assert.ok(prev && cur);
    assert.ok(cur.recall >= prev.recall);
    assert.ok(cur.precision <= prev.precision);
  }
});

test('sensitivity: empty sweep conventions', () => {
  assert.deepEqual(thresholdSweep([], [0.5]), [
    { threshold: 0.5, retrieved: 0, truePositives: 0, falsePositives: 0, recall: 0, precision: 1 },
  ]);
});

test('sensitivity: nearest entry per negative query', () => {
  const records = [...direct, rec('n1', 1, 0.7, false), rec('n1', 3, 0.4, false), rec('n1', 4, 0.8, false)];
  const n2: Query = { ...n1, id: 'n2' };
  assert.deepEqual(negativeNearest(records, [d1, n1, n2]), [
    { queryId: 'n1', entryId: 3, distance: 0.4 },
    { queryId: 'n2', entryId: null, distance: null },
  ]);
});

test('sensitivity: exhaustive distances from the store', async () => {
  const store = new MemoryEntryStore();
  await store.insertEntries([
    { id: 1, text: 'bees', clusterId: 1, vector: [1, 0, 0] },
    { id: 2, text: 'bikes', clusterId: 2, vector: [0, 1, 0] },
  ]);
  const clusterMap = new ClusterMap();
  clusterMap.set(1, 1);
  clusterMap.set(2, 2);
  const inference = new StubInference({
    dim: 3,
    embed: async (texts) =>
      texts.map((t) => {
        if (t === 'quarterly earnings') throw new Error('embedder down');
        return [1, 0, 0];
      }),
  });
  const out = await collectDistanceRecords({ store, inference, clusterMap, queries: [d1, n1], metric: 'cosine', log: silentLog });
  assert.equal(out.skippedQueries, 1);
  assert.deepEqual(out.records, [rec('d1', 1, 0, true), rec('d1', 2, 1, false)]);
  assert.equal(
    toDistanceCsv(out.records),
    'query_id,entry_id,l2_dist,cosine_dist,relevant\nd1,1,0.000000,0.000000,true\nd1,2,2.000000,1.000000,false\n'
  );
});

test('sensitivity: a failed store scan skips that query and the rest carry on', async () => {
  class FlakyScanStore extends MemoryEntryStore {
    scans = 0;
    async scanDistances(vector: number[]) {
      this.scans += 1;
      if (this.scans === 2) throw new Error('ECONNRESET from store');
      return super.scanDistances(vector);
    }
  }
  const store = new FlakyScanStore();
  await store.insertEntries([
    { id: 1, text: 'bees', clusterId: 1, vector: [1, 0, 0] },
    { id: 2, text: 'bikes', clusterId: 2, vector: [0, 1, 0] },
  ]);
  const clusterMap = new ClusterMap();
  clusterMap.set(1, 1);
  clusterMap.set(2, 2);
  const d2: Query = { id: 'd2', type: 'direct', relevantClusters: [2], text: 'bicycle chain' };
  const inference = new StubInference({ dim: 3, embed: async (texts) => texts.map(() => [1, 0, 0]) });
  const out = await collectDistanceRecords({ store, inference, clusterMap, queries: [d1, n1, d2], metric: 'l2', log: silentLog });
  assert.equal(store.scans, 3);
  assert.equal(out.skippedQueries, 1);
  assert.deepEqual(
    out.records.map((r) => [r.queryId, r.entryId, r.distance, r.relevant]),
    [
      ['d1', 1, 0, true],
      ['d1', 2, 2, false],
      ['d2', 1, 0, false],
      ['d2', 2, 2, true],
    ]
  );
});

test('sensitivity: per-metric separation and midpoint', () => {
  assert.deepEqual(metricSeparation(direct, 'cosine'), { maxRelevant: 0.3, minIrrelevant: 0.45, midpoint: 0.375, clean: true });
  const l2 = metricSeparation(direct, 'l2');
  assert.equal(l2.clean, true);
  assert.equal(l2.midpoint, 0.75);

  const overlapping = [rec('d1', 1, 0.5, true), rec('d1', 2, 0.4, false)];
  assert.deepEqual(metricSeparation(overlapping, 'cosine'), { maxRelevant: 0.5, minIrrelevant: 0.4, midpoint: 0.45, clean: false });
  assert.deepEqual(metricSeparation([rec('n1', 2, 0.4, false)], 'cosine'), {
    maxRelevant: null,
    minIrrelevant: 0.4,
    midpoint: null,
    clean: false,
  });
});

function scaleOf(scale: number, relevant: number, irrelevant: number, negative: number) {
  return analyzeScale({
    scale,
    entries: scale,
    records: [rec('d1', 1, relevant, true), rec('d1', 2, irrelevant, false), rec('n1', 2, negative, false)],
    queries: [d1, n1],
  });
}

test('sensitivity: candidate threshold comes from the smallest corpus', () => {
  const analyses = [scaleOf(100, 0.2, 0.42, 0.55), scaleOf(10, 0.2, 0.5, 0.6)];
  assert.equal(candidateThreshold(analyses, 'cosine'), 0.35);
  assert.equal(candidateThreshold(analyses, 'l2'), 0.7);
  assert.equal(candidateThreshold([], 'cosine'), null);
  const onlyNegatives = analyzeScale({ scale: 5, entries: 2, records: [rec('n1', 1, 0.3, false)], queries: [n1] });
  assert.equal(candidateThreshold([onlyNegatives, ...analyses], 'cosine'), 0.35);
  assert.equal(candidateThreshold([onlyNegatives], 'cosine'), null);

  const records = [rec('d1', 1, 0.2, true), rec('d1', 2, 0.3, false), rec('n1', 2, 0.5, false)];
  assert.deepEqual(checkCandidate(100, 100, records, 0.35), {
    scale: 100,
    entries: 100,
    threshold: 0.35,
    truePositives: 1,
    falsePositives: 1,
    recall: 1,
    precision: 0.5,
  });
});

test('sensitivity: reference threshold summary', () => {
  const analysis = analyzeScale({ scale: 10, entries: 5, records: direct, queries: [d1] });
  assert.deepEqual(analysis.reference, { threshold: 0.5, recall: 1, falsePositives: 1 });
  assert.equal(analysis.sweep.length, 8);
  assert.deepEqual(analysis.negatives, []);
  assert.deepEqual(analysis.droppedQueries, []);
  assert.equal(analysis.separation.cosine.midpoint, 0.375);
});

test('sensitivity: stable relevant distances, nearest irrelevant drifts closer', () => {
  const stability = compareScales([scaleOf(1000, 0.21, 0.35, 0.5), scaleOf(10, 0.2, 0.5, 0.6), scaleOf(100, 0.205, 0.42, 0.55)]);
  assert.deepEqual(stability.scales, [10, 100, 1000]);
  assert.deepEqual(stability.minIrrelevant, [0.5, 0.42, 0.35]);
  assert.ok(near(stability.relevantMeanSpread, 0.01 / 0.205));
  assert.equal(stability.relevantMeanStable, true);
  assert.equal(stability.minIrrelevantNonIncreasing, true);
  assert.deepEqual(stability.negativeNearestNonIncreasing, { n1: true });
  assert.equal(stability.thresholdInstability, true);
});

test('sensitivity: a closer irrelevant entry at a smaller scale is flagged', () => {
  const stability = compareScales([scaleOf(10, 0.2, 0.3, 0.6), scaleOf(100, 0.4, 0.42, 0.55)]);
  assert.equal(stability.minIrrelevantNonIncreasing, false);
  assert.equal(stability.relevantMeanStable, false);
  assert.equal(stability.thresholdInstability, false);
  assert.deepEqual(stability.negativeNearestNonIncreasing, { n1: true });
});
