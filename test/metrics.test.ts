import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { aggregateByType, mean, overlapCount, precisionAtK, recallAtK, scoreDistribution } from '../src/core/metrics/precision';
import { fmt, formatRankedTsv, markdownTable, pickLargest, signed, truncateText, writeRankedList } from '../src/core/metrics/report';
import type { QueryType } from '../src/core/types';

const relevant = new Set([1, 3, 7]);
const isRelevant = (id: number) => relevant.has(id);

test('precision@k divides by k, not by the list length', () => {
  assert.equal(precisionAtK([1, 2, 3], isRelevant, 10), 0.2);
  assert.equal(precisionAtK([1, 2, 3], isRelevant, 2), 0.5);
  assert.equal(precisionAtK([], isRelevant, 10), 0);
  assert.equal(precisionAtK([1], isRelevant, 0), 0);
});

test('recall@k and overlap', () => {
  assert.equal(recallAtK([1, 2, 3, 7], isRelevant, 4, 10), 0.75);
  assert.equal(recallAtK([1, 2, 3, 7], isRelevant, 4, 1), 0.25);
  assert.equal(recallAtK([1], isRelevant, 0, 10), 0);
  assert.equal(overlapCount([1, 2, 3], [3, 3, 4, 1]), 2);
  assert.equal(mean([]), 0);
  assert.equal(mean([0.5, 1]), 0.75);
});

test('aggregate by query type keeps a fixed order', () => {
  const rows: Array<{ type: QueryType; p: number }> = [
    { type: 'negative', p: 0 },
    { type: 'direct', p: 0.4 },
    { type: 'direct', p: 0.2 },
    { type: 'negative', p: 0.1 },
  ];
  const out = aggregateByType(rows, (r) => r.p);
  assert.deepEqual(
    out.map((a) => [a.type, a.queries]),
    [
      ['direct', 2],
      ['negative', 2],
    ]
  );
  assert.ok(Math.abs((out[0]?.mean ?? 0) - 0.3) < 1e-12);
  assert.equal(out[1]?.mean, 0.05);
});

test('negative score distribution', () => {
  assert.deepEqual(scoreDistribution([0.25, 0.75, 0.5]), { count: 3, mean: 0.5, max: 0.75, above: 1 });
  assert.deepEqual(scoreDistribution([]), { count: 0, mean: 0, max: 0, above: 0 });
});

test('report formatting helpers', () => {
  assert.equal(fmt(0.12345), '0.123');
  assert.equal(fmt(null), '-');
  assert.equal(fmt(Number.NaN), '-');
  assert.equal(fmt(2, 1), '2.0');
  assert.equal(signed(0.1), '+0.100');
  assert.equal(signed(-0.25, 2), '-0.25');
  assert.equal(markdownTable(['query', 'p@10'], [['d1', '0.300'], ['a|b', 1]]), '| query | p@10 |\n|---|---|\n| d1 | 0.300 |\n| a\\|b | 1 |\n');
  assert.equal(truncateText('line one\nline\ttwo', 12), 'line one lin');
});

test('ranked list tsv', async () => {
  const rows = [
    { entryId: 4, text: 'the swarm left the hive', relevant: true, channel: 'keyword+vector', score: 0.0322580645 },
    { entryId: 9, text: 'tab\tinside', relevant: false },
  ];
  assert.equal(
    formatRankedTsv(rows),
    'rank\tentry_id\trelevant\tchannel\tscore\ttext\n1\t4\t1\tkeyword+vector\t0.032258\tthe swarm left the hive\n2\t9\t0\t\t\ttab inside\n'
  );
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'ranked-'));
  try {
    const file = await writeRankedList(dir, 'd/1', 'rrf', rows);
    assert.equal(file, path.join(dir, 'raw', 'd_1-rrf.tsv'));
    assert.equal(await fs.readFile(file, 'utf-8'), formatRankedTsv(rows));
  } finally {
    await fs.remove(dir);
  }
});

test('largest positive delta', () => {
  const rows = [
    { id: 'a', d: -0.2 },
    { id: 'b', d: 0.3 },
    { id: 'c', d: 0.1 },
  ];
  assert.equal(pickLargest(rows, (r) => r.d)?.id, 'b');
  assert.equal(
    pickLargest(rows, (r) => -Math.abs(r.d)),
    null
  );
});
