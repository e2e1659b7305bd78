import test from 'node:test';
import assert from 'node:assert/strict';
import { channelLabel, reciprocalRankFusion, rrfTerm, unionMerge } from '../src/core/retrieval/fuser';
import type { RankedList } from '../src/core/retrieval/types';
import type { Candidate, FusibleChannel } from '../src/core/types';

function list(channel: FusibleChannel, ids: number[]): RankedList {
  return {
    channel,
    candidates: ids.map<Candidate>((id, rank) => ({ entryId: id, text: `entry ${id}`, channels: [channel], ranks: channel === 'keyword' ? { keyword: rank } : { vector: rank } })),
  };
}

function pairs(n: number): Array<[number, number]> {
  const out: Array<[number, number]> = [];
  for (let a = 0; a < n; a++) for (let b = a + 1; b < n; b++) out.push([a, b]);
  return out;
}

function place(shared: [number, number], at: [number, number], fillers: number[]): number[] {
  const ids: number[] = [];
  const rest = fillers.slice();
  for (let pos = 0; pos < 5; pos++) {
    if (pos === at[0]) ids.push(shared[0]);
    else if (pos === at[1]) ids.push(shared[1]);
    else ids.push(rest.shift() ?? -1);
  }
  return ids;
}

test('rrf: term uses 0-based rank', () => {
  assert.equal(rrfTerm(0), 1 / 61);
  assert.equal(rrfTerm(4, 10), 1 / 15);
});

test('rrf: entries in both lists outrank single-list entries', () => {
  for (const inKeyword of pairs(5)) {
    for (const inVector of pairs(5)) {
      for (const swapped of [false, true]) {
        const keyword = place([100, 200], inKeyword, [1, 2, 3]);
        const vector = place(swapped ? [200, 100] : [100, 200], inVector, [11, 12, 13]);
        const fused = reciprocalRankFusion([list('keyword', keyword), list('vector', vector)], { limit: 10 });
        assert.deepEqual(
          fused.slice(0, 2).map((c) => c.entryId).sort((a, b) => a - b),
          [100, 200],
          `keyword=${keyword.join(',')} vector=${vector.join(',')}`
        );
        assert.equal(fused.length, 8);
      }
    }
  }
});

test('rrf: shared score is the sum of both terms', () => {
  const fused = reciprocalRankFusion([list('keyword', [1, 2, 3, 4, 5]), list('vector', [6, 7, 8, 4, 3])]);
  const three = fused.find((c) => c.entryId === 3);
  const four = fused.find((c) => c.entryId === 4);
  assert.ok(three && four);
  assert.equal(three.fusedScore, rrfTerm(2) + rrfTerm(4));
  assert.equal(four.fusedScore, rrfTerm(3) + rrfTerm(3));
  assert.deepEqual(three.ranks, { keyword: 2, vector: 4 });
  assert.deepEqual(three.channels, ['keyword', 'vector']);
  assert.equal(three.channelLabel, 'keyword+vector');
  assert.deepEqual(
    fused.slice(0, 2).map((c) => c.entryId),
    [3, 4]
  );
});

test('rrf: limit and non-increasing scores', () => {
  const fused = reciprocalRankFusion(
    [list('keyword', [1, 2, 3, 4, 5, 6, 7, 8]), list('vector', [9, 10, 11, 12, 13, 14, 15, 16])],
    { limit: 5, k: 60 }
  );
  assert.equal(fused.length, 5);
  for (let i = 1; i < fused.length; i++) {
    const prev = fused[i - 1];
    const cur = fused[i];
    assert.ok(prev && cur && prev.fusedScore >= cur.fusedScore);
  }
});

test('rrf: ties keep first-seen order', () => {
  const fused = reciprocalRankFusion([list('keyword', [10, 20]), list('vector', [30, 40])]);
  assert.deepEqual(
    fused.map((c) => c.entryId),
    [10, 30, 20, 40]
  );
  assert.deepEqual(
    fused.map((c) => c.channelLabel),
    ['keyword', 'vector', 'keyword', 'vector']
  );
});

test('rrf: a repeated entry counts once per list', () => {
  const fused = reciprocalRankFusion([list('keyword', [5, 5, 6])]);
  assert.equal(fused[0]?.entryId, 5);
  assert.equal(fused[0]?.fusedScore, rrfTerm(0));
  assert.equal(fused[1]?.fusedScore, rrfTerm(2));
});

test('rrf: empty input', () => {
  assert.deepEqual(reciprocalRankFusion([]), []);
  assert.deepEqual(reciprocalRankFusion([list('keyword', []), list('vector', [])]), []);
});

test('union: deduplicates and orders newest first', () => {
  const merged = unionMerge([list('keyword', [5, 9, 2]), list('vector', [9, 7])]);
  assert.deepEqual(
    merged.map((c) => c.entryId),
    [9, 7, 5, 2]
  );
  assert.deepEqual(merged[0]?.channels, ['keyword', 'vector']);
  assert.deepEqual(merged[0]?.ranks, { keyword: 1, vector: 0 });
  assert.deepEqual(
    unionMerge([list('keyword', [5, 9, 2]), list('vector', [9, 7])], 3).map((c) => c.entryId),
    [9, 7, 5]
  );
});

test('channel label follows keyword, vector order', () => {
  assert.equal(channelLabel(['vector', 'keyword']), 'keyword+vector');
  assert.equal(channelLabel(['vector']), 'vector');
});
