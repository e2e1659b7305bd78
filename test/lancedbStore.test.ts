import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { openEntryStore } from '../src/core/store';
import { likeContains } from '../src/core/store/lancedb';
import { silentLog } from './helpers/stubs';

async function withStore(fn: (store: Awaited<ReturnType<typeof openEntryStore>>) => Promise<void>): Promise<void> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'lance-store-'));
  const store = await openEntryStore({ kind: 'lancedb', workDir: dir, dim: 3, log: silentLog });
  try {
    await fn(store);
  } finally {
    await store.close();
    await fs.remove(dir);
  }
}

test('lancedb store: insert, count and exhaustive distances', async () => {
  await withStore(async (store) => {
    assert.equal(store.kind, 'lancedb');
    await store.insertEntries([
      { id: 1, text: 'honeybee colonies swarm in spring', clusterId: 1, vector: [1, 0, 0] },
      { id: 2, text: 'bicycle chain skips under load', clusterId: 2, vector: [0, 1, 0] },
      { id: 3, text: 'beekeepers inspect honeybee frames', clusterId: 1, vector: [1, 1, 0] },
    ]);
    assert.equal(await store.count(), 3);

    const nearest = await store.vectorSearch([1, 0, 0], 2, 'cosine');
    assert.deepEqual(
      nearest.map((r) => r.entryId),
      [1, 3]
    );
    assert.ok(Math.abs(nearest[0]?.distance ?? 1) < 1e-6);

    const all = await store.scanDistances([1, 0, 0]);
    assert.deepEqual(
      all.map((r) => r.entryId),
      [1, 2, 3]
    );
    const expected: Array<[number, number]> = [
      [0, 0],
      [1, 2],
      [1 - Math.SQRT1_2, 1],
    ];
    for (const [i, [cosine, l2]] of expected.entries()) {
      assert.ok(Math.abs((all[i]?.cosine ?? -1) - cosine) < 1e-4);
      assert.ok(Math.abs((all[i]?.l2 ?? -1) - l2) < 1e-4);
    }
  });
});

test('lancedb store: full-text keyword search', async () => {
  await withStore(async (store) => {
    await store.insertEntries([
      { id: 1, text: 'honeybee colonies swarm in spring', clusterId: 1, vector: [1, 0, 0] },
      { id: 2, text: 'bicycle chain skips under load', clusterId: 2, vector: [0, 1, 0] },
      { id: 3, text: 'beekeepers inspect honeybee frames', clusterId: 1, vector: [1, 1, 0] },
    ]);
    const hits = await store.keywordSearch(['honeybee'], 10);
    assert.deepEqual(hits.map((h) => h.entryId).sort((a, b) => a - b), [1, 3]);
    assert.deepEqual(await store.keywordSearch([], 10), []);

    // the index is rebuilt once new entries arrive
    await store.insertEntries([{ id: 4, text: 'bicycle wheel with honeybee sticker', clusterId: 2, vector: [0, 0, 1] }]);
    const again = await store.keywordSearch(['honeybee'], 10);
    assert.deepEqual(again.map((h) => h.entryId).sort((a, b) => a - b), [1, 3, 4]);
  });
});

test('lancedb store: relation lookup by subject or object', async () => {
  await withStore(async (store) => {
    await store.insertRelations([
      { subject: 'Honeybee colony', predicate: 'produces', object: 'honey', entryId: 1 },
      { subject: 'chain', predicate: 'drives', object: 'rear wheel', entryId: 2 },
      { subject: "o'brien bike", predicate: 'has', object: 'bell', entryId: 5 },
    ]);
    const hits = await store.matchRelations(['honeybee', 'wheel'], 10);
    assert.deepEqual(hits.map((r) => r.entryId).sort((a, b) => a - b), [1, 2]);
    const quoted = await store.matchRelations(["o'brien"], 10);
    assert.deepEqual(quoted.map((r) => r.predicate), ['has']);
  });
});

test('lancedb store: equal keyword scores at the cut-off resolve newest-first', async () => {
  await withStore(async (store) => {
    await store.insertEntries([
      { id: 1, text: 'honeybee frames', clusterId: 1, vector: [1, 0, 0] },
      { id: 2, text: 'honeybee frames', clusterId: 1, vector: [1, 0, 0] },
      { id: 3, text: 'honeybee frames', clusterId: 1, vector: [1, 0, 0] },
    ]);
    const hits = await store.keywordSearch(['honeybee'], 1);
    assert.deepEqual(hits.map((h) => h.entryId), [3]);
  });
});

test('lancedb store: LIKE wildcards in relation terms match literally', async () => {
  assert.equal(likeContains('a_c'), '%a!_c%');
  assert.equal(likeContains('50%!'), '%50!%!!%');
  await withStore(async (store) => {
    await store.insertRelations([
      { subject: 'a_c joint', predicate: 'holds', object: 'frame', entryId: 1 },
      { subject: 'abc joint', predicate: 'holds', object: 'frame', entryId: 2 },
      { subject: 'gear', predicate: 'is', object: '50% worn', entryId: 3 },
      { subject: 'gear', predicate: 'is', object: '50 worn', entryId: 4 },
    ]);
    const underscore = await store.matchRelations(['a_c'], 10);
    assert.deepEqual(underscore.map((r) => r.entryId), [1]);
    const percent = await store.matchRelations(['50%'], 10);
    assert.deepEqual(percent.map((r) => r.entryId), [3]);
  });
});
