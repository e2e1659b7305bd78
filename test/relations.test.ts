import test from 'node:test';
import assert from 'node:assert/strict';
import { buildRelationPrompt, extractRelations, parseRelations } from '../src/core/corpus/relations';
import { captureLog, StubInference } from './helpers/stubs';

test('relations: pipe triples, one per line', () => {
  const raw = [
    '1. honeybee | produces | honey',
    'not a triple',
    'bee | lives in | hive | extra',
    '- Honeybee | produces | Honey',
    'queen |  lays | eggs ',
    ' | missing | subject',
  ].join('\n');
  assert.deepEqual(parseRelations(raw, 7), [
    { subject: 'honeybee', predicate: 'produces', object: 'honey', entryId: 7 },
    { subject: 'queen', predicate: 'lays', object: 'eggs', entryId: 7 },
  ]);
  assert.deepEqual(parseRelations('', 1), []);
});

test('relations: prompt ends with the entry text', () => {
  assert.ok(buildRelationPrompt('Bees make honey.').endsWith('\n\nText: Bees make honey.'));
});

test('relations: a failed entry contributes nothing', async () => {
  const client = new StubInference({
    generate: async (prompt) => {
      if (prompt.includes('chain')) throw new Error('generation timed out');
      return prompt.includes('honeybee') ? 'honeybee colony | swarms in | spring' : 'tide pool | holds | anemones';
    },
  });
  const { log, lines } = captureLog();
  const out = await extractRelations(
    client,
    [
      { id: 1, text: 'honeybee colonies swarm in spring' },
      { id: 2, text: 'bicycle chain skips under load' },
      { id: 3, text: 'tide pools hold sea anemones' },
    ],
    log
  );
  assert.equal(out.failed, 1);
  assert.deepEqual(
    out.relations.map((r) => [r.entryId, r.subject]),
    [
      [1, 'honeybee colony'],
      [3, 'tide pool'],
    ]
  );
  assert.deepEqual(
    lines.filter((l) => l.level === 'warn').map((l) => [l.msg, l.entry]),
    [['relation_extraction_failed', 2]]
  );
});
