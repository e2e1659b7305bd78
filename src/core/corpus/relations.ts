import type { InferenceClient } from '../inference/types';
import { errorMessage, type Logger } from '../log';
import type { Relation } from '../types';

export function buildRelationPrompt(text: string): string {
  return [
    'Extract the factual relationships stated in the text below as subject | predicate | object triples.',
    'Use short lowercase noun phrases for subject and object.',
    'Write one triple per line and nothing else.',
    '',
    `Text: ${text}`,
  ].join('\n');
}

export function parseRelations(raw: string, entryId: number): Relation[] {
  const out: Relation[] = [];
  const seen = new Set<string>();
  for (const line of raw.split('\n')) {
    const cleaned = line.replace(/^\s*(?:[-*•]|\d+[.)])\s*/, '').trim();
    const parts = cleaned.split('|').map((p) => p.trim());
    if (parts.length !== 3) continue;
    const [subject, predicate, object] = parts;
    if (!subject || !predicate || !object) continue;
    const key = `${subject}\u0000${predicate}\u0000${object}`.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    out.push({ subject, predicate, object, entryId });
  }
  return out;
}

/** One generation call per entry; an entry whose call fails contributes nothing. */
export async function extractRelations(
  client: InferenceClient,
  entries: Array<{ id: number; text: string }>,
  log: Logger
): Promise<{ relations: Relation[]; failed: number }> {
  const relations: Relation[] = [];
  let failed = 0;
  for (const entry of entries) {
    try {
      const found = parseRelations(await client.generate(buildRelationPrompt(entry.text)), entry.id);
      relations.push(...found);
      log.debug('relations_extracted', { entry: entry.id, count: found.length });
    } catch (e) {
      failed += 1;
      log.warn('relation_extraction_failed', { entry: entry.id, err: errorMessage(e) });
    }
  }
  return { relations, failed };
}
