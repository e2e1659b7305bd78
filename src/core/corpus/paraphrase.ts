import type { InferenceClient } from '../inference/types';
import { errorMessage, type Logger } from '../log';
import type { EntryDraft } from '../types';

export function buildParaphrasePrompt(text: string, variant: number): string {
  return [
    'Rewrite the following text in different words while preserving its exact meaning.',
    'Use different vocabulary and sentence structure.',
    'Do not add new information or remove existing information.',
    'Return only the rewritten text, nothing else.',
    `This is variant ${variant}, so make it distinct from other rewrites.`,
    '',
    `Text: ${text}`,
  ].join('\n');
}

// models like to wrap the answer in quotes or prefix it with a label
export function cleanParaphrase(raw: string): string {
  let s = raw.replace(/\s+/g, ' ').trim();
  s = s.replace(/^(rewritten text|rewrite|variant \d+)\s*:\s*/i, '');
  if (s.length >= 2 && /^["'“]/.test(s) && /["'”]$/.test(s)) s = s.slice(1, -1).trim();
  return s;
}

export interface ParaphraseResult {
  drafts: EntryDraft[];
  failed: number;
}

/** multiplier - 1 rewrites per seed; each keeps its seed's cluster. */
export async function generateParaphrases(
  client: InferenceClient,
  seeds: EntryDraft[],
  multiplier: number,
  log: Logger
): Promise<ParaphraseResult> {
  const drafts: EntryDraft[] = [];
  let failed = 0;
  const variants = Math.max(0, Math.floor(multiplier) - 1);
  if (variants === 0) return { drafts, failed };

  for (const [i, seed] of seeds.entries()) {
    for (let v = 1; v <= variants; v++) {
      try {
        const text = cleanParaphrase(await client.generate(buildParaphrasePrompt(seed.text, v)));
        if (!text) {
          failed += 1;
          log.warn('paraphrase_empty', { seed: i, variant: v });
          continue;
        }
        drafts.push({ text, clusterId: seed.clusterId });
      } catch (e) {
        failed += 1;
        log.warn('paraphrase_failed', { seed: i, variant: v, err: errorMessage(e) });
      }
    }
    if ((i + 1) % 10 === 0) log.debug('paraphrase_progress', { seeds: i + 1, of: seeds.length, generated: drafts.length });
  }
  return { drafts, failed };
}
