import fs from 'fs-extra';
import { z } from 'zod';
import { SetupError } from '../errors';
import { errorMessage } from '../log';
import { dataFile } from '../paths';
import type { CorpusSpec, Query, QuerySet } from '../types';

const CorpusSpecSchema = z.object({
  version: z.number().int().positive(),
  clusters: z
    .array(
      z.object({
        id: z.number().int().positive(),
        name: z.string().min(1),
        entries: z.array(z.string().trim().min(1)).min(1),
      })
    )
    .min(1),
  noise: z.array(z.string().trim().min(1)).default([]),
});

const QuerySchema = z.object({
  id: z.string().trim().min(1),
  type: z.enum(['direct', 'paraphrase', 'negative']),
  relevantClusters: z.array(z.number().int().positive()),
  text: z.string().trim().min(1),
});

const QuerySetSchema = z
  .object({
    version: z.number().int().positive(),
    queries: z.array(QuerySchema).min(1),
  })
  .superRefine((set, ctx) => {
    const seen = new Set<string>();
    set.queries.forEach((q, i) => {
      if (seen.has(q.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['queries', i, 'id'], message: `duplicate query id ${q.id}` });
      }
      seen.add(q.id);
      if (q.type === 'negative' && q.relevantClusters.length > 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['queries', i], message: 'negative query must have no relevant clusters' });
      }
      if (q.type !== 'negative' && q.relevantClusters.length === 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['queries', i], message: `${q.type} query needs at least one relevant cluster` });
      }
    });
  });

async function readJsonFile(file: string, reason: 'corpus_invalid' | 'queries_invalid'): Promise<unknown> {
  if (!(await fs.pathExists(file))) throw new SetupError(reason, `File not found: ${file}`, { file });
  try {
    return await fs.readJSON(file);
  } catch (e) {
    throw new SetupError(reason, `Could not parse ${file}: ${errorMessage(e)}`, { file });
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ');
}

export function parseCorpusSpec(raw: unknown, source = '<inline>'): CorpusSpec {
  const parsed = CorpusSpecSchema.safeParse(raw);
  if (!parsed.success) throw new SetupError('corpus_invalid', `Malformed corpus ${source}: ${describeIssues(parsed.error)}`);
  const ids = parsed.data.clusters.map((c) => c.id);
  if (new Set(ids).size !== ids.length) throw new SetupError('corpus_invalid', `Malformed corpus ${source}: duplicate cluster id`);
  return parsed.data;
}

export function parseQuerySet(raw: unknown, source = '<inline>'): QuerySet {
  const parsed = QuerySetSchema.safeParse(raw);
  if (!parsed.success) throw new SetupError('queries_invalid', `Malformed query set ${source}: ${describeIssues(parsed.error)}`);
  return parsed.data;
}

/** Every cluster a query names must be defined by the corpus. */
export function assertQueriesMatchCorpus(corpus: CorpusSpec, queries: Query[]): void {
  const defined = new Set(corpus.clusters.map((c) => c.id));
  const missing: Array<{ query: string; cluster: number }> = [];
  for (const q of queries) {
    for (const c of q.relevantClusters) if (!defined.has(c)) missing.push({ query: q.id, cluster: c });
  }
  if (missing.length > 0) {
    throw new SetupError('ground_truth_mismatch', `Query set references ${missing.length} cluster(s) the corpus does not define`, {
      missing,
    });
  }
}

export async function loadCorpusSpec(file: string = dataFile('corpus.json')): Promise<CorpusSpec> {
  return parseCorpusSpec(await readJsonFile(file, 'corpus_invalid'), file);
}

export async function loadQuerySet(file: string = dataFile('queries.json')): Promise<QuerySet> {
  return parseQuerySet(await readJsonFile(file, 'queries_invalid'), file);
}
