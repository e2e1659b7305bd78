import type { BackgroundEntryCache } from '../../src/core/corpus/backgroundCache';
import type { InferenceClient, TokenLogprob } from '../../src/core/inference/types';
import { createLogger, type Logger } from '../../src/core/log';
import type { CorpusSpec, Query } from '../../src/core/types';

export const silentLog: Logger = createLogger({}, () => undefined);

export function captureLog(): { log: Logger; lines: Array<Record<string, unknown>> } {
  const lines: Array<Record<string, unknown>> = [];
  const log = createLogger({}, (line) => {
    const parsed: unknown = JSON.parse(line);
    if (typeof parsed === 'object' && parsed !== null) lines.push({ ...parsed });
  });
  return { log, lines };
}

function tokens(text: string): string[] {
  return text.toLowerCase().split(/[^a-z0-9]+/g).filter(Boolean);
}

/** Bag of tokens folded into dim buckets by char-code sum, unit length. */
export function textVector(text: string, dim: number): number[] {
  const v = new Array<number>(dim).fill(0);
  for (const t of tokens(text)) {
    let h = 0;
    for (const ch of t) h = (h * 31 + ch.charCodeAt(0)) % 1_000_003;
    v[h % dim] = (v[h % dim] ?? 0) + 1;
  }
  const norm = Math.sqrt(v.reduce((s, x) => s + x * x, 0));
  return norm === 0 ? v.map((_, i) => (i === 0 ? 1 : 0)) : v.map((x) => x / norm);
}

export function logprobs(pairs: Array<[string, number]>): TokenLogprob[] {
  return pairs.map(([token, p]) => ({ token, logprob: Math.log(p) }));
}

export function parseJudgePrompt(prompt: string): { query: string; document: string } {
  const query = /Query: (.*)\n/.exec(prompt)?.[1] ?? '';
  const document = /Document: ([\s\S]*)$/.exec(prompt)?.[1] ?? '';
  return { query, document };
}

/** Shares a token of four or more characters. */
export function overlaps(a: string, b: string): boolean {
  const left = new Set(tokens(a).filter((t) => t.length >= 4));
  return tokens(b).some((t) => left.has(t));
}

export interface StubInferenceOptions {
  dim?: number;
  vectors?: Map<string, number[]>;
  embed?: (texts: string[]) => Promise<number[][]>;
  generate?: (prompt: string) => Promise<string>;
  topLogprobs?: (prompt: string, k: number) => Promise<TokenLogprob[]>;
}

/**
 * Deterministic oracle. Embeddings come from the explicit vector map or the
 * token-bucket embedding; the default judge answers yes on token overlap.
 */
export class StubInference implements InferenceClient {
  readonly embeddingModel = 'stub-embed';
  readonly generationModel = 'stub-gen';
  readonly rerankModel = 'stub-judge';
  readonly dim: number;
  calls = { embed: 0, generate: 0, topLogprobs: 0 };
  private options: StubInferenceOptions;

  constructor(options: StubInferenceOptions = {}) {
    this.options = options;
    this.dim = options.dim ?? 32;
  }

  async embed(texts: string[]): Promise<number[][]> {
    this.calls.embed += 1;
    if (this.options.embed) return this.options.embed(texts);
    return texts.map((t) => this.options.vectors?.get(t) ?? textVector(t, this.dim));
  }

  async generate(prompt: string): Promise<string> {
    this.calls.generate += 1;
    if (this.options.generate) return this.options.generate(prompt);
    return '';
  }

  async topLogprobs(prompt: string, k: number): Promise<TokenLogprob[]> {
    this.calls.topLogprobs += 1;
    if (this.options.topLogprobs) return this.options.topLogprobs(prompt, k);
    const { query, document } = parseJudgePrompt(prompt);
    return overlaps(query, document)
      ? logprobs([['yes', 0.92], ['no', 0.05], ['Yes', 0.02]])
      : logprobs([['no', 0.97], ['yes', 0.02], ['No', 0.01]]);
  }

  async ping(): Promise<{ models: string[] }> {
    return { models: [this.embeddingModel, this.generationModel, this.rerankModel] };
  }
}

export class MemoryBackgroundCache implements BackgroundEntryCache {
  lines: string[] = [];
  ensureCalls = 0;

  async size(): Promise<number> {
    return this.lines.length;
  }

  async ensure(n: number): Promise<number> {
    this.ensureCalls += 1;
    while (this.lines.length < n) this.lines.push(`background note number ${this.lines.length + 1} about unrelated trivia`);
    return this.lines.length;
  }

  async read(n: number): Promise<string[]> {
    return this.lines.slice(0, n);
  }
}

export const testCorpus: CorpusSpec = {
  version: 1,
  clusters: [
    {
      id: 1,
      name: 'bees',
      entries: ['honeybee colonies swarm in spring', 'beekeepers inspect honeybee frames', 'varroa mites weaken honeybee colonies'],
    },
    {
      id: 2,
      name: 'bikes',
      entries: ['bicycle chain skips under load', 'adjust the bicycle derailleur cable', 'true a bicycle wheel with spokes'],
    },
    {
      id: 3,
      name: 'tides',
      entries: ['tide pools hold sea anemones', 'barnacles cling to tide pool rocks', 'sea stars hunt in tide pools'],
    },
  ],
  noise: ['the budget meeting moved to thursday', 'printer toner recycling program'],
};

export const testQueries: Query[] = [
  { id: 'd1', type: 'direct', relevantClusters: [1], text: 'why do honeybee colonies swarm' },
  { id: 'd2', type: 'direct', relevantClusters: [2], text: 'bicycle derailleur adjustment' },
  { id: 'p1', type: 'paraphrase', relevantClusters: [3], text: 'creatures in tide pools' },
  { id: 'n1', type: 'negative', relevantClusters: [], text: 'corporate quarterly earnings' },
];
