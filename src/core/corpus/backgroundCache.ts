import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import type { InferenceClient } from '../inference/types';
import { createLogger, errorMessage, type Logger } from '../log';
import { dataFile } from '../paths';

/** Shared across runs; append-only. */
export interface BackgroundEntryCache {
  size(): Promise<number>;
  /** Grows the cache to at least n entries if it can; resolves to the size reached. */
  ensure(n: number): Promise<number>;
  read(n: number): Promise<string[]>;
}

export type NoteGenerator = (topic: string, count: number) => Promise<string[]>;

export const NOTES_PER_TOPIC = 20;
export const NOTES_GROWTH_PER_ROUND = 5;
const MIN_NOTE_LENGTH = 10;

export function buildNotesPrompt(topic: string, count: number): string {
  return (
    `Generate exactly ${count} short factual notes (1-2 sentences each) about different aspects of ${topic}. ` +
    'One note per line. No numbering. No blank lines. No introductory text. Start immediately with the first note.'
  );
}

export function parseNotes(raw: string): string[] {
  return raw
    .split('\n')
    .map((line) => line.replace(/^\s*(?:[-*•]|\d+[.)])\s*/, '').replace(/\s+/g, ' ').trim())
    .filter((line) => line.length >= MIN_NOTE_LENGTH);
}

/** Topic rotation: 20 notes per topic, 5 more per topic on each lap. */
export function planNextBatch(have: number, topics: string[]): { topic: string; count: number } {
  if (topics.length === 0) throw new Error('Background topic pool is empty');
  const slot = Math.floor(have / NOTES_PER_TOPIC);
  const topic = topics[slot % topics.length] ?? topics[0] ?? '';
  const lap = Math.floor(slot / topics.length);
  return { topic, count: NOTES_PER_TOPIC + NOTES_GROWTH_PER_ROUND * lap };
}

export function createModelNoteGenerator(client: InferenceClient): NoteGenerator {
  return async (topic, count) => parseNotes(await client.generate(buildNotesPrompt(topic, count)));
}

export async function loadTopics(file: string = dataFile('topics.json')): Promise<string[]> {
  const raw: unknown = await fs.readJSON(file);
  return z.array(z.string().trim().min(1)).min(1).parse(raw);
}

export interface FileBackgroundCacheOptions {
  file: string;
  generator: NoteGenerator;
  topics: string[];
  log?: Logger;
  /** Consecutive empty or failed generations tolerated before giving up. */
  maxStalls?: number;
}

/**
 * One note per line in a text file. Each generated batch is appended as soon
 * as it arrives so an interrupted run loses at most the batch in flight.
 */
export class FileBackgroundCache implements BackgroundEntryCache {
  private options: FileBackgroundCacheOptions;
  private lines: string[] | null = null;
  private log: Logger;

  constructor(options: FileBackgroundCacheOptions) {
    this.options = options;
    this.log = options.log ?? createLogger({ component: 'corpus', kind: 'background' });
  }

  async size(): Promise<number> {
    return (await this.load()).length;
  }

  async ensure(n: number): Promise<number> {
    const lines = await this.load();
    const maxStalls = this.options.maxStalls ?? 3;
    let stalls = 0;
    while (lines.length < n) {
      const { topic, count } = planNextBatch(lines.length, this.options.topics);
      let notes: string[] = [];
      try {
        notes = await this.options.generator(topic, count);
      } catch (e) {
        this.log.warn('background_generation_failed', { topic, err: errorMessage(e) });
      }
      if (notes.length === 0) {
        stalls += 1;
        if (stalls >= maxStalls) {
          this.log.warn('background_generation_stalled', { have: lines.length, want: n });
          break;
        }
        continue;
      }
      stalls = 0;
      await fs.ensureDir(path.dirname(this.options.file));
      await fs.appendFile(this.options.file, notes.join('\n') + '\n');
      lines.push(...notes);
      this.log.info('background_batch', { topic, added: notes.length, have: lines.length, want: n });
    }
    return lines.length;
  }

  async read(n: number): Promise<string[]> {
    return (await this.load()).slice(0, Math.max(0, n));
  }

  private async load(): Promise<string[]> {
    if (this.lines) return this.lines;
    const exists = await fs.pathExists(this.options.file);
    const content = exists ? await fs.readFile(this.options.file, 'utf-8') : '';
    this.lines = content
      .split('\n')
      .map((l) => l.trim())
      .filter(Boolean);
    return this.lines;
  }
}
