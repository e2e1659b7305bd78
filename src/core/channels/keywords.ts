import fs from 'fs-extra';
import { z } from 'zod';
import { dataFile } from '../paths';

const MIN_KEYWORD_LENGTH = 3;

let cachedStopWords: ReadonlySet<string> | null = null;

export function loadStopWords(file: string = dataFile('stopwords.json')): ReadonlySet<string> {
  const raw: unknown = fs.readJsonSync(file);
  const words = z.array(z.string()).parse(raw);
  return new Set(words.map((w) => w.toLowerCase()));
}

export function defaultStopWords(): ReadonlySet<string> {
  if (!cachedStopWords) cachedStopWords = loadStopWords();
  return cachedStopWords;
}

/**
 * Lower-case, drop punctuation, split on whitespace, drop short tokens and
 * stop words, de-duplicate keeping first occurrence.
 */
export function extractKeywords(text: string, stopWords: ReadonlySet<string> = defaultStopWords()): string[] {
  const out: string[] = [];
  const seen = new Set<string>();
  const tokens = String(text ?? '')
    .toLowerCase()
    .replace(/[^\w\s]/g, '')
    .split(/\s+/);
  for (const t of tokens) {
    if (t.length < MIN_KEYWORD_LENGTH) continue;
    if (stopWords.has(t)) continue;
    if (seen.has(t)) continue;
    seen.add(t);
    out.push(t);
  }
  return out;
}

export function toOrQuery(keywords: string[]): string {
  return keywords.join(' OR ');
}
