import fs from 'fs-extra';
import path from 'path';
import { sanitizeSegment } from '../paths';

export function fmt(value: number | null | undefined, digits = 3): string {
  if (value === null || value === undefined || !Number.isFinite(value)) return '-';
  return value.toFixed(digits);
}

export function signed(value: number, digits = 3): string {
  return `${value >= 0 ? '+' : ''}${value.toFixed(digits)}`;
}

function cell(value: string | number): string {
  return String(value).replace(/\|/g, '\\|').replace(/\n/g, ' ');
}

export function markdownTable(headers: string[], rows: Array<Array<string | number>>): string {
  const head = `| ${headers.map(cell).join(' | ')} |`;
  const rule = `|${headers.map(() => '---').join('|')}|`;
  const body = rows.map((r) => `| ${r.map(cell).join(' | ')} |`);
  return [head, rule, ...body].join('\n') + '\n';
}

export function truncateText(text: string, max = 80): string {
  const flat = text.replace(/[\t\r\n]+/g, ' ');
  return flat.length > max ? flat.slice(0, max) : flat;
}

export interface RankedRow {
  entryId: number;
  text: string;
  relevant: boolean;
  channel?: string;
  score?: number;
}

export const RANKED_TSV_HEADER = 'rank\tentry_id\trelevant\tchannel\tscore\ttext';

export function formatRankedTsv(rows: RankedRow[]): string {
  const lines = [RANKED_TSV_HEADER];
  rows.forEach((r, i) => {
    const score = r.score === undefined ? '' : r.score.toFixed(6);
    lines.push([i + 1, r.entryId, r.relevant ? 1 : 0, r.channel ?? '', score, truncateText(r.text)].join('\t'));
  });
  return lines.join('\n') + '\n';
}

/** Raw ranked list for one query, e.g. raw/d1-rrf.tsv. */
export async function writeRankedList(dir: string, queryId: string, list: string, rows: RankedRow[]): Promise<string> {
  const file = path.join(dir, 'raw', `${sanitizeSegment(queryId)}-${sanitizeSegment(list)}.tsv`);
  await fs.outputFile(file, formatRankedTsv(rows));
  return file;
}

/** Row with the largest delta, or null when nothing improved. */
export function pickLargest<T>(rows: T[], delta: (row: T) => number): T | null {
  let best: T | null = null;
  let bestDelta = 0;
  for (const r of rows) {
    const d = delta(r);
    if (d > bestDelta) {
      best = r;
      bestDelta = d;
    }
  }
  return best;
}

export async function writeReport(dir: string, name: string, markdown: string): Promise<string> {
  const file = path.join(dir, name);
  await fs.outputFile(file, markdown);
  return file;
}
