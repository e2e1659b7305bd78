import type { DistanceMetric, Entry, Relation } from '../types';
import { distance } from './distance';
import type { EntryStore, KeywordRow, ScanRow, VectorRow } from './types';

function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9_]+/g)
    .filter(Boolean);
}

// crude suffix stripping so "colonies"/"colony" and "swarm"/"swarms" meet
function stem(token: string): string {
  if (token.length > 4 && token.endsWith('ies')) return token.slice(0, -3) + 'y';
  if (token.length > 4 && token.endsWith('ing')) return token.slice(0, -3);
  if (token.length > 3 && token.endsWith('ed')) return token.slice(0, -2);
  if (token.length > 3 && token.endsWith('s') && !token.endsWith('ss')) return token.slice(0, -1);
  return token;
}

/**
 * In-process store with the same query surface as the LanceDB store.
 * Keyword score is the number of query terms present; vectors are scanned
 * exhaustively.
 */
export class MemoryEntryStore implements EntryStore {
  readonly kind = 'memory';
  private entries: Entry[] = [];
  private stems = new Map<number, Set<string>>();
  private relations: Relation[] = [];

  async insertEntries(entries: Entry[]): Promise<void> {
    for (const e of entries) {
      this.entries.push({ ...e, vector: e.vector.slice() });
      this.stems.set(e.id, new Set(tokenize(e.text).map(stem)));
    }
  }

  async insertRelations(relations: Relation[]): Promise<void> {
    this.relations.push(...relations.map((r) => ({ ...r })));
  }

  async count(): Promise<number> {
    return this.entries.length;
  }

  async keywordSearch(terms: string[], limit: number): Promise<KeywordRow[]> {
    const wanted = Array.from(new Set(terms.map((t) => stem(t.toLowerCase()))));
    if (wanted.length === 0) return [];
    const rows: KeywordRow[] = [];
    for (const e of this.entries) {
      const have = this.stems.get(e.id);
      if (!have) continue;
      let score = 0;
      for (const w of wanted) if (have.has(w)) score += 1;
      if (score > 0) rows.push({ entryId: e.id, text: e.text, score });
    }
    rows.sort((a, b) => b.score - a.score || b.entryId - a.entryId);
    return rows.slice(0, limit);
  }

  async vectorSearch(vector: number[], limit: number, metric: DistanceMetric): Promise<VectorRow[]> {
    const rows = this.entries.map((e) => ({ entryId: e.id, text: e.text, distance: distance(metric, vector, e.vector) }));
    rows.sort((a, b) => a.distance - b.distance || a.entryId - b.entryId);
    return rows.slice(0, limit);
  }

  async scanDistances(vector: number[]): Promise<ScanRow[]> {
    return this.entries
      .map((e) => ({ entryId: e.id, cosine: distance('cosine', vector, e.vector), l2: distance('l2', vector, e.vector) }))
      .sort((a, b) => a.entryId - b.entryId);
  }

  async matchRelations(terms: string[], limit: number): Promise<Relation[]> {
    const needles = terms.map((t) => t.toLowerCase()).filter(Boolean);
    if (needles.length === 0) return [];
    const out: Relation[] = [];
    for (const r of this.relations) {
      const subject = r.subject.toLowerCase();
      const object = r.object.toLowerCase();
      if (needles.some((n) => subject.includes(n) || object.includes(n))) out.push({ ...r });
      if (out.length >= limit) break;
    }
    return out;
  }

  async close(): Promise<void> {
    this.entries = [];
    this.stems.clear();
    this.relations = [];
  }
}
