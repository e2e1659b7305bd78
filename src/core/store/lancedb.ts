import * as lancedb from '@lancedb/lancedb';
import { Field, FixedSizeList, Float32, Int32, Schema, Utf8 } from 'apache-arrow';
import fs from 'fs-extra';
import { z } from 'zod';
import type { DistanceMetric, Entry, Relation } from '../types';
import { createLogger, type Logger } from '../log';
import type { EntryStore, KeywordRow, ScanRow, VectorRow } from './types';

const ENTRIES_TABLE = 'entries';
const RELATIONS_TABLE = 'relations';

function entriesSchema(dim: number): Schema {
  return new Schema([
    new Field('id', new Int32(), false),
    new Field('text', new Utf8(), false),
    new Field('cluster_id', new Int32(), false),
    new Field('vector', new FixedSizeList(dim, new Field('item', new Float32(), true)), false),
  ]);
}

function relationsSchema(): Schema {
  return new Schema([
    new Field('subject', new Utf8(), false),
    new Field('predicate', new Utf8(), false),
    new Field('object', new Utf8(), false),
    new Field('entry_id', new Int32(), false),
  ]);
}

const KeywordRowSchema = z.object({ id: z.number(), text: z.string(), _score: z.number() });
const VectorRowSchema = z.object({ id: z.number(), text: z.string(), _distance: z.number() });
const RelationRowSchema = z.object({ subject: z.string(), predicate: z.string(), object: z.string(), entry_id: z.number() });

function parseRows<T>(rows: unknown[], schema: z.ZodType<T>, log: Logger, table: string): T[] {
  const out: T[] = [];
  let dropped = 0;
  for (const row of rows) {
    const parsed = schema.safeParse(row);
    if (parsed.success) out.push(parsed.data);
    else dropped += 1;
  }
  if (dropped > 0) log.warn('rows_dropped', { table, dropped });
  return out;
}

function sqlString(s: string): string {
  return s.replace(/'/g, "''");
}

const LIKE_ESCAPE = '!';

/** Substring pattern with LIKE wildcards taken literally, escaped with LIKE_ESCAPE. */
export function likeContains(s: string): string {
  return `%${s.replace(/([!%_])/g, `${LIKE_ESCAPE}$1`)}%`;
}

// extra rows fetched so equal scores at the cut-off resolve newest-first
const TIE_SLACK = 20;

export interface LanceEntryStoreOptions {
  dbDir: string;
  dim: number;
  log?: Logger;
}

/**
 * Embedded LanceDB store: flat vector scan, native full-text index on
 * entry text, and a relation table queried with SQL LIKE.
 */
export class LanceEntryStore implements EntryStore {
  readonly kind = 'lancedb';
  private db: lancedb.Connection;
  private entries: lancedb.Table;
  private relations: lancedb.Table;
  private ftsDirty = false;
  private log: Logger;

  private constructor(db: lancedb.Connection, entries: lancedb.Table, relations: lancedb.Table, log: Logger) {
    this.db = db;
    this.entries = entries;
    this.relations = relations;
    this.log = log;
  }

  static async open(options: LanceEntryStoreOptions): Promise<LanceEntryStore> {
    await fs.ensureDir(options.dbDir);
    const db = await lancedb.connect(options.dbDir);
    const names = await db.tableNames();
    for (const name of [ENTRIES_TABLE, RELATIONS_TABLE]) {
      if (names.includes(name)) await db.dropTable(name);
    }
    const entries = await db.createEmptyTable(ENTRIES_TABLE, entriesSchema(options.dim));
    const relations = await db.createEmptyTable(RELATIONS_TABLE, relationsSchema());
    const log = options.log ?? createLogger({ component: 'store', kind: 'lancedb' });
    return new LanceEntryStore(db, entries, relations, log);
  }

  async insertEntries(entries: Entry[]): Promise<void> {
    if (entries.length === 0) return;
    await this.entries.add(
      entries.map((e) => ({ id: e.id, text: e.text, cluster_id: e.clusterId, vector: e.vector }))
    );
    this.ftsDirty = true;
  }

  async insertRelations(relations: Relation[]): Promise<void> {
    if (relations.length === 0) return;
    await this.relations.add(
      relations.map((r) => ({ subject: r.subject, predicate: r.predicate, object: r.object, entry_id: r.entryId }))
    );
  }

  async count(): Promise<number> {
    return this.entries.countRows();
  }

  async keywordSearch(terms: string[], limit: number): Promise<KeywordRow[]> {
    if (terms.length === 0) return [];
    if ((await this.count()) === 0) return [];
    await this.ensureFtsIndex();
    // a plain match query ORs its tokens
    const rows: unknown[] = await this.entries
      .query()
      .fullTextSearch(terms.join(' '), { columns: 'text' })
      .select(['id', 'text'])
      .limit(limit + TIE_SLACK)
      .toArray();
    return parseRows(rows, KeywordRowSchema, this.log, ENTRIES_TABLE)
      .map((r) => ({ entryId: r.id, text: r.text, score: r._score }))
      .sort((a, b) => b.score - a.score || b.entryId - a.entryId)
      .slice(0, limit);
  }

  async vectorSearch(vector: number[], limit: number, metric: DistanceMetric): Promise<VectorRow[]> {
    const rows: unknown[] = await this.entries
      .vectorSearch(vector)
      .distanceType(metric)
      .select(['id', 'text'])
      .limit(limit)
      .toArray();
    return parseRows(rows, VectorRowSchema, this.log, ENTRIES_TABLE)
      .map((r) => ({ entryId: r.id, text: r.text, distance: r._distance }))
      .sort((a, b) => a.distance - b.distance || a.entryId - b.entryId);
  }

  async scanDistances(vector: number[]): Promise<ScanRow[]> {
    const total = await this.count();
    if (total === 0) return [];
    const cosine = await this.vectorSearch(vector, total, 'cosine');
    const l2 = new Map((await this.vectorSearch(vector, total, 'l2')).map((r) => [r.entryId, r.distance]));
    const rows: ScanRow[] = [];
    for (const r of cosine) {
      const l2Distance = l2.get(r.entryId);
      if (l2Distance === undefined) continue;
      rows.push({ entryId: r.entryId, cosine: r.distance, l2: l2Distance });
    }
    return rows.sort((a, b) => a.entryId - b.entryId);
  }

  async matchRelations(terms: string[], limit: number): Promise<Relation[]> {
    const needles = terms.map((t) => sqlString(likeContains(t.toLowerCase()))).filter((n) => n !== '%%');
    if (needles.length === 0) return [];
    const predicate = needles
      .map((n) => `lower(subject) LIKE '${n}' ESCAPE '${LIKE_ESCAPE}' OR lower(object) LIKE '${n}' ESCAPE '${LIKE_ESCAPE}'`)
      .join(' OR ');
    const rows: unknown[] = await this.relations.query().where(predicate).limit(limit).toArray();
    return parseRows(rows, RelationRowSchema, this.log, RELATIONS_TABLE).map((r) => ({
      subject: r.subject,
      predicate: r.predicate,
      object: r.object,
      entryId: r.entry_id,
    }));
  }

  async close(): Promise<void> {
    this.entries.close();
    this.relations.close();
    this.db.close();
  }

  private async ensureFtsIndex(): Promise<void> {
    if (!this.ftsDirty) return;
    await this.entries.createIndex('text', {
      config: lancedb.Index.fts({ withPosition: false, stem: true, lowercase: true }),
      replace: true,
    });
    this.ftsDirty = false;
  }
}
