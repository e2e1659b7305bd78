import path from 'path';
import { createKeywordChannel } from '../channels/keyword';
import { createStructuredChannel } from '../channels/structured';
import { createVectorChannel } from '../channels/vector';
import { extractRelations } from '../corpus/relations';
import { markdownTable, writeRankedList, writeReport } from '../metrics/report';
import { unionMerge } from '../retrieval/fuser';
import type { Query } from '../types';
import { withSeededCorpus, type ExperimentDeps } from './context';

export interface ChannelIsolationOptions {
  outDir: string;
  targetSize?: number;
  limit: number;
  threshold: number | null;
}

type IsolatedChannel = 'keyword' | 'vector' | 'structured' | 'union';

const ISOLATED: IsolatedChannel[] = ['keyword', 'vector', 'structured', 'union'];

export interface ChannelQueryRow {
  queryId: string;
  type: Query['type'];
  returned: Record<IsolatedChannel, number>;
  hit: Record<IsolatedChannel, boolean>;
}

export interface ChannelIsolationResult {
  outDir: string;
  entries: number;
  relations: number;
  relationFailures: number;
  /** Non-negative queries with at least one relevant result, per channel. */
  hits: Record<IsolatedChannel, number>;
  /** Negative queries for which the channel returned anything. */
  falseHits: Record<IsolatedChannel, number>;
  /** Queries only this channel answered. */
  exclusive: Record<'keyword' | 'vector' | 'structured', number>;
  rows: ChannelQueryRow[];
  droppedQueries: string[];
  summaryFile: string;
}

function emptyCounts(): Record<IsolatedChannel, number> {
  return { keyword: 0, vector: 0, structured: 0, union: 0 };
}

/**
 * Runs every query through each channel on its own, so the contribution of
 * keyword, vector and relation lookup can be told apart.
 */
export async function runChannelIsolation(deps: ExperimentDeps, options: ChannelIsolationOptions): Promise<ChannelIsolationResult> {
  return withSeededCorpus(deps, { ...options, label: 'channels' }, async ({ store, synthesis, queries, droppedQueries }) => {
    const log = deps.log.child({ experiment: 'channels' });
    const { relations, failed } = await log.span('extract_relations', { entries: synthesis.entries.length }, () =>
      extractRelations(deps.inference, synthesis.entries, log)
    );
    await store.insertRelations(relations);

    const keyword = createKeywordChannel({ store, log });
    const vector = createVectorChannel({
      store,
      inference: deps.inference,
      metric: deps.config.retrieval.metric,
      threshold: options.threshold,
      log,
    });
    const structured = createStructuredChannel({ store, log });
    const { clusterMap } = synthesis;

    const rows: ChannelQueryRow[] = [];
    for (const query of queries) {
      const relevant = (id: number) => clusterMap.isRelevant(id, query);
      const kw = await keyword(query.text, options.limit);
      const vec = await vector(query.text, options.limit);
      const rel = await structured(query.text, options.limit);
      const union = unionMerge(
        [
          { channel: 'keyword', candidates: kw },
          { channel: 'vector', candidates: vec },
        ],
        options.limit
      );

      const ids: Record<IsolatedChannel, number[]> = {
        keyword: kw.map((c) => c.entryId),
        vector: vec.map((c) => c.entryId),
        structured: rel.map((h) => h.relation.entryId),
        union: union.map((c) => c.entryId),
      };
      const returned = emptyCounts();
      const hit: Record<IsolatedChannel, boolean> = { keyword: false, vector: false, structured: false, union: false };
      for (const ch of ISOLATED) {
        returned[ch] = ids[ch].length;
        hit[ch] = ids[ch].some(relevant);
      }
      rows.push({ queryId: query.id, type: query.type, returned, hit });

      await writeRankedList(options.outDir, query.id, 'keyword', kw.map((c) => ({ entryId: c.entryId, text: c.text, relevant: relevant(c.entryId), channel: 'keyword', score: c.keywordScore })));
      await writeRankedList(options.outDir, query.id, 'vector', vec.map((c) => ({ entryId: c.entryId, text: c.text, relevant: relevant(c.entryId), channel: 'vector', score: c.distance })));
      await writeRankedList(options.outDir, query.id, 'structured', rel.map((h) => ({
        entryId: h.relation.entryId,
        text: `${h.relation.subject} | ${h.relation.predicate} | ${h.relation.object}`,
        relevant: relevant(h.relation.entryId),
        channel: `structured:${h.matched}`,
      })));
      await writeRankedList(options.outDir, query.id, 'union', union.map((c) => ({ entryId: c.entryId, text: c.text, relevant: relevant(c.entryId), channel: c.channels.join('+') })));
    }

    const hits = emptyCounts();
    const falseHits = emptyCounts();
    const exclusive = { keyword: 0, vector: 0, structured: 0 };
    for (const row of rows) {
      for (const ch of ISOLATED) {
        if (row.type === 'negative') {
          if (row.returned[ch] > 0) falseHits[ch] += 1;
        } else if (row.hit[ch]) {
          hits[ch] += 1;
        }
      }
      if (row.type === 'negative') continue;
      const answered = (['keyword', 'vector', 'structured'] as const).filter((ch) => row.hit[ch]);
      const only = answered.length === 1 ? answered[0] : undefined;
      if (only) exclusive[only] += 1;
    }

    const summaryFile = await writeReport(
      options.outDir,
      'summary.md',
      renderChannelSummary({ rows, hits, falseHits, exclusive, entries: synthesis.report.total, relations: relations.length })
    );
    log.info('channel_isolation', { entries: synthesis.report.total, relations: relations.length, hits, falseHits, exclusive });
    return {
      outDir: options.outDir,
      entries: synthesis.report.total,
      relations: relations.length,
      relationFailures: failed,
      hits,
      falseHits,
      exclusive,
      rows,
      droppedQueries,
      summaryFile: path.resolve(summaryFile),
    };
  });
}

function renderChannelSummary(r: {
  rows: ChannelQueryRow[];
  hits: Record<IsolatedChannel, number>;
  falseHits: Record<IsolatedChannel, number>;
  exclusive: Record<'keyword' | 'vector' | 'structured', number>;
  entries: number;
  relations: number;
}): string {
  const mark = (row: ChannelQueryRow, ch: IsolatedChannel) => `${row.hit[ch] ? 'HIT' : '-'} (${row.returned[ch]})`;
  const answerable = r.rows.filter((row) => row.type !== 'negative').length;
  const negatives = r.rows.length - answerable;
  return [
    '# Channel isolation',
    '',
    `Corpus: ${r.entries} entries, ${r.relations} relations.`,
    '',
    markdownTable(
      ['query', 'type', ...ISOLATED],
      r.rows.map((row) => [row.queryId, row.type, ...ISOLATED.map((ch) => mark(row, ch))])
    ),
    '## Hits',
    '',
    markdownTable(
      ['channel', `hits (of ${answerable})`, `negatives answered (of ${negatives})`],
      ISOLATED.map((ch) => [ch, r.hits[ch], r.falseHits[ch]])
    ),
    '## Channel-exclusive hits',
    '',
    markdownTable(['channel', 'exclusive'], (['keyword', 'vector', 'structured'] as const).map((ch) => [ch, r.exclusive[ch]])),
  ].join('\n');
}
