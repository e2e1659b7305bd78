import path from 'path';
import { createKeywordChannel } from '../channels/keyword';
import { createVectorChannel } from '../channels/vector';
import { aggregateByType, mean, precisionAtK, recallAtK, type TypeAggregate } from '../metrics/precision';
import { fmt, markdownTable, pickLargest, signed, writeRankedList, writeReport } from '../metrics/report';
import { reciprocalRankFusion, unionMerge } from '../retrieval/fuser';
import type { Query } from '../types';
import { QUERY_TYPES } from '../types';
import { withSeededCorpus, type ExperimentDeps } from './context';

export interface RrfOptions {
  outDir: string;
  /** Corpus sizes to test; an empty list runs once on the bundled corpus. */
  sizes: number[];
  k: number;
  limit: number;
  channelLimit: number;
  threshold: number | null;
}

export interface RrfQueryRow {
  queryId: string;
  type: Query['type'];
  text: string;
  keywordReturned: number;
  vectorReturned: number;
  union: number;
  rrf: number;
  delta: number;
  unionRecall: number;
  rrfRecall: number;
  /** Fused results found by both channels. */
  dualChannel: number;
}

export interface RrfScaleResult {
  size: number | null;
  entries: number;
  rows: RrfQueryRow[];
  aggregates: Array<TypeAggregate & { union: number; rrf: number }>;
  meanUnion: number;
  meanRrf: number;
  /** Over non-negative queries; negatives have nothing to recall. */
  meanUnionRecall: number;
  meanRrfRecall: number;
  meanDualChannel: number;
  droppedQueries: string[];
  hero: RrfQueryRow | null;
  summaryFile: string;
}

export interface RrfResult {
  outDir: string;
  scales: RrfScaleResult[];
  summaryFile: string;
}

/** Precision of RRF top-N against the newest-first union of the same two lists. */
export async function runRrfComparison(deps: ExperimentDeps, options: RrfOptions): Promise<RrfResult> {
  const sizes: Array<number | undefined> = options.sizes.length > 0 ? options.sizes : [undefined];
  const scales: RrfScaleResult[] = [];
  for (const size of sizes) {
    const outDir = size === undefined ? options.outDir : path.join(options.outDir, `size-${size}`);
    scales.push(await runRrfAtSize(deps, options, size, outDir));
  }
  const summaryFile =
    scales.length > 1
      ? await writeReport(options.outDir, 'summary.md', renderRrfCrossScale(scales))
      : scales[0]?.summaryFile ?? path.join(options.outDir, 'summary.md');
  return { outDir: options.outDir, scales, summaryFile };
}

async function runRrfAtSize(deps: ExperimentDeps, options: RrfOptions, size: number | undefined, outDir: string): Promise<RrfScaleResult> {
  return withSeededCorpus(deps, { outDir, targetSize: size, label: `rrf-${size ?? 'base'}` }, async ({ store, synthesis, queries, droppedQueries }) => {
    const log = deps.log.child({ experiment: 'rrf', size: size ?? null });
    const keyword = createKeywordChannel({ store, log });
    const vector = createVectorChannel({
      store,
      inference: deps.inference,
      metric: deps.config.retrieval.metric,
      threshold: options.threshold,
      log,
    });

    const rows: RrfQueryRow[] = [];
    for (const query of queries) {
      const relevant = (id: number) => synthesis.clusterMap.isRelevant(id, query);
      const totalRelevant = synthesis.clusterMap.relevantCount(query);
      const kw = await keyword(query.text, options.channelLimit);
      const vec = await vector(query.text, options.channelLimit);
      const lists = [
        { channel: 'keyword' as const, candidates: kw },
        { channel: 'vector' as const, candidates: vec },
      ];
      const fused = reciprocalRankFusion(lists, { k: options.k, limit: options.limit });
      const union = unionMerge(lists, options.limit);
      const pUnion = precisionAtK(union.map((c) => c.entryId), relevant, options.limit);
      const pRrf = precisionAtK(fused.map((c) => c.entryId), relevant, options.limit);
      const rUnion = recallAtK(union.map((c) => c.entryId), relevant, totalRelevant, options.limit);
      const rRrf = recallAtK(fused.map((c) => c.entryId), relevant, totalRelevant, options.limit);
      rows.push({
        queryId: query.id,
        type: query.type,
        text: query.text,
        keywordReturned: kw.length,
        vectorReturned: vec.length,
        union: pUnion,
        rrf: pRrf,
        delta: pRrf - pUnion,
        unionRecall: rUnion,
        rrfRecall: rRrf,
        dualChannel: fused.filter((c) => c.channels.length > 1).length,
      });

      await writeRankedList(outDir, query.id, 'keyword', kw.map((c) => ({ entryId: c.entryId, text: c.text, relevant: relevant(c.entryId), channel: 'keyword', score: c.keywordScore })));
      await writeRankedList(outDir, query.id, 'vector', vec.map((c) => ({ entryId: c.entryId, text: c.text, relevant: relevant(c.entryId), channel: 'vector', score: c.distance })));
      await writeRankedList(outDir, query.id, 'union', union.map((c) => ({ entryId: c.entryId, text: c.text, relevant: relevant(c.entryId), channel: c.channels.join('+') })));
      await writeRankedList(outDir, query.id, 'rrf', fused.map((c) => ({ entryId: c.entryId, text: c.text, relevant: relevant(c.entryId), channel: c.channelLabel, score: c.fusedScore })));
    }

    const positive = rows.filter((r) => r.type !== 'negative');
    const unionByType = aggregateByType(rows, (r) => r.union);
    const aggregates = aggregateByType(rows, (r) => r.rrf).map((agg) => ({
      ...agg,
      rrf: agg.mean,
      union: unionByType.find((u) => u.type === agg.type)?.mean ?? 0,
    }));
    const result = {
      size: size ?? null,
      entries: synthesis.report.total,
      rows,
      aggregates,
      meanUnion: mean(rows.map((r) => r.union)),
      meanRrf: mean(rows.map((r) => r.rrf)),
      meanUnionRecall: mean(positive.map((r) => r.unionRecall)),
      meanRrfRecall: mean(positive.map((r) => r.rrfRecall)),
      meanDualChannel: mean(rows.map((r) => r.dualChannel)),
      droppedQueries,
      hero: pickLargest(rows, (r) => r.delta),
    };
    const summaryFile = await writeReport(outDir, 'summary.md', renderRrfSummary(result, options));
    log.info('rrf_comparison', { entries: result.entries, union: result.meanUnion, rrf: result.meanRrf, dual: result.meanDualChannel });
    return { ...result, summaryFile };
  });
}

function renderRrfSummary(r: Omit<RrfScaleResult, 'summaryFile'>, options: RrfOptions): string {
  const out: string[] = [
    `# RRF vs union${r.size === null ? '' : ` at ${r.size} entries`}`,
    '',
    `Corpus: ${r.entries} entries. Channels return top ${options.channelLimit}; fusion k=${options.k}; precision@${options.limit}.`,
    '',
  ];
  if (r.droppedQueries.length > 0) out.push(`Dropped (cluster lost to skipped batches): ${r.droppedQueries.join(', ')}.`, '');
  for (const type of QUERY_TYPES) {
    const subset = r.rows.filter((row) => row.type === type);
    if (subset.length === 0) continue;
    out.push(`## ${type} queries`, '');
    out.push(
      markdownTable(
        ['query', 'kw', 'vec', `union P@${options.limit}`, `rrf P@${options.limit}`, 'delta', `union R@${options.limit}`, `rrf R@${options.limit}`, 'both channels'],
        subset.map((row) => [
          row.queryId,
          row.keywordReturned,
          row.vectorReturned,
          fmt(row.union, 2),
          fmt(row.rrf, 2),
          signed(row.delta, 2),
          fmt(row.unionRecall, 2),
          fmt(row.rrfRecall, 2),
          row.dualChannel,
        ])
      )
    );
  }
  out.push('## Aggregate', '');
  out.push(
    markdownTable(
      ['type', 'queries', 'union', 'rrf', 'delta'],
      [
        ...r.aggregates.map((a) => [a.type, a.queries, fmt(a.union), fmt(a.rrf), signed(a.rrf - a.union)]),
        ['all', r.rows.length, fmt(r.meanUnion), fmt(r.meanRrf), signed(r.meanRrf - r.meanUnion)],
      ]
    )
  );
  out.push(`Mean recall@${options.limit} over non-negative queries: union ${fmt(r.meanUnionRecall)}, rrf ${fmt(r.meanRrfRecall)}.`, '');
  out.push(`Mean fused results found by both channels: ${fmt(r.meanDualChannel, 2)}`, '');
  if (r.hero) {
    out.push('## Largest improvement', '');
    out.push(`${r.hero.queryId} (${r.hero.type}): "${r.hero.text}" went from ${fmt(r.hero.union, 2)} to ${fmt(r.hero.rrf, 2)}.`, '');
  }
  return out.join('\n');
}

function renderRrfCrossScale(scales: RrfScaleResult[]): string {
  return [
    '# RRF vs union across corpus sizes',
    '',
    markdownTable(
      ['size', 'entries', 'union', 'rrf', 'delta', 'union recall', 'rrf recall', 'both channels'],
      scales.map((s) => [
        s.size ?? 'base',
        s.entries,
        fmt(s.meanUnion),
        fmt(s.meanRrf),
        signed(s.meanRrf - s.meanUnion),
        fmt(s.meanUnionRecall),
        fmt(s.meanRrfRecall),
        fmt(s.meanDualChannel, 2),
      ])
    ),
  ].join('\n');
}
