import path from 'path';
import { createKeywordChannel } from '../channels/keyword';
import { createVectorChannel } from '../channels/vector';
import {
  aggregateByType,
  mean,
  overlapCount,
  precisionAtK,
  recallAtK,
  scoreDistribution,
  type ScoreDistribution,
  type TypeAggregate,
} from '../metrics/precision';
import { fmt, markdownTable, pickLargest, signed, writeRankedList, writeReport } from '../metrics/report';
import { reciprocalRankFusion } from '../retrieval/fuser';
import { LogprobReranker } from '../retrieval/reranker';
import type { Query } from '../types';
import { QUERY_TYPES } from '../types';
import { withSeededCorpus, type ExperimentDeps } from './context';

export interface RerankOptions {
  outDir: string;
  /** Paraphrase multipliers; each builds its own corpus. */
  scales: number[];
  k: number;
  channelLimit: number;
  candidates: number;
  limit: number;
  threshold: number | null;
}

export interface RerankQueryRow {
  queryId: string;
  type: Query['type'];
  text: string;
  candidates: number;
  baseline: number;
  reranked: number;
  delta: number;
  baselineRecall: number;
  rerankedRecall: number;
  /** Entries shared by the RRF and reranked top-N. */
  overlap: number;
  scores: number[];
  failures: number;
}

export interface RerankScaleResult {
  scale: number;
  entries: number;
  rows: RerankQueryRow[];
  aggregates: Array<TypeAggregate & { baseline: number; reranked: number }>;
  meanBaseline: number;
  meanReranked: number;
  meanBaselineRecall: number;
  meanRerankedRecall: number;
  negatives: ScoreDistribution;
  droppedQueries: string[];
  failures: number;
  hero: RerankQueryRow | null;
  regression: RerankQueryRow | null;
  summaryFile: string;
}

export interface RerankResult {
  outDir: string;
  scales: RerankScaleResult[];
  summaryFile: string;
}

/**
 * RRF top-M, judged by the logprob reranker, cut to top-N; compared with
 * plain RRF top-N. Negative queries should see every score near zero.
 */
export async function runRerankComparison(deps: ExperimentDeps, options: RerankOptions): Promise<RerankResult> {
  const multipliers = options.scales.length > 0 ? options.scales : [1];
  const scales: RerankScaleResult[] = [];
  for (const scale of multipliers) {
    const outDir = multipliers.length > 1 ? path.join(options.outDir, `scale-${scale}`) : options.outDir;
    scales.push(await runRerankAtScale(deps, options, scale, outDir));
  }
  const summaryFile =
    scales.length > 1
      ? await writeReport(options.outDir, 'summary.md', renderRerankCrossScale(scales, options))
      : scales[0]?.summaryFile ?? path.join(options.outDir, 'summary.md');
  return { outDir: options.outDir, scales, summaryFile };
}

async function runRerankAtScale(deps: ExperimentDeps, options: RerankOptions, scale: number, outDir: string): Promise<RerankScaleResult> {
  return withSeededCorpus(deps, { outDir, multiplier: scale, label: `rerank-${scale}` }, async ({ store, synthesis, queries, droppedQueries }) => {
    const log = deps.log.child({ experiment: 'rerank', scale });
    const keyword = createKeywordChannel({ store, log });
    const vector = createVectorChannel({
      store,
      inference: deps.inference,
      metric: deps.config.retrieval.metric,
      threshold: options.threshold,
      log,
    });
    const reranker = new LogprobReranker(
      deps.inference,
      {
        modelName: deps.inference.rerankModel,
        candidates: options.candidates,
        limit: options.limit,
        topLogprobs: deps.config.retrieval.topLogprobs,
      },
      undefined,
      log
    );

    const rows: RerankQueryRow[] = [];
    try {
      for (const query of queries) {
        const relevant = (id: number) => synthesis.clusterMap.isRelevant(id, query);
        const totalRelevant = synthesis.clusterMap.relevantCount(query);
        const kw = await keyword(query.text, options.channelLimit);
        const vec = await vector(query.text, options.channelLimit);
        const pool = reciprocalRankFusion(
          [
            { channel: 'keyword', candidates: kw },
            { channel: 'vector', candidates: vec },
          ],
          { k: options.k, limit: options.candidates }
        );
        const baseline = pool.slice(0, options.limit);
        const outcome = await reranker.rerank(query.text, pool);
        const baselineIds = baseline.map((c) => c.entryId);
        const rerankedIds = outcome.results.map((c) => c.entryId);
        const pBase = precisionAtK(baselineIds, relevant, options.limit);
        const pRerank = precisionAtK(rerankedIds, relevant, options.limit);
        rows.push({
          queryId: query.id,
          type: query.type,
          text: query.text,
          candidates: pool.length,
          baseline: pBase,
          reranked: pRerank,
          delta: pRerank - pBase,
          baselineRecall: recallAtK(baselineIds, relevant, totalRelevant, options.limit),
          rerankedRecall: recallAtK(rerankedIds, relevant, totalRelevant, options.limit),
          overlap: overlapCount(baselineIds, rerankedIds),
          scores: outcome.judged.map((c) => c.rerankScore),
          failures: outcome.failures,
        });

        await writeRankedList(outDir, query.id, 'rrf', baseline.map((c) => ({ entryId: c.entryId, text: c.text, relevant: relevant(c.entryId), channel: c.channelLabel, score: c.fusedScore })));
        await writeRankedList(outDir, query.id, 'reranked', outcome.results.map((c) => ({ entryId: c.entryId, text: c.text, relevant: relevant(c.entryId), channel: c.channels.join('+'), score: c.rerankScore })));
      }
    } finally {
      reranker.dispose();
    }

    const positive = rows.filter((r) => r.type !== 'negative');
    const baselineByType = aggregateByType(rows, (r) => r.baseline);
    const aggregates = aggregateByType(rows, (r) => r.reranked).map((agg) => ({
      ...agg,
      reranked: agg.mean,
      baseline: baselineByType.find((b) => b.type === agg.type)?.mean ?? 0,
    }));
    const result = {
      scale,
      entries: synthesis.report.total,
      rows,
      aggregates,
      meanBaseline: mean(positive.map((r) => r.baseline)),
      meanReranked: mean(positive.map((r) => r.reranked)),
      meanBaselineRecall: mean(positive.map((r) => r.baselineRecall)),
      meanRerankedRecall: mean(positive.map((r) => r.rerankedRecall)),
      negatives: scoreDistribution(rows.filter((r) => r.type === 'negative').flatMap((r) => r.scores)),
      failures: rows.reduce((s, r) => s + r.failures, 0),
      droppedQueries,
      hero: pickLargest(rows, (r) => r.delta),
      regression: pickLargest(rows, (r) => -r.delta),
    };
    const summaryFile = await writeReport(outDir, 'summary.md', renderRerankSummary(result, options));
    log.info('rerank_comparison', {
      entries: result.entries,
      baseline: result.meanBaseline,
      reranked: result.meanReranked,
      negative_max: result.negatives.max,
      failures: result.failures,
    });
    return { ...result, summaryFile };
  });
}

function renderRerankSummary(r: Omit<RerankScaleResult, 'summaryFile'>, options: RerankOptions): string {
  const n = options.limit;
  const out: string[] = [
    `# Reranking at scale ${r.scale}`,
    '',
    `Corpus: ${r.entries} entries. RRF top ${options.candidates} judged, top ${n} kept. Judge failures: ${r.failures}.`,
    '',
  ];
  if (r.droppedQueries.length > 0) out.push(`Dropped (cluster lost to skipped batches): ${r.droppedQueries.join(', ')}.`, '');
  for (const type of QUERY_TYPES) {
    const subset = r.rows.filter((row) => row.type === type);
    if (subset.length === 0) continue;
    out.push(`## ${type} queries`, '');
    if (type === 'negative') {
      out.push(
        markdownTable(
          ['query', 'candidates', 'mean score', 'max score', '> 0.5'],
          subset.map((row) => {
            const d = scoreDistribution(row.scores);
            return [row.queryId, row.candidates, fmt(d.mean), fmt(d.max), d.above];
          })
        )
      );
      continue;
    }
    out.push(
      markdownTable(
        ['query', `rrf P@${n}`, `reranked P@${n}`, 'delta', `rrf R@${n}`, `reranked R@${n}`, 'shared'],
        subset.map((row) => [
          row.queryId,
          fmt(row.baseline, 2),
          fmt(row.reranked, 2),
          signed(row.delta, 2),
          fmt(row.baselineRecall, 2),
          fmt(row.rerankedRecall, 2),
          row.overlap,
        ])
      )
    );
  }
  out.push('## Aggregate', '');
  out.push(
    markdownTable(
      ['type', 'queries', 'rrf', 'reranked', 'delta'],
      r.aggregates
        .filter((a) => a.type !== 'negative')
        .map((a) => [a.type, a.queries, fmt(a.baseline), fmt(a.reranked), signed(a.reranked - a.baseline)])
    )
  );
  out.push(`Mean recall@${n}: rrf ${fmt(r.meanBaselineRecall)}, reranked ${fmt(r.meanRerankedRecall)}.`, '');
  out.push(
    `Negative-query scores: ${r.negatives.count} candidates, mean ${fmt(r.negatives.mean)}, max ${fmt(r.negatives.max)}, ${r.negatives.above} above 0.5.`,
    ''
  );
  if (r.hero) {
    out.push('## Largest improvement', '', `${r.hero.queryId}: "${r.hero.text}" ${fmt(r.hero.baseline, 2)} -> ${fmt(r.hero.reranked, 2)}`, '');
  }
  if (r.regression) {
    out.push('## Largest regression', '', `${r.regression.queryId}: "${r.regression.text}" ${fmt(r.regression.baseline, 2)} -> ${fmt(r.regression.reranked, 2)}`, '');
  }
  return out.join('\n');
}

function renderRerankCrossScale(scales: RerankScaleResult[], options: RerankOptions): string {
  return [
    '# Reranking across scales',
    '',
    markdownTable(
      ['scale', 'entries', `rrf P@${options.limit}`, `reranked P@${options.limit}`, 'delta', 'negative max', 'failures'],
      scales.map((s) => [s.scale, s.entries, fmt(s.meanBaseline), fmt(s.meanReranked), signed(s.meanReranked - s.meanBaseline), fmt(s.negatives.max), s.failures])
    ),
  ].join('\n');
}
