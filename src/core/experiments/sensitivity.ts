import fs from 'fs-extra';
import path from 'path';
import {
  analyzeScale,
  candidateThreshold,
  checkCandidate,
  collectDistanceRecords,
  compareScales,
  DEFAULT_THRESHOLDS,
  REFERENCE_THRESHOLD,
  type CandidateCheck,
  type ScaleAnalysis,
  type ScaleStability,
} from '../analysis/sensitivity';
import { toDistanceCsv } from '../analysis/csv';
import { fmt, markdownTable, writeReport } from '../metrics/report';
import type { DistanceMetric, DistanceRecord } from '../types';
import { withSeededCorpus, type ExperimentDeps } from './context';

export const DEFAULT_SENSITIVITY_SCALES = [10, 100, 1000, 10000];

export interface SensitivityOptions {
  outDir: string;
  scales: number[];
  thresholds?: number[];
  referenceThreshold?: number;
}

export interface SensitivityResult {
  outDir: string;
  analyses: ScaleAnalysis[];
  stability: ScaleStability;
  /** Smallest-scale midpoint under the configured metric, replayed at every scale. */
  candidate: { metric: DistanceMetric; threshold: number | null; checks: CandidateCheck[] };
  csvFiles: string[];
  summaryFile: string;
}

/**
 * Exhaustive query-to-entry distances at each corpus size, then the
 * cross-scale comparison that shows whether a fixed threshold survives growth.
 */
export async function runSensitivity(deps: ExperimentDeps, options: SensitivityOptions): Promise<SensitivityResult> {
  const scales = (options.scales.length > 0 ? options.scales : DEFAULT_SENSITIVITY_SCALES).slice().sort((a, b) => a - b);
  const thresholds = options.thresholds ?? DEFAULT_THRESHOLDS;
  const referenceThreshold = options.referenceThreshold ?? REFERENCE_THRESHOLD;
  const metric = deps.config.retrieval.metric;
  const analyses: ScaleAnalysis[] = [];
  const recordsByScale: DistanceRecord[][] = [];
  const csvFiles: string[] = [];

  for (const scale of scales) {
    const scaleDir = path.join(options.outDir, `scale-${scale}`);
    const analysis = await withSeededCorpus(deps, { outDir: scaleDir, targetSize: scale, label: `sensitivity-${scale}` }, async ({ store, synthesis, queries, droppedQueries }) => {
      const log = deps.log.child({ experiment: 'sensitivity', scale });
      const { records, skippedQueries } = await log.span('scan_distances', { entries: synthesis.report.total }, () =>
        collectDistanceRecords({
          store,
          inference: deps.inference,
          clusterMap: synthesis.clusterMap,
          queries,
          metric,
          log,
        })
      );
      const csvFile = path.join(options.outDir, `distances-${scale}.csv`);
      await fs.outputFile(csvFile, toDistanceCsv(records));
      csvFiles.push(csvFile);
      if (skippedQueries > 0) log.warn('queries_skipped', { skipped: skippedQueries });
      recordsByScale.push(records);
      return analyzeScale({
        scale,
        entries: synthesis.report.total,
        records,
        queries,
        skippedQueries,
        droppedQueries,
        thresholds,
        referenceThreshold,
      });
    });
    analyses.push(analysis);
    await writeReport(scaleDir, 'analysis.md', renderScaleAnalysis(analysis));
  }

  const stability = compareScales(analyses);
  const threshold = candidateThreshold(analyses, metric);
  const checks =
    threshold === null ? [] : analyses.map((a, i) => checkCandidate(a.scale, a.entries, recordsByScale[i] ?? [], threshold));
  const candidate = { metric, threshold, checks };
  const summaryFile = await writeReport(
    options.outDir,
    'analysis.md',
    renderCrossScale(analyses, stability, referenceThreshold, candidate)
  );
  deps.log.info('sensitivity', {
    scales,
    relevant_mean_stable: stability.relevantMeanStable,
    min_irrelevant_non_increasing: stability.minIrrelevantNonIncreasing,
    threshold_instability: stability.thresholdInstability,
    candidate_threshold: threshold,
  });
  return { outDir: options.outDir, analyses, stability, candidate, csvFiles, summaryFile };
}

export function renderScaleAnalysis(a: ScaleAnalysis): string {
  const s = a.summary;
  return [
    `# Distance distribution at ${a.entries} entries (target ${a.scale})`,
    '',
    `Queries: ${a.queries}, skipped: ${a.skippedQueries}, dropped: ${a.droppedQueries.length}.`,
    '',
    markdownTable(
      ['class', 'count', 'min', 'mean', 'max'],
      [
        ['relevant', s.relevant.count, fmt(s.relevant.min), fmt(s.relevant.mean), fmt(s.relevant.max)],
        ['irrelevant', s.irrelevant.count, fmt(s.irrelevant.min), fmt(s.irrelevant.mean), fmt(s.irrelevant.max)],
      ]
    ),
    '## Separation by metric',
    '',
    markdownTable(
      ['metric', 'max relevant', 'min irrelevant', 'midpoint', 'separation'],
      (['cosine', 'l2'] as const).map((m) => {
        const sep = a.separation[m];
        return [m, fmt(sep.maxRelevant, 4), fmt(sep.minIrrelevant, 4), fmt(sep.midpoint, 4), sep.clean ? 'clean' : 'overlap'];
      })
    ),
    '## Negative queries: nearest entry',
    '',
    markdownTable(
      ['query', 'entry', 'distance'],
      a.negatives.map((n) => [n.queryId, n.entryId ?? '-', fmt(n.distance)])
    ),
    '## Threshold sweep',
    '',
    markdownTable(
      ['threshold', 'recall', 'precision', 'tp', 'fp'],
      a.sweep.map((p) => [p.threshold.toFixed(2), fmt(p.recall), fmt(p.precision), p.truePositives, p.falsePositives])
    ),
  ].join('\n');
}

function renderCrossScale(
  analyses: ScaleAnalysis[],
  stability: ScaleStability,
  referenceThreshold: number,
  candidate: SensitivityResult['candidate']
): string {
  const negativeIds = Array.from(new Set(analyses.flatMap((a) => a.negatives.map((n) => n.queryId))));
  const yesNo = (b: boolean) => (b ? 'yes' : 'no');
  return [
    '# Threshold sensitivity across corpus sizes',
    '',
    markdownTable(
      ['scale', 'entries', 'relevant mean', 'irrelevant min', `recall@${referenceThreshold.toFixed(2)}`, `fp@${referenceThreshold.toFixed(2)}`],
      analyses.map((a) => [a.scale, a.entries, fmt(a.summary.relevant.mean), fmt(a.summary.irrelevant.min), fmt(a.reference.recall), a.reference.falsePositives])
    ),
    '## Negative-query nearest distance',
    '',
    markdownTable(
      ['query', ...analyses.map((a) => String(a.scale)), 'non-increasing'],
      negativeIds.map((id) => [
        id,
        ...analyses.map((a) => fmt(a.negatives.find((n) => n.queryId === id)?.distance)),
        yesNo(stability.negativeNearestNonIncreasing[id] ?? true),
      ])
    ),
    `## Candidate threshold (${candidate.metric})`,
    '',
    candidate.threshold === null
      ? 'No corpus has both relevant and irrelevant pairs, so no midpoint could be derived.\n'
      : [
          `Midpoint of the smallest corpus with both classes: ${fmt(candidate.threshold, 4)}, applied unchanged at every scale.`,
          '',
          markdownTable(
            ['scale', 'entries', 'tp', 'fp', 'precision', 'recall'],
            candidate.checks.map((c) => [c.scale, c.entries, c.truePositives, c.falsePositives, fmt(c.precision), fmt(c.recall)])
          ),
        ].join('\n'),
    '## Findings',
    '',
    `- Relevant mean spread: ${fmt(stability.relevantMeanSpread)} (stable: ${yesNo(stability.relevantMeanStable)})`,
    `- Minimum irrelevant distance non-increasing with size: ${yesNo(stability.minIrrelevantNonIncreasing)}`,
    `- Fixed threshold unstable across scales: ${yesNo(stability.thresholdInstability)}`,
    '',
  ].join('\n');
}
