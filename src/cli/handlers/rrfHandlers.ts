import { runRrfComparison } from '../../core/experiments/rrf';
import { createLogger } from '../../core/log';
import { commandOutDir, guardSetup, prepareExperiment } from '../helpers';
import type { RrfInput } from '../schemas/rrfSchemas';
import type { CLIError, CLIResult } from '../types';
import { success } from '../types';

export async function handleRrf(input: RrfInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'rrf' });
  return guardSetup(async () => {
    const deps = await prepareExperiment(input, log, input.threshold);
    const outDir = commandOutDir(deps.config, 'rrf');
    const sizes = input.sizes ?? (input.size !== undefined ? [input.size] : []);
    const retrieval = deps.config.retrieval;
    const result = await runRrfComparison(deps, {
      outDir,
      sizes,
      k: input.k ?? retrieval.rrfK,
      limit: input.limit ?? retrieval.fusedLimit,
      channelLimit: input.channelLimit ?? retrieval.channelLimit,
      threshold: retrieval.vectorThreshold,
    });
    return success({
      outDir,
      summary: result.summaryFile,
      scales: result.scales.map((s) => ({
        size: s.size,
        entries: s.entries,
        union: s.meanUnion,
        rrf: s.meanRrf,
        dualChannel: s.meanDualChannel,
        recall: { union: s.meanUnionRecall, rrf: s.meanRrfRecall },
        droppedQueries: s.droppedQueries,
        byType: s.aggregates.map((a) => ({ type: a.type, queries: a.queries, union: a.union, rrf: a.rrf })),
        hero: s.hero ? { query: s.hero.queryId, union: s.hero.union, rrf: s.hero.rrf } : null,
      })),
    });
  });
}
