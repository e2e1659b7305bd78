import { SetupError } from '../../core/errors';
import { runRerankComparison } from '../../core/experiments/rerank';
import { createLogger } from '../../core/log';
import { commandOutDir, guardSetup, prepareExperiment } from '../helpers';
import type { RerankInput } from '../schemas/rerankSchemas';
import type { CLIError, CLIResult } from '../types';
import { success } from '../types';

export async function handleRerank(input: RerankInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'rerank' });
  return guardSetup(async () => {
    const deps = await prepareExperiment(input, log, input.threshold);
    const outDir = commandOutDir(deps.config, 'rerank');
    const retrieval = deps.config.retrieval;
    const candidates = input.candidates ?? retrieval.rerankCandidates;
    const limit = input.limit ?? retrieval.rerankLimit;
    if (candidates < limit) {
      throw new SetupError('config_invalid', `Rerank candidates (${candidates}) must be >= limit (${limit})`, { candidates, limit });
    }
    const result = await runRerankComparison(deps, {
      outDir,
      scales: input.scales ?? [input.scale],
      k: input.k ?? retrieval.rrfK,
      channelLimit: input.channelLimit ?? retrieval.channelLimit,
      candidates,
      limit,
      threshold: retrieval.vectorThreshold,
    });
    return success({
      outDir,
      summary: result.summaryFile,
      scales: result.scales.map((s) => ({
        scale: s.scale,
        entries: s.entries,
        rrf: s.meanBaseline,
        reranked: s.meanReranked,
        recall: { rrf: s.meanBaselineRecall, reranked: s.meanRerankedRecall },
        droppedQueries: s.droppedQueries,
        negatives: s.negatives,
        failures: s.failures,
        hero: s.hero ? { query: s.hero.queryId, rrf: s.hero.baseline, reranked: s.hero.reranked } : null,
        regression: s.regression ? { query: s.regression.queryId, rrf: s.regression.baseline, reranked: s.regression.reranked } : null,
      })),
    });
  });
}
