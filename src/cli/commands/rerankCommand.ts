import { Command } from 'commander';
import { executeHandler } from '../types';
import { withRunOptions } from './commonOptions';

export const rerankCommand = withRunOptions(
  new Command('rerank')
    .description('Rerank RRF candidates with a yes/no logprob judge and compare precision')
    .option('-s, --scale <m>', 'Paraphrase multiplier', '1')
    .option('--scales <list>', 'Comma-separated paraphrase multipliers, e.g. 1,3,5')
    .option('-k, --k <k>', 'RRF smoothing constant (default: 60)')
    .option('-c, --candidates <m>', 'RRF candidates judged per query (default: 20)')
    .option('-l, --limit <n>', 'Reranked results kept, precision@n (default: 10)')
    .option('--channel-limit <n>', 'Results taken from each channel (default: 20)')
    .option('-t, --threshold <t>', 'Vector distance cutoff, or "none" (default: $HARNESS_VECTOR_THRESHOLD)')
).action(async (options) => {
  await executeHandler('rerank', options);
});
