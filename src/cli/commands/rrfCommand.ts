import { Command } from 'commander';
import { executeHandler } from '../types';
import { withRunOptions } from './commonOptions';

export const rrfCommand = withRunOptions(
  new Command('rrf')
    .description('Compare reciprocal-rank fusion against a newest-first union of keyword and vector results')
    .option('--size <n>', 'Target corpus size (default: bundled corpus)')
    .option('--sizes <list>', 'Comma-separated corpus sizes, e.g. 100,1000')
    .option('-k, --k <k>', 'RRF smoothing constant (default: 60)')
    .option('-l, --limit <n>', 'Fused results kept, precision@n (default: 10)')
    .option('--channel-limit <n>', 'Results taken from each channel (default: 20)')
    .option('-t, --threshold <t>', 'Vector distance cutoff, or "none" (default: $HARNESS_VECTOR_THRESHOLD)')
).action(async (options) => {
  await executeHandler('rrf', options);
});
