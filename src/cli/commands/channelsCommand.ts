import { Command } from 'commander';
import { executeHandler } from '../types';
import { withRunOptions } from './commonOptions';

export const channelsCommand = withRunOptions(
  new Command('channels')
    .description('Run each query through keyword, vector, relation and union retrieval in isolation')
    .option('--size <n>', 'Target corpus size (default: bundled corpus)')
    .option('-l, --limit <n>', 'Results per channel (default: 10)')
    .option('-t, --threshold <t>', 'Vector distance cutoff, or "none" (default: $HARNESS_VECTOR_THRESHOLD)')
).action(async (options) => {
  await executeHandler('channels', options);
});
