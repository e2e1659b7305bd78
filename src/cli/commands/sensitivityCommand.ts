import { Command } from 'commander';
import { executeHandler } from '../types';
import { withRunOptions } from './commonOptions';

export const sensitivityCommand = withRunOptions(
  new Command('sensitivity')
    .description('Sweep vector distance thresholds at several corpus sizes and report instability')
    .option('--size <n>', 'Single corpus size')
    .option('--sizes <list>', 'Comma-separated corpus sizes (default: 10,100,1000,10000)')
    .option('--thresholds <list>', 'Comma-separated thresholds (default: 0.30..0.65 step 0.05)')
    .option('--reference <t>', 'Threshold used in the cross-scale table (default: 0.5)')
).action(async (options) => {
  await executeHandler('sensitivity', options);
});
