import { Command } from 'commander';
import { executeHandler } from '../types';
import { withRunOptions } from './commonOptions';

export const seedCommand = withRunOptions(
  new Command('seed')
    .description('Synthesize a labeled corpus into a fresh store and write its cluster map')
    .option('-s, --scale <m>', 'Paraphrase multiplier (copies per seed, including the seed)', '1')
    .option('--size <n>', 'Target corpus size; background notes fill the gap')
).action(async (options) => {
  await executeHandler('seed', options);
});
