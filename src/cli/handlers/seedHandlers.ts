import { runSeed } from '../../core/experiments/seed';
import { createLogger } from '../../core/log';
import { commandOutDir, guardSetup, prepareExperiment } from '../helpers';
import type { SeedInput } from '../schemas/seedSchemas';
import type { CLIError, CLIResult } from '../types';
import { success } from '../types';

export async function handleSeed(input: SeedInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'seed' });
  return guardSetup(async () => {
    const deps = await prepareExperiment(input, log);
    const outDir = commandOutDir(deps.config, 'seed');
    const result = await runSeed(deps, { outDir, multiplier: input.scale, targetSize: input.size });
    return success({
      outDir,
      clusters: result.clusters,
      clusterMap: result.clusterMapFile,
      report: result.report,
      droppedQueries: result.droppedQueries,
    });
  });
}
