import { runChannelIsolation } from '../../core/experiments/channels';
import { createLogger } from '../../core/log';
import { commandOutDir, guardSetup, prepareExperiment } from '../helpers';
import type { ChannelsInput } from '../schemas/channelsSchemas';
import type { CLIError, CLIResult } from '../types';
import { success } from '../types';

export async function handleChannels(input: ChannelsInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'channels' });
  return guardSetup(async () => {
    const deps = await prepareExperiment(input, log, input.threshold);
    const outDir = commandOutDir(deps.config, 'channels');
    const result = await runChannelIsolation(deps, {
      outDir,
      targetSize: input.size,
      limit: input.limit ?? deps.config.retrieval.fusedLimit,
      threshold: deps.config.retrieval.vectorThreshold,
    });
    return success({
      outDir,
      summary: result.summaryFile,
      entries: result.entries,
      relations: result.relations,
      relationFailures: result.relationFailures,
      hits: result.hits,
      falseHits: result.falseHits,
      exclusive: result.exclusive,
      droppedQueries: result.droppedQueries,
    });
  });
}
