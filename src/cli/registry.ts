import type { RegisteredHandler } from './types';
import { registerHandler } from './types';
import { SeedSchema } from './schemas/seedSchemas';
import { ChannelsSchema } from './schemas/channelsSchemas';
import { RrfSchema } from './schemas/rrfSchemas';
import { RerankSchema } from './schemas/rerankSchemas';
import { SensitivitySchema } from './schemas/sensitivitySchemas';
import { handleSeed } from './handlers/seedHandlers';
import { handleChannels } from './handlers/channelsHandlers';
import { handleRrf } from './handlers/rrfHandlers';
import { handleRerank } from './handlers/rerankHandlers';
import { handleSensitivity } from './handlers/sensitivityHandlers';

/**
 * Registry of all CLI command handlers, keyed by command name.
 */
export const cliHandlers: Record<string, RegisteredHandler> = {
  'seed': registerHandler({ schema: SeedSchema, handler: handleSeed }),
  'channels': registerHandler({ schema: ChannelsSchema, handler: handleChannels }),
  'rrf': registerHandler({ schema: RrfSchema, handler: handleRrf }),
  'rerank': registerHandler({ schema: RerankSchema, handler: handleRerank }),
  'sensitivity': registerHandler({ schema: SensitivitySchema, handler: handleSensitivity }),
};
