import { runSensitivity } from '../../core/experiments/sensitivity';
import { createLogger } from '../../core/log';
import { commandOutDir, guardSetup, prepareExperiment } from '../helpers';
import type { SensitivityInput } from '../schemas/sensitivitySchemas';
import type { CLIError, CLIResult } from '../types';
import { success } from '../types';

export async function handleSensitivity(input: SensitivityInput): Promise<CLIResult | CLIError> {
  const log = createLogger({ component: 'cli', cmd: 'sensitivity' });
  return guardSetup(async () => {
    const deps = await prepareExperiment(input, log);
    const outDir = commandOutDir(deps.config, 'sensitivity');
    const result = await runSensitivity(deps, {
      outDir,
      scales: input.sizes ?? (input.size !== undefined ? [input.size] : []),
      thresholds: input.thresholds,
      referenceThreshold: input.reference,
    });
    return success({
      outDir,
      summary: result.summaryFile,
      csv: result.csvFiles,
      stability: result.stability,
      candidate: result.candidate,
      scales: result.analyses.map((a) => ({
        scale: a.scale,
        entries: a.entries,
        skippedQueries: a.skippedQueries,
        droppedQueries: a.droppedQueries,
        relevant: a.summary.relevant,
        irrelevant: a.summary.irrelevant,
        reference: a.reference,
        negatives: a.negatives,
      })),
    });
  });
}
