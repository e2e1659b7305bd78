import path from 'path';
import { loadHarnessConfig, mergeHarnessConfig, type HarnessConfig } from '../core/config';
import { createModelNoteGenerator, FileBackgroundCache, loadTopics } from '../core/corpus/backgroundCache';
import { assertQueriesMatchCorpus, loadCorpusSpec, loadQuerySet } from '../core/corpus/load';
import { SetupError } from '../core/errors';
import type { ExperimentDeps } from '../core/experiments/context';
import { OllamaClient } from '../core/inference/ollama';
import { errorMessage, type Logger } from '../core/log';
import type { CommonRunInput } from './schemas/commonSchemas';
import type { CLIError } from './types';
import { error, ErrorHints } from './types';

export function resolveConfig(input: CommonRunInput, threshold?: number | null): HarnessConfig {
  const base = loadHarnessConfig();
  const resultsDir = input.results ? path.resolve(input.results) : base.storage.resultsDir;
  const backgroundMoves = !process.env.HARNESS_BACKGROUND_CACHE && resultsDir !== base.storage.resultsDir;
  return mergeHarnessConfig(base, {
    retrieval: threshold === undefined ? undefined : { vectorThreshold: threshold },
    storage: {
      resultsDir,
      store: input.store ?? base.storage.store,
      backgroundCacheFile: backgroundMoves ? path.join(resultsDir, 'background-entries.txt') : base.storage.backgroundCacheFile,
    },
  });
}

/**
 * Everything a run needs before it starts: configuration, corpus, query set,
 * a reachable inference server and the shared background cache. Any failure
 * here is a setup error and nothing has been written yet.
 */
export async function prepareExperiment(
  input: CommonRunInput,
  log: Logger,
  threshold?: number | null
): Promise<ExperimentDeps> {
  const config = resolveConfig(input, threshold);
  const corpus = await loadCorpusSpec(input.corpus ? path.resolve(input.corpus) : undefined);
  const querySet = await loadQuerySet(input.queries ? path.resolve(input.queries) : undefined);
  assertQueriesMatchCorpus(corpus, querySet.queries);

  const inference = new OllamaClient({ ...config.inference, log: log.child({ component: 'inference' }) });
  try {
    const { models } = await inference.ping();
    log.info('inference_ready', { url: config.inference.baseUrl, models: models.length });
  } catch (e) {
    throw new SetupError('inference_unreachable', `Inference server not reachable at ${config.inference.baseUrl}: ${errorMessage(e)}`, {
      url: config.inference.baseUrl,
    });
  }

  const background = new FileBackgroundCache({
    file: config.storage.backgroundCacheFile,
    generator: createModelNoteGenerator(inference),
    topics: await loadTopics(),
    log: log.child({ component: 'background' }),
  });

  log.info('run_config', {
    store: config.storage.store,
    results: config.storage.resultsDir,
    embedding_model: config.inference.embeddingModel,
    generation_model: config.inference.generationModel,
    rerank_model: config.inference.rerankModel,
    threshold: config.retrieval.vectorThreshold,
    metric: config.retrieval.metric,
    queries: querySet.queries.length,
    query_set_version: querySet.version,
  });

  return { config, inference, corpus, queries: querySet.queries, log, background };
}

export function setupErrorResult(e: SetupError): CLIError {
  return error(e.reason, {
    message: e.message,
    hint: ErrorHints[e.reason],
    ...(e.details ?? {}),
  });
}

/**
 * Runs fn, turning setup failures into an error result. Anything else is
 * left to executeHandler.
 */
export async function guardSetup<T>(fn: () => Promise<T>): Promise<T | CLIError> {
  try {
    return await fn();
  } catch (e) {
    if (e instanceof SetupError) return setupErrorResult(e);
    throw e;
  }
}

export function commandOutDir(config: HarnessConfig, command: string): string {
  return path.join(config.storage.resultsDir, command);
}
