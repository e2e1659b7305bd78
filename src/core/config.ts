import path from 'path';
import { z } from 'zod';
import type { DistanceMetric } from './types';
import { SetupError } from './errors';

export type StoreKind = 'lancedb' | 'memory';

export interface InferenceConfig {
  baseUrl: string;
  embeddingModel: string;
  generationModel: string;
  rerankModel: string;
  embeddingDim: number;
  timeoutMs: number;
  retries: number;
  backoffMs: number;
}

export interface RetrievalConfig {
  /** null disables the vector distance cutoff. */
  vectorThreshold: number | null;
  metric: DistanceMetric;
  rrfK: number;
  channelLimit: number;
  fusedLimit: number;
  rerankCandidates: number;
  rerankLimit: number;
  topLogprobs: number;
}

export interface StorageConfig {
  store: StoreKind;
  resultsDir: string;
  backgroundCacheFile: string;
  embedBatchSize: number;
}

export interface HarnessConfig {
  inference: InferenceConfig;
  retrieval: RetrievalConfig;
  storage: StorageConfig;
}

export function defaultInferenceConfig(): InferenceConfig {
  return {
    baseUrl: 'http://localhost:11434',
    embeddingModel: 'nomic-embed-text',
    generationModel: 'gemma3:1b',
    rerankModel: 'gemma3:1b',
    embeddingDim: 768,
    timeoutMs: 300_000,
    retries: 3,
    backoffMs: 5_000,
  };
}

export function defaultRetrievalConfig(): RetrievalConfig {
  return {
    vectorThreshold: 0.5,
    metric: 'cosine',
    rrfK: 60,
    channelLimit: 20,
    fusedLimit: 10,
    rerankCandidates: 20,
    rerankLimit: 10,
    topLogprobs: 10,
  };
}

export function defaultStorageConfig(resultsDir: string = path.resolve('results')): StorageConfig {
  return {
    store: 'lancedb',
    resultsDir,
    backgroundCacheFile: path.join(resultsDir, 'background-entries.txt'),
    embedBatchSize: 20,
  };
}

export function defaultHarnessConfig(): HarnessConfig {
  return {
    inference: defaultInferenceConfig(),
    retrieval: defaultRetrievalConfig(),
    storage: defaultStorageConfig(),
  };
}

export interface HarnessConfigOverrides {
  inference?: Partial<InferenceConfig>;
  retrieval?: Partial<RetrievalConfig>;
  storage?: Partial<StorageConfig>;
}

export function mergeHarnessConfig(base: HarnessConfig, overrides?: HarnessConfigOverrides): HarnessConfig {
  if (!overrides) return base;
  return {
    inference: { ...base.inference, ...overrides.inference },
    retrieval: { ...base.retrieval, ...overrides.retrieval },
    storage: { ...base.storage, ...overrides.storage },
  };
}

/** Accepts a number or the literal "none"/"off" for no cutoff. */
export const ThresholdSchema = z.union([
  z.enum(['none', 'off']).transform(() => null),
  z.coerce.number().min(0).max(4),
]);

const optionalString = z.string().trim().min(1).optional();

const EnvSchema = z.object({
  HARNESS_INFERENCE_URL: z.string().trim().url().optional(),
  HARNESS_EMBEDDING_MODEL: optionalString,
  HARNESS_GENERATION_MODEL: optionalString,
  HARNESS_RERANK_MODEL: optionalString,
  HARNESS_EMBEDDING_DIM: z.coerce.number().int().positive().optional(),
  HARNESS_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  HARNESS_RETRIES: z.coerce.number().int().min(1).max(10).optional(),
  HARNESS_RETRY_BACKOFF_MS: z.coerce.number().int().min(0).optional(),
  HARNESS_VECTOR_THRESHOLD: ThresholdSchema.optional(),
  HARNESS_DISTANCE_METRIC: z.enum(['cosine', 'l2']).optional(),
  HARNESS_RRF_K: z.coerce.number().int().min(0).optional(),
  HARNESS_CHANNEL_LIMIT: z.coerce.number().int().positive().optional(),
  HARNESS_FUSED_LIMIT: z.coerce.number().int().positive().optional(),
  HARNESS_RERANK_CANDIDATES: z.coerce.number().int().positive().optional(),
  HARNESS_RERANK_LIMIT: z.coerce.number().int().positive().optional(),
  HARNESS_STORE: z.enum(['lancedb', 'memory']).optional(),
  HARNESS_RESULTS_DIR: optionalString,
  HARNESS_BACKGROUND_CACHE: optionalString,
  HARNESS_EMBED_BATCH: z.coerce.number().int().positive().optional(),
});

function blankToUndefined(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith('HARNESS_')) continue;
    if (value === undefined || value.trim() === '') continue;
    out[key] = value;
  }
  return out;
}

/**
 * Builds the run configuration from HARNESS_* environment variables.
 * Model names and endpoints only ever come from here; CLI flags override
 * per-invocation knobs on top of the result.
 */
export function loadHarnessConfig(env: NodeJS.ProcessEnv = process.env): HarnessConfig {
  const parsed = EnvSchema.safeParse(blankToUndefined(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new SetupError('config_invalid', `Invalid environment configuration: ${issues.join('; ')}`, { issues });
  }
  const e = parsed.data;
  const defaults = defaultHarnessConfig();
  const resultsDir = e.HARNESS_RESULTS_DIR ? path.resolve(e.HARNESS_RESULTS_DIR) : defaults.storage.resultsDir;
  const generationModel = e.HARNESS_GENERATION_MODEL ?? defaults.inference.generationModel;
  const storage = defaultStorageConfig(resultsDir);

  return mergeHarnessConfig(defaults, {
    inference: {
      baseUrl: (e.HARNESS_INFERENCE_URL ?? defaults.inference.baseUrl).replace(/\/+$/, ''),
      embeddingModel: e.HARNESS_EMBEDDING_MODEL ?? defaults.inference.embeddingModel,
      generationModel,
      rerankModel: e.HARNESS_RERANK_MODEL ?? generationModel,
      embeddingDim: e.HARNESS_EMBEDDING_DIM ?? defaults.inference.embeddingDim,
      timeoutMs: e.HARNESS_REQUEST_TIMEOUT_MS ?? defaults.inference.timeoutMs,
      retries: e.HARNESS_RETRIES ?? defaults.inference.retries,
      backoffMs: e.HARNESS_RETRY_BACKOFF_MS ?? defaults.inference.backoffMs,
    },
    retrieval: {
      vectorThreshold: e.HARNESS_VECTOR_THRESHOLD === undefined ? defaults.retrieval.vectorThreshold : e.HARNESS_VECTOR_THRESHOLD,
      metric: e.HARNESS_DISTANCE_METRIC ?? defaults.retrieval.metric,
      rrfK: e.HARNESS_RRF_K ?? defaults.retrieval.rrfK,
      channelLimit: e.HARNESS_CHANNEL_LIMIT ?? defaults.retrieval.channelLimit,
      fusedLimit: e.HARNESS_FUSED_LIMIT ?? defaults.retrieval.fusedLimit,
      rerankCandidates: e.HARNESS_RERANK_CANDIDATES ?? defaults.retrieval.rerankCandidates,
      rerankLimit: e.HARNESS_RERANK_LIMIT ?? defaults.retrieval.rerankLimit,
    },
    storage: {
      ...storage,
      store: e.HARNESS_STORE ?? storage.store,
      backgroundCacheFile: e.HARNESS_BACKGROUND_CACHE ? path.resolve(e.HARNESS_BACKGROUND_CACHE) : storage.backgroundCacheFile,
      embedBatchSize: e.HARNESS_EMBED_BATCH ?? storage.embedBatchSize,
    },
  });
}
