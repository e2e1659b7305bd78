import test from 'node:test';
import assert from 'node:assert/strict';
import { defaultHarnessConfig, loadHarnessConfig, mergeHarnessConfig } from '../src/core/config';
import { SetupError } from '../src/core/errors';

test('config: defaults when no HARNESS_* variables are set', () => {
  const config = loadHarnessConfig({ PATH: '/usr/bin' });
  assert.equal(config.inference.baseUrl, 'http://localhost:11434');
  assert.equal(config.inference.embeddingModel, 'nomic-embed-text');
  assert.equal(config.inference.rerankModel, 'gemma3:1b');
  assert.equal(config.inference.embeddingDim, 768);
  assert.equal(config.inference.retries, 3);
  assert.equal(config.retrieval.vectorThreshold, 0.5);
  assert.equal(config.retrieval.rrfK, 60);
  assert.equal(config.storage.store, 'lancedb');
  assert.equal(config.storage.embedBatchSize, 20);
});

test('config: environment overrides', () => {
  const config = loadHarnessConfig({
    HARNESS_INFERENCE_URL: 'http://gpu-box:11434/',
    HARNESS_GENERATION_MODEL: 'llama3.2:3b',
    HARNESS_EMBEDDING_DIM: '384',
    HARNESS_VECTOR_THRESHOLD: 'none',
    HARNESS_STORE: 'memory',
    HARNESS_RESULTS_DIR: '/tmp/harness-out',
    HARNESS_RETRIES: '5',
  });
  assert.equal(config.inference.baseUrl, 'http://gpu-box:11434');
  assert.equal(config.inference.generationModel, 'llama3.2:3b');
  assert.equal(config.inference.rerankModel, 'llama3.2:3b');
  assert.equal(config.inference.embeddingDim, 384);
  assert.equal(config.inference.retries, 5);
  assert.equal(config.retrieval.vectorThreshold, null);
  assert.equal(config.storage.store, 'memory');
  assert.equal(config.storage.resultsDir, '/tmp/harness-out');
  assert.equal(config.storage.backgroundCacheFile, '/tmp/harness-out/background-entries.txt');
});

test('config: retrieval knobs come from the environment', () => {
  const config = loadHarnessConfig({
    HARNESS_RRF_K: '30',
    HARNESS_CHANNEL_LIMIT: '40',
    HARNESS_FUSED_LIMIT: '5',
    HARNESS_RERANK_CANDIDATES: '25',
    HARNESS_RERANK_LIMIT: '8',
  });
  assert.equal(config.retrieval.rrfK, 30);
  assert.equal(config.retrieval.channelLimit, 40);
  assert.equal(config.retrieval.fusedLimit, 5);
  assert.equal(config.retrieval.rerankCandidates, 25);
  assert.equal(config.retrieval.rerankLimit, 8);
  assert.equal(config.retrieval.topLogprobs, 10);
});

test('config: explicit rerank model and background cache win', () => {
  const config = loadHarnessConfig({
    HARNESS_RERANK_MODEL: 'qwen3:0.6b',
    HARNESS_BACKGROUND_CACHE: '/tmp/shared/bg.txt',
    HARNESS_VECTOR_THRESHOLD: '0.35',
  });
  assert.equal(config.inference.generationModel, 'gemma3:1b');
  assert.equal(config.inference.rerankModel, 'qwen3:0.6b');
  assert.equal(config.storage.backgroundCacheFile, '/tmp/shared/bg.txt');
  assert.equal(config.retrieval.vectorThreshold, 0.35);
});

test('config: blank variables are ignored', () => {
  const config = loadHarnessConfig({ HARNESS_EMBEDDING_MODEL: '   ', HARNESS_STORE: '' });
  assert.equal(config.inference.embeddingModel, 'nomic-embed-text');
  assert.equal(config.storage.store, 'lancedb');
});

test('config: invalid values raise config_invalid', () => {
  assert.throws(
    () => loadHarnessConfig({ HARNESS_STORE: 'redis' }),
    (e: unknown) => e instanceof SetupError && e.reason === 'config_invalid' && e.message.includes('HARNESS_STORE')
  );
  assert.throws(
    () => loadHarnessConfig({ HARNESS_EMBEDDING_DIM: '-3' }),
    (e: unknown) => e instanceof SetupError && e.reason === 'config_invalid'
  );
});

test('config: merge only replaces the given fields', () => {
  const base = defaultHarnessConfig();
  const merged = mergeHarnessConfig(base, { retrieval: { rrfK: 10 } });
  assert.equal(merged.retrieval.rrfK, 10);
  assert.equal(merged.retrieval.channelLimit, base.retrieval.channelLimit);
  assert.deepEqual(merged.inference, base.inference);
  assert.equal(mergeHarnessConfig(base), base);
});
