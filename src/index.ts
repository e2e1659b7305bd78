export * from './core/types';
export * from './core/config';
export { SetupError, InferenceError, isTransientError } from './core/errors';
export { createLogger } from './core/log';
export type { Logger, LogLevel } from './core/log';
export type { InferenceClient, TokenLogprob } from './core/inference/types';
export { OllamaClient } from './core/inference/ollama';
export { withRetry } from './core/inference/retry';
export * from './core/store';
export { ClusterMap } from './core/corpus/clusterMap';
export { CorpusSynthesizer } from './core/corpus/synthesizer';
export type { SynthesisReport, SynthesisResult, SynthesisOptions } from './core/corpus/synthesizer';
export { FileBackgroundCache, planNextBatch, parseNotes } from './core/corpus/backgroundCache';
export type { BackgroundEntryCache, NoteGenerator } from './core/corpus/backgroundCache';
export { loadCorpusSpec, loadQuerySet, parseCorpusSpec, parseQuerySet } from './core/corpus/load';
export * from './core/channels';
export * from './core/retrieval';
export * from './core/analysis/sensitivity';
export { toDistanceCsv } from './core/analysis/csv';
export * from './core/metrics';
export * from './core/experiments';
