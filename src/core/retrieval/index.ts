export * from './types';
export { reciprocalRankFusion, unionMerge, rrfTerm, channelLabel, DEFAULT_RRF_K } from './fuser';
export { LogprobReranker, scoreFromLogprobs, buildJudgePrompt } from './reranker';
export type { RerankerConfig, Reranker, Cache } from './reranker';
export { LruCache } from './cache';
