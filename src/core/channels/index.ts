export * from './types';
export { extractKeywords, toOrQuery, loadStopWords, defaultStopWords } from './keywords';
export { createKeywordChannel } from './keyword';
export { createVectorChannel } from './vector';
export type { VectorChannelOptions } from './vector';
export { createStructuredChannel } from './structured';
