export { withSeededCorpus } from './context';
export type { ExperimentDeps, SeededRun } from './context';
export { runSeed } from './seed';
export type { SeedOptions, SeedResult } from './seed';
export { runChannelIsolation } from './channels';
export type { ChannelIsolationOptions, ChannelIsolationResult } from './channels';
export { runRrfComparison } from './rrf';
export type { RrfOptions, RrfResult } from './rrf';
export { runRerankComparison } from './rerank';
export type { RerankOptions, RerankResult } from './rerank';
export { runSensitivity, DEFAULT_SENSITIVITY_SCALES } from './sensitivity';
export type { SensitivityOptions, SensitivityResult } from './sensitivity';
