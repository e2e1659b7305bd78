import path from 'path';
import type { StoreKind } from '../config';
import { SetupError } from '../errors';
import { errorMessage, type Logger } from '../log';
import { LanceEntryStore } from './lancedb';
import { MemoryEntryStore } from './memory';
import type { EntryStore } from './types';

export type { EntryStore, KeywordRow, ScanRow, VectorRow } from './types';
export { MemoryEntryStore } from './memory';
export { LanceEntryStore } from './lancedb';
export { cosineDistance, cosineSimilarity, l2Distance, distance } from './distance';

export async function openEntryStore(params: {
  kind: StoreKind;
  workDir: string;
  dim: number;
  log?: Logger;
}): Promise<EntryStore> {
  if (params.kind === 'memory') return new MemoryEntryStore();
  const dbDir = path.join(params.workDir, 'lancedb');
  try {
    return await LanceEntryStore.open({ dbDir, dim: params.dim, log: params.log });
  } catch (e) {
    throw new SetupError('store_unavailable', `Could not open LanceDB store at ${dbDir}: ${errorMessage(e)}`, { dbDir });
  }
}
