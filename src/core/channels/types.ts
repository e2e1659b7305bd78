import type { Candidate, RelationHit } from '../types';

/** Never rejects: failures surface as an empty list plus a log record. */
export type ChannelAdapter = (queryText: string, limit: number) => Promise<Candidate[]>;

export type RelationAdapter = (queryText: string, limit: number) => Promise<RelationHit[]>;
