import type { Candidate, FusibleChannel } from '../types';
import type { FusedCandidate, RankedList } from './types';

export const DEFAULT_RRF_K = 60;

const CHANNEL_ORDER: FusibleChannel[] = ['keyword', 'vector'];

export function rrfTerm(rank: number, k: number = DEFAULT_RRF_K): number {
  return 1 / (k + rank + 1);
}

export function channelLabel(channels: FusibleChannel[]): string {
  return CHANNEL_ORDER.filter((c) => channels.includes(c)).join('+');
}

interface Accumulator {
  candidate: Candidate;
  score: number;
  firstSeen: number;
}

function mergeInto(target: Candidate, source: Candidate, channel: FusibleChannel, rank: number): void {
  if (!target.channels.includes(channel)) target.channels.push(channel);
  target.ranks[channel] = rank;
  if (source.distance !== undefined && target.distance === undefined) target.distance = source.distance;
  if (source.keywordScore !== undefined && target.keywordScore === undefined) target.keywordScore = source.keywordScore;
}

/**
 * Reciprocal rank fusion: score(d) = sum over lists of 1 / (k + rank + 1),
 * rank 0-based. Equal scores are ordered by first appearance walking the
 * lists in the order given (so the first list's order wins), then by entry
 * id ascending.
 */
export function reciprocalRankFusion(
  lists: RankedList[],
  options: { k?: number; limit?: number } = {}
): FusedCandidate[] {
  const k = options.k ?? DEFAULT_RRF_K;
  const limit = Math.max(0, options.limit ?? 10);
  const acc = new Map<number, Accumulator>();
  let order = 0;

  for (const list of lists) {
    const seenInList = new Set<number>();
    list.candidates.forEach((c, rank) => {
      if (seenInList.has(c.entryId)) return;
      seenInList.add(c.entryId);
      let slot = acc.get(c.entryId);
      if (!slot) {
        slot = {
          candidate: { entryId: c.entryId, text: c.text, channels: [], ranks: {} },
          score: 0,
          firstSeen: order++,
        };
        acc.set(c.entryId, slot);
      }
      slot.score += rrfTerm(rank, k);
      mergeInto(slot.candidate, c, list.channel, rank);
    });
  }

  return Array.from(acc.values())
    .sort((a, b) => b.score - a.score || a.firstSeen - b.firstSeen || a.candidate.entryId - b.candidate.entryId)
    .slice(0, limit)
    .map(({ candidate, score }) => ({
      ...candidate,
      channels: CHANNEL_ORDER.filter((ch) => candidate.channels.includes(ch)),
      fusedScore: score,
      channelLabel: channelLabel(candidate.channels),
    }));
}

/**
 * Pre-fusion baseline: de-duplicate the lists, newest entry first.
 */
export function unionMerge(lists: RankedList[], limit = 10): Candidate[] {
  const byId = new Map<number, Candidate>();
  for (const list of lists) {
    list.candidates.forEach((c, rank) => {
      let merged = byId.get(c.entryId);
      if (!merged) {
        merged = { entryId: c.entryId, text: c.text, channels: [], ranks: {} };
        byId.set(c.entryId, merged);
      }
      if (merged.ranks[list.channel] === undefined) mergeInto(merged, c, list.channel, rank);
    });
  }
  return Array.from(byId.values())
    .sort((a, b) => b.entryId - a.entryId)
    .slice(0, Math.max(0, limit))
    .map((c) => ({ ...c, channels: CHANNEL_ORDER.filter((ch) => c.channels.includes(ch)) }));
}
