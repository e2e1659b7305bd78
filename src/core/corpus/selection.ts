import type { CorpusSpec, EntryDraft } from '../types';
import { NOISE_CLUSTER_ID } from '../types';

export function allSeedEntries(spec: CorpusSpec): EntryDraft[] {
  const out: EntryDraft[] = [];
  for (const cluster of spec.clusters) {
    for (const text of cluster.entries) out.push({ text, clusterId: cluster.id });
  }
  for (const text of spec.noise) out.push({ text, clusterId: NOISE_CLUSTER_ID });
  return out;
}

/**
 * Seed entries for a sized corpus. Tiny corpora get one entry per cluster,
 * small ones every cluster entry without noise, larger ones everything.
 * Every cluster stays represented, so the result may exceed the target;
 * background notes make up whatever is left below it.
 */
export function selectBaseEntries(spec: CorpusSpec, targetSize?: number): EntryDraft[] {
  if (targetSize === undefined) return allSeedEntries(spec);
  if (targetSize <= 10) {
    return spec.clusters.map((c) => ({ text: c.entries[0] ?? '', clusterId: c.id })).filter((d) => d.text);
  }
  if (targetSize <= 100) return allSeedEntries(spec).filter((d) => d.clusterId !== NOISE_CLUSTER_ID);
  return allSeedEntries(spec);
}
