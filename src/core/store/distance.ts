import type { DistanceMetric } from '../types';

export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  const dim = Math.min(a.length, b.length);
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < dim; i++) {
    const av = Number(a[i] ?? 0);
    const bv = Number(b[i] ?? 0);
    dot += av * bv;
    na += av * av;
    nb += bv * bv;
  }
  if (na === 0 || nb === 0) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}

/** 1 - cosine similarity, in [0, 2]. */
export function cosineDistance(a: ArrayLike<number>, b: ArrayLike<number>): number {
  return 1 - cosineSimilarity(a, b);
}

/** Squared euclidean distance, matching what the vector index reports for l2. */
export function l2Distance(a: ArrayLike<number>, b: ArrayLike<number>): number {
  const dim = Math.min(a.length, b.length);
  let sum = 0;
  for (let i = 0; i < dim; i++) {
    const d = Number(a[i] ?? 0) - Number(b[i] ?? 0);
    sum += d * d;
  }
  return sum;
}

export function distance(metric: DistanceMetric, a: ArrayLike<number>, b: ArrayLike<number>): number {
  return metric === 'l2' ? l2Distance(a, b) : cosineDistance(a, b);
}
