import type { DistanceMetric } from '../shared/types';

export function dotProduct(a: ArrayLike<number>, b: ArrayLike<number>): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

export function euclideanDistance(a: ArrayLike<number>, b: ArrayLike<number>): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const diff = a[i] - b[i];
    sum += diff * diff;
  }
  return Math.sqrt(sum);
}

export function norm(a: ArrayLike<number>): number {
  return Math.sqrt(dotProduct(a, a));
}

/** Zero vectors have similarity 0 with everything. */
export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  const denominator = norm(a) * norm(b);
  if (denominator === 0) {
    return 0;
  }
  return dotProduct(a, b) / denominator;
}

/**
 * Score a candidate against the query so that a higher score always means
 * more relevant.
 *
 * - cosine: score = similarity, distance = 1 - similarity
 * - dot: score = dot product, distance = -dot product
 * - euclidean: score = 1 / (1 + distance)
 */
export function scoreVector(
  metric: DistanceMetric,
  query: ArrayLike<number>,
  candidate: ArrayLike<number>
): { score: number; distance: number } {
  switch (metric) {
    case 'cosine': {
      const similarity = cosineSimilarity(query, candidate);
      return { score: similarity, distance: 1 - similarity };
    }
    case 'dot': {
      const dot = dotProduct(query, candidate);
      return { score: dot, distance: -dot };
    }
    case 'euclidean': {
      const distance = euclideanDistance(query, candidate);
      return { score: 1 / (1 + distance), distance };
    }
  }
}
