import type { DistanceMetric } from './types.js';

export const DISTANCE_METRICS: readonly DistanceMetric[] = ['cosine', 'l2', 'dot'];

export function isDistanceMetric(value: string): value is DistanceMetric {
  return value === 'cosine' || value === 'l2' || value === 'dot';
}

/**
 * Distance between two equal-length vectors.
 */
export function computeDistance(metric: DistanceMetric, a: number[], b: number[]): number {
  switch (metric) {
    case 'l2':
      return squaredEuclidean(a, b);
    case 'dot':
      return 1 - dotProduct(a, b);
    case 'cosine':
    default:
      return 1 - cosineSimilarity(a, b);
  }
}

function dotProduct(a: number[], b: number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

function squaredEuclidean(a: number[], b: number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const diff = a[i] - b[i];
    sum += diff * diff;
  }
  return sum;
}

/**
 * Calculate cosine similarity between two vectors. Zero vectors have
 * similarity 0 with everything.
 */
function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const magnitude = Math.sqrt(normA) * Math.sqrt(normB);
  if (magnitude === 0) {
    return 0;
  }

  return dot / magnitude;
}
