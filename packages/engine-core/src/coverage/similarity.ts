import { clamp } from '../utils.js';

/**
 * Cosine similarity clamped to [0, 1]. Opposed vectors count as no similarity;
 * a zero vector is similar to nothing.
 *
 * Both vectors are scaled by their largest component first, so squaring never
 * overflows. Callers check dimensions and finiteness first.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  const scaleA = maxAbs(a);
  const scaleB = maxAbs(b);
  if (scaleA === 0 || scaleB === 0) return 0;

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] / scaleA;
    const y = b[i] / scaleB;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  return clamp(dot / (Math.sqrt(normA) * Math.sqrt(normB)), 0, 1);
}

function maxAbs(v: readonly number[]): number {
  let max = 0;
  for (const x of v) max = Math.max(max, Math.abs(x));
  return max;
}
