/**
 * Cosine similarity over plain number arrays or Float32Arrays.
 */

import { VectorDimensionMismatchError } from '../errors/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';

/**
 * cos(θ) = (a·b) / (‖a‖·‖b‖), in [-1, 1].
 *
 * Mismatched dimensions or a zero-norm vector score 0 with a warning; this
 * never throws.
 */
export function cosineSimilarity(
  a: ArrayLike<number>,
  b: ArrayLike<number>,
  logger: Logger = silentLogger
): number {
  if (a.length !== b.length) {
    logger.warn(new VectorDimensionMismatchError(a.length, b.length).message);
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  if (denominator === 0) {
    logger.warn('Zero-norm vector in similarity; scoring 0');
    return 0;
  }
  return dot / denominator;
}

/**
 * Highest score first. Array#sort is stable, so ties keep their input order.
 */
export function sortByScore<T extends { score: number }>(items: readonly T[]): T[] {
  return [...items].sort((a, b) => b.score - a.score);
}
