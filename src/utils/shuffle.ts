import { randomInt, type Random } from './random.js';

/**
 * Uniformly random permutation of `items` (Fisher-Yates on a copy).
 * The input is left untouched; empty and single-element inputs draw nothing.
 */
export function shuffle<T>(items: readonly T[], random: Random = Math.random): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = randomInt(random, i + 1);
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}
