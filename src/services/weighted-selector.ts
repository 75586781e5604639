import { shuffle } from '../utils/shuffle.js';
import { randomInt, type Random } from '../utils/random.js';

export class InvalidWeightError extends Error {
  readonly name = 'InvalidWeightError';

  constructor(
    readonly weight: number,
    readonly index: number,
    reason = 'weights must be non-negative integers',
  ) {
    super(`Invalid weight ${weight} for item at index ${index}: ${reason}`);
  }
}

function assertWeight(weight: number, index: number): void {
  if (!Number.isSafeInteger(weight) || weight < 0) {
    throw new InvalidWeightError(weight, index);
  }
}

/**
 * Weighted shuffle without replacement. At every step the next element is
 * drawn from the remaining ones with probability proportional to its weight.
 *
 * Zero-weight elements are never drawn while any positive weight remains, so
 * they always end up at the tail, in the random order of the initial shuffle.
 *
 * This is O(n²) on purpose. Sorting on a per-item random key would be
 * O(n log n) but breaks ties differently.
 */
export function weightedSelect<T>(
  weightFn: (item: T) => number,
  items: readonly T[],
  random: Random = Math.random,
): T[] {
  let total = 0;
  const entries = items.map((value, index) => {
    const weight = weightFn(value);
    assertWeight(weight, index);
    total += weight;
    if (!Number.isSafeInteger(total)) {
      throw new InvalidWeightError(weight, index, 'total weight exceeds Number.MAX_SAFE_INTEGER');
    }
    return { value, weight };
  });

  // Pre-shuffle so nothing depends on the caller's order, zero weights included.
  const shuffled = shuffle(entries, random);
  const values = shuffled.map((e) => e.value);
  const weights = shuffled.map((e) => e.weight);

  const last = values.length - 1;
  let start = 0;

  while (start < last) {
    // Only zero weights left: keep the shuffled order.
    if (total === 0) break;

    let target = randomInt(random, total);
    let i = start;
    // Stops on the first weight above target; the last index is taken regardless.
    while (i < last && weights[i] <= target) {
      target -= weights[i];
      i++;
    }

    [values[start], values[i]] = [values[i], values[start]];
    [weights[start], weights[i]] = [weights[i], weights[start]];
    total -= weights[start];
    start++;
  }

  return values;
}
