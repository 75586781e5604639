/** A source of floats in [0, 1). `Math.random` is the default everywhere. */
export type Random = () => number;

/**
 * Mulberry32 generator. Same seed, same sequence; used for reproducible runs
 * (`--seed`, `SHUFFLE_SEED`) and in tests.
 *
 * Outputs are multiples of 2^-32, so `randomInt` over a bound above 2^32
 * cannot reach every integer. Catalog weights stay far below that.
 */
export function createSeededRandom(seed: number): Random {
  let state = seed >>> 0;
  return () => {
    let t = (state = (state + 0x6d2b79f5) | 0);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Integer drawn uniformly from [0, bound). */
export function randomInt(random: Random, bound: number): number {
  return Math.floor(random() * bound);
}

/** Seeded source when a seed is given, `Math.random` otherwise. */
export function resolveRandom(seed?: number): Random {
  return seed === undefined ? Math.random : createSeededRandom(seed);
}
