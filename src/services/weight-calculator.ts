import { shuffle } from '../utils/shuffle.js';
import type { Random } from '../utils/random.js';
import type { Track, WeightedTrack } from './track.js';

/** Rating that takes a track out of rotation entirely. */
export const EXCLUDED_RATING = 20;

/** gnupod stores star ratings as 0, 20, ..., 100. */
export const MAX_RATING = 100;

/** Base used for unrated (rating 0) tracks: the highest priority there is. */
export const UNRATED_BASE = 200;

const TERM_SCALE = 1000;

/**
 * Recency rank for every track, keyed by catalog index. Ties on `lastPlayed`
 * (mostly the never-played tracks at 0) are broken by a shuffle before the
 * stable sort, so they don't end up ordered by id.
 */
export function computeRecencyRanks(catalog: readonly Track[], random: Random = Math.random): number[] {
  const order = shuffle([...catalog.keys()], random)
    .sort((a, b) => catalog[b].lastPlayed - catalog[a].lastPlayed);

  const ranks = new Array<number>(catalog.length);
  order.forEach((catalogIndex, position) => {
    ranks[catalogIndex] = position + 1;
  });
  return ranks;
}

/**
 * Selection weight of one track. Integer arithmetic throughout:
 *
 *   base * (floor(1000 * rank / size) + floor(1000 / (playCount + 1)))
 *
 * where base is the rating, or 200 for unrated tracks.
 */
export function computeWeight(track: Track, recencyRank: number, catalogSize: number): number {
  if (track.rating === EXCLUDED_RATING) return 0;

  const base = track.rating === 0 ? UNRATED_BASE : track.rating;
  const recencyTerm = Math.floor((TERM_SCALE * recencyRank) / catalogSize);
  const playCountTerm = Math.floor(TERM_SCALE / (track.playCount + 1));
  return base * (recencyTerm + playCountTerm);
}

/**
 * Annotates every track with its recency rank and selection weight.
 * Returns fresh objects in catalog order; the input is not modified.
 */
export function computeWeights(catalog: readonly Track[], random: Random = Math.random): WeightedTrack[] {
  const ranks = computeRecencyRanks(catalog, random);
  return catalog.map((track, index) => ({
    ...track,
    recencyRank: ranks[index],
    weight: computeWeight(track, ranks[index], catalog.length),
  }));
}
