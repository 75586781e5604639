import { logger } from '../utils/logger.js';
import type { Random } from '../utils/random.js';
import type { Track, WeightedTrack } from './track.js';
import { computeWeights } from './weight-calculator.js';
import { weightedSelect } from './weighted-selector.js';

/** Weighted tracks in playback order. */
export function rankCatalog(catalog: readonly Track[], random: Random = Math.random): WeightedTrack[] {
  const weighted = computeWeights(catalog, random);
  const ordered = weightedSelect((track) => track.weight, weighted, random);

  logger.debug(
    {
      tracks: ordered.length,
      excluded: ordered.filter((t) => t.weight === 0).length,
      first: ordered[0]?.id,
    },
    'Catalog ranked',
  );
  return ordered;
}

/** Track ids in playback order. */
export function rankedPlaylist(catalog: readonly Track[], random: Random = Math.random): number[] {
  return rankCatalog(catalog, random).map((track) => track.id);
}
