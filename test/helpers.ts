import type { Track } from '../src/services/track.js';

export function makeTrack(overrides: Partial<Track> & { id: number }): Track {
  return {
    title: `Track ${overrides.id}`,
    album: 'Album',
    rating: 0,
    playCount: 0,
    lastPlayed: 0,
    ...overrides,
  };
}
