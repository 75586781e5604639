import { describe, it, expect } from 'vitest';
import { MAC_EPOCH_OFFSET, formatTrackLine, macTimestampToString } from '../src/gnupod/track-format.js';
import { makeTrack } from './helpers.js';

// vitest.config.ts pins TZ=UTC

describe('macTimestampToString', () => {
  it('renders never-played as --', () => {
    expect(macTimestampToString(0)).toBe('--');
  });

  it('converts from the Mac epoch', () => {
    expect(macTimestampToString(MAC_EPOCH_OFFSET)).toBe('1970-01-01 00:00:00');
    expect(macTimestampToString(MAC_EPOCH_OFFSET + 86400 + 3661)).toBe('1970-01-02 01:01:01');
  });
});

describe('formatTrackLine', () => {
  it('pads and truncates into fixed columns', () => {
    const track = makeTrack({
      id: 7,
      title: 'A very long song title indeed',
      album: 'Album',
      rating: 60,
      playCount: 3,
      lastPlayed: 0,
    });

    expect(formatTrackLine(track)).toBe('7    A very long song tit   Album                  --                    60  3');
  });

  it('lets wide ids and ratings overflow their columns', () => {
    const track = makeTrack({
      id: 12345,
      title: 'Short',
      album: 'Twenty chars exactly',
      rating: 100,
      playCount: 0,
      lastPlayed: MAC_EPOCH_OFFSET + 86400 + 3661,
    });

    expect(formatTrackLine(track)).toBe(
      '12345 Short                  Twenty chars exactly   1970-01-02 01:01:01   100 0',
    );
  });
});
