import type { Track } from '../services/track.js';

/** Seconds between the Mac epoch (1904) and the Unix epoch, as gnupod counts them. */
export const MAC_EPOCH_OFFSET = 2082848400;

const pad2 = (n: number) => String(n).padStart(2, '0');

/** Local `yyyy-MM-dd HH:mm:ss`, or `--` for a track that was never played. */
export function macTimestampToString(timestamp: number): string {
  if (timestamp === 0) return '--';

  const date = new Date((timestamp - MAC_EPOCH_OFFSET) * 1000);
  return (
    `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ` +
    `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`
  );
}

function column(value: string, width: number, truncate = false): string {
  return (truncate ? value.slice(0, width) : value).padEnd(width);
}

/** One 80-column listing line: id, title, album, last played, rating, play count. */
export function formatTrackLine(track: Track): string {
  return [
    column(String(track.id), 4),
    ' ',
    column(track.title, 20, true),
    '   ',
    column(track.album, 20, true),
    '   ',
    column(macTimestampToString(track.lastPlayed), 19),
    '   ',
    column(String(track.rating), 3),
    ' ',
    String(track.playCount),
  ].join('');
}
