import { getConfig } from '../config.js';
import { rankCatalog } from '../services/runthrough.js';
import { resolveRandom } from '../utils/random.js';
import { logger } from '../utils/logger.js';
import { loadCatalog } from '../gnupod/tracks.js';
import { upsertPlaylist } from '../gnupod/playlist.js';
import { serializeGnuTunesDb, writeGnuTunesDb } from '../gnupod/tunes-db.js';
import { formatTrackLine } from '../gnupod/track-format.js';

export const USAGE = `Usage: runthrough [path] [options]

Shuffles the tracks of a GNUtunesDB.xml into a weighted playlist.

Options:
  --seed <n>      Reproducible shuffle
  --name <name>   Playlist name (default: Runthrough)
  --list          Print the ranked tracks instead of the database
  --write         Write the database back to <path> instead of stdout
  --help          Show this help
`;

export interface CliOptions {
  path?: string;
  seed?: number;
  name?: string;
  list: boolean;
  write: boolean;
  help: boolean;
}

export class UsageError extends Error {
  readonly name = 'UsageError';
}

export function parseArgs(args: readonly string[]): CliOptions {
  const result: CliOptions = { list: false, write: false, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--seed': {
        const value = args[++i];
        const seed = Number(value);
        if (value === undefined || value.trim() === '' || !Number.isInteger(seed)) {
          throw new UsageError(`--seed expects an integer, got ${value ?? 'nothing'}`);
        }
        result.seed = seed;
        break;
      }
      case '--name': {
        const value = args[++i];
        if (!value) throw new UsageError('--name expects a playlist name');
        result.name = value;
        break;
      }
      case '--list':
        result.list = true;
        break;
      case '--write':
        result.write = true;
        break;
      case '--help':
      case '-h':
        result.help = true;
        break;
      default:
        if (arg.startsWith('-')) throw new UsageError(`Unknown option ${arg}`);
        if (result.path !== undefined) throw new UsageError(`Unexpected argument ${arg}`);
        result.path = arg;
    }
  }

  return result;
}

/**
 * Runs the CLI against `args` (without the node/script prefix) and returns
 * the exit code. Output goes through `write`.
 */
export async function runCli(
  args: readonly string[],
  write: (chunk: string) => void = (chunk) => process.stdout.write(chunk),
): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(args);
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    write(`${error.message}\n\n${USAGE}`);
    return 2;
  }

  if (options.help) {
    write(USAGE);
    return 0;
  }

  const config = getConfig();
  const path = options.path ?? config.GNUTUNES_DB_PATH;
  const name = options.name ?? config.PLAYLIST_NAME;
  const seed = options.seed ?? config.SHUFFLE_SEED;

  try {
    const { db, tracks } = await loadCatalog(path);
    const ordered = rankCatalog(tracks, resolveRandom(seed));

    if (options.list) {
      write(ordered.map((track) => `${formatTrackLine(track)}\n`).join(''));
      return 0;
    }

    const updated = upsertPlaylist(db, name, ordered.map((track) => track.id));
    if (options.write) {
      await writeGnuTunesDb(path, updated);
    } else {
      write(serializeGnuTunesDb(updated));
    }

    logger.info({ path, playlist: name, tracks: ordered.length, seed }, 'Runthrough playlist generated');
    return 0;
  } catch (error) {
    logger.error({ err: error, path }, 'Runthrough failed');
    return 1;
  }
}
