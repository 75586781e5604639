import { z } from 'zod';
import type { Track } from '../services/track.js';
import { MAX_RATING } from '../services/weight-calculator.js';
import { logger } from '../utils/logger.js';
import { CatalogError, childElements, readGnuTunesDb, rootElement, type GnuTunesDb } from './tunes-db.js';

// gnupod leaves numeric attributes out, or writes them empty, when they were never set
const numericAttribute = z
  .string()
  .optional()
  .transform((value, ctx) => {
    const trimmed = (value ?? '').trim();
    if (trimmed === '') return 0;
    const parsed = Number(trimmed);
    if (!/^\d+$/.test(trimmed) || !Number.isSafeInteger(parsed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a non-negative integer, got "${value}"` });
      return z.NEVER;
    }
    return parsed;
  });

const textAttribute = z.string().optional().transform((value) => value ?? '');

const fileAttributesSchema = z.object({
  id: numericAttribute,
  title: textAttribute,
  album: textAttribute,
  rating: numericAttribute.pipe(z.number().max(MAX_RATING)),
  playcount: numericAttribute,
  lastplay: numericAttribute,
});

/** Every `<file>` under `<files>`, in document order. */
export function readTracks(db: GnuTunesDb): Track[] {
  const files = childElements(rootElement(db), 'files').flatMap((files) => childElements(files, 'file'));
  const seen = new Set<number>();

  return files.map((file, index) => {
    const result = fileAttributesSchema.safeParse(file.attributes);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new CatalogError(`<file> #${index + 1}: ${issue.path.join('.')}: ${issue.message}`);
    }

    const { id, title, album, rating, playcount, lastplay } = result.data;
    if (seen.has(id)) throw new CatalogError(`Duplicate track id ${id}`);
    seen.add(id);

    return { id, title, album, rating, playCount: playcount, lastPlayed: lastplay };
  });
}

export interface LoadedCatalog {
  db: GnuTunesDb;
  tracks: Track[];
}

export async function loadCatalog(path: string): Promise<LoadedCatalog> {
  const db = await readGnuTunesDb(path);
  const tracks = readTracks(db);
  logger.info({ path, tracks: tracks.length }, 'Catalog loaded');
  return { db, tracks };
}
