import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { rankCatalog } from '../services/runthrough.js';
import { InvalidWeightError } from '../services/weighted-selector.js';
import { resolveRandom } from '../utils/random.js';
import { logger } from '../utils/logger.js';
import { seedSchema, sendInvalidBody, trackSchema } from './schemas.js';

const rankedBodySchema = z.object({
  tracks: z.array(trackSchema).refine(
    (tracks) => new Set(tracks.map((t) => t.id)).size === tracks.length,
    { message: 'track ids must be unique' },
  ),
  seed: seedSchema,
});

export function registerPlaylistRoutes(fastify: FastifyInstance) {
  // Rank a catalog into a Runthrough
  fastify.post('/api/v1/playlists/ranked', async (request, reply) => {
    const body = rankedBodySchema.safeParse(request.body);
    if (!body.success) return sendInvalidBody(reply, body.error);

    const { tracks, seed } = body.data;
    try {
      const ordered = rankCatalog(tracks, resolveRandom(seed));

      logger.info({ tracks: ordered.length, seeded: seed !== undefined }, 'Runthrough ranked');

      return {
        trackIds: ordered.map((t) => t.id),
        tracks: ordered,
      };
    } catch (error) {
      if (error instanceof InvalidWeightError) {
        return reply.status(422).send({ error: error.message, index: error.index });
      }
      throw error;
    }
  });
}
