import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { InvalidWeightError, weightedSelect } from '../services/weighted-selector.js';
import { shuffle } from '../utils/shuffle.js';
import { resolveRandom } from '../utils/random.js';
import { seedSchema, sendInvalidBody } from './schemas.js';

const itemId = z.union([z.number(), z.string()]);

const weightedBodySchema = z.object({
  items: z.array(z.object({ id: itemId, weight: z.number() })),
  seed: seedSchema,
});

const uniformBodySchema = z.object({
  items: z.array(z.unknown()),
  seed: seedSchema,
});

export function registerShuffleRoutes(fastify: FastifyInstance) {
  // Weighted order of arbitrary ids
  fastify.post('/api/v1/shuffle/weighted', async (request, reply) => {
    const body = weightedBodySchema.safeParse(request.body);
    if (!body.success) return sendInvalidBody(reply, body.error);

    const { items, seed } = body.data;
    try {
      const ordered = weightedSelect((item) => item.weight, items, resolveRandom(seed));
      return { order: ordered.map((item) => item.id) };
    } catch (error) {
      if (error instanceof InvalidWeightError) {
        return reply.status(422).send({ error: error.message, index: error.index });
      }
      throw error;
    }
  });

  // Plain uniform shuffle
  fastify.post('/api/v1/shuffle/uniform', async (request, reply) => {
    const body = uniformBodySchema.safeParse(request.body);
    if (!body.success) return sendInvalidBody(reply, body.error);

    return { order: shuffle(body.data.items, resolveRandom(body.data.seed)) };
  });
}
