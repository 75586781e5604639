import { z } from 'zod';
import type { FastifyReply } from 'fastify';
import { MAX_RATING } from '../services/weight-calculator.js';

export const seedSchema = z.number().int().optional();

export const trackSchema = z.object({
  id: z.number().int(),
  title: z.string().default(''),
  album: z.string().default(''),
  rating: z.number().int().min(0).max(MAX_RATING).default(0),
  playCount: z.number().int().min(0).max(Number.MAX_SAFE_INTEGER).default(0),
  lastPlayed: z.number().int().min(0).default(0),
});

export function sendInvalidBody(reply: FastifyReply, error: z.ZodError) {
  return reply.status(400).send({
    error: 'Invalid request body',
    issues: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
  });
}
