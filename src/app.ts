import Fastify from 'fastify';
import cors from '@fastify/cors';
import { getConfig } from './config.js';
import { registerPlaylistRoutes } from './routes/playlists.js';
import { registerShuffleRoutes } from './routes/shuffle.js';

export async function buildApp() {
  const config = getConfig();

  const fastify = Fastify({
    logger: false, // We use pino directly
  });

  const corsOrigins = config.CORS_ORIGINS
    ? config.CORS_ORIGINS.split(',').map(s => s.trim())
    : ['http://localhost:3000'];

  await fastify.register(cors, {
    origin: corsOrigins,
    methods: ['GET', 'POST'],
  });

  // Health endpoint
  fastify.get('/api/v1/health', async () => {
    return { status: 'ok', uptime: process.uptime(), timestamp: new Date().toISOString() };
  });

  registerPlaylistRoutes(fastify);
  registerShuffleRoutes(fastify);

  return fastify;
}
