import { getConfig } from './config.js';
import { logger } from './utils/logger.js';
import { buildApp } from './app.js';

const config = getConfig();
const fastify = await buildApp();

// Start server
try {
  await fastify.listen({ port: config.PORT, host: '0.0.0.0' });
  logger.info({ port: config.PORT }, 'Runthrough engine started');
} catch (err) {
  logger.fatal(err, 'Failed to start server');
  process.exit(1);
}

// Graceful shutdown
const shutdown = async (signal: string) => {
  logger.info({ signal }, 'Shutdown signal received');
  await fastify.close();
  process.exit(0);
};

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));
