import { buildServer } from './app';
import { closeDb } from './database/connection';
import { config } from './config';
import { logger } from './lib/logger';

async function start() {
  try {
    const server = await buildServer();

    const shutdown = async () => {
      logger.info('Shutting down');
      try {
        await server.close();
        await closeDb();
        process.exit(0);
      } catch (err) {
        logger.error({ err }, 'Shutdown failed');
        process.exit(1);
      }
    };
    process.on('SIGINT', () => void shutdown());
    process.on('SIGTERM', () => void shutdown());

    await server.listen({ port: config.api.port, host: config.api.host });
  } catch (err) {
    logger.fatal({ err }, 'Failed to start');
    process.exit(1);
  }
}

void start();
