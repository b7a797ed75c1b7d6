import type { ServerType } from '@hono/node-server';
import { logger } from './lib/logger';

const SHUTDOWN_TIMEOUT_MS = 30_000;

function closeServer(server: ServerType): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

async function gracefulShutdown(server: ServerType, signal: string): Promise<void> {
  logger.info({ signal }, 'Received shutdown signal');

  const timeout = setTimeout(() => {
    logger.error('Shutdown timed out after 30s, forcing exit');
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);

  try {
    logger.info('Closing HTTP server, waiting for in-flight analyses');
    await closeServer(server);

    clearTimeout(timeout);
    logger.info('Graceful shutdown complete');
    process.exit(0);
  } catch (error) {
    clearTimeout(timeout);
    logger.error({ error }, 'Error during shutdown');
    process.exit(1);
  }
}

export function registerGracefulShutdownHandlers(server: ServerType): void {
  process.on('SIGTERM', () => {
    void gracefulShutdown(server, 'SIGTERM');
  });
  process.on('SIGINT', () => {
    void gracefulShutdown(server, 'SIGINT');
  });
}
