import { Server } from 'http';
import { app } from './app';
import { getConfigSummary } from './core/config';
import { logger } from './core/logger';

let server: Server | null = null;
let isShuttingDown = false;

/**
 * Start the HTTP server
 */
export async function startServer(port: number): Promise<Server> {
  if (server) {
    throw new Error('Server is already started');
  }

  return new Promise((resolve, reject) => {
    const instance = app.listen(port, () => {
      logger.info({ port, config: getConfigSummary() }, 'Server listening');
      resolve(instance);
    });

    instance.on('error', (error) => {
      logger.error({ error }, 'Server error');
      server = null;
      reject(error);
    });

    server = instance;
  });
}

/**
 * Stop accepting connections and wait for in-flight requests
 */
export async function stopServer(): Promise<void> {
  const instance = server;
  if (!instance || isShuttingDown) {
    return;
  }

  isShuttingDown = true;
  logger.info('Starting graceful shutdown');

  try {
    await new Promise<void>((resolve, reject) => {
      instance.close((error) => (error ? reject(error) : resolve()));
    });
    logger.info('Graceful shutdown completed');
  } finally {
    server = null;
    isShuttingDown = false;
  }
}
