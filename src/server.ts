import { startServer, stopServer } from './server-control';
import { config, validateConfig } from './core/config';
import { logger } from './core/logger';

if (!validateConfig()) {
  process.exit(1);
}

// Start the server
startServer(config.PORT).catch((error) => {
  logger.error({ error }, 'Failed to start server');
  process.exit(1);
});

/**
 * Graceful shutdown handler
 */
async function gracefulShutdown(signal: string) {
  logger.info(`${signal} received, starting graceful shutdown`);

  try {
    await stopServer();
    process.exit(0);
  } catch (error) {
    logger.error({ error }, 'Error during graceful shutdown');
    process.exit(1);
  }
}

// Graceful shutdown handlers
process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

// Handle uncaught exceptions
process.on('uncaughtException', (error) => {
  logger.error({ error }, 'Uncaught exception, shutting down');
  void gracefulShutdown('uncaughtException');
});
