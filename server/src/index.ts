import { createApp } from './app.js';
import { config } from './config.js';
import { logger } from './services/logger.js';

const app = createApp();

const server = app.listen(config.PORT, () => {
  logger.info(`Server running on http://localhost:${config.PORT}`);
  logger.info(`Health check: http://localhost:${config.PORT}/api/health`);
});

// Graceful shutdown handler
function gracefulShutdown(signal: string): void {
  logger.info(`${signal} received. Starting graceful shutdown...`);

  // Give existing requests time to complete (10 seconds max)
  const shutdownTimeout = setTimeout(() => {
    logger.warn('Shutdown timeout reached, forcing exit');
    process.exit(1);
  }, 10000);

  server.close((error) => {
    clearTimeout(shutdownTimeout);
    if (error) {
      logger.error('Error during shutdown:', error);
      process.exit(1);
    }
    logger.info('HTTP server closed');
    process.exit(0);
  });
}

// Handle shutdown signals
process.on('SIGINT', () => gracefulShutdown('SIGINT'));
process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception:', error);
  gracefulShutdown('uncaughtException');
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection:', { reason });
});
