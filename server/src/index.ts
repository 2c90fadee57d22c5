import 'dotenv/config';
import { getConfig } from './config';
import { initializeDatabase, closeDatabase } from './db';
import { createApp } from './app';
import logger from './utils/logger';

function start(): void {
  const config = getConfig();

  initializeDatabase(config);

  const app = createApp(config);
  const server = app.listen(config.port, () => {
    logger.info({ port: config.port, env: config.nodeEnv }, 'server started');
  });

  // Graceful shutdown
  const shutdown = () => {
    logger.info('shutting down');

    server.close(() => {
      closeDatabase();
      logger.info('server closed');
      process.exit(0);
    });

    // Force exit after 10 seconds if server doesn't close gracefully
    const forceExitTimer = setTimeout(() => {
      logger.warn('forcing exit after timeout');
      process.exit(0);
    }, 10000);
    forceExitTimer.unref();
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

try {
  start();
} catch (error) {
  logger.fatal({ err: error }, 'failed to start server');
  process.exit(1);
}
