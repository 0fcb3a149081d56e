import { createApp } from './app';
import { Database } from './config/database';
import { loadConfig, validateConfig } from './config/config';
import { buildGateway } from './services';
import { logError, logger } from './utils/logger';

/**
 * Start the server
 */
async function startServer(): Promise<void> {
  const config = loadConfig();
  validateConfig();

  const db = new Database(config.database);

  // The credential database is a fallback; the gateway still serves
  // directory users when it is down
  logger.info('Testing database connection...');
  if (!(await db.testConnection())) {
    logger.warn('Credential database unavailable; database logins will fail until it returns');
  }

  const app = createApp(config, buildGateway(config, db));

  // Start listening
  const server = app.listen(config.port, () => {
    logger.info('Server started successfully', {
      port: config.port,
      environment: config.nodeEnv,
      uploadRoot: config.upload.root,
      sessionDir: config.session.dir,
    });
  });

  // Graceful shutdown handlers
  const gracefulShutdown = (signal: string) => {
    logger.info(`${signal} received, starting graceful shutdown`);

    // Stop accepting new connections
    server.close(() => {
      logger.info('HTTP server closed');

      db.close()
        .then(() => {
          logger.info('Graceful shutdown completed');
          process.exit(0);
        })
        .catch((error: unknown) => {
          logger.error('Error during graceful shutdown:', {
            error: error instanceof Error ? error.message : String(error),
          });
          process.exit(1);
        });
    });

    // Force shutdown after 10 seconds
    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  // Handle shutdown signals
  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));

  // Handle uncaught errors
  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception:', { error: error.message, stack: error.stack });
    gracefulShutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection:', { reason: String(reason) });
    gracefulShutdown('unhandledRejection');
  });
}

// Start the server
startServer().catch((error: unknown) => {
  logError(error, { phase: 'startup' });
  process.exit(1);
});
