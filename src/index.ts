import { createApp } from './app';
import { env } from './config';
import { logger, Logging } from './utils';
import { closeDatabase, getDatabase } from './database';
import { disconnectRedis, getRedisClient } from './redis';

/**
 * Start the server
 */
const startServer = async (): Promise<void> => {
  try {
    // Open SQLite and apply the schema before accepting requests
    getDatabase();

    // Trigger Redis connection (for early logging and availability check)
    getRedisClient();

    const app = createApp();

    const server = app.listen(env.PORT, () => {
      Logging.box('🔁 RECURRING RECONCILIATION', `Server started in ${env.NODE_ENV} mode`);
      Logging.success(`Server listening on http://${env.HOST}:${env.PORT}`);
      Logging.info(`API available at http://${env.HOST}:${env.PORT}${env.API_PREFIX}`);
      Logging.info(`Health check at http://${env.HOST}:${env.PORT}${env.API_PREFIX}/health`);
    });

    const gracefulShutdown = (signal: string): void => {
      logger.info(`${signal} received. Starting graceful shutdown...`);

      server.close((err) => {
        if (err) {
          logger.error('Error during server shutdown:', err);
          process.exit(1);
        }

        disconnectRedis()
          .then(() => {
            closeDatabase();
            logger.info('Server closed successfully');
            process.exit(0);
          })
          .catch((error: unknown) => {
            logger.error('Error while releasing connections:', error);
            process.exit(1);
          });
      });

      // Force shutdown after 30 seconds
      setTimeout(() => {
        logger.error('Forced shutdown due to timeout');
        process.exit(1);
      }, 30000).unref();
    };

    process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
    process.on('SIGINT', () => gracefulShutdown('SIGINT'));

    process.on('uncaughtException', (err: Error) => {
      logger.error('Uncaught Exception:', err);
      process.exit(1);
    });

    process.on('unhandledRejection', (reason: unknown) => {
      logger.error('Unhandled Rejection:', reason);
      process.exit(1);
    });
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
};

void startServer();
