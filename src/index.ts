import { createApp } from './app';
import { env } from './config';
import { logger, Logging } from './utils';
import { connectDatabase, disconnectDatabase } from './utils/db';
import { disconnectRedis, getRedisClient } from './redis';
import { createDocumentUploadDependencies } from './services';
import {
  closeDocumentUploadQueue,
  createDocumentUploadProcessor,
  setupDocumentUploadWorker,
} from './workers';

/**
 * Start the server
 */
const startServer = async (): Promise<void> => {
  try {
    await connectDatabase();

    // Trigger Redis connection (for early logging and availability check)
    getRedisClient();

    // Document uploads run in this process, off the request path
    const worker = setupDocumentUploadWorker(createDocumentUploadProcessor(createDocumentUploadDependencies()));
    logger.info('📤 Document upload worker started');

    const app = createApp();

    const server = app.listen(env.PORT, () => {
      Logging.box('🚀 INVOICE RECONCILIATION', `Server started in ${env.NODE_ENV} mode`);
      Logging.success(`Server listening on http://${env.HOST}:${env.PORT}`);
      Logging.info(`API available at http://${env.HOST}:${env.PORT}${env.API_PREFIX}`);
      Logging.info(`Health check at http://${env.HOST}:${env.PORT}${env.API_PREFIX}/health`);
    });

    const gracefulShutdown = (signal: string): void => {
      logger.info(`${signal} received. Starting graceful shutdown...`);

      // Force shutdown after 30 seconds
      setTimeout(() => {
        logger.error('Forced shutdown due to timeout');
        process.exit(1);
      }, 30000).unref();

      server.close((err) => {
        if (err) {
          logger.error('Error during server shutdown:', err);
          process.exit(1);
        }

        const closeResources = async (): Promise<void> => {
          // Let in-flight archive/report uploads finish
          logger.info('Closing document upload worker');
          await worker.close();
          await closeDocumentUploadQueue();
          await disconnectRedis();
          await disconnectDatabase();
        };

        closeResources()
          .then(() => {
            logger.info('Server closed successfully');
            process.exit(0);
          })
          .catch((error: unknown) => {
            logger.error('Error while releasing resources:', error);
            process.exit(1);
          });
      });
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
