/**
 * Process root of the ingestion service.
 *
 * Validates configuration, opens the MongoDB connection, assembles the
 * pipeline and starts the schedule job. On SIGINT/SIGTERM the job is stopped
 * (letting the in-flight run finish) before the connection is closed.
 */

// First import: ESM evaluates imports in order, so .env is applied before the logger is built
import 'dotenv/config';
import { getEnv } from './config/env.js';
import { connectDB, closeDB, type DatabaseConnection } from './config/database.js';
import { createIngestionPipeline } from './pipeline.js';
import { ShutdownCoordinator } from './utils/shutdownCoordinator.js';
import { logger } from './utils/logger.js';

async function main(): Promise<void> {
  const env = getEnv();
  const shutdownCoordinator = new ShutdownCoordinator(env.SHUTDOWN_TIMEOUT_MS);
  let connection: DatabaseConnection | null = null;

  const gracefulShutdown = async (signal: string): Promise<void> => {
    const result = await shutdownCoordinator.shutdown(signal);
    process.exit(result.completed ? 0 : 1);
  };

  process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
  process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));

  process.on('unhandledRejection', (reason: unknown) => {
    logger.error({ reason: reason instanceof Error ? reason : { reason: String(reason) } }, 'Unhandled promise rejection');
  });

  process.on('uncaughtException', (error: Error) => {
    logger.fatal({ error }, 'Uncaught exception - shutting down');
    void gracefulShutdown('UNCAUGHT_EXCEPTION');
  });

  try {
    connection = await connectDB(env);
    const { job } = await createIngestionPipeline(env, connection.db);

    shutdownCoordinator.register('Ingestion Schedule Job', () => job.stop(), env.SHUTDOWN_TIMEOUT_MS);
    const db = connection;
    shutdownCoordinator.register('MongoDB', () => closeDB(db), 10000);

    if (env.INGEST_ENABLED) {
      job.start();
    } else {
      logger.warn('INGEST_ENABLED=false, ingestion schedule job not started');
    }

    logger.info(
      {
        stage: env.APP_ENV,
        bucket: env.AWS_S3_BUCKET,
        sourcePrefix: env.INGEST_SOURCE_PREFIX,
        successPrefix: env.INGEST_SUCCESS_PREFIX,
        errorPrefix: env.INGEST_ERROR_PREFIX,
      },
      'Ingestion service started'
    );
  } catch (error) {
    logger.fatal({ error }, 'Failed to start ingestion service');
    if (connection) {
      await closeDB(connection).catch((closeError: unknown) => {
        logger.error({ error: closeError }, 'Error closing MongoDB after startup failure');
      });
    }
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  // Configuration errors land here, before anything was opened
  logger.fatal({ error }, 'Ingestion service failed to start');
  process.exit(1);
});
