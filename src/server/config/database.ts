import { MongoClient, type Db, type MongoClientOptions } from 'mongodb';
import { setTimeout as sleep } from 'node:timers/promises';
import type { Env } from './env.js';
import { logger } from '../utils/logger.js';

/**
 * An open MongoDB connection owned by the process root. The pool is shared
 * with anything else the host process runs against the same database.
 */
export interface DatabaseConnection {
  client: MongoClient;
  db: Db;
}

export type DatabaseEnv = Pick<
  Env,
  | 'MONGODB_URI'
  | 'DB_NAME'
  | 'DB_MAX_POOL_SIZE'
  | 'DB_CONNECT_TIMEOUT_MS'
  | 'DB_SERVER_SELECTION_TIMEOUT_MS'
  | 'DB_MAX_RETRIES'
  | 'DB_INITIAL_RETRY_DELAY'
>;

const MAX_RETRY_DELAY = 30000;

/**
 * Exponential backoff delay for a zero-based retry number
 */
export function calculateBackoffDelay(retry: number, initialDelay: number): number {
  return Math.min(initialDelay * Math.pow(2, retry), MAX_RETRY_DELAY);
}

function redactUri(uri: string): string {
  return uri.replace(/\/\/([^:/@]+):[^@]+@/, '//$1:****@');
}

/**
 * Connect and ping, retrying with exponential backoff. Only startup retries
 * here; once running, the driver's own reconnection takes over and failed
 * writes surface as PersistenceFailureError.
 *
 * @throws The last connection error once all attempts are exhausted
 */
export async function connectDB(env: DatabaseEnv): Promise<DatabaseConnection> {
  const clientOptions: MongoClientOptions = {
    maxPoolSize: env.DB_MAX_POOL_SIZE,
    connectTimeoutMS: env.DB_CONNECT_TIMEOUT_MS,
    serverSelectionTimeoutMS: env.DB_SERVER_SELECTION_TIMEOUT_MS,
    writeConcern: { w: 'majority' },
  };

  let lastError: unknown;

  for (let attempt = 0; attempt < env.DB_MAX_RETRIES; attempt++) {
    if (attempt > 0) {
      const delay = calculateBackoffDelay(attempt - 1, env.DB_INITIAL_RETRY_DELAY);
      logger.warn({ attempt: attempt + 1, maxRetries: env.DB_MAX_RETRIES, delay }, 'Retrying database connection...');
      await sleep(delay);
    }

    const client = new MongoClient(env.MONGODB_URI, clientOptions);
    try {
      await client.connect();
      const db = client.db(env.DB_NAME);
      await db.command({ ping: 1 });
      logger.info(
        { uri: redactUri(env.MONGODB_URI), dbName: env.DB_NAME, poolSize: env.DB_MAX_POOL_SIZE },
        'Connected to MongoDB'
      );
      return { client, db };
    } catch (error) {
      lastError = error;
      logger.error({ error, attempt: attempt + 1 }, 'MongoDB connection attempt failed');
      await client.close().catch((closeError: unknown) => {
        logger.debug({ error: closeError }, 'Error closing failed MongoDB client');
      });
    }
  }

  throw lastError;
}

export async function closeDB(connection: DatabaseConnection): Promise<void> {
  try {
    await connection.client.close();
    logger.info('MongoDB connection closed');
  } catch (error) {
    logger.error({ error }, 'Error closing MongoDB connection');
    throw error;
  }
}
