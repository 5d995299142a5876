/**
 * Wiring of the ingestion pipeline from validated configuration.
 *
 * Clients are constructed once by the caller (the process root, or a host
 * application embedding the pipeline) and handed in by reference.
 */

import type { Db } from 'mongodb';
import type { Env } from './config/env.js';
import type { ObjectStore } from './storage/ObjectStore.js';
import { S3ObjectStore } from './storage/S3ObjectStore.js';
import { MongoDocumentStore } from './storage/MongoDocumentStore.js';
import { IngestionEngine, type IngestionEngineConfig } from './services/ingestion/IngestionEngine.js';
import { IngestionScheduleJob } from './services/scheduling/IngestionScheduleJob.js';

export function engineConfigFromEnv(env: Env): IngestionEngineConfig {
  return {
    sourcePrefix: env.INGEST_SOURCE_PREFIX,
    successPrefix: env.INGEST_SUCCESS_PREFIX,
    errorPrefix: env.INGEST_ERROR_PREFIX,
    keySuffix: env.INGEST_KEY_SUFFIX,
    stage: env.APP_ENV,
    collections: {
      DECLARE_PT: env.COLL_DECLARE_PT,
      CONSUMIR_VASOT: env.COLL_CONSUMIR_VASOT,
    },
    concurrency: env.INGEST_CONCURRENCY,
    archiveMode: env.INGEST_ARCHIVE_MODE,
  };
}

export function createObjectStore(env: Env): S3ObjectStore {
  return new S3ObjectStore({
    bucket: env.AWS_S3_BUCKET,
    region: env.AWS_REGION,
    endpoint: env.AWS_S3_ENDPOINT,
    forcePathStyle: env.AWS_S3_FORCE_PATH_STYLE,
    maxAttempts: env.AWS_S3_MAX_ATTEMPTS,
    rootPrefix: env.INGEST_SOURCE_PREFIX,
  });
}

export interface IngestionPipeline {
  engine: IngestionEngine;
  job: IngestionScheduleJob;
}

/**
 * Ensure indexes and assemble engine and scheduler (not yet started)
 */
export async function createIngestionPipeline(
  env: Env,
  db: Db,
  objectStore: ObjectStore = createObjectStore(env)
): Promise<IngestionPipeline> {
  const documentStore = new MongoDocumentStore(db);
  await documentStore.ensureIndexes([env.COLL_DECLARE_PT, env.COLL_CONSUMIR_VASOT]);

  const engine = new IngestionEngine(objectStore, documentStore, engineConfigFromEnv(env));
  const job = new IngestionScheduleJob(engine, { intervalSeconds: env.INGEST_SYNC_INTERVAL_SECONDS });

  return { engine, job };
}
