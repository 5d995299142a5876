/**
 * MongoDocumentStore - MongoDB implementation of DocumentStore
 *
 * Upserts are full replacements (`replaceOne` with `upsert: true`) filtered by
 * the composite key. A unique compound index on that key makes MongoDB itself
 * serialize writers racing on the same key; the loser of an insert race gets
 * E11000 and is retried once, which then matches and replaces.
 */

import {
  MongoServerError,
  MongoNetworkError,
  MongoServerSelectionError,
  MongoNotConnectedError,
  MongoTopologyClosedError,
  type Collection,
  type Db,
  type Document,
  type Filter,
  type UpdateResult,
} from 'mongodb';
import type { DocumentStore, UpsertResult } from './DocumentStore.js';
import type { CompositeKeyFilter, IngestedRecord } from '../types/ingestion.js';
import { PersistenceFailureError, describeError } from '../types/errors.js';
import { ingestionUpserts } from '../utils/metrics.js';
import { logger } from '../utils/logger.js';

export const COMPOSITE_KEY_INDEX_NAME = 'uniq_stage_work_order_document_number_idlpn';

/**
 * Server error codes raised while a node is unreachable, shutting down or
 * changing replica set state (HostUnreachable, HostNotFound, NetworkTimeout,
 * ShutdownInProgress, PrimarySteppedDown, InterruptedAtShutdown,
 * InterruptedDueToReplStateChange, NotWritablePrimary, NotPrimaryNoSecondaryOk,
 * NotPrimaryOrSecondary)
 */
const TRANSIENT_SERVER_CODES: readonly number[] = [6, 7, 89, 91, 189, 11600, 11602, 10107, 13435, 13436];

/**
 * Errors meaning the server could not be reached, as opposed to a rejected write
 */
export function isConnectivityError(error: unknown): boolean {
  if (
    error instanceof MongoNetworkError ||
    error instanceof MongoServerSelectionError ||
    error instanceof MongoNotConnectedError ||
    error instanceof MongoTopologyClosedError
  ) {
    return true;
  }
  if (error instanceof MongoServerError) {
    return (
      (typeof error.code === 'number' && TRANSIENT_SERVER_CODES.includes(error.code)) ||
      error.hasErrorLabel('RetryableWriteError')
    );
  }
  return false;
}

export function isDuplicateKeyError(error: unknown): boolean {
  return error instanceof MongoServerError && error.code === 11000;
}

function toMongoFilter(filter: CompositeKeyFilter): Filter<Document> {
  return {
    stage: filter.stage,
    work_order: filter.work_order,
    document_number: filter.document_number,
    idlpn: filter.idlpn,
  };
}

export class MongoDocumentStore implements DocumentStore {
  constructor(private readonly db: Db) {}

  /**
   * Ensure the unique composite key index exists on every target collection
   */
  async ensureIndexes(collectionNames: readonly string[]): Promise<void> {
    for (const name of collectionNames) {
      try {
        await this.db.collection(name).createIndex(
          { stage: 1, work_order: 1, document_number: 1, idlpn: 1 },
          { name: COMPOSITE_KEY_INDEX_NAME, unique: true }
        );
      } catch (error) {
        logger.error({ error, collection: name }, 'Failed to create composite key index');
        throw error;
      }
    }
    logger.debug({ collections: collectionNames }, 'Composite key indexes ensured');
  }

  async upsert(collectionName: string, filter: CompositeKeyFilter, document: IngestedRecord): Promise<UpsertResult> {
    const collection = this.db.collection<Document>(collectionName);

    try {
      const result = await this.replace(collection, toMongoFilter(filter), document);
      const outcome = result.upsertedCount > 0 ? 'inserted' : 'replaced';
      ingestionUpserts.inc({ collection: collectionName, outcome });
      return { ok: true, outcome };
    } catch (error) {
      const unreachable = isConnectivityError(error);
      ingestionUpserts.inc({ collection: collectionName, outcome: unreachable ? 'unreachable' : 'rejected' });
      return {
        ok: false,
        error: new PersistenceFailureError(collectionName, describeError(error), unreachable, { cause: error }),
      };
    }
  }

  private async replace(
    collection: Collection<Document>,
    filter: Filter<Document>,
    document: IngestedRecord
  ): Promise<UpdateResult<Document>> {
    try {
      return await collection.replaceOne(filter, document, { upsert: true });
    } catch (error) {
      if (!isDuplicateKeyError(error)) {
        throw error;
      }
      // Lost an insert race on the same key; the document now exists
      return collection.replaceOne(filter, document, { upsert: true });
    }
  }
}
