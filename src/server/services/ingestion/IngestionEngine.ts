/**
 * IngestionEngine - one pass over the platform's pending event files
 *
 * list → fetch → parse → classify → upsert → archive, per object, with a
 * bounded number of objects in flight. Every per-object failure is turned
 * into an archive decision; only run-level failures (document store
 * unreachable, listing failed) are thrown to the caller.
 *
 * Correctness does not depend on archive moves succeeding: an object left
 * in place (or duplicated by a half-finished move) is listed again next run
 * and its full-replace upsert on the composite key is a no-op in effect.
 */

import type { ObjectStore, RawObject } from '../../storage/ObjectStore.js';
import type { DocumentStore } from '../../storage/DocumentStore.js';
import { pendingKeys } from '../../storage/objectKeys.js';
import type { ArchiveMode } from '../../config/env.js';
import type { EventKind, IngestedRecord, ObjectOutcome, RunSummary } from '../../types/ingestion.js';
import {
  ArchiveFailureError,
  ObjectNotFoundError,
  StoreUnavailableError,
  describeError,
  errorCodeOf,
} from '../../types/errors.js';
import { classifyEvent } from './EventClassifier.js';
import { buildIngestedRecord, compositeKeyOf, parseEventPayload } from './eventRecord.js';
import { forEachBounded } from '../../utils/concurrency.js';
import { logger } from '../../utils/logger.js';
import {
  ingestionArchiveFailures,
  ingestionObjects,
  ingestionRunDuration,
} from '../../utils/metrics.js';

/**
 * Configuration for IngestionEngine
 */
export interface IngestionEngineConfig {
  sourcePrefix: string;
  successPrefix: string;
  errorPrefix: string;
  keySuffix: string;
  /** Deployment stage stamped on records and part of their identity */
  stage: string;
  collections: Record<EventKind, string>;
  concurrency: number;
  archiveMode: ArchiveMode;
}

export interface IngestionEngineOptions {
  /** Clock for `ingested_at`; defaults to the system clock */
  now?: () => Date;
}

type ArchiveDestination = 'success' | 'error';

export class IngestionEngine {
  private readonly now: () => Date;

  constructor(
    private readonly objectStore: ObjectStore,
    private readonly documentStore: DocumentStore,
    private readonly config: IngestionEngineConfig,
    options: IngestionEngineOptions = {}
  ) {
    if (!(Number.isInteger(config.concurrency) && config.concurrency > 0)) {
      throw new RangeError(`IngestionEngine concurrency must be a positive integer, got ${config.concurrency}`);
    }
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Run once over every pending object under the source prefix
   *
   * @param signal - Once aborted, no new objects are started; in-flight ones finish
   * @throws {StoreUnavailableError} If the document store cannot be reached
   * @throws If the listing itself fails
   */
  async run(signal?: AbortSignal): Promise<RunSummary> {
    const startedAt = Date.now();
    const summary: RunSummary = { succeeded: 0, failed: 0, skipped: 0 };

    logger.info({ prefix: this.config.sourcePrefix }, 'Starting ingestion run');

    const keys = pendingKeys(this.objectStore.list(this.config.sourcePrefix), {
      suffix: this.config.keySuffix,
      archivePrefixes: [this.config.successPrefix, this.config.errorPrefix],
    });

    try {
      await forEachBounded(
        keys,
        this.config.concurrency,
        async (key) => {
          const outcome = await this.processObject(key);
          summary[outcome.status] += 1;
          ingestionObjects.inc({ outcome: outcome.status });
        },
        signal
      );
    } catch (error) {
      const durationMs = Date.now() - startedAt;
      ingestionRunDuration.observe({ status: 'aborted' }, durationMs / 1000);
      logger.error({ err: error, ...summary, durationMs }, 'Ingestion run aborted');
      throw error;
    }

    const durationMs = Date.now() - startedAt;
    ingestionRunDuration.observe({ status: signal?.aborted ? 'cancelled' : 'completed' }, durationMs / 1000);
    logger.info(
      { ...summary, durationMs, cancelled: signal?.aborted ?? false },
      'Ingestion run completed'
    );

    return summary;
  }

  /**
   * Process a single object through to its archive decision
   *
   * @throws {StoreUnavailableError} The object is left in place for the next run
   */
  private async processObject(key: string): Promise<ObjectOutcome> {
    let raw: RawObject;
    try {
      raw = await this.objectStore.fetch(key);
    } catch (error) {
      if (error instanceof ObjectNotFoundError) {
        logger.info({ key }, 'Object vanished before fetch, skipping');
        return { status: 'skipped', reason: error.message };
      }
      return this.reject(key, error);
    }

    let collection: string;
    let record: IngestedRecord;
    try {
      const event = parseEventPayload(raw);
      const kind = classifyEvent(event.payload);
      collection = this.config.collections[kind];
      record = buildIngestedRecord(event, kind, {
        sourceKey: key,
        stage: this.config.stage,
        ingestedAt: this.now(),
      });
    } catch (error) {
      return this.reject(key, error);
    }

    const result = await this.documentStore.upsert(collection, compositeKeyOf(record), record);
    if (!result.ok) {
      if (result.error.unreachable) {
        throw new StoreUnavailableError(`Document store unreachable while ingesting '${key}'`, { cause: result.error });
      }
      return this.reject(key, result.error);
    }

    logger.debug({ key, collection, outcome: result.outcome, tipoEvento: record.tipoEvento }, 'Event stored');
    await this.archive(key, 'success');
    return { status: 'succeeded' };
  }

  private async reject(key: string, error: unknown): Promise<ObjectOutcome> {
    const reason = describeError(error);
    logger.error({ key, reason, code: errorCodeOf(error) }, 'Failed to ingest object');
    await this.archive(key, 'error');
    return { status: 'failed', reason };
  }

  /**
   * Relocate an object after its own outcome is known. Never throws: an
   * object that cannot be relocated stays where it is and is retried next run.
   */
  private async archive(key: string, destination: ArchiveDestination): Promise<void> {
    try {
      if (destination === 'success' && this.config.archiveMode === 'delete') {
        await this.objectStore.delete(key);
        logger.debug({ key }, 'Deleted ingested object');
        return;
      }
      const prefix = destination === 'success' ? this.config.successPrefix : this.config.errorPrefix;
      const destinationKey = await this.objectStore.move(key, prefix);
      logger.debug({ key, destinationKey, destination }, 'Archived object');
    } catch (error) {
      const phase = error instanceof ArchiveFailureError ? error.phase : 'copy';
      const duplicated = error instanceof ArchiveFailureError && error.duplicated;
      ingestionArchiveFailures.inc({ destination, phase });
      logger.warn(
        {
          key,
          reason: describeError(error),
          destination,
          phase,
          duplicated,
          destinationKey: error instanceof ArchiveFailureError ? error.destinationKey : undefined,
        },
        'Could not archive object; leaving it in place for the next run'
      );
    }
  }
}
