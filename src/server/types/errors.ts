/**
 * Error hierarchy for the ingestion pipeline.
 *
 * Per-object errors (not found, malformed, unclassifiable, persistence, archive)
 * are resolved by the engine into an archive decision. Only run-level errors
 * (store unavailable, listing failures) reach the scheduler.
 */

/**
 * Error code enumeration for consistent error handling
 */
export enum ErrorCode {
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  OBJECT_NOT_FOUND = 'OBJECT_NOT_FOUND',
  MALFORMED_PAYLOAD = 'MALFORMED_PAYLOAD',
  UNCLASSIFIABLE_EVENT = 'UNCLASSIFIABLE_EVENT',
  PERSISTENCE_FAILURE = 'PERSISTENCE_FAILURE',
  STORE_UNAVAILABLE = 'STORE_UNAVAILABLE',
  ARCHIVE_FAILURE = 'ARCHIVE_FAILURE',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Base error class for all pipeline errors
 */
export class IngestionError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigurationError extends IngestionError {
  public readonly problems: string[];

  constructor(problems: string[]) {
    super(
      `Invalid configuration:\n${problems.map(p => `  - ${p}`).join('\n')}`,
      ErrorCode.CONFIGURATION_ERROR,
      { problems }
    );
    this.problems = problems;
  }
}

/**
 * The object disappeared between listing and fetching (an external writer
 * or a concurrent archive moved it).
 */
export class ObjectNotFoundError extends IngestionError {
  constructor(public readonly key: string, options?: { cause?: unknown }) {
    super(`Object '${key}' not found`, ErrorCode.OBJECT_NOT_FOUND, { key }, options);
  }
}

export class MalformedPayloadError extends IngestionError {
  constructor(
    public readonly key: string,
    detail: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(`Malformed payload in '${key}': ${detail}`, ErrorCode.MALFORMED_PAYLOAD, { key, ...context }, options);
  }
}

export class UnclassifiableEventError extends IngestionError {
  constructor(public readonly discriminator: string, public readonly value: unknown) {
    super(
      `Cannot classify event: ${discriminator}=${JSON.stringify(value)} matches no known event kind`,
      ErrorCode.UNCLASSIFIABLE_EVENT,
      { discriminator, value }
    );
  }
}

/**
 * The document store rejected a write, or could not be reached at all.
 * `unreachable` separates the two: a rejected record goes to the error
 * archive, an unreachable store aborts the run.
 */
export class PersistenceFailureError extends IngestionError {
  constructor(
    public readonly collection: string,
    detail: string,
    public readonly unreachable: boolean,
    options?: { cause?: unknown }
  ) {
    super(
      `Upsert into '${collection}' failed: ${detail}`,
      ErrorCode.PERSISTENCE_FAILURE,
      { collection, unreachable },
      options
    );
  }
}

export class StoreUnavailableError extends IngestionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ErrorCode.STORE_UNAVAILABLE, undefined, options);
  }
}

export type ArchivePhase = 'copy' | 'delete';

/**
 * A move (copy then delete) or a delete failed. After a failed `delete` phase
 * of a move, the object exists under both prefixes.
 */
export class ArchiveFailureError extends IngestionError {
  public readonly duplicated: boolean;

  constructor(
    public readonly key: string,
    public readonly destinationKey: string | null,
    public readonly phase: ArchivePhase,
    options?: { cause?: unknown }
  ) {
    const duplicated = phase === 'delete' && destinationKey !== null;
    super(
      duplicated
        ? `Copied '${key}' to '${destinationKey}' but could not delete the source`
        : `Could not ${phase} '${key}'`,
      ErrorCode.ARCHIVE_FAILURE,
      { key, destinationKey, phase, duplicated },
      options
    );
    this.duplicated = duplicated;
  }
}

/**
 * Type guard to check if error is an IngestionError
 */
export function isIngestionError(error: unknown): error is IngestionError {
  return error instanceof IngestionError;
}

/**
 * Message of any thrown value, with the cause appended when there is one
 */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  if (error.cause instanceof Error && !error.message.includes(error.cause.message)) {
    return `${error.message} (${error.cause.message})`;
  }
  return error.message;
}

export function errorCodeOf(error: unknown): ErrorCode {
  return isIngestionError(error) ? error.code : ErrorCode.INTERNAL_ERROR;
}
