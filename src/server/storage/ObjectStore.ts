/**
 * ObjectStore Interface
 *
 * The slice of an object store the ingestion pipeline needs: lazy listing,
 * fetch, and relocation between prefixes.
 */

/**
 * An object read during a run. Never outlives the run.
 */
export interface RawObject {
  key: string;
  bytes: Buffer;
  fetchedAt: Date;
}

/**
 * ObjectStore interface
 *
 * Implementations must:
 * - Stream listings page by page (never materialize the whole listing)
 * - Throw ObjectNotFoundError from fetch when the key no longer exists
 * - Implement move as copy-then-delete, throwing ArchiveFailureError with the
 *   failed phase; a failed delete leaves the object under both prefixes
 */
export interface ObjectStore {
  /**
   * List keys under a prefix. Each call starts a fresh, finite listing.
   */
  list(prefix: string): AsyncIterable<string>;

  /**
   * @throws {ObjectNotFoundError} If the key vanished since it was listed
   */
  fetch(key: string): Promise<RawObject>;

  /**
   * Copy the object below `destPrefix` (keeping its path relative to the
   * store's root prefix), then delete the source.
   *
   * @returns The destination key
   * @throws {ArchiveFailureError} If either phase fails
   */
  move(sourceKey: string, destPrefix: string): Promise<string>;

  /**
   * @throws {ArchiveFailureError} If the delete fails
   */
  delete(key: string): Promise<void>;
}
