import type { ObjectStore, RawObject } from '../../storage/ObjectStore.js';
import { archiveKeyFor } from '../../storage/objectKeys.js';
import { ArchiveFailureError, ObjectNotFoundError } from '../../types/errors.js';

/**
 * In-process ObjectStore with switches for the failure modes of a real bucket
 */
export class InMemoryObjectStore implements ObjectStore {
  private readonly objects = new Map<string, Buffer>();
  /** Keys whose copy phase fails */
  readonly failCopy = new Set<string>();
  /** Keys whose delete phase fails (leaving a duplicate after a copy) */
  readonly failDelete = new Set<string>();
  /** Errors thrown by fetch, per key */
  readonly failFetch = new Map<string, Error>();
  /** Error thrown by list before yielding anything */
  failList: Error | null = null;

  constructor(private readonly rootPrefix: string) {}

  put(key: string, body: string | Record<string, unknown>): void {
    const text = typeof body === 'string' ? body : JSON.stringify(body);
    this.objects.set(key, Buffer.from(text, 'utf8'));
  }

  keys(): string[] {
    return [...this.objects.keys()].sort();
  }

  async *list(prefix: string): AsyncGenerator<string> {
    if (this.failList) {
      throw this.failList;
    }
    for (const key of this.keys()) {
      if (key.startsWith(prefix)) {
        yield key;
      }
    }
  }

  async fetch(key: string): Promise<RawObject> {
    const failure = this.failFetch.get(key);
    if (failure) {
      throw failure;
    }
    const bytes = this.objects.get(key);
    if (!bytes) {
      throw new ObjectNotFoundError(key);
    }
    return { key, bytes: Buffer.from(bytes), fetchedAt: new Date() };
  }

  async move(sourceKey: string, destPrefix: string): Promise<string> {
    const destinationKey = archiveKeyFor(sourceKey, this.rootPrefix, destPrefix);
    const bytes = this.objects.get(sourceKey);
    if (!bytes || this.failCopy.has(sourceKey)) {
      throw new ArchiveFailureError(sourceKey, destinationKey, 'copy');
    }
    this.objects.set(destinationKey, Buffer.from(bytes));
    if (this.failDelete.has(sourceKey)) {
      throw new ArchiveFailureError(sourceKey, destinationKey, 'delete');
    }
    this.objects.delete(sourceKey);
    return destinationKey;
  }

  async delete(key: string): Promise<void> {
    if (this.failDelete.has(key)) {
      throw new ArchiveFailureError(key, null, 'delete');
    }
    this.objects.delete(key);
  }
}
