import type { CompositeKeyFilter, IngestedRecord } from '../types/ingestion.js';
import type { PersistenceFailureError } from '../types/errors.js';

export type UpsertResult =
  | { ok: true; outcome: 'inserted' | 'replaced' }
  | { ok: false; error: PersistenceFailureError };

/**
 * DocumentStore interface
 *
 * `upsert` is a full replace keyed by the composite filter: it inserts when
 * no document matches and otherwise replaces the match in place. It never
 * merges fields and never creates a second document for the same key.
 * Failures are returned, not thrown.
 */
export interface DocumentStore {
  upsert(collectionName: string, filter: CompositeKeyFilter, document: IngestedRecord): Promise<UpsertResult>;
}
