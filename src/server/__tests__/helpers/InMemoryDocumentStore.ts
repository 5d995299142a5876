import type { DocumentStore, UpsertResult } from '../../storage/DocumentStore.js';
import type { CompositeKeyFilter, IngestedRecord } from '../../types/ingestion.js';
import { PersistenceFailureError } from '../../types/errors.js';

export interface UpsertCall {
  collection: string;
  filter: CompositeKeyFilter;
  result: UpsertResult;
}

/**
 * In-process DocumentStore with full-replace upsert semantics keyed by the
 * composite key
 */
export class InMemoryDocumentStore implements DocumentStore {
  private readonly collections = new Map<string, Map<string, IngestedRecord>>();
  readonly calls: UpsertCall[] = [];
  /** Every upsert fails as a connectivity failure */
  unreachable = false;
  /** idlpn values whose writes the store rejects */
  readonly rejectIdlpns = new Set<string>();

  async upsert(collectionName: string, filter: CompositeKeyFilter, document: IngestedRecord): Promise<UpsertResult> {
    const result = this.apply(collectionName, filter, document);
    this.calls.push({ collection: collectionName, filter, result });
    return result;
  }

  documents(collectionName: string): IngestedRecord[] {
    return [...(this.collections.get(collectionName)?.values() ?? [])];
  }

  private apply(collectionName: string, filter: CompositeKeyFilter, document: IngestedRecord): UpsertResult {
    if (this.unreachable) {
      return { ok: false, error: new PersistenceFailureError(collectionName, 'connection refused', true) };
    }
    if (this.rejectIdlpns.has(String(filter.idlpn))) {
      return { ok: false, error: new PersistenceFailureError(collectionName, 'document failed validation', false) };
    }

    const collection = this.collections.get(collectionName) ?? new Map<string, IngestedRecord>();
    this.collections.set(collectionName, collection);

    const id = JSON.stringify([filter.stage, filter.work_order, filter.document_number, filter.idlpn]);
    const existed = collection.has(id);
    collection.set(id, structuredClone(document));
    return { ok: true, outcome: existed ? 'replaced' : 'inserted' };
  }
}
