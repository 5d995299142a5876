/**
 * Domain types of the ingestion pipeline
 */

export const EVENT_KINDS = ['DECLARE_PT', 'CONSUMIR_VASOT'] as const;

/**
 * Business classification of an ingested event
 */
export type EventKind = (typeof EVENT_KINDS)[number];

/**
 * Value of a composite key field, stored exactly as the platform sent it
 */
export type KeyFieldValue = string | number;

/**
 * Fields every platform event must carry
 */
export interface EventKeyFields {
  work_order: KeyFieldValue;
  document_number: KeyFieldValue;
  idlpn: KeyFieldValue;
}

/**
 * A decoded payload: the required fields plus the whole payload as an open
 * mapping, so nothing the platform sends is lost.
 */
export interface ParsedEvent {
  key: EventKeyFields;
  payload: Record<string, unknown>;
}

/**
 * Identity of a stored record
 */
export interface CompositeKeyFilter extends EventKeyFields {
  stage: string;
}

/**
 * Document persisted per event: payload passthrough plus provenance stamps
 */
export interface IngestedRecord extends CompositeKeyFilter {
  [field: string]: unknown;
  source_s3_key: string;
  ingested_at: Date;
  tipoEvento: EventKind;
}

export type ObjectOutcome =
  | { status: 'succeeded' }
  | { status: 'failed'; reason: string }
  | { status: 'skipped'; reason: string };

/**
 * Per-run counts, logged and returned by each run
 */
export interface RunSummary {
  succeeded: number;
  failed: number;
  skipped: number;
}
