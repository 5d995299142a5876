import { z } from 'zod';
import type { RawObject } from '../../storage/ObjectStore.js';
import type {
  CompositeKeyFilter,
  EventKind,
  IngestedRecord,
  ParsedEvent,
} from '../../types/ingestion.js';
import { MalformedPayloadError } from '../../types/errors.js';

const keyFieldSchema = z.union([
  z.string().refine(value => value.trim().length > 0, 'must not be blank'),
  z.number().finite(),
]);

/**
 * Only the composite key fields are validated; everything else passes through
 */
export const eventKeySchema = z.object({
  work_order: keyFieldSchema,
  document_number: keyFieldSchema,
  idlpn: keyFieldSchema,
});

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Decode an object's bytes into a ParsedEvent
 *
 * @throws {MalformedPayloadError} On invalid JSON, a non-object document, or missing key fields
 */
export function parseEventPayload(raw: RawObject): ParsedEvent {
  const text = raw.bytes.toString('utf8').replace(/^\uFEFF/, '');

  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch (error) {
    throw new MalformedPayloadError(
      raw.key,
      `invalid JSON (${error instanceof Error ? error.message : String(error)})`,
      undefined,
      { cause: error }
    );
  }

  if (!isPlainObject(decoded)) {
    throw new MalformedPayloadError(raw.key, 'top-level value must be a JSON object');
  }

  const result = eventKeySchema.safeParse(decoded);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new MalformedPayloadError(raw.key, issues.join('; '), { issues });
  }

  return {
    key: result.data,
    payload: decoded,
  };
}

export interface RecordStamp {
  sourceKey: string;
  stage: string;
  ingestedAt: Date;
}

/**
 * Build the stored document: payload fields, then the key fields, then the
 * pipeline's own stamps (which win over payload fields of the same name).
 */
export function buildIngestedRecord(event: ParsedEvent, kind: EventKind, stamp: RecordStamp): IngestedRecord {
  return {
    ...event.payload,
    ...event.key,
    source_s3_key: stamp.sourceKey,
    ingested_at: stamp.ingestedAt,
    tipoEvento: kind,
    stage: stamp.stage,
  };
}

export function compositeKeyOf(record: IngestedRecord): CompositeKeyFilter {
  return {
    stage: record.stage,
    work_order: record.work_order,
    document_number: record.document_number,
    idlpn: record.idlpn,
  };
}
