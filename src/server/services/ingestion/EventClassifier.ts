import type { EventKind } from '../../types/ingestion.js';
import { UnclassifiableEventError } from '../../types/errors.js';

/**
 * Payload fields that name the event kind, in lookup order
 */
export const DISCRIMINATOR_FIELDS = ['tipoEvento', 'tipo_evento', 'eventType'] as const;

const KIND_ALIASES: Record<string, EventKind> = {
  DECLARE_PT: 'DECLARE_PT',
  DECLAREPT: 'DECLARE_PT',
  CONSUMIR_VASOT: 'CONSUMIR_VASOT',
  CONSUMIRVASOT: 'CONSUMIR_VASOT',
};

function normalizeDiscriminator(value: string): string {
  return value.trim().toUpperCase().replace(/[^A-Z0-9]+/g, '_').replace(/^_+|_+$/g, '');
}

/**
 * Map a parsed payload to exactly one event kind.
 *
 * The first discriminator field present decides. A payload without any
 * discriminator is a production declaration: the platform only tags
 * consumption events explicitly.
 *
 * @throws {UnclassifiableEventError} If a discriminator is present but matches no kind
 */
export function classifyEvent(payload: Record<string, unknown>): EventKind {
  for (const field of DISCRIMINATOR_FIELDS) {
    if (!(field in payload) || payload[field] === undefined || payload[field] === null) {
      continue;
    }
    const value = payload[field];
    const kind = typeof value === 'string' ? KIND_ALIASES[normalizeDiscriminator(value)] : undefined;
    if (!kind) {
      throw new UnclassifiableEventError(field, value);
    }
    return kind;
  }
  return 'DECLARE_PT';
}
