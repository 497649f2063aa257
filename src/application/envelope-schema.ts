import { z } from 'zod';
import { isPartitionable, uuidv7 } from '../domain/index.js';
import type { EnvelopeKind } from '../domain/index.js';
import { EnvelopeValidationError } from './errors.js';

const timestampValue = z.union([z.number(), z.string(), z.date()]);

/**
 * Logical envelope accepted by the gate.
 *
 * Aliases from older producers (`id`, `context_type`, `content_text`,
 * `content_bytes`, `blob_ext`, `content_ext`) are accepted beside the
 * canonical names. Everything except structure is optional: a missing id
 * or timestamp is synthesized, never a reason to reject.
 */
export const envelopeInputSchema = z.object({
  kind: z.enum(['event', 'metadata']).optional(),
  object_id: z.string().min(1).optional(),
  id: z.string().min(1).optional(),
  timestamp: timestampValue.optional(),
  create_time: timestampValue.optional(),
  source: z.string().optional(),
  context_type: z.string().optional(),
  content_format: z.enum(['text', 'image', 'file']).optional(),
  content: z.unknown().optional(),
  content_text: z.unknown().optional(),
  blob_bytes: z.instanceof(Uint8Array).optional(),
  content_bytes: z.instanceof(Uint8Array).optional(),
  blob_extension: z.string().optional(),
  blob_ext: z.string().optional(),
  content_ext: z.string().optional(),
  device_id: z.string().optional(),
  event_type: z.string().optional(),
  additional_info: z.record(z.string(), z.unknown()).optional(),
});

export type EnvelopeInput = z.input<typeof envelopeInputSchema>;

/** An envelope with id, time and content settled, waiting in the gate's queue. */
export interface PreparedEnvelope {
  readonly kind: EnvelopeKind;
  readonly id: string;
  readonly timestamp: number;
  readonly source: string | null;
  readonly content: string;
  readonly blobBytes?: Uint8Array;
  readonly blobExtension?: string;
}

const NUMERIC_RE = /^-?\d+(\.\d+)?$/;
const HAS_TIME_RE = /T\d{2}:\d{2}/;
const HAS_ZONE_RE = /(Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Converts a timestamp-ish value to seconds since epoch.
 * Numbers are seconds; ISO strings without a zone are read as UTC.
 * Returns undefined when the value cannot be interpreted.
 */
export function toEpochSeconds(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (value instanceof Date) {
    const ms = value.getTime();
    return Number.isFinite(ms) ? ms / 1000 : undefined;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '') return undefined;
    if (NUMERIC_RE.test(trimmed)) return Number.parseFloat(trimmed);
    const iso = HAS_TIME_RE.test(trimmed) && !HAS_ZONE_RE.test(trimmed) ? `${trimmed}Z` : trimmed;
    const ms = Date.parse(iso);
    return Number.isFinite(ms) ? ms / 1000 : undefined;
  }
  return undefined;
}

/** Textual body for the record. Bytes never get here. */
export function serializeContent(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/**
 * Validates and normalizes one envelope.
 *
 * id: object_id → id → new UUIDv7.
 * time: timestamp → create_time → now; rejected outside years 1000-9999.
 * A metadata envelope without a source is filed under `metadata`.
 */
export function prepareEnvelope(raw: unknown, nowMs: number = Date.now()): PreparedEnvelope {
  const parsed = envelopeInputSchema.safeParse(raw);
  if (!parsed.success) {
    throw new EnvelopeValidationError('Envelope failed validation', parsed.error.issues);
  }
  const input = parsed.data;

  const kind: EnvelopeKind = input.kind ?? 'event';
  const id = input.object_id ?? input.id ?? uuidv7(nowMs);
  const timestamp = toEpochSeconds(input.timestamp) ?? toEpochSeconds(input.create_time) ?? nowMs / 1000;
  if (!isPartitionable(timestamp)) {
    throw new EnvelopeValidationError(`Envelope timestamp ${timestamp} is outside years 1000-9999`);
  }
  const source = input.source ?? input.context_type ?? (kind === 'metadata' ? 'metadata' : null);

  const body = input.content !== undefined ? input.content : input.content_text;
  let blobBytes = input.blob_bytes ?? input.content_bytes;
  let content: string;
  if (body instanceof Uint8Array) {
    blobBytes = blobBytes ?? body;
    content = '';
  } else {
    try {
      content = serializeContent(body);
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new EnvelopeValidationError(`Envelope content is not serializable: ${reason}`);
    }
  }

  const blobExtension = input.blob_extension ?? input.blob_ext ?? input.content_ext;

  return {
    kind,
    id,
    timestamp,
    source,
    content,
    ...(blobBytes !== undefined ? { blobBytes } : {}),
    ...(blobExtension !== undefined ? { blobExtension } : {}),
  };
}
