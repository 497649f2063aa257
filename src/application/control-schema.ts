import { z } from 'zod';
import type { EnvelopeInput } from './envelope-schema.js';

export const registerSensorSchema = z.object({
  sensor_type: z.string().trim().min(1),
  sensor_id: z.string().trim().min(1).max(255).optional(),
  config: z.record(z.string(), z.unknown()).optional(),
});

export const toggleSensorSchema = z
  .object({
    enable: z.boolean().optional(),
  })
  .default({});

export const bulkActionSchema = z.object({
  sensor_ids: z.array(z.string().min(1)),
  enable: z.boolean().optional(),
});

const BASE64_RE = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Envelope as it arrives over HTTP. Bytes travel as base64 in
 * `blob_base64`; everything else matches the gate's own input.
 */
export const httpEnvelopeSchema = z.object({
  kind: z.enum(['event', 'metadata']).optional(),
  object_id: z.string().min(1).max(255).optional(),
  timestamp: z.union([z.number(), z.string()]).optional(),
  create_time: z.union([z.number(), z.string()]).optional(),
  source: z.string().min(1).max(255).optional(),
  content_format: z.enum(['text', 'image', 'file']).optional(),
  content: z.unknown().optional(),
  blob_base64: z.string().regex(BASE64_RE, 'Must be base64').optional(),
  blob_ext: z.string().max(16).optional(),
});

export const httpEnvelopeBatchSchema = z.union([
  httpEnvelopeSchema.transform((envelope) => [envelope]),
  z.array(httpEnvelopeSchema).min(1, 'Batch must contain at least one envelope'),
]);

export type HttpEnvelope = z.infer<typeof httpEnvelopeSchema>;

export function toEnvelopeInput(envelope: HttpEnvelope): EnvelopeInput {
  const { blob_base64, ...rest } = envelope;
  return blob_base64 === undefined ? rest : { ...rest, blob_bytes: Buffer.from(blob_base64, 'base64') };
}
