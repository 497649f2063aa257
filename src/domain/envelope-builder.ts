import { uuidv7 } from './object-id.js';
import type {
  AdditionalInfo,
  ContentFormat,
  EventEnvelope,
  MetadataEnvelope,
} from './envelope.js';

/** Clock and id source, injectable so tests can pin them. */
export interface EnvelopeClock {
  nowMs(): number;
  newId(nowMs: number): string;
}

export const systemClock: EnvelopeClock = {
  nowMs: () => Date.now(),
  newId: (nowMs) => uuidv7(nowMs),
};

export interface EventEnvelopeInput {
  source: string;
  eventType: string;
  deviceId: string;
  payload: unknown;
  contentFormat?: ContentFormat;
  blobBytes?: Uint8Array;
  blobExtension?: string;
  additionalInfo?: AdditionalInfo;
}

/**
 * Wraps one producer payload into an event envelope.
 *
 * The id and capture time are taken from the same clock reading, so the
 * id's embedded millisecond and `create_time` never drift apart.
 */
export function buildEventEnvelope(
  input: EventEnvelopeInput,
  clock: EnvelopeClock = systemClock,
): EventEnvelope {
  const nowMs = clock.nowMs();
  return {
    kind: 'event',
    object_id: clock.newId(nowMs),
    source: input.source,
    content_format: input.contentFormat ?? 'text',
    content: input.payload,
    create_time: nowMs / 1000,
    device_id: input.deviceId,
    event_type: input.eventType,
    ...(input.blobBytes !== undefined ? { blob_bytes: input.blobBytes } : {}),
    ...(input.blobExtension !== undefined ? { blob_extension: input.blobExtension } : {}),
    ...(input.additionalInfo !== undefined ? { additional_info: input.additionalInfo } : {}),
  };
}

export function buildMetadataEnvelope(
  source: string,
  attributes: Record<string, unknown>,
  clock: EnvelopeClock = systemClock,
): MetadataEnvelope {
  const nowMs = clock.nowMs();
  return {
    kind: 'metadata',
    object_id: clock.newId(nowMs),
    source,
    content_format: 'text',
    content: attributes,
    create_time: nowMs / 1000,
  };
}
