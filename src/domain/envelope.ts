/**
 * Core domain types for the chronicle event model.
 *
 * These types describe a captured sample as it flows from a sensor,
 * through the gate, into a partition. They carry no framework dependencies.
 */

/** Producer categories known to the pipeline. */
export const SENSOR_SOURCES = [
  'input_metric',
  'window_focus',
  'desktop_snapshot',
  'clipboard_update',
  'system_lifecycle',
  'file_mutation',
  'media_status',
] as const;

export type SensorSource = (typeof SENSOR_SOURCES)[number];

export type ContentFormat = 'text' | 'image' | 'file';

/**
 * Envelope kind, decided once at ingestion.
 *
 * `event` is a producer sample; `metadata` annotates the pipeline itself
 * (sensor started, restart abandoned, ...). Reads never branch on it.
 */
export type EnvelopeKind = 'event' | 'metadata';

/** Free-form attributes carried beside the payload. */
export type AdditionalInfo = Record<string, unknown>;

interface EnvelopeBase {
  /** Time-ordered unique id, assigned once at capture time. */
  readonly object_id: string;
  readonly source: string;
  readonly content_format: ContentFormat;
  readonly content: unknown;
  /** Capture time, seconds since epoch. */
  readonly create_time: number;
  readonly blob_bytes?: Uint8Array;
  readonly blob_extension?: string;
  readonly additional_info?: AdditionalInfo;
}

export interface EventEnvelope extends EnvelopeBase {
  readonly kind: 'event';
  readonly device_id: string;
  readonly event_type: string;
}

export interface MetadataEnvelope extends EnvelopeBase {
  readonly kind: 'metadata';
}

export type Envelope = EventEnvelope | MetadataEnvelope;

/**
 * Persisted form of an envelope.
 *
 * `blob_path` is relative to the store root and null when the envelope
 * carried no binary payload.
 */
export interface ChronicleRecord {
  readonly id: string;
  readonly timestamp: number;
  readonly source: string | null;
  readonly content: string;
  readonly blob_path: string | null;
}
