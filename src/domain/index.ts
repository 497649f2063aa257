export type {
  AdditionalInfo,
  ChronicleRecord,
  ContentFormat,
  Envelope,
  EnvelopeKind,
  EventEnvelope,
  MetadataEnvelope,
  SensorSource,
} from './envelope.js';
export { SENSOR_SOURCES } from './envelope.js';
export { uuidv7, isUuidV7, uuidv7Timestamp } from './object-id.js';
export { buildEventEnvelope, buildMetadataEnvelope, systemClock } from './envelope-builder.js';
export type { EnvelopeClock, EventEnvelopeInput } from './envelope-builder.js';
export {
  blobFileStem,
  isPartitionable,
  monthKeyOf,
  monthsInRange,
  partitionFileName,
  partitionPathFor,
  partitionPathsInRange,
  resolveBlobPath,
  resolvePartitionPath,
  sanitizeExtension,
  BLOB_DIR_NAME,
  DEFAULT_BLOB_EXTENSION,
  EARLIEST_PARTITION_SECONDS,
  LATEST_PARTITION_SECONDS,
} from './partition.js';
export type { BlobLocation, MonthKey } from './partition.js';
export type {
  EnvelopeSink,
  SensorAdapter,
  SensorConfig,
  SensorHealth,
  SensorNode,
  SensorStatus,
} from './sensor.js';
