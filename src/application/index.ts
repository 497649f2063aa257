export {
  ChronicleError,
  ConfigurationError,
  EnvelopeValidationError,
  GateClosedError,
  PartitionCommitError,
  SensorConfigError,
  SensorNotFoundError,
  SensorRegistrationError,
  errorMessage,
} from './errors.js';
export { envelopeInputSchema, prepareEnvelope, serializeContent, toEpochSeconds } from './envelope-schema.js';
export type { EnvelopeInput, PreparedEnvelope } from './envelope-schema.js';
export { WorkQueue } from './work-queue.js';
export { ChronicleGate, GATE_DEFAULTS } from './chronicle-gate.js';
export type {
  AppendReceipt,
  BatchSummary,
  ChronicleGateEvents,
  ChronicleGateOptions,
  DeadLetterNotice,
  GateStats,
  GateState,
  PartitionFailure,
} from './chronicle-gate.js';
export { SensorRegistry, isPlainObject, normalizeSensorType } from './sensor-registry.js';
export type { CreateSensorOptions, RegisteredSensor, SensorFactory } from './sensor-registry.js';
export { SensorEventHub } from './sensor-event-hub.js';
export type { LogEvent, SensorErrorEvent, SensorFeed, SensorFeeds, SensorStatusEvent } from './sensor-event-hub.js';
export { SensorManager, LIFECYCLE_SOURCE, MAX_RESTART_BACKOFF_MS } from './sensor-manager.js';
export type { ChronicleSink, HealthAction, HealthReport, SensorManagerOptions } from './sensor-manager.js';
export { bulkAction, listSensors, registerSensor, toggleSensor, unregisterSensor } from './sensor-control.js';
export type { RegisterSensorCommand, SensorActionResult } from './sensor-control.js';
export {
  DEFAULT_SENSOR_DOCUMENT,
  MISSING_SCRIPT_COOLDOWN_MS,
  MissingScriptLog,
  SENSOR_CONFIG_SCHEMA_VERSION,
  filterSensorEntries,
  parseSensorDocument,
} from './sensor-config.js';
export type { FilterSensorEntriesDeps, SensorDocument, SensorEntry } from './sensor-config.js';
export { getRecord, listRecords } from './chronicle-query.js';
export type { ListRecordsParams, RecordPage } from './chronicle-query.js';
export {
  bulkActionSchema,
  httpEnvelopeBatchSchema,
  httpEnvelopeSchema,
  registerSensorSchema,
  toEnvelopeInput,
  toggleSensorSchema,
} from './control-schema.js';
export type { HttpEnvelope } from './control-schema.js';
