export { loadAppConfig, loadSensorDocument, DEFAULT_SENSOR_CONFIG_PATH } from './config/index.js';
export type { AppConfig, LogLevel, SensorDocumentSource } from './config/index.js';
export { createLogger, LogFeed, SERVICE_NAME, toLogEvent } from './logging/index.js';
export type { AppLogger, LogEventSink } from './logging/index.js';
export { runtimePlugin } from './runtime/index.js';
export type { RuntimePluginOptions } from './runtime/index.js';
export { registerBuiltinSensors, resolveDeviceId } from './sensors/index.js';
export { BlobStore, DEAD_LETTER_DIR, PartitionCache } from './storage/index.js';
