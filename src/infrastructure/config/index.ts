export { loadAppConfig } from './config.js';
export type { AppConfig, LogLevel } from './config.js';
export { DEFAULT_SENSOR_CONFIG_PATH, loadSensorDocument } from './sensor-document.js';
export type { SensorDocumentSource } from './sensor-document.js';
