import type { Logger } from 'pino';
import type { SensorRegistry } from '../../application/sensor-registry.js';
import { HeartbeatSensor } from './heartbeat.js';
import { WindowFocusSensor } from './window-focus.js';

export { BaseSensor, DEFAULT_CAPTURE_INTERVAL_SECONDS } from './base-sensor.js';
export type { BaseSensorOptions } from './base-sensor.js';
export { hardwareDeviceId, resolveDeviceId, UNKNOWN_DEVICE } from './device-id.js';
export {
  WindowFocusSensor,
  platformWindowProbe,
  stubWindowProbe,
  xdotoolWindowProbe,
} from './window-focus.js';
export type { ForegroundWindow, ForegroundWindowProbe, WindowFocusSensorOptions } from './window-focus.js';
export { HeartbeatSensor } from './heartbeat.js';
export type { HeartbeatSensorOptions } from './heartbeat.js';

/** Installs the built-in sensor types. */
export function registerBuiltinSensors(registry: SensorRegistry, log: Logger): SensorRegistry {
  return registry
    .registerFactory('window_focus', () => new WindowFocusSensor({ log }))
    .registerFactory('system_lifecycle', () => new HeartbeatSensor({ log }));
}
