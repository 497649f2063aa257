import type { Logger } from 'pino';
import type { EnvelopeClock, SensorConfig } from '../../domain/index.js';
import { BaseSensor } from './base-sensor.js';

export interface HeartbeatSensorOptions {
  readonly log: Logger;
  readonly clock?: EnvelopeClock;
  readonly uptime?: () => number;
}

/** Periodic liveness marker for the capture process itself. */
export class HeartbeatSensor extends BaseSensor {
  private readonly uptime: () => number;

  constructor(options: HeartbeatSensorOptions) {
    super({
      name: 'HeartbeatSensor',
      description: 'Periodic liveness marker of the capture process',
      source: 'system_lifecycle',
      eventType: 'heartbeat',
      log: options.log,
      ...(options.clock ? { clock: options.clock } : {}),
    });
    this.uptime = options.uptime ?? (() => process.uptime());
  }

  protected initSensor(_config: SensorConfig): boolean {
    return true;
  }

  protected collect(): unknown[] {
    return [{ event: 'heartbeat', pid: process.pid, uptime_seconds: Math.round(this.uptime()) }];
  }
}
