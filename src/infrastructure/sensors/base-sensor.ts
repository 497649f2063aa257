import type { Logger } from 'pino';
import { buildEventEnvelope, systemClock } from '../../domain/index.js';
import type {
  ContentFormat,
  EnvelopeClock,
  EnvelopeSink,
  EventEnvelope,
  SensorAdapter,
  SensorConfig,
  SensorHealth,
} from '../../domain/index.js';
import { errorMessage } from '../../application/errors.js';
import { resolveDeviceId, UNKNOWN_DEVICE } from './device-id.js';

export const DEFAULT_CAPTURE_INTERVAL_SECONDS = 1;

export interface BaseSensorOptions {
  readonly name: string;
  readonly description: string;
  readonly source: string;
  readonly eventType: string;
  readonly contentFormat?: ContentFormat;
  readonly log: Logger;
  readonly clock?: EnvelopeClock;
}

/**
 * Shared adapter machinery: device identity, the sampling loop and
 * capture isolation. Subclasses supply `initSensor` and `collect`.
 *
 * While running, the loop calls `capture()` every `capture_interval`
 * seconds and hands any envelopes to the bound sink. A throwing
 * `collect` is counted and logged; the loop keeps going.
 */
export abstract class BaseSensor implements SensorAdapter {
  readonly name: string;
  readonly description: string;
  readonly source: string;

  protected readonly log: Logger;
  protected deviceId = UNKNOWN_DEVICE;
  protected captureIntervalMs = DEFAULT_CAPTURE_INTERVAL_SECONDS * 1000;

  private readonly eventType: string;
  private readonly contentFormat: ContentFormat;
  private readonly clock: EnvelopeClock;
  private sink: EnvelopeSink | null = null;
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private lastError: string | null = null;
  private errorCount = 0;

  protected constructor(options: BaseSensorOptions) {
    this.name = options.name;
    this.description = options.description;
    this.source = options.source;
    this.eventType = options.eventType;
    this.contentFormat = options.contentFormat ?? 'text';
    this.log = options.log.child({ component: options.source });
    this.clock = options.clock ?? systemClock;
  }

  /** Producer hook: prepare resources, return false to refuse registration. */
  protected abstract initSensor(config: SensorConfig): boolean;

  /** Producer hook: whatever is ready right now, possibly nothing. */
  protected abstract collect(): unknown[];

  protected startSensor(): boolean {
    return true;
  }

  protected stopSensor(_graceful: boolean): boolean {
    return true;
  }

  initialize(config: SensorConfig): boolean {
    try {
      this.deviceId = resolveDeviceId(config['device_id']);
      const interval = config['capture_interval'];
      if (typeof interval === 'number' && Number.isFinite(interval) && interval > 0) {
        this.captureIntervalMs = interval * 1000;
      }
      const ok = this.initSensor(config);
      this.log.info({ deviceId: this.deviceId, intervalMs: this.captureIntervalMs, ok }, 'Sensor initialized');
      return ok;
    } catch (err: unknown) {
      this.recordError(err, 'initialize');
      return false;
    }
  }

  start(): boolean {
    if (this.running) return true;
    try {
      if (!this.startSensor()) return false;
    } catch (err: unknown) {
      this.recordError(err, 'start');
      return false;
    }

    this.running = true;
    this.timer = setInterval(() => this.tick(), this.captureIntervalMs);
    this.timer.unref();
    return true;
  }

  stop(graceful = true): boolean {
    if (!this.running) return true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.running = false;
    try {
      return this.stopSensor(graceful);
    } catch (err: unknown) {
      this.recordError(err, 'stop');
      return false;
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  capture(): EventEnvelope[] {
    let payloads: unknown[];
    try {
      payloads = this.collect();
    } catch (err: unknown) {
      this.recordError(err, 'capture');
      return [];
    }
    return payloads.map((payload) =>
      buildEventEnvelope(
        {
          source: this.source,
          eventType: this.eventType,
          deviceId: this.deviceId,
          payload,
          contentFormat: this.contentFormat,
        },
        this.clock,
      ),
    );
  }

  health(): SensorHealth {
    return { running: this.running, lastError: this.lastError, errorCount: this.errorCount };
  }

  bindSink(sink: EnvelopeSink | null): void {
    this.sink = sink;
  }

  private tick(): void {
    const envelopes = this.capture();
    const sink = this.sink;
    if (envelopes.length === 0 || !sink) return;
    void sink(envelopes).catch((err: unknown) => {
      this.recordError(err, 'deliver');
    });
  }

  protected recordError(err: unknown, operation: string): void {
    this.errorCount += 1;
    this.lastError = errorMessage(err);
    this.log.error({ err, operation, errorCount: this.errorCount }, 'Sensor operation failed');
  }
}
