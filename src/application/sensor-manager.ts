import { setTimeout as sleep } from 'node:timers/promises';
import type { Logger } from 'pino';
import { buildMetadataEnvelope } from '../domain/index.js';
import type {
  Envelope,
  EnvelopeClock,
  SensorConfig,
  SensorNode,
} from '../domain/index.js';
import { systemClock } from '../domain/index.js';
import { errorMessage, SensorNotFoundError } from './errors.js';
import type { SensorEventHub } from './sensor-event-hub.js';
import type { CreateSensorOptions, RegisteredSensor, SensorRegistry } from './sensor-registry.js';

/** Where the manager delivers sensor output and its own lifecycle annotations. */
export type ChronicleSink = (envelopes: readonly Envelope[]) => Promise<void>;

export const LIFECYCLE_SOURCE = 'system_lifecycle';
export const MAX_RESTART_BACKOFF_MS = 60_000;

export type HealthAction = 'healthy' | 'restarted' | 'restart_failed' | 'backing_off' | 'restart_abandoned';

export interface HealthReport {
  readonly sensorId: string;
  readonly action: HealthAction;
  readonly attempt: number;
  readonly error?: string;
}

export interface SensorManagerOptions {
  readonly registry: SensorRegistry;
  readonly log: Logger;
  readonly hub?: SensorEventHub | undefined;
  /** 0 keeps restarting forever. */
  readonly maxRestartAttempts?: number;
  readonly restartBackoffMs?: number;
  readonly clock?: EnvelopeClock;
}

interface RestartState {
  attempts: number;
  nextAttemptAt: number;
}

/**
 * Owns the "should this sensor be running" decision.
 *
 * The desired-running set is the source of truth; `checkHealth` restarts
 * any desired sensor found dead, with exponential backoff and an optional
 * attempt ceiling. Lifecycle failures come back as `false` or as a
 * health report, never as a thrown error, so one bad sensor leaves the
 * rest untouched.
 */
export class SensorManager {
  private readonly registry: SensorRegistry;
  private readonly log: Logger;
  private readonly hub: SensorEventHub | undefined;
  private readonly maxRestartAttempts: number;
  private readonly restartBackoffMs: number;
  private readonly clock: EnvelopeClock;

  private readonly desired = new Set<string>();
  private readonly restarts = new Map<string, RestartState>();
  private globalConfig: SensorConfig = {};
  private sink: ChronicleSink | null = null;

  constructor(options: SensorManagerOptions) {
    this.registry = options.registry;
    this.log = options.log.child({ component: 'sensor-manager' });
    this.hub = options.hub;
    this.maxRestartAttempts = Math.max(0, options.maxRestartAttempts ?? 5);
    this.restartBackoffMs = Math.max(0, options.restartBackoffMs ?? 1000);
    this.clock = options.clock ?? systemClock;
  }

  // ── Wiring ──────────────────────────────────────────────

  /** Binds the output sink on every adapter, present and future. */
  bindSink(sink: ChronicleSink | null): void {
    this.sink = sink;
    for (const entry of this.registry.list()) {
      entry.adapter.bindSink(sink);
    }
  }

  /**
   * Re-initializes every adapter with `global` under its own config.
   * Returns the per-sensor initialize outcome.
   */
  applyGlobalConfig(config: SensorConfig): Record<string, boolean> {
    this.globalConfig = { ...config };
    const outcome: Record<string, boolean> = {};
    for (const entry of this.registry.list()) {
      outcome[entry.sensorId] = this.safely(entry.sensorId, 'initialize', () =>
        entry.adapter.initialize({ ...this.globalConfig, ...entry.config }),
      );
    }
    return outcome;
  }

  // ── Registration ────────────────────────────────────────

  registerSensor(type: string, options: CreateSensorOptions = {}): RegisteredSensor {
    const entry = this.registry.create(type, { ...options, defaults: this.globalConfig });
    entry.adapter.bindSink(this.sink);
    this.log.info({ sensorId: entry.sensorId, sensorType: entry.sensorType }, 'Sensor registered');
    this.recordLifecycle('sensor_registered', entry.sensorId, { sensor_type: entry.sensorType });
    this.hub?.publishStatus(entry.sensorId, 'stopped', `Sensor ${entry.sensorId} registered`);
    return entry;
  }

  /** Stops the adapter and forgets it. Returns false for an unknown id. */
  unregisterSensor(sensorId: string): boolean {
    const entry = this.registry.get(sensorId);
    if (!entry) return false;

    this.desired.delete(sensorId);
    this.restarts.delete(sensorId);
    if (entry.adapter.isRunning()) {
      this.safely(sensorId, 'stop', () => entry.adapter.stop(true));
    }
    entry.adapter.bindSink(null);
    this.registry.remove(sensorId);

    this.log.info({ sensorId }, 'Sensor unregistered');
    this.recordLifecycle('sensor_unregistered', sensorId);
    this.hub?.publishStatus(sensorId, 'stopped', `Sensor ${sensorId} unregistered`);
    return true;
  }

  // ── Lifecycle ───────────────────────────────────────────

  /**
   * Marks the sensor desired and starts it. A failed start stays desired,
   * so the health monitor keeps trying.
   */
  startSensor(sensorId: string): boolean {
    const entry = this.registry.require(sensorId);
    this.desired.add(sensorId);
    this.restarts.delete(sensorId);
    if (entry.adapter.isRunning()) return true;
    return this.startEntry(entry, 'sensor_started');
  }

  stopSensor(sensorId: string): boolean {
    const entry = this.registry.require(sensorId);
    this.desired.delete(sensorId);
    this.restarts.delete(sensorId);
    if (!entry.adapter.isRunning()) return true;

    const stopped = this.safely(sensorId, 'stop', () => entry.adapter.stop(true));
    if (stopped) {
      this.log.info({ sensorId }, 'Sensor stopped');
      this.recordLifecycle('sensor_stopped', sensorId);
      this.hub?.publishStatus(sensorId, 'stopped', `Sensor ${sensorId} stopped`);
    }
    return stopped;
  }

  /**
   * Flips the sensor, or forces it to `enable` when given.
   * Returns whether the requested transition succeeded.
   */
  toggleSensor(sensorId: string, enable?: boolean): boolean {
    const entry = this.registry.require(sensorId);
    const target = enable ?? !entry.adapter.isRunning();
    return target ? this.startSensor(sensorId) : this.stopSensor(sensorId);
  }

  startAll(): Record<string, boolean> {
    const outcome: Record<string, boolean> = {};
    for (const entry of this.registry.list()) {
      outcome[entry.sensorId] = this.startSensor(entry.sensorId);
    }
    return outcome;
  }

  /** Stops everything and clears the desired set, whatever it held. */
  stopAll(): Record<string, boolean> {
    this.desired.clear();
    this.restarts.clear();
    const outcome: Record<string, boolean> = {};
    for (const entry of this.registry.list()) {
      outcome[entry.sensorId] = this.stopSensor(entry.sensorId);
    }
    return outcome;
  }

  isDesired(sensorId: string): boolean {
    return this.desired.has(sensorId);
  }

  desiredIds(): string[] {
    return [...this.desired];
  }

  // ── Health ──────────────────────────────────────────────

  /**
   * One reconciliation pass over the desired set.
   * Ids that left the registry are dropped from it.
   */
  checkHealth(): HealthReport[] {
    const reports: HealthReport[] = [];
    const now = this.clock.nowMs();

    for (const sensorId of [...this.desired]) {
      const entry = this.registry.get(sensorId);
      if (!entry) {
        this.desired.delete(sensorId);
        this.restarts.delete(sensorId);
        continue;
      }

      const state = this.restarts.get(sensorId);
      if (entry.adapter.isRunning()) {
        if (state && now >= state.nextAttemptAt) this.restarts.delete(sensorId);
        reports.push({ sensorId, action: 'healthy', attempt: state?.attempts ?? 0 });
        continue;
      }

      const attempts = state?.attempts ?? 0;
      if (state && now < state.nextAttemptAt) {
        reports.push({ sensorId, action: 'backing_off', attempt: attempts });
        continue;
      }

      if (this.maxRestartAttempts > 0 && attempts >= this.maxRestartAttempts) {
        this.desired.delete(sensorId);
        this.restarts.delete(sensorId);
        const message = `Sensor ${sensorId} abandoned after ${attempts} restart attempts`;
        this.log.error({ sensorId, attempts }, 'Sensor restart abandoned');
        this.recordLifecycle('sensor_restart_abandoned', sensorId, { attempts });
        this.hub?.publishError(sensorId, message, 'restart_abandoned', entry.adapter.health().errorCount);
        reports.push({ sensorId, action: 'restart_abandoned', attempt: attempts });
        continue;
      }

      const attempt = attempts + 1;
      this.restarts.set(sensorId, { attempts: attempt, nextAttemptAt: now + this.backoffFor(attempt) });
      this.log.warn({ sensorId, attempt }, 'Desired sensor not running, restarting');

      if (this.startEntry(entry, 'sensor_restarted')) {
        reports.push({ sensorId, action: 'restarted', attempt });
      } else {
        const error = entry.adapter.health().lastError ?? 'start returned false';
        reports.push({ sensorId, action: 'restart_failed', attempt, error });
      }
    }
    return reports;
  }

  /**
   * Runs `checkHealth` every `intervalMs` until `signal` aborts. The wait
   * itself is aborted, so cancellation takes effect immediately.
   */
  async monitorHealth(signal: AbortSignal, intervalMs: number): Promise<void> {
    this.log.info({ intervalMs }, 'Sensor health monitor started');
    while (!signal.aborted) {
      try {
        await sleep(intervalMs, undefined, { signal });
      } catch (err: unknown) {
        if (signal.aborted) break;
        throw err;
      }
      try {
        this.checkHealth();
      } catch (err: unknown) {
        this.log.error({ err }, 'Health check failed');
      }
    }
    this.log.info('Sensor health monitor stopped');
  }

  backoffFor(attempt: number): number {
    if (attempt <= 0) return 0;
    return Math.min(this.restartBackoffMs * 2 ** (attempt - 1), MAX_RESTART_BACKOFF_MS);
  }

  // ── Views ───────────────────────────────────────────────

  node(sensorId: string): SensorNode {
    const entry = this.registry.get(sensorId);
    if (!entry) throw new SensorNotFoundError(sensorId);
    return toNode(entry);
  }

  nodes(): SensorNode[] {
    return this.registry.list().map(toNode);
  }

  has(sensorId: string): boolean {
    return this.registry.has(sensorId);
  }

  // ── Internals ───────────────────────────────────────────

  private startEntry(entry: RegisteredSensor, lifecycleEvent: string): boolean {
    const { sensorId } = entry;
    const verb = lifecycleEvent === 'sensor_restarted' ? 'restarted' : 'started';
    const started = this.safely(sensorId, 'start', () => entry.adapter.start());
    if (started) {
      this.log.info({ sensorId }, `Sensor ${verb}`);
      this.recordLifecycle(lifecycleEvent, sensorId);
      this.hub?.publishStatus(sensorId, 'running', `Sensor ${sensorId} ${verb}`);
    } else {
      const health = entry.adapter.health();
      this.hub?.publishError(
        sensorId,
        `Sensor ${sensorId} failed to start`,
        health.lastError ?? 'start returned false',
        health.errorCount,
      );
    }
    return started;
  }

  /** Runs one adapter call; a throw counts as `false` and is reported. */
  private safely(sensorId: string, operation: string, fn: () => boolean): boolean {
    try {
      const ok = fn();
      if (!ok) this.log.warn({ sensorId, operation }, 'Sensor operation returned false');
      return ok;
    } catch (err: unknown) {
      this.reportFailure(sensorId, operation, err);
      return false;
    }
  }

  private reportFailure(sensorId: string, operation: string, err: unknown): void {
    this.log.error({ err, sensorId, operation }, 'Sensor operation failed');
    const errorCount = this.registry.get(sensorId)?.adapter.health().errorCount ?? 0;
    this.hub?.publishError(sensorId, `Sensor ${sensorId} ${operation} failed`, errorMessage(err), errorCount);
  }

  private recordLifecycle(event: string, sensorId: string, extra: Record<string, unknown> = {}): void {
    const sink = this.sink;
    if (!sink) return;
    const envelope = buildMetadataEnvelope(LIFECYCLE_SOURCE, { event, sensor_id: sensorId, ...extra }, this.clock);
    void sink([envelope]).catch((err: unknown) => {
      this.log.warn({ err, sensorId, event }, 'Failed to record lifecycle event');
    });
  }
}

function toNode(entry: RegisteredSensor): SensorNode {
  const health = entry.adapter.health();
  const running = entry.adapter.isRunning();
  return {
    id: entry.sensorId,
    name: entry.adapter.name,
    description: entry.adapter.description,
    status: running ? 'running' : 'stopped',
    running,
    last_error: health.lastError,
    error_count: health.errorCount,
  };
}
