import pino from 'pino';
import type {
  EnvelopeClock,
  EnvelopeSink,
  EventEnvelope,
  SensorAdapter,
  SensorConfig,
  SensorHealth,
} from '../../src/domain/index.js';
import { SensorManager } from '../../src/application/sensor-manager.js';
import type { SensorManagerOptions } from '../../src/application/sensor-manager.js';
import { SensorRegistry } from '../../src/application/sensor-registry.js';

export const silentLog = pino({ level: 'silent' });

/**
 * Scriptable adapter. Flip `failStart` / `failInit` to make the next
 * calls refuse; `crash()` simulates the sensor dying on its own.
 */
export class FakeSensor implements SensorAdapter {
  readonly name = 'FakeSensor';
  readonly description = 'Test double';
  readonly source = 'fake_source';

  failInit = false;
  failStart = false;
  throwOnStart = false;
  startCalls = 0;
  stopCalls = 0;
  initConfigs: SensorConfig[] = [];
  sink: EnvelopeSink | null = null;

  private running = false;
  private errorCount = 0;
  private lastError: string | null = null;

  initialize(config: SensorConfig): boolean {
    this.initConfigs.push(config);
    return !this.failInit;
  }

  start(): boolean {
    this.startCalls += 1;
    if (this.throwOnStart) {
      this.errorCount += 1;
      this.lastError = 'device unavailable';
      throw new Error('device unavailable');
    }
    if (this.failStart) return false;
    this.running = true;
    return true;
  }

  stop(): boolean {
    this.stopCalls += 1;
    this.running = false;
    return true;
  }

  crash(): void {
    this.running = false;
  }

  isRunning(): boolean {
    return this.running;
  }

  capture(): EventEnvelope[] {
    return [];
  }

  health(): SensorHealth {
    return { running: this.running, lastError: this.lastError, errorCount: this.errorCount };
  }

  bindSink(sink: EnvelopeSink | null): void {
    this.sink = sink;
  }
}

/** Clock whose time only moves when the test says so. */
export class ManualClock implements EnvelopeClock {
  private ids = 0;

  constructor(public now = Date.UTC(2024, 0, 1)) {}

  nowMs(): number {
    return this.now;
  }

  newId(): string {
    this.ids += 1;
    return `id-${this.ids}`;
  }

  advance(ms: number): void {
    this.now += ms;
  }
}

export interface ManagerFixture {
  registry: SensorRegistry;
  manager: SensorManager;
  sensors: Map<string, FakeSensor>;
  clock: ManualClock;
}

/** Registry with a `fake` type whose instances are kept by id. */
export function makeManager(overrides: Partial<SensorManagerOptions> = {}): ManagerFixture {
  const sensors = new Map<string, FakeSensor>();
  const registry = new SensorRegistry().registerFactory('fake', (sensorId) => {
    const sensor = new FakeSensor();
    sensors.set(sensorId, sensor);
    return sensor;
  });
  const clock = new ManualClock();
  const manager = new SensorManager({ registry, log: silentLog, clock, ...overrides });
  return { registry, manager, sensors, clock };
}

export function sensorOf(fixture: ManagerFixture, sensorId: string): FakeSensor {
  const sensor = fixture.sensors.get(sensorId);
  if (!sensor) throw new Error(`no fake sensor '${sensorId}'`);
  return sensor;
}
