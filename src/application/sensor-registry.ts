import type { SensorAdapter, SensorConfig } from '../domain/index.js';
import { SensorNotFoundError, SensorRegistrationError, errorMessage } from './errors.js';

export type SensorFactory = (sensorId: string) => SensorAdapter;

export interface RegisteredSensor {
  readonly sensorId: string;
  readonly sensorType: string;
  readonly adapter: SensorAdapter;
  readonly config: SensorConfig;
}

export interface CreateSensorOptions {
  /** Defaults to the normalized sensor type. */
  readonly sensorId?: string | undefined;
  readonly config?: unknown;
  /** Shared settings the adapter's own config is layered over at initialize. */
  readonly defaults?: SensorConfig | undefined;
}

export function normalizeSensorType(type: string): string {
  return type.trim().toLowerCase();
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Process-wide catalogue of sensor factories and live adapters.
 *
 * Built once by the composition root and handed to the manager and the
 * control use cases. Every mutation completes synchronously, so a lookup
 * never observes a half-registered entry.
 */
export class SensorRegistry {
  private readonly factories = new Map<string, SensorFactory>();
  private readonly entries = new Map<string, RegisteredSensor>();

  registerFactory(type: string, factory: SensorFactory): this {
    this.factories.set(normalizeSensorType(type), factory);
    return this;
  }

  hasFactory(type: string): boolean {
    return this.factories.has(normalizeSensorType(type));
  }

  factoryTypes(): string[] {
    return [...this.factories.keys()].sort();
  }

  /**
   * Builds, initializes and registers an adapter.
   * Throws `SensorRegistrationError` for an unknown type, a config that is
   * not a plain object, an id already taken, or a failed initialization.
   */
  create(type: string, options: CreateSensorOptions = {}): RegisteredSensor {
    const sensorType = normalizeSensorType(type);
    if (sensorType === '') {
      throw new SensorRegistrationError('Sensor type must not be empty');
    }
    const factory = this.factories.get(sensorType);
    if (!factory) {
      throw new SensorRegistrationError(`Unknown sensor type '${sensorType}'`);
    }

    const rawConfig = options.config ?? {};
    if (!isPlainObject(rawConfig)) {
      throw new SensorRegistrationError(`Config for sensor type '${sensorType}' must be an object`);
    }

    const sensorId = options.sensorId?.trim() || sensorType;
    if (this.entries.has(sensorId)) {
      throw new SensorRegistrationError(`Sensor '${sensorId}' is already registered`);
    }

    const adapter = factory(sensorId);
    let initialized: boolean;
    try {
      initialized = adapter.initialize({ ...options.defaults, ...rawConfig });
    } catch (err: unknown) {
      throw new SensorRegistrationError(`Sensor '${sensorId}' failed to initialize: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    if (!initialized) {
      throw new SensorRegistrationError(`Sensor '${sensorId}' failed to initialize`);
    }

    return this.add(sensorId, sensorType, adapter, rawConfig);
  }

  /** Registers an adapter that was built elsewhere. The same adapter may be re-added under its id. */
  add(sensorId: string, sensorType: string, adapter: SensorAdapter, config: SensorConfig = {}): RegisteredSensor {
    const existing = this.entries.get(sensorId);
    if (existing && existing.adapter !== adapter) {
      throw new SensorRegistrationError(`Sensor '${sensorId}' is already registered`);
    }
    const entry: RegisteredSensor = { sensorId, sensorType: normalizeSensorType(sensorType), adapter, config };
    this.entries.set(sensorId, entry);
    return entry;
  }

  remove(sensorId: string): RegisteredSensor | null {
    const entry = this.entries.get(sensorId);
    if (!entry) return null;
    this.entries.delete(sensorId);
    return entry;
  }

  get(sensorId: string): RegisteredSensor | null {
    return this.entries.get(sensorId) ?? null;
  }

  require(sensorId: string): RegisteredSensor {
    const entry = this.entries.get(sensorId);
    if (!entry) throw new SensorNotFoundError(sensorId);
    return entry;
  }

  has(sensorId: string): boolean {
    return this.entries.has(sensorId);
  }

  list(): RegisteredSensor[] {
    return [...this.entries.values()];
  }

  get size(): number {
    return this.entries.size;
  }
}
