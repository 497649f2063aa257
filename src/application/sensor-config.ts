import { z } from 'zod';
import type { Logger } from 'pino';
import type { SensorConfig } from '../domain/index.js';
import { SensorConfigError } from './errors.js';
import { isPlainObject, normalizeSensorType } from './sensor-registry.js';

export const SENSOR_CONFIG_SCHEMA_VERSION = 1;
export const MISSING_SCRIPT_COOLDOWN_MS = 600_000;

const sensorEntrySchema = z.object({
  sensor_type: z.string().trim().min(1, 'sensor_type is required in sensor configuration'),
  sensor_id: z.string().trim().min(1).optional(),
  script_path: z.string().optional(),
  script: z.string().optional(),
  config: z.record(z.string(), z.unknown()).optional(),
});

export type SensorEntry = z.infer<typeof sensorEntrySchema>;

export interface SensorDocument {
  readonly schema_version: number;
  readonly global_config: SensorConfig;
  readonly sensors: SensorEntry[];
}

/** Written on first run when no configuration is supplied. */
export const DEFAULT_SENSOR_DOCUMENT: SensorDocument = {
  schema_version: SENSOR_CONFIG_SCHEMA_VERSION,
  global_config: {},
  sensors: [
    { sensor_type: 'window_focus', sensor_id: 'window_focus', config: { capture_interval: 1 } },
    { sensor_type: 'system_lifecycle', sensor_id: 'system_lifecycle', config: { capture_interval: 60 } },
  ],
};

/**
 * Accepts either a bare array of entries or the versioned document.
 * `null`/`undefined` is an empty configuration.
 */
export function parseSensorDocument(payload: unknown): SensorDocument {
  if (payload === null || payload === undefined) {
    return { schema_version: SENSOR_CONFIG_SCHEMA_VERSION, global_config: {}, sensors: [] };
  }

  let rawSensors: readonly unknown[];
  let globalConfig: SensorConfig = {};
  let version = SENSOR_CONFIG_SCHEMA_VERSION;

  if (Array.isArray(payload)) {
    rawSensors = payload;
  } else if (isPlainObject(payload)) {
    const sensors = payload['sensors'] ?? [];
    const shared = payload['global_config'] ?? {};
    if (!Array.isArray(sensors)) {
      throw new SensorConfigError("Sensor configuration 'sensors' must be a list");
    }
    if (!isPlainObject(shared)) {
      throw new SensorConfigError("Sensor configuration 'global_config' must be an object");
    }
    rawSensors = sensors;
    globalConfig = shared;
    const declared = payload['schema_version'];
    if (typeof declared === 'number') version = declared;
  } else {
    throw new SensorConfigError('Sensor configuration must be a list or object');
  }

  const sensors = rawSensors.map((item: unknown, index) => {
    if (!isPlainObject(item)) {
      throw new SensorConfigError('Sensor configuration entries must be objects');
    }
    const parsed = sensorEntrySchema.safeParse(item);
    if (!parsed.success) {
      const reason = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'entry'}: ${issue.message}`).join('; ');
      throw new SensorConfigError(`Invalid sensor configuration entry #${index}: ${reason}`);
    }
    return parsed.data;
  });

  return {
    schema_version: version,
    global_config: globalConfig,
    sensors,
  };
}

/** Remembers when each missing script was last reported. */
export class MissingScriptLog {
  private readonly lastLogged = new Map<string, number>();

  constructor(private readonly cooldownMs: number = MISSING_SCRIPT_COOLDOWN_MS) {}

  /** True when `path` has not been reported within the cooldown. */
  shouldReport(path: string, nowMs: number = Date.now()): boolean {
    const last = this.lastLogged.get(path);
    if (last !== undefined && nowMs - last < this.cooldownMs) return false;
    this.lastLogged.set(path, nowMs);
    return true;
  }
}

export interface FilterSensorEntriesDeps {
  readonly hasFactory: (type: string) => boolean;
  readonly scriptExists: (path: string) => boolean;
  readonly log: Logger;
  readonly missingScripts: MissingScriptLog;
  readonly now?: () => number;
}

/**
 * Drops entries whose script is absent or whose type has no factory.
 * Both are warnings, not errors; a missing script is reported at most
 * once per cooldown window.
 */
export function filterSensorEntries(entries: readonly SensorEntry[], deps: FilterSensorEntriesDeps): SensorEntry[] {
  const now = deps.now ?? Date.now;
  const accepted: SensorEntry[] = [];

  for (const entry of entries) {
    const script = entry.script_path ?? entry.script;
    if (script && !deps.scriptExists(script)) {
      if (deps.missingScripts.shouldReport(script, now())) {
        deps.log.warn({ script, sensorType: entry.sensor_type }, 'Sensor script missing');
      }
      continue;
    }
    if (!deps.hasFactory(normalizeSensorType(entry.sensor_type))) {
      deps.log.warn({ sensorType: entry.sensor_type }, 'Unknown sensor type; skipping');
      continue;
    }
    accepted.push(entry);
  }
  return accepted;
}
