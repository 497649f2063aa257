import { z } from 'zod';
import { ConfigurationError } from '../../application/errors.js';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

// Unset and blank variables both fall back to the default.
const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalText = z.preprocess(blankToUndefined, z.string().optional());
const intVar = (fallback: number, min: number, max = Number.MAX_SAFE_INTEGER) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(min).max(max).default(fallback));

const envSchema = z.object({
  CHRONICLE_HOST: z.preprocess(blankToUndefined, z.string().default('127.0.0.1')),
  CHRONICLE_PORT: intVar(35011, 0, 65535),
  CHRONICLE_DATA_DIR: z.preprocess(blankToUndefined, z.string().default('data/chronicle')),
  LOG_LEVEL: z.preprocess(blankToUndefined, z.enum(LOG_LEVELS).default('info')),
  CHRONICLE_BATCH_SIZE: intVar(200, 1),
  CHRONICLE_FLUSH_INTERVAL_MS: intVar(2000, 0),
  CHRONICLE_MAX_QUEUE: intVar(10_000, 1),
  CHRONICLE_COMMIT_ATTEMPTS: intVar(3, 1),
  SENSOR_HEALTH_INTERVAL_MS: intVar(5000, 10),
  SENSOR_MAX_RESTARTS: intVar(5, 0),
  SENSOR_RESTART_BACKOFF_MS: intVar(1000, 0),
  SENSOR_CONFIG_PATH: optionalText,
  SENSOR_CONFIG: optionalText,
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
  host: string;
  port: number;
  dataDir: string;
  logLevel: LogLevel;
  gate: {
    maxBatchSize: number;
    flushIntervalMs: number;
    maxQueueSize: number;
    commitAttempts: number;
  };
  sensors: {
    healthIntervalMs: number;
    maxRestartAttempts: number;
    restartBackoffMs: number;
    configPath: string | undefined;
    inlineConfig: string | undefined;
  };
}

/**
 * Reads service configuration from the environment.
 * Throws `ConfigurationError` naming every invalid variable.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }
  const vars = parsed.data;

  return {
    host: vars.CHRONICLE_HOST,
    port: vars.CHRONICLE_PORT,
    dataDir: vars.CHRONICLE_DATA_DIR,
    logLevel: vars.LOG_LEVEL,
    gate: {
      maxBatchSize: vars.CHRONICLE_BATCH_SIZE,
      flushIntervalMs: vars.CHRONICLE_FLUSH_INTERVAL_MS,
      maxQueueSize: vars.CHRONICLE_MAX_QUEUE,
      commitAttempts: vars.CHRONICLE_COMMIT_ATTEMPTS,
    },
    sensors: {
      healthIntervalMs: vars.SENSOR_HEALTH_INTERVAL_MS,
      maxRestartAttempts: vars.SENSOR_MAX_RESTARTS,
      restartBackoffMs: vars.SENSOR_RESTART_BACKOFF_MS,
      configPath: vars.SENSOR_CONFIG_PATH,
      inlineConfig: vars.SENSOR_CONFIG,
    },
  };
}
