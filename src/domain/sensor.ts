import type { EventEnvelope } from './envelope.js';

export type SensorConfig = Record<string, unknown>;

/** Where an adapter delivers what it captured on its own schedule. */
export type EnvelopeSink = (envelopes: readonly EventEnvelope[]) => Promise<void>;

export interface SensorHealth {
  readonly running: boolean;
  readonly lastError: string | null;
  readonly errorCount: number;
}

/**
 * Capability contract every producer implements.
 *
 * `capture()` must be bounded: it returns whatever is ready now, possibly
 * nothing, and assigns a fresh id and capture timestamp per envelope.
 */
export interface SensorAdapter {
  readonly name: string;
  readonly description: string;
  readonly source: string;
  initialize(config: SensorConfig): boolean;
  start(): boolean;
  stop(graceful?: boolean): boolean;
  isRunning(): boolean;
  capture(): EventEnvelope[];
  health(): SensorHealth;
  bindSink(sink: EnvelopeSink | null): void;
}

export type SensorStatus = 'running' | 'stopped';

/** Externally observable view of a registered sensor. */
export interface SensorNode {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly status: SensorStatus;
  readonly running: boolean;
  readonly last_error: string | null;
  readonly error_count: number;
}
