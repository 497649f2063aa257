import type { SensorStatus } from '../domain/index.js';

export interface SensorStatusEvent {
  readonly sensor_id: string;
  readonly status: SensorStatus;
  readonly message: string;
  readonly timestamp: string;
}

export interface SensorErrorEvent {
  readonly sensor_id: string;
  readonly message: string;
  readonly error: string;
  readonly error_count: number;
  readonly timestamp: string;
}

export interface LogEvent {
  readonly timestamp: string;
  readonly level: string;
  readonly message: string;
  readonly name: string;
}

export type SensorFeeds = {
  status: [event: SensorStatusEvent];
  failure: [event: SensorErrorEvent];
  log: [event: LogEvent];
};

export type SensorFeed = keyof SensorFeeds;

type FeedListeners = { [K in SensorFeed]: Set<(...args: SensorFeeds[K]) => void> };

/**
 * Fan-out point for the live feeds served to subscribers.
 *
 * A throwing listener only loses its own delivery; the others still
 * receive the event.
 */
export class SensorEventHub {
  private readonly listeners: FeedListeners = {
    status: new Set(),
    failure: new Set(),
    log: new Set(),
  };

  subscribe<K extends SensorFeed>(feed: K, listener: (...args: SensorFeeds[K]) => void): () => void {
    const set = this.listeners[feed];
    set.add(listener);
    return () => {
      set.delete(listener);
    };
  }

  listenerCount(feed: SensorFeed): number {
    return this.listeners[feed].size;
  }

  publishStatus(sensorId: string, status: SensorStatus, message: string, at: Date = new Date()): void {
    this.deliver('status', { sensor_id: sensorId, status, message, timestamp: at.toISOString() });
  }

  publishError(sensorId: string, message: string, error: string, errorCount: number, at: Date = new Date()): void {
    this.deliver('failure', {
      sensor_id: sensorId,
      message,
      error,
      error_count: errorCount,
      timestamp: at.toISOString(),
    });
  }

  publishLog(event: LogEvent): void {
    this.deliver('log', event);
  }

  private deliver<K extends SensorFeed>(feed: K, ...args: SensorFeeds[K]): void {
    for (const listener of [...this.listeners[feed]]) {
      try {
        listener(...args);
      } catch (err: unknown) {
        // The log feed is itself fed by the logger, so report outside it.
        process.emitWarning(`Subscriber on '${feed}' feed threw: ${String(err)}`);
      }
    }
  }
}
