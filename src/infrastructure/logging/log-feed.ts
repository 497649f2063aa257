import pino from 'pino';
import type { DestinationStream } from 'pino';
import type { LogEvent } from '../../application/sensor-event-hub.js';

export type LogEventSink = (event: LogEvent) => void;

function labelFor(level: unknown): string {
  if (typeof level === 'string') return level;
  if (typeof level === 'number') return pino.levels.labels[level] ?? String(level);
  return 'info';
}

/**
 * Parses one serialized pino line into a feed event.
 * A line that is not JSON is passed through as an `info` message.
 */
export function toLogEvent(line: string, fallbackName: string): LogEvent {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return { timestamp: new Date().toISOString(), level: 'info', message: line.trim(), name: fallbackName };
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return { timestamp: new Date().toISOString(), level: 'info', message: line.trim(), name: fallbackName };
  }

  const record = new Map(Object.entries(parsed));
  const time = record.get('time');
  const msg = record.get('msg');
  const component = record.get('component');
  const name = record.get('name');

  return {
    timestamp: new Date(typeof time === 'number' ? time : Date.now()).toISOString(),
    level: labelFor(record.get('level')),
    message: typeof msg === 'string' ? msg : '',
    name: typeof component === 'string' ? component : typeof name === 'string' ? name : fallbackName,
  };
}

/** pino destination that republishes every line to the live log feed. */
export class LogFeed implements DestinationStream {
  private sink: LogEventSink | null = null;

  constructor(private readonly fallbackName: string) {}

  /** Connects the feed once the hub exists; lines before that are not kept. */
  connect(sink: LogEventSink | null): void {
    this.sink = sink;
  }

  write(chunk: string): void {
    const sink = this.sink;
    if (!sink) return;
    for (const line of chunk.split('\n')) {
      if (line.trim() === '') continue;
      sink(toLogEvent(line, this.fallbackName));
    }
  }
}
