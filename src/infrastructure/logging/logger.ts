import pino from 'pino';
import type { DestinationStream, Logger } from 'pino';
import type { LogLevel } from '../config/config.js';
import { LogFeed } from './log-feed.js';

export const SERVICE_NAME = 'chronicle';

export interface AppLogger {
  readonly log: Logger;
  readonly feed: LogFeed;
}

/**
 * Root logger: JSON lines to stdout, mirrored into the live log feed.
 * Components take `log.child({ component })` from here.
 */
export function createLogger(level: LogLevel, destination: DestinationStream = process.stdout): AppLogger {
  const feed = new LogFeed(SERVICE_NAME);
  const streamLevel = level === 'silent' ? 'fatal' : level;
  const log = pino(
    { name: SERVICE_NAME, level },
    pino.multistream([
      { level: streamLevel, stream: destination },
      { level: streamLevel, stream: feed },
    ]),
  );
  return { log, feed };
}
