export { createLogger, SERVICE_NAME } from './logger.js';
export type { AppLogger } from './logger.js';
export { LogFeed, toLogEvent } from './log-feed.js';
export type { LogEventSink } from './log-feed.js';
