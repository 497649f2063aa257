import { z } from 'zod';
import type { Logger } from 'pino';
import type { SensorEventHub, SensorFeed } from '../../application/sensor-event-hub.js';

export const GRAPHQL_TRANSPORT_WS = 'graphql-transport-ws';

export const CloseCode = {
  BadRequest: 4400,
  Unauthorized: 4401,
  ConnectionInitialisationTimeout: 4408,
  SubscriberAlreadyExists: 4409,
  TooManyInitialisationRequests: 4429,
} as const;

export const DEFAULT_INIT_TIMEOUT_MS = 3000;

const clientMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('connection_init'), payload: z.record(z.string(), z.unknown()).nullish() }),
  z.object({ type: z.literal('ping'), payload: z.record(z.string(), z.unknown()).nullish() }),
  z.object({ type: z.literal('pong'), payload: z.record(z.string(), z.unknown()).nullish() }),
  z.object({
    type: z.literal('subscribe'),
    id: z.string().min(1),
    payload: z.object({
      query: z.string().min(1),
      operationName: z.string().nullish(),
      variables: z.record(z.string(), z.unknown()).nullish(),
    }),
  }),
  z.object({ type: z.literal('complete'), id: z.string().min(1) }),
]);

export type ClientMessage = z.infer<typeof clientMessageSchema>;

export type ServerMessage =
  | { type: 'connection_ack'; payload?: Record<string, unknown> }
  | { type: 'ping'; payload?: Record<string, unknown> }
  | { type: 'pong'; payload?: Record<string, unknown> }
  | { type: 'next'; id: string; payload: { data: Record<string, unknown> } }
  | { type: 'error'; id: string; payload: Array<{ message: string }> }
  | { type: 'complete'; id: string };

/** What the session needs from the connection underneath it. */
export interface SessionTransport {
  send(message: ServerMessage): void;
  close(code: number, reason: string): void;
}

/** Root fields served, and the hub feed behind each. */
export const FEED_FIELDS = {
  sensorStatus: 'status',
  sensorErrors: 'failure',
  logStream: 'log',
} as const satisfies Record<string, SensorFeed>;

export type FeedField = keyof typeof FEED_FIELDS;

export type ResolvedOperation =
  | { kind: 'feed'; field: FeedField; feed: SensorFeed }
  | { kind: 'ticker'; field: 'ticker'; intervalMs: number };

const ROOT_FIELD_RE = /\{\s*([A-Za-z_]\w*)\s*(?:\(([^)]*)\))?/;
const INTERVAL_ARG_RE = /interval\s*:\s*([0-9]*\.?[0-9]+)/;

function isFeedField(name: string): name is FeedField {
  return Object.prototype.hasOwnProperty.call(FEED_FIELDS, name);
}

/**
 * Picks the operation from the first root field of a subscription query.
 * Returns null for anything not served here.
 */
export function resolveOperation(query: string): ResolvedOperation | null {
  const match = ROOT_FIELD_RE.exec(query);
  if (!match) return null;
  const field = match[1];
  if (field === undefined) return null;

  if (isFeedField(field)) {
    return { kind: 'feed', field, feed: FEED_FIELDS[field] };
  }
  if (field === 'ticker') {
    const interval = INTERVAL_ARG_RE.exec(match[2] ?? '')?.[1];
    const seconds = interval === undefined ? 1 : Number.parseFloat(interval);
    return { kind: 'ticker', field, intervalMs: Math.max(10, seconds * 1000) };
  }
  return null;
}

export interface SubscriptionSessionOptions {
  readonly hub: SensorEventHub;
  readonly transport: SessionTransport;
  readonly log: Logger;
  /** 0 disables the connection_init deadline. */
  readonly initTimeoutMs?: number;
}

/**
 * One client's graphql-transport-ws conversation, independent of sockets.
 *
 * connection_init → connection_ack, then any number of subscribe/complete
 * pairs keyed by operation id. Protocol violations terminate the whole
 * connection with the matching 44xx close code.
 */
export class SubscriptionSession {
  private readonly hub: SensorEventHub;
  private readonly transport: SessionTransport;
  private readonly log: Logger;
  private readonly operations = new Map<string, () => void>();
  private initTimer: NodeJS.Timeout | null = null;
  private initReceived = false;
  private closed = false;

  constructor(options: SubscriptionSessionOptions) {
    this.hub = options.hub;
    this.transport = options.transport;
    this.log = options.log;

    const initTimeoutMs = options.initTimeoutMs ?? DEFAULT_INIT_TIMEOUT_MS;
    if (initTimeoutMs > 0) {
      this.initTimer = setTimeout(() => {
        if (!this.initReceived) {
          this.terminate(CloseCode.ConnectionInitialisationTimeout, 'Connection initialisation timeout');
        }
      }, initTimeoutMs);
      this.initTimer.unref();
    }
  }

  get acknowledged(): boolean {
    return this.initReceived && !this.closed;
  }

  get activeOperations(): string[] {
    return [...this.operations.keys()];
  }

  handleText(text: string): void {
    if (this.closed) return;

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch {
      this.terminate(CloseCode.BadRequest, 'Invalid message received');
      return;
    }

    const parsed = clientMessageSchema.safeParse(raw);
    if (!parsed.success) {
      this.terminate(CloseCode.BadRequest, 'Invalid message received');
      return;
    }
    this.handleMessage(parsed.data);
  }

  /** Sends a protocol-level keepalive. */
  ping(): void {
    if (this.closed) return;
    this.transport.send({ type: 'ping' });
  }

  /** Stops every operation; the connection is going away. */
  dispose(): void {
    if (this.initTimer) {
      clearTimeout(this.initTimer);
      this.initTimer = null;
    }
    for (const stop of this.operations.values()) stop();
    this.operations.clear();
    this.closed = true;
  }

  private handleMessage(message: ClientMessage): void {
    switch (message.type) {
      case 'connection_init': {
        if (this.initReceived) {
          this.terminate(CloseCode.TooManyInitialisationRequests, 'Too many initialisation requests');
          return;
        }
        this.initReceived = true;
        if (this.initTimer) {
          clearTimeout(this.initTimer);
          this.initTimer = null;
        }
        this.transport.send({ type: 'connection_ack' });
        return;
      }

      case 'ping':
        this.transport.send({ type: 'pong' });
        return;

      case 'pong':
        return;

      case 'subscribe': {
        if (!this.initReceived) {
          this.terminate(CloseCode.Unauthorized, 'Unauthorized');
          return;
        }
        if (this.operations.has(message.id)) {
          this.terminate(CloseCode.SubscriberAlreadyExists, `Subscriber for ${message.id} already exists`);
          return;
        }
        this.subscribe(message.id, message.payload.query);
        return;
      }

      case 'complete': {
        const stop = this.operations.get(message.id);
        if (stop) {
          stop();
          this.operations.delete(message.id);
          this.log.debug({ operationId: message.id }, 'Subscription completed by client');
        }
        return;
      }
    }
  }

  private subscribe(id: string, query: string): void {
    const operation = resolveOperation(query);
    if (!operation) {
      this.transport.send({ type: 'error', id, payload: [{ message: 'Unknown subscription field' }] });
      return;
    }

    const next = (value: unknown): void => {
      if (this.closed) return;
      this.transport.send({ type: 'next', id, payload: { data: { [operation.field]: value } } });
    };

    if (operation.kind === 'ticker') {
      let counter = 0;
      const timer = setInterval(() => next(counter++), operation.intervalMs);
      timer.unref();
      next(counter++);
      this.operations.set(id, () => clearInterval(timer));
    } else {
      this.operations.set(id, this.subscribeFeed(operation.feed, next));
    }

    this.log.debug({ operationId: id, field: operation.field }, 'Subscription started');
  }

  private subscribeFeed(feed: SensorFeed, next: (value: unknown) => void): () => void {
    switch (feed) {
      case 'status':
        return this.hub.subscribe('status', next);
      case 'failure':
        return this.hub.subscribe('failure', next);
      case 'log':
        return this.hub.subscribe('log', next);
    }
  }

  private terminate(code: number, reason: string): void {
    if (this.closed) return;
    this.log.debug({ code, reason }, 'Terminating subscription connection');
    this.dispose();
    this.transport.close(code, reason);
  }
}
