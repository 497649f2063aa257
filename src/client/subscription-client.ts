import WebSocket from 'ws';
import { z } from 'zod';
import type { Logger } from 'pino';
import { ChronicleError } from '../application/errors.js';

export const GRAPHQL_TRANSPORT_WS = 'graphql-transport-ws';
export const DEFAULT_SUBSCRIPTION_URL = 'ws://127.0.0.1:35011/graphql';
export const DEFAULT_HANDSHAKE_TIMEOUT_MS = 5000;

/** Connection torn down because the server broke or refused the protocol. */
export class SubscriptionProtocolError extends ChronicleError {
  readonly code: number | null;

  constructor(message: string, code: number | null = null) {
    super(message);
    this.code = code;
  }
}

const nextPayloadSchema = z.object({
  data: z.record(z.string(), z.unknown()).nullish(),
  errors: z.array(z.unknown()).optional(),
});

export type NextPayload = z.infer<typeof nextPayloadSchema>;

const serverMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('connection_ack'), payload: z.unknown().optional() }),
  z.object({ type: z.literal('connection_error'), payload: z.unknown().optional() }),
  z.object({ type: z.literal('ping'), payload: z.unknown().optional() }),
  z.object({ type: z.literal('pong'), payload: z.unknown().optional() }),
  z.object({ type: z.literal('next'), id: z.string(), payload: nextPayloadSchema }),
  z.object({ type: z.literal('error'), id: z.string(), payload: z.unknown() }),
  z.object({ type: z.literal('complete'), id: z.string() }),
]);

type ServerMessage = z.infer<typeof serverMessageSchema>;

const errorListSchema = z.array(z.object({ message: z.string() }));

function describeErrors(payload: unknown): string {
  const parsed = errorListSchema.safeParse(payload);
  if (parsed.success && parsed.data.length > 0) {
    return parsed.data.map((e) => e.message).join('; ');
  }
  return 'Subscription failed';
}

/**
 * Pull side of one operation. Values pushed before anyone asks are kept
 * in order; `return()` tells the server the consumer is done.
 */
class OperationStream implements AsyncIterableIterator<NextPayload> {
  private readonly buffered: NextPayload[] = [];
  private waiter: {
    resolve: (result: IteratorResult<NextPayload>) => void;
    reject: (err: Error) => void;
  } | null = null;
  private finished = false;
  private failure: Error | null = null;

  constructor(private readonly onCancel: () => void) {}

  push(value: NextPayload): void {
    if (this.finished) return;
    if (this.waiter) {
      const { resolve } = this.waiter;
      this.waiter = null;
      resolve({ value, done: false });
      return;
    }
    this.buffered.push(value);
  }

  end(): void {
    if (this.finished) return;
    this.finished = true;
    if (this.waiter) {
      const { resolve } = this.waiter;
      this.waiter = null;
      resolve({ value: undefined, done: true });
    }
  }

  fail(err: Error): void {
    if (this.finished) return;
    this.finished = true;
    this.failure = err;
    if (this.waiter) {
      const { reject } = this.waiter;
      this.waiter = null;
      reject(err);
    }
  }

  next(): Promise<IteratorResult<NextPayload>> {
    const value = this.buffered.shift();
    if (value !== undefined) return Promise.resolve({ value, done: false });
    if (this.failure) return Promise.reject(this.failure);
    if (this.finished) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve, reject) => {
      this.waiter = { resolve, reject };
    });
  }

  return(): Promise<IteratorResult<NextPayload>> {
    if (!this.finished) {
      this.onCancel();
      this.end();
    }
    this.buffered.length = 0;
    return Promise.resolve({ value: undefined, done: true });
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<NextPayload> {
    return this;
  }
}

export interface SubscriptionClientOptions {
  url?: string;
  handshakeTimeoutMs?: number;
  connectionParams?: Record<string, unknown>;
  log?: Logger;
}

/**
 * graphql-transport-ws client.
 *
 * `connect()` resolves once the server acknowledged `connection_init`.
 * Server pings are answered; message types outside the protocol are ignored.
 */
export class SubscriptionClient {
  private readonly operations = new Map<string, OperationStream>();
  private nextOperationId = 1;
  private closing = false;

  private constructor(
    private readonly socket: WebSocket,
    private readonly log: Logger | undefined,
  ) {
    socket.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
      if (isBinary) return;
      this.onMessage(data.toString());
    });
    socket.on('close', (code: number, reason: Buffer) => {
      this.onClose(code, reason.toString());
    });
    // 'close' follows every socket error and fails the open operations.
    socket.on('error', (err: Error) => {
      this.log?.warn({ err }, 'Subscription socket error');
    });
  }

  static connect(options: SubscriptionClientOptions = {}): Promise<SubscriptionClient> {
    const url = options.url ?? DEFAULT_SUBSCRIPTION_URL;
    const timeoutMs = options.handshakeTimeoutMs ?? DEFAULT_HANDSHAKE_TIMEOUT_MS;
    const socket = new WebSocket(url, GRAPHQL_TRANSPORT_WS);

    return new Promise<SubscriptionClient>((resolve, reject) => {
      let settled = false;

      const settle = (err: Error | null): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        socket.off('message', onHandshake);
        socket.off('error', onError);
        socket.off('close', onEarlyClose);
        if (err) {
          // terminate() on a connecting socket emits one more 'error'
          socket.on('error', (cause: Error) => {
            options.log?.debug({ err: cause }, 'Subscription socket error after failed handshake');
          });
          socket.terminate();
          reject(err);
          return;
        }
        resolve(new SubscriptionClient(socket, options.log));
      };

      const timer = setTimeout(() => {
        settle(new SubscriptionProtocolError(`No connection_ack within ${timeoutMs}ms`));
      }, timeoutMs);

      const onHandshake = (data: WebSocket.RawData): void => {
        const message = parseServerMessage(data.toString());
        if (!message) return;
        if (message.type === 'connection_ack') {
          settle(null);
        } else if (message.type === 'connection_error') {
          settle(new SubscriptionProtocolError(`Connection rejected: ${JSON.stringify(message.payload ?? null)}`));
        } else if (message.type === 'ping') {
          socket.send(JSON.stringify({ type: 'pong' }));
        }
      };

      const onError = (err: Error): void => {
        settle(new SubscriptionProtocolError(`Connection to ${url} failed: ${err.message}`));
      };

      const onEarlyClose = (code: number, reason: Buffer): void => {
        settle(new SubscriptionProtocolError(`Connection closed during handshake: ${code} ${reason.toString()}`.trim(), code));
      };

      socket.on('message', onHandshake);
      socket.on('error', onError);
      socket.on('close', onEarlyClose);
      socket.once('open', () => {
        socket.send(JSON.stringify({
          type: 'connection_init',
          ...(options.connectionParams ? { payload: options.connectionParams } : {}),
        }));
      });
    });
  }

  /** Starts one operation; iterate the result for its `next` payloads. */
  subscribe(query: string, variables?: Record<string, unknown>): AsyncIterableIterator<NextPayload> {
    if (this.closing) throw new SubscriptionProtocolError('Client is closed');

    const id = String(this.nextOperationId++);
    const stream = new OperationStream(() => {
      this.operations.delete(id);
      this.send({ type: 'complete', id });
    });
    this.operations.set(id, stream);
    this.send({ type: 'subscribe', id, payload: { query, ...(variables ? { variables } : {}) } });
    return stream;
  }

  get activeOperations(): number {
    return this.operations.size;
  }

  close(): void {
    if (this.closing) return;
    this.closing = true;
    for (const [id, stream] of this.operations) {
      this.send({ type: 'complete', id });
      stream.end();
    }
    this.operations.clear();
    this.socket.close(1000, 'Normal Closure');
  }

  private onMessage(text: string): void {
    const message = parseServerMessage(text);
    if (!message) {
      this.log?.debug({ text }, 'Ignoring unrecognized subscription message');
      return;
    }

    switch (message.type) {
      case 'ping':
        this.send({ type: 'pong' });
        return;
      case 'next':
        this.operations.get(message.id)?.push(message.payload);
        return;
      case 'error': {
        const stream = this.operations.get(message.id);
        this.operations.delete(message.id);
        stream?.fail(new SubscriptionProtocolError(describeErrors(message.payload)));
        return;
      }
      case 'complete': {
        const stream = this.operations.get(message.id);
        this.operations.delete(message.id);
        stream?.end();
        return;
      }
      case 'connection_error':
        this.failAll(new SubscriptionProtocolError(`Connection error: ${JSON.stringify(message.payload ?? null)}`));
        this.socket.terminate();
        return;
      case 'connection_ack':
      case 'pong':
        return;
    }
  }

  private onClose(code: number, reason: string): void {
    if (this.closing) return;
    this.closing = true;
    this.failAll(new SubscriptionProtocolError(`Connection closed: ${code} ${reason}`.trim(), code));
  }

  private failAll(err: SubscriptionProtocolError): void {
    for (const stream of this.operations.values()) stream.fail(err);
    this.operations.clear();
  }

  private send(message: Record<string, unknown>): void {
    if (this.socket.readyState !== WebSocket.OPEN) return;
    this.socket.send(JSON.stringify(message));
  }
}

function parseServerMessage(text: string): ServerMessage | null {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return null;
  }
  const parsed = serverMessageSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}
