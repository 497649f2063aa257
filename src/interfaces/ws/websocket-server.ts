import type { Server as HttpServer, IncomingMessage } from 'node:http';
import { Socket } from 'node:net';
import type { Duplex } from 'node:stream';
import { createHash } from 'node:crypto';
import type { Logger } from 'pino';
import type { SensorEventHub } from '../../application/sensor-event-hub.js';
import {
  MAX_FRAME_PAYLOAD,
  OPCODE,
  encodeCloseFrame,
  encodeControlFrame,
  encodeTextFrame,
  tryParseFrame,
} from './frame-codec.js';
import { GRAPHQL_TRANSPORT_WS, SubscriptionSession } from './subscription-protocol.js';

/**
 * graphql-transport-ws server over raw Node.js HTTP upgrade.
 *
 * - accepts clients on the configured path offering the graphql-transport-ws subprotocol
 * - text frames (including fragmented ones) feed one SubscriptionSession per client
 * - server heartbeat PING every 30 s, clients that never answer are dropped
 * - incoming CLOSE → echo close + graceful teardown
 *
 * Multiple frames per TCP chunk are consumed in a loop.
 */

const WS_GUID = '258EAFA5-E914-47DA-95CA-5AB9FC11CF97';
const HEARTBEAT_MS = 30_000;
const CLOSE_GRACE_MS = 1_000;

/** RFC 6455 §7.4.1 */
const CLOSE_UNSUPPORTED_DATA = 1003;
const CLOSE_MESSAGE_TOO_BIG = 1009;

/** Upper bound on a message reassembled from fragments. */
export const MAX_MESSAGE_PAYLOAD = 4 * MAX_FRAME_PAYLOAD;

let nextClientId = 1;

interface WsClient {
  id: number;
  socket: Socket;
  session: SubscriptionSession;
  alive: boolean;
  closed: boolean;
  buffer: Buffer;
  fragments: Buffer[];
  fragmentBytes: number;
}

export interface SubscriptionServerOptions {
  /** Milliseconds a client has to send connection_init. */
  initTimeoutMs?: number;
  /** Largest fragmented message accepted before closing with 1009. */
  maxMessageBytes?: number;
}

function offeredProtocols(req: IncomingMessage): string[] {
  const header = req.headers['sec-websocket-protocol'];
  if (!header) return [];
  return header.split(',').map((p) => p.trim()).filter((p) => p.length > 0);
}

function pathOf(req: IncomingMessage): string {
  return new URL(req.url ?? '/', 'http://localhost').pathname;
}

export class SubscriptionServer {
  private readonly clients: Set<WsClient> = new Set();
  private readonly hub: SensorEventHub;
  private readonly log: Logger;
  private readonly initTimeoutMs: number | undefined;
  private readonly maxMessageBytes: number;
  private pingInterval: ReturnType<typeof setInterval> | null = null;

  constructor(hub: SensorEventHub, log: Logger, options: SubscriptionServerOptions = {}) {
    this.hub = hub;
    this.log = log;
    this.initTimeoutMs = options.initTimeoutMs;
    this.maxMessageBytes = options.maxMessageBytes ?? MAX_MESSAGE_PAYLOAD;
  }

  /* ------------------------------------------------------------------ */
  /*  Attach to HTTP server                                             */
  /* ------------------------------------------------------------------ */

  attach(server: HttpServer, path = '/graphql'): void {
    server.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
      if (!(socket instanceof Socket)) {
        socket.destroy();
        return;
      }

      if (pathOf(req) !== path) {
        socket.end('HTTP/1.1 404 Not Found\r\nConnection: close\r\n\r\n');
        return;
      }

      const key = req.headers['sec-websocket-key'];
      if (!key) {
        socket.end('HTTP/1.1 400 Bad Request\r\nConnection: close\r\n\r\n');
        return;
      }

      if (!offeredProtocols(req).includes(GRAPHQL_TRANSPORT_WS)) {
        this.log.debug({ url: req.url }, 'Upgrade without graphql-transport-ws subprotocol rejected');
        socket.end('HTTP/1.1 400 Bad Request\r\nConnection: close\r\n\r\n');
        return;
      }

      this.accept(socket, key, head);
    });

    this.pingInterval = setInterval(() => this.heartbeat(), HEARTBEAT_MS);
    this.pingInterval.unref();

    this.log.info({ path }, 'Subscription server attached');
  }

  get clientCount(): number {
    return this.clients.size;
  }

  close(): void {
    if (this.pingInterval) {
      clearInterval(this.pingInterval);
      this.pingInterval = null;
    }
    for (const client of this.clients) {
      this.closeWith(client, 1001, 'Server shutting down');
    }
    this.clients.clear();
  }

  /* ------------------------------------------------------------------ */
  /*  Private — connection                                              */
  /* ------------------------------------------------------------------ */

  private accept(sock: Socket, key: string, head: Buffer): void {
    const accept = createHash('sha1')
      .update(key + WS_GUID)
      .digest('base64');

    sock.write(
      'HTTP/1.1 101 Switching Protocols\r\n' +
        'Upgrade: websocket\r\n' +
        'Connection: Upgrade\r\n' +
        `Sec-WebSocket-Accept: ${accept}\r\n` +
        `Sec-WebSocket-Protocol: ${GRAPHQL_TRANSPORT_WS}\r\n` +
        '\r\n',
    );

    // The HTTP parser pushes EOF after the upgrade; without half-open the
    // socket would end itself before any frame is exchanged.
    sock.allowHalfOpen = true;
    sock.setTimeout(0);
    sock.setNoDelay(true);
    sock.setKeepAlive(true, HEARTBEAT_MS);

    const id = nextClientId++;
    const client: WsClient = {
      id,
      socket: sock,
      alive: true,
      closed: false,
      buffer: head.length > 0 ? Buffer.from(head) : Buffer.alloc(0),
      fragments: [],
      fragmentBytes: 0,
      session: new SubscriptionSession({
        hub: this.hub,
        log: this.log.child({ clientId: id }),
        initTimeoutMs: this.initTimeoutMs,
        transport: {
          send: (message) => {
            this.safeWrite(client, encodeTextFrame(JSON.stringify(message)));
          },
          close: (code, reason) => this.closeWith(client, code, reason),
        },
      }),
    };

    this.clients.add(client);
    this.log.info({ clientId: client.id, clientCount: this.clients.size }, 'Subscription client connected');

    sock.on('data', (chunk: Buffer) => this.onData(client, chunk));

    sock.on('end', () => {
      // Spurious readable EOF after the upgrade; real teardown arrives as 'close'.
      this.log.debug({ clientId: client.id }, 'Socket end event (readable EOF, ignored)');
    });

    sock.on('close', (hadError: boolean) => {
      this.gracefulClose(client, hadError ? 'close_error' : 'close');
    });

    sock.on('error', (err) => {
      if (!client.closed) {
        this.log.debug({ clientId: client.id, err: String(err) }, 'Socket error event');
      }
      this.gracefulClose(client, 'error');
    });

    if (client.buffer.length > 0) this.onData(client, Buffer.alloc(0));
    sock.resume();
  }

  private onData(client: WsClient, chunk: Buffer): void {
    if (client.closed) return;

    client.buffer = Buffer.concat([client.buffer, chunk]);

    while (client.buffer.length > 0 && !client.closed) {
      let frame: ReturnType<typeof tryParseFrame>;
      try {
        frame = tryParseFrame(client.buffer);
      } catch (err: unknown) {
        this.log.warn({ clientId: client.id, err }, 'WebSocket frame parse error, closing client');
        this.closeWith(client, CLOSE_MESSAGE_TOO_BIG, 'Message too big');
        return;
      }

      if (!frame) break; // need more bytes

      client.buffer = client.buffer.subarray(frame.nextOffset);
      client.alive = true;

      switch (frame.opcode) {
        case OPCODE.pong:
          continue;

        case OPCODE.ping:
          this.safeWrite(client, encodeControlFrame(OPCODE.pong, frame.payload));
          continue;

        case OPCODE.close:
          this.endWith(client, encodeControlFrame(OPCODE.close, frame.payload), { reason: 'close_frame' });
          return;

        case OPCODE.text:
          if (frame.fin) {
            client.session.handleText(frame.payload.toString('utf-8'));
          } else {
            client.fragments = [];
            client.fragmentBytes = 0;
            if (!this.addFragment(client, frame.payload)) return;
          }
          continue;

        case OPCODE.continuation: {
          if (client.fragments.length === 0) {
            this.closeWith(client, 1002, 'Unexpected continuation frame');
            return;
          }
          if (!this.addFragment(client, frame.payload)) return;
          if (frame.fin) {
            const text = Buffer.concat(client.fragments).toString('utf-8');
            client.fragments = [];
            client.fragmentBytes = 0;
            client.session.handleText(text);
          }
          continue;
        }

        default:
          this.closeWith(client, CLOSE_UNSUPPORTED_DATA, 'Binary frames are not supported');
          return;
      }
    }
  }

  private addFragment(client: WsClient, payload: Buffer): boolean {
    client.fragmentBytes += payload.length;
    if (client.fragmentBytes > this.maxMessageBytes) {
      client.fragments = [];
      client.fragmentBytes = 0;
      this.log.warn({ clientId: client.id }, 'Fragmented message exceeds limit, closing client');
      this.closeWith(client, CLOSE_MESSAGE_TOO_BIG, 'Message too big');
      return false;
    }
    client.fragments.push(payload);
    return true;
  }

  private heartbeat(): void {
    for (const client of this.clients) {
      if (!client.alive) {
        this.log.debug({ clientId: client.id }, 'Heartbeat timeout, removing client');
        this.gracefulClose(client, 'heartbeat_timeout');
        continue;
      }
      client.alive = false;
      this.safeWrite(client, encodeControlFrame(OPCODE.ping, Buffer.alloc(0)));
      client.session.ping();
    }
  }

  /* ------------------------------------------------------------------ */
  /*  Private — lifecycle                                               */
  /* ------------------------------------------------------------------ */

  private closeWith(client: WsClient, code: number, reason: string): void {
    this.endWith(client, encodeCloseFrame(code, reason), { code, reason });
  }

  /** Writes a final frame, then lets the peer finish the closing handshake. */
  private endWith(client: WsClient, lastFrame: Buffer, details: { code?: number; reason: string }): void {
    if (client.closed) return;
    client.closed = true;
    this.clients.delete(client);
    client.session.dispose();

    if (!client.socket.destroyed) {
      client.socket.end(lastFrame);
      setTimeout(() => client.socket.destroy(), CLOSE_GRACE_MS).unref();
    }

    this.log.info(
      { clientId: client.id, ...details, clientCount: this.clients.size },
      'Subscription client closed',
    );
  }

  /** Idempotent teardown. */
  private gracefulClose(client: WsClient, reason: string): void {
    if (client.closed) return;
    client.closed = true;
    this.clients.delete(client);
    client.session.dispose();

    if (!client.socket.destroyed) {
      client.socket.destroy();
    }

    this.log.info(
      { clientId: client.id, reason, clientCount: this.clients.size },
      'Subscription client disconnected',
    );
  }

  private safeWrite(client: WsClient, data: Buffer): void {
    if (client.closed || client.socket.destroyed) return;
    client.socket.write(data);
  }
}
