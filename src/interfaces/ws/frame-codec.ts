/**
 * RFC 6455 frame encoding and decoding for the subscription server.
 *
 * Client frames arrive masked (§5.3); server frames go out unmasked.
 */

export const OPCODE = {
  continuation: 0x0,
  text: 0x1,
  binary: 0x2,
  close: 0x8,
  ping: 0x9,
  pong: 0xa,
} as const;

/** Largest payload accepted from a client, in bytes. */
export const MAX_FRAME_PAYLOAD = 1024 * 1024;

export interface Frame {
  fin: boolean;
  opcode: number;
  payload: Buffer;
  nextOffset: number;
}

/**
 * Parse ONE frame from the front of `buf`.
 * Returns null when more bytes are needed.
 * Throws on frames over MAX_FRAME_PAYLOAD.
 */
export function tryParseFrame(buf: Buffer): Frame | null {
  if (buf.length < 2) return null;

  const b0 = buf[0]!;
  const b1 = buf[1]!;

  const fin = (b0 & 0x80) === 0x80;
  const opcode = b0 & 0x0f;
  const masked = (b1 & 0x80) === 0x80;

  let payloadLen = b1 & 0x7f;
  let offset = 2;

  if (payloadLen === 126) {
    if (buf.length < offset + 2) return null;
    payloadLen = buf.readUInt16BE(offset);
    offset += 2;
  } else if (payloadLen === 127) {
    if (buf.length < offset + 8) return null;
    const big = buf.readBigUInt64BE(offset);
    if (big > BigInt(MAX_FRAME_PAYLOAD)) {
      throw new Error(`WebSocket frame of ${big} bytes exceeds limit`);
    }
    payloadLen = Number(big);
    offset += 8;
  }

  if (payloadLen > MAX_FRAME_PAYLOAD) {
    throw new Error(`WebSocket frame of ${payloadLen} bytes exceeds limit`);
  }

  const maskLen = masked ? 4 : 0;
  if (buf.length < offset + maskLen + payloadLen) return null;

  let payload = buf.subarray(offset + maskLen, offset + maskLen + payloadLen);
  if (masked) {
    const maskingKey = buf.subarray(offset, offset + 4);
    const unmasked = Buffer.allocUnsafe(payload.length);
    for (let i = 0; i < payload.length; i++) {
      unmasked[i] = payload[i]! ^ maskingKey[i % 4]!;
    }
    payload = unmasked;
  }

  return { fin, opcode, payload, nextOffset: offset + maskLen + payloadLen };
}

/** Single unfragmented, unmasked frame. */
export function encodeFrame(opcode: number, payload: Buffer): Buffer {
  const len = payload.length;
  let header: Buffer;

  if (len < 126) {
    header = Buffer.alloc(2);
    header[1] = len;
  } else if (len <= 0xffff) {
    header = Buffer.alloc(4);
    header[1] = 126;
    header.writeUInt16BE(len, 2);
  } else {
    header = Buffer.alloc(10);
    header[1] = 127;
    header.writeBigUInt64BE(BigInt(len), 2);
  }
  header[0] = 0x80 | opcode; // FIN + opcode

  return Buffer.concat([header, payload]);
}

export function encodeTextFrame(data: string): Buffer {
  return encodeFrame(OPCODE.text, Buffer.from(data, 'utf-8'));
}

/** RFC 6455 §5.5: control payloads stay within 125 bytes. */
export function encodeControlFrame(opcode: number, payload: Buffer): Buffer {
  return encodeFrame(opcode, payload.length > 125 ? Buffer.alloc(0) : payload);
}

export function encodeCloseFrame(code: number, reason: string): Buffer {
  const reasonBytes = Buffer.from(reason, 'utf-8').subarray(0, 123);
  const payload = Buffer.alloc(2 + reasonBytes.length);
  payload.writeUInt16BE(code, 0);
  reasonBytes.copy(payload, 2);
  return encodeFrame(OPCODE.close, payload);
}
