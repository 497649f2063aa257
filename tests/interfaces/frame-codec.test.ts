import { describe, it, expect } from 'vitest';
import {
  MAX_FRAME_PAYLOAD,
  OPCODE,
  encodeCloseFrame,
  encodeControlFrame,
  encodeFrame,
  encodeTextFrame,
  tryParseFrame,
} from '../../src/interfaces/ws/frame-codec.js';

/** Client-side frame: FIN set, payload masked with `key`. */
function maskedFrame(opcode: number, payload: Buffer, key = Buffer.from([1, 2, 3, 4]), fin = true): Buffer {
  const masked = Buffer.alloc(payload.length);
  for (let i = 0; i < payload.length; i++) masked[i] = (payload[i] ?? 0) ^ (key[i % 4] ?? 0);
  const header = Buffer.from([(fin ? 0x80 : 0) | opcode, 0x80 | payload.length]);
  return Buffer.concat([header, key, masked]);
}

describe('tryParseFrame', () => {
  it('waits for a full header', () => {
    expect(tryParseFrame(Buffer.from([0x81]))).toBeNull();
  });

  it('unmasks a client text frame', () => {
    const frame = tryParseFrame(maskedFrame(OPCODE.text, Buffer.from('hello')));

    expect(frame?.fin).toBe(true);
    expect(frame?.opcode).toBe(OPCODE.text);
    expect(frame?.payload.toString('utf-8')).toBe('hello');
    expect(frame?.nextOffset).toBe(11);
  });

  it('reports a non-final fragment', () => {
    const frame = tryParseFrame(maskedFrame(OPCODE.text, Buffer.from('he'), undefined, false));
    expect(frame?.fin).toBe(false);
  });

  it('waits for the rest of a payload', () => {
    const whole = maskedFrame(OPCODE.text, Buffer.from('hello'));
    expect(tryParseFrame(whole.subarray(0, whole.length - 1))).toBeNull();
  });

  it('parses back-to-back frames by offset', () => {
    const buf = Buffer.concat([maskedFrame(OPCODE.text, Buffer.from('a')), maskedFrame(OPCODE.ping, Buffer.alloc(0))]);
    const first = tryParseFrame(buf);
    const second = tryParseFrame(buf.subarray(first?.nextOffset ?? 0));

    expect(first?.payload.toString()).toBe('a');
    expect(second?.opcode).toBe(OPCODE.ping);
    expect(second?.nextOffset).toBe(6);
  });

  it('reads 16-bit extended lengths', () => {
    const payload = Buffer.alloc(300, 0x61);
    const frame = tryParseFrame(encodeFrame(OPCODE.text, payload));

    expect(frame?.payload.length).toBe(300);
    expect(frame?.nextOffset).toBe(304);
  });

  it('refuses payloads over the limit', () => {
    const header = Buffer.alloc(10);
    header[0] = 0x82;
    header[1] = 127;
    header.writeBigUInt64BE(BigInt(MAX_FRAME_PAYLOAD + 1), 2);

    expect(() => tryParseFrame(header)).toThrow(`WebSocket frame of ${MAX_FRAME_PAYLOAD + 1} bytes exceeds limit`);
  });
});

describe('encoders', () => {
  it('writes a short unmasked text frame', () => {
    expect([...encodeTextFrame('hi')]).toEqual([0x81, 2, 0x68, 0x69]);
  });

  it('writes the close code and reason', () => {
    expect([...encodeCloseFrame(1000, 'bye')]).toEqual([0x88, 5, 0x03, 0xe8, 0x62, 0x79, 0x65]);
  });

  it('truncates the close reason to fit a control frame', () => {
    const frame = encodeCloseFrame(4400, 'x'.repeat(200));
    expect(frame[1]).toBe(125);
  });

  it('empties an oversized control payload', () => {
    expect([...encodeControlFrame(OPCODE.ping, Buffer.alloc(200))]).toEqual([0x89, 0]);
    expect([...encodeControlFrame(OPCODE.pong, Buffer.from('ok'))]).toEqual([0x8a, 2, 0x6f, 0x6b]);
  });
});
