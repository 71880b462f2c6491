import { createHash } from 'node:crypto';

/**
 * RFC 6455 framing helpers for the server side of /ws.
 *
 * Server frames are never masked; client frames always are (§5.3).
 * Fragmentation is not supported: every frame is sent with FIN set.
 */

const WS_GUID = '258EAFA5-E914-47DA-95CA-5AB9FC11CF97';
const MAX_PAYLOAD = 1024 * 1024;

export const Opcode = {
  Text: 0x1,
  Close: 0x8,
  Ping: 0x9,
  Pong: 0xa,
} as const;

export interface DecodedFrame {
  opcode: number;
  payload: Buffer;
  /** Bytes consumed from the input buffer. */
  length: number;
}

export function acceptKey(secWebSocketKey: string): string {
  return createHash('sha1').update(secWebSocketKey + WS_GUID).digest('base64');
}

export function encodeFrame(opcode: number, payload: Buffer): Buffer {
  const len = payload.length;
  let header: Buffer;

  if (len < 126) {
    header = Buffer.from([0x80 | opcode, len]);
  } else if (len <= 0xffff) {
    header = Buffer.alloc(4);
    header[0] = 0x80 | opcode;
    header[1] = 126;
    header.writeUInt16BE(len, 2);
  } else {
    header = Buffer.alloc(10);
    header[0] = 0x80 | opcode;
    header[1] = 127;
    header.writeBigUInt64BE(BigInt(len), 2);
  }

  return Buffer.concat([header, payload]);
}

export function encodeText(text: string): Buffer {
  return encodeFrame(Opcode.Text, Buffer.from(text, 'utf-8'));
}

/**
 * Decodes the frame at the start of `buf`, or returns null when more
 * bytes are needed. Throws on payloads above 1 MiB.
 */
export function decodeFrame(buf: Buffer): DecodedFrame | null {
  if (buf.length < 2) return null;

  const first = buf.readUInt8(0);
  const second = buf.readUInt8(1);
  const masked = (second & 0x80) !== 0;
  let offset = 2;
  let len = second & 0x7f;

  if (len === 126) {
    if (buf.length < offset + 2) return null;
    len = buf.readUInt16BE(offset);
    offset += 2;
  } else if (len === 127) {
    if (buf.length < offset + 8) return null;
    const big = buf.readBigUInt64BE(offset);
    if (big > BigInt(MAX_PAYLOAD)) throw new Error('WebSocket frame too large');
    len = Number(big);
    offset += 8;
  }

  if (len > MAX_PAYLOAD) throw new Error('WebSocket frame too large');

  const maskOffset = offset;
  if (masked) offset += 4;
  if (buf.length < offset + len) return null;

  const payload = Buffer.from(buf.subarray(offset, offset + len));
  if (masked) {
    for (let i = 0; i < payload.length; i++) {
      payload.writeUInt8(payload.readUInt8(i) ^ buf.readUInt8(maskOffset + (i % 4)), i);
    }
  }

  return { opcode: first & 0x0f, payload, length: offset + len };
}
