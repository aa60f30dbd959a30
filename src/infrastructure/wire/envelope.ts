import type { BusEvent } from '../../domain/event.js';
import { createEvent } from '../../domain/event.js';
import { BusError, ProtocolError } from '../../domain/errors.js';

/**
 * Binary event envelope shared by every broker family:
 *
 *   "RB" | u8 version | u16 topicLen | topic | u16 headerCount
 *   | (u16 keyLen | key | u32 valueLen | value)* | payload
 *
 * Integers are big-endian, strings UTF-8. The payload runs to the end of
 * the buffer, so it needs no length prefix.
 */

const MAGIC = 'RB';
export const ENVELOPE_VERSION = 1;

export function encodeEnvelope(event: BusEvent): Buffer {
  const topic = Buffer.from(event.topic, 'utf8');
  const entries = Object.entries(event.headers).map(
    ([key, value]) => [Buffer.from(key, 'utf8'), Buffer.from(value, 'utf8')] as const,
  );

  const parts: Buffer[] = [];
  const head = Buffer.alloc(5);
  head.write(MAGIC, 0, 'ascii');
  head.writeUInt8(ENVELOPE_VERSION, 2);
  head.writeUInt16BE(topic.length, 3);
  parts.push(head, topic);

  const count = Buffer.alloc(2);
  count.writeUInt16BE(entries.length, 0);
  parts.push(count);

  for (const [key, value] of entries) {
    const keyLen = Buffer.alloc(2);
    keyLen.writeUInt16BE(key.length, 0);
    const valueLen = Buffer.alloc(4);
    valueLen.writeUInt32BE(value.length, 0);
    parts.push(keyLen, key, valueLen, value);
  }

  parts.push(event.payload);
  return Buffer.concat(parts);
}

class Reader {
  private offset = 0;

  constructor(private readonly bytes: Buffer) {}

  get rest(): Buffer {
    return this.bytes.subarray(this.offset);
  }

  take(length: number, what: string): Buffer {
    if (this.offset + length > this.bytes.length) {
      throw new ProtocolError(`Truncated envelope: ${what} needs ${length} bytes at offset ${this.offset}`);
    }
    const slice = this.bytes.subarray(this.offset, this.offset + length);
    this.offset += length;
    return slice;
  }

  u8(what: string): number {
    return this.take(1, what).readUInt8(0);
  }

  u16(what: string): number {
    return this.take(2, what).readUInt16BE(0);
  }

  u32(what: string): number {
    return this.take(4, what).readUInt32BE(0);
  }
}

export function decodeEnvelope(bytes: Buffer): BusEvent {
  const reader = new Reader(bytes);
  const magic = reader.take(2, 'magic').toString('ascii');
  if (magic !== MAGIC) {
    throw new ProtocolError(`Not an event envelope (magic "${magic}")`);
  }
  const version = reader.u8('version');
  if (version !== ENVELOPE_VERSION) {
    throw new ProtocolError(`Unsupported envelope version ${version}`);
  }

  const topic = reader.take(reader.u16('topic length'), 'topic').toString('utf8');
  const headerCount = reader.u16('header count');
  const headers: Record<string, string> = {};
  for (let i = 0; i < headerCount; i++) {
    const key = reader.take(reader.u16('header key length'), 'header key').toString('utf8');
    headers[key] = reader.take(reader.u32('header value length'), 'header value').toString('utf8');
  }

  // createEvent copies the payload, so the event does not pin the receive buffer.
  try {
    return createEvent(topic, reader.rest, headers);
  } catch (err: unknown) {
    if (err instanceof BusError) {
      throw new ProtocolError(`Envelope carries an invalid event: ${err.message}`, { cause: err });
    }
    throw err;
  }
}
