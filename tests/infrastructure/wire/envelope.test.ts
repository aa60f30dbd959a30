import { describe, it, expect } from 'vitest';
import { decodeEnvelope, encodeEnvelope } from '../../../src/infrastructure/wire/envelope.js';
import { createEvent } from '../../../src/domain/event.js';
import { ProtocolError } from '../../../src/domain/errors.js';

describe('encodeEnvelope', () => {
  it('lays out magic, version, topic, headers and payload', () => {
    const bytes = encodeEnvelope(createEvent('t', 'p', { a: 'b' }));

    expect([...bytes]).toEqual([
      0x52, 0x42, // "RB"
      1, // version
      0, 1, 0x74, // topic "t"
      0, 1, // one header
      0, 1, 0x61, // key "a"
      0, 0, 0, 1, 0x62, // value "b"
      0x70, // payload "p"
    ]);
  });
});

describe('decodeEnvelope', () => {
  it('restores topic, headers and payload', () => {
    const event = createEvent('orders', Buffer.from([0, 1, 2, 255]), { 'content-type': 'application/octet-stream', note: 'héllo' });

    const decoded = decodeEnvelope(encodeEnvelope(event));

    expect(decoded.topic).toBe('orders');
    expect(decoded.headers).toEqual({ 'content-type': 'application/octet-stream', note: 'héllo' });
    expect([...decoded.payload]).toEqual([0, 1, 2, 255]);
  });

  it('accepts an empty payload', () => {
    const decoded = decodeEnvelope(encodeEnvelope(createEvent('orders', '')));

    expect(decoded.payload.length).toBe(0);
    expect(decoded.headers).toEqual({});
  });

  it('copies the payload out of the receive buffer', () => {
    const bytes = encodeEnvelope(createEvent('orders', 'abc'));
    const decoded = decodeEnvelope(bytes);

    bytes[bytes.length - 1] = 0x7a;

    expect(decoded.payload.toString()).toBe('abc');
  });

  it('rejects foreign bytes', () => {
    expect(() => decodeEnvelope(Buffer.from('XX\u0001'))).toThrow('Not an event envelope (magic "XX")');
  });

  it('rejects an unknown version', () => {
    const bytes = encodeEnvelope(createEvent('orders', 'x'));
    bytes[2] = 2;

    expect(() => decodeEnvelope(bytes)).toThrow('Unsupported envelope version 2');
  });

  it('rejects a truncated envelope', () => {
    const bytes = encodeEnvelope(createEvent('orders', 'x')).subarray(0, 6);

    expect(() => decodeEnvelope(bytes)).toThrow('Truncated envelope: topic needs 6 bytes at offset 5');
  });

  it('rejects an envelope whose topic name is invalid', () => {
    const bytes = encodeEnvelope({ topic: 'bad topic', payload: Buffer.from('x'), headers: {} });

    expect(() => decodeEnvelope(bytes)).toThrow(ProtocolError);
    expect(() => decodeEnvelope(bytes)).toThrow(/^Envelope carries an invalid event: Invalid topic "bad topic"/);
  });
});
