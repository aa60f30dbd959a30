import type { RawMessage } from '../../domain/in-flight.js';
import { ProtocolError } from '../../domain/errors.js';

/**
 * NSQ TCP protocol V2: command encoders and frame decoding.
 *
 * A frame on the wire is `u32 size | u32 type | data`, where size counts
 * the type and data. The link strips the size prefix; `parseFrame` takes
 * the remainder.
 */

export const MAGIC_V2 = Buffer.from('  V2', 'ascii');

export const FRAME_RESPONSE = 0;
export const FRAME_ERROR = 1;
export const FRAME_MESSAGE = 2;

export const HEARTBEAT = '_heartbeat_';
export const CLOSE_WAIT = 'CLOSE_WAIT';

const MESSAGE_ID_LENGTH = 16;
const MESSAGE_HEADER_LENGTH = 8 + 2 + MESSAGE_ID_LENGTH;

/** Error codes after which nsqd keeps the connection open. */
const NON_FATAL_ERRORS = new Set(['E_FIN_FAILED', 'E_REQ_FAILED', 'E_TOUCH_FAILED']);

export type NsqFrame =
  | { readonly type: 'heartbeat' }
  | { readonly type: 'response'; readonly text: string; readonly body: Buffer }
  | { readonly type: 'error'; readonly code: string; readonly message: string; readonly fatal: boolean }
  | { readonly type: 'message'; readonly message: RawMessage };

function line(...words: string[]): Buffer {
  return Buffer.from(`${words.join(' ')}\n`, 'utf8');
}

function withBody(header: Buffer, body: Buffer): Buffer {
  const size = Buffer.alloc(4);
  size.writeUInt32BE(body.length, 0);
  return Buffer.concat([header, size, body]);
}

export const commands = {
  identify(settings: Readonly<Record<string, unknown>>): Buffer {
    return withBody(line('IDENTIFY'), Buffer.from(JSON.stringify(settings), 'utf8'));
  },
  sub(topic: string, channel: string): Buffer {
    return line('SUB', topic, channel);
  },
  rdy(count: number): Buffer {
    return line('RDY', String(count));
  },
  fin(messageId: string): Buffer {
    return line('FIN', messageId);
  },
  req(messageId: string, delayMs: number): Buffer {
    return line('REQ', messageId, String(Math.max(0, Math.round(delayMs))));
  },
  touch(messageId: string): Buffer {
    return line('TOUCH', messageId);
  },
  nop(): Buffer {
    return line('NOP');
  },
  cls(): Buffer {
    return line('CLS');
  },
  pub(topic: string, body: Buffer): Buffer {
    return withBody(line('PUB', topic), body);
  },
};

/** Builds a complete wire frame, size prefix included. */
export function encodeFrame(type: number, data: Buffer): Buffer {
  const head = Buffer.alloc(8);
  head.writeUInt32BE(data.length + 4, 0);
  head.writeUInt32BE(type, 4);
  return Buffer.concat([head, data]);
}

export function encodeMessageData(message: RawMessage): Buffer {
  const head = Buffer.alloc(MESSAGE_HEADER_LENGTH);
  head.writeBigInt64BE(BigInt(message.timestamp) * 1_000_000n, 0);
  head.writeUInt16BE(message.attempts, 8);
  head.write(message.id.padEnd(MESSAGE_ID_LENGTH, '0').slice(0, MESSAGE_ID_LENGTH), 10, 'ascii');
  return Buffer.concat([head, message.body]);
}

export function parseFrame(frame: Buffer): NsqFrame {
  if (frame.length < 4) {
    throw new ProtocolError(`Frame too short (${frame.length} bytes)`);
  }
  const type = frame.readUInt32BE(0);
  const data = frame.subarray(4);

  switch (type) {
    case FRAME_RESPONSE: {
      const text = data.toString('utf8');
      if (text === HEARTBEAT) return { type: 'heartbeat' };
      return { type: 'response', text, body: data };
    }
    case FRAME_ERROR: {
      const text = data.toString('utf8');
      const space = text.indexOf(' ');
      const code = space === -1 ? text : text.slice(0, space);
      return {
        type: 'error',
        code,
        message: space === -1 ? '' : text.slice(space + 1),
        fatal: !NON_FATAL_ERRORS.has(code),
      };
    }
    case FRAME_MESSAGE:
      return { type: 'message', message: parseMessage(data) };
    default:
      throw new ProtocolError(`Unknown frame type ${type}`);
  }
}

function parseMessage(data: Buffer): RawMessage {
  if (data.length < MESSAGE_HEADER_LENGTH) {
    throw new ProtocolError(`Message frame too short (${data.length} bytes)`);
  }
  return {
    timestamp: Number(data.readBigInt64BE(0) / 1_000_000n),
    attempts: data.readUInt16BE(8),
    id: data.subarray(10, MESSAGE_HEADER_LENGTH).toString('ascii'),
    body: Buffer.from(data.subarray(MESSAGE_HEADER_LENGTH)),
  };
}

export function toProtocolError(frame: Extract<NsqFrame, { type: 'error' }>): ProtocolError {
  const detail = frame.message ? `${frame.code} ${frame.message}` : frame.code;
  return new ProtocolError(`nsqd: ${detail}`, { brokerCode: frame.code, fatal: frame.fatal });
}
