import { z } from 'zod';
import { ConfigurationError } from './errors.js';

/**
 * Core domain types for an event travelling over the bus.
 *
 * The payload is opaque bytes; the bus never looks inside it. Headers are a
 * flat string map whose key order carries no meaning.
 */

export type EventHeaders = Readonly<Record<string, string>>;

/** Accepted payload inputs; strings are encoded as UTF-8. */
export type PayloadInput = Buffer | Uint8Array | string;

export interface BusEvent {
  readonly topic: string;
  readonly payload: Buffer;
  readonly headers: EventHeaders;
}

/**
 * Topic and channel names follow the NSQ naming rule so one name works for
 * every broker family: 1-64 characters of `[.a-zA-Z0-9_-]`, optionally
 * suffixed with `#ephemeral`.
 */
const NAME_PATTERN = /^[.a-zA-Z0-9_-]+(#ephemeral)?$/;

export const topicNameSchema = z
  .string()
  .min(1, 'Topic name must not be empty')
  .max(64, 'Topic name must be at most 64 characters')
  .regex(NAME_PATTERN, 'Topic name may only contain [.a-zA-Z0-9_-] and an optional #ephemeral suffix');

export const channelNameSchema = z
  .string()
  .min(1, 'Channel name must not be empty')
  .max(64, 'Channel name must be at most 64 characters')
  .regex(NAME_PATTERN, 'Channel name may only contain [.a-zA-Z0-9_-] and an optional #ephemeral suffix');

/** Widths of the envelope's length fields: u16 count and key length, u32 value length. */
export const MAX_HEADER_COUNT = 0xffff;
export const MAX_HEADER_KEY_BYTES = 0xffff;
export const MAX_HEADER_VALUE_BYTES = 0xffff_ffff;

export const headersSchema = z.record(z.string(), z.string()).superRefine((headers, ctx) => {
  const entries = Object.entries(headers);
  if (entries.length > MAX_HEADER_COUNT) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `${entries.length} headers exceed the limit of ${MAX_HEADER_COUNT}`,
    });
  }
  for (const [key, value] of entries) {
    const keyBytes = Buffer.byteLength(key, 'utf8');
    if (keyBytes > MAX_HEADER_KEY_BYTES) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Header key of ${keyBytes} bytes exceeds ${MAX_HEADER_KEY_BYTES}`,
      });
    }
    const valueBytes = Buffer.byteLength(value, 'utf8');
    if (valueBytes > MAX_HEADER_VALUE_BYTES) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Header value of ${valueBytes} bytes exceeds ${MAX_HEADER_VALUE_BYTES}`,
      });
    }
  }
});

/** Throws ConfigurationError when `name` is not a valid topic name. */
export function assertTopicName(name: string): void {
  const parsed = topicNameSchema.safeParse(name);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid topic "${name}"`, parsed.error.issues.map((i) => i.message));
  }
}

/** Throws ConfigurationError when `name` is not a valid channel name. */
export function assertChannelName(name: string): void {
  const parsed = channelNameSchema.safeParse(name);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid channel "${name}"`, parsed.error.issues.map((i) => i.message));
  }
}

/** Always a private copy, so the caller may reuse its buffer once the call returns. */
export function toPayload(input: PayloadInput): Buffer {
  if (typeof input === 'string') return Buffer.from(input, 'utf8');
  return Buffer.from(input);
}

/**
 * Builds a validated, frozen event. Headers are copied so later mutation of
 * the caller's object cannot leak into an event already handed to the bus.
 */
export function createEvent(topic: string, payload: PayloadInput, headers: Record<string, string> = {}): BusEvent {
  assertTopicName(topic);
  const parsedHeaders = headersSchema.safeParse(headers);
  if (!parsedHeaders.success) {
    throw new ConfigurationError('Invalid event headers', parsedHeaders.error.issues.map((i) => i.message));
  }

  return Object.freeze({
    topic,
    payload: toPayload(payload),
    headers: Object.freeze({ ...parsedHeaders.data }),
  });
}
