import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import { z } from 'zod';
import type { BusEvent } from '../../domain/event.js';
import type { RawMessage } from '../../domain/in-flight.js';
import { ProtocolError } from '../../domain/errors.js';
import type {
  BrokerReceipt,
  Capability,
  SessionOptions,
  SubscriptionSession,
  WireAdapter,
} from '../../domain/ports.js';
import { withTimeout } from '../../application/timing.js';
import { decodeEnvelope, encodeEnvelope } from './envelope.js';

export type RedisStreamsAdapterOptions = Readonly<{
  log: Logger;
  /** Prepended to every topic to form the stream key. */
  keyPrefix: string;
  /** How long one XREADGROUP may block; bounds how fast `next` sees an abort. */
  blockMs: number;
  /** How often idle pending entries are reclaimed with XAUTOCLAIM. */
  claimIntervalMs: number;
  /** Entries pending longer than this are redelivered. */
  messageTimeoutMs: number;
  now?: (() => number) | undefined;
}>;

const ENVELOPE_FIELD = 'envelope';
const ATTEMPTS_FIELD = 'attempts';

const CAPABILITIES: ReadonlySet<Capability> = new Set(['publish', 'subscribe', 'ack', 'requeue', 'heartbeat']);

// [id, [field, value, ...]]; fields are null for entries deleted while pending
const entrySchema = z.tuple([z.string(), z.array(z.string()).nullable()]);
const readReplySchema = z.array(z.tuple([z.string(), z.array(entrySchema)])).nullable();
// [cursor, entries, deletedIds?]; Redis 6.2 reports deleted entries as null
const autoclaimReplySchema = z.tuple([z.string(), z.array(entrySchema.nullable())]).rest(z.unknown());
// XCLAIM … JUSTID: the ids that are now owned by the caller
const claimReplySchema = z.array(z.string());

type StreamEntry = z.infer<typeof entrySchema>;

type Tracked = Readonly<{ envelope: string; attempts: number }>;

export function streamKey(prefix: string, topic: string): string {
  return `${prefix}${topic}`;
}

/** Maps ioredis reply errors onto the bus taxonomy; other errors pass through. */
function translate(err: unknown): unknown {
  if (err instanceof Error && err.name === 'ReplyError') {
    const code = err.message.split(' ', 1)[0];
    return new ProtocolError(`redis: ${err.message}`, { brokerCode: code, fatal: false, cause: err });
  }
  return err;
}

async function command<T>(run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (err: unknown) {
    throw translate(err);
  }
}

function fieldMap(fields: readonly string[]): Map<string, string> {
  const map = new Map<string, string>();
  for (let i = 0; i + 1 < fields.length; i += 2) {
    const key = fields[i];
    const value = fields[i + 1];
    if (key !== undefined && value !== undefined) map.set(key, value);
  }
  return map;
}

/** Entry ids are `<ms>-<seq>`; the first half is the append time. */
function entryTimestamp(id: string): number {
  const ms = Number.parseInt(id.split('-', 1)[0] ?? '', 10);
  return Number.isFinite(ms) ? ms : 0;
}

/**
 * Redis Streams as a broker: topic → stream, channel → consumer group.
 *
 * Streams have no native requeue. A requeued entry stays in its group's
 * pending list and is claimed back after the delay, so groups reading the
 * same stream never see another group's retries. The broker-side timeout is
 * emulated by periodically claiming entries idle for longer than
 * `messageTimeoutMs`.
 */
export class RedisStreamsAdapter implements WireAdapter<Redis> {
  readonly family = 'redis-streams' as const;
  readonly capabilities = CAPABILITIES;

  constructor(private readonly options: RedisStreamsAdapterOptions) {}

  encode(event: BusEvent): Buffer {
    return encodeEnvelope(event);
  }

  decode(bytes: Buffer): BusEvent {
    return decodeEnvelope(bytes);
  }

  async negotiate(client: Redis): Promise<void> {
    const reply = await command(() => client.ping());
    if (reply !== 'PONG') throw new ProtocolError(`Unexpected PING reply "${reply}"`);
  }

  async publish(client: Redis, topic: string, body: Buffer, timeoutMs: number): Promise<BrokerReceipt> {
    const key = streamKey(this.options.keyPrefix, topic);
    const id = await withTimeout(
      command(() => client.xadd(key, '*', ENVELOPE_FIELD, body.toString('base64'), ATTEMPTS_FIELD, '1')),
      timeoutMs,
      `XADD ${key}`,
    );
    return id === null ? {} : { messageId: id };
  }

  async subscribe(client: Redis, options: SessionOptions): Promise<SubscriptionSession> {
    const key = streamKey(this.options.keyPrefix, options.topic);
    await this.ensureGroup(client, key, options.channel);
    return new RedisStreamsSession(client, key, options, this.options);
  }

  async heartbeat(client: Redis): Promise<void> {
    await command(() => client.ping());
  }

  /**
   * Creates the group at "$" so a new channel sees only new events.
   * Anything already pending for this consumer is recovered by the session.
   */
  private async ensureGroup(client: Redis, key: string, group: string): Promise<void> {
    try {
      await client.xgroup('CREATE', key, group, '$', 'MKSTREAM');
      this.options.log.info({ stream: key, group }, 'Consumer group created');
    } catch (err: unknown) {
      if (err instanceof Error && err.message.includes('BUSYGROUP')) {
        this.options.log.debug({ stream: key, group }, 'Consumer group already exists');
        return;
      }
      throw translate(err);
    }
  }
}

class RedisStreamsSession implements SubscriptionSession {
  readonly messageTimeoutMs: number;
  private readonly buffered: RawMessage[] = [];
  private readonly tracked = new Map<string, Tracked>();
  private readonly requeues = new Map<string, NodeJS.Timeout>();
  private readonly group: string;
  private readonly consumer: string;
  private readonly batch: number;
  private readonly now: () => number;
  private pendingCursor: string | undefined = '0';
  private claimCursor = '0-0';
  private lastClaim: number;
  private isClosed = false;

  constructor(
    private readonly client: Redis,
    private readonly key: string,
    options: SessionOptions,
    private readonly config: RedisStreamsAdapterOptions,
  ) {
    this.group = options.channel;
    this.consumer = options.consumerName;
    this.batch = options.maxInFlight;
    this.messageTimeoutMs = config.messageTimeoutMs;
    this.now = config.now ?? Date.now;
    this.lastClaim = this.now();
  }

  get closed(): boolean {
    return this.isClosed;
  }

  async next(signal: AbortSignal): Promise<RawMessage | null> {
    while (!this.isClosed && !signal.aborted) {
      const message = this.buffered.shift();
      if (message) return message;

      if (this.now() - this.lastClaim >= this.config.claimIntervalMs) {
        await this.claimIdle();
        continue;
      }

      if (this.pendingCursor !== undefined) {
        await this.readPending(this.pendingCursor);
        continue;
      }

      const reply: unknown = await command(() =>
        this.client.xreadgroup(
          'GROUP', this.group, this.consumer,
          'COUNT', this.batch,
          'BLOCK', this.config.blockMs,
          'STREAMS', this.key,
          '>',
        ),
      );
      await this.accept(this.parseRead(reply), 0);
    }
    return null;
  }

  async ack(messageId: string): Promise<void> {
    this.tracked.delete(messageId);
    await command(() => this.client.xack(this.key, this.group, messageId));
  }

  async requeue(messageId: string, delayMs: number): Promise<void> {
    if (!this.tracked.has(messageId)) {
      this.config.log.warn({ stream: this.key, messageId }, 'Requeue of an unknown entry ignored');
      return;
    }
    if (delayMs <= 0) {
      await this.redeliver(messageId);
      return;
    }
    const timer = setTimeout(() => {
      this.requeues.delete(messageId);
      this.redeliver(messageId).catch((err: unknown) => {
        this.config.log.error({ err, stream: this.key, messageId }, 'Deferred requeue failed; entry stays pending');
      });
    }, delayMs);
    this.requeues.set(messageId, timer);
  }

  /** Resets the idle time so XAUTOCLAIM leaves the entry alone. */
  async touch(messageId: string): Promise<void> {
    await this.claim(messageId);
  }

  /**
   * Entries still waiting out a requeue delay stay pending in the group;
   * pending recovery or XAUTOCLAIM hands them out again.
   */
  async close(): Promise<void> {
    if (this.isClosed) return;
    this.isClosed = true;
    for (const timer of this.requeues.values()) clearTimeout(timer);
    if (this.requeues.size > 0) {
      this.config.log.debug(
        { stream: this.key, group: this.group, count: this.requeues.size },
        'Deferred requeues left pending',
      );
    }
    this.requeues.clear();
    this.tracked.clear();
    this.buffered.length = 0;
  }

  /** Claims the entry back for this consumer and queues it as the next attempt. */
  private async redeliver(messageId: string): Promise<void> {
    const entry = this.tracked.get(messageId);
    if (!entry || this.isClosed) return;
    const owned = await this.claim(messageId);
    if (!owned) {
      this.tracked.delete(messageId);
      this.config.log.debug({ stream: this.key, group: this.group, messageId }, 'Requeued entry is no longer pending');
      return;
    }
    this.queue(messageId, entry.envelope, entry.attempts + 1);
  }

  /** XCLAIM with no idle threshold; false when the entry left the pending list. */
  private async claim(messageId: string): Promise<boolean> {
    const reply: unknown = await command(() =>
      this.client.call('XCLAIM', this.key, this.group, this.consumer, '0', messageId, 'JUSTID'),
    );
    const parsed = claimReplySchema.safeParse(reply);
    if (!parsed.success) {
      throw new ProtocolError('Unexpected XCLAIM reply', { fatal: false, cause: parsed.error });
    }
    return parsed.data.includes(messageId);
  }

  /** This consumer's own pending list, left over from a crash or restart. */
  private async readPending(cursor: string): Promise<void> {
    const reply: unknown = await command(() =>
      this.client.xreadgroup(
        'GROUP', this.group, this.consumer,
        'COUNT', this.batch,
        'STREAMS', this.key,
        cursor,
      ),
    );
    const entries = this.parseRead(reply);
    const last = entries.at(-1);
    this.pendingCursor = last === undefined ? undefined : last[0];
    if (entries.length > 0) {
      this.config.log.info({ stream: this.key, group: this.group, count: entries.length }, 'Recovered pending entries');
    }
    await this.accept(entries, 0);
  }

  private async claimIdle(): Promise<void> {
    this.lastClaim = this.now();
    const reply: unknown = await command(() =>
      this.client.call(
        'XAUTOCLAIM', this.key, this.group, this.consumer,
        String(this.messageTimeoutMs), this.claimCursor,
        'COUNT', String(this.batch),
      ),
    );
    const parsed = autoclaimReplySchema.safeParse(reply);
    if (!parsed.success) {
      throw new ProtocolError('Unexpected XAUTOCLAIM reply', { fatal: false, cause: parsed.error });
    }
    const [cursor, entries] = parsed.data;
    this.claimCursor = cursor;
    const claimed = entries.filter((entry): entry is StreamEntry => entry !== null);
    if (claimed.length > 0) {
      this.config.log.warn({ stream: this.key, group: this.group, count: claimed.length }, 'Reclaimed timed-out entries');
    }
    // A claim is a redelivery after a timeout.
    await this.accept(claimed, 1);
  }

  private parseRead(reply: unknown): StreamEntry[] {
    const parsed = readReplySchema.safeParse(reply);
    if (!parsed.success) {
      throw new ProtocolError('Unexpected XREADGROUP reply', { fatal: false, cause: parsed.error });
    }
    return (parsed.data ?? []).flatMap(([, entries]) => entries);
  }

  private async accept(entries: readonly StreamEntry[], extraAttempts: number): Promise<void> {
    for (const [id, fields] of entries) {
      // Still waiting out its requeue delay.
      if (this.requeues.has(id)) continue;
      const map = fieldMap(fields ?? []);
      const envelope = map.get(ENVELOPE_FIELD);
      if (envelope === undefined) {
        this.config.log.error({ stream: this.key, messageId: id }, 'Dropping stream entry without an envelope');
        await command(() => this.client.xack(this.key, this.group, id));
        continue;
      }
      const stored = Number.parseInt(map.get(ATTEMPTS_FIELD) ?? '1', 10);
      const attempts = (Number.isFinite(stored) && stored > 0 ? stored : 1) + extraAttempts;
      this.queue(id, envelope, attempts);
    }
  }

  private queue(id: string, envelope: string, attempts: number): void {
    this.tracked.set(id, { envelope, attempts });
    this.buffered.push({
      id,
      attempts,
      timestamp: entryTimestamp(id),
      body: Buffer.from(envelope, 'base64'),
    });
  }
}
