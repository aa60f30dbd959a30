import { describe, it, expect, vi } from 'vitest';
import type { Redis } from 'ioredis';
import { RedisStreamsAdapter, streamKey } from '../../../src/infrastructure/wire/redis-streams-adapter.js';
import { decodeEnvelope, encodeEnvelope } from '../../../src/infrastructure/wire/envelope.js';
import { createEvent } from '../../../src/domain/event.js';
import { ProtocolError } from '../../../src/domain/errors.js';
import { fakeLogger } from '../../helpers.js';

const KEY = 'relaybus:orders';
const SESSION = { topic: 'orders', channel: 'billing', maxInFlight: 5, consumerName: 'test-consumer' };
const B64 = encodeEnvelope(createEvent('orders', 'hello')).toString('base64');

type Reply = (...args: unknown[]) => Promise<unknown>;

/** Stand-in for the ioredis client: only the commands the adapter sends. */
function fakeRedis() {
  return {
    ping: vi.fn<Reply>(async () => 'PONG'),
    xadd: vi.fn<Reply>(async () => '9-0'),
    xgroup: vi.fn<Reply>(async () => 'OK'),
    xreadgroup: vi.fn<Reply>(async () => null),
    xack: vi.fn<Reply>(async () => 1),
    call: vi.fn<Reply>(async () => ['0-0', [], []]),
  };
}

function asClient(fake: ReturnType<typeof fakeRedis>): Redis {
  return fake as unknown as Redis;
}

function replyError(message: string): Error {
  const err = new Error(message);
  err.name = 'ReplyError';
  return err;
}

/** One stream read by several consumer groups; enough to see which group gets which entry. */
function streamModel() {
  const redis = fakeRedis();
  const stream: Array<[string, string[]]> = [];
  const groups = new Map<string, { lastDelivered: number; pending: Set<string> }>();
  const idle = new AbortController();
  const seq = (id: string) => Number.parseInt(id, 10);

  redis.xadd.mockImplementation(async (...args) => {
    const id = `${stream.length + 1}-0`;
    stream.push([id, args.slice(2).map(String)]);
    return id;
  });
  redis.xgroup.mockImplementation(async (...args) => {
    groups.set(String(args[2]), { lastDelivered: stream.length, pending: new Set() });
    return 'OK';
  });
  redis.xreadgroup.mockImplementation(async (...args) => {
    const group = groups.get(String(args[1]));
    if (!group) throw replyError('NOGROUP No such consumer group');
    const cursor = String(args.at(-1));
    if (cursor !== '>') {
      return [[KEY, stream.filter(([id]) => group.pending.has(id) && seq(id) > seq(cursor))]];
    }
    const fresh = stream.slice(group.lastDelivered);
    if (fresh.length === 0) {
      // Nothing new: end the read loop instead of blocking.
      idle.abort();
      return null;
    }
    group.lastDelivered = stream.length;
    for (const [id] of fresh) group.pending.add(id);
    return [[KEY, fresh]];
  });
  redis.xack.mockImplementation(async (...args) =>
    groups.get(String(args[1]))?.pending.delete(String(args[2])) ? 1 : 0,
  );
  redis.call.mockImplementation(async (...args) => {
    if (args[0] !== 'XCLAIM') return ['0-0', [], []];
    const id = String(args[5]);
    return groups.get(String(args[2]))?.pending.has(id) ? [id] : [];
  });
  return { client: asClient(redis), idle, stream };
}

function entries(...list: Array<[string, string[] | null]>): unknown {
  return [[KEY, list]];
}

function setup(clock = { now: 0 }) {
  const log = fakeLogger();
  const redis = fakeRedis();
  const adapter = new RedisStreamsAdapter({
    log,
    keyPrefix: 'relaybus:',
    blockMs: 2_000,
    claimIntervalMs: 30_000,
    messageTimeoutMs: 60_000,
    now: () => clock.now,
  });
  return { log, redis, client: asClient(redis), adapter, clock };
}

describe('streamKey', () => {
  it('prefixes the topic', () => {
    expect(streamKey('relaybus:', 'orders')).toBe('relaybus:orders');
  });
});

describe('RedisStreamsAdapter', () => {
  it('expects PONG from the handshake', async () => {
    const { adapter, redis, client } = setup();
    await expect(adapter.negotiate(client)).resolves.toBeUndefined();

    redis.ping.mockResolvedValueOnce('NOPE');
    await expect(adapter.negotiate(client)).rejects.toThrow('Unexpected PING reply "NOPE"');
  });

  it('decodes what it encodes', () => {
    const { adapter } = setup();

    const decoded = adapter.decode(adapter.encode(createEvent('orders', 'héllo', { trace: 'abc' })));

    expect(decoded).toEqual({ topic: 'orders', headers: { trace: 'abc' }, payload: Buffer.from('héllo') });
  });

  it('appends the envelope with XADD and returns the entry id', async () => {
    const { adapter, redis, client } = setup();

    const body = adapter.encode(createEvent('orders', 'hello', { k: 'v' }));
    const receipt = await adapter.publish(client, 'orders', body, 1_000);

    expect(receipt).toEqual({ messageId: '9-0' });
    const [key, id, field, value, attemptsField, attempts] = redis.xadd.mock.calls[0] ?? [];
    expect([key, id, field, attemptsField, attempts]).toEqual([KEY, '*', 'envelope', 'attempts', '1']);
    const event = decodeEnvelope(Buffer.from(String(value), 'base64'));
    expect(event.payload.toString()).toBe('hello');
    expect(event.headers).toEqual({ k: 'v' });
  });

  it('turns a Redis reply error into a non-fatal protocol error', async () => {
    const { adapter, redis, client } = setup();
    redis.xadd.mockRejectedValueOnce(replyError('WRONGTYPE Operation against a key holding the wrong kind of value'));

    const body = adapter.encode(createEvent('orders', 'x'));
    const err = await adapter.publish(client, 'orders', body, 1_000).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProtocolError);
    expect(err).toHaveProperty('brokerCode', 'WRONGTYPE');
    expect(err).toHaveProperty('fatal', false);
  });

  it('creates the consumer group from the stream tail', async () => {
    const { adapter, redis, client, log } = setup();

    await adapter.subscribe(client, SESSION);

    expect(redis.xgroup).toHaveBeenCalledWith('CREATE', KEY, 'billing', '$', 'MKSTREAM');
    expect(log.info).toHaveBeenCalledWith({ stream: KEY, group: 'billing' }, 'Consumer group created');
  });

  it('reuses an existing consumer group', async () => {
    const { adapter, redis, client, log } = setup();
    redis.xgroup.mockRejectedValueOnce(replyError('BUSYGROUP Consumer Group name already exists'));

    await expect(adapter.subscribe(client, SESSION)).resolves.toBeDefined();
    expect(log.debug).toHaveBeenCalledWith({ stream: KEY, group: 'billing' }, 'Consumer group already exists');
  });
});

describe('Redis Streams session', () => {
  it('recovers its own pending entries before reading new ones', async () => {
    const { adapter, redis, client } = setup();
    redis.xreadgroup
      .mockResolvedValueOnce(entries(['1-0', ['envelope', B64, 'attempts', '2']]))
      .mockResolvedValueOnce(entries())
      .mockResolvedValueOnce(entries(['5-0', ['envelope', B64, 'attempts', '1']]));
    const session = await adapter.subscribe(client, SESSION);
    const signal = new AbortController().signal;

    const pending = await session.next(signal);
    const fresh = await session.next(signal);

    expect(pending).toMatchObject({ id: '1-0', attempts: 2, timestamp: 1 });
    expect(fresh).toMatchObject({ id: '5-0', attempts: 1, timestamp: 5 });
    expect(fresh?.body.toString('base64')).toBe(B64);
    expect(redis.xreadgroup.mock.calls).toEqual([
      ['GROUP', 'billing', 'test-consumer', 'COUNT', 5, 'STREAMS', KEY, '0'],
      ['GROUP', 'billing', 'test-consumer', 'COUNT', 5, 'STREAMS', KEY, '1-0'],
      ['GROUP', 'billing', 'test-consumer', 'COUNT', 5, 'BLOCK', 2_000, 'STREAMS', KEY, '>'],
    ]);
  });

  it('acks with XACK', async () => {
    const { adapter, redis, client } = setup();
    const session = await adapter.subscribe(client, SESSION);

    await session.ack('5-0');

    expect(redis.xack).toHaveBeenCalledWith(KEY, 'billing', '5-0');
  });

  it('requeues by claiming the pending entry back with one more attempt', async () => {
    const { adapter, redis, client } = setup();
    redis.xreadgroup.mockResolvedValueOnce(entries(['1-0', ['envelope', B64, 'attempts', '2']]));
    const session = await adapter.subscribe(client, SESSION);
    const signal = new AbortController().signal;
    await session.next(signal);
    redis.call.mockResolvedValueOnce(['1-0']);

    await session.requeue('1-0', 0);
    const again = await session.next(signal);

    expect(again).toMatchObject({ id: '1-0', attempts: 3 });
    expect(redis.call).toHaveBeenCalledWith('XCLAIM', KEY, 'billing', 'test-consumer', '0', '1-0', 'JUSTID');
    expect(redis.xadd).not.toHaveBeenCalled();
    expect(redis.xack).not.toHaveBeenCalled();
  });

  it('drops a requeue whose entry left the pending list', async () => {
    const { adapter, redis, client, log } = setup();
    redis.xreadgroup.mockResolvedValueOnce(entries(['1-0', ['envelope', B64, 'attempts', '1']]));
    const session = await adapter.subscribe(client, SESSION);
    await session.next(new AbortController().signal);
    redis.call.mockResolvedValueOnce([]);

    await session.requeue('1-0', 0);

    expect(log.debug).toHaveBeenCalledWith(
      { stream: KEY, group: 'billing', messageId: '1-0' },
      'Requeued entry is no longer pending',
    );
  });

  it('leaves deferred requeues pending when the session closes', async () => {
    const { adapter, redis, client, log } = setup();
    redis.xreadgroup.mockResolvedValueOnce(entries(['1-0', ['envelope', B64, 'attempts', '1']]));
    const session = await adapter.subscribe(client, SESSION);
    await session.next(new AbortController().signal);

    await session.requeue('1-0', 10_000);
    await session.close();

    expect(redis.call).not.toHaveBeenCalled();
    expect(redis.xadd).not.toHaveBeenCalled();
    expect(redis.xack).not.toHaveBeenCalled();
    expect(log.debug).toHaveBeenCalledWith({ stream: KEY, group: 'billing', count: 1 }, 'Deferred requeues left pending');
    expect(session.closed).toBe(true);
  });

  it('ignores a requeue of an entry it never delivered', async () => {
    const { adapter, redis, client, log } = setup();
    const session = await adapter.subscribe(client, SESSION);

    await session.requeue('7-0', 0);

    expect(redis.call).not.toHaveBeenCalled();
    expect(log.warn).toHaveBeenCalledWith({ stream: KEY, messageId: '7-0' }, 'Requeue of an unknown entry ignored');
  });

  it('reclaims idle entries as redeliveries once the claim interval passes', async () => {
    const { adapter, redis, client, clock, log } = setup();
    const session = await adapter.subscribe(client, SESSION);
    redis.call.mockResolvedValueOnce(['3-0', [['2-0', ['envelope', B64, 'attempts', '1']], null], []]);
    clock.now = 30_000;

    const message = await session.next(new AbortController().signal);

    expect(message).toMatchObject({ id: '2-0', attempts: 2 });
    expect(redis.call).toHaveBeenCalledWith(
      'XAUTOCLAIM', KEY, 'billing', 'test-consumer', '60000', '0-0', 'COUNT', '5',
    );
    expect(log.warn).toHaveBeenCalledWith({ stream: KEY, group: 'billing', count: 1 }, 'Reclaimed timed-out entries');
  });

  it('touches with XCLAIM JUSTID', async () => {
    const { adapter, redis, client } = setup();
    const session = await adapter.subscribe(client, SESSION);
    redis.call.mockResolvedValueOnce(['5-0']);

    await session.touch('5-0');

    expect(redis.call).toHaveBeenCalledWith('XCLAIM', KEY, 'billing', 'test-consumer', '0', '5-0', 'JUSTID');
  });

  it('drops and acks an entry that carries no envelope', async () => {
    const { adapter, redis, client, log } = setup();
    redis.xreadgroup
      .mockResolvedValueOnce(entries(['1-0', ['other', 'x']], ['2-0', ['envelope', B64]]))
      .mockResolvedValueOnce(entries());
    const session = await adapter.subscribe(client, SESSION);

    const message = await session.next(new AbortController().signal);

    expect(message).toMatchObject({ id: '2-0', attempts: 1 });
    expect(redis.xack).toHaveBeenCalledWith(KEY, 'billing', '1-0');
    expect(log.error).toHaveBeenCalledWith(
      { stream: KEY, messageId: '1-0' },
      'Dropping stream entry without an envelope',
    );
  });

  it('rejects a reply of the wrong shape', async () => {
    const { adapter, redis, client } = setup();
    redis.xreadgroup.mockResolvedValueOnce({ unexpected: true });
    const session = await adapter.subscribe(client, SESSION);

    await expect(session.next(new AbortController().signal)).rejects.toThrow('Unexpected XREADGROUP reply');
  });

  it('returns null once aborted', async () => {
    const { adapter, client } = setup();
    const session = await adapter.subscribe(client, SESSION);
    const ac = new AbortController();
    ac.abort();

    expect(await session.next(ac.signal)).toBeNull();
  });
});

describe('Redis Streams requeue across channels', () => {
  it('redelivers a requeued entry only to the group that requeued it', async () => {
    const { adapter } = setup();
    const { client, idle, stream } = streamModel();
    const billing = await adapter.subscribe(client, SESSION);
    const shipping = await adapter.subscribe(client, { ...SESSION, channel: 'shipping' });
    await adapter.publish(client, 'orders', adapter.encode(createEvent('orders', 'hello')), 1_000);

    const forBilling = await billing.next(idle.signal);
    const forShipping = await shipping.next(idle.signal);
    await shipping.ack(forShipping?.id ?? '');
    await billing.requeue(forBilling?.id ?? '', 0);

    expect(await billing.next(idle.signal)).toMatchObject({ id: '1-0', attempts: 2 });
    expect(await shipping.next(idle.signal)).toBeNull();
    expect(stream).toHaveLength(1);
  });
});
