import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConnectionManager } from '../../../src/infrastructure/connection/connection-manager.js';
import type { ConnectionManagerOptions } from '../../../src/infrastructure/connection/connection-manager.js';
import type { BrokerEndpoint } from '../../../src/domain/endpoint.js';
import { ConnectionUnavailableError, ProtocolError } from '../../../src/domain/errors.js';
import type { Capability, LinkFactory, WireAdapter } from '../../../src/domain/ports.js';
import { decodeEnvelope, encodeEnvelope } from '../../../src/infrastructure/wire/envelope.js';
import { fakeLogger, waitFor } from '../../helpers.js';

const NODE: BrokerEndpoint = { host: 'h', port: 1, role: 'data' };
const FAST = { initialMs: 1, maxMs: 1, multiplier: 1, jitter: 'none' as const };

type FakeLink = { id: number; open: boolean };

const managers: Array<ConnectionManager<FakeLink>> = [];

afterEach(async () => {
  await Promise.all(managers.splice(0).map((m) => m.close()));
});

function setup(overrides: Partial<ConnectionManagerOptions> = {}) {
  let sequence = 0;
  const log = fakeLogger();
  const factory = {
    dial: vi.fn(async (): Promise<FakeLink> => ({ id: ++sequence, open: true })),
    isOpen: (link: FakeLink) => link.open,
    close: vi.fn(async (link: FakeLink) => {
      link.open = false;
    }),
  } satisfies LinkFactory<FakeLink>;
  const adapter = {
    family: 'memory',
    capabilities: new Set<Capability>(['publish', 'heartbeat']),
    encode: encodeEnvelope,
    decode: decodeEnvelope,
    negotiate: vi.fn(async (_link: FakeLink) => undefined),
    publish: async () => ({}),
    subscribe: vi.fn(),
    heartbeat: vi.fn(async (_link: FakeLink) => undefined),
  } satisfies WireAdapter<FakeLink>;
  const manager = new ConnectionManager(adapter, factory, {
    log,
    maxIdle: 2,
    maxTotal: 2,
    acquireTimeoutMs: 1_000,
    connectAttempts: 3,
    connectBackoff: FAST,
    heartbeatIntervalMs: 0,
    ...overrides,
  });
  managers.push(manager);
  return { manager, factory, adapter, log };
}

describe('ConnectionManager.acquire', () => {
  it('dials and negotiates once, then reuses the released link', async () => {
    const { manager, factory, adapter } = setup();

    const first = await manager.acquire(NODE);
    first.release();
    const second = await manager.acquire(NODE);

    expect(second.link).toBe(first.link);
    expect(factory.dial).toHaveBeenCalledTimes(1);
    expect(adapter.negotiate).toHaveBeenCalledTimes(1);
    expect(manager.stats(NODE)).toEqual({ idle: 0, leased: 1, dialing: 0, waiting: 0 });
  });

  it('hands a released link straight to a waiting caller', async () => {
    const { manager, factory } = setup({ maxTotal: 1 });
    const first = await manager.acquire(NODE);

    const waiting = manager.acquire(NODE);
    await waitFor(() => manager.stats(NODE).waiting === 1);
    first.release();
    const second = await waiting;

    expect(second.link).toBe(first.link);
    expect(factory.dial).toHaveBeenCalledTimes(1);
  });

  it('gives up waiting after acquireTimeoutMs', async () => {
    const { manager } = setup({ maxTotal: 1, acquireTimeoutMs: 20 });
    await manager.acquire(NODE);

    await expect(manager.acquire(NODE)).rejects.toThrow(
      'Connection to h:1 unavailable: no link free within 20ms (maxTotal 1)',
    );
    expect(manager.stats(NODE).waiting).toBe(0);
  });

  it('stops waiting when the caller aborts', async () => {
    const { manager } = setup({ maxTotal: 1 });
    await manager.acquire(NODE);
    const ac = new AbortController();

    const waiting = manager.acquire(NODE, { signal: ac.signal });
    await waitFor(() => manager.stats(NODE).waiting === 1);
    ac.abort();

    await expect(waiting).rejects.toThrow('Connection to h:1 unavailable: acquire aborted');
  });

  it('lets a waiter dial once a leased link is invalidated', async () => {
    const { manager, factory } = setup({ maxTotal: 1 });
    const first = await manager.acquire(NODE);

    const waiting = manager.acquire(NODE);
    await waitFor(() => manager.stats(NODE).waiting === 1);
    await first.invalidate(new Error('reset'));
    const second = await waiting;

    expect(second.link.id).toBe(2);
    expect(factory.dial).toHaveBeenCalledTimes(2);
  });

  it('skips idle links that closed underneath it', async () => {
    const { manager } = setup();
    const first = await manager.acquire(NODE);
    first.release();
    first.link.open = false;

    const second = await manager.acquire(NODE);

    expect(second.link.id).toBe(2);
  });

  it('retries a failed dial with backoff', async () => {
    const { manager, factory, log } = setup();
    factory.dial.mockRejectedValueOnce(new Error('ECONNREFUSED')).mockRejectedValueOnce(new Error('ECONNREFUSED'));

    const lease = await manager.acquire(NODE);

    expect(lease.link.id).toBe(1);
    expect(factory.dial).toHaveBeenCalledTimes(3);
    expect(log.warn).toHaveBeenCalledTimes(2);
    expect(log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ endpoint: 'h:1', attempt: 1, retryInMs: 1 }),
      'Connect attempt failed, retrying',
    );
  });

  it('fails after connectAttempts dials and frees the slot', async () => {
    const { manager, factory } = setup();
    factory.dial.mockRejectedValue(new Error('ECONNREFUSED'));

    const err = await manager.acquire(NODE).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ConnectionUnavailableError);
    expect(err).toHaveProperty('message', 'Connection to h:1 unavailable: all connect attempts failed');
    expect(err).toHaveProperty('attempts', 3);
    expect(manager.stats(NODE)).toEqual({ idle: 0, leased: 0, dialing: 0, waiting: 0 });
  });

  it('does not retry a handshake the broker rejected', async () => {
    const { manager, factory, adapter } = setup();
    const rejection = new ProtocolError('nsqd: E_BAD_BODY');
    adapter.negotiate.mockRejectedValueOnce(rejection);

    await expect(manager.acquire(NODE)).rejects.toBe(rejection);
    expect(factory.dial).toHaveBeenCalledTimes(1);
    expect(factory.close).toHaveBeenCalledTimes(1);
  });
});

describe('ConnectionManager.withConnection', () => {
  it('returns the link after success', async () => {
    const { manager } = setup();

    await expect(manager.withConnection(NODE, async (link) => link.id)).resolves.toBe(1);
    expect(manager.stats(NODE)).toEqual({ idle: 1, leased: 0, dialing: 0, waiting: 0 });
  });

  it('discards the link after a transport error', async () => {
    const { manager, factory } = setup();

    await expect(
      manager.withConnection(NODE, async () => {
        throw new Error('socket hang up');
      }),
    ).rejects.toThrow('socket hang up');

    expect(factory.close).toHaveBeenCalledTimes(1);
    expect(manager.stats(NODE).idle).toBe(0);
  });

  it('keeps the link after a non-fatal broker error', async () => {
    const { manager, factory } = setup();

    await expect(
      manager.withConnection(NODE, async () => {
        throw new ProtocolError('nsqd: E_FIN_FAILED', { brokerCode: 'E_FIN_FAILED', fatal: false });
      }),
    ).rejects.toBeInstanceOf(ProtocolError);

    expect(factory.close).not.toHaveBeenCalled();
    expect(manager.stats(NODE).idle).toBe(1);
  });
});

describe('ConnectionManager pooling', () => {
  it('closes returned links beyond maxIdle', async () => {
    const { manager, factory } = setup({ maxIdle: 1 });
    const a = await manager.acquire(NODE);
    const b = await manager.acquire(NODE);

    a.release();
    b.release();

    expect(manager.stats(NODE).idle).toBe(1);
    expect(factory.close).toHaveBeenCalledWith(b.link);
  });

  it('evicts idle links that fail their heartbeat', async () => {
    const { manager, adapter, factory, log } = setup({ heartbeatIntervalMs: 10 });
    const lease = await manager.acquire(NODE);
    lease.release();
    adapter.heartbeat.mockRejectedValueOnce(new Error('timeout'));

    await waitFor(() => factory.close.mock.calls.length === 1);

    expect(log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ endpoint: 'h:1' }),
      'Idle link failed its heartbeat, evicting',
    );
    expect(manager.stats(NODE).idle).toBe(0);
  });

  it('rejects waiters and closes idle links on close', async () => {
    const { manager, factory } = setup({ maxTotal: 1 });
    const leased = await manager.acquire(NODE);
    const waiting = manager.acquire(NODE);
    await waitFor(() => manager.stats(NODE).waiting === 1);

    await manager.close();

    await expect(waiting).rejects.toThrow('Connection to h:1 unavailable: connection pool is closed');
    leased.release();
    await waitFor(() => factory.close.mock.calls.length === 1);
    await expect(manager.acquire(NODE)).rejects.toThrow('connection pool is closed');
  });
});
