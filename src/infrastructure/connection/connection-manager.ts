import type { Logger } from 'pino';
import type { BrokerEndpoint } from '../../domain/endpoint.js';
import { endpointKey } from '../../domain/endpoint.js';
import { ConnectionUnavailableError, ProtocolError, isTransient } from '../../domain/errors.js';
import type { AcquireOptions, ConnectionPool, Lease, LinkFactory, WireAdapter } from '../../domain/ports.js';
import type { BackoffPolicy } from '../../application/timing.js';
import { calculateBackoff, sleep } from '../../application/timing.js';

export type ConnectionManagerOptions = Readonly<{
  log: Logger;
  /** Idle links kept per endpoint; extra returned links are closed. */
  maxIdle: number;
  /** Idle plus leased plus dialling links per endpoint. */
  maxTotal: number;
  acquireTimeoutMs: number;
  connectAttempts: number;
  connectBackoff: BackoffPolicy;
  /** Keep-alive period for idle links; 0 disables. */
  heartbeatIntervalMs: number;
}>;

type Waiter<L> = {
  /** A released link handed over directly, or undefined when a slot was freed. */
  grant: (link: L | undefined) => void;
  fail: (err: Error) => void;
};

type EndpointPool<L> = {
  readonly idle: L[];
  readonly leased: Set<L>;
  dialing: number;
  readonly waiters: Waiter<L>[];
};

export type PoolStats = Readonly<{ idle: number; leased: number; dialing: number; waiting: number }>;

/**
 * Keeps a small pool of negotiated links per endpoint.
 *
 * A link is leased to one caller at a time. Returned links go back to the
 * head of the idle list (most recently used first) or straight to a
 * waiting caller. Dialling retries with backoff; the adapter's handshake
 * runs as part of each dial, so pooled links are always negotiated.
 */
export class ConnectionManager<L> implements ConnectionPool<L> {
  private readonly pools = new Map<string, EndpointPool<L>>();
  private timer: NodeJS.Timeout | undefined;
  private beating = false;
  private closed = false;

  constructor(
    private readonly adapter: WireAdapter<L>,
    private readonly factory: LinkFactory<L>,
    private readonly options: ConnectionManagerOptions,
  ) {
    if (options.heartbeatIntervalMs > 0) {
      this.timer = setInterval(() => {
        void this.keepAlive();
      }, options.heartbeatIntervalMs);
      this.timer.unref();
    }
  }

  stats(endpoint: BrokerEndpoint): PoolStats {
    const pool = this.pools.get(endpointKey(endpoint));
    if (!pool) return { idle: 0, leased: 0, dialing: 0, waiting: 0 };
    return { idle: pool.idle.length, leased: pool.leased.size, dialing: pool.dialing, waiting: pool.waiters.length };
  }

  async acquire(endpoint: BrokerEndpoint, options: AcquireOptions = {}): Promise<Lease<L>> {
    const key = endpointKey(endpoint);
    const pool = this.pool(key);
    const deadline = Date.now() + this.options.acquireTimeoutMs;

    for (;;) {
      if (this.closed) throw new ConnectionUnavailableError(key, 'connection pool is closed');
      if (options.signal?.aborted) throw new ConnectionUnavailableError(key, 'acquire aborted');

      let link = pool.idle.pop();
      while (link !== undefined && !this.factory.isOpen(link)) {
        void this.closeQuietly(key, link);
        link = pool.idle.pop();
      }
      if (link !== undefined) {
        pool.leased.add(link);
        return this.lease(endpoint, pool, link);
      }

      if (pool.leased.size + pool.dialing < this.options.maxTotal) {
        pool.dialing++;
        let dialed: L;
        try {
          dialed = await this.dial(endpoint, options.signal);
        } catch (err: unknown) {
          this.slotFreed(pool);
          throw err;
        } finally {
          pool.dialing--;
        }
        if (this.closed) {
          await this.closeQuietly(key, dialed);
          throw new ConnectionUnavailableError(key, 'connection pool is closed');
        }
        pool.leased.add(dialed);
        return this.lease(endpoint, pool, dialed);
      }

      const granted = await this.waitForLink(key, pool, deadline, options.signal);
      if (granted !== undefined) return this.lease(endpoint, pool, granted);
    }
  }

  async withConnection<T>(
    endpoint: BrokerEndpoint,
    fn: (link: L) => Promise<T>,
    options: AcquireOptions = {},
  ): Promise<T> {
    const lease = await this.acquire(endpoint, options);
    try {
      const result = await fn(lease.link);
      lease.release();
      return result;
    } catch (err: unknown) {
      // A non-fatal broker error leaves the link usable.
      if (err instanceof ProtocolError && !err.fatal && this.factory.isOpen(lease.link)) {
        lease.release();
      } else {
        await lease.invalidate(err);
      }
      throw err;
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }

    const closing: Promise<void>[] = [];
    for (const [key, pool] of this.pools) {
      for (const waiter of pool.waiters.splice(0)) {
        waiter.fail(new ConnectionUnavailableError(key, 'connection pool is closed'));
      }
      for (const link of pool.idle.splice(0)) closing.push(this.closeQuietly(key, link));
    }
    await Promise.all(closing);
    this.options.log.debug({ endpoints: this.pools.size }, 'Connection pool closed');
  }

  private pool(key: string): EndpointPool<L> {
    let pool = this.pools.get(key);
    if (!pool) {
      pool = { idle: [], leased: new Set(), dialing: 0, waiters: [] };
      this.pools.set(key, pool);
    }
    return pool;
  }

  private lease(endpoint: BrokerEndpoint, pool: EndpointPool<L>, link: L): Lease<L> {
    const key = endpointKey(endpoint);
    let settled = false;
    return {
      link,
      endpoint,
      release: () => {
        if (settled) return;
        settled = true;
        this.giveBack(key, pool, link);
      },
      invalidate: async (reason?: unknown) => {
        if (settled) return;
        settled = true;
        pool.leased.delete(link);
        this.options.log.debug({ endpoint: key, err: reason }, 'Link invalidated');
        await this.closeQuietly(key, link);
        this.slotFreed(pool);
      },
    };
  }

  private giveBack(key: string, pool: EndpointPool<L>, link: L): void {
    if (this.closed || !this.factory.isOpen(link)) {
      pool.leased.delete(link);
      void this.closeQuietly(key, link);
      this.slotFreed(pool);
      return;
    }

    const waiter = pool.waiters.shift();
    if (waiter) {
      // Stays counted as leased; ownership moves to the waiter.
      waiter.grant(link);
      return;
    }

    pool.leased.delete(link);
    if (pool.idle.length >= this.options.maxIdle) {
      void this.closeQuietly(key, link);
      return;
    }
    pool.idle.push(link);
  }

  /** Lets the oldest waiter dial into a slot that just became free. */
  private slotFreed(pool: EndpointPool<L>): void {
    pool.waiters.shift()?.grant(undefined);
  }

  private waitForLink(
    key: string,
    pool: EndpointPool<L>,
    deadline: number,
    signal: AbortSignal | undefined,
  ): Promise<L | undefined> {
    const remaining = deadline - Date.now();
    if (remaining <= 0) return Promise.reject(this.exhausted(key));

    return new Promise((resolve, reject) => {
      const cleanup = (): void => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        const index = pool.waiters.indexOf(waiter);
        if (index >= 0) pool.waiters.splice(index, 1);
      };
      const waiter: Waiter<L> = {
        grant: (link) => {
          cleanup();
          resolve(link);
        },
        fail: (err) => {
          cleanup();
          reject(err);
        },
      };
      const onAbort = (): void => waiter.fail(new ConnectionUnavailableError(key, 'acquire aborted'));
      const timer = setTimeout(() => waiter.fail(this.exhausted(key)), remaining);

      pool.waiters.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  private exhausted(key: string): ConnectionUnavailableError {
    return new ConnectionUnavailableError(
      key,
      `no link free within ${this.options.acquireTimeoutMs}ms (maxTotal ${this.options.maxTotal})`,
    );
  }

  private async dial(endpoint: BrokerEndpoint, signal: AbortSignal | undefined): Promise<L> {
    const { connectAttempts, connectBackoff, log } = this.options;
    const key = endpointKey(endpoint);
    let lastError: unknown;
    let attempts = 0;

    for (let attempt = 1; attempt <= connectAttempts; attempt++) {
      attempts = attempt;
      try {
        const link = await this.factory.dial(endpoint);
        try {
          await this.adapter.negotiate(link);
        } catch (err: unknown) {
          await this.closeQuietly(key, link);
          throw err;
        }
        log.debug({ endpoint: key, attempt }, 'Link established');
        return link;
      } catch (err: unknown) {
        if (!isTransient(err)) throw err;
        lastError = err;
        if (attempt === connectAttempts || signal?.aborted) break;

        const delay = calculateBackoff(attempt, connectBackoff);
        log.warn({ err, endpoint: key, attempt, retryInMs: delay }, 'Connect attempt failed, retrying');
        await sleep(delay, signal);
      }
    }

    throw new ConnectionUnavailableError(key, 'all connect attempts failed', {
      attempts,
      cause: lastError,
    });
  }

  private async keepAlive(): Promise<void> {
    if (this.beating || this.closed) return;
    this.beating = true;
    try {
      for (const [key, pool] of this.pools) {
        const links = pool.idle.splice(0);
        for (const link of links) pool.leased.add(link);
        await Promise.all(
          links.map(async (link) => {
            try {
              await this.adapter.heartbeat(link);
              this.giveBack(key, pool, link);
            } catch (err: unknown) {
              this.options.log.warn({ err, endpoint: key }, 'Idle link failed its heartbeat, evicting');
              pool.leased.delete(link);
              await this.closeQuietly(key, link);
              this.slotFreed(pool);
            }
          }),
        );
      }
    } finally {
      this.beating = false;
    }
  }

  private async closeQuietly(key: string, link: L): Promise<void> {
    try {
      await this.factory.close(link);
    } catch (err: unknown) {
      this.options.log.warn({ err, endpoint: key }, 'Failed to close link');
    }
  }
}
