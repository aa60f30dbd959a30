import { Redis } from 'ioredis';
import type { BrokerEndpoint } from '../../domain/endpoint.js';
import { endpointKey } from '../../domain/endpoint.js';
import { ConnectionUnavailableError } from '../../domain/errors.js';
import type { LinkFactory } from '../../domain/ports.js';

export type RedisLinkOptions = Readonly<{
  connectTimeoutMs: number;
  username?: string | undefined;
  password?: string | undefined;
  db?: number | undefined;
}>;

/**
 * One ioredis client per pooled link.
 *
 * ioredis' own reconnect and offline queue are switched off: the connection
 * manager owns reconnects, and a command on a dead link should fail at once
 * so the publisher can retry elsewhere.
 */
export function redisLinkFactory(options: RedisLinkOptions): LinkFactory<Redis> {
  return {
    async dial(endpoint: BrokerEndpoint): Promise<Redis> {
      const client = new Redis({
        host: endpoint.host,
        port: endpoint.port,
        ...(options.username !== undefined && { username: options.username }),
        ...(options.password !== undefined && { password: options.password }),
        db: options.db ?? 0,
        connectTimeout: options.connectTimeoutMs,
        lazyConnect: true,
        enableOfflineQueue: false,
        maxRetriesPerRequest: null,
        retryStrategy: () => null,
      });

      try {
        await client.connect();
      } catch (err: unknown) {
        client.disconnect();
        const message = err instanceof Error ? err.message : String(err);
        throw new ConnectionUnavailableError(endpointKey(endpoint), message, { cause: err });
      }
      return client;
    },

    isOpen: (client) => client.status === 'ready',

    async close(client) {
      if (client.status === 'end') return;
      try {
        await client.quit();
      } catch {
        // quit fails on a broken socket; drop it instead
        client.disconnect();
      }
    },
  };
}
