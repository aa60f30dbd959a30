import os from 'node:os';
import pino from 'pino';
import type { Logger } from 'pino';
import type { BusConfig, BusConfigInput } from './config.js';
import { parseBusConfig } from './config.js';
import { parseEndpoint } from './domain/endpoint.js';
import { ConfigurationError } from './domain/errors.js';
import type { DiscoveryClient, LinkFactory, WireAdapter } from './domain/ports.js';
import { Bus } from './application/bus.js';
import type { MessageBus } from './application/bus.js';
import { ConsumerDispatcher } from './application/consumer-dispatcher.js';
import type { TransitionEvent } from './application/consumer-dispatcher.js';
import { EndpointHealthRegistry } from './application/endpoint-health.js';
import { Publisher } from './application/publisher.js';
import type { BackoffPolicy } from './application/timing.js';
import { TopicRouter } from './application/topic-router.js';
import { ConnectionManager } from './infrastructure/connection/connection-manager.js';
import { redisLinkFactory } from './infrastructure/connection/redis-link.js';
import { tcpLinkFactory } from './infrastructure/connection/tcp-link.js';
import { NsqLookupClient } from './infrastructure/discovery/nsq-lookup.js';
import type { FetchFn } from './infrastructure/discovery/nsq-lookup.js';
import { MemoryAdapter } from './infrastructure/wire/memory-adapter.js';
import { MemoryBroker, memoryLinkFactory } from './infrastructure/wire/memory-broker.js';
import { NsqAdapter } from './infrastructure/wire/nsq-adapter.js';
import { RedisStreamsAdapter } from './infrastructure/wire/redis-streams-adapter.js';

export const VERSION = '0.1.0';

const DEFAULT_ENDPOINTS: Readonly<Record<BusConfig['family'], string>> = {
  nsq: '127.0.0.1:4150',
  'redis-streams': '127.0.0.1:6379',
  memory: 'memory:4150',
};

export type CreateBusOptions = Readonly<{
  log?: Logger | undefined;
  /** Broker used by the memory family; a private one is created when omitted. */
  broker?: MemoryBroker | undefined;
  /** HTTP client for nsqlookupd, mainly for tests. */
  fetch?: FetchFn | undefined;
  onTransition?: ((event: TransitionEvent) => void) | undefined;
}>;

type Stack<L> = Readonly<{
  adapter: WireAdapter<L>;
  factory: LinkFactory<L>;
  discovery?: DiscoveryClient | undefined;
}>;

function retryPolicy(config: BusConfig): BackoffPolicy {
  const { initial, max, multiplier, jitter } = config.retryBackoff;
  return { initialMs: initial, maxMs: max, multiplier, jitter };
}

function assemble<L>(config: BusConfig, stack: Stack<L>, log: Logger, options: CreateBusOptions): Bus<L> {
  const usesDiscovery = stack.discovery !== undefined && config.discoveryEndpoints.length > 0;
  const configured = config.endpoints.length > 0 || usesDiscovery ? config.endpoints : [DEFAULT_ENDPOINTS[config.family]];
  const backoff = retryPolicy(config);

  const pool = new ConnectionManager(stack.adapter, stack.factory, {
    log: log.child({ component: 'pool' }),
    maxIdle: config.pool.maxIdle,
    maxTotal: config.pool.maxTotal,
    acquireTimeoutMs: config.pool.acquireTimeout,
    connectAttempts: config.connectAttempts,
    connectBackoff: backoff,
    heartbeatIntervalMs: config.heartbeatInterval,
  });

  const router = new TopicRouter({
    staticEndpoints: configured.map((address) => parseEndpoint(address, 'data')),
    discoveryEndpoints: config.discoveryEndpoints.map((address) => parseEndpoint(address, 'discovery')),
    discovery: stack.discovery,
    health: new EndpointHealthRegistry({
      failureThreshold: config.health.failureThreshold,
      cooldownMs: config.health.cooldown,
    }),
    log: log.child({ component: 'router' }),
    cacheTtlMs: config.discovery.ttl,
    maxStaleMs: config.discovery.maxStale,
    discoveryTimeoutMs: config.discovery.timeout,
    refreshIntervalMs: config.discovery.pollInterval,
  });
  router.start();

  const publisher = new Publisher(stack.adapter, pool, router, {
    log: log.child({ component: 'publisher' }),
    maxAttempts: config.publishAttempts,
    ackTimeoutMs: config.ackTimeout,
    retryBackoff: backoff,
  });

  const dispatcher = new ConsumerDispatcher(stack.adapter, pool, router, {
    log: log.child({ component: 'dispatcher' }),
    defaultPolicy: {
      maxInFlight: config.maxInFlight,
      maxAttempts: config.maxAttempts,
      requeueBackoff: backoff,
      handlerTimeoutMs: config.handlerTimeout,
    },
    consumerName: config.clientId,
    reconnectBackoff: backoff,
    discoveryPollMs: config.discovery.pollInterval,
    drainTimeoutMs: config.drainTimeout,
    onTransition: options.onTransition,
  });

  log.info(
    { family: config.family, endpoints: configured, discovery: config.discoveryEndpoints },
    'Bus created',
  );
  return new Bus({ family: config.family, publisher, dispatcher, router, pool, log });
}

/**
 * Builds the whole stack for the configured broker family. Each call gets
 * its own pool, router and health table; nothing is shared between buses.
 */
export function createBus(input: BusConfigInput = {}, options: CreateBusOptions = {}): MessageBus {
  const config = parseBusConfig(input);
  const log = options.log ?? pino({ name: 'relaybus', level: process.env['LOG_LEVEL'] ?? 'info' });

  if (config.family !== 'nsq' && config.discoveryEndpoints.length > 0) {
    throw new ConfigurationError('Invalid bus configuration', [
      `discoveryEndpoints: not supported by the ${config.family} family`,
    ]);
  }

  switch (config.family) {
    case 'nsq':
      return assemble(
        config,
        {
          adapter: new NsqAdapter({
            log: log.child({ component: 'nsq' }),
            clientId: config.clientId,
            hostname: os.hostname(),
            userAgent: `relaybus/${VERSION}`,
            messageTimeoutMs: config.messageTimeout,
            heartbeatIntervalMs: config.heartbeatInterval,
            responseTimeoutMs: config.connectTimeout,
          }),
          factory: tcpLinkFactory(config.connectTimeout),
          discovery: new NsqLookupClient(options.fetch),
        },
        log,
        options,
      );
    case 'redis-streams':
      return assemble(
        config,
        {
          adapter: new RedisStreamsAdapter({
            log: log.child({ component: 'redis-streams' }),
            keyPrefix: config.redis.keyPrefix,
            blockMs: config.redis.blockMs,
            claimIntervalMs: config.redis.claimInterval,
            messageTimeoutMs: config.messageTimeout,
          }),
          factory: redisLinkFactory({
            connectTimeoutMs: config.connectTimeout,
            username: config.redis.username,
            password: config.redis.password,
            db: config.redis.db,
          }),
        },
        log,
        options,
      );
    case 'memory': {
      const broker = options.broker ?? new MemoryBroker({ messageTimeoutMs: config.messageTimeout });
      return assemble(config, { adapter: new MemoryAdapter(), factory: memoryLinkFactory(broker) }, log, options);
    }
  }
}
