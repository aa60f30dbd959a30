import type { Logger } from 'pino';
import type { BrokerEndpoint } from '../domain/endpoint.js';
import { endpointKey, uniqueEndpoints } from '../domain/endpoint.js';
import { ResolutionFailedError } from '../domain/errors.js';
import type { DiscoveryClient, EndpointResolver } from '../domain/ports.js';
import type { EndpointHealthRegistry } from './endpoint-health.js';
import { withTimeout } from './timing.js';

export type TopicRouterOptions = Readonly<{
  /** Data nodes known from configuration; merged into every lookup result. */
  staticEndpoints: readonly BrokerEndpoint[];
  discoveryEndpoints: readonly BrokerEndpoint[];
  discovery?: DiscoveryClient | undefined;
  health: EndpointHealthRegistry;
  log: Logger;
  cacheTtlMs: number;
  /** How long past expiry an entry may still be served while it refreshes. */
  maxStaleMs: number;
  discoveryTimeoutMs: number;
  refreshIntervalMs: number;
  now?: (() => number) | undefined;
}>;

type CacheEntry = Readonly<{
  endpoints: readonly BrokerEndpoint[];
  expiresAt: number;
}>;

/** Weight of a healthy endpoint with no recent failures. */
const BASE_WEIGHT = 12;

/**
 * Maps topics to data nodes.
 *
 * Lookups are cached for `cacheTtlMs`. An expired entry is still served for
 * up to `maxStaleMs` while one background refresh replaces it; concurrent
 * refreshes for the same topic share a single lookup. Entries older than
 * that are "fully expired" and callers wait for discovery, bounded by
 * `discoveryTimeoutMs`.
 *
 * Endpoint choice is smooth weighted round-robin. An endpoint's weight
 * shrinks with its consecutive failure count, so a flaky node keeps getting
 * some traffic (and a chance to recover) but much less than healthy peers.
 */
export class TopicRouter implements EndpointResolver {
  private readonly cache = new Map<string, CacheEntry>();
  private readonly inflight = new Map<string, Promise<readonly BrokerEndpoint[]>>();
  private readonly rotation = new Map<string, Map<string, number>>();
  private readonly now: () => number;
  private timer: NodeJS.Timeout | undefined;

  constructor(private readonly options: TopicRouterOptions) {
    this.now = options.now ?? Date.now;
  }

  private get usesDiscovery(): boolean {
    return this.options.discovery !== undefined && this.options.discoveryEndpoints.length > 0;
  }

  async resolve(topic: string): Promise<readonly BrokerEndpoint[]> {
    if (!this.usesDiscovery) {
      if (this.options.staticEndpoints.length === 0) {
        throw new ResolutionFailedError(topic, 'no endpoints configured');
      }
      return this.options.staticEndpoints;
    }

    const entry = this.cache.get(topic);
    const now = this.now();
    if (entry && now < entry.expiresAt) {
      return entry.endpoints;
    }
    if (entry && now < entry.expiresAt + this.options.maxStaleMs) {
      this.refreshInBackground(topic);
      return entry.endpoints;
    }
    return this.refresh(topic);
  }

  async pick(topic: string): Promise<BrokerEndpoint> {
    const endpoints = await this.resolve(topic);
    const available = endpoints.filter((e) => this.options.health.isAvailable(endpointKey(e)));
    if (available.length === 0) {
      throw new ResolutionFailedError(
        topic,
        `no healthy endpoint among [${endpoints.map(endpointKey).join(', ')}]`,
      );
    }
    return this.selectWeighted(topic, available);
  }

  reportFailure(endpoint: BrokerEndpoint): void {
    const key = endpointKey(endpoint);
    const record = this.options.health.reportFailure(key);
    if (record.state === 'down') {
      this.options.log.warn(
        { endpoint: key, failures: record.failures, downUntil: new Date(record.downUntil).toISOString() },
        'Endpoint marked down',
      );
    } else {
      this.options.log.debug({ endpoint: key, failures: record.failures }, 'Endpoint failure recorded');
    }
  }

  reportSuccess(endpoint: BrokerEndpoint): void {
    this.options.health.reportSuccess(endpointKey(endpoint));
  }

  /** Forces a lookup now; concurrent callers share one request. */
  refresh(topic: string): Promise<readonly BrokerEndpoint[]> {
    const pending = this.inflight.get(topic);
    if (pending) return pending;

    const task = this.lookup(topic).finally(() => {
      this.inflight.delete(topic);
    });
    this.inflight.set(topic, task);
    return task;
  }

  /** Starts the periodic refresh of cached topics. */
  start(): void {
    if (!this.usesDiscovery || this.timer) return;
    this.timer = setInterval(() => this.refreshCached(), this.options.refreshIntervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  private refreshCached(): void {
    const horizon = this.now() + this.options.refreshIntervalMs;
    for (const [topic, entry] of this.cache) {
      if (entry.expiresAt <= horizon) this.refreshInBackground(topic);
    }
  }

  private refreshInBackground(topic: string): void {
    void this.refresh(topic).catch((err: unknown) => {
      this.options.log.warn({ err, topic }, 'Background topic refresh failed, serving cached endpoints');
    });
  }

  private async lookup(topic: string): Promise<readonly BrokerEndpoint[]> {
    const { discovery, discoveryEndpoints, discoveryTimeoutMs, staticEndpoints, log } = this.options;
    if (!discovery) return staticEndpoints;

    const signal = AbortSignal.timeout(discoveryTimeoutMs);
    const results = await Promise.allSettled(
      discoveryEndpoints.map((node) =>
        withTimeout(discovery.lookup(node, topic, signal), discoveryTimeoutMs, `lookup ${endpointKey(node)}`),
      ),
    );

    const found: BrokerEndpoint[] = [];
    const errors: unknown[] = [];
    results.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        found.push(...result.value);
        return;
      }
      errors.push(result.reason);
      const node = discoveryEndpoints[index];
      log.warn({ err: result.reason, topic, discovery: node ? endpointKey(node) : undefined }, 'Discovery lookup failed');
    });

    if (errors.length === discoveryEndpoints.length) {
      throw new ResolutionFailedError(topic, 'no discovery endpoint reachable', new AggregateError(errors));
    }

    const merged = uniqueEndpoints([...found, ...staticEndpoints]);
    if (merged.length === 0) {
      throw new ResolutionFailedError(topic, 'no producers found and no static endpoints configured');
    }

    this.cache.set(topic, { endpoints: merged, expiresAt: this.now() + this.options.cacheTtlMs });
    log.debug({ topic, endpoints: merged.map(endpointKey) }, 'Topic resolved');
    return merged;
  }

  private selectWeighted(topic: string, candidates: readonly BrokerEndpoint[]): BrokerEndpoint {
    let current = this.rotation.get(topic);
    if (!current) {
      current = new Map();
      this.rotation.set(topic, current);
    }

    let total = 0;
    let best: BrokerEndpoint | undefined;
    let bestKey = '';
    let bestScore = -Infinity;

    for (const candidate of candidates) {
      const key = endpointKey(candidate);
      const weight = Math.max(1, Math.floor(BASE_WEIGHT / (1 + this.options.health.failures(key))));
      const score = (current.get(key) ?? 0) + weight;
      current.set(key, score);
      total += weight;
      if (score > bestScore) {
        best = candidate;
        bestKey = key;
        bestScore = score;
      }
    }

    if (!best) {
      throw new ResolutionFailedError(topic, 'no candidate endpoints');
    }
    current.set(bestKey, bestScore - total);
    return best;
  }
}
