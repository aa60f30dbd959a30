import type { Logger } from 'pino';
import type { BusEvent } from '../domain/event.js';
import { endpointKey } from '../domain/endpoint.js';
import type { BrokerEndpoint } from '../domain/endpoint.js';
import { PublishError, ResolutionFailedError, isTransient } from '../domain/errors.js';
import type { ConnectionPool, EndpointResolver, WireAdapter } from '../domain/ports.js';
import type { BackoffPolicy } from './timing.js';
import { calculateBackoff, sleep } from './timing.js';

/** Broker acknowledgement for one published event. */
export type PublishAck = Readonly<{
  topic: string;
  /** `host:port` of the node that accepted the event. */
  endpoint: string;
  messageId?: string | undefined;
  attempts: number;
}>;

export type PublishResult =
  | { readonly ok: true; readonly ack: PublishAck }
  | { readonly ok: false; readonly error: PublishError };

export type PublishOptions = Readonly<{
  /** Overrides the configured ack timeout for this call. */
  timeoutMs?: number | undefined;
  /** Aborting stops further retries; the current attempt still settles. */
  signal?: AbortSignal | undefined;
}>;

export type PublisherOptions = Readonly<{
  log: Logger;
  maxAttempts: number;
  ackTimeoutMs: number;
  retryBackoff: BackoffPolicy;
}>;

/**
 * Sends events with bounded retries.
 *
 * Each attempt re-picks an endpoint, so after a transport failure the next
 * try prefers another node (the failure lowered the first node's weight).
 * Every call settles with exactly one Ack or PublishError.
 */
export class Publisher<L> {
  constructor(
    private readonly adapter: WireAdapter<L>,
    private readonly pool: ConnectionPool<L>,
    private readonly router: EndpointResolver,
    private readonly options: PublisherOptions,
  ) {}

  async publish(event: BusEvent, options: PublishOptions = {}): Promise<PublishResult> {
    const { log, maxAttempts, retryBackoff } = this.options;
    const timeoutMs = options.timeoutMs ?? this.options.ackTimeoutMs;

    if (!this.adapter.capabilities.has('publish')) {
      return failure(new PublishError(event.topic, 'unsupported', 0));
    }

    // Encoding depends only on the event, so a failure here says nothing about any endpoint.
    let body: Buffer;
    try {
      body = this.adapter.encode(event);
    } catch (err: unknown) {
      log.error({ err, topic: event.topic }, 'Publish failed: event could not be encoded');
      return failure(new PublishError(event.topic, 'invalid', 0, err));
    }

    let lastError: unknown;
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      let endpoint: BrokerEndpoint;
      try {
        endpoint = await this.router.pick(event.topic);
      } catch (err: unknown) {
        const cause = err instanceof ResolutionFailedError
          ? err
          : new ResolutionFailedError(event.topic, 'endpoint selection failed', err);
        log.warn({ err: cause, topic: event.topic }, 'Publish failed: topic did not resolve');
        return failure(new PublishError(event.topic, 'resolution', attempt - 1, cause));
      }

      try {
        const receipt = await this.pool.withConnection(
          endpoint,
          (link) => this.adapter.publish(link, event.topic, body, timeoutMs),
          { signal: options.signal },
        );
        this.router.reportSuccess(endpoint);
        log.debug({ topic: event.topic, endpoint: endpointKey(endpoint), attempt }, 'Event published');
        return {
          ok: true,
          ack: {
            topic: event.topic,
            endpoint: endpointKey(endpoint),
            messageId: receipt.messageId,
            attempts: attempt,
          },
        };
      } catch (err: unknown) {
        lastError = err;
        if (!isTransient(err)) {
          log.error({ err, topic: event.topic, endpoint: endpointKey(endpoint), attempt }, 'Publish rejected');
          return failure(new PublishError(event.topic, 'rejected', attempt, err));
        }

        this.router.reportFailure(endpoint);
        if (attempt === maxAttempts || options.signal?.aborted) {
          log.error({ err, topic: event.topic, attempts: attempt }, 'Publish retries exhausted');
          return failure(new PublishError(event.topic, 'exhausted', attempt, err));
        }

        const delay = calculateBackoff(attempt, retryBackoff);
        log.warn(
          { err, topic: event.topic, endpoint: endpointKey(endpoint), attempt, retryInMs: delay },
          'Publish attempt failed, retrying',
        );
        await sleep(delay, options.signal);
      }
    }

    // Only reachable with maxAttempts < 1.
    return failure(new PublishError(event.topic, 'exhausted', 0, lastError));
  }
}

function failure(error: PublishError): PublishResult {
  return { ok: false, error };
}
