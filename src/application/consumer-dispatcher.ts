import type { Logger } from 'pino';
import type { BusEvent } from '../domain/event.js';
import { assertChannelName, assertTopicName } from '../domain/event.js';
import type { BrokerEndpoint } from '../domain/endpoint.js';
import { endpointKey } from '../domain/endpoint.js';
import {
  BusClosedError,
  ConfigurationError,
  ConnectionUnavailableError,
  HandlerError,
  UnsupportedCapabilityError,
} from '../domain/errors.js';
import { InFlightMessage } from '../domain/in-flight.js';
import type { InFlightState, RawMessage } from '../domain/in-flight.js';
import type {
  Capability,
  ConnectionPool,
  EndpointResolver,
  Lease,
  SubscriptionSession,
  WireAdapter,
} from '../domain/ports.js';
import { Semaphore } from './semaphore.js';
import type { BackoffPolicy } from './timing.js';
import { calculateBackoff, sleep, withTimeout } from './timing.js';

/** Per-delivery context handed to a handler next to the event. */
export type DeliveryInfo = Readonly<{
  messageId: string;
  /** 1 on first delivery. */
  attempts: number;
  /** Broker enqueue time, epoch ms. */
  timestamp: number;
  receivedAt: number;
  deadline: number;
  endpoint: string;
  subscriptionId: string;
  /** Extends the broker-side timeout for long-running handlers. */
  touch: () => Promise<void>;
}>;

/**
 * Resolving means success and the message is acked; throwing (or exceeding
 * the handler timeout) means failure and the message is requeued.
 */
export type MessageHandler = (event: BusEvent, delivery: DeliveryInfo) => Promise<void> | void;

export type DeliveryPolicy = Readonly<{
  /** Concurrent handler invocations per subscription. */
  maxInFlight: number;
  /** Deliveries after which a failing message is acked and dropped; 0 disables. */
  maxAttempts: number;
  requeueBackoff: BackoffPolicy;
  /** 0 disables. */
  handlerTimeoutMs: number;
}>;

export type TransitionEvent = Readonly<{
  subscriptionId: string;
  topic: string;
  channel: string;
  messageId: string;
  attempts: number;
  from: InFlightState | null;
  to: InFlightState;
}>;

export type ConsumerDispatcherOptions = Readonly<{
  log: Logger;
  defaultPolicy: DeliveryPolicy;
  consumerName: string;
  reconnectBackoff: BackoffPolicy;
  /** How often the topic is re-resolved to pick up new data nodes. */
  discoveryPollMs: number;
  /** Upper bound on waiting for running handlers during unsubscribe. */
  drainTimeoutMs: number;
  onTransition?: ((event: TransitionEvent) => void) | undefined;
  now?: (() => number) | undefined;
}>;

export interface SubscriptionHandle {
  readonly id: string;
  readonly topic: string;
  readonly channel: string;
  /** Messages currently tracked by this subscription. */
  inFlight(): number;
  unsubscribe(): Promise<void>;
}

const REQUIRED: readonly Capability[] = ['subscribe', 'ack', 'requeue'];

/** Waits for `tasks` to settle; false when the timeout won. */
async function drain(tasks: ReadonlySet<Promise<void>>, timeoutMs: number): Promise<boolean> {
  const deadline = Date.now() + timeoutMs;
  while (tasks.size > 0) {
    const remaining = deadline - Date.now();
    if (remaining <= 0) return false;
    const timer = new AbortController();
    await Promise.race([Promise.allSettled([...tasks]), sleep(remaining, timer.signal)]);
    timer.abort();
  }
  return true;
}

/** One receive loop against one data node. */
class Source {
  readonly controller = new AbortController();
  readonly tasks = new Set<Promise<void>>();
  done: Promise<void> = Promise.resolve();

  constructor(readonly key: string) {}

  get signal(): AbortSignal {
    return this.controller.signal;
  }
}

class ActiveSubscription {
  readonly controller = new AbortController();
  readonly inFlight = new Map<string, InFlightMessage>();
  readonly tasks = new Set<Promise<void>>();
  readonly sources = new Map<string, Source>();
  readonly slots: Semaphore;
  supervisor: Promise<void> = Promise.resolve();

  constructor(
    readonly id: string,
    readonly topic: string,
    readonly channel: string,
    readonly handler: MessageHandler,
    readonly policy: DeliveryPolicy,
  ) {
    this.slots = new Semaphore(policy.maxInFlight);
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }
}

/**
 * Runs subscriptions: one receive loop per data node carrying the topic,
 * each on a dedicated link, feeding a handler bounded by `maxInFlight`.
 *
 * Every delivery is tracked as an InFlightMessage so it is settled exactly
 * once. A message that outlives the broker's timeout is marked timedOut and
 * neither acked nor requeued; the broker redelivers it on its own.
 */
export class ConsumerDispatcher<L> {
  private readonly subscriptions = new Map<string, ActiveSubscription>();
  private readonly now: () => number;
  private sequence = 0;
  private closed = false;

  constructor(
    private readonly adapter: WireAdapter<L>,
    private readonly pool: ConnectionPool<L>,
    private readonly router: EndpointResolver,
    private readonly options: ConsumerDispatcherOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.subscriptions.size;
  }

  subscribe(
    topic: string,
    channel: string,
    handler: MessageHandler,
    policy: Partial<DeliveryPolicy> = {},
  ): SubscriptionHandle {
    if (this.closed) throw new BusClosedError();
    assertTopicName(topic);
    assertChannelName(channel);
    for (const capability of REQUIRED) {
      if (!this.adapter.capabilities.has(capability)) {
        throw new UnsupportedCapabilityError(this.adapter.family, capability);
      }
    }

    const resolved: DeliveryPolicy = { ...this.options.defaultPolicy, ...policy };
    if (!Number.isInteger(resolved.maxInFlight) || resolved.maxInFlight < 1) {
      throw new ConfigurationError('Invalid delivery policy', [
        `maxInFlight must be a positive integer, got ${resolved.maxInFlight}`,
      ]);
    }

    this.sequence++;
    const sub = new ActiveSubscription(`${topic}/${channel}#${this.sequence}`, topic, channel, handler, resolved);
    this.subscriptions.set(sub.id, sub);
    sub.supervisor = this.supervise(sub);

    this.options.log.info(
      { subscription: sub.id, topic, channel, maxInFlight: resolved.maxInFlight },
      'Subscribed',
    );

    return {
      id: sub.id,
      topic,
      channel,
      inFlight: () => sub.inFlight.size,
      unsubscribe: async () => {
        await this.unsubscribe(sub.id);
      },
    };
  }

  /** Stops receiving, waits for running handlers, then closes the links. */
  async unsubscribe(id: string): Promise<boolean> {
    const sub = this.subscriptions.get(id);
    if (!sub) return false;
    this.subscriptions.delete(id);

    sub.controller.abort();
    await sub.supervisor;
    this.options.log.info({ subscription: id, pending: sub.tasks.size }, 'Unsubscribed');
    return true;
  }

  async close(): Promise<void> {
    this.closed = true;
    await Promise.all([...this.subscriptions.keys()].map((id) => this.unsubscribe(id)));
  }

  private async supervise(sub: ActiveSubscription): Promise<void> {
    const { log, discoveryPollMs, reconnectBackoff } = this.options;
    let failures = 0;

    while (!sub.signal.aborted) {
      try {
        const endpoints = await this.router.resolve(sub.topic);
        failures = 0;
        const current = new Set(endpoints.map(endpointKey));
        for (const source of sub.sources.values()) {
          if (current.has(source.key) || source.signal.aborted) continue;
          log.info(
            { subscription: sub.id, endpoint: source.key },
            'Node no longer carries the topic, stopping its receive loop',
          );
          source.controller.abort();
        }
        for (const endpoint of endpoints) {
          const key = endpointKey(endpoint);
          if (sub.sources.has(key)) continue;
          const source = new Source(key);
          source.done = this.runSource(sub, endpoint, source).finally(() => {
            if (sub.sources.get(key) === source) sub.sources.delete(key);
          });
          sub.sources.set(key, source);
        }
        await sleep(discoveryPollMs, sub.signal);
      } catch (err: unknown) {
        failures++;
        const delay = calculateBackoff(failures, reconnectBackoff);
        log.warn(
          { err, subscription: sub.id, topic: sub.topic, retryInMs: delay },
          'Subscription could not resolve its topic',
        );
        await sleep(delay, sub.signal);
      }
    }

    const sources = [...sub.sources.values()];
    for (const source of sources) source.controller.abort();
    // Each loop drains its own handlers before it returns.
    await Promise.allSettled(sources.map((source) => source.done));
  }

  private async runSource(sub: ActiveSubscription, endpoint: BrokerEndpoint, source: Source): Promise<void> {
    const { log, reconnectBackoff, consumerName } = this.options;
    const { key, signal } = source;
    let failures = 0;

    while (!signal.aborted) {
      let lease: Lease<L> | undefined;
      let session: SubscriptionSession | undefined;
      let retryInMs = 0;

      try {
        lease = await this.pool.acquire(endpoint, { signal });
        session = await this.adapter.subscribe(lease.link, {
          topic: sub.topic,
          channel: sub.channel,
          maxInFlight: sub.policy.maxInFlight,
          consumerName,
        });
        this.router.reportSuccess(endpoint);
        failures = 0;
        log.info({ subscription: sub.id, endpoint: key }, 'Receive loop connected');

        await this.receive(sub, session, source);
      } catch (err: unknown) {
        if (!signal.aborted) {
          failures++;
          this.router.reportFailure(endpoint);
          retryInMs = calculateBackoff(failures, reconnectBackoff);
          log.warn(
            { err, subscription: sub.id, endpoint: key, attempt: failures, retryInMs },
            'Receive loop lost its link, reconnecting',
          );
        }
      }

      if (signal.aborted) {
        const drained = await drain(source.tasks, this.options.drainTimeoutMs);
        if (!drained) {
          log.warn(
            {
              subscription: sub.id,
              endpoint: key,
              pending: source.tasks.size,
              drainTimeoutMs: this.options.drainTimeoutMs,
            },
            'Drain timed out; unsettled messages will be redelivered',
          );
        }
      }
      if (session) await this.closeSession(sub, session, key);
      if (lease) await lease.invalidate();
      if (retryInMs > 0) await sleep(retryInMs, signal);
    }
  }

  private async closeSession(sub: ActiveSubscription, session: SubscriptionSession, endpoint: string): Promise<void> {
    if (session.closed) return;
    try {
      await session.close();
    } catch (err: unknown) {
      this.options.log.warn({ err, subscription: sub.id, endpoint }, 'Failed to close subscription session cleanly');
    }
  }

  private async receive(sub: ActiveSubscription, session: SubscriptionSession, source: Source): Promise<void> {
    const { signal } = source;
    while (!signal.aborted) {
      const granted = await sub.slots.acquire(signal);
      if (!granted) return;

      let message: RawMessage | null;
      try {
        message = await session.next(signal);
      } catch (err: unknown) {
        sub.slots.release();
        throw err;
      }

      if (message === null) {
        sub.slots.release();
        if (signal.aborted) return;
        throw new ConnectionUnavailableError(source.key, 'subscription session closed by the broker');
      }
      this.dispatch(sub, session, source, message);
    }
  }

  private dispatch(sub: ActiveSubscription, session: SubscriptionSession, source: Source, raw: RawMessage): void {
    const { log } = this.options;
    // A settled entry may linger until its task finishes; its redelivery is not a duplicate.
    if (sub.inFlight.get(raw.id)?.isTerminal === false) {
      log.warn({ subscription: sub.id, messageId: raw.id }, 'Duplicate delivery of an in-flight message ignored');
      sub.slots.release();
      return;
    }

    const message = new InFlightMessage(raw, this.now(), session.messageTimeoutMs);
    sub.inFlight.set(message.id, message);
    this.notify(sub, message, null, 'received');

    const task: Promise<void> = this.handle(sub, session, source.key, message)
      .catch((err: unknown) => {
        log.error({ err, subscription: sub.id, messageId: message.id }, 'Message settlement failed');
      })
      .finally(() => {
        if (sub.inFlight.get(message.id) === message) sub.inFlight.delete(message.id);
        sub.slots.release();
        sub.tasks.delete(task);
        source.tasks.delete(task);
      });
    sub.tasks.add(task);
    source.tasks.add(task);
  }

  private async handle(
    sub: ActiveSubscription,
    session: SubscriptionSession,
    endpoint: string,
    message: InFlightMessage,
  ): Promise<void> {
    const { log } = this.options;
    this.move(sub, message, 'dispatched');

    const expire = (): void => {
      if (!message.canTransition('timedOut')) return;
      this.move(sub, message, 'timedOut');
      sub.inFlight.delete(message.id);
      log.warn(
        { subscription: sub.id, messageId: message.id, attempts: message.attempts },
        'Message passed its deadline; the broker will redeliver it',
      );
    };
    let deadlineTimer = setTimeout(expire, Math.max(0, message.deadline - this.now()));

    const info: DeliveryInfo = {
      messageId: message.id,
      attempts: message.attempts,
      timestamp: message.timestamp,
      receivedAt: message.receivedAt,
      deadline: message.deadline,
      endpoint,
      subscriptionId: sub.id,
      touch: async () => {
        if (message.state !== 'dispatched') return;
        await session.touch(message.id);
        message.extendDeadline(this.now() + session.messageTimeoutMs);
        clearTimeout(deadlineTimer);
        deadlineTimer = setTimeout(expire, Math.max(0, message.deadline - this.now()));
      },
    };

    let failed = false;
    let failure: unknown;
    try {
      const event = this.adapter.decode(message.body);
      const run = Promise.resolve().then(() => sub.handler(event, info));
      await withTimeout(run, sub.policy.handlerTimeoutMs, `handler for message ${message.id}`);
    } catch (err: unknown) {
      failed = true;
      failure = err;
    } finally {
      clearTimeout(deadlineTimer);
    }

    // Timed out while the handler ran: the broker owns it again.
    if (message.state !== 'dispatched') return;

    if (!failed) {
      this.move(sub, message, 'acked');
      await session.ack(message.id);
      return;
    }

    const error = new HandlerError(message.id, failure);
    const { maxAttempts, requeueBackoff } = sub.policy;
    if (maxAttempts > 0 && message.attempts >= maxAttempts) {
      this.move(sub, message, 'acked');
      log.error(
        { err: error, subscription: sub.id, messageId: message.id, attempts: message.attempts },
        'Giving up on message after max attempts',
      );
      await session.ack(message.id);
      return;
    }

    const delay = calculateBackoff(message.attempts, requeueBackoff);
    this.move(sub, message, 'requeued');
    log.warn(
      { err: error, subscription: sub.id, messageId: message.id, attempts: message.attempts, requeueInMs: delay },
      'Handler failed, requeueing message',
    );
    await session.requeue(message.id, delay);
  }

  private move(sub: ActiveSubscription, message: InFlightMessage, to: InFlightState): void {
    const from = message.transition(to);
    this.notify(sub, message, from, to);
  }

  private notify(sub: ActiveSubscription, message: InFlightMessage, from: InFlightState | null, to: InFlightState): void {
    const hook = this.options.onTransition;
    if (!hook) return;
    try {
      hook({
        subscriptionId: sub.id,
        topic: sub.topic,
        channel: sub.channel,
        messageId: message.id,
        attempts: message.attempts,
        from,
        to,
      });
    } catch (err: unknown) {
      this.options.log.warn({ err, messageId: message.id }, 'Transition listener threw');
    }
  }
}
