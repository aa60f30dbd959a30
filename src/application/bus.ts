import type { Logger } from 'pino';
import type { z } from 'zod';
import type { BusEvent, PayloadInput } from '../domain/event.js';
import { createEvent } from '../domain/event.js';
import { BusClosedError, BusError, PublishError } from '../domain/errors.js';
import type { BrokerFamily, ConnectionPool } from '../domain/ports.js';
import type {
  ConsumerDispatcher,
  DeliveryInfo,
  DeliveryPolicy,
  MessageHandler,
  SubscriptionHandle,
} from './consumer-dispatcher.js';
import type { PublishOptions, PublishResult, Publisher } from './publisher.js';
import type { TopicRouter } from './topic-router.js';
import type { EventDefinition } from './typed-events.js';
import { JSON_CONTENT_TYPE } from './typed-events.js';

export type TypedHandler<T> = (value: T, delivery: DeliveryInfo) => Promise<void> | void;

export interface MessageBus {
  readonly family: BrokerFamily;
  publish(
    topic: string,
    payload: PayloadInput,
    headers?: Record<string, string>,
    options?: PublishOptions,
  ): Promise<PublishResult>;
  subscribe(
    topic: string,
    channel: string,
    handler: MessageHandler,
    policy?: Partial<DeliveryPolicy>,
  ): SubscriptionHandle;
  emit<S extends z.ZodTypeAny>(
    definition: EventDefinition<S>,
    value: z.input<S>,
    headers?: Record<string, string>,
    options?: PublishOptions,
  ): Promise<PublishResult>;
  on<S extends z.ZodTypeAny>(
    definition: EventDefinition<S>,
    channel: string,
    handler: TypedHandler<z.output<S>>,
    policy?: Partial<DeliveryPolicy>,
  ): SubscriptionHandle;
  close(): Promise<void>;
}

export type BusParts<L> = Readonly<{
  family: BrokerFamily;
  publisher: Publisher<L>;
  dispatcher: ConsumerDispatcher<L>;
  router: TopicRouter;
  pool: ConnectionPool<L>;
  log: Logger;
}>;

/**
 * Front door of the library. Holds no logic of its own beyond argument
 * checks and the shutdown order: dispatch loops first (they still need
 * links to ack), then the router, then the pool.
 */
export class Bus<L> implements MessageBus {
  readonly family: BrokerFamily;
  private closing: Promise<void> | undefined;

  constructor(private readonly parts: BusParts<L>) {
    this.family = parts.family;
  }

  get closed(): boolean {
    return this.closing !== undefined;
  }

  async publish(
    topic: string,
    payload: PayloadInput,
    headers: Record<string, string> = {},
    options: PublishOptions = {},
  ): Promise<PublishResult> {
    if (this.closed) {
      return { ok: false, error: new PublishError(topic, 'closed', 0, new BusClosedError()) };
    }

    let event: BusEvent;
    try {
      event = createEvent(topic, payload, headers);
    } catch (err: unknown) {
      if (!(err instanceof BusError)) throw err;
      return { ok: false, error: new PublishError(topic, 'invalid', 0, err) };
    }
    return this.parts.publisher.publish(event, options);
  }

  subscribe(
    topic: string,
    channel: string,
    handler: MessageHandler,
    policy: Partial<DeliveryPolicy> = {},
  ): SubscriptionHandle {
    if (this.closed) throw new BusClosedError();
    return this.parts.dispatcher.subscribe(topic, channel, handler, policy);
  }

  async emit<S extends z.ZodTypeAny>(
    definition: EventDefinition<S>,
    value: z.input<S>,
    headers: Record<string, string> = {},
    options: PublishOptions = {},
  ): Promise<PublishResult> {
    let payload: Buffer;
    try {
      payload = definition.encode(value);
    } catch (err: unknown) {
      if (!(err instanceof BusError)) throw err;
      return { ok: false, error: new PublishError(definition.topic, 'invalid', 0, err) };
    }
    return this.publish(definition.topic, payload, { ...headers, 'content-type': JSON_CONTENT_TYPE }, options);
  }

  on<S extends z.ZodTypeAny>(
    definition: EventDefinition<S>,
    channel: string,
    handler: TypedHandler<z.output<S>>,
    policy: Partial<DeliveryPolicy> = {},
  ): SubscriptionHandle {
    return this.subscribe(
      definition.topic,
      channel,
      (event, delivery) => handler(definition.decode(event), delivery),
      policy,
    );
  }

  /** Idempotent; every call resolves once shutdown has finished. */
  close(): Promise<void> {
    this.closing ??= this.shutdown();
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    const { dispatcher, router, pool, log } = this.parts;
    log.info({ family: this.family, subscriptions: dispatcher.size }, 'Closing bus');
    await dispatcher.close();
    router.stop();
    await pool.close();
    log.info({ family: this.family }, 'Bus closed');
  }
}
