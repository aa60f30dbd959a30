import type { BusEvent } from './event.js';
import type { BrokerEndpoint } from './endpoint.js';
import type { RawMessage } from './in-flight.js';

/**
 * Seams between the bus core and broker-specific infrastructure.
 *
 * The core (publisher, dispatcher, router) depends only on these interfaces;
 * each broker family supplies its own implementation, parameterised by the
 * type of link it talks over (`L`).
 */

export type BrokerFamily = 'nsq' | 'redis-streams' | 'memory';

export type Capability = 'publish' | 'subscribe' | 'ack' | 'requeue' | 'heartbeat';

/** What the broker hands back for an accepted publish. */
export interface BrokerReceipt {
  readonly messageId?: string | undefined;
}

export interface SessionOptions {
  readonly topic: string;
  readonly channel: string;
  readonly maxInFlight: number;
  /** Identifies this consumer inside its group where the broker needs one. */
  readonly consumerName: string;
}

/** An open subscription on one link. */
export interface SubscriptionSession {
  /** Broker-side in-flight timeout; past it the broker redelivers. */
  readonly messageTimeoutMs: number;
  readonly closed: boolean;
  /** Resolves with the next delivery, or null once aborted or closed. */
  next(signal: AbortSignal): Promise<RawMessage | null>;
  ack(messageId: string): Promise<void>;
  requeue(messageId: string, delayMs: number): Promise<void>;
  /** Resets the broker-side timeout for a message still being handled. */
  touch(messageId: string): Promise<void>;
  close(): Promise<void>;
}

/**
 * Protocol driver for one broker family. Performs no I/O of its own beyond
 * reading and writing the link it is handed.
 */
export interface WireAdapter<L> {
  readonly family: BrokerFamily;
  readonly capabilities: ReadonlySet<Capability>;
  /** Event → broker-native message body. */
  encode(event: BusEvent): Buffer;
  /** Broker-native message body → event. Throws ProtocolError on malformed input. */
  decode(bytes: Buffer): BusEvent;
  /** Handshake run once on every freshly dialled link. */
  negotiate(link: L): Promise<void>;
  /** Sends a body produced by `encode`; the caller encodes once for every attempt. */
  publish(link: L, topic: string, body: Buffer, timeoutMs: number): Promise<BrokerReceipt>;
  subscribe(link: L, options: SessionOptions): Promise<SubscriptionSession>;
  /** Keeps an idle link alive. */
  heartbeat(link: L): Promise<void>;
}

/** Opens and closes raw links; the pool decides when. */
export interface LinkFactory<L> {
  dial(endpoint: BrokerEndpoint): Promise<L>;
  isOpen(link: L): boolean;
  close(link: L): Promise<void>;
}

/** Exclusive checkout of one pooled link. */
export interface Lease<L> {
  readonly link: L;
  readonly endpoint: BrokerEndpoint;
  /** Hands the link back for reuse. */
  release(): void;
  /** Closes the link and frees its pool slot. */
  invalidate(reason?: unknown): Promise<void>;
}

export interface AcquireOptions {
  readonly signal?: AbortSignal | undefined;
}

export interface ConnectionPool<L> {
  acquire(endpoint: BrokerEndpoint, options?: AcquireOptions): Promise<Lease<L>>;
  /** Scoped acquisition: the lease is returned or invalidated on every exit path. */
  withConnection<T>(endpoint: BrokerEndpoint, fn: (link: L) => Promise<T>, options?: AcquireOptions): Promise<T>;
  close(): Promise<void>;
}

/** Topic → endpoints, plus health feedback from callers. */
export interface EndpointResolver {
  resolve(topic: string): Promise<readonly BrokerEndpoint[]>;
  pick(topic: string): Promise<BrokerEndpoint>;
  reportFailure(endpoint: BrokerEndpoint): void;
  reportSuccess(endpoint: BrokerEndpoint): void;
}

/** Asks one discovery node which data nodes carry a topic. */
export interface DiscoveryClient {
  lookup(discovery: BrokerEndpoint, topic: string, signal: AbortSignal): Promise<BrokerEndpoint[]>;
}
