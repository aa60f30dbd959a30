import type { BusEvent } from '../../domain/event.js';
import type { RawMessage } from '../../domain/in-flight.js';
import { ConnectionUnavailableError } from '../../domain/errors.js';
import type {
  BrokerReceipt,
  Capability,
  SessionOptions,
  SubscriptionSession,
  WireAdapter,
} from '../../domain/ports.js';
import { decodeEnvelope, encodeEnvelope } from './envelope.js';
import type { MemoryChannel, MemoryLink } from './memory-broker.js';

const CAPABILITIES: ReadonlySet<Capability> = new Set(['publish', 'subscribe', 'ack', 'requeue', 'heartbeat']);

function ensureOpen(link: MemoryLink): void {
  if (!link.isOpen || !link.broker.isAvailable(link.endpoint)) {
    throw new ConnectionUnavailableError(link.endpoint, 'link closed');
  }
}

export class MemoryAdapter implements WireAdapter<MemoryLink> {
  readonly family = 'memory' as const;
  readonly capabilities: ReadonlySet<Capability>;

  /** `capabilities` narrows what the adapter claims, for exercising unsupported paths. */
  constructor(capabilities: Iterable<Capability> = CAPABILITIES) {
    this.capabilities = new Set(capabilities);
  }

  encode(event: BusEvent): Buffer {
    return encodeEnvelope(event);
  }

  decode(bytes: Buffer): BusEvent {
    return decodeEnvelope(bytes);
  }

  async negotiate(link: MemoryLink): Promise<void> {
    ensureOpen(link);
  }

  async publish(link: MemoryLink, topic: string, body: Buffer): Promise<BrokerReceipt> {
    ensureOpen(link);
    return { messageId: link.broker.publish(topic, body) };
  }

  async subscribe(link: MemoryLink, options: SessionOptions): Promise<SubscriptionSession> {
    ensureOpen(link);
    return new MemorySession(link, link.broker.channel(options.topic, options.channel));
  }

  async heartbeat(link: MemoryLink): Promise<void> {
    ensureOpen(link);
  }
}

class MemorySession implements SubscriptionSession {
  readonly messageTimeoutMs: number;
  private readonly held = new Set<string>();
  private isClosed = false;

  constructor(
    private readonly link: MemoryLink,
    private readonly channel: MemoryChannel,
  ) {
    this.messageTimeoutMs = link.broker.messageTimeoutMs;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  async next(signal: AbortSignal): Promise<RawMessage | null> {
    for (;;) {
      if (this.isClosed || signal.aborted) return null;
      ensureOpen(this.link);
      const message = this.channel.deliver();
      if (message) {
        this.held.add(message.id);
        return message;
      }
      await this.channel.wait(signal, this.link);
    }
  }

  async ack(messageId: string): Promise<void> {
    ensureOpen(this.link);
    this.channel.finish(messageId);
    this.held.delete(messageId);
  }

  async requeue(messageId: string, delayMs: number): Promise<void> {
    ensureOpen(this.link);
    this.channel.requeue(messageId, delayMs);
    this.held.delete(messageId);
  }

  async touch(messageId: string): Promise<void> {
    ensureOpen(this.link);
    this.channel.touch(messageId);
  }

  /** Like nsqd on a closed connection: whatever is still held goes back to the queue. */
  async close(): Promise<void> {
    if (this.isClosed) return;
    this.isClosed = true;
    for (const id of this.held) {
      if (this.channel.isInFlight(id)) this.channel.requeue(id, 0);
    }
    this.held.clear();
  }
}
