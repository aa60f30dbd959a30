import type { BrokerEndpoint } from '../../domain/endpoint.js';
import { endpointKey } from '../../domain/endpoint.js';
import { ConnectionUnavailableError, ProtocolError } from '../../domain/errors.js';
import type { RawMessage } from '../../domain/in-flight.js';
import type { LinkFactory } from '../../domain/ports.js';

export type MemoryBrokerOptions = Readonly<{
  /** In-flight timeout after which an unacknowledged message is redelivered. */
  messageTimeoutMs?: number | undefined;
  now?: (() => number) | undefined;
}>;

type Stored = {
  readonly id: string;
  readonly body: Buffer;
  readonly timestamp: number;
  attempts: number;
};

const DEFAULT_MESSAGE_TIMEOUT_MS = 60_000;

/** Live connection to the in-process broker under one endpoint name. */
export class MemoryLink {
  private open = true;
  private readonly closeListeners = new Set<() => void>();

  constructor(
    readonly broker: MemoryBroker,
    readonly endpoint: string,
  ) {}

  get isOpen(): boolean {
    return this.open;
  }

  /** Registers a listener; returns its removal. */
  onClose(listener: () => void): () => void {
    this.closeListeners.add(listener);
    return () => this.closeListeners.delete(listener);
  }

  close(): void {
    if (!this.open) return;
    this.open = false;
    for (const listener of [...this.closeListeners]) listener();
    this.closeListeners.clear();
    this.broker.detach(this);
  }
}

class MemoryChannel {
  private readonly queue: Stored[] = [];
  private readonly inFlight = new Map<string, { message: Stored; timer: NodeJS.Timeout }>();
  private readonly deferred = new Set<NodeJS.Timeout>();
  private readonly waiters = new Set<() => void>();

  constructor(private readonly timeoutMs: number) {}

  get depth(): number {
    return this.queue.length + this.deferred.size;
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  enqueue(message: Stored, front = false): void {
    if (front) this.queue.unshift(message);
    else this.queue.push(message);
    for (const wake of [...this.waiters]) wake();
  }

  /** Hands out the next queued message and starts its in-flight timer. */
  deliver(): RawMessage | undefined {
    const message = this.queue.shift();
    if (!message) return undefined;
    message.attempts++;
    this.track(message);
    return { id: message.id, attempts: message.attempts, timestamp: message.timestamp, body: message.body };
  }

  wait(signal: AbortSignal, link: MemoryLink): Promise<void> {
    return new Promise((resolve) => {
      const done = (): void => {
        this.waiters.delete(done);
        signal.removeEventListener('abort', done);
        removeClose();
        resolve();
      };
      this.waiters.add(done);
      signal.addEventListener('abort', done, { once: true });
      const removeClose = link.onClose(done);
    });
  }

  finish(id: string): void {
    const entry = this.take(id, 'E_FIN_FAILED');
    clearTimeout(entry.timer);
  }

  requeue(id: string, delayMs: number): void {
    const entry = this.take(id, 'E_REQ_FAILED');
    clearTimeout(entry.timer);
    if (delayMs <= 0) {
      this.enqueue(entry.message);
      return;
    }
    const timer = setTimeout(() => {
      this.deferred.delete(timer);
      this.enqueue(entry.message);
    }, delayMs);
    timer.unref();
    this.deferred.add(timer);
  }

  touch(id: string): void {
    const entry = this.inFlight.get(id);
    if (!entry) throw nonFatal('E_TOUCH_FAILED', id);
    clearTimeout(entry.timer);
    this.track(entry.message);
  }

  isInFlight(id: string): boolean {
    return this.inFlight.has(id);
  }

  shutdown(): void {
    for (const { timer } of this.inFlight.values()) clearTimeout(timer);
    for (const timer of this.deferred) clearTimeout(timer);
    this.inFlight.clear();
    this.deferred.clear();
  }

  private take(id: string, code: string): { message: Stored; timer: NodeJS.Timeout } {
    const entry = this.inFlight.get(id);
    if (!entry) throw nonFatal(code, id);
    this.inFlight.delete(id);
    return entry;
  }

  private track(message: Stored): void {
    const timer = setTimeout(() => {
      this.inFlight.delete(message.id);
      this.enqueue(message, true);
    }, this.timeoutMs);
    timer.unref();
    this.inFlight.set(message.id, { message, timer });
  }
}

function nonFatal(code: string, id: string): ProtocolError {
  return new ProtocolError(`memory broker: ${code} ${id} is not in flight`, { brokerCode: code, fatal: false });
}

type MemoryTopic = {
  readonly backlog: Stored[];
  readonly channels: Map<string, MemoryChannel>;
};

/**
 * In-process broker with NSQ semantics: a topic copies every message to
 * each of its channels, and each channel hands a message to one consumer.
 * Messages published before the first channel exists wait on the topic.
 *
 * Endpoints are names only. Marking one unavailable closes its links and
 * refuses new ones, which is how tests simulate a node going down.
 */
export class MemoryBroker {
  readonly messageTimeoutMs: number;
  private readonly topics = new Map<string, MemoryTopic>();
  private readonly offline = new Set<string>();
  private readonly links = new Map<string, Set<MemoryLink>>();
  private readonly now: () => number;
  private sequence = 0;

  constructor(options: MemoryBrokerOptions = {}) {
    this.messageTimeoutMs = options.messageTimeoutMs ?? DEFAULT_MESSAGE_TIMEOUT_MS;
    this.now = options.now ?? Date.now;
  }

  connect(endpoint: string): MemoryLink {
    if (this.offline.has(endpoint)) {
      throw new ConnectionUnavailableError(endpoint, 'connection refused');
    }
    const link = new MemoryLink(this, endpoint);
    let open = this.links.get(endpoint);
    if (!open) {
      open = new Set();
      this.links.set(endpoint, open);
    }
    open.add(link);
    return link;
  }

  detach(link: MemoryLink): void {
    this.links.get(link.endpoint)?.delete(link);
  }

  isAvailable(endpoint: string): boolean {
    return !this.offline.has(endpoint);
  }

  /** Taking an endpoint down drops every link currently open to it. */
  setAvailable(endpoint: string, available: boolean): void {
    if (available) {
      this.offline.delete(endpoint);
      return;
    }
    this.offline.add(endpoint);
    for (const link of [...(this.links.get(endpoint) ?? [])]) link.close();
  }

  publish(topic: string, body: Buffer): string {
    this.sequence++;
    const id = this.sequence.toString(16).padStart(16, '0');
    const entry = this.topic(topic);
    const timestamp = this.now();

    if (entry.channels.size === 0) {
      entry.backlog.push({ id, body, timestamp, attempts: 0 });
      return id;
    }
    for (const channel of entry.channels.values()) {
      channel.enqueue({ id, body, timestamp, attempts: 0 });
    }
    return id;
  }

  channel(topic: string, name: string): MemoryChannel {
    const entry = this.topic(topic);
    let channel = entry.channels.get(name);
    if (!channel) {
      channel = new MemoryChannel(this.messageTimeoutMs);
      if (entry.channels.size === 0) {
        for (const message of entry.backlog.splice(0)) channel.enqueue(message);
      }
      entry.channels.set(name, channel);
    }
    return channel;
  }

  /** Messages waiting (queued or deferred) on a channel, or on the topic if it has none yet. */
  depth(topic: string, channel?: string): number {
    const entry = this.topics.get(topic);
    if (!entry) return 0;
    if (channel === undefined) return entry.backlog.length;
    return entry.channels.get(channel)?.depth ?? 0;
  }

  inFlight(topic: string, channel: string): number {
    return this.topics.get(topic)?.channels.get(channel)?.inFlightCount ?? 0;
  }

  /** Stops every timer the broker owns. */
  shutdown(): void {
    for (const entry of this.topics.values()) {
      for (const channel of entry.channels.values()) channel.shutdown();
    }
    for (const open of this.links.values()) {
      for (const link of [...open]) link.close();
    }
  }

  private topic(name: string): MemoryTopic {
    let entry = this.topics.get(name);
    if (!entry) {
      entry = { backlog: [], channels: new Map() };
      this.topics.set(name, entry);
    }
    return entry;
  }
}

export type { MemoryChannel };

export function memoryLinkFactory(broker: MemoryBroker): LinkFactory<MemoryLink> {
  return {
    dial: async (endpoint: BrokerEndpoint) => broker.connect(endpointKey(endpoint)),
    isOpen: (link) => link.isOpen,
    close: async (link) => link.close(),
  };
}
