import type { Logger } from 'pino';
import { z } from 'zod';
import type { BusEvent } from '../../domain/event.js';
import type { RawMessage } from '../../domain/in-flight.js';
import { ProtocolError, UnsupportedCapabilityError } from '../../domain/errors.js';
import type {
  BrokerReceipt,
  Capability,
  SessionOptions,
  SubscriptionSession,
  WireAdapter,
} from '../../domain/ports.js';
import type { TcpLink } from '../connection/tcp-link.js';
import { decodeEnvelope, encodeEnvelope } from './envelope.js';
import type { NsqFrame } from './nsq-protocol.js';
import { CLOSE_WAIT, MAGIC_V2, commands, parseFrame, toProtocolError } from './nsq-protocol.js';

export type NsqAdapterOptions = Readonly<{
  log: Logger;
  clientId: string;
  hostname: string;
  userAgent: string;
  /** Requested in-flight timeout; nsqd may answer with its own. */
  messageTimeoutMs: number;
  heartbeatIntervalMs: number;
  /** Bound on handshake and subscribe replies. */
  responseTimeoutMs: number;
}>;

/** Settings nsqd agreed to during IDENTIFY. */
export type NsqSettings = Readonly<{
  maxRdyCount: number;
  messageTimeoutMs: number;
  version?: string | undefined;
}>;

const DEFAULT_MAX_RDY_COUNT = 2500;

const identifyResponseSchema = z
  .object({
    max_rdy_count: z.number().int().positive().default(DEFAULT_MAX_RDY_COUNT),
    msg_timeout: z.number().int().positive().optional(),
    auth_required: z.boolean().default(false),
    version: z.string().optional(),
  })
  .passthrough();

const CAPABILITIES: ReadonlySet<Capability> = new Set(['publish', 'subscribe', 'ack', 'requeue', 'heartbeat']);

/**
 * Reads frames until one that is not a heartbeat arrives, answering each
 * heartbeat with NOP on the way.
 */
async function nextFrame(link: TcpLink, timeoutMs: number, what: string): Promise<Exclude<NsqFrame, { type: 'heartbeat' }>> {
  const deadline = Date.now() + timeoutMs;
  for (;;) {
    const bytes = await link.readFrame({ timeoutMs: Math.max(1, deadline - Date.now()) });
    if (bytes === null) throw new ProtocolError(`Link closed while waiting for ${what}`);
    const frame = parseFrame(bytes);
    if (frame.type !== 'heartbeat') return frame;
    await link.write(commands.nop());
  }
}

async function expectOk(link: TcpLink, timeoutMs: number, what: string): Promise<void> {
  const frame = await nextFrame(link, timeoutMs, what);
  if (frame.type === 'error') throw toProtocolError(frame);
  if (frame.type !== 'response' || frame.text !== 'OK') {
    throw new ProtocolError(`Unexpected ${frame.type} frame in reply to ${what}`);
  }
}

export class NsqAdapter implements WireAdapter<TcpLink> {
  readonly family = 'nsq' as const;
  readonly capabilities = CAPABILITIES;
  private readonly settings = new WeakMap<TcpLink, NsqSettings>();

  constructor(private readonly options: NsqAdapterOptions) {}

  encode(event: BusEvent): Buffer {
    return encodeEnvelope(event);
  }

  decode(bytes: Buffer): BusEvent {
    return decodeEnvelope(bytes);
  }

  /** Negotiated settings of a link, once `negotiate` has run on it. */
  settingsOf(link: TcpLink): NsqSettings | undefined {
    return this.settings.get(link);
  }

  async negotiate(link: TcpLink): Promise<void> {
    const { clientId, hostname, userAgent, heartbeatIntervalMs, messageTimeoutMs, responseTimeoutMs, log } = this.options;
    await link.write(
      Buffer.concat([
        MAGIC_V2,
        commands.identify({
          client_id: clientId,
          hostname,
          user_agent: userAgent,
          feature_negotiation: true,
          heartbeat_interval: heartbeatIntervalMs,
          msg_timeout: messageTimeoutMs,
        }),
      ]),
    );

    const frame = await nextFrame(link, responseTimeoutMs, 'IDENTIFY');
    if (frame.type === 'error') throw toProtocolError(frame);
    if (frame.type !== 'response') {
      throw new ProtocolError(`Unexpected ${frame.type} frame in reply to IDENTIFY`);
    }

    // nsqd without feature negotiation answers a plain OK.
    if (frame.text === 'OK') {
      this.settings.set(link, { maxRdyCount: DEFAULT_MAX_RDY_COUNT, messageTimeoutMs });
      return;
    }

    let json: unknown;
    try {
      json = JSON.parse(frame.text);
    } catch (err: unknown) {
      throw new ProtocolError('IDENTIFY response is not JSON', { cause: err });
    }
    const parsed = identifyResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new ProtocolError('IDENTIFY response has an unexpected shape', { cause: parsed.error });
    }
    if (parsed.data.auth_required) {
      throw new UnsupportedCapabilityError(this.family, 'auth');
    }

    const settings: NsqSettings = {
      maxRdyCount: parsed.data.max_rdy_count,
      messageTimeoutMs: parsed.data.msg_timeout ?? messageTimeoutMs,
      version: parsed.data.version,
    };
    this.settings.set(link, settings);
    log.debug({ endpoint: link.endpoint, ...settings }, 'nsqd negotiated');
  }

  async publish(link: TcpLink, topic: string, body: Buffer, timeoutMs: number): Promise<BrokerReceipt> {
    await link.write(commands.pub(topic, body));
    await expectOk(link, timeoutMs, `PUB ${topic}`);
    return {};
  }

  async subscribe(link: TcpLink, options: SessionOptions): Promise<SubscriptionSession> {
    const settings = this.settings.get(link) ?? {
      maxRdyCount: DEFAULT_MAX_RDY_COUNT,
      messageTimeoutMs: this.options.messageTimeoutMs,
    };
    await link.write(commands.sub(options.topic, options.channel));
    await expectOk(link, this.options.responseTimeoutMs, `SUB ${options.topic} ${options.channel}`);

    const rdy = Math.min(options.maxInFlight, settings.maxRdyCount);
    await link.write(commands.rdy(rdy));
    this.options.log.debug({ endpoint: link.endpoint, topic: options.topic, channel: options.channel, rdy }, 'nsqd subscription ready');
    return new NsqSession(link, settings.messageTimeoutMs, this.options.log);
  }

  /** Answers heartbeats that queued up while the link sat idle. */
  async heartbeat(link: TcpLink): Promise<void> {
    let answered = false;
    for (const bytes of link.drainFrames()) {
      const frame = parseFrame(bytes);
      if (frame.type === 'error') throw toProtocolError(frame);
      if (frame.type === 'heartbeat') {
        await link.write(commands.nop());
        answered = true;
      }
    }
    if (!answered) await link.write(commands.nop());
  }
}

class NsqSession implements SubscriptionSession {
  private isClosed = false;

  constructor(
    private readonly link: TcpLink,
    readonly messageTimeoutMs: number,
    private readonly log: Logger,
  ) {}

  get closed(): boolean {
    return this.isClosed || !this.link.isOpen;
  }

  async next(signal: AbortSignal): Promise<RawMessage | null> {
    while (!this.isClosed) {
      const bytes = await this.link.readFrame({ signal });
      if (bytes === null) return null;

      const frame = parseFrame(bytes);
      switch (frame.type) {
        case 'message':
          return frame.message;
        case 'heartbeat':
          await this.link.write(commands.nop());
          break;
        case 'error':
          if (frame.fatal) throw toProtocolError(frame);
          this.log.warn({ endpoint: this.link.endpoint, code: frame.code, detail: frame.message }, 'nsqd reported a non-fatal error');
          break;
        case 'response':
          if (frame.text === CLOSE_WAIT) {
            this.isClosed = true;
            return null;
          }
          break;
      }
    }
    return null;
  }

  ack(messageId: string): Promise<void> {
    return this.link.write(commands.fin(messageId));
  }

  requeue(messageId: string, delayMs: number): Promise<void> {
    return this.link.write(commands.req(messageId, delayMs));
  }

  touch(messageId: string): Promise<void> {
    return this.link.write(commands.touch(messageId));
  }

  async close(): Promise<void> {
    if (this.isClosed) return;
    this.isClosed = true;
    if (!this.link.isOpen) return;
    await this.link.write(Buffer.concat([commands.rdy(0), commands.cls()]));
  }
}
