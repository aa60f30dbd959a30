import { InvalidTransitionError } from './errors.js';

/**
 * Lifecycle of one delivered message inside a subscription.
 *
 *   received → dispatched → acked
 *                         → requeued
 *                         → timedOut
 *
 * The three right-hand states are terminal. A message can therefore be acked
 * at most once, and never after it was requeued or timed out.
 */
export type InFlightState = 'received' | 'dispatched' | 'acked' | 'requeued' | 'timedOut';

const TRANSITIONS: Readonly<Record<InFlightState, readonly InFlightState[]>> = {
  received: ['dispatched'],
  dispatched: ['acked', 'requeued', 'timedOut'],
  acked: [],
  requeued: [],
  timedOut: [],
};

/** A message as handed over by a broker session, before the bus tracks it. */
export interface RawMessage {
  readonly id: string;
  /** Delivery attempt reported by the broker, 1 on first delivery. */
  readonly attempts: number;
  /** Broker-side enqueue time in epoch ms. */
  readonly timestamp: number;
  readonly body: Buffer;
}

export class InFlightMessage {
  readonly id: string;
  readonly attempts: number;
  readonly timestamp: number;
  readonly body: Buffer;
  readonly receivedAt: number;

  private expiresAt: number;
  private current: InFlightState = 'received';
  private readonly path: InFlightState[] = ['received'];

  constructor(message: RawMessage, receivedAt: number, timeoutMs: number) {
    this.id = message.id;
    this.attempts = message.attempts;
    this.timestamp = message.timestamp;
    this.body = message.body;
    this.receivedAt = receivedAt;
    this.expiresAt = receivedAt + timeoutMs;
  }

  /** Epoch ms after which the broker considers the delivery timed out. */
  get deadline(): number {
    return this.expiresAt;
  }

  get state(): InFlightState {
    return this.current;
  }

  /** Every state visited so far, oldest first. */
  get history(): readonly InFlightState[] {
    return this.path;
  }

  get isTerminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  canTransition(next: InFlightState): boolean {
    return TRANSITIONS[this.current].includes(next);
  }

  /** Moves to `next` and returns the previous state. */
  transition(next: InFlightState): InFlightState {
    if (!this.canTransition(next)) {
      throw new InvalidTransitionError(this.id, this.current, next);
    }
    const previous = this.current;
    this.current = next;
    this.path.push(next);
    return previous;
  }

  isExpired(now: number): boolean {
    return now >= this.expiresAt;
  }

  /** Called after a touch reset the broker-side timeout. */
  extendDeadline(deadline: number): void {
    if (deadline > this.expiresAt) this.expiresAt = deadline;
  }
}
