import { describe, it, expect } from 'vitest';
import { InFlightMessage } from '../../src/domain/in-flight.js';
import { InvalidTransitionError } from '../../src/domain/errors.js';

function message(): InFlightMessage {
  return new InFlightMessage({ id: 'm-1', attempts: 1, timestamp: 500, body: Buffer.from('x') }, 1_000, 250);
}

describe('InFlightMessage', () => {
  it('starts received with a deadline of receivedAt + timeout', () => {
    const msg = message();

    expect(msg.state).toBe('received');
    expect(msg.deadline).toBe(1_250);
    expect(msg.isTerminal).toBe(false);
  });

  it.each(['acked', 'requeued', 'timedOut'] as const)('allows dispatched → %s', (terminal) => {
    const msg = message();
    msg.transition('dispatched');

    expect(msg.transition(terminal)).toBe('dispatched');
    expect(msg.history).toEqual(['received', 'dispatched', terminal]);
    expect(msg.isTerminal).toBe(true);
  });

  it('refuses to ack before dispatch', () => {
    expect(() => message().transition('acked')).toThrow(InvalidTransitionError);
  });

  it('refuses a second ack', () => {
    const msg = message();
    msg.transition('dispatched');
    msg.transition('acked');

    expect(() => msg.transition('acked')).toThrow('Message m-1 cannot move from acked to acked');
  });

  it('refuses to ack after a timeout', () => {
    const msg = message();
    msg.transition('dispatched');
    msg.transition('timedOut');

    expect(msg.canTransition('acked')).toBe(false);
    expect(() => msg.transition('acked')).toThrow(InvalidTransitionError);
  });

  it('expires at the deadline and can only be extended forward', () => {
    const msg = message();

    expect(msg.isExpired(1_249)).toBe(false);
    expect(msg.isExpired(1_250)).toBe(true);

    msg.extendDeadline(2_000);
    msg.extendDeadline(1_500);
    expect(msg.deadline).toBe(2_000);
  });
});
