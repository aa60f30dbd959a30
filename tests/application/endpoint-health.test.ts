import { describe, it, expect } from 'vitest';
import { EndpointHealthRegistry } from '../../src/application/endpoint-health.js';

function registry(clock: { now: number }) {
  return new EndpointHealthRegistry({ failureThreshold: 3, cooldownMs: 1_000, now: () => clock.now });
}

describe('EndpointHealthRegistry', () => {
  it('starts unknown and available', () => {
    const health = registry({ now: 0 });

    expect(health.get('a:1')).toEqual({ state: 'unknown', failures: 0, version: 0, downUntil: 0 });
    expect(health.isAvailable('a:1')).toBe(true);
  });

  it('marks an endpoint down at the failure threshold', () => {
    const clock = { now: 10_000 };
    const health = registry(clock);

    health.reportFailure('a:1');
    health.reportFailure('a:1');
    expect(health.get('a:1').state).toBe('unknown');
    expect(health.isAvailable('a:1')).toBe(true);

    const record = health.reportFailure('a:1');
    expect(record).toEqual({ state: 'down', failures: 3, version: 3, downUntil: 11_000 });
    expect(health.isAvailable('a:1')).toBe(false);
  });

  it('makes a down endpoint eligible again after the cooldown', () => {
    const clock = { now: 0 };
    const health = registry(clock);
    for (let i = 0; i < 3; i++) health.reportFailure('a:1');

    clock.now = 999;
    expect(health.isAvailable('a:1')).toBe(false);
    clock.now = 1_000;
    expect(health.isAvailable('a:1')).toBe(true);
  });

  it('resets on success', () => {
    const health = registry({ now: 0 });
    health.reportFailure('a:1');

    expect(health.reportSuccess('a:1')).toEqual({ state: 'up', failures: 0, version: 2, downUntil: 0 });
  });

  it('rejects a compare-and-set against a stale version', () => {
    const health = registry({ now: 0 });
    const snapshot = health.get('a:1');
    health.reportFailure('a:1');

    const applied = health.compareAndSet('a:1', snapshot.version, { state: 'up', failures: 0, downUntil: 0 });

    expect(applied).toBe(false);
    expect(health.failures('a:1')).toBe(1);
  });
});
