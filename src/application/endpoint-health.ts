import type { EndpointHealth } from '../domain/endpoint.js';

export type HealthRecord = Readonly<{
  state: EndpointHealth;
  /** Consecutive failures since the last success. */
  failures: number;
  /** Bumped on every accepted write; basis for compare-and-set. */
  version: number;
  /** While `state === 'down'`, the endpoint is skipped until this epoch ms. */
  downUntil: number;
}>;

export type EndpointHealthOptions = Readonly<{
  failureThreshold: number;
  cooldownMs: number;
  now?: (() => number) | undefined;
}>;

const INITIAL: HealthRecord = { state: 'unknown', failures: 0, version: 0, downUntil: 0 };

/**
 * Health table shared by the publisher and the consumer dispatcher.
 *
 * Records are immutable snapshots replaced through `compareAndSet`, so two
 * reporters working from the same snapshot cannot silently overwrite each
 * other: the second write is rejected and re-applied on the fresh record.
 */
export class EndpointHealthRegistry {
  private readonly records = new Map<string, HealthRecord>();
  private readonly now: () => number;

  constructor(private readonly options: EndpointHealthOptions) {
    this.now = options.now ?? Date.now;
  }

  get(key: string): HealthRecord {
    return this.records.get(key) ?? INITIAL;
  }

  compareAndSet(key: string, expectedVersion: number, next: Omit<HealthRecord, 'version'>): boolean {
    const current = this.get(key);
    if (current.version !== expectedVersion) return false;
    this.records.set(key, { ...next, version: expectedVersion + 1 });
    return true;
  }

  reportFailure(key: string): HealthRecord {
    return this.update(key, (current) => {
      const failures = current.failures + 1;
      if (failures >= this.options.failureThreshold) {
        return { state: 'down', failures, downUntil: this.now() + this.options.cooldownMs };
      }
      return { state: current.state === 'down' ? 'down' : 'unknown', failures, downUntil: current.downUntil };
    });
  }

  reportSuccess(key: string): HealthRecord {
    return this.update(key, () => ({ state: 'up', failures: 0, downUntil: 0 }));
  }

  /** Down endpoints become eligible again once their cooldown has passed. */
  isAvailable(key: string): boolean {
    const record = this.get(key);
    return record.state !== 'down' || this.now() >= record.downUntil;
  }

  failures(key: string): number {
    return this.get(key).failures;
  }

  private update(key: string, apply: (current: HealthRecord) => Omit<HealthRecord, 'version'>): HealthRecord {
    for (;;) {
      const current = this.get(key);
      if (this.compareAndSet(key, current.version, apply(current))) {
        return this.get(key);
      }
    }
  }
}
