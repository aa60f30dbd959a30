import { OperationTimeoutError } from '../domain/errors.js';

export type BackoffPolicy = Readonly<{
  initialMs: number;
  maxMs: number;
  multiplier: number;
  /** "full" picks a random delay in [0, computed]. */
  jitter: 'full' | 'none';
}>;

export const DEFAULT_BACKOFF: BackoffPolicy = {
  initialMs: 100,
  maxMs: 10_000,
  multiplier: 2,
  jitter: 'none',
};

/**
 * Exponential backoff for the given 1-based attempt:
 * delay = min(maxMs, initialMs × multiplier^(attempt-1)).
 */
export function calculateBackoff(
  attempt: number,
  policy: BackoffPolicy,
  random: () => number = Math.random,
): number {
  const exponent = Math.max(0, attempt - 1);
  const exponential = policy.initialMs * Math.pow(policy.multiplier, exponent);
  const capped = Math.min(policy.maxMs, exponential);

  if (policy.jitter === 'none') {
    return Math.round(capped);
  }
  return Math.floor(random() * (capped + 1));
}

/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Races `promise` against a timer. A non-positive or non-finite timeout
 * disables the bound.
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) return promise;

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new OperationTimeoutError(operation, timeoutMs)), timeoutMs);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}
