/**
 * Error taxonomy for the bus.
 *
 * Every public operation fails with a subclass of `BusError`. Callers branch
 * on `code` and use `retryable` to decide whether a retry can help.
 */
export type BusErrorCode =
  | 'RESOLUTION_FAILED'
  | 'CONNECTION_UNAVAILABLE'
  | 'PROTOCOL_ERROR'
  | 'PUBLISH_FAILED'
  | 'HANDLER_FAILED'
  | 'UNSUPPORTED_CAPABILITY'
  | 'TIMEOUT'
  | 'INVALID_TRANSITION'
  | 'CONFIGURATION_ERROR'
  | 'BUS_CLOSED';

export class BusError extends Error {
  readonly code: BusErrorCode;

  /** true for transient failures (network, pool pressure, timeouts). */
  readonly retryable: boolean;

  constructor(
    message: string,
    options: { code: BusErrorCode; retryable?: boolean | undefined; cause?: unknown },
  ) {
    super(message, { cause: options.cause });
    this.name = 'BusError';
    this.code = options.code;
    this.retryable = options.retryable ?? false;
  }
}

/** No reachable broker endpoint for a topic. */
export class ResolutionFailedError extends BusError {
  readonly topic: string;

  constructor(topic: string, message: string, cause?: unknown) {
    super(`Cannot resolve topic "${topic}": ${message}`, { code: 'RESOLUTION_FAILED', cause });
    this.name = 'ResolutionFailedError';
    this.topic = topic;
  }
}

/** Pool exhausted, link dropped, or every dial attempt failed. */
export class ConnectionUnavailableError extends BusError {
  readonly endpoint: string;
  readonly attempts: number;

  constructor(endpoint: string, message: string, options: { attempts?: number | undefined; cause?: unknown } = {}) {
    super(`Connection to ${endpoint} unavailable: ${message}`, {
      code: 'CONNECTION_UNAVAILABLE',
      retryable: true,
      cause: options.cause,
    });
    this.name = 'ConnectionUnavailableError';
    this.endpoint = endpoint;
    this.attempts = options.attempts ?? 0;
  }
}

/**
 * Malformed frame from a peer, or an error frame sent by the broker.
 *
 * `fatal` mirrors the broker's own classification: after a fatal error the
 * broker closes the connection, so the link must not be reused.
 */
export class ProtocolError extends BusError {
  readonly brokerCode: string | undefined;
  readonly fatal: boolean;

  constructor(message: string, options: { brokerCode?: string | undefined; fatal?: boolean | undefined; cause?: unknown } = {}) {
    super(message, { code: 'PROTOCOL_ERROR', cause: options.cause });
    this.name = 'ProtocolError';
    this.brokerCode = options.brokerCode;
    this.fatal = options.fatal ?? true;
  }
}

export type PublishFailureReason =
  | 'resolution'
  | 'rejected'
  | 'exhausted'
  | 'unsupported'
  | 'invalid'
  | 'closed';

/** Terminal publish failure. `attempts` counts send attempts actually made. */
export class PublishError extends BusError {
  readonly topic: string;
  readonly reason: PublishFailureReason;
  readonly attempts: number;

  constructor(topic: string, reason: PublishFailureReason, attempts: number, cause?: unknown) {
    super(`Publish to "${topic}" failed (${reason}) after ${attempts} attempt(s)`, {
      code: 'PUBLISH_FAILED',
      cause,
    });
    this.name = 'PublishError';
    this.topic = topic;
    this.reason = reason;
    this.attempts = attempts;
  }
}

/** An application handler threw, rejected, or ran past its handler timeout. */
export class HandlerError extends BusError {
  readonly messageId: string;

  constructor(messageId: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Handler failed for message ${messageId}: ${detail}`, { code: 'HANDLER_FAILED', cause });
    this.name = 'HandlerError';
    this.messageId = messageId;
  }
}

export class UnsupportedCapabilityError extends BusError {
  readonly family: string;
  readonly capability: string;

  constructor(family: string, capability: string) {
    super(`Broker family "${family}" does not support "${capability}"`, {
      code: 'UNSUPPORTED_CAPABILITY',
    });
    this.name = 'UnsupportedCapabilityError';
    this.family = family;
    this.capability = capability;
  }
}

export class OperationTimeoutError extends BusError {
  readonly operation: string;
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, { code: 'TIMEOUT', retryable: true });
    this.name = 'OperationTimeoutError';
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

export class InvalidTransitionError extends BusError {
  constructor(messageId: string, from: string, to: string) {
    super(`Message ${messageId} cannot move from ${from} to ${to}`, { code: 'INVALID_TRANSITION' });
    this.name = 'InvalidTransitionError';
  }
}

export class ConfigurationError extends BusError {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, {
      code: 'CONFIGURATION_ERROR',
    });
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export class BusClosedError extends BusError {
  constructor() {
    super('Bus is closed', { code: 'BUS_CLOSED' });
    this.name = 'BusClosedError';
  }
}

/**
 * Transient failures are retried locally. Unknown errors are treated as
 * transport failures (socket resets, DNS hiccups) and are retryable too.
 */
export function isTransient(err: unknown): boolean {
  if (err instanceof BusError) return err.retryable;
  return true;
}
