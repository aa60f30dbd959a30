import { z } from 'zod';
import { ConfigurationError } from './domain/errors.js';

const UNITS: Readonly<Record<string, number>> = { ms: 1, s: 1_000, m: 60_000 };

/** Milliseconds as a number, or a string such as "250ms", "5s", "1m" (bare digits are ms). */
export const durationSchema = z.union([
  z.number().int().nonnegative(),
  z
    .string()
    .trim()
    .regex(/^\d+(ms|s|m)?$/, 'Duration must look like 250, "250ms", "5s" or "1m"')
    .transform((value) => {
      const match = /^(\d+)(ms|s|m)?$/.exec(value);
      return Number(match?.[1] ?? 0) * (UNITS[match?.[2] ?? 'ms'] ?? 1);
    }),
]);

const backoffSchema = z.object({
  initial: durationSchema.default(100),
  max: durationSchema.default(10_000),
  multiplier: z.number().min(1).default(2),
  jitter: z.enum(['full', 'none']).default('none'),
});

export const busConfigSchema = z
  .object({
    family: z.enum(['nsq', 'redis-streams', 'memory']).default('nsq'),
    /** Data nodes as host:port; empty means the family's local default. */
    endpoints: z.array(z.string().min(1)).default([]),
    /** nsqlookupd nodes as host:port. */
    discoveryEndpoints: z.array(z.string().min(1)).default([]),
    clientId: z.string().min(1).default('relaybus'),

    maxInFlight: z.number().int().min(1).default(1),
    ackTimeout: durationSchema.default(5_000),
    messageTimeout: durationSchema.default(60_000),
    /** 0 disables. */
    handlerTimeout: durationSchema.default(0),
    /** 0 retries forever. */
    maxAttempts: z.number().int().min(0).default(0),
    retryBackoff: backoffSchema.default({}),
    publishAttempts: z.number().int().min(1).default(3),

    connectAttempts: z.number().int().min(1).default(3),
    connectTimeout: durationSchema.default(5_000),
    heartbeatInterval: durationSchema.default(30_000),
    pool: z
      .object({
        maxIdle: z.number().int().min(0).default(2),
        maxTotal: z.number().int().min(1).default(8),
        acquireTimeout: durationSchema.default(5_000),
      })
      .default({}),

    discovery: z
      .object({
        ttl: durationSchema.default(60_000),
        maxStale: durationSchema.default(30_000),
        timeout: durationSchema.default(2_000),
        pollInterval: durationSchema.default(60_000),
      })
      .default({}),
    health: z
      .object({
        failureThreshold: z.number().int().min(1).default(3),
        cooldown: durationSchema.default(30_000),
      })
      .default({}),
    drainTimeout: durationSchema.default(10_000),

    redis: z
      .object({
        keyPrefix: z.string().default('relaybus:'),
        blockMs: durationSchema.default(2_000),
        claimInterval: durationSchema.default(30_000),
        username: z.string().optional(),
        password: z.string().optional(),
        db: z.number().int().min(0).optional(),
      })
      .default({}),
  })
  .refine((c) => c.pool.maxIdle <= c.pool.maxTotal, {
    message: 'pool.maxIdle must not exceed pool.maxTotal',
    path: ['pool', 'maxIdle'],
  })
  .refine((c) => c.retryBackoff.initial <= c.retryBackoff.max, {
    message: 'retryBackoff.initial must not exceed retryBackoff.max',
    path: ['retryBackoff', 'initial'],
  });

export type BusConfigInput = z.input<typeof busConfigSchema>;
export type BusConfig = z.output<typeof busConfigSchema>;

export function parseBusConfig(input: unknown = {}): BusConfig {
  const parsed = busConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid bus configuration',
      parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
    );
  }
  return parsed.data;
}

function list(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function num(value: string | undefined): number | undefined {
  return value === undefined || value.trim() === '' ? undefined : Number(value);
}

/**
 * Reads BUS_* variables. Unset variables fall back to the defaults above;
 * set-but-invalid ones fail with the offending path.
 */
export function loadBusConfig(env: NodeJS.ProcessEnv = process.env): BusConfig {
  return parseBusConfig({
    family: env['BUS_FAMILY'],
    endpoints: list(env['BUS_ENDPOINTS']),
    discoveryEndpoints: list(env['BUS_DISCOVERY_ENDPOINTS']),
    clientId: env['BUS_CLIENT_ID'],
    maxInFlight: num(env['BUS_MAX_IN_FLIGHT']),
    ackTimeout: env['BUS_ACK_TIMEOUT'],
    messageTimeout: env['BUS_MESSAGE_TIMEOUT'],
    publishAttempts: num(env['BUS_PUBLISH_ATTEMPTS']),
    retryBackoff: {
      initial: env['BUS_RETRY_INITIAL'],
      max: env['BUS_RETRY_MAX'],
      multiplier: num(env['BUS_RETRY_MULTIPLIER']),
    },
  });
}
