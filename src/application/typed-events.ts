import { z } from 'zod';
import type { BusEvent } from '../domain/event.js';
import { assertTopicName } from '../domain/event.js';
import { ConfigurationError, ProtocolError } from '../domain/errors.js';

export const JSON_CONTENT_TYPE = 'application/json';

/**
 * A topic bound to the zod schema of its payload. Producers and consumers
 * share one definition so both sides agree on the shape.
 */
export interface EventDefinition<S extends z.ZodTypeAny> {
  readonly topic: string;
  readonly schema: S;
  /** Validates `value` and serialises it as JSON. */
  encode(value: z.input<S>): Buffer;
  /** Parses JSON and validates it; throws ProtocolError on mismatch. */
  decode(event: BusEvent): z.output<S>;
}

export function defineEvent<S extends z.ZodTypeAny>(topic: string, schema: S): EventDefinition<S> {
  assertTopicName(topic);

  return {
    topic,
    schema,
    encode(value) {
      const parsed = schema.safeParse(value);
      if (!parsed.success) {
        throw new ConfigurationError(
          `Invalid "${topic}" event`,
          parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
        );
      }
      return Buffer.from(JSON.stringify(parsed.data), 'utf8');
    },
    decode(event) {
      let json: unknown;
      try {
        json = JSON.parse(event.payload.toString('utf8'));
      } catch (err: unknown) {
        throw new ProtocolError(`"${topic}" payload is not valid JSON`, { fatal: false, cause: err });
      }
      const parsed = schema.safeParse(json);
      if (!parsed.success) {
        throw new ProtocolError(`"${topic}" payload failed validation`, { fatal: false, cause: parsed.error });
      }
      return parsed.data;
    },
  };
}
