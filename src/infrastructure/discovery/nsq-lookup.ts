import { z } from 'zod';
import type { BrokerEndpoint } from '../../domain/endpoint.js';
import { endpointKey } from '../../domain/endpoint.js';
import { ProtocolError } from '../../domain/errors.js';
import type { DiscoveryClient } from '../../domain/ports.js';

export type FetchFn = typeof fetch;

const producerSchema = z.object({
  broadcast_address: z.string().min(1),
  tcp_port: z.number().int().min(1).max(65535),
});

const lookupBodySchema = z.object({
  producers: z.array(producerSchema).default([]),
});

// nsqlookupd before 1.0 wrapped every body in { status_code, status_txt, data }.
const lookupResponseSchema = z.union([
  z.object({ status_code: z.number(), data: lookupBodySchema }),
  lookupBodySchema,
]);

/** Data nodes carrying `topic` according to one nsqlookupd instance. */
export function parseLookupResponse(body: unknown): BrokerEndpoint[] {
  const parsed = lookupResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new ProtocolError('Unexpected nsqlookupd response', { fatal: false, cause: parsed.error });
  }
  const { producers } = 'data' in parsed.data ? parsed.data.data : parsed.data;
  return producers.map((p) => ({ host: p.broadcast_address, port: p.tcp_port, role: 'data' as const }));
}

/**
 * Discovery over nsqlookupd's HTTP API. A 404 means the topic has no
 * producers yet, which is an empty answer rather than a failure.
 */
export class NsqLookupClient implements DiscoveryClient {
  constructor(private readonly fetchFn: FetchFn = fetch) {}

  async lookup(discovery: BrokerEndpoint, topic: string, signal: AbortSignal): Promise<BrokerEndpoint[]> {
    const url = `http://${endpointKey(discovery)}/lookup?topic=${encodeURIComponent(topic)}`;
    const response = await this.fetchFn(url, {
      headers: { Accept: 'application/vnd.nsq; version=1.0' },
      signal,
    });

    if (response.status === 404) return [];
    if (!response.ok) {
      throw new ProtocolError(`nsqlookupd ${endpointKey(discovery)} answered HTTP ${response.status}`, {
        fatal: false,
      });
    }
    const body: unknown = await response.json();
    return parseLookupResponse(body);
  }
}
