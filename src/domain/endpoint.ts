import { ConfigurationError } from './errors.js';

export type EndpointRole = 'data' | 'discovery';

export type EndpointHealth = 'up' | 'down' | 'unknown';

/** A broker node address. Identity is `host:port`; health is tracked elsewhere. */
export interface BrokerEndpoint {
  readonly host: string;
  readonly port: number;
  readonly role: EndpointRole;
}

export function endpointKey(endpoint: Pick<BrokerEndpoint, 'host' | 'port'>): string {
  const host = endpoint.host.includes(':') ? `[${endpoint.host}]` : endpoint.host;
  return `${host}:${endpoint.port}`;
}

/**
 * Parses `host:port`. IPv6 hosts must be bracketed (`[::1]:4150`); an
 * `http://` prefix is tolerated so lookup URLs can be pasted as-is.
 */
export function parseEndpoint(address: string, role: EndpointRole = 'data'): BrokerEndpoint {
  const trimmed = address.trim().replace(/^https?:\/\//, '').replace(/\/+$/, '');
  const match = /^(\[[^\]]+\]|[^:\s]+):(\d{1,5})$/.exec(trimmed);
  if (!match) {
    throw new ConfigurationError(`Invalid endpoint "${address}"`, ['expected host:port']);
  }

  const host = (match[1] ?? '').replace(/^\[|\]$/g, '');
  const port = Number(match[2]);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigurationError(`Invalid endpoint "${address}"`, ['port must be between 1 and 65535']);
  }

  return { host, port, role };
}

/** Keeps the first occurrence of each `host:port`. */
export function uniqueEndpoints(endpoints: Iterable<BrokerEndpoint>): BrokerEndpoint[] {
  const seen = new Map<string, BrokerEndpoint>();
  for (const endpoint of endpoints) {
    const key = endpointKey(endpoint);
    if (!seen.has(key)) seen.set(key, endpoint);
  }
  return [...seen.values()];
}
