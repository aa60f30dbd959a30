import { describe, it, expect } from 'vitest';
import { endpointKey, parseEndpoint, uniqueEndpoints } from '../../src/domain/endpoint.js';

describe('parseEndpoint', () => {
  it('parses host:port as a data endpoint by default', () => {
    expect(parseEndpoint('10.0.0.5:4150')).toEqual({ host: '10.0.0.5', port: 4150, role: 'data' });
  });

  it('strips an http prefix and trailing slash', () => {
    expect(parseEndpoint('http://127.0.0.1:4161/', 'discovery')).toEqual({
      host: '127.0.0.1',
      port: 4161,
      role: 'discovery',
    });
  });

  it('accepts bracketed IPv6 hosts', () => {
    expect(parseEndpoint('[::1]:4150')).toEqual({ host: '::1', port: 4150, role: 'data' });
  });

  it.each(['localhost', 'host:0', 'host:70000', ':4150', 'a b:1'])('rejects %j', (address) => {
    expect(() => parseEndpoint(address)).toThrow(`Invalid endpoint "${address}"`);
  });
});

describe('endpointKey', () => {
  it('brackets IPv6 hosts', () => {
    expect(endpointKey({ host: '::1', port: 4150 })).toBe('[::1]:4150');
    expect(endpointKey({ host: 'nsqd-1', port: 4150 })).toBe('nsqd-1:4150');
  });
});

describe('uniqueEndpoints', () => {
  it('keeps the first occurrence of each key', () => {
    const result = uniqueEndpoints([
      { host: 'a', port: 1, role: 'data' },
      { host: 'b', port: 1, role: 'data' },
      { host: 'a', port: 1, role: 'discovery' },
    ]);

    expect(result).toEqual([
      { host: 'a', port: 1, role: 'data' },
      { host: 'b', port: 1, role: 'data' },
    ]);
  });
});
