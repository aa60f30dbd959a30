export * from './connection/index.js';
export * from './wire/index.js';
export { NsqLookupClient, parseLookupResponse } from './discovery/nsq-lookup.js';
export type { FetchFn } from './discovery/nsq-lookup.js';
