export { ConnectionManager } from './connection-manager.js';
export type { ConnectionManagerOptions, PoolStats } from './connection-manager.js';
export { TcpLink, tcpLinkFactory } from './tcp-link.js';
export type { ReadOptions } from './tcp-link.js';
export { redisLinkFactory } from './redis-link.js';
export type { RedisLinkOptions } from './redis-link.js';
