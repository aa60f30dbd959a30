export { encodeEnvelope, decodeEnvelope, ENVELOPE_VERSION } from './envelope.js';
export {
  MAGIC_V2,
  FRAME_RESPONSE,
  FRAME_ERROR,
  FRAME_MESSAGE,
  HEARTBEAT,
  commands,
  encodeFrame,
  encodeMessageData,
  parseFrame,
} from './nsq-protocol.js';
export type { NsqFrame } from './nsq-protocol.js';
export { NsqAdapter } from './nsq-adapter.js';
export type { NsqAdapterOptions, NsqSettings } from './nsq-adapter.js';
export { RedisStreamsAdapter, streamKey } from './redis-streams-adapter.js';
export type { RedisStreamsAdapterOptions } from './redis-streams-adapter.js';
export { MemoryBroker, MemoryLink, memoryLinkFactory } from './memory-broker.js';
export type { MemoryBrokerOptions } from './memory-broker.js';
export { MemoryAdapter } from './memory-adapter.js';
