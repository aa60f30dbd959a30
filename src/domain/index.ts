export type { BusEvent, EventHeaders, PayloadInput } from './event.js';
export {
  createEvent,
  toPayload,
  assertTopicName,
  assertChannelName,
  topicNameSchema,
  channelNameSchema,
} from './event.js';
export type { BrokerEndpoint, EndpointRole, EndpointHealth } from './endpoint.js';
export { endpointKey, parseEndpoint, uniqueEndpoints } from './endpoint.js';
export type { InFlightState, RawMessage } from './in-flight.js';
export { InFlightMessage } from './in-flight.js';
export type {
  BrokerFamily,
  Capability,
  BrokerReceipt,
  SessionOptions,
  SubscriptionSession,
  WireAdapter,
  LinkFactory,
  Lease,
  AcquireOptions,
  ConnectionPool,
  EndpointResolver,
  DiscoveryClient,
} from './ports.js';
export type { BusErrorCode, PublishFailureReason } from './errors.js';
export {
  BusError,
  ResolutionFailedError,
  ConnectionUnavailableError,
  ProtocolError,
  PublishError,
  HandlerError,
  UnsupportedCapabilityError,
  OperationTimeoutError,
  InvalidTransitionError,
  ConfigurationError,
  BusClosedError,
  isTransient,
} from './errors.js';
