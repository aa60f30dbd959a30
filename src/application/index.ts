export { Bus } from './bus.js';
export type { MessageBus, BusParts, TypedHandler } from './bus.js';
export { ConsumerDispatcher } from './consumer-dispatcher.js';
export type {
  ConsumerDispatcherOptions,
  DeliveryInfo,
  DeliveryPolicy,
  MessageHandler,
  SubscriptionHandle,
  TransitionEvent,
} from './consumer-dispatcher.js';
export { EndpointHealthRegistry } from './endpoint-health.js';
export type { HealthRecord, EndpointHealthOptions } from './endpoint-health.js';
export { Publisher } from './publisher.js';
export type { PublishAck, PublishOptions, PublishResult, PublisherOptions } from './publisher.js';
export { Semaphore } from './semaphore.js';
export { DEFAULT_BACKOFF, calculateBackoff, sleep, withTimeout } from './timing.js';
export type { BackoffPolicy } from './timing.js';
export { TopicRouter } from './topic-router.js';
export type { TopicRouterOptions } from './topic-router.js';
export { defineEvent, JSON_CONTENT_TYPE } from './typed-events.js';
export type { EventDefinition } from './typed-events.js';
