export * from './domain/index.js';
export * from './application/index.js';
export * from './infrastructure/index.js';
export { busConfigSchema, durationSchema, loadBusConfig, parseBusConfig } from './config.js';
export type { BusConfig, BusConfigInput } from './config.js';
export { createBus, VERSION } from './create-bus.js';
export type { CreateBusOptions } from './create-bus.js';
