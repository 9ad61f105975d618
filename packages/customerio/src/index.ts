// Asynchronous, rate-limited Customer.io client
export * from './client.js';
export * from './config.js';
export * from './dispatcher.js';
export * from './errors.js';
export * from './rate-limiter.js';
export * from './types.js';

export { Customer, type CustomerParams, type DeviceParams } from './domain/customer.js';
export { Trigger, type TriggerParams } from './domain/trigger.js';

// Pure functional core
export * from './core/index.js';
