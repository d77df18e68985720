/**
 * Shared utilities for the Mnemy client
 * @module utils
 */

export * from './logging/index.js';
export * from './errors.js';
export * from './encryption.js';
export * from './format.js';
export * from './retry.js';
export { sleep, sleepUnlessAborted, calculateBackoffDelay } from './timing.js';
export type { BackoffConfig } from './timing.js';
