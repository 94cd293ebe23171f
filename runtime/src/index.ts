/**
 * @cronmarket/runtime - Scheduled compute marketplace
 *
 * Providers advertise capacity and pricing, consumers register recurring
 * jobs, matchers pair them, and providers report executions against the
 * agreed schedule.
 *
 * @packageDocumentation
 */

export const VERSION = '0.1.0';

export * from './types/index.js';
export * from './utils/index.js';
export * from './schedule/index.js';
export * from './attestation/index.js';
export * from './rewards/index.js';
export * from './registry/index.js';
export * from './marketplace/index.js';
