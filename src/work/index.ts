/**
 * treesync Work — exports.
 */

export { DistributedWork, distribute, DEFAULT_MAX_CONCURRENCY } from './distributor.js';
export type { WorkUnit, WorkOutcome, DistributedWorkOptions } from './distributor.js';
export { Semaphore } from './semaphore.js';
export type { Release } from './semaphore.js';
