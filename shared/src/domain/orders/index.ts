/**
 * Orders Domain Layer
 *
 * Classification and sync planning for imported orders.
 */

export * from './types.js';
export * from './classification.js';
export * from './syncPlan.js';
