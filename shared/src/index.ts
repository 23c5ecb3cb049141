/**
 * @orderhub/shared - Domain logic and schemas for order reconciliation
 *
 * Pure functions only: classification, sync planning, customer matching,
 * conversion planning and statistics. The server owns every database write.
 */

export * from './domain/index.js';
export * from './schemas/index.js';
export * from './utils/index.js';
