/**
 * Domain Layer
 *
 * Pure reconciliation logic. No database access; the server applies the
 * plans computed here.
 */

export * from './constants.js';
export * from './orders/index.js';
export * from './customers/index.js';
