/**
 * Customers Domain Layer
 *
 * Identity matching, extraction planning, conversions and rolling statistics
 * for the sample and bulk customer registries.
 */

export * from './types.js';
export * from './matching.js';
export * from './sightings.js';
export * from './stats.js';
export * from './conversions.js';
