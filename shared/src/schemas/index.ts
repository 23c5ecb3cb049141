export * from './reconciliation.js';
export * from './customers.js';
