/**
 * Reconciliation services
 *
 * Stage functions take an injected ReconciliationRepository and return
 * structured counts. See pipeline.ts for the full run.
 */

export { syncOrders, syncAllOrders } from './orderSync.js';
export { extractCustomers } from './customerExtraction.js';
export { detectConversions } from './conversionDetection.js';
export { recomputeCustomerStats } from './customerStats.js';
export { updateCustomerProfile } from './customerProfile.js';
export { runFullReconciliation } from './pipeline.js';
export {
    getCustomerSummary,
    findUnconvertedCustomers,
    listCustomersByHandler,
    findOrphanedTypedOrders,
    DEFAULT_UNCONVERTED_LIMIT,
} from './customerInsights.js';
export type {
    ReconciliationRepository,
    ReconciliationTx,
    TransactionOptions,
    IsolationLevel,
    StageOptions,
    SyncOptions,
    CustomerStageOptions,
    ReconciliationOptions,
} from './types.js';
