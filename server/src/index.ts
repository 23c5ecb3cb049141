/**
 * @orderhub/server
 *
 * Reconciliation services plus the PostgreSQL wiring they run on.
 * Configuration is not loaded here; only entry points import config/env.ts.
 */

export * from './services/reconciliation/index.js';

export { createKysely, destroyKysely, type KyselyDB, type KyselyOptions } from './db/kysely.js';
export { KyselyReconciliationRepository } from './db/reconciliationRepository.js';
export { KyselyReconciliationRunLog } from './db/reconciliationRunLog.js';

export {
    trackReconciliationRun,
    cleanupStaleRuns,
    STALE_RUN_ERROR,
    type ReconciliationRunLog,
    type RunOutcome,
} from './utils/runTracker.js';

export {
    ValidationError,
    ConnectivityError,
    ReconciliationStageError,
    isFatalError,
    isConnectivityError,
    toError,
    type CustomError,
} from './utils/errors.js';

export { default as logger } from './utils/logger.js';
