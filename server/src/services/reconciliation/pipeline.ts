/**
 * Full reconciliation ("resync")
 *
 * sync(sample, bulk) → extract(sample, bulk) → conversions → stats(sample, bulk)
 *
 * Each step commits on its own. The first step that throws stops the run;
 * steps already committed stay committed. The report says how far it got:
 *
 *   completed - every step ran with no row errors
 *   partial   - every step ran, some rows failed
 *   failed    - a step aborted
 *
 * `blocking` is set when the sync step failed or reported row errors: the
 * typed tables may not reflect the import. Customer-side errors never block.
 */

import {
    ORDER_KINDS,
    type OrderKind,
    type ReconciliationReport,
    type ReconciliationStage,
} from '@orderhub/shared';
import { reconciliationLogger } from '../../utils/logger.js';
import { ReconciliationStageError, toError } from '../../utils/errors.js';
import { syncOrders } from './orderSync.js';
import { extractCustomers } from './customerExtraction.js';
import { detectConversions } from './conversionDetection.js';
import { recomputeCustomerStats } from './customerStats.js';
import type { ReconciliationOptions, ReconciliationRepository } from './types.js';

async function runStage<T>(stage: ReconciliationStage, kind: OrderKind | null, fn: () => Promise<T>): Promise<T> {
    try {
        return await fn();
    } catch (error) {
        throw new ReconciliationStageError(stage, kind, toError(error));
    }
}

function emptyReport(): ReconciliationReport {
    return {
        status: 'completed',
        blocking: false,
        sync: { sample: null, bulk: null },
        customers: { sample: null, bulk: null },
        conversions: null,
        stats: { sample: null, bulk: null },
        failure: null,
        durationMs: 0,
    };
}

function countRowErrors(report: ReconciliationReport): number {
    let errors = report.conversions?.errors ?? 0;
    for (const kind of ORDER_KINDS) {
        errors += report.sync[kind]?.errors ?? 0;
        errors += report.customers[kind]?.errors ?? 0;
        errors += report.stats[kind]?.errors ?? 0;
    }
    return errors;
}

export async function runFullReconciliation(
    repo: ReconciliationRepository,
    options: ReconciliationOptions = {}
): Promise<ReconciliationReport> {
    const startedAt = Date.now();
    const report = emptyReport();

    reconciliationLogger.info({ policy: options.policy?.name ?? 'exact' }, 'Reconciliation started');

    try {
        for (const kind of ORDER_KINDS) {
            report.sync[kind] = await runStage('sync', kind, () => syncOrders(repo, kind, options));
        }
        for (const kind of ORDER_KINDS) {
            report.customers[kind] = await runStage('extract', kind, () => extractCustomers(repo, kind, options));
        }
        report.conversions = await runStage('conversions', null, () => detectConversions(repo, options));
        for (const kind of ORDER_KINDS) {
            report.stats[kind] = await runStage('stats', kind, () => recomputeCustomerStats(repo, kind));
        }
    } catch (error) {
        if (!(error instanceof ReconciliationStageError)) throw error;

        report.failure = { stage: error.stage, kind: error.kind, message: error.originalError.message };
        reconciliationLogger.error(
            { stage: error.stage, kind: error.kind, err: error.originalError },
            'Reconciliation aborted'
        );
    }

    const syncErrors = ORDER_KINDS.reduce((sum, kind) => sum + (report.sync[kind]?.errors ?? 0), 0);
    report.blocking = report.failure?.stage === 'sync' || syncErrors > 0;

    if (report.failure) {
        report.status = 'failed';
    } else if (countRowErrors(report) > 0) {
        report.status = 'partial';
    }

    report.durationMs = Date.now() - startedAt;
    reconciliationLogger.info(
        { status: report.status, blocking: report.blocking, durationMs: report.durationMs },
        'Reconciliation finished'
    );
    return report;
}
