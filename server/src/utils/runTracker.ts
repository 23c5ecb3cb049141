/**
 * Reconciliation Run Tracker
 *
 * Wraps a pipeline run to persist its history in reconciliation_runs.
 * Tracking is best effort: if a history write fails the run still goes ahead
 * and its outcome is returned unchanged.
 */

import type { ReconciliationReport, ReconciliationRun, RunTrigger } from '@orderhub/shared';
import logger from './logger.js';
import { toError } from './errors.js';

const runLogger = logger.child({ module: 'run-tracker' });

export const STALE_RUN_ERROR = 'Process exited before completion';

export interface RunOutcome {
    status: 'completed' | 'failed';
    completedAt: Date;
    durationMs: number;
    result: ReconciliationReport | null;
    error: string | null;
}

/**
 * Storage for run history
 */
export interface ReconciliationRunLog {
    /** Insert a "running" row and return its id */
    startRun(triggeredBy: RunTrigger, startedAt: Date): Promise<number>;
    finishRun(runId: number, outcome: RunOutcome): Promise<void>;
    /** Mark every "running" row failed; returns how many were updated */
    failStaleRuns(error: string, completedAt: Date): Promise<number>;
    listRecentRuns(limit: number): Promise<ReconciliationRun[]>;
}

async function recordOutcome(runLog: ReconciliationRunLog, runId: number, outcome: RunOutcome): Promise<void> {
    try {
        await runLog.finishRun(runId, outcome);
    } catch (err) {
        runLogger.warn({ runId, error: toError(err).message }, 'Failed to update reconciliation run');
    }
}

/**
 * Track one pipeline run.
 * - Creates a "running" record before execution
 * - Records "failed" when the report carries a stage failure or `fn` throws
 * - Re-throws errors from `fn`
 */
export async function trackReconciliationRun(
    runLog: ReconciliationRunLog,
    triggeredBy: RunTrigger,
    fn: () => Promise<ReconciliationReport>
): Promise<ReconciliationReport> {
    const startedAt = new Date();
    let runId: number | null = null;

    try {
        runId = await runLog.startRun(triggeredBy, startedAt);
    } catch (err) {
        runLogger.warn({ triggeredBy, error: toError(err).message }, 'Failed to create reconciliation run record');
    }

    try {
        const report = await fn();

        if (runId !== null) {
            await recordOutcome(runLog, runId, {
                status: report.failure ? 'failed' : 'completed',
                completedAt: new Date(),
                durationMs: Date.now() - startedAt.getTime(),
                result: report,
                error: report.failure?.message ?? null,
            });
        }

        return report;
    } catch (error) {
        if (runId !== null) {
            await recordOutcome(runLog, runId, {
                status: 'failed',
                completedAt: new Date(),
                durationMs: Date.now() - startedAt.getTime(),
                result: null,
                error: toError(error).message,
            });
        }

        throw error;
    }
}

/**
 * Mark runs still "running" as failed.
 * Called before a new run starts; only one run is active at a time.
 */
export async function cleanupStaleRuns(runLog: ReconciliationRunLog): Promise<number> {
    try {
        const count = await runLog.failStaleRuns(STALE_RUN_ERROR, new Date());
        if (count > 0) {
            runLogger.info({ count }, 'Marked stale reconciliation runs as failed');
        }
        return count;
    } catch (err) {
        runLogger.warn({ error: toError(err).message }, 'Failed to clean up stale runs');
        return 0;
    }
}
