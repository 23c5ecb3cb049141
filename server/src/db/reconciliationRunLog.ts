/**
 * Kysely Reconciliation Run Log
 *
 * reconciliation_runs persistence for the run tracker. Rows are validated
 * against reconciliationRunSchema on the way out to catch schema drift.
 */

import { z } from 'zod';
import { reconciliationRunSchema, type ReconciliationRun, type RunTrigger } from '@orderhub/shared';
import type { ReconciliationRunLog, RunOutcome } from '../utils/runTracker.js';
import type { KyselyDB } from './kysely.js';

const runListSchema = z.array(reconciliationRunSchema);

export class KyselyReconciliationRunLog implements ReconciliationRunLog {
    constructor(private readonly db: KyselyDB) {}

    async startRun(triggeredBy: RunTrigger, startedAt: Date): Promise<number> {
        const row = await this.db
            .insertInto('reconciliationRuns')
            .values({ triggeredBy, startedAt })
            .returning('id')
            .executeTakeFirstOrThrow();
        return row.id;
    }

    async finishRun(runId: number, outcome: RunOutcome): Promise<void> {
        await this.db
            .updateTable('reconciliationRuns')
            .set({
                status: outcome.status,
                completedAt: outcome.completedAt,
                durationMs: outcome.durationMs,
                result: outcome.result ? JSON.stringify(outcome.result) : null,
                error: outcome.error,
            })
            .where('id', '=', runId)
            .execute();
    }

    async failStaleRuns(error: string, completedAt: Date): Promise<number> {
        const result = await this.db
            .updateTable('reconciliationRuns')
            .set({ status: 'failed', error, completedAt })
            .where('status', '=', 'running')
            .executeTakeFirst();
        return Number(result.numUpdatedRows);
    }

    async listRecentRuns(limit: number): Promise<ReconciliationRun[]> {
        const rows = await this.db
            .selectFrom('reconciliationRuns')
            .selectAll()
            .orderBy('startedAt', 'desc')
            .limit(limit)
            .execute();
        return runListSchema.parse(rows);
    }
}
