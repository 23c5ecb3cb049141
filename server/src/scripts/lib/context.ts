/**
 * Shared plumbing for reconcile commands: database lifecycle and option parsing
 */

import type { z } from 'zod';
import { getMatchPolicy, orderKindSchema, type CustomerMatchPolicy, type OrderKind } from '@orderhub/shared';
import { env } from '../../config/env.js';
import { createKysely, destroyKysely } from '../../db/kysely.js';
import { KyselyReconciliationRepository } from '../../db/reconciliationRepository.js';
import { KyselyReconciliationRunLog } from '../../db/reconciliationRunLog.js';
import type { ReconciliationRepository } from '../../services/reconciliation/types.js';
import type { ReconciliationRunLog } from '../../utils/runTracker.js';
import { toError } from '../../utils/errors.js';
import { error } from './format.js';

export interface JobContext {
    repo: ReconciliationRepository;
    runLog: ReconciliationRunLog;
    policy: CustomerMatchPolicy;
}

export interface OutputOptions {
    json?: boolean;
}

/**
 * Wrap a command action: open the pool, run, report errors, close the pool.
 */
export function withDatabase<A extends unknown[]>(fn: (ctx: JobContext, ...args: A) => Promise<void>) {
    return async (...args: A): Promise<void> => {
        const db = createKysely({ connectionString: env.DATABASE_URL, poolMax: env.DB_POOL_MAX });
        const ctx: JobContext = {
            repo: new KyselyReconciliationRepository(db),
            runLog: new KyselyReconciliationRunLog(db),
            policy: getMatchPolicy(env.CUSTOMER_MATCH_POLICY),
        };

        try {
            await fn(ctx, ...args);
        } catch (err) {
            error(toError(err).message);
            process.exitCode = 1;
        } finally {
            await destroyKysely();
        }
    };
}

export function parseOption<T extends z.ZodTypeAny>(schema: T, value: unknown, flag: string): z.output<T> {
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
        throw new Error(`Invalid ${flag}: ${parsed.error.issues.map((i) => i.message).join(', ')}`);
    }
    return parsed.data;
}

export function parseKind(value: unknown): OrderKind {
    return parseOption(orderKindSchema, value, '--kind');
}
