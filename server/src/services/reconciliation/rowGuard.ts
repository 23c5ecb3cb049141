/**
 * Per-row failure isolation for reconciliation stages.
 */

import type { Logger } from 'pino';
import { isFatalError, toError } from '../../utils/errors.js';
import type { ReconciliationTx } from './types.js';

export type RowOutcome<T> = { ok: true; value: T } | { ok: false; error: Error };

/**
 * Run one row's writes in a savepoint.
 *
 * A non-fatal failure rolls back that row only, is logged with `context`
 * and returned as `{ ok: false }`. Fatal errors propagate and abort the stage.
 */
export async function attemptRow<T>(
    tx: ReconciliationTx,
    log: Logger,
    context: Record<string, unknown>,
    fn: () => Promise<T>
): Promise<RowOutcome<T>> {
    try {
        return { ok: true, value: await tx.isolate(fn) };
    } catch (error) {
        if (isFatalError(error)) throw error;
        const err = toError(error);
        log.error({ ...context, err }, 'Row failed; rolled back to savepoint');
        return { ok: false, error: err };
    }
}
