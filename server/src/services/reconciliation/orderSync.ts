/**
 * Order Synchronizer
 *
 * Mirrors canonical orders into sample_orders / bulk_orders:
 * - new order of the target kind → insert
 * - canonical updatedAt newer than the typed copy → overwrite every mirrored field
 * - anything else → untouched, so an unchanged second pass writes nothing
 *
 * Both tables are read in one REPEATABLE READ snapshot. Typed rows whose
 * canonical order was reclassified stay where they are.
 */

import {
    pickOrderFields,
    planOrderSync,
    syncStamp,
    type OrderKind,
    type OrderSyncResult,
    type SyncAllResult,
    type SyncableOrder,
    type TypedOrder,
} from '@orderhub/shared';
import { logWithContext, syncLogger } from '../../utils/logger.js';
import { ValidationError } from '../../utils/errors.js';
import { attemptRow } from './rowGuard.js';
import type { ReconciliationRepository, SyncOptions } from './types.js';

/**
 * Typed row for a first insert. Keeps the canonical stamps so the row is
 * never older than its source.
 */
function toTypedOrder(order: SyncableOrder, now: Date): TypedOrder {
    return {
        ...pickOrderFields(order),
        orderId: order.orderId,
        createdAt: order.createdAt ?? now,
        updatedAt: order.updatedAt ?? now,
    };
}

/**
 * Sync one typed order table from original_orders.
 */
export async function syncOrders(
    repo: ReconciliationRepository,
    kind: OrderKind,
    options: SyncOptions = {}
): Promise<OrderSyncResult> {
    const log = logWithContext(syncLogger, { kind });
    const clock = options.now ?? (() => new Date());

    return repo.transaction(async (tx) => {
        const canonical = await tx.listCanonicalOrders();
        const typed = await tx.listTypedOrderStamps(kind);
        const plan = planOrderSync(canonical, typed, kind, options.rules);
        const now = clock();

        const result: OrderSyncResult = { inserted: 0, updated: 0, errors: 0 };

        for (const order of plan.invalid) {
            const err = new ValidationError('Canonical order has no order_id', {
                orderType: order.orderType,
                customerName: order.customerName,
            });
            log.error({ err, details: err.details }, 'Skipped invalid canonical order');
            result.errors++;
        }

        for (const order of plan.inserts) {
            const outcome = await attemptRow(tx, log, { orderId: order.orderId, op: 'insert' }, () =>
                tx.insertTypedOrder(kind, toTypedOrder(order, now))
            );
            if (!outcome.ok) {
                result.errors++;
            } else if (outcome.value) {
                result.inserted++;
            }
        }

        for (const order of plan.updates) {
            const outcome = await attemptRow(tx, log, { orderId: order.orderId, op: 'update' }, () =>
                tx.updateTypedOrder(kind, order.orderId, pickOrderFields(order), syncStamp(now, order.updatedAt))
            );
            if (outcome.ok) {
                result.updated++;
            } else {
                result.errors++;
            }
        }

        log.info({ ...result, unchanged: plan.unchanged }, 'Order sync complete');
        return result;
    }, { isolation: 'repeatable read' });
}

/**
 * Sync both typed tables, sample first.
 * Each kind commits on its own; a failure in bulk leaves the sample sync in place.
 */
export async function syncAllOrders(
    repo: ReconciliationRepository,
    options: SyncOptions = {}
): Promise<SyncAllResult> {
    const sample = await syncOrders(repo, 'sample', options);
    const bulk = await syncOrders(repo, 'bulk', options);
    return { sample, bulk };
}
