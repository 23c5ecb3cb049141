/**
 * Order Sync Planning - Pure Domain Logic
 *
 * Decides which canonical orders must be inserted into, or refreshed in, a
 * typed order table. The service layer applies the plan inside a transaction.
 *
 * RULES:
 * - canonical order classifies to the target kind, no typed row → insert
 * - typed row exists and canonical.updatedAt > typed.updatedAt → update
 * - typed row with a null updatedAt is always stale
 * - canonical row without an order id → invalid (counted as an error)
 * - everything else is left alone, which makes a second pass a no-op
 */

import { ORDER_TYPE_RULES, type OrderTypeRules } from '../constants.js';
import { maxDate } from '../../utils/dateHelpers.js';
import { classifiesAs } from './classification.js';
import type { CanonicalOrder, OrderKind, SyncableOrder, TypedOrder } from './types.js';

// ============================================
// TYPES
// ============================================

/** The part of a typed row the staleness check needs */
export type TypedOrderStamp = Pick<TypedOrder, 'orderId' | 'updatedAt'>;

export interface OrderSyncPlan {
    kind: OrderKind;
    inserts: SyncableOrder[];
    updates: SyncableOrder[];
    /** Orders of this kind that failed validation */
    invalid: CanonicalOrder[];
    /** Orders of this kind already up to date */
    unchanged: number;
}

// ============================================
// FUNCTIONS
// ============================================

export function hasOrderId(order: CanonicalOrder): order is SyncableOrder {
    return typeof order.orderId === 'string' && order.orderId.length > 0;
}

/**
 * Staleness check between a canonical row and its typed copy.
 * A canonical row with no stamp can never prove it is newer.
 */
export function isStale(canonicalUpdatedAt: Date | null, typedUpdatedAt: Date | null): boolean {
    if (typedUpdatedAt === null) return true;
    if (canonicalUpdatedAt === null) return false;
    return canonicalUpdatedAt.getTime() > typedUpdatedAt.getTime();
}

/**
 * Timestamp to stamp on a refreshed typed row.
 * Never earlier than the canonical stamp (typed.updatedAt >= canonical.updatedAt).
 */
export function syncStamp(now: Date, canonicalUpdatedAt: Date | null): Date {
    return maxDate(now, canonicalUpdatedAt) ?? now;
}

/**
 * Plan one sync pass of `kind` from a snapshot of both tables.
 *
 * Duplicate canonical order ids are planned once (first row wins).
 */
export function planOrderSync(
    canonical: readonly CanonicalOrder[],
    typed: readonly TypedOrderStamp[],
    kind: OrderKind,
    rules: OrderTypeRules = ORDER_TYPE_RULES
): OrderSyncPlan {
    const existing = new Map<string, Date | null>();
    for (const row of typed) {
        existing.set(row.orderId, row.updatedAt);
    }

    const plan: OrderSyncPlan = { kind, inserts: [], updates: [], invalid: [], unchanged: 0 };
    const seen = new Set<string>();

    for (const order of canonical) {
        if (!classifiesAs(order.orderType, kind, rules)) continue;

        if (!hasOrderId(order)) {
            plan.invalid.push(order);
            continue;
        }
        if (seen.has(order.orderId)) continue;
        seen.add(order.orderId);

        if (!existing.has(order.orderId)) {
            plan.inserts.push(order);
        } else if (isStale(order.updatedAt, existing.get(order.orderId) ?? null)) {
            plan.updates.push(order);
        } else {
            plan.unchanged++;
        }
    }

    return plan;
}
