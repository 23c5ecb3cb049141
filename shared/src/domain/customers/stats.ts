/**
 * Customer Statistics - Pure Domain Logic
 *
 * Rolling aggregates recomputed in full from the association table:
 * - ordersCount    number of associations
 * - totalAmount    sum of non-null amounts (null is excluded, not zero)
 * - firstOrderDate earliest non-null order date
 * - lastOrderDate  latest non-null order date
 *
 * A customer with no associations gets EMPTY_CUSTOMER_STATS.
 */

import type { CustomerStats, OrderCustomerAssociation } from './types.js';

export const EMPTY_CUSTOMER_STATS: Readonly<CustomerStats> = {
    ordersCount: 0,
    totalAmount: 0,
    firstOrderDate: null,
    lastOrderDate: null,
};

/** Relative slack when comparing a stored total with a recomputed one */
const AMOUNT_TOLERANCE = 1e-9;

/**
 * Aggregate associations per customer id.
 * Amounts are summed as stored; null and non-finite amounts are skipped.
 */
export function aggregateCustomerStats(
    associations: readonly Pick<OrderCustomerAssociation, 'customerId' | 'orderDate' | 'amount'>[]
): Map<number, CustomerStats> {
    const stats = new Map<number, CustomerStats>();

    for (const association of associations) {
        let entry = stats.get(association.customerId);
        if (!entry) {
            entry = { ...EMPTY_CUSTOMER_STATS };
            stats.set(association.customerId, entry);
        }

        entry.ordersCount++;

        if (association.amount !== null && Number.isFinite(association.amount)) {
            entry.totalAmount += association.amount;
        }

        const date = association.orderDate;
        if (date) {
            if (!entry.firstOrderDate || date.getTime() < entry.firstOrderDate.getTime()) {
                entry.firstOrderDate = date;
            }
            if (!entry.lastOrderDate || date.getTime() > entry.lastOrderDate.getTime()) {
                entry.lastOrderDate = date;
            }
        }
    }

    return stats;
}

function sameAmount(a: number, b: number): boolean {
    return Math.abs(a - b) <= AMOUNT_TOLERANCE * Math.max(1, Math.abs(a), Math.abs(b));
}

function sameDate(a: Date | null, b: Date | null): boolean {
    if (a === null || b === null) return a === b;
    return a.getTime() === b.getTime();
}

/**
 * Whether stored aggregates already equal freshly computed ones.
 */
export function customerStatsEqual(stored: CustomerStats, computed: CustomerStats): boolean {
    return (
        stored.ordersCount === computed.ordersCount &&
        sameAmount(stored.totalAmount, computed.totalAmount) &&
        sameDate(stored.firstOrderDate, computed.firstOrderDate) &&
        sameDate(stored.lastOrderDate, computed.lastOrderDate)
    );
}
