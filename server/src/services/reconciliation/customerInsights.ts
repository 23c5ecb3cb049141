/**
 * Customer insight queries
 *
 * Read-only views over the reconciled tables. Nothing here writes.
 */

import {
    classifyOrderType,
    ORDER_TYPE_RULES,
    type CanonicalOrder,
    type CustomerOrderRef,
    type CustomerRecord,
    type CustomerSummary,
    type OrderKind,
    type OrderTypeRules,
    type OrphanedTypedOrder,
    type UnconvertedCustomer,
} from '@orderhub/shared';
import type { ReconciliationRepository } from './types.js';

export const DEFAULT_UNCONVERTED_LIMIT = 50;

/** Newest first; undated last */
function compareDatesDesc(a: Date | null, b: Date | null): number {
    if (a === null && b === null) return 0;
    if (a === null) return 1;
    if (b === null) return -1;
    return b.getTime() - a.getTime();
}

// ============================================
// SUMMARY
// ============================================

/**
 * Registry sizes and the share of sample customers that converted.
 */
export async function getCustomerSummary(repo: ReconciliationRepository): Promise<CustomerSummary> {
    return repo.transaction(async (tx) => {
        const sampleCustomers = await tx.listCustomers('sample');
        const bulkCustomers = await tx.listCustomers('bulk');
        const conversions = await tx.listConversions();

        const converted = new Set(conversions.map((c) => c.sampleCustomerId)).size;
        const conversionRate = sampleCustomers.length > 0
            ? Math.round((converted / sampleCustomers.length) * 10_000) / 100
            : 0;

        return {
            sampleCustomers: sampleCustomers.length,
            bulkCustomers: bulkCustomers.length,
            totalCustomers: sampleCustomers.length + bulkCustomers.length,
            convertedCustomers: converted,
            conversionRate,
        };
    });
}

// ============================================
// UNCONVERTED
// ============================================

/**
 * Sample customers with no conversion record, most recently active first.
 */
export async function findUnconvertedCustomers(
    repo: ReconciliationRepository,
    options: { limit?: number } = {}
): Promise<UnconvertedCustomer[]> {
    const limit = options.limit ?? DEFAULT_UNCONVERTED_LIMIT;

    return repo.transaction(async (tx) => {
        const customers = await tx.listCustomers('sample');
        const conversions = await tx.listConversions();
        const associations = await tx.listAssociations('sample');

        const converted = new Set(conversions.map((c) => c.sampleCustomerId));
        const ordersByCustomer = new Map<number, CustomerOrderRef[]>();
        for (const { customerId, orderId, orderDate, amount } of associations) {
            const refs = ordersByCustomer.get(customerId) ?? [];
            refs.push({ orderId, orderDate, amount });
            ordersByCustomer.set(customerId, refs);
        }

        return customers
            .filter((customer) => !converted.has(customer.id))
            .sort((a, b) => compareDatesDesc(a.lastOrderDate, b.lastOrderDate) || a.id - b.id)
            .slice(0, limit)
            .map((customer) => ({
                id: customer.id,
                customerName: customer.customerName,
                shop: customer.shop,
                handler: customer.handler,
                ordersCount: customer.ordersCount,
                totalAmount: customer.totalAmount,
                firstOrderDate: customer.firstOrderDate,
                lastOrderDate: customer.lastOrderDate,
                orders: (ordersByCustomer.get(customer.id) ?? [])
                    .sort((a, b) => compareDatesDesc(a.orderDate, b.orderDate)),
            }));
    });
}

// ============================================
// BY HANDLER
// ============================================

/**
 * Customers of one registry, optionally only those owned by `handler`.
 */
export async function listCustomersByHandler(
    repo: ReconciliationRepository,
    kind: OrderKind,
    handler?: string
): Promise<CustomerRecord[]> {
    return repo.transaction(async (tx) => {
        const customers = await tx.listCustomers(kind);
        return handler ? customers.filter((c) => c.handler === handler) : customers;
    });
}

// ============================================
// ORPHANS
// ============================================

/**
 * Typed rows whose canonical order is gone or now classifies elsewhere.
 */
export async function findOrphanedTypedOrders(
    repo: ReconciliationRepository,
    kind: OrderKind,
    rules: OrderTypeRules = ORDER_TYPE_RULES
): Promise<OrphanedTypedOrder[]> {
    return repo.transaction(async (tx) => {
        const canonical = await tx.listCanonicalOrders();
        const typed = await tx.listTypedOrderStamps(kind);

        const byId = new Map<string, CanonicalOrder>();
        for (const order of canonical) {
            if (order.orderId && !byId.has(order.orderId)) byId.set(order.orderId, order);
        }

        const orphans: OrphanedTypedOrder[] = [];
        for (const { orderId } of typed) {
            const source = byId.get(orderId);
            if (!source) {
                orphans.push({ kind, orderId, canonicalOrderType: null, reason: 'missing' });
            } else if (classifyOrderType(source.orderType, rules) !== kind) {
                orphans.push({ kind, orderId, canonicalOrderType: source.orderType, reason: 'reclassified' });
            }
        }
        return orphans;
    });
}
