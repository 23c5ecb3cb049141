/**
 * Sample → Bulk Conversion Detection - Pure Domain Logic
 *
 * A sample customer "converted" when a bulk customer with the same name
 * (per the match policy) exists. Every matching pair becomes one conversion:
 * two sample customers named 张三 and one bulk 张三 yield two records.
 *
 * Conversion date: earliest associated bulk order date of the bulk customer,
 * or `now` when the bulk customer has no dated orders yet.
 */

import { daysBetween } from '../../utils/dateHelpers.js';
import type { CustomerMatchPolicy } from './matching.js';
import {
    conversionKey,
    type ConversionRecord,
    type CustomerRecord,
    type NewConversion,
    type OrderCustomerAssociation,
} from './types.js';

// ============================================
// TYPES
// ============================================

export interface ConversionPlanInput {
    sampleCustomers: readonly CustomerRecord[];
    bulkCustomers: readonly CustomerRecord[];
    sampleAssociations: readonly OrderCustomerAssociation[];
    bulkAssociations: readonly OrderCustomerAssociation[];
    existing: readonly Pick<ConversionRecord, 'sampleCustomerId' | 'bulkCustomerId'>[];
    now: Date;
    policy: CustomerMatchPolicy;
}

export interface ConversionPlan {
    conversions: NewConversion[];
    /** Names matched by more than one customer on either side */
    ambiguousNames: string[];
}

interface FirstOrder {
    orderId: string;
    orderDate: Date | null;
}

// ============================================
// FUNCTIONS
// ============================================

/**
 * Earliest associated order per customer.
 * Dated orders win over undated ones; ties keep the first row.
 */
export function firstOrdersByCustomer(
    associations: readonly OrderCustomerAssociation[]
): Map<number, FirstOrder> {
    const first = new Map<number, FirstOrder>();

    for (const { customerId, orderId, orderDate } of associations) {
        const current = first.get(customerId);
        if (!current) {
            first.set(customerId, { orderId, orderDate });
            continue;
        }
        if (orderDate === null) continue;
        if (current.orderDate === null || orderDate.getTime() < current.orderDate.getTime()) {
            first.set(customerId, { orderId, orderDate });
        }
    }

    return first;
}

function groupByName(
    customers: readonly CustomerRecord[],
    policy: CustomerMatchPolicy
): Map<string, CustomerRecord[]> {
    const groups = new Map<string, CustomerRecord[]>();
    for (const customer of customers) {
        const key = policy.nameKey(customer.customerName);
        const group = groups.get(key);
        if (group) {
            group.push(customer);
        } else {
            groups.set(key, [customer]);
        }
    }
    return groups;
}

/**
 * Plan the conversion records missing for the current registries.
 */
export function planConversions(input: ConversionPlanInput): ConversionPlan {
    const { sampleCustomers, bulkCustomers, existing, now, policy } = input;

    const known = new Set(existing.map((c) => conversionKey(c.sampleCustomerId, c.bulkCustomerId)));
    const sampleFirst = firstOrdersByCustomer(input.sampleAssociations);
    const bulkFirst = firstOrdersByCustomer(input.bulkAssociations);
    const bulkByName = groupByName(bulkCustomers, policy);
    const sampleByName = groupByName(sampleCustomers, policy);

    const plan: ConversionPlan = { conversions: [], ambiguousNames: [] };

    for (const [nameKey, samples] of sampleByName) {
        const bulks = bulkByName.get(nameKey);
        if (!bulks) continue;

        if (samples.length > 1 || bulks.length > 1) {
            plan.ambiguousNames.push(samples[0].customerName);
        }

        for (const sample of samples) {
            for (const bulk of bulks) {
                if (known.has(conversionKey(sample.id, bulk.id))) continue;

                const firstSample = sampleFirst.get(sample.id);
                const firstBulk = bulkFirst.get(bulk.id);
                const conversionDate = firstBulk?.orderDate ?? now;

                plan.conversions.push({
                    sampleCustomerId: sample.id,
                    bulkCustomerId: bulk.id,
                    conversionDate,
                    sampleOrderId: firstSample?.orderId ?? null,
                    bulkOrderId: firstBulk?.orderId ?? null,
                    conversionDays: firstSample?.orderDate
                        ? daysBetween(firstSample.orderDate, conversionDate)
                        : null,
                });
            }
        }
    }

    return plan;
}
