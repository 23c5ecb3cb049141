/**
 * Statistics Aggregator
 *
 * Full recompute of orders_count, total_amount and first/last order date
 * from the association table. Only customers whose stored values differ are
 * written; a customer with no associations is zeroed.
 */

import {
    aggregateCustomerStats,
    customerStatsEqual,
    EMPTY_CUSTOMER_STATS,
    type CustomerStatsResult,
    type OrderKind,
} from '@orderhub/shared';
import { logWithContext, statsLogger } from '../../utils/logger.js';
import { attemptRow } from './rowGuard.js';
import type { ReconciliationRepository } from './types.js';

export async function recomputeCustomerStats(
    repo: ReconciliationRepository,
    kind: OrderKind
): Promise<CustomerStatsResult> {
    const log = logWithContext(statsLogger, { kind });

    return repo.transaction(async (tx) => {
        const customers = await tx.listCustomers(kind);
        const associations = await tx.listAssociations(kind);
        const computed = aggregateCustomerStats(associations);

        const result: CustomerStatsResult = { customersUpdated: 0, errors: 0 };

        for (const customer of customers) {
            const stats = computed.get(customer.id) ?? EMPTY_CUSTOMER_STATS;
            if (customerStatsEqual(customer, stats)) continue;

            const outcome = await attemptRow(tx, log, { customerId: customer.id }, () =>
                tx.updateCustomerStats(kind, customer.id, stats)
            );
            if (outcome.ok) {
                result.customersUpdated++;
            } else {
                result.errors++;
            }
        }

        log.info({ ...result, customers: customers.length }, 'Customer statistics recomputed');
        return result;
    });
}
