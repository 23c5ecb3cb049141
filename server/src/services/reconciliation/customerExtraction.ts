/**
 * Customer Extractor
 *
 * Derives one registry customer per distinct (customer name, shop) seen on the
 * typed orders of a kind and links each order to it.
 *
 * - Existing customer found → only its null shop / handler are filled
 * - No match → customer created from the sighting
 * - (customer, order) links are created once and never refreshed, so an
 *   association keeps the order date and amount of the run that created it
 *
 * Each sighting runs in its own savepoint.
 */

import {
    associationKey,
    collectCustomerSightings,
    exactMatchPolicy,
    findMatchingCustomer,
    orderDateOf,
    planMetadataFill,
    type CustomerExtractionResult,
    type CustomerMetadataPatch,
    type CustomerRecord,
    type CustomerSighting,
    type OrderKind,
} from '@orderhub/shared';
import { customerLogger, logWithContext } from '../../utils/logger.js';
import { attemptRow } from './rowGuard.js';
import type { CustomerStageOptions, ReconciliationRepository, ReconciliationTx } from './types.js';

interface SightingOutcome {
    customer: CustomerRecord;
    created: boolean;
    patch: CustomerMetadataPatch | null;
    linked: string[];
}

async function applySighting(
    tx: ReconciliationTx,
    kind: OrderKind,
    sighting: CustomerSighting,
    match: CustomerRecord | undefined,
    linked: ReadonlySet<string>
): Promise<SightingOutcome> {
    let customer = match;
    let patch: CustomerMetadataPatch | null = null;

    if (!customer) {
        customer = await tx.insertCustomer(kind, {
            customerName: sighting.customerName,
            shop: sighting.shop,
            handler: sighting.handler,
        });
    } else {
        patch = planMetadataFill(customer, sighting);
        if (patch) {
            await tx.updateCustomerMetadata(kind, customer.id, patch);
        }
    }

    const newLinks: string[] = [];
    for (const order of sighting.orders) {
        const key = associationKey(customer.id, order.orderId);
        if (linked.has(key)) continue;

        const inserted = await tx.insertAssociation(kind, {
            customerId: customer.id,
            orderId: order.orderId,
            orderDate: orderDateOf(order),
            amount: order.amount,
        });
        if (inserted) newLinks.push(key);
    }

    return { customer, created: match === undefined, patch, linked: newLinks };
}

/**
 * Extract customers from one typed order table.
 */
export async function extractCustomers(
    repo: ReconciliationRepository,
    kind: OrderKind,
    options: CustomerStageOptions = {}
): Promise<CustomerExtractionResult> {
    const log = logWithContext(customerLogger, { kind });
    const policy = options.policy ?? exactMatchPolicy;

    return repo.transaction(async (tx) => {
        const orders = await tx.listTypedOrders(kind);
        const customers = await tx.listCustomers(kind);
        const associations = await tx.listAssociations(kind);

        const linked = new Set(associations.map((a) => associationKey(a.customerId, a.orderId)));
        const sightings = collectCustomerSightings(orders, policy);
        const result: CustomerExtractionResult = { created: 0, updated: 0, relations: 0, errors: 0 };

        for (const sighting of sightings) {
            const match = findMatchingCustomer(customers, sighting, policy);
            const outcome = await attemptRow(
                tx,
                log,
                { customerName: sighting.customerName, shop: sighting.shop },
                () => applySighting(tx, kind, sighting, match, linked)
            );

            if (!outcome.ok) {
                result.errors++;
                continue;
            }

            // Local view only changes once the savepoint is released
            const { customer, created, patch, linked: newLinks } = outcome.value;
            if (created) {
                customers.push(customer);
                result.created++;
            } else if (patch) {
                Object.assign(customer, patch);
                result.updated++;
            }
            for (const key of newLinks) linked.add(key);
            result.relations += newLinks.length;
        }

        log.info({ ...result, sightings: sightings.length }, 'Customer extraction complete');
        return result;
    });
}
