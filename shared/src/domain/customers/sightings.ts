/**
 * Customer Sightings - Pure Domain Logic
 *
 * A sighting is one distinct (customer name, shop) pair observed across a set
 * of typed orders, together with the orders it was seen on. Extraction turns
 * each sighting into exactly one registry customer.
 */

import type { TypedOrder } from '../orders/types.js';
import type { CustomerMatchPolicy } from './matching.js';
import type { CustomerMetadataPatch, CustomerRecord } from './types.js';

export interface CustomerSighting {
    customerName: string;
    shop: string | null;
    /** First non-null handler seen for this pair */
    handler: string | null;
    orders: TypedOrder[];
}

/**
 * Group orders into distinct (name, shop) sightings, in order of first appearance.
 * Orders without a customer name are ignored.
 */
export function collectCustomerSightings(
    orders: readonly TypedOrder[],
    policy: CustomerMatchPolicy
): CustomerSighting[] {
    const byName = new Map<string, Map<string | null, CustomerSighting>>();
    const sightings: CustomerSighting[] = [];

    for (const order of orders) {
        if (order.customerName === null || order.orderId.length === 0) continue;

        const nameKey = policy.nameKey(order.customerName);
        const shopKey = policy.shopKey(order.shop);

        let byShop = byName.get(nameKey);
        if (!byShop) {
            byShop = new Map();
            byName.set(nameKey, byShop);
        }

        let sighting = byShop.get(shopKey);
        if (!sighting) {
            sighting = {
                customerName: order.customerName,
                shop: order.shop,
                handler: null,
                orders: [],
            };
            byShop.set(shopKey, sighting);
            sightings.push(sighting);
        }

        if (sighting.handler === null && order.handler !== null) {
            sighting.handler = order.handler;
        }
        sighting.orders.push(order);
    }

    return sightings;
}

/**
 * Find the registry customer a sighting belongs to.
 *
 * Name must match; shop must match too when the sighting carries one.
 * The first match wins.
 */
export function findMatchingCustomer(
    customers: readonly CustomerRecord[],
    sighting: Pick<CustomerSighting, 'customerName' | 'shop'>,
    policy: CustomerMatchPolicy
): CustomerRecord | undefined {
    const nameKey = policy.nameKey(sighting.customerName);
    const shopKey = policy.shopKey(sighting.shop);
    const matchShop = shopKey !== null && shopKey.length > 0;

    return customers.find(
        (customer) =>
            policy.nameKey(customer.customerName) === nameKey &&
            (!matchShop || policy.shopKey(customer.shop) === shopKey)
    );
}

/**
 * Metadata a sighting can add to an existing customer.
 * Only fills fields that are still null; returns null when there is nothing to write.
 */
export function planMetadataFill(
    customer: Pick<CustomerRecord, 'shop' | 'handler'>,
    sighting: Pick<CustomerSighting, 'shop' | 'handler'>
): CustomerMetadataPatch | null {
    const patch: CustomerMetadataPatch = {};
    if (sighting.shop && !customer.shop) patch.shop = sighting.shop;
    if (sighting.handler && !customer.handler) patch.handler = sighting.handler;
    return Object.keys(patch).length > 0 ? patch : null;
}
