/**
 * Customer registry shapes, common to the sample and bulk registries.
 *
 * The two registries differ only in how the conversion link is named in the
 * database (`bulk_customer_id` on sample customers, `sample_customer_id` on
 * bulk customers); here both are `counterpartCustomerId`.
 */

import type { OrderKind } from '../orders/types.js';

export interface CustomerStats {
    ordersCount: number;
    totalAmount: number;
    firstOrderDate: Date | null;
    lastOrderDate: Date | null;
}

export interface CustomerRecord extends CustomerStats {
    id: number;
    kind: OrderKind;
    customerName: string;
    shop: string | null;
    handler: string | null;
    region: string | null;
    notes: string | null;
    tags: string[];
    /** Only kept on sample customers */
    wechat: string | null;
    /** sample: converted_to_bulk, bulk: converted_from_sample */
    converted: boolean;
    /** sample: bulk_customer_id, bulk: sample_customer_id */
    counterpartCustomerId: number | null;
    /** Only tracked on sample customers */
    conversionDate: Date | null;
}

/** Identity of a customer as first seen on an order */
export interface NewCustomer {
    customerName: string;
    shop: string | null;
    handler: string | null;
}

/** Metadata a later sighting may fill in; only previously-null fields */
export type CustomerMetadataPatch = Partial<Pick<CustomerRecord, 'shop' | 'handler'>>;

/** Fields an operator may edit by hand; wechat exists on sample customers only */
export type CustomerProfilePatch = Partial<
    Pick<CustomerRecord, 'customerName' | 'shop' | 'handler' | 'region' | 'notes' | 'tags' | 'wechat'>
>;

/** Row of `sample_order_customers` / `bulk_order_customers` */
export interface OrderCustomerAssociation {
    customerId: number;
    orderId: string;
    /** Snapshot taken when the link was created; never refreshed */
    orderDate: Date | null;
    amount: number | null;
}

/** Row of `customer_conversions` */
export interface ConversionRecord {
    id: number;
    sampleCustomerId: number;
    bulkCustomerId: number;
    conversionDate: Date;
    sampleOrderId: string | null;
    bulkOrderId: string | null;
    conversionDays: number | null;
}

export type NewConversion = Omit<ConversionRecord, 'id'>;

/**
 * Key for a (customer, order) link.
 */
export function associationKey(customerId: number, orderId: string): string {
    return `${customerId}:${orderId}`;
}

/**
 * Key for a (sample customer, bulk customer) pair.
 */
export function conversionKey(sampleCustomerId: number, bulkCustomerId: number): string {
    return `${sampleCustomerId}:${bulkCustomerId}`;
}
