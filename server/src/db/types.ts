/**
 * Database table shapes for Kysely
 *
 * Keys are camelCase; CamelCasePlugin maps them onto the snake_case
 * columns declared in schema.sql.
 */

import type { ColumnType, Generated } from 'kysely';
import type { OrderFields } from '@orderhub/shared';

/** jsonb: parsed on read, written as a JSON string */
type Json<T> = ColumnType<T | null, string | null, string | null>;

// ============================================
// ORDERS
// ============================================

export interface OriginalOrdersTable extends OrderFields {
    id: Generated<number>;
    orderId: string | null;
    createdAt: Date | null;
    updatedAt: Date | null;
}

/** sample_orders and bulk_orders share one shape */
export interface TypedOrdersTable extends OrderFields {
    id: Generated<number>;
    orderId: string;
    createdAt: Date | null;
    updatedAt: Date | null;
}

// ============================================
// CUSTOMERS
// ============================================

export interface CustomerColumns {
    id: Generated<number>;
    customerName: string;
    shop: string | null;
    handler: string | null;
    region: string | null;
    notes: string | null;
    tags: Json<string[]>;
    ordersCount: Generated<number>;
    totalAmount: Generated<number>;
    firstOrderDate: Date | null;
    lastOrderDate: Date | null;
    createdAt: Generated<Date>;
    updatedAt: Generated<Date>;
}

export interface SampleCustomersTable extends CustomerColumns {
    wechat: string | null;
    convertedToBulk: Generated<boolean>;
    conversionDate: Date | null;
    bulkCustomerId: number | null;
}

export interface BulkCustomersTable extends CustomerColumns {
    convertedFromSample: Generated<boolean>;
    sampleCustomerId: number | null;
}

/** sample_order_customers and bulk_order_customers share one shape */
export interface OrderCustomersTable {
    id: Generated<number>;
    customerId: number;
    orderId: string;
    orderDate: Date | null;
    amount: number | null;
    createdAt: Generated<Date>;
}

export interface CustomerConversionsTable {
    id: Generated<number>;
    sampleCustomerId: number;
    bulkCustomerId: number;
    conversionDate: Date;
    sampleOrderId: string | null;
    bulkOrderId: string | null;
    conversionDays: number | null;
    createdAt: Generated<Date>;
}

// ============================================
// RUN HISTORY
// ============================================

export interface ReconciliationRunsTable {
    id: Generated<number>;
    triggeredBy: string;
    status: Generated<string>;
    startedAt: Date;
    completedAt: Date | null;
    durationMs: number | null;
    result: Json<unknown>;
    error: string | null;
}

export interface DB {
    originalOrders: OriginalOrdersTable;
    sampleOrders: TypedOrdersTable;
    bulkOrders: TypedOrdersTable;
    sampleCustomers: SampleCustomersTable;
    bulkCustomers: BulkCustomersTable;
    sampleOrderCustomers: OrderCustomersTable;
    bulkOrderCustomers: OrderCustomersTable;
    customerConversions: CustomerConversionsTable;
    reconciliationRuns: ReconciliationRunsTable;
}
