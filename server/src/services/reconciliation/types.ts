/**
 * Reconciliation persistence contract
 *
 * Every stage runs inside one `transaction()` and touches the database only
 * through the ReconciliationTx it is handed. Production wires the Kysely
 * implementation (db/reconciliationRepository.ts); tests use an in-memory one.
 */

import type {
    CanonicalOrder,
    ConversionRecord,
    CustomerMatchPolicy,
    CustomerMetadataPatch,
    CustomerProfilePatch,
    CustomerRecord,
    CustomerStats,
    NewConversion,
    NewCustomer,
    OrderCustomerAssociation,
    OrderFields,
    OrderKind,
    OrderTypeRules,
    TypedOrder,
    TypedOrderStamp,
} from '@orderhub/shared';

// ============================================
// REPOSITORY
// ============================================

export type IsolationLevel = 'read committed' | 'repeatable read' | 'serializable';

export interface TransactionOptions {
    isolation?: IsolationLevel;
}

export interface ReconciliationRepository {
    /**
     * Run `fn` in a transaction: committed when it resolves, rolled back
     * when it rejects (the rejection is rethrown).
     */
    transaction<T>(fn: (tx: ReconciliationTx) => Promise<T>, options?: TransactionOptions): Promise<T>;
}

export interface ReconciliationTx {
    /**
     * Run `fn` inside a savepoint. On rejection the transaction is rolled back
     * to the savepoint and the error rethrown; earlier work survives.
     */
    isolate<T>(fn: () => Promise<T>): Promise<T>;

    // ---------- orders ----------
    listCanonicalOrders(): Promise<CanonicalOrder[]>;
    listTypedOrderStamps(kind: OrderKind): Promise<TypedOrderStamp[]>;
    listTypedOrders(kind: OrderKind): Promise<TypedOrder[]>;
    /** false when a row with this order id already exists */
    insertTypedOrder(kind: OrderKind, order: TypedOrder): Promise<boolean>;
    updateTypedOrder(kind: OrderKind, orderId: string, fields: OrderFields, updatedAt: Date): Promise<void>;

    // ---------- customers ----------
    listCustomers(kind: OrderKind): Promise<CustomerRecord[]>;
    insertCustomer(kind: OrderKind, customer: NewCustomer): Promise<CustomerRecord>;
    updateCustomerMetadata(kind: OrderKind, customerId: number, patch: CustomerMetadataPatch): Promise<void>;
    updateCustomerStats(kind: OrderKind, customerId: number, stats: CustomerStats): Promise<void>;
    /** The updated customer, or null when no customer has this id */
    updateCustomerProfile(
        kind: OrderKind,
        customerId: number,
        patch: CustomerProfilePatch
    ): Promise<CustomerRecord | null>;
    markSampleConverted(sampleCustomerId: number, bulkCustomerId: number, conversionDate: Date): Promise<void>;
    markBulkConverted(bulkCustomerId: number, sampleCustomerId: number): Promise<void>;

    // ---------- associations ----------
    listAssociations(kind: OrderKind): Promise<OrderCustomerAssociation[]>;
    /** false when the (customer, order) link already exists */
    insertAssociation(kind: OrderKind, association: OrderCustomerAssociation): Promise<boolean>;

    // ---------- conversions ----------
    listConversions(): Promise<ConversionRecord[]>;
    /** false when the (sample, bulk) pair already has a record */
    insertConversion(conversion: NewConversion): Promise<boolean>;
}

// ============================================
// STAGE OPTIONS
// ============================================

export interface StageOptions {
    /** Clock for stamps and conversion dates */
    now?: () => Date;
}

export interface SyncOptions extends StageOptions {
    rules?: OrderTypeRules;
}

export interface CustomerStageOptions extends StageOptions {
    policy?: CustomerMatchPolicy;
}

export type ReconciliationOptions = SyncOptions & CustomerStageOptions;
