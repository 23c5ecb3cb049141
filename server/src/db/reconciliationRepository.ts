/**
 * Kysely Reconciliation Repository
 *
 * PostgreSQL implementation of ReconciliationRepository.
 *
 * - One Kysely transaction per stage; `isolate()` wraps a row in a SAVEPOINT
 * - Unique collisions are `ON CONFLICT DO NOTHING` and reported as `false`
 * - sample_* and bulk_* typed-order and association tables share a row type
 *   and are addressed through a common alias
 */

import { sql, type Selectable, type Transaction, type Updateable } from 'kysely';
import {
    pickOrderFields,
    type CanonicalOrder,
    type ConversionRecord,
    type CustomerMetadataPatch,
    type CustomerProfilePatch,
    type CustomerRecord,
    type CustomerStats,
    type NewConversion,
    type NewCustomer,
    type OrderCustomerAssociation,
    type OrderFields,
    type OrderKind,
    type TypedOrder,
    type TypedOrderStamp,
} from '@orderhub/shared';
import { isConnectivityError } from '../utils/errors.js';
import type {
    ReconciliationRepository,
    ReconciliationTx,
    TransactionOptions,
} from '../services/reconciliation/types.js';
import type { KyselyDB } from './kysely.js';
import type { BulkCustomersTable, CustomerColumns, DB, SampleCustomersTable } from './types.js';

// ============================================
// TABLES
// ============================================

const ORDER_TABLES = {
    sample: 'sampleOrders',
    bulk: 'bulkOrders',
} as const satisfies Record<OrderKind, keyof DB>;

const ORDER_TABLE_ALIASES = {
    sample: 'sampleOrders as t',
    bulk: 'bulkOrders as t',
} as const;

const ASSOCIATION_TABLES = {
    sample: 'sampleOrderCustomers',
    bulk: 'bulkOrderCustomers',
} as const satisfies Record<OrderKind, keyof DB>;

const ASSOCIATION_TABLE_ALIASES = {
    sample: 'sampleOrderCustomers as a',
    bulk: 'bulkOrderCustomers as a',
} as const;

const CUSTOMER_COLUMNS = [
    'id',
    'customerName',
    'shop',
    'handler',
    'region',
    'notes',
    'tags',
    'ordersCount',
    'totalAmount',
    'firstOrderDate',
    'lastOrderDate',
] as const;

const SAMPLE_CUSTOMER_COLUMNS = [
    ...CUSTOMER_COLUMNS,
    'wechat',
    'convertedToBulk',
    'bulkCustomerId',
    'conversionDate',
] as const;

const BULK_CUSTOMER_COLUMNS = [...CUSTOMER_COLUMNS, 'convertedFromSample', 'sampleCustomerId'] as const;

type CustomerUpdate = Updateable<CustomerColumns>;

type CustomerRow = Pick<Selectable<CustomerColumns>, (typeof CUSTOMER_COLUMNS)[number]>;
type SampleCustomerRow = CustomerRow &
    Pick<Selectable<SampleCustomersTable>, 'wechat' | 'convertedToBulk' | 'bulkCustomerId' | 'conversionDate'>;
type BulkCustomerRow = CustomerRow & Pick<Selectable<BulkCustomersTable>, 'convertedFromSample' | 'sampleCustomerId'>;

function toSampleCustomer({ tags, convertedToBulk, bulkCustomerId, ...row }: SampleCustomerRow): CustomerRecord {
    return {
        ...row,
        kind: 'sample',
        tags: tags ?? [],
        converted: convertedToBulk,
        counterpartCustomerId: bulkCustomerId,
    };
}

function toBulkCustomer({ tags, convertedFromSample, sampleCustomerId, ...row }: BulkCustomerRow): CustomerRecord {
    return {
        ...row,
        kind: 'bulk',
        tags: tags ?? [],
        wechat: null,
        converted: convertedFromSample,
        counterpartCustomerId: sampleCustomerId,
        conversionDate: null,
    };
}

// ============================================
// TRANSACTION
// ============================================

class KyselyReconciliationTx implements ReconciliationTx {
    private savepointSeq = 0;

    constructor(private readonly trx: Transaction<DB>) {}

    async isolate<T>(fn: () => Promise<T>): Promise<T> {
        const savepoint = sql.raw(`sp_${++this.savepointSeq}`);
        await sql`SAVEPOINT ${savepoint}`.execute(this.trx);

        try {
            const result = await fn();
            await sql`RELEASE SAVEPOINT ${savepoint}`.execute(this.trx);
            return result;
        } catch (error) {
            // A dead connection cannot roll back; the transaction is lost anyway
            if (!isConnectivityError(error)) {
                await sql`ROLLBACK TO SAVEPOINT ${savepoint}`.execute(this.trx);
            }
            throw error;
        }
    }

    // ---------- orders ----------

    async listCanonicalOrders(): Promise<CanonicalOrder[]> {
        const rows = await this.trx.selectFrom('originalOrders').selectAll().orderBy('id').execute();
        return rows.map((row) => ({
            ...pickOrderFields(row),
            orderId: row.orderId,
            createdAt: row.createdAt,
            updatedAt: row.updatedAt,
        }));
    }

    async listTypedOrderStamps(kind: OrderKind): Promise<TypedOrderStamp[]> {
        return this.trx
            .selectFrom(ORDER_TABLE_ALIASES[kind])
            .select(['t.orderId', 't.updatedAt'])
            .execute();
    }

    async listTypedOrders(kind: OrderKind): Promise<TypedOrder[]> {
        const rows = await this.trx
            .selectFrom(ORDER_TABLE_ALIASES[kind])
            .selectAll('t')
            .orderBy('t.id')
            .execute();
        return rows.map((row) => ({
            ...pickOrderFields(row),
            orderId: row.orderId,
            createdAt: row.createdAt,
            updatedAt: row.updatedAt,
        }));
    }

    async insertTypedOrder(kind: OrderKind, order: TypedOrder): Promise<boolean> {
        const result = await this.trx
            .insertInto(ORDER_TABLES[kind])
            .values({
                ...pickOrderFields(order),
                orderId: order.orderId,
                createdAt: order.createdAt,
                updatedAt: order.updatedAt,
            })
            .onConflict((oc) => oc.column('orderId').doNothing())
            .executeTakeFirst();
        return (result.numInsertedOrUpdatedRows ?? 0n) > 0n;
    }

    async updateTypedOrder(kind: OrderKind, orderId: string, fields: OrderFields, updatedAt: Date): Promise<void> {
        await this.trx
            .updateTable(ORDER_TABLE_ALIASES[kind])
            .set({ ...pickOrderFields(fields), updatedAt })
            .where('t.orderId', '=', orderId)
            .execute();
    }

    // ---------- customers ----------

    async listCustomers(kind: OrderKind): Promise<CustomerRecord[]> {
        if (kind === 'sample') {
            const rows = await this.trx
                .selectFrom('sampleCustomers')
                .select([...SAMPLE_CUSTOMER_COLUMNS])
                .orderBy('id')
                .execute();
            return rows.map(toSampleCustomer);
        }

        const rows = await this.trx
            .selectFrom('bulkCustomers')
            .select([...BULK_CUSTOMER_COLUMNS])
            .orderBy('id')
            .execute();
        return rows.map(toBulkCustomer);
    }

    async insertCustomer(kind: OrderKind, customer: NewCustomer): Promise<CustomerRecord> {
        const values = {
            customerName: customer.customerName,
            shop: customer.shop,
            handler: customer.handler,
        };

        if (kind === 'sample') {
            const row = await this.trx
                .insertInto('sampleCustomers')
                .values(values)
                .returning([...SAMPLE_CUSTOMER_COLUMNS])
                .executeTakeFirstOrThrow();
            return toSampleCustomer(row);
        }

        const row = await this.trx
            .insertInto('bulkCustomers')
            .values(values)
            .returning([...BULK_CUSTOMER_COLUMNS])
            .executeTakeFirstOrThrow();
        return toBulkCustomer(row);
    }

    async updateCustomerMetadata(kind: OrderKind, customerId: number, patch: CustomerMetadataPatch): Promise<void> {
        await this.updateCustomer(kind, customerId, patch);
    }

    async updateCustomerStats(kind: OrderKind, customerId: number, stats: CustomerStats): Promise<void> {
        await this.updateCustomer(kind, customerId, {
            ordersCount: stats.ordersCount,
            totalAmount: stats.totalAmount,
            firstOrderDate: stats.firstOrderDate,
            lastOrderDate: stats.lastOrderDate,
        });
    }

    /** wechat is only stored for sample customers */
    async updateCustomerProfile(
        kind: OrderKind,
        customerId: number,
        patch: CustomerProfilePatch
    ): Promise<CustomerRecord | null> {
        const { tags, wechat, ...columns } = patch;
        const values: CustomerUpdate = { ...columns, updatedAt: new Date() };
        if (tags !== undefined) values.tags = JSON.stringify(tags);

        if (kind === 'sample') {
            const row = await this.trx
                .updateTable('sampleCustomers')
                .set(wechat === undefined ? values : { ...values, wechat })
                .where('id', '=', customerId)
                .returning([...SAMPLE_CUSTOMER_COLUMNS])
                .executeTakeFirst();
            return row ? toSampleCustomer(row) : null;
        }

        const row = await this.trx
            .updateTable('bulkCustomers')
            .set(values)
            .where('id', '=', customerId)
            .returning([...BULK_CUSTOMER_COLUMNS])
            .executeTakeFirst();
        return row ? toBulkCustomer(row) : null;
    }

    async markSampleConverted(sampleCustomerId: number, bulkCustomerId: number, conversionDate: Date): Promise<void> {
        await this.trx
            .updateTable('sampleCustomers')
            .set({ convertedToBulk: true, conversionDate, bulkCustomerId, updatedAt: new Date() })
            .where('id', '=', sampleCustomerId)
            .execute();
    }

    async markBulkConverted(bulkCustomerId: number, sampleCustomerId: number): Promise<void> {
        await this.trx
            .updateTable('bulkCustomers')
            .set({ convertedFromSample: true, sampleCustomerId, updatedAt: new Date() })
            .where('id', '=', bulkCustomerId)
            .execute();
    }

    private async updateCustomer(kind: OrderKind, customerId: number, values: CustomerUpdate): Promise<void> {
        const set = { ...values, updatedAt: new Date() };
        if (kind === 'sample') {
            await this.trx.updateTable('sampleCustomers').set(set).where('id', '=', customerId).execute();
        } else {
            await this.trx.updateTable('bulkCustomers').set(set).where('id', '=', customerId).execute();
        }
    }

    // ---------- associations ----------

    async listAssociations(kind: OrderKind): Promise<OrderCustomerAssociation[]> {
        return this.trx
            .selectFrom(ASSOCIATION_TABLE_ALIASES[kind])
            .select(['a.customerId', 'a.orderId', 'a.orderDate', 'a.amount'])
            .orderBy('a.id')
            .execute();
    }

    async insertAssociation(kind: OrderKind, association: OrderCustomerAssociation): Promise<boolean> {
        const result = await this.trx
            .insertInto(ASSOCIATION_TABLES[kind])
            .values({
                customerId: association.customerId,
                orderId: association.orderId,
                orderDate: association.orderDate,
                amount: association.amount,
            })
            .onConflict((oc) => oc.columns(['customerId', 'orderId']).doNothing())
            .executeTakeFirst();
        return (result.numInsertedOrUpdatedRows ?? 0n) > 0n;
    }

    // ---------- conversions ----------

    async listConversions(): Promise<ConversionRecord[]> {
        return this.trx
            .selectFrom('customerConversions')
            .select([
                'id',
                'sampleCustomerId',
                'bulkCustomerId',
                'conversionDate',
                'sampleOrderId',
                'bulkOrderId',
                'conversionDays',
            ])
            .orderBy('id')
            .execute();
    }

    async insertConversion(conversion: NewConversion): Promise<boolean> {
        const result = await this.trx
            .insertInto('customerConversions')
            .values(conversion)
            .onConflict((oc) => oc.columns(['sampleCustomerId', 'bulkCustomerId']).doNothing())
            .executeTakeFirst();
        return (result.numInsertedOrUpdatedRows ?? 0n) > 0n;
    }
}

// ============================================
// REPOSITORY
// ============================================

export class KyselyReconciliationRepository implements ReconciliationRepository {
    constructor(private readonly db: KyselyDB) {}

    async transaction<T>(fn: (tx: ReconciliationTx) => Promise<T>, options: TransactionOptions = {}): Promise<T> {
        let builder = this.db.transaction();
        if (options.isolation) {
            builder = builder.setIsolationLevel(options.isolation);
        }
        return builder.execute((trx) => fn(new KyselyReconciliationTx(trx)));
    }
}
