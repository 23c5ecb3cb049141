/**
 * Tests for the read-only customer queries
 */

import {
    findOrphanedTypedOrders,
    findUnconvertedCustomers,
    getCustomerSummary,
    listCustomersByHandler,
} from '../customerInsights.js';
import { syncAllOrders } from '../orderSync.js';
import { MemoryReconciliationRepository } from './helpers/memoryRepository.js';
import { bulkOrder, clock, day, importedOrder, sampleOrder } from './helpers/builders.js';

describe('customer insights', () => {
    let repo: MemoryReconciliationRepository;

    beforeEach(() => {
        repo = new MemoryReconciliationRepository();
    });

    function convert(sampleCustomerId: number, bulkCustomerId: number): void {
        repo.state.conversions.push({
            id: repo.state.nextConversionId++,
            sampleCustomerId,
            bulkCustomerId,
            conversionDate: day('2024-02-01'),
            sampleOrderId: null,
            bulkOrderId: null,
            conversionDays: null,
        });
    }

    describe('getCustomerSummary', () => {
        it('reports zeros on empty registries', async () => {
            expect(await getCustomerSummary(repo)).toEqual({
                sampleCustomers: 0,
                bulkCustomers: 0,
                totalCustomers: 0,
                convertedCustomers: 0,
                conversionRate: 0,
            });
        });

        it('counts each converted sample customer once', async () => {
            repo.addCustomer('sample', { customerName: '张三' }); // id 1
            repo.addCustomer('sample', { customerName: '李四' }); // id 2
            repo.addCustomer('sample', { customerName: '王五' }); // id 3
            repo.addCustomer('bulk', { customerName: '张三', shop: '淘宝' }); // id 4
            repo.addCustomer('bulk', { customerName: '张三', shop: '京东' }); // id 5
            convert(1, 4);
            convert(1, 5);

            expect(await getCustomerSummary(repo)).toEqual({
                sampleCustomers: 3,
                bulkCustomers: 2,
                totalCustomers: 5,
                convertedCustomers: 1,
                conversionRate: 33.33,
            });
        });
    });

    describe('findUnconvertedCustomers', () => {
        beforeEach(() => {
            repo.addCustomer('sample', { customerName: '张三', lastOrderDate: day('2024-05-01') }); // id 1
            repo.addCustomer('sample', {
                customerName: '李四',
                firstOrderDate: day('2024-01-05'),
                lastOrderDate: day('2024-03-01'),
            }); // id 2
            repo.addCustomer('sample', { customerName: '王五', lastOrderDate: null }); // id 3
            repo.addCustomer('sample', { customerName: '赵六', lastOrderDate: day('2024-04-01') }); // id 4
            repo.addCustomer('bulk', { customerName: '张三' }); // id 5
            convert(1, 5);
            repo.state.associations.sample.push(
                { customerId: 2, orderId: 'S001', orderDate: day('2024-01-05'), amount: 20 },
                { customerId: 2, orderId: 'S002', orderDate: day('2024-03-01'), amount: 30 }
            );
        });

        it('lists customers without a conversion, most recently active first', async () => {
            const customers = await findUnconvertedCustomers(repo);
            expect(customers.map((c) => c.id)).toEqual([4, 2, 3]);
        });

        it('includes the linked orders newest first', async () => {
            const customers = await findUnconvertedCustomers(repo);

            expect(customers[1].orders).toEqual([
                { orderId: 'S002', orderDate: day('2024-03-01'), amount: 30 },
                { orderId: 'S001', orderDate: day('2024-01-05'), amount: 20 },
            ]);
            expect(customers[0].orders).toEqual([]);
        });

        it('carries the first and last order dates', async () => {
            const customers = await findUnconvertedCustomers(repo);

            expect(customers[1]).toMatchObject({
                id: 2,
                firstOrderDate: day('2024-01-05'),
                lastOrderDate: day('2024-03-01'),
            });
            expect(customers[2].firstOrderDate).toBeNull();
        });

        it('applies the limit', async () => {
            const customers = await findUnconvertedCustomers(repo, { limit: 1 });
            expect(customers.map((c) => c.customerName)).toEqual(['赵六']);
        });
    });

    describe('listCustomersByHandler', () => {
        beforeEach(() => {
            repo.addCustomer('bulk', { customerName: '张三', handler: '王五' });
            repo.addCustomer('bulk', { customerName: '李四', handler: '赵六' });
            repo.addCustomer('bulk', { customerName: '孙七', handler: '王五' });
        });

        it('filters by handler', async () => {
            const customers = await listCustomersByHandler(repo, 'bulk', '王五');
            expect(customers.map((c) => c.customerName)).toEqual(['张三', '孙七']);
        });

        it('returns the whole registry without a handler', async () => {
            const customers = await listCustomersByHandler(repo, 'bulk');
            expect(customers).toHaveLength(3);
        });
    });

    describe('findOrphanedTypedOrders', () => {
        it('reports typed rows that were removed or reclassified', async () => {
            repo.importOrders(sampleOrder('S001'), sampleOrder('S002'), sampleOrder('S003'));
            await syncAllOrders(repo, { now: clock });

            repo.importOrders(bulkOrder('S001', { updatedAt: day('2024-02-01') }));
            repo.state.canonical = repo.state.canonical.filter((o) => o.orderId !== 'S002');

            const orphans = await findOrphanedTypedOrders(repo, 'sample');

            expect(orphans).toEqual([
                { kind: 'sample', orderId: 'S001', canonicalOrderType: '新订单', reason: 'reclassified' },
                { kind: 'sample', orderId: 'S002', canonicalOrderType: null, reason: 'missing' },
            ]);
        });

        it('treats an unclassified canonical label as reclassified', async () => {
            repo.importOrders(sampleOrder('S001'));
            await syncAllOrders(repo, { now: clock });
            repo.importOrders(importedOrder({ orderId: 'S001', orderType: '退货单' }));

            const orphans = await findOrphanedTypedOrders(repo, 'sample');

            expect(orphans).toEqual([
                { kind: 'sample', orderId: 'S001', canonicalOrderType: '退货单', reason: 'reclassified' },
            ]);
        });
    });
});
