/**
 * Tests for the statistics aggregator against the in-memory repository
 */

import { recomputeCustomerStats } from '../customerStats.js';
import { MemoryReconciliationRepository } from './helpers/memoryRepository.js';
import { day } from './helpers/builders.js';

describe('recomputeCustomerStats', () => {
    let repo: MemoryReconciliationRepository;

    beforeEach(() => {
        repo = new MemoryReconciliationRepository();
        repo.addCustomer('sample', { customerName: '张三' }); // id 1
        repo.addCustomer('sample', { customerName: '李四', ordersCount: 5, totalAmount: 80, lastOrderDate: day('2023-12-01') }); // id 2
        repo.state.associations.sample.push(
            { customerId: 1, orderId: 'S001', orderDate: day('2024-02-01'), amount: 100 },
            { customerId: 1, orderId: 'S002', orderDate: day('2024-01-10'), amount: 50.25 },
            { customerId: 1, orderId: 'S003', orderDate: null, amount: null }
        );
    });

    it('aggregates the associations of each customer', async () => {
        const result = await recomputeCustomerStats(repo, 'sample');

        expect(result).toEqual({ customersUpdated: 2, errors: 0 });
        expect(repo.state.customers.sample[0]).toMatchObject({
            ordersCount: 3,
            totalAmount: 150.25,
            firstOrderDate: day('2024-01-10'),
            lastOrderDate: day('2024-02-01'),
        });
    });

    it('zeroes customers that lost all their associations', async () => {
        await recomputeCustomerStats(repo, 'sample');

        expect(repo.state.customers.sample[1]).toMatchObject({
            ordersCount: 0,
            totalAmount: 0,
            firstOrderDate: null,
            lastOrderDate: null,
        });
    });

    it('skips customers whose stored stats are current', async () => {
        await recomputeCustomerStats(repo, 'sample');
        repo.resetWrites();

        const second = await recomputeCustomerStats(repo, 'sample');

        expect(second).toEqual({ customersUpdated: 0, errors: 0 });
        expect(repo.writes).toEqual([]);
    });

    it('leaves the other registry alone', async () => {
        repo.addCustomer('bulk', { customerName: '张三', ordersCount: 2 });

        await recomputeCustomerStats(repo, 'sample');

        expect(repo.state.customers.bulk[0].ordersCount).toBe(2);
    });

    it('counts a failing customer and updates the rest', async () => {
        repo.failOn('updateCustomerStats', new Error('numeric field overflow'), { key: '1' });

        const result = await recomputeCustomerStats(repo, 'sample');

        expect(result).toEqual({ customersUpdated: 1, errors: 1 });
        expect(repo.state.customers.sample.map((c) => c.ordersCount)).toEqual([0, 0]);
    });
});
