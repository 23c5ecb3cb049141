/**
 * Unit tests for customer rolling statistics (shared domain)
 */

import {
    aggregateCustomerStats,
    customerStatsEqual,
    EMPTY_CUSTOMER_STATS,
} from '../stats.js';

const d = (iso: string) => new Date(`${iso}T00:00:00Z`);

describe('aggregateCustomerStats', () => {
    it('counts, sums and brackets dates per customer', () => {
        const stats = aggregateCustomerStats([
            { customerId: 1, orderDate: d('2024-03-01'), amount: 100 },
            { customerId: 1, orderDate: d('2024-01-15'), amount: 50.5 },
            { customerId: 2, orderDate: d('2024-02-01'), amount: 10 },
            { customerId: 1, orderDate: d('2024-02-10'), amount: 0.25 },
        ]);

        expect(stats.get(1)).toEqual({
            ordersCount: 3,
            totalAmount: 150.75,
            firstOrderDate: d('2024-01-15'),
            lastOrderDate: d('2024-03-01'),
        });
        expect(stats.get(2)).toEqual({
            ordersCount: 1,
            totalAmount: 10,
            firstOrderDate: d('2024-02-01'),
            lastOrderDate: d('2024-02-01'),
        });
    });

    it('excludes null amounts from the sum but still counts the order', () => {
        const stats = aggregateCustomerStats([
            { customerId: 1, orderDate: null, amount: null },
            { customerId: 1, orderDate: null, amount: 40 },
        ]);
        expect(stats.get(1)).toEqual({
            ordersCount: 2,
            totalAmount: 40,
            firstOrderDate: null,
            lastOrderDate: null,
        });
    });

    it('sums to zero when every amount is null', () => {
        const stats = aggregateCustomerStats([{ customerId: 7, orderDate: d('2024-01-01'), amount: null }]);
        expect(stats.get(7)?.totalAmount).toBe(0);
        expect(stats.get(7)?.ordersCount).toBe(1);
    });

    it('sums amounts as stored', () => {
        const stats = aggregateCustomerStats([
            { customerId: 1, orderDate: null, amount: 0.1 },
            { customerId: 1, orderDate: null, amount: 0.2 },
        ]);
        expect(stats.get(1)?.totalAmount).toBeCloseTo(0.3, 10);
    });

    it('keeps sub-cent amounts instead of rounding each one', () => {
        const stats = aggregateCustomerStats([
            { customerId: 1, orderDate: null, amount: 0.004 },
            { customerId: 1, orderDate: null, amount: 0.004 },
            { customerId: 1, orderDate: null, amount: 0.004 },
            { customerId: 2, orderDate: null, amount: 0.005 },
            { customerId: 2, orderDate: null, amount: 0.005 },
        ]);
        expect(stats.get(1)?.totalAmount).toBeCloseTo(0.012, 10);
        expect(stats.get(2)?.totalAmount).toBeCloseTo(0.01, 10);
    });

    it('skips non-finite amounts', () => {
        const stats = aggregateCustomerStats([
            { customerId: 1, orderDate: null, amount: Number.NaN },
            { customerId: 1, orderDate: null, amount: 12.5 },
        ]);
        expect(stats.get(1)?.ordersCount).toBe(2);
        expect(stats.get(1)?.totalAmount).toBe(12.5);
    });

    it('returns no entry for customers without associations', () => {
        expect(aggregateCustomerStats([]).size).toBe(0);
    });
});

describe('customerStatsEqual', () => {
    const computed = {
        ordersCount: 1,
        totalAmount: 100,
        firstOrderDate: d('2024-01-01'),
        lastOrderDate: d('2024-01-01'),
    };

    it('compares dates by value', () => {
        expect(customerStatsEqual({ ...computed, firstOrderDate: d('2024-01-01') }, computed)).toBe(true);
    });

    it('detects any changed field', () => {
        expect(customerStatsEqual({ ...computed, ordersCount: 2 }, computed)).toBe(false);
        expect(customerStatsEqual({ ...computed, totalAmount: 150 }, computed)).toBe(false);
        expect(customerStatsEqual({ ...computed, lastOrderDate: null }, computed)).toBe(false);
    });

    it('treats float noise in totals as equal but a sub-cent change as different', () => {
        const summed = { ...computed, totalAmount: 0.1 + 0.2 };
        expect(customerStatsEqual({ ...computed, totalAmount: 0.3 }, summed)).toBe(true);
        expect(customerStatsEqual({ ...computed, totalAmount: 0.012 }, { ...computed, totalAmount: 0.01 })).toBe(false);
    });

    it('detects stale aggregates that must be zeroed', () => {
        expect(customerStatsEqual(computed, EMPTY_CUSTOMER_STATS)).toBe(false);
        expect(customerStatsEqual(EMPTY_CUSTOMER_STATS, EMPTY_CUSTOMER_STATS)).toBe(true);
    });
});
