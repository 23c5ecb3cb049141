/**
 * Unit tests for order sync planning (shared domain)
 */

import { hasOrderId, isStale, planOrderSync, syncStamp } from '../syncPlan.js';
import { canonicalOrder } from '../../__tests__/fixtures.js';

const JAN_1 = new Date('2024-01-01T00:00:00Z');
const JAN_2 = new Date('2024-01-02T00:00:00Z');

describe('isStale', () => {
    it('treats a typed row without a stamp as stale', () => {
        expect(isStale(JAN_1, null)).toBe(true);
        expect(isStale(null, null)).toBe(true);
    });

    it('is stale only when the canonical stamp is strictly newer', () => {
        expect(isStale(JAN_2, JAN_1)).toBe(true);
        expect(isStale(JAN_1, JAN_1)).toBe(false);
        expect(isStale(JAN_1, JAN_2)).toBe(false);
    });

    it('is never stale when the canonical row has no stamp', () => {
        expect(isStale(null, JAN_1)).toBe(false);
    });
});

describe('syncStamp', () => {
    it('uses now when now is later', () => {
        expect(syncStamp(JAN_2, JAN_1)).toBe(JAN_2);
    });

    it('never goes below the canonical stamp', () => {
        expect(syncStamp(JAN_1, JAN_2)).toBe(JAN_2);
        expect(syncStamp(JAN_1, null)).toBe(JAN_1);
    });
});

describe('hasOrderId', () => {
    it('rejects null and empty ids', () => {
        expect(hasOrderId(canonicalOrder({ orderId: null }))).toBe(false);
        expect(hasOrderId(canonicalOrder({ orderId: '' }))).toBe(false);
        expect(hasOrderId(canonicalOrder({ orderId: 'S001' }))).toBe(true);
    });
});

describe('planOrderSync', () => {
    const sample = canonicalOrder({ orderId: 'S001', orderType: '打样单', updatedAt: JAN_2 });
    const bulk = canonicalOrder({ orderId: 'B001', orderType: '新订单', updatedAt: JAN_2 });
    const unknown = canonicalOrder({ orderId: 'U001', orderType: '未知类型' });

    it('inserts orders of the target kind that have no typed row', () => {
        const plan = planOrderSync([sample, bulk, unknown], [], 'sample');
        expect(plan.inserts.map((o) => o.orderId)).toEqual(['S001']);
        expect(plan.updates).toEqual([]);
        expect(plan.unchanged).toBe(0);
    });

    it('routes bulk labels into the bulk plan only', () => {
        const plan = planOrderSync([sample, bulk, unknown], [], 'bulk');
        expect(plan.inserts.map((o) => o.orderId)).toEqual(['B001']);
    });

    it('never plans unclassified orders', () => {
        const samplePlan = planOrderSync([unknown], [], 'sample');
        const bulkPlan = planOrderSync([unknown], [], 'bulk');
        expect(samplePlan.inserts).toEqual([]);
        expect(bulkPlan.inserts).toEqual([]);
        expect(samplePlan.invalid).toEqual([]);
    });

    it('updates stale typed rows', () => {
        const plan = planOrderSync([sample], [{ orderId: 'S001', updatedAt: JAN_1 }], 'sample');
        expect(plan.inserts).toEqual([]);
        expect(plan.updates.map((o) => o.orderId)).toEqual(['S001']);
    });

    it('updates typed rows with a null stamp', () => {
        const plan = planOrderSync([sample], [{ orderId: 'S001', updatedAt: null }], 'sample');
        expect(plan.updates).toHaveLength(1);
    });

    it('leaves up-to-date rows alone', () => {
        const plan = planOrderSync([sample], [{ orderId: 'S001', updatedAt: JAN_2 }], 'sample');
        expect(plan.inserts).toEqual([]);
        expect(plan.updates).toEqual([]);
        expect(plan.unchanged).toBe(1);
    });

    it('collects orders without an id as invalid', () => {
        const missing = canonicalOrder({ orderId: null, orderType: '打样单' });
        const plan = planOrderSync([missing, sample], [], 'sample');
        expect(plan.invalid).toEqual([missing]);
        expect(plan.inserts.map((o) => o.orderId)).toEqual(['S001']);
    });

    it('ignores invalid rows of the other kind', () => {
        const missing = canonicalOrder({ orderId: null, orderType: '新订单' });
        expect(planOrderSync([missing], [], 'sample').invalid).toEqual([]);
    });

    it('plans a duplicated order id once', () => {
        const copy = canonicalOrder({ orderId: 'S001', orderType: '打样单', amount: 5 });
        const plan = planOrderSync([sample, copy], [], 'sample');
        expect(plan.inserts).toEqual([sample]);
    });

    it('picks up a reclassified order as an insert into its new kind', () => {
        const moved = canonicalOrder({ orderId: 'S001', orderType: '新订单', updatedAt: JAN_2 });
        const typedSample = [{ orderId: 'S001', updatedAt: JAN_1 }];

        expect(planOrderSync([moved], [], 'bulk').inserts.map((o) => o.orderId)).toEqual(['S001']);
        expect(planOrderSync([moved], typedSample, 'sample').updates).toEqual([]);
    });
});
