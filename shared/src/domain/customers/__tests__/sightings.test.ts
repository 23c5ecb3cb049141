/**
 * Unit tests for customer sightings and identity resolution (shared domain)
 */

import { collectCustomerSightings, findMatchingCustomer, planMetadataFill } from '../sightings.js';
import { exactMatchPolicy, normalizedMatchPolicy } from '../matching.js';
import { customer, typedOrder } from '../../__tests__/fixtures.js';

describe('collectCustomerSightings', () => {
    it('groups orders by (name, shop) in order of first appearance', () => {
        const orders = [
            typedOrder({ orderId: 'S1', customerName: '张三', shop: '淘宝' }),
            typedOrder({ orderId: 'S2', customerName: '李四', shop: '淘宝' }),
            typedOrder({ orderId: 'S3', customerName: '张三', shop: '淘宝' }),
            typedOrder({ orderId: 'S4', customerName: '张三', shop: '京东' }),
        ];

        const sightings = collectCustomerSightings(orders, exactMatchPolicy);

        expect(sightings.map((s) => [s.customerName, s.shop, s.orders.map((o) => o.orderId)])).toEqual([
            ['张三', '淘宝', ['S1', 'S3']],
            ['李四', '淘宝', ['S2']],
            ['张三', '京东', ['S4']],
        ]);
    });

    it('does not split a pair by handler and keeps the first non-null handler', () => {
        const orders = [
            typedOrder({ orderId: 'S1', customerName: '张三', shop: '淘宝', handler: null }),
            typedOrder({ orderId: 'S2', customerName: '张三', shop: '淘宝', handler: '王五' }),
            typedOrder({ orderId: 'S3', customerName: '张三', shop: '淘宝', handler: '赵六' }),
        ];

        const sightings = collectCustomerSightings(orders, exactMatchPolicy);

        expect(sightings).toHaveLength(1);
        expect(sightings[0].handler).toBe('王五');
    });

    it('skips orders without a customer name', () => {
        const orders = [typedOrder({ orderId: 'S1', customerName: null })];
        expect(collectCustomerSightings(orders, exactMatchPolicy)).toEqual([]);
    });

    it('keeps a null shop as its own pair', () => {
        const orders = [
            typedOrder({ orderId: 'S1', customerName: '张三', shop: null }),
            typedOrder({ orderId: 'S2', customerName: '张三', shop: '淘宝' }),
        ];
        expect(collectCustomerSightings(orders, exactMatchPolicy).map((s) => s.shop)).toEqual([null, '淘宝']);
    });

    it('treats whitespace variants as different customers under the exact policy', () => {
        const orders = [
            typedOrder({ orderId: 'S1', customerName: '张三', shop: '淘宝' }),
            typedOrder({ orderId: 'S2', customerName: '张三 ', shop: '淘宝' }),
        ];
        expect(collectCustomerSightings(orders, exactMatchPolicy)).toHaveLength(2);
        expect(collectCustomerSightings(orders, normalizedMatchPolicy)).toHaveLength(1);
    });
});

describe('findMatchingCustomer', () => {
    const taobao = customer({ id: 1, customerName: '张三', shop: '淘宝' });
    const jd = customer({ id: 2, customerName: '张三', shop: '京东' });

    it('matches on name and shop when the sighting has a shop', () => {
        expect(findMatchingCustomer([taobao, jd], { customerName: '张三', shop: '京东' }, exactMatchPolicy)).toBe(jd);
    });

    it('matches on name alone when the sighting has no shop', () => {
        expect(findMatchingCustomer([taobao, jd], { customerName: '张三', shop: null }, exactMatchPolicy)).toBe(taobao);
        expect(findMatchingCustomer([taobao, jd], { customerName: '张三', shop: '' }, exactMatchPolicy)).toBe(taobao);
    });

    it('returns undefined when no customer matches', () => {
        expect(findMatchingCustomer([taobao], { customerName: '张三', shop: '拼多多' }, exactMatchPolicy)).toBeUndefined();
        expect(findMatchingCustomer([taobao], { customerName: '李四', shop: null }, exactMatchPolicy)).toBeUndefined();
    });
});

describe('planMetadataFill', () => {
    it('fills only null fields', () => {
        expect(planMetadataFill({ shop: null, handler: null }, { shop: '淘宝', handler: '王五' })).toEqual({
            shop: '淘宝',
            handler: '王五',
        });
        expect(planMetadataFill({ shop: '淘宝', handler: null }, { shop: '京东', handler: '王五' })).toEqual({
            handler: '王五',
        });
    });

    it('returns null when nothing changes', () => {
        expect(planMetadataFill({ shop: '淘宝', handler: '王五' }, { shop: '京东', handler: '赵六' })).toBeNull();
        expect(planMetadataFill({ shop: null, handler: null }, { shop: null, handler: null })).toBeNull();
    });
});
