/**
 * Unit tests for order-type classification (shared domain)
 */

import { classifyOrderType, classifiesAs } from '../classification.js';
import { ORDER_TYPE_RULES } from '../../constants.js';

describe('classifyOrderType', () => {
    it('classifies every sample label as sample', () => {
        expect(classifyOrderType('纯衣看样')).toBe('sample');
        expect(classifyOrderType('打样单')).toBe('sample');
    });

    it('classifies every bulk label as bulk', () => {
        expect(classifyOrderType('新订单')).toBe('bulk');
        expect(classifyOrderType('续订单')).toBe('bulk');
        expect(classifyOrderType('纯衣单')).toBe('bulk');
        expect(classifyOrderType('改版续订')).toBe('bulk');
    });

    it('returns unclassified for unknown labels', () => {
        expect(classifyOrderType('未知类型')).toBe('unclassified');
        expect(classifyOrderType('sample')).toBe('unclassified');
    });

    it('returns unclassified for empty, null and undefined labels', () => {
        expect(classifyOrderType('')).toBe('unclassified');
        expect(classifyOrderType(null)).toBe('unclassified');
        expect(classifyOrderType(undefined)).toBe('unclassified');
    });

    it('does not trim or normalize labels', () => {
        expect(classifyOrderType(' 打样单')).toBe('unclassified');
        expect(classifyOrderType('打样单 ')).toBe('unclassified');
    });

    it('is deterministic for repeated calls', () => {
        const labels = ['打样单', '新订单', '未知类型', '', null];
        const first = labels.map((l) => classifyOrderType(l));
        const second = labels.map((l) => classifyOrderType(l));
        expect(second).toEqual(first);
        expect(first).toEqual(['sample', 'bulk', 'unclassified', 'unclassified', 'unclassified']);
    });

    it('accepts custom rules', () => {
        const rules = { sample: ['proof'], bulk: ['run'] };
        expect(classifyOrderType('proof', rules)).toBe('sample');
        expect(classifyOrderType('run', rules)).toBe('bulk');
        expect(classifyOrderType('打样单', rules)).toBe('unclassified');
    });

    it('prefers sample when a label is listed under both kinds', () => {
        expect(classifyOrderType('x', { sample: ['x'], bulk: ['x'] })).toBe('sample');
    });
});

describe('classifiesAs', () => {
    it('matches the target kind only', () => {
        expect(classifiesAs('打样单', 'sample')).toBe(true);
        expect(classifiesAs('打样单', 'bulk')).toBe(false);
        expect(classifiesAs(null, 'sample')).toBe(false);
    });
});

describe('ORDER_TYPE_RULES', () => {
    it('keeps sample and bulk labels disjoint', () => {
        const bulkLabels: readonly string[] = ORDER_TYPE_RULES.bulk;
        const overlap = ORDER_TYPE_RULES.sample.filter((label) => bulkLabels.includes(label));
        expect(overlap).toEqual([]);
    });
});
