/**
 * Order Classification - Pure Domain Logic
 *
 * Maps the free-text order-type label of an imported order onto one of the
 * typed views. NO DATABASE DEPENDENCIES.
 *
 * Matching is exact and case-sensitive. A label listed under both kinds
 * classifies as sample (sample rules are checked first).
 */

import { ORDER_TYPE_RULES, type OrderTypeRules } from '../constants.js';
import type { OrderClassification, OrderKind } from './types.js';

/**
 * Classify an order-type label.
 *
 * Total: empty, null and unknown labels are `'unclassified'`, never an error.
 *
 * @example
 * classifyOrderType('打样单')   // => 'sample'
 * classifyOrderType('续订单')   // => 'bulk'
 * classifyOrderType('未知类型') // => 'unclassified'
 */
export function classifyOrderType(
    label: string | null | undefined,
    rules: OrderTypeRules = ORDER_TYPE_RULES
): OrderClassification {
    if (typeof label !== 'string' || label.length === 0) return 'unclassified';
    if (rules.sample.includes(label)) return 'sample';
    if (rules.bulk.includes(label)) return 'bulk';
    return 'unclassified';
}

/**
 * Whether an order-type label routes into the given typed view.
 */
export function classifiesAs(
    label: string | null | undefined,
    kind: OrderKind,
    rules: OrderTypeRules = ORDER_TYPE_RULES
): boolean {
    return classifyOrderType(label, rules) === kind;
}
