/**
 * Domain Constants
 *
 * Business constants shared by the reconciliation services and the CLI.
 * Centralizes the order-type vocabulary of the import spreadsheets.
 */

/**
 * Order-type labels recognised by the classifier.
 *
 * Labels are compared verbatim against `original_orders.order_type`
 * (no trimming, no case folding). Anything else is unclassified.
 */
export const ORDER_TYPE_RULES = {
    /** 样品: sample / proofing orders */
    sample: ['纯衣看样', '打样单'],
    /** 批量: production orders */
    bulk: ['新订单', '续订单', '纯衣单', '改版续订'],
} as const satisfies OrderTypeRules;

export interface OrderTypeRules {
    sample: readonly string[];
    bulk: readonly string[];
}

/** Milliseconds in one day */
export const DAY_MS = 24 * 60 * 60 * 1000;
