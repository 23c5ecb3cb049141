/**
 * Order record shapes shared by the canonical store and the typed views.
 *
 * `original_orders`, `sample_orders` and `bulk_orders` carry the same
 * business columns; the typed tables mirror them verbatim.
 */

// ============================================
// KINDS
// ============================================

export const ORDER_KINDS = ['sample', 'bulk'] as const;

/** The two typed order views */
export type OrderKind = (typeof ORDER_KINDS)[number];

/** Result of classifying an order-type label */
export type OrderClassification = OrderKind | 'unclassified';

export const ORDER_KIND_LABELS: Record<OrderKind, string> = {
    sample: 'Sample',
    bulk: 'Bulk',
};

// ============================================
// RECORDS
// ============================================

/**
 * Business columns copied from the canonical order into a typed order.
 */
export interface OrderFields {
    role: string | null;
    handler: string | null;
    process: string | null;
    amount: number | null;
    pictureAmount: number | null;
    picturePrice: number | null;
    pictureCost: number | null;
    colorCost: number | null;
    workCost: number | null;
    clothPrice: number | null;
    quantity: number | null;
    clothCost: number | null;
    clothPackCost: number | null;
    clothCode: string | null;
    colorAmount: number | null;
    customerName: string | null;
    phone: string | null;
    shop: string | null;
    express: string | null;
    orderStatus: string | null;
    orderCreatedDate: Date | null;
    orderProcessedDate: Date | null;
    completionDate: Date | null;
    orderType: string | null;
    notes: string | null;
}

/** Row of `original_orders` as written by the spreadsheet import */
export interface CanonicalOrder extends OrderFields {
    /** Business order id; the import may leave it blank on malformed rows */
    orderId: string | null;
    createdAt: Date | null;
    /** Last-modified stamp, bumped on every re-import */
    updatedAt: Date | null;
}

/** Canonical order that passed validation and can be synced */
export interface SyncableOrder extends CanonicalOrder {
    orderId: string;
}

/** Row of `sample_orders` / `bulk_orders` */
export interface TypedOrder extends OrderFields {
    orderId: string;
    createdAt: Date | null;
    updatedAt: Date | null;
}

/**
 * Copy the mirrored business columns out of an order.
 */
export function pickOrderFields(order: OrderFields): OrderFields {
    return {
        role: order.role,
        handler: order.handler,
        process: order.process,
        amount: order.amount,
        pictureAmount: order.pictureAmount,
        picturePrice: order.picturePrice,
        pictureCost: order.pictureCost,
        colorCost: order.colorCost,
        workCost: order.workCost,
        clothPrice: order.clothPrice,
        quantity: order.quantity,
        clothCost: order.clothCost,
        clothPackCost: order.clothPackCost,
        clothCode: order.clothCode,
        colorAmount: order.colorAmount,
        customerName: order.customerName,
        phone: order.phone,
        shop: order.shop,
        express: order.express,
        orderStatus: order.orderStatus,
        orderCreatedDate: order.orderCreatedDate,
        orderProcessedDate: order.orderProcessedDate,
        completionDate: order.completionDate,
        orderType: order.orderType,
        notes: order.notes,
    };
}

/**
 * Date an order is filed under for customer statistics:
 * the spreadsheet's order date, falling back to row creation.
 */
export function orderDateOf(order: Pick<TypedOrder, 'orderCreatedDate' | 'createdAt'>): Date | null {
    return order.orderCreatedDate ?? order.createdAt;
}
