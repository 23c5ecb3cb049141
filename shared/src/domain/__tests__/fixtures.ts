/**
 * Test builders for order and customer records.
 */

import type { CanonicalOrder, OrderFields, TypedOrder } from '../orders/types.js';
import type { CustomerRecord } from '../customers/types.js';

const BLANK_FIELDS: OrderFields = {
    role: null,
    handler: null,
    process: null,
    amount: null,
    pictureAmount: null,
    picturePrice: null,
    pictureCost: null,
    colorCost: null,
    workCost: null,
    clothPrice: null,
    quantity: null,
    clothCost: null,
    clothPackCost: null,
    clothCode: null,
    colorAmount: null,
    customerName: null,
    phone: null,
    shop: null,
    express: null,
    orderStatus: null,
    orderCreatedDate: null,
    orderProcessedDate: null,
    completionDate: null,
    orderType: null,
    notes: null,
};

export function canonicalOrder(overrides: Partial<CanonicalOrder> = {}): CanonicalOrder {
    return {
        ...BLANK_FIELDS,
        orderId: 'S001',
        createdAt: new Date('2024-01-01T00:00:00Z'),
        updatedAt: new Date('2024-01-01T00:00:00Z'),
        ...overrides,
    };
}

export function typedOrder(overrides: Partial<TypedOrder> = {}): TypedOrder {
    return {
        ...BLANK_FIELDS,
        orderId: 'S001',
        createdAt: new Date('2024-01-01T00:00:00Z'),
        updatedAt: new Date('2024-01-01T00:00:00Z'),
        ...overrides,
    };
}

export function customer(overrides: Partial<CustomerRecord> = {}): CustomerRecord {
    return {
        id: 1,
        kind: 'sample',
        customerName: '张三',
        shop: null,
        handler: null,
        region: null,
        notes: null,
        tags: [],
        wechat: null,
        ordersCount: 0,
        totalAmount: 0,
        firstOrderDate: null,
        lastOrderDate: null,
        converted: false,
        counterpartCustomerId: null,
        conversionDate: null,
        ...overrides,
    };
}
