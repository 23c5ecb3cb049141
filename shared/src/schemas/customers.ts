/**
 * Customer Insight Zod Schemas
 *
 * Read-only views over the customer graph: registry summary, sample
 * customers still waiting to convert, and typed orders left behind by
 * reclassification. Plus the hand-edited profile fields of a customer.
 */

import { z } from 'zod';
import { orderKindSchema } from './reconciliation.js';

// ============================================
// PROFILE
// ============================================

/** Set to null to clear */
const profileText = z.string().trim().min(1).max(255).nullable();

export const bulkCustomerProfilePatchSchema = z
    .object({
        customerName: z.string().trim().min(1).max(255),
        shop: profileText,
        handler: profileText,
        region: profileText,
        notes: z.string().trim().max(2000).nullable(),
        tags: z.array(z.string().trim().min(1).max(50)).max(20),
    })
    .partial()
    .strict();

export const sampleCustomerProfilePatchSchema = bulkCustomerProfilePatchSchema
    .extend({ wechat: profileText.optional() })
    .strict();

// ============================================
// SUMMARY
// ============================================

export const customerSummarySchema = z.object({
    sampleCustomers: z.number().int().nonnegative(),
    bulkCustomers: z.number().int().nonnegative(),
    /** sampleCustomers + bulkCustomers; a converted customer counts in both */
    totalCustomers: z.number().int().nonnegative(),
    /** Distinct sample customers with at least one conversion record */
    convertedCustomers: z.number().int().nonnegative(),
    /** convertedCustomers / sampleCustomers, as a percentage with 2 decimals */
    conversionRate: z.number().nonnegative(),
});

export type CustomerSummary = z.infer<typeof customerSummarySchema>;

// ============================================
// UNCONVERTED CUSTOMERS
// ============================================

export const customerOrderRefSchema = z.object({
    orderId: z.string(),
    orderDate: z.date().nullable(),
    amount: z.number().nullable(),
});

export type CustomerOrderRef = z.infer<typeof customerOrderRefSchema>;

export const unconvertedCustomerSchema = z.object({
    id: z.number().int(),
    customerName: z.string(),
    shop: z.string().nullable(),
    handler: z.string().nullable(),
    ordersCount: z.number().int().nonnegative(),
    totalAmount: z.number(),
    firstOrderDate: z.date().nullable(),
    lastOrderDate: z.date().nullable(),
    /** Newest first */
    orders: z.array(customerOrderRefSchema),
});

export type UnconvertedCustomer = z.infer<typeof unconvertedCustomerSchema>;

// ============================================
// ORPHANED TYPED ORDERS
// ============================================

export const orphanReasonSchema = z.enum(['missing', 'reclassified']);

export const orphanedTypedOrderSchema = z.object({
    kind: orderKindSchema,
    orderId: z.string(),
    /** Current label of the canonical order; null when it no longer exists */
    canonicalOrderType: z.string().nullable(),
    reason: orphanReasonSchema,
});

export type OrphanedTypedOrder = z.infer<typeof orphanedTypedOrderSchema>;
