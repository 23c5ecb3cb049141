/**
 * Reconciliation Zod Schemas
 *
 * Result shapes of every reconciliation stage. The server's stage functions
 * return these types; the run history stores them as JSON and re-validates
 * them on the way out.
 */

import { z } from 'zod';
import { ORDER_KINDS } from '../domain/orders/types.js';

// ============================================
// INPUTS
// ============================================

export const orderKindSchema = z.enum(ORDER_KINDS);

export const matchPolicyNameSchema = z.enum(['exact', 'normalized']);

export const listLimitSchema = z.coerce.number().int().positive().max(500).default(50);

export const customerIdSchema = z.coerce.number().int().positive();

// ============================================
// STAGE RESULTS
// ============================================

export const orderSyncResultSchema = z.object({
    inserted: z.number().int().nonnegative(),
    updated: z.number().int().nonnegative(),
    errors: z.number().int().nonnegative(),
});

export type OrderSyncResult = z.infer<typeof orderSyncResultSchema>;

export const syncAllResultSchema = z.object({
    sample: orderSyncResultSchema,
    bulk: orderSyncResultSchema,
});

export type SyncAllResult = z.infer<typeof syncAllResultSchema>;

export const customerExtractionResultSchema = z.object({
    created: z.number().int().nonnegative(),
    updated: z.number().int().nonnegative(),
    relations: z.number().int().nonnegative(),
    errors: z.number().int().nonnegative(),
});

export type CustomerExtractionResult = z.infer<typeof customerExtractionResultSchema>;

export const conversionDetectionResultSchema = z.object({
    conversions: z.number().int().nonnegative(),
    errors: z.number().int().nonnegative(),
});

export type ConversionDetectionResult = z.infer<typeof conversionDetectionResultSchema>;

export const customerStatsResultSchema = z.object({
    customersUpdated: z.number().int().nonnegative(),
    errors: z.number().int().nonnegative(),
});

export type CustomerStatsResult = z.infer<typeof customerStatsResultSchema>;

// ============================================
// PIPELINE REPORT
// ============================================

export const reconciliationStageSchema = z.enum(['sync', 'extract', 'conversions', 'stats']);

export type ReconciliationStage = z.infer<typeof reconciliationStageSchema>;

export const stageFailureSchema = z.object({
    stage: reconciliationStageSchema,
    kind: orderKindSchema.nullable(),
    message: z.string(),
});

export type StageFailure = z.infer<typeof stageFailureSchema>;

export const reconciliationStatusSchema = z.enum(['completed', 'partial', 'failed']);

export type ReconciliationStatus = z.infer<typeof reconciliationStatusSchema>;

const perKind = <T extends z.ZodTypeAny>(schema: T) =>
    z.object({ sample: schema.nullable(), bulk: schema.nullable() });

export const reconciliationReportSchema = z.object({
    status: reconciliationStatusSchema,
    /** Sync failed or reported row errors; an import should not be treated as applied */
    blocking: z.boolean(),
    sync: perKind(orderSyncResultSchema),
    customers: perKind(customerExtractionResultSchema),
    conversions: conversionDetectionResultSchema.nullable(),
    stats: perKind(customerStatsResultSchema),
    failure: stageFailureSchema.nullable(),
    durationMs: z.number().nonnegative(),
});

export type ReconciliationReport = z.infer<typeof reconciliationReportSchema>;

// ============================================
// RUN HISTORY
// ============================================

export const runTriggerSchema = z.enum(['import', 'manual', 'scheduled']);

export type RunTrigger = z.infer<typeof runTriggerSchema>;

export const reconciliationRunSchema = z.object({
    id: z.number().int(),
    triggeredBy: runTriggerSchema,
    status: z.enum(['running', 'completed', 'failed']),
    startedAt: z.coerce.date(),
    completedAt: z.coerce.date().nullable(),
    durationMs: z.number().int().nullable(),
    result: reconciliationReportSchema.nullable().catch(null),
    error: z.string().nullable(),
});

export type ReconciliationRun = z.infer<typeof reconciliationRunSchema>;
