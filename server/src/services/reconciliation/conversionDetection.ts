/**
 * Conversion Detector
 *
 * Links sample customers to bulk customers of the same name. Each new pair
 * gets a customer_conversions row, and both customers get their linkage
 * fields, in one savepoint.
 */

import {
    exactMatchPolicy,
    planConversions,
    type ConversionDetectionResult,
    type NewConversion,
} from '@orderhub/shared';
import { conversionLogger } from '../../utils/logger.js';
import { attemptRow } from './rowGuard.js';
import type { CustomerStageOptions, ReconciliationRepository, ReconciliationTx } from './types.js';

async function applyConversion(tx: ReconciliationTx, conversion: NewConversion): Promise<boolean> {
    const inserted = await tx.insertConversion(conversion);
    if (!inserted) return false;

    await tx.markSampleConverted(conversion.sampleCustomerId, conversion.bulkCustomerId, conversion.conversionDate);
    await tx.markBulkConverted(conversion.bulkCustomerId, conversion.sampleCustomerId);
    return true;
}

/**
 * Detect sample → bulk conversions across the two registries.
 */
export async function detectConversions(
    repo: ReconciliationRepository,
    options: CustomerStageOptions = {}
): Promise<ConversionDetectionResult> {
    const policy = options.policy ?? exactMatchPolicy;
    const clock = options.now ?? (() => new Date());

    return repo.transaction(async (tx) => {
        const sampleCustomers = await tx.listCustomers('sample');
        const bulkCustomers = await tx.listCustomers('bulk');
        const sampleAssociations = await tx.listAssociations('sample');
        const bulkAssociations = await tx.listAssociations('bulk');
        const existing = await tx.listConversions();

        const plan = planConversions({
            sampleCustomers,
            bulkCustomers,
            sampleAssociations,
            bulkAssociations,
            existing,
            now: clock(),
            policy,
        });

        for (const customerName of plan.ambiguousNames) {
            conversionLogger.warn(
                { customerName, policy: policy.name },
                'Customer name matches several customers; linking every pair'
            );
        }

        const result: ConversionDetectionResult = { conversions: 0, errors: 0 };

        for (const conversion of plan.conversions) {
            const outcome = await attemptRow(
                tx,
                conversionLogger,
                { sampleCustomerId: conversion.sampleCustomerId, bulkCustomerId: conversion.bulkCustomerId },
                () => applyConversion(tx, conversion)
            );
            if (!outcome.ok) {
                result.errors++;
            } else if (outcome.value) {
                result.conversions++;
            }
        }

        conversionLogger.info(result, 'Conversion detection complete');
        return result;
    });
}
