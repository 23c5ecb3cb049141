/**
 * Customer Profile Editing
 *
 * Operator edits to the descriptive fields of a registry customer. Only the
 * whitelisted fields are accepted; statistics and conversion links stay owned
 * by the reconciliation stages.
 */

import {
    bulkCustomerProfilePatchSchema,
    sampleCustomerProfilePatchSchema,
    type CustomerRecord,
    type OrderKind,
} from '@orderhub/shared';
import { customerLogger, logWithContext } from '../../utils/logger.js';
import { ValidationError } from '../../utils/errors.js';
import type { ReconciliationRepository } from './types.js';

/**
 * Apply a profile patch to one customer.
 *
 * @param input - untrusted patch; unknown fields are rejected
 * @returns the updated customer, or null when `customerId` does not exist
 * @throws ValidationError when the patch is invalid or empty
 */
export async function updateCustomerProfile(
    repo: ReconciliationRepository,
    kind: OrderKind,
    customerId: number,
    input: unknown
): Promise<CustomerRecord | null> {
    const schema = kind === 'sample' ? sampleCustomerProfilePatchSchema : bulkCustomerProfilePatchSchema;
    const parsed = schema.safeParse(input);
    if (!parsed.success) {
        throw new ValidationError(
            'Invalid customer profile',
            parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
        );
    }

    const fields = Object.keys(parsed.data);
    if (fields.length === 0) {
        throw new ValidationError('Customer profile has no editable fields');
    }

    const log = logWithContext(customerLogger, { kind, customerId });
    const customer = await repo.transaction((tx) => tx.updateCustomerProfile(kind, customerId, parsed.data));

    if (customer) {
        log.info({ fields }, 'Customer profile updated');
    } else {
        log.warn('Customer not found');
    }
    return customer;
}
