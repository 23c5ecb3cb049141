/**
 * Custom error classes for reconciliation failures
 *
 * Row-level errors (ValidationError, driver errors outside the connectivity
 * classes) are counted and the batch continues. Fatal errors (ConnectivityError) abort the current stage, which
 * the pipeline reports as a ReconciliationStageError.
 */

import type { OrderKind, ReconciliationStage } from '@orderhub/shared';

/**
 * Base interface for custom errors
 */
export interface CustomError extends Error {
    readonly code: string;
    /** Whether the error aborts the stage instead of failing one row */
    readonly fatal: boolean;
}

/**
 * Validation error - a canonical row that cannot be synced
 *
 * @example
 * throw new ValidationError('Order has no order_id', { orderType: '打样单' });
 */
export class ValidationError extends Error implements CustomError {
    readonly name = 'ValidationError' as const;
    readonly code = 'VALIDATION_ERROR' as const;
    readonly fatal = false;
    readonly details: unknown;

    constructor(message: string, details: unknown = null) {
        super(message);
        this.details = details;
        Object.setPrototypeOf(this, ValidationError.prototype);
    }
}

/**
 * Connectivity error - the database connection is gone
 * Fatal to the running stage; its transaction is rolled back.
 */
export class ConnectivityError extends Error implements CustomError {
    readonly name = 'ConnectivityError' as const;
    readonly code = 'CONNECTIVITY_ERROR' as const;
    readonly fatal = true;
    readonly originalError: Error | null;

    constructor(message: string, originalError: Error | null = null) {
        super(message);
        this.originalError = originalError;
        Object.setPrototypeOf(this, ConnectivityError.prototype);
    }
}

/**
 * Stage error - a pipeline stage aborted
 *
 * @example
 * throw new ReconciliationStageError('sync', 'sample', originalError);
 */
export class ReconciliationStageError extends Error implements CustomError {
    readonly name = 'ReconciliationStageError' as const;
    readonly code = 'STAGE_FAILED' as const;
    readonly fatal = true;
    readonly stage: ReconciliationStage;
    readonly kind: OrderKind | null;
    readonly originalError: Error;

    constructor(stage: ReconciliationStage, kind: OrderKind | null, originalError: Error) {
        const scope = kind ? `${stage}:${kind}` : stage;
        super(`Reconciliation stage ${scope} failed: ${originalError.message}`);
        this.stage = stage;
        this.kind = kind;
        this.originalError = originalError;
        Object.setPrototypeOf(this, ReconciliationStageError.prototype);
    }
}

// ============================================
// HELPERS
// ============================================

/** SQLSTATEs outside class 08 that mean the server dropped the session */
const SESSION_LOST_STATES = new Set(['57P01', '57P02', '57P03']);

/** Socket-level errno codes raised by node-postgres */
const SOCKET_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EPIPE', 'ENOTFOUND']);

function errorCode(error: unknown): string | null {
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return null;
}

/**
 * Type guard to check if an error is one of ours
 */
function isCustomError(error: unknown): error is CustomError {
    return (
        error instanceof Error &&
        'fatal' in error &&
        typeof error.fatal === 'boolean' &&
        'code' in error &&
        typeof error.code === 'string'
    );
}

/**
 * Whether an error means the connection is unusable.
 */
export function isConnectivityError(error: unknown): boolean {
    if (error instanceof ConnectivityError) return true;

    const code = errorCode(error);
    if (code !== null) {
        if (code.startsWith('08')) return true;
        if (SESSION_LOST_STATES.has(code)) return true;
        if (SOCKET_ERROR_CODES.has(code)) return true;
    }

    return error instanceof Error && /Connection terminated/i.test(error.message);
}

/**
 * Whether an error must abort the current stage.
 */
export function isFatalError(error: unknown): boolean {
    if (isCustomError(error)) return error.fatal;
    return isConnectivityError(error);
}

/**
 * Normalize a thrown value to an Error.
 */
export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}
