/**
 * Centralized Environment Variable Validation
 *
 * Validates every environment variable the reconciliation job reads, once,
 * at startup. Invalid configuration fails fast with one line per issue.
 *
 * USAGE:
 * - Entry points import `env`: `import { env } from './config/env.js'`
 * - Services never read the environment; they receive options instead
 *
 * TO ADD A NEW ENV VAR:
 * 1. Add it to the schema below with appropriate validation
 * 2. Add a JSDoc comment explaining the variable
 */

// Load dotenv FIRST - ES module imports are hoisted
import dotenv from 'dotenv';
dotenv.config();

import { z } from 'zod';
import { matchPolicyNameSchema } from '@orderhub/shared';

// ============================================
// SCHEMA DEFINITION
// ============================================

const booleanFlag = z.enum(['true', 'false']).transform((value) => value === 'true');

export const envSchema = z.object({
    // ----------------------------------------
    // REQUIRED
    // ----------------------------------------

    /** PostgreSQL connection string */
    DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),

    // ----------------------------------------
    // OPTIONAL - With sensible defaults
    // ----------------------------------------

    /** Environment mode */
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    /** Pino level; defaults to debug in development, info otherwise */
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),

    /** Maximum connections in the pg pool */
    DB_POOL_MAX: z.coerce.number().int().positive().default(10),

    // ----------------------------------------
    // RECONCILIATION
    // ----------------------------------------

    /** How customer names and shops are compared across orders and registries */
    CUSTOMER_MATCH_POLICY: matchPolicyNameSchema.default('exact'),

    /** Persist every pipeline run into reconciliation_runs */
    RECONCILE_TRACK_RUNS: booleanFlag.default('true'),
});

// ============================================
// TYPE EXPORT
// ============================================

export type Env = z.infer<typeof envSchema>;

// ============================================
// PARSE AND VALIDATE
// ============================================

/**
 * Format zod issues as `  - NAME: message` lines.
 */
export function formatEnvIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
        .join('\n');
}

function parseEnv(): Env {
    const parsed = envSchema.safeParse(process.env);
    if (!parsed.success) {
        console.error('Environment validation failed:\n' + formatEnvIssues(parsed.error));
        process.exit(1);
    }
    return parsed.data;
}

export const env = parseEnv();
