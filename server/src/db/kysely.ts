/**
 * Kysely Factory
 *
 * Creates and manages the singleton Kysely instance for the reconciliation
 * tables. Column names are snake_case in PostgreSQL and camelCase in code
 * through CamelCasePlugin.
 *
 * Usage:
 *   const db = createKysely({ connectionString: env.DATABASE_URL, poolMax: env.DB_POOL_MAX });
 *   const repo = new KyselyReconciliationRepository(db);
 *   ...
 *   await destroyKysely();
 */

import { CamelCasePlugin, Kysely, PostgresDialect } from 'kysely';
import pg from 'pg';
import type { DB } from './types.js';

export interface KyselyOptions {
    connectionString: string;
    /** Maximum pool connections (default 10) */
    poolMax?: number;
}

let kyselyInstance: Kysely<DB> | null = null;

/**
 * Create or return the singleton Kysely instance
 */
export function createKysely(options: KyselyOptions): Kysely<DB> {
    if (kyselyInstance) return kyselyInstance;

    const pool = new pg.Pool({
        connectionString: options.connectionString,
        max: options.poolMax ?? 10,
    });

    kyselyInstance = new Kysely<DB>({
        dialect: new PostgresDialect({ pool }),
        plugins: [new CamelCasePlugin()],
    });

    return kyselyInstance;
}

/**
 * Close the pool. The next createKysely() call opens a new one.
 */
export async function destroyKysely(): Promise<void> {
    if (!kyselyInstance) return;
    const instance = kyselyInstance;
    kyselyInstance = null;
    await instance.destroy();
}

/**
 * Type helper for Kysely instance
 * Use this when typing function parameters that accept a Kysely instance
 */
export type KyselyDB = Kysely<DB>;

export type { DB } from './types.js';
