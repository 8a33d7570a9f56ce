/**
 * src/utils/db.ts
 *
 * PostgreSQL connection pool factory.
 *
 * The pool is lazy: it does NOT connect until the first query is made, so
 * creating it never blocks startup. Stores take a `Queryable` rather than
 * the pool itself, which lets tests hand them a recording fake.
 *
 * DATABASE_URL, when set, takes priority over the individual PG* variables.
 */

import pkg from 'pg';
import { log } from 'crawlee';
import type { Env } from '../config/envSchema.js';

const { Pool } = pkg;

export type QueryResultRow = pkg.QueryResultRow;

export interface Queryable {
    query<T extends QueryResultRow = QueryResultRow>(
        sql: string,
        values?: unknown[]
    ): Promise<{ rows: T[]; rowCount: number | null }>;
}

type PoolSettings = Pick<Env,
    'DATABASE_URL' | 'PGHOST' | 'PGPORT' | 'PGUSER' | 'PGPASSWORD' | 'PGDATABASE' | 'PGSSL' | 'PG_POOL_MAX'>;

export function createPool(settings: PoolSettings): pkg.Pool {
    const connectionString = settings.DATABASE_URL;
    const ssl = settings.PGSSL || connectionString?.includes('sslmode=require')
        ? { rejectUnauthorized: false }
        : undefined;

    const poolConfig: pkg.PoolConfig = connectionString
        ? { connectionString, ssl }
        : {
            host: settings.PGHOST,
            port: settings.PGPORT,
            user: settings.PGUSER,
            password: settings.PGPASSWORD,
            database: settings.PGDATABASE,
            ssl,
        };

    const pool = new Pool({
        ...poolConfig,
        max: settings.PG_POOL_MAX,
        idleTimeoutMillis: 30_000,
        connectionTimeoutMillis: 5_000,
    });

    // Idle-client errors surface here instead of crashing the process
    pool.on('error', (err) => {
        log.error(`[DB] Unexpected pool error: ${err.message}`);
    });

    return pool;
}

/**
 * Quick connectivity smoke-test.
 * Returns true if the DB is reachable, false otherwise.
 */
export async function pingDb(db: Queryable): Promise<boolean> {
    try {
        await db.query('SELECT 1');
        return true;
    } catch (err) {
        log.debug(`[DB] Ping failed: ${err instanceof Error ? err.message : String(err)}`);
        return false;
    }
}

/** SQLSTATE raised by PostgreSQL for a foreign-key violation. */
export const FOREIGN_KEY_VIOLATION = '23503';

export function pgErrorCode(err: unknown): string | undefined {
    if (typeof err === 'object' && err !== null && 'code' in err) {
        const { code } = err;
        return typeof code === 'string' ? code : undefined;
    }
    return undefined;
}
