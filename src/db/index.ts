import { Pool, PoolClient, PoolConfig, QueryResultRow } from 'pg';
import { config } from '../config';
import { logger } from '../utils/logger';

let pool: Pool | null = null;

export function getPool(): Pool {
    if (!pool) {
        const poolConfig: PoolConfig = {
            connectionString: config.databaseUrl,
            max: 20,
            idleTimeoutMillis: 30000,
            connectionTimeoutMillis: 5000,
        };
        pool = new Pool(poolConfig);
        pool.on('error', (err) => {
            logger.error({ err }, 'Unexpected database pool error');
        });
    }
    return pool;
}

/**
 * Resolves with `work` unless `signal` aborts first. pg cannot cancel a
 * running statement from the client, so an abandoned query still finishes
 * on its connection and only its outcome is dropped.
 */
function abandonOnAbort<T>(work: Promise<T>, signal?: AbortSignal): Promise<T> {
    if (!signal) return work;
    signal.throwIfAborted();

    return new Promise<T>((resolve, reject) => {
        const onAbort = () => {
            work.catch((err: unknown) => logger.debug({ err }, 'Abandoned query failed'));
            reject(signal.reason);
        };
        signal.addEventListener('abort', onAbort, { once: true });
        work.then(
            (value) => {
                signal.removeEventListener('abort', onAbort);
                resolve(value);
            },
            (err: unknown) => {
                signal.removeEventListener('abort', onAbort);
                reject(err);
            }
        );
    });
}

export async function query<T extends QueryResultRow = Record<string, unknown>>(
    text: string,
    params?: unknown[],
    signal?: AbortSignal
): Promise<T[]> {
    const start = Date.now();
    const result = await abandonOnAbort(getPool().query<T>(text, params), signal);
    const duration = Date.now() - start;
    logger.debug({ query: text.slice(0, 100), duration, rows: result.rowCount }, 'DB query');
    return result.rows;
}

export async function queryOne<T extends QueryResultRow = Record<string, unknown>>(
    text: string,
    params?: unknown[],
    signal?: AbortSignal
): Promise<T | null> {
    const rows = await query<T>(text, params, signal);
    return rows[0] ?? null;
}

export async function transaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await getPool().connect();
    try {
        await client.query('BEGIN');
        const result = await fn(client);
        await client.query('COMMIT');
        return result;
    } catch (err) {
        await client.query('ROLLBACK');
        throw err;
    } finally {
        client.release();
    }
}

export async function closePool(): Promise<void> {
    if (pool) {
        await pool.end();
        pool = null;
    }
}
