import pg from 'pg';
import type { Pool } from 'pg';
import logger from '../util/logger.js';

// The slice of pg.PoolClient / pg.Pool the store relies on; lets tests hand in a recording client.
export interface TxClient {
    query(text: string, params?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
    release(err?: Error | boolean): void;
}

export interface ConnectionSource {
    connect(): Promise<TxClient>;
}

export interface PgOptions {
    host: string;
    port: number;
    database: string;
    user: string;
    password?: string;
}

export function createPool(opts: PgOptions): Pool {
    const pool = new pg.Pool({ ...opts, max: 2, connectionTimeoutMillis: 15000 });
    pool.on('error', (err) => logger.error({ err }, 'Idle Postgres client error'));
    return pool;
}

export async function withTransaction<T>(source: ConnectionSource, fn: (client: TxClient) => Promise<T>): Promise<T> {
    const client = await source.connect();
    try {
        await client.query('begin');
        const result = await fn(client);
        await client.query('commit');
        return result;
    } catch (error) {
        try {
            await client.query('rollback');
        } catch (rollbackErr) {
            logger.error({ err: rollbackErr }, 'Rollback failed');
        }
        throw error;
    } finally {
        client.release();
    }
}
