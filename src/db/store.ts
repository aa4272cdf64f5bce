import logger from '../util/logger.js';
import type { SyncWindow } from '../sync/window.js';
import type { SyncSummary } from '../sync/summary.js';
import { withTransaction, type ConnectionSource, type TxClient } from './pg.js';
import type { TableSpec, WindowedTableSpec } from './tables.js';

// Postgres caps a statement at 65535 bind parameters
const MAX_PARAMS = 65535;
export const DEFAULT_CHUNK_ROWS = 1000;

/** The sync engine is the only writer of the reporting tables; this is its whole write surface. */
export interface SyncStore {
    /** Deletes the rows dated inside the window and inserts `rows`, atomically. */
    replaceWindow<Row>(table: WindowedTableSpec<Row>, window: SyncWindow, rows: Row[]): Promise<number>;
    /** Replaces the whole table, atomically. Rows are inserted in the given order. */
    replaceAll<Row>(table: TableSpec<Row>, rows: Row[]): Promise<number>;
    countRows<Row>(table: TableSpec<Row> | WindowedTableSpec<Row>, window?: SyncWindow): Promise<number>;
    recordRun(summary: SyncSummary): Promise<void>;
}

function quoteIdent(name: string): string {
    return `"${name.replace(/"/g, '""')}"`;
}

export function buildInsert<Row>(table: TableSpec<Row>, rows: Row[]): { text: string; params: unknown[] } {
    const cols = table.columns;
    const params: unknown[] = [];
    const tuples = rows.map((row) => {
        const slots = cols.map((col) => {
            params.push(row[col]);
            return `$${params.length}`;
        });
        return `(${slots.join(', ')})`;
    });
    const text = `INSERT INTO ${quoteIdent(table.name)} (${cols.map(quoteIdent).join(', ')}) VALUES ${tuples.join(', ')}`;
    return { text, params };
}

export function chunk<T>(items: T[], size: number): T[][] {
    const out: T[][] = [];
    for (let i = 0; i < items.length; i += size) out.push(items.slice(i, i + size));
    return out;
}

function isWindowed<Row>(table: TableSpec<Row> | WindowedTableSpec<Row>): table is WindowedTableSpec<Row> {
    return 'dateColumn' in table;
}

export class PgSyncStore implements SyncStore {
    private readonly chunkRows: number;

    constructor(private readonly db: ConnectionSource, opts: { chunkRows?: number } = {}) {
        this.chunkRows = opts.chunkRows ?? DEFAULT_CHUNK_ROWS;
    }

    private rowsPerStatement<Row>(table: TableSpec<Row>): number {
        return Math.max(1, Math.min(this.chunkRows, Math.floor(MAX_PARAMS / table.columns.length)));
    }

    private async insertAll<Row>(client: TxClient, table: TableSpec<Row>, rows: Row[]): Promise<number> {
        let inserted = 0;
        for (const part of chunk(rows, this.rowsPerStatement(table))) {
            const { text, params } = buildInsert(table, part);
            await client.query(text, params);
            inserted += part.length;
        }
        return inserted;
    }

    async replaceWindow<Row>(table: WindowedTableSpec<Row>, window: SyncWindow, rows: Row[]): Promise<number> {
        return withTransaction(this.db, async (client) => {
            const del = await client.query(
                `DELETE FROM ${quoteIdent(table.name)} WHERE ${quoteIdent(table.dateColumn)} BETWEEN $1 AND $2`,
                [window.dateFrom, window.dateTo]
            );
            const inserted = await this.insertAll(client, table, rows);
            logger.debug({ table: table.name, deleted: del.rowCount ?? 0, inserted, window }, 'Window replaced');
            return inserted;
        });
    }

    async replaceAll<Row>(table: TableSpec<Row>, rows: Row[]): Promise<number> {
        return withTransaction(this.db, async (client) => {
            const del = await client.query(`DELETE FROM ${quoteIdent(table.name)}`);
            const inserted = await this.insertAll(client, table, rows);
            logger.debug({ table: table.name, deleted: del.rowCount ?? 0, inserted }, 'Table replaced');
            return inserted;
        });
    }

    async countRows<Row>(table: TableSpec<Row> | WindowedTableSpec<Row>, window?: SyncWindow): Promise<number> {
        const client = await this.db.connect();
        try {
            const res = window && isWindowed(table)
                ? await client.query(
                    `SELECT COUNT(*) AS n FROM ${quoteIdent(table.name)} WHERE ${quoteIdent(table.dateColumn)} BETWEEN $1 AND $2`,
                    [window.dateFrom, window.dateTo]
                )
                : await client.query(`SELECT COUNT(*) AS n FROM ${quoteIdent(table.name)}`);
            const first = res.rows[0];
            const n = first && typeof first === 'object' && 'n' in first ? Number(first.n) : 0;
            return Number.isFinite(n) ? n : 0;
        } finally {
            client.release();
        }
    }

    async recordRun(summary: SyncSummary): Promise<void> {
        await withTransaction(this.db, async (client) => {
            await client.query(
                `INSERT INTO sync_runs (started_at, finished_at, duration_ms, success, failed_stage, error, window_from, window_to, stages, problems)
                 VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)`,
                [
                    summary.start,
                    summary.end,
                    summary.durationMs,
                    summary.success,
                    summary.failedStage ?? null,
                    summary.error ?? null,
                    summary.window?.dateFrom ?? null,
                    summary.window?.dateTo ?? null,
                    JSON.stringify(summary.stages),
                    JSON.stringify(summary.problems),
                ]
            );
        });
    }
}
