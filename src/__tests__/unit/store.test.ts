import { describe, it, expect } from 'vitest';
import { createRecordingPool } from '../mocks/pg.mock.js';
import { PgSyncStore, buildInsert, chunk } from '../../db/store.js';
import { clientsTable, purchasePricesTable, type ClientRow, type PurchasePriceRow } from '../../db/tables.js';
import type { SyncSummary } from '../../sync/summary.js';

const window = { dateFrom: '2024-01-01', dateTo: '2024-12-31' };

function purchase(n: number): PurchasePriceRow {
  return {
    doc_date: '2024-06-01',
    doc_number: `P-${n}`,
    contractor_id: null,
    contractor_name: null,
    nomenclature_id: `item-${n}`,
    nomenclature_name: 'Flour',
    quantity: 1,
    price: 2.5,
    sum_total: 2.5,
  };
}

describe('buildInsert', () => {
  it('should number parameters across all rows', () => {
    const rows: ClientRow[] = [
      { id: 'c1', name: 'Bakery', inn: '1' },
      { id: 'c2', name: 'Mill', inn: '2' },
    ];

    const { text, params } = buildInsert(clientsTable, rows);

    expect(text).toBe('INSERT INTO "clients" ("id", "name", "inn") VALUES ($1, $2, $3), ($4, $5, $6)');
    expect(params).toEqual(['c1', 'Bakery', '1', 'c2', 'Mill', '2']);
  });
});

describe('chunk', () => {
  it('should split into slices of at most the given size', () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(chunk([], 3)).toEqual([]);
  });
});

describe('PgSyncStore', () => {
  it('should delete the window and insert in chunks inside one transaction', async () => {
    const { pool, queries, release } = createRecordingPool();
    const store = new PgSyncStore(pool, { chunkRows: 2 });

    const saved = await store.replaceWindow(purchasePricesTable, window, [1, 2, 3, 4, 5].map(purchase));

    expect(saved).toBe(5);
    expect(queries.map((q) => q.text.split(' (')[0])).toEqual([
      'begin',
      'DELETE FROM "purchase_prices" WHERE "doc_date" BETWEEN $1 AND $2',
      'INSERT INTO "purchase_prices"',
      'INSERT INTO "purchase_prices"',
      'INSERT INTO "purchase_prices"',
      'commit',
    ]);
    expect(queries[1].params).toEqual(['2024-01-01', '2024-12-31']);
    expect(queries[4].params).toHaveLength(9);
    expect(release).toHaveBeenCalledTimes(1);
  });

  it('should roll back and rethrow when an insert fails', async () => {
    const { pool, queries, release } = createRecordingPool({ failWhen: (text) => text.startsWith('INSERT') });
    const store = new PgSyncStore(pool);

    await expect(store.replaceWindow(purchasePricesTable, window, [purchase(1)])).rejects.toThrow('rejected');

    expect(queries.map((q) => q.text.split(' ')[0])).toEqual(['begin', 'DELETE', 'INSERT', 'rollback']);
    expect(release).toHaveBeenCalledTimes(1);
  });

  it('should replace a whole table with an empty row set', async () => {
    const { pool, queries } = createRecordingPool();
    const store = new PgSyncStore(pool);

    expect(await store.replaceAll(clientsTable, [])).toBe(0);
    expect(queries.map((q) => q.text)).toEqual(['begin', 'DELETE FROM "clients"', 'commit']);
  });

  it('should count rows inside the window', async () => {
    const { pool, queries, release } = createRecordingPool({ countRows: [{ n: '7' }] });
    const store = new PgSyncStore(pool);

    expect(await store.countRows(purchasePricesTable, window)).toBe(7);
    expect(queries[0]).toEqual({
      text: 'SELECT COUNT(*) AS n FROM "purchase_prices" WHERE "doc_date" BETWEEN $1 AND $2',
      params: ['2024-01-01', '2024-12-31'],
    });
    expect(release).toHaveBeenCalledTimes(1);
  });

  it('should persist a run summary with JSON columns', async () => {
    const { pool, queries } = createRecordingPool();
    const store = new PgSyncStore(pool);
    const summary: SyncSummary = {
      start: '2024-06-01T03:00:00.000Z',
      end: '2024-06-01T03:05:00.000Z',
      durationMs: 300000,
      success: false,
      window,
      failedStage: 'sales',
      error: 'Stage sales failed: boom',
      stages: [],
      problems: [{ entity: 'Document_Test', offset: 4 }],
    };

    await store.recordRun(summary);

    expect(queries[1].params).toEqual([
      '2024-06-01T03:00:00.000Z',
      '2024-06-01T03:05:00.000Z',
      300000,
      false,
      'sales',
      'Stage sales failed: boom',
      '2024-01-01',
      '2024-12-31',
      '[]',
      '[{"entity":"Document_Test","offset":4}]',
    ]);
  });
});
