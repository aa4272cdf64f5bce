import { Mutex } from 'async-mutex';
import logger from '../util/logger.js';
import type { ODataSource } from '../odata/client.js';
import { Catalogs, Documents, POSTED_FILTER, dateRangeFilter } from '../odata/entities.js';
import { parseCatalogEntry, parseDocument, type RawCatalogEntry, type RawDocument } from '../odata/schemas.js';
import type { SyncStore } from '../db/store.js';
import {
    clientsTable,
    nomenclatureTable,
    nomenclatureTypesTable,
    purchasePricesTable,
    salesTable,
    type ClientRow,
    type PurchasePriceRow,
    type SaleRow,
    type TableSpec,
    type WindowedTableSpec,
} from '../db/tables.js';
import { mapClients, mapNomenclature, mapNomenclatureTypes, orderTree } from './catalogs.js';
import { errorMessage, StageError } from './errors.js';
import { flattenCorrection, flattenPurchase, flattenSale, type FlattenContext } from './flatten.js';
import { DEFAULT_MAX_UNREADABLE_RUN, ResilientPaginator, type ProblemRecord } from './paginator.js';
import { ReferenceResolver, UNNAMED } from './resolver.js';
import { markSyncStart, setLastSummary, STAGES, type StageName, type StageSummary, type SyncSummary } from './summary.js';
import { inWindow, makeWindow, type SyncWindow } from './window.js';

const mutex = new Mutex();

export interface SyncOptions {
    documentBatchSize: number;
    catalogBatchSize: number;
    pageDelayMs: number;
    failureDelayMs: number;
    maxUnreadableRun: number;
    serverDateFilter: boolean;
    progressLogs: boolean;
}

export const DEFAULT_SYNC_OPTIONS: SyncOptions = {
    documentBatchSize: 500,
    catalogBatchSize: 1000,
    pageDelayMs: 300,
    failureDelayMs: 500,
    maxUnreadableRun: DEFAULT_MAX_UNREADABLE_RUN,
    serverDateFilter: false,
    progressLogs: true,
};

export interface SyncDeps {
    source: ODataSource;
    store: SyncStore;
    options?: Partial<SyncOptions>;
}

// Everything one run owns. Nothing here outlives the run.
interface RunContext extends FlattenContext {
    store: SyncStore;
    opts: SyncOptions;
    window: SyncWindow;
    resolver: ReferenceResolver;
    paginator: ResilientPaginator;
    itemTypes: Map<string, string>;
    problems: ProblemRecord[];
}

type StageRunner = (run: RunContext) => Promise<StageSummary>;

async function loadCatalog(run: RunContext, entity: string) {
    const res = await run.paginator.fetchAll(entity, { batchSize: run.opts.catalogBatchSize });
    run.problems.push(...res.problems);
    const entries = res.records.map(parseCatalogEntry).filter((e): e is RawCatalogEntry => e !== null);
    return { entries, fetched: res.records.length, pages: res.pages, problems: res.problems.length };
}

async function saveCatalog<Row>(run: RunContext, table: TableSpec<Row>, rows: Row[], fetched: number): Promise<{ saved: number; skippedReplace: boolean }> {
    if (fetched === 0) {
        // an empty catalog is far more likely a broken endpoint than a real wipe
        logger.warn({ table: table.name }, 'Catalog came back empty; keeping stored rows');
        return { saved: 0, skippedReplace: true };
    }
    const saved = await run.store.replaceAll(table, rows);
    return { saved, skippedReplace: false };
}

const syncNomenclatureTypes: StageRunner = async (run) => {
    const t0 = Date.now();
    const loaded = await loadCatalog(run, Catalogs.nomenclatureTypes);
    const tree = orderTree(Catalogs.nomenclatureTypes, mapNomenclatureTypes(loaded.entries));
    for (const row of tree.rows) run.resolver.prime(Catalogs.nomenclatureTypes, row.id, row.name || UNNAMED);
    const { saved, skippedReplace } = await saveCatalog(run, nomenclatureTypesTable, tree.rows, loaded.fetched);
    return {
        stage: 'types', pages: loaded.pages, fetched: loaded.fetched, rows: tree.rows.length, saved,
        problems: loaded.problems, skippedReplace, danglingParents: tree.danglingParents, ms: Date.now() - t0,
    };
};

const syncNomenclature: StageRunner = async (run) => {
    const t0 = Date.now();
    const loaded = await loadCatalog(run, Catalogs.nomenclature);
    const tree = orderTree(Catalogs.nomenclature, mapNomenclature(loaded.entries));
    for (const row of tree.rows) {
        run.resolver.prime(Catalogs.nomenclature, row.id, row.name || UNNAMED);
        const typeName = row.type_id ? run.resolver.cache.get(Catalogs.nomenclatureTypes, row.type_id) : undefined;
        if (typeName !== undefined) run.itemTypes.set(row.id, typeName);
    }
    const { saved, skippedReplace } = await saveCatalog(run, nomenclatureTable, tree.rows, loaded.fetched);
    return {
        stage: 'nomenclature', pages: loaded.pages, fetched: loaded.fetched, rows: tree.rows.length, saved,
        problems: loaded.problems, skippedReplace, danglingParents: tree.danglingParents, ms: Date.now() - t0,
    };
};

const syncClients: StageRunner = async (run) => {
    const t0 = Date.now();
    const loaded = await loadCatalog(run, Catalogs.partners);
    const byId = new Map<string, ClientRow>();
    for (const row of mapClients(loaded.entries)) if (!byId.has(row.id)) byId.set(row.id, row);
    const rows = [...byId.values()];
    for (const row of rows) run.resolver.prime(Catalogs.partners, row.id, row.name || UNNAMED);
    const { saved, skippedReplace } = await saveCatalog(run, clientsTable, rows, loaded.fetched);
    return {
        stage: 'clients', pages: loaded.pages, fetched: loaded.fetched, rows: rows.length, saved,
        problems: loaded.problems, skippedReplace, ms: Date.now() - t0,
    };
};

async function loadDocuments(run: RunContext, entity: string) {
    const filter = run.opts.serverDateFilter
        ? `${POSTED_FILTER} and ${dateRangeFilter(run.window.dateFrom, run.window.dateTo)}`
        : POSTED_FILTER;
    const res = await run.paginator.fetchAll(entity, { batchSize: run.opts.documentBatchSize, filter });
    run.problems.push(...res.problems);
    const docs = res.records
        .map(parseDocument)
        .filter((d): d is RawDocument => d !== null && inWindow(run.window, d.date));
    if (run.opts.progressLogs) {
        logger.info({ entity, fetched: res.records.length, inWindow: docs.length, problems: res.problems.length }, 'Documents loaded');
    }
    return { docs, fetched: res.records.length, pages: res.pages, problems: res.problems.length };
}

async function checkWindowCount<Row>(run: RunContext, table: WindowedTableSpec<Row>, expected: number) {
    try {
        const stored = await run.store.countRows(table, run.window);
        if (stored !== expected) {
            logger.warn({ table: table.name, stored, expected }, 'Row count mismatch after window replace');
        } else {
            logger.info({ table: table.name, stored }, 'Row count check OK');
        }
    } catch (e) {
        logger.warn({ err: e, table: table.name }, 'Row count check failed');
    }
}

const syncPurchases: StageRunner = async (run) => {
    const t0 = Date.now();
    const loaded = await loadDocuments(run, Documents.purchases);
    const rows: PurchasePriceRow[] = [];
    for (const doc of loaded.docs) rows.push(...(await flattenPurchase(doc, run)));
    let saved = 0;
    const skippedReplace = loaded.fetched === 0;
    if (skippedReplace) {
        logger.warn({ window: run.window }, 'No purchase documents fetched; keeping stored window');
    } else {
        saved = await run.store.replaceWindow(purchasePricesTable, run.window, rows);
        await checkWindowCount(run, purchasePricesTable, saved);
    }
    return {
        stage: 'purchases', pages: loaded.pages, fetched: loaded.fetched, inWindow: loaded.docs.length,
        rows: rows.length, saved, problems: loaded.problems, skippedReplace, ms: Date.now() - t0,
    };
};

const syncSales: StageRunner = async (run) => {
    const t0 = Date.now();
    const sales = await loadDocuments(run, Documents.sales);
    const corrections = await loadDocuments(run, Documents.salesCorrections);
    const rows: SaleRow[] = [];
    for (const doc of sales.docs) rows.push(...(await flattenSale(doc, run)));
    for (const doc of corrections.docs) rows.push(...(await flattenCorrection(doc, run)));
    const fetched = sales.fetched + corrections.fetched;
    let saved = 0;
    const skippedReplace = fetched === 0;
    if (skippedReplace) {
        logger.warn({ window: run.window }, 'No sales documents fetched; keeping stored window');
    } else {
        saved = await run.store.replaceWindow(salesTable, run.window, rows);
        await checkWindowCount(run, salesTable, saved);
    }
    return {
        stage: 'sales', pages: sales.pages + corrections.pages, fetched, inWindow: sales.docs.length + corrections.docs.length,
        rows: rows.length, saved, problems: sales.problems + corrections.problems, skippedReplace, ms: Date.now() - t0,
    };
};

const STAGE_RUNNERS: Record<StageName, StageRunner> = {
    types: syncNomenclatureTypes,
    nomenclature: syncNomenclature,
    clients: syncClients,
    purchases: syncPurchases,
    sales: syncSales,
};

/**
 * One full pass over every stage. Rejects only for a malformed window; stage and
 * connectivity failures end up in the returned summary.
 */
export async function runSync(deps: SyncDeps, requested: SyncWindow): Promise<SyncSummary> {
    const window = makeWindow(requested.dateFrom, requested.dateTo);
    return mutex.runExclusive(async () => {
        const start = Date.now();
        const startIso = new Date().toISOString();
        const opts = { ...DEFAULT_SYNC_OPTIONS, ...deps.options };
        logger.info({ window }, 'Sync started');
        markSyncStart();

        const resolver = new ReferenceResolver(deps.source);
        const run: RunContext = {
            store: deps.store,
            opts,
            window,
            resolver,
            paginator: new ResilientPaginator(deps.source, {
                pageDelayMs: opts.pageDelayMs,
                failureDelayMs: opts.failureDelayMs,
                maxUnreadableRun: opts.maxUnreadableRun,
                progressLogs: opts.progressLogs,
            }),
            itemTypes: new Map(),
            problems: [],
        };
        const stages: StageSummary[] = [];
        let failedStage: SyncSummary['failedStage'];
        let error: string | undefined;

        try {
            await deps.source.ping();
        } catch (err) {
            failedStage = 'connect';
            error = `ERP unreachable: ${errorMessage(err)}`;
            logger.error({ err }, 'ERP connectivity check failed; no stage started');
        }

        if (!failedStage) {
            for (const stage of STAGES) {
                try {
                    const summary = await STAGE_RUNNERS[stage](run);
                    stages.push(summary);
                    logger.info({ ...summary }, `Stage ${stage} completed`);
                } catch (err) {
                    const wrapped = new StageError(stage, err);
                    failedStage = stage;
                    error = wrapped.message;
                    logger.error({ err, stage }, 'Stage failed; halting sync');
                    break;
                }
            }
        }

        const end = Date.now();
        const summary: SyncSummary = {
            start: startIso,
            end: new Date(end).toISOString(),
            durationMs: end - start,
            success: !failedStage,
            window,
            failedStage,
            error,
            stages,
            problems: run.problems,
            lookups: resolver.stats(),
        };
        if (run.problems.length) {
            logger.warn({ problems: run.problems }, `${run.problems.length} record(s) skipped; investigate them in the ERP`);
        }
        logger.info({ success: summary.success, failedStage, durationMs: summary.durationMs }, 'Sync finished');
        setLastSummary(summary);
        try {
            await deps.store.recordRun(summary);
        } catch (e) {
            logger.warn({ err: e }, 'Failed to persist sync summary');
        }
        return summary;
    });
}
