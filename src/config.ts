import 'dotenv/config';

function required(name: string, value: string | undefined) {
    if (!value) throw new Error(`Missing required env var: ${name}`);
    return value;
}

function bool(envVal: string | undefined, defaultVal: boolean) {
    if (envVal == null) return defaultVal;
    const v = envVal.trim().toLowerCase();
    if (['true', '1', 'yes', 'y', 'on'].includes(v)) return true;
    if (['false', '0', 'no', 'n', 'off', ''].includes(v)) return false;
    return defaultVal; // fallback if unexpected
}

function int(envVal: string | undefined, defaultVal: number) {
    const n = parseInt(envVal || '', 10);
    return Number.isFinite(n) ? n : defaultVal;
}

const directDb = bool(process.env.DIRECT_DB, true);

export const config = {
    env: process.env.NODE_ENV || 'development',
    logLevel: process.env.LOG_LEVEL || 'info',

    odata: {
        baseUrl: required('ODATA_BASE_URL', process.env.ODATA_BASE_URL),
        username: required('ODATA_USERNAME', process.env.ODATA_USERNAME),
        password: required('ODATA_PASSWORD', process.env.ODATA_PASSWORD),
        // single-entity lookups and the connectivity probe
        lookupTimeoutMs: int(process.env.ODATA_LOOKUP_TIMEOUT_MS, 30000),
        // bulk document pages
        pageTimeoutMs: int(process.env.ODATA_PAGE_TIMEOUT_MS, 120000),
    },

    sync: {
        documentBatchSize: int(process.env.DOCUMENT_BATCH_SIZE, 500),
        catalogBatchSize: int(process.env.CATALOG_BATCH_SIZE, 1000),
        pageDelayMs: int(process.env.PAGE_DELAY_MS, 300),
        failureDelayMs: int(process.env.FAILURE_DELAY_MS, 500),
        maxUnreadableRun: int(process.env.MAX_UNREADABLE_RUN, 500),
        days: int(process.env.SYNC_DAYS, 365),
        dateFrom: process.env.SYNC_DATE_FROM || undefined,
        dateTo: process.env.SYNC_DATE_TO || undefined,
        // push the window into $filter; the window is always re-checked locally
        serverDateFilter: bool(process.env.SERVER_DATE_FILTER, false),
    },

    postgres: {
        host: process.env.POSTGRES_HOST || '127.0.0.1',
        port: int(process.env.POSTGRES_PORT, 5432),
        database: required('POSTGRES_DB', process.env.POSTGRES_DB),
        user: required('POSTGRES_USER', process.env.POSTGRES_USER),
        password: process.env.POSTGRES_PASSWORD,
    },

    ssh: {
        host: directDb ? process.env.SSH_HOST || '' : required('SSH_HOST', process.env.SSH_HOST),
        port: int(process.env.SSH_PORT, 22),
        username: directDb ? process.env.SSH_USERNAME || '' : required('SSH_USERNAME', process.env.SSH_USERNAME),
        password: process.env.SSH_PASSWORD,
        dstHost: process.env.SSH_DST_HOST || '127.0.0.1',
        dstPort: int(process.env.SSH_DST_PORT, 5432),
        localHost: process.env.SSH_LOCAL_HOST || '127.0.0.1',
        localPort: int(process.env.SSH_LOCAL_PORT, 55432),
    },

    cron: process.env.CRON_SCHEDULE || '0 3 * * *',

    flags: {
        cronEnabled: bool(process.env.CRON_ENABLED, true),
        runOnce: bool(process.env.RUN_ONCE, false),
        progressLogs: bool(process.env.PROGRESS_LOGS, true),
        directDb, // connect straight to Postgres (no SSH tunnel)
    },

    metrics: {
        enabled: bool(process.env.METRICS_ENABLED, true),
        port: int(process.env.PORT || process.env.METRICS_PORT, 3000),
        authUser: process.env.METRICS_AUTH_USER,
        authPass: process.env.METRICS_AUTH_PASS,
    },
};

export default config;
