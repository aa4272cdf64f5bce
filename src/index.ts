import cron from 'node-cron';
import type { Server } from 'node:http';
import type { Pool } from 'pg';
import logger from './util/logger.js';
import { config } from './config.js';
import { startSshTunnel, stopSshTunnel } from './sshTunnel.js';
import { createPool } from './db/pg.js';
import { PgSyncStore } from './db/store.js';
import { ODataClient } from './odata/client.js';
import { runSync, type SyncDeps } from './sync/run.js';
import { getLastSummary } from './sync/summary.js';
import { makeWindow, trailingWindow, type SyncWindow } from './sync/window.js';
import { noteRun, startMetricsServer } from './server/metrics.js';

let pool: Pool | null = null;
let metricsServer: Server | null = null;

function syncWindow(): SyncWindow {
    const { dateFrom, dateTo, days } = config.sync;
    if (dateFrom || dateTo) {
        const fallback = trailingWindow(days);
        return makeWindow(dateFrom ?? fallback.dateFrom, dateTo ?? fallback.dateTo);
    }
    return trailingWindow(days);
}

async function syncOnce(deps: SyncDeps) {
    // recomputed per run; a long-lived process slides the window forward
    const summary = await runSync(deps, syncWindow());
    noteRun(summary.success, summary.durationMs);
    return summary;
}

async function shutdown() {
    metricsServer?.close();
    if (pool) await pool.end();
    if (!config.flags.directDb) await stopSshTunnel();
}

async function bootstrap() {
    try {
        let dbPort = config.postgres.port;
        let dbHost = config.postgres.host;
        if (!config.flags.directDb) {
            dbPort = await startSshTunnel();
            dbHost = config.ssh.localHost;
        } else {
            logger.info('DIRECT_DB enabled; not establishing SSH tunnel');
        }
        pool = createPool({ ...config.postgres, host: dbHost, port: dbPort });
        logger.info({ host: dbHost, port: dbPort, database: config.postgres.database }, 'Postgres pool created');

        const deps: SyncDeps = {
            source: new ODataClient(config.odata),
            store: new PgSyncStore(pool),
            options: { ...config.sync, progressLogs: config.flags.progressLogs },
        };

        if (config.flags.runOnce) {
            logger.info('RUN_ONCE is true; running a single sync and exiting');
            const summary = await syncOnce(deps);
            await shutdown();
            process.exit(summary.success ? 0 : 1);
        }

        if (config.metrics.enabled) {
            metricsServer = startMetricsServer({ ...config.metrics, triggerSync: () => syncOnce(deps) });
        }

        if (config.flags.cronEnabled) {
            cron.schedule(config.cron, async () => {
                // runSync serialises runs; a tick that lands mid-run is dropped rather than queued
                if (getLastSummary().inProgress) {
                    logger.warn('Previous run still in progress; skipping this tick');
                    return;
                }
                try {
                    await syncOnce(deps);
                } catch (err) {
                    logger.error({ err }, 'Scheduled sync crashed');
                }
            });
            logger.info({ schedule: config.cron }, 'Cron scheduled');
        } else {
            logger.info('CRON_ENABLED is false; cron is disabled');
        }
    } catch (err) {
        logger.error({ err }, 'Fatal during bootstrap');
        await shutdown().catch((e) => logger.error({ err: e }, 'Shutdown after failed bootstrap failed'));
        process.exit(1);
    }
}

void bootstrap();

process.on('SIGINT', async () => {
    logger.info('Shutting down');
    await shutdown();
    process.exit(0);
});
