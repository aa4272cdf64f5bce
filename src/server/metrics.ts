import http, { type IncomingMessage, type ServerResponse } from 'node:http';
import { StatusCodes } from 'http-status-codes';
import logger, { getLogBuffer, logEvents, type LogRecord } from '../util/logger.js';
import { getLastSummary } from '../sync/summary.js';

export interface MetricsServerOptions {
  port: number;
  authUser?: string;
  authPass?: string;
  // kicks off a sync in the background; the server never awaits it
  triggerSync: () => Promise<unknown>;
}

let totalRuns = 0;
let totalFailures = 0;
let lastDurationMs = 0;

export function noteRun(success: boolean, durationMs: number) {
  totalRuns += 1;
  if (!success) totalFailures += 1;
  lastDurationMs = durationMs;
}

export function getCounters() {
  return { totalRuns, totalFailures, lastDurationMs };
}

function sendJson(res: ServerResponse, status: number, body: unknown) {
  res.statusCode = status;
  res.setHeader('Content-Type', 'application/json');
  res.end(JSON.stringify(body));
}

function authorized(req: IncomingMessage, user: string, pass: string): boolean {
  const auth = req.headers['authorization'];
  if (!auth || !auth.startsWith('Basic ')) return false;
  const decoded = Buffer.from(auth.slice('Basic '.length), 'base64').toString();
  const sep = decoded.indexOf(':');
  return sep >= 0 && decoded.slice(0, sep) === user && decoded.slice(sep + 1) === pass;
}

function handleLogsStream(res: ServerResponse) {
  res.writeHead(StatusCodes.OK, {
    'Content-Type': 'text/event-stream',
    'Cache-Control': 'no-cache',
    Connection: 'keep-alive'
  });
  const listener = (rec: LogRecord) => {
    res.write(`data: ${JSON.stringify(rec)}\n\n`);
  };
  logEvents.on('log', listener);
  res.write(': ping\n\n');
  res.on('close', () => { logEvents.off('log', listener); });
}

export function createMetricsServer(opts: MetricsServerOptions) {
  return http.createServer((req, res) => {
    const startedAt = Date.now();
    res.on('finish', () => {
      logger.debug({ method: req.method, url: req.url, status: res.statusCode, ms: Date.now() - startedAt }, 'route');
    });
    const url = new URL(req.url || '/', 'http://localhost');
    const path = url.pathname;

    // Health endpoint (no auth) for container orchestration
    if (path === '/health') {
      res.statusCode = StatusCodes.OK; return res.end('ok');
    }
    if (opts.authUser && opts.authPass && !authorized(req, opts.authUser, opts.authPass)) {
      res.statusCode = StatusCodes.UNAUTHORIZED;
      res.setHeader('WWW-Authenticate', 'Basic realm="Sync"');
      return res.end('Authentication required');
    }

    if (path === '/metrics') {
      const { lastSummary, inProgress } = getLastSummary();
      return sendJson(res, StatusCodes.OK, {
        ...getCounters(),
        inProgress,
        lastSuccess: lastSummary?.success ?? null,
        lastFailedStage: lastSummary?.failedStage ?? null,
        lastProblems: lastSummary?.problems.length ?? 0,
      });
    }
    if (path === '/sync-summary') {
      return sendJson(res, StatusCodes.OK, getLastSummary());
    }
    if (path === '/problems') {
      return sendJson(res, StatusCodes.OK, getLastSummary().lastSummary?.problems ?? []);
    }
    if (path === '/logs') {
      const limit = parseInt(url.searchParams.get('limit') || '200', 10);
      return sendJson(res, StatusCodes.OK, getLogBuffer(Number.isFinite(limit) ? limit : 200));
    }
    if (path === '/logs/stream') {
      return handleLogsStream(res);
    }
    if (path === '/trigger-sync') {
      if (req.method !== 'POST') { res.statusCode = StatusCodes.METHOD_NOT_ALLOWED; return res.end('Method Not Allowed'); }
      if (getLastSummary().inProgress) { res.statusCode = StatusCodes.CONFLICT; return res.end('Sync already in progress'); }
      opts.triggerSync().catch(err => logger.error({ err }, 'Manual sync failed'));
      res.statusCode = StatusCodes.ACCEPTED; return res.end('Sync triggered');
    }
    res.statusCode = StatusCodes.NOT_FOUND; res.end('Not found');
  });
}

export function startMetricsServer(opts: MetricsServerOptions) {
  const server = createMetricsServer(opts);
  server.listen(opts.port, () => logger.info({ port: opts.port }, 'Metrics server listening'));
  return server;
}
