import pino from 'pino';
import { EventEmitter } from 'node:events';

const level = process.env.LOG_LEVEL || 'info';

// Real-time log bus and buffer (served by the operator server at /logs)
export const logEvents = new EventEmitter();
export type LogRecord = { ts: number; level?: string; msg?: string; data?: unknown };
const LOG_BUFFER_MAX = 500;
const _logBuffer: LogRecord[] = [];
export function getLogBuffer(limit = 200): LogRecord[] {
    const n = Math.max(1, Math.min(limit, LOG_BUFFER_MAX));
    return _logBuffer.slice(-n);
}
function push(rec: LogRecord) {
    _logBuffer.push(rec);
    if (_logBuffer.length > LOG_BUFFER_MAX) _logBuffer.shift();
    logEvents.emit('log', rec);
}

// Credentials that may travel inside logged config or connection objects
const redactPaths = [
    'odata.password',
    'ssh.password',
    'postgres.password',
    'config.odata.password',
    'config.ssh.password',
    'config.postgres.password',
    'auth.password',
    '*.auth.password',
    'uri',
    '*.uri'
];

export const logger = pino({
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
    base: undefined,
    redact: {
        paths: redactPaths,
        censor: '***'
    },
    hooks: {
        logMethod(args, method, lvl) {
            const first: unknown = args[0];
            const second: unknown = args[1];
            let msg: string | undefined;
            let data: unknown;
            if (typeof first === 'string') {
                msg = first;
            } else {
                data = first;
                if (typeof second === 'string') msg = second;
            }
            push({ ts: Date.now(), level: pino.levels.labels[lvl], msg, data });
            return method.apply(this, args);
        }
    }
});

export default logger;
