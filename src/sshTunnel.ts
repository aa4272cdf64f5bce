import type { Server } from 'node:net';
import type { Client } from 'ssh2';
import { createRequire } from 'node:module';
const require = createRequire(import.meta.url);

interface TunnelOptions { autoClose: boolean; reconnectOnError: boolean }
interface ServerOptions { host: string; port: number }
interface SshOptions { host: string; port: number; username: string; password?: string; readyTimeout: number }
interface ForwardOptions { dstAddr: string; dstPort: number }

// tunnel-ssh is CommonJS with a named export `createTunnel`
const { createTunnel } = require('tunnel-ssh') as {
    createTunnel: (
        tunnelOptions: TunnelOptions,
        serverOptions: ServerOptions,
        sshOptions: SshOptions,
        forwardOptions: ForwardOptions
    ) => Promise<[Server, Client]>
};
import { config } from './config.js';
import logger from './util/logger.js';

let server: Server | null = null;
let sshConn: Client | null = null;
let chosenLocalPort: number | null = null;

function isAddrInUse(e: unknown): boolean {
    return typeof e === 'object' && e !== null && 'code' in e && e.code === 'EADDRINUSE';
}

/** Forwards a local port to Postgres on the database host. */
export async function startSshTunnel(): Promise<number> {
    if (server && chosenLocalPort !== null) return chosenLocalPort;
    const sshOptions: SshOptions = {
        host: config.ssh.host,
        port: config.ssh.port,
        username: config.ssh.username,
        password: config.ssh.password,
        readyTimeout: 20000,
    };
    const forwardOptions: ForwardOptions = { dstAddr: config.ssh.dstHost, dstPort: config.ssh.dstPort };
    const tunnelOptions: TunnelOptions = { autoClose: true, reconnectOnError: true };

    // Try base port and a few increments if needed
    let lastErr: unknown;
    for (let offset = 0; offset <= 10; offset++) {
        const port = config.ssh.localPort + offset;
        const serverOptions: ServerOptions = { host: config.ssh.localHost, port };
        try {
            const [srv, conn] = await createTunnel(tunnelOptions, serverOptions, sshOptions, forwardOptions);
            server = srv;
            sshConn = conn;
            chosenLocalPort = port;
            logger.info(
                { local: `${serverOptions.host}:${serverOptions.port}`, remote: `${forwardOptions.dstAddr}:${forwardOptions.dstPort}` },
                'SSH tunnel established'
            );
            return port;
        } catch (e) {
            lastErr = e;
            if (isAddrInUse(e)) {
                logger.warn({ port }, 'Local port in use; trying next');
                continue;
            }
            throw e;
        }
    }
    throw lastErr ?? new Error('Failed to establish SSH tunnel');
}

export async function stopSshTunnel() {
    if (server) {
        try {
            server.close();
            logger.info('SSH tunnel closed');
        } catch (e) {
            logger.warn({ err: e }, 'Error closing SSH tunnel');
        } finally {
            server = null;
        }
    }
    try {
        sshConn?.end();
    } catch (e) {
        logger.debug({ err: e }, 'SSH connection already closed');
    }
    sshConn = null;
    chosenLocalPort = null;
}
