import axios, { AxiosError, type AxiosAdapter, type AxiosInstance, type AxiosResponse } from 'axios';
import pRetry, { AbortError } from 'p-retry';
import { StatusCodes } from 'http-status-codes';
import logger from '../util/logger.js';
import { RemoteRequestError } from '../sync/errors.js';
import { Catalogs, entityByKeyPath, entityPath } from './entities.js';
import { collectionSchema, type ODataRecord } from './schemas.js';

export interface PageRequest {
    skip: number;
    top: number;
    filter?: string;
}

/** Read side of the ERP's OData interface, as the sync engine sees it. */
export interface ODataSource {
    /** One page of a collection. Rejects on transport errors, timeouts and any non-200 reply. */
    fetchPage(entity: string, req: PageRequest): Promise<ODataRecord[]>;
    /** A single entity by its UUID key. */
    fetchByKey(entity: string, key: string): Promise<ODataRecord>;
    /** Cheap authenticated request used before any stage runs. */
    ping(): Promise<void>;
}

export interface ODataClientOptions {
    baseUrl: string;
    username: string;
    password: string;
    lookupTimeoutMs: number;
    pageTimeoutMs: number;
    pingRetries?: number;
    adapter?: AxiosAdapter;
}

export class ODataClient implements ODataSource {
    private readonly api: AxiosInstance;
    private readonly opts: ODataClientOptions;

    constructor(opts: ODataClientOptions) {
        this.opts = opts;
        this.api = axios.create({
            baseURL: opts.baseUrl.replace(/\/+$/, ''),
            auth: { username: opts.username, password: opts.password },
            headers: { Accept: 'application/json' },
            // status handling is ours: a non-200 page is a fault to isolate, not an exception type
            validateStatus: () => true,
            adapter: opts.adapter,
        });
    }

    async fetchPage(entity: string, req: PageRequest): Promise<ODataRecord[]> {
        const params: Record<string, string> = {
            $format: 'json',
            $top: String(req.top),
            $skip: String(req.skip),
        };
        if (req.filter) params.$filter = req.filter;
        const body = await this.get(entity, entityPath(entity), params, this.opts.pageTimeoutMs);
        const parsed = collectionSchema.safeParse(body);
        if (!parsed.success) {
            throw new RemoteRequestError(entity, `Malformed collection body for ${entity}`);
        }
        return parsed.data.value;
    }

    async fetchByKey(entity: string, key: string): Promise<ODataRecord> {
        const body = await this.get(entity, entityByKeyPath(entity, key), { $format: 'json' }, this.opts.lookupTimeoutMs);
        if (!body || typeof body !== 'object' || Array.isArray(body)) {
            throw new RemoteRequestError(entity, `Malformed entity body for ${entity}(${key})`);
        }
        return Object.fromEntries(Object.entries(body));
    }

    async ping(): Promise<void> {
        let attempt = 0;
        await pRetry(
            async () => {
                attempt += 1;
                try {
                    await this.fetchPage(Catalogs.contractors, { skip: 0, top: 1 });
                } catch (err) {
                    const status = err instanceof RemoteRequestError ? err.status : undefined;
                    if (status === StatusCodes.UNAUTHORIZED || status === StatusCodes.FORBIDDEN) {
                        logger.error({ status }, 'ERP rejected the credentials');
                        throw new AbortError(err instanceof Error ? err : String(err));
                    }
                    logger.warn({ attempt, status, err }, 'ERP connectivity check failed, retrying');
                    throw err;
                }
            },
            { retries: this.opts.pingRetries ?? 2, factor: 2, minTimeout: 1000, randomize: true }
        );
    }

    private async get(entity: string, url: string, params: Record<string, string>, timeout: number): Promise<unknown> {
        let resp: AxiosResponse<unknown>;
        try {
            resp = await this.api.get<unknown>(url, { params, timeout });
        } catch (err) {
            const ax = err instanceof AxiosError ? err : undefined;
            throw new RemoteRequestError(entity, `Request to ${entity} failed: ${ax?.code ?? (err instanceof Error ? err.message : String(err))}`, {
                code: ax?.code,
                cause: err,
            });
        }
        if (resp.status !== StatusCodes.OK) {
            throw new RemoteRequestError(entity, `${entity} answered HTTP ${resp.status}`, { status: resp.status });
        }
        return resp.data;
    }
}
