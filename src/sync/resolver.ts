import { NIL as EMPTY_UUID } from 'uuid';
import logger from '../util/logger.js';
import type { ODataSource } from '../odata/client.js';
import type { ODataRecord } from '../odata/schemas.js';

export { EMPTY_UUID };

export const UNNAMED = 'unnamed';
const NAME_FIELDS = ['Description', 'НаименованиеПолное', 'Code'] as const;

export function isEmptyKey(key: string | null | undefined): boolean {
    return !key || key === EMPTY_UUID;
}

/** UUID -> display name, per catalog. Lives exactly as long as one sync run. */
export class ReferenceCache {
    private readonly catalogs = new Map<string, Map<string, string>>();

    get(catalog: string, key: string): string | undefined {
        return this.catalogs.get(catalog)?.get(key);
    }

    set(catalog: string, key: string, name: string): void {
        let entries = this.catalogs.get(catalog);
        if (!entries) {
            entries = new Map();
            this.catalogs.set(catalog, entries);
        }
        // first resolution wins for the rest of the run
        if (!entries.has(key)) entries.set(key, name);
    }

    size(catalog?: string): number {
        if (catalog) return this.catalogs.get(catalog)?.size ?? 0;
        let n = 0;
        for (const entries of this.catalogs.values()) n += entries.size;
        return n;
    }
}

export function displayName(entity: ODataRecord): string {
    for (const field of NAME_FIELDS) {
        const v = entity[field];
        if (typeof v === 'string' && v.trim() !== '') return v;
    }
    return UNNAMED;
}

export class ReferenceResolver {
    private lookups = 0;
    private failures = 0;

    constructor(
        private readonly source: Pick<ODataSource, 'fetchByKey'>,
        readonly cache: ReferenceCache = new ReferenceCache()
    ) {}

    async resolve(catalog: string, key: string | null | undefined): Promise<string | null> {
        if (key == null || isEmptyKey(key)) return null;
        const cached = this.cache.get(catalog, key);
        if (cached !== undefined) return cached;
        this.lookups += 1;
        try {
            const entity = await this.source.fetchByKey(catalog, key);
            const name = displayName(entity);
            this.cache.set(catalog, key, name);
            return name;
        } catch (err) {
            // not cached: a later reference to the same key gets another try
            this.failures += 1;
            logger.debug({ catalog, key, err }, 'Reference lookup failed');
            return null;
        }
    }

    /** Tries each catalog in order; the first one that knows the key wins. */
    async resolveFirst(catalogs: readonly string[], key: string | null | undefined): Promise<string | null> {
        for (const catalog of catalogs) {
            const name = await this.resolve(catalog, key);
            if (name !== null) return name;
        }
        return null;
    }

    prime(catalog: string, key: string, name: string): void {
        if (isEmptyKey(key)) return;
        this.cache.set(catalog, key, name);
    }

    stats() {
        return { cached: this.cache.size(), lookups: this.lookups, failures: this.failures };
    }
}
