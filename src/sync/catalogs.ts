import type { RawCatalogEntry } from '../odata/schemas.js';
import type { ClientRow, NomenclatureRow, NomenclatureTypeRow } from '../db/tables.js';
import { CatalogCycleError } from './errors.js';
import { isEmptyKey } from './resolver.js';

function keyOrNull(key: string): string | null {
    return isEmptyKey(key) ? null : key;
}

export function mapNomenclatureTypes(entries: RawCatalogEntry[]): NomenclatureTypeRow[] {
    return entries
        .filter((e) => !isEmptyKey(e.refKey))
        .map((e) => ({
            id: e.refKey,
            parent_id: keyOrNull(e.parentKey),
            name: e.description,
            is_folder: e.isFolder,
        }));
}

export function weightOf(e: RawCatalogEntry): number | null {
    if (!e.weightNumerator || !(e.weightDenominator > 0)) return null;
    return e.weightNumerator / e.weightDenominator;
}

export function mapNomenclature(entries: RawCatalogEntry[]): NomenclatureRow[] {
    return entries
        .filter((e) => !isEmptyKey(e.refKey))
        .map((e) => ({
            id: e.refKey,
            parent_id: keyOrNull(e.parentKey),
            is_folder: e.isFolder,
            code: e.code,
            name: e.description,
            full_name: e.fullName,
            article: e.article,
            type_id: keyOrNull(e.typeKey),
            unit_id: keyOrNull(e.unitKey),
            weight: weightOf(e),
        }));
}

export function mapClients(entries: RawCatalogEntry[]): ClientRow[] {
    return entries
        .filter((e) => !isEmptyKey(e.refKey) && !e.isFolder)
        .map((e) => ({
            id: e.refKey,
            name: e.description || e.fullName,
            inn: e.inn,
        }));
}

export interface TreeNode {
    id: string;
    parent_id: string | null;
}

export interface OrderedTree<Row> {
    rows: Row[];
    danglingParents: number;
    duplicates: number;
}

/**
 * Arena view of a catalog tree: rows keyed by id, parents referenced by id only.
 * Returns the rows parents-first so a self-referencing foreign key holds after
 * every insert chunk. Parents that are not part of the catalog are cleared;
 * a parent cycle is rejected.
 */
export function orderTree<Row extends TreeNode>(catalog: string, input: Row[]): OrderedTree<Row> {
    const byId = new Map<string, Row>();
    let duplicates = 0;
    for (const row of input) {
        if (byId.has(row.id)) {
            duplicates += 1;
            continue;
        }
        byId.set(row.id, row);
    }

    let danglingParents = 0;
    for (const [id, row] of byId) {
        if (row.parent_id !== null && !byId.has(row.parent_id)) {
            danglingParents += 1;
            byId.set(id, { ...row, parent_id: null });
        }
    }

    const state = new Map<string, 'visiting' | 'done'>();
    const rows: Row[] = [];
    for (const start of byId.values()) {
        const chain: Row[] = [];
        let cur: Row | undefined = start;
        while (cur && state.get(cur.id) !== 'done') {
            if (state.get(cur.id) === 'visiting') {
                const id = cur.id;
                const loopFrom = chain.findIndex((r) => r.id === id);
                throw new CatalogCycleError(catalog, [...chain.slice(loopFrom).map((r) => r.id), id]);
            }
            state.set(cur.id, 'visiting');
            chain.push(cur);
            cur = cur.parent_id === null ? undefined : byId.get(cur.parent_id);
        }
        for (let i = chain.length - 1; i >= 0; i--) {
            state.set(chain[i].id, 'done');
            rows.push(chain[i]);
        }
    }
    return { rows, danglingParents, duplicates };
}
