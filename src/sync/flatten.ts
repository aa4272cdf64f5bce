import { Catalogs } from '../odata/entities.js';
import type { RawDocument } from '../odata/schemas.js';
import { SaleDocType, type PurchasePriceRow, type SaleRow } from '../db/tables.js';
import { isEmptyKey, type ReferenceResolver } from './resolver.js';

export type NameResolver = Pick<ReferenceResolver, 'resolve' | 'resolveFirst'>;

export interface FlattenContext {
    resolver: NameResolver;
    // nomenclature key -> nomenclature type name, filled by the nomenclature stage
    itemTypes?: ReadonlyMap<string, string>;
}

const PARTY_CATALOGS = [Catalogs.partners, Catalogs.contractors] as const;

export function round(n: number, digits: number): number {
    const f = 10 ** digits;
    return Math.round(n * f) / f;
}

function keyOrNull(key: string): string | null {
    return isEmptyKey(key) ? null : key;
}

export async function flattenPurchase(doc: RawDocument, ctx: FlattenContext): Promise<PurchasePriceRow[]> {
    const contractorId = keyOrNull(doc.contractorKey);
    const contractorName = await ctx.resolver.resolve(Catalogs.contractors, contractorId);
    const rows: PurchasePriceRow[] = [];
    for (const line of doc.goods) {
        if (isEmptyKey(line.nomenclatureKey)) continue;
        const quantity = line.quantity;
        if (quantity <= 0) continue;
        const total = line.sumWithVat || line.sum;
        let price = line.price;
        if (price === 0 && total > 0) price = total / quantity;
        rows.push({
            doc_date: doc.date,
            doc_number: doc.number,
            contractor_id: contractorId,
            contractor_name: contractorName,
            nomenclature_id: line.nomenclatureKey,
            nomenclature_name: await ctx.resolver.resolve(Catalogs.nomenclature, line.nomenclatureKey),
            quantity: round(quantity, 3),
            price: round(price, 2),
            sum_total: round(total, 2),
        });
    }
    return rows;
}

async function saleParties(doc: RawDocument, ctx: FlattenContext) {
    const clientId = keyOrNull(doc.partnerKey) ?? keyOrNull(doc.contractorKey);
    const consigneeId = keyOrNull(doc.consigneeKey);
    return {
        client_id: clientId,
        client_name: await ctx.resolver.resolveFirst(PARTY_CATALOGS, clientId),
        consignee_id: consigneeId,
        consignee_name: await ctx.resolver.resolve(Catalogs.partners, consigneeId),
    };
}

export async function flattenSale(doc: RawDocument, ctx: FlattenContext): Promise<SaleRow[]> {
    const parties = await saleParties(doc, ctx);
    const rows: SaleRow[] = [];
    for (const line of doc.goods) {
        if (isEmptyKey(line.nomenclatureKey)) continue;
        if (line.quantity === 0) continue;
        rows.push({
            doc_type: SaleDocType.sale,
            doc_date: doc.date,
            doc_number: doc.number,
            doc_id: doc.refKey,
            ...parties,
            nomenclature_id: line.nomenclatureKey,
            nomenclature_name: await ctx.resolver.resolve(Catalogs.nomenclature, line.nomenclatureKey),
            nomenclature_type: ctx.itemTypes?.get(line.nomenclatureKey) ?? null,
            quantity: line.quantity,
            price: line.price,
            sum_without_vat: line.sum,
            sum_with_vat: line.sumWithVat,
            pallets_count: doc.pallets,
            logistics_cost_fact: doc.logisticsFact,
            logistics_cost_plan: doc.logisticsPlan,
        });
    }
    return rows;
}

/**
 * Corrections carry deltas, so the unit price is always recomputed from the
 * tax-inclusive total. Header logistics fields do not apply to them.
 */
export async function flattenCorrection(doc: RawDocument, ctx: FlattenContext): Promise<SaleRow[]> {
    const parties = await saleParties(doc, ctx);
    const rows: SaleRow[] = [];
    for (const line of doc.discrepancies) {
        if (isEmptyKey(line.nomenclatureKey)) continue;
        const price = line.quantity !== 0 ? line.sumWithVat / line.quantity : 0;
        rows.push({
            doc_type: SaleDocType.correction,
            doc_date: doc.date,
            doc_number: doc.number,
            doc_id: doc.refKey,
            ...parties,
            nomenclature_id: line.nomenclatureKey,
            nomenclature_name: await ctx.resolver.resolve(Catalogs.nomenclature, line.nomenclatureKey),
            nomenclature_type: ctx.itemTypes?.get(line.nomenclatureKey) ?? null,
            quantity: line.quantity,
            price: round(price, 2),
            sum_without_vat: line.sum,
            sum_with_vat: line.sumWithVat,
            pallets_count: 0,
            logistics_cost_fact: 0,
            logistics_cost_plan: 0,
        });
    }
    return rows;
}
