import { z } from 'zod';

// The ERP omits empty fields, sends numbers as strings in custom attributes and
// occasionally nulls out whole tabular sections, so every field degrades to a default.
const numeric = z.unknown().transform((v): number => {
    if (typeof v === 'number') return Number.isFinite(v) ? v : 0;
    if (typeof v === 'string' && v.trim() !== '') {
        const n = Number(v.replace(',', '.'));
        return Number.isFinite(n) ? n : 0;
    }
    return 0;
});
const text = z.unknown().transform((v): string => (typeof v === 'string' ? v : typeof v === 'number' ? String(v) : ''));
const key = z.unknown().transform((v): string => (typeof v === 'string' ? v.trim() : ''));
const flag = z.unknown().transform((v): boolean => v === true || v === 'true');

const lineItemSchema = z
    .object({
        Номенклатура_Key: key,
        Количество: numeric,
        Цена: numeric,
        Сумма: numeric,
        СуммаСНДС: numeric,
    })
    .transform((l) => ({
        nomenclatureKey: l.Номенклатура_Key,
        quantity: l.Количество,
        price: l.Цена,
        sum: l.Сумма,
        sumWithVat: l.СуммаСНДС,
    }));

export type RawLineItem = z.output<typeof lineItemSchema>;

const lineItems = z
    .array(z.unknown())
    .catch([])
    .transform((items) =>
        items.flatMap((item) => {
            const parsed = lineItemSchema.safeParse(item);
            return parsed.success ? [parsed.data] : [];
        })
    );

export const documentSchema = z
    .object({
        Ref_Key: key,
        Number: text,
        Date: text,
        Контрагент_Key: key,
        Партнер_Key: key,
        Грузополучатель_Key: key,
        АгросервисИТ_КоличествоПаллетов: numeric,
        АгросервисИТ_ФактическаяСтоимостьТраспортныхРасходов: numeric,
        АгросервисИТ_ПлановаяСтоимостьТраспортныхРасходов: numeric,
        Товары: lineItems,
        Расхождения: lineItems,
    })
    .transform((d) => ({
        refKey: d.Ref_Key,
        number: d.Number.trim(),
        date: d.Date.slice(0, 10),
        contractorKey: d.Контрагент_Key,
        partnerKey: d.Партнер_Key,
        consigneeKey: d.Грузополучатель_Key,
        pallets: d.АгросервисИТ_КоличествоПаллетов,
        logisticsFact: d.АгросервисИТ_ФактическаяСтоимостьТраспортныхРасходов,
        logisticsPlan: d.АгросервисИТ_ПлановаяСтоимостьТраспортныхРасходов,
        goods: d.Товары,
        discrepancies: d.Расхождения,
    }));

export type RawDocument = z.output<typeof documentSchema>;

export const catalogEntrySchema = z
    .object({
        Ref_Key: key,
        Parent_Key: key,
        IsFolder: flag,
        Code: text,
        Description: text,
        НаименованиеПолное: text,
        Артикул: text,
        ВидНоменклатуры_Key: key,
        ЕдиницаИзмерения_Key: key,
        ВесЧислитель: numeric,
        ВесЗнаменатель: numeric,
        ИНН: text,
    })
    .transform((c) => ({
        refKey: c.Ref_Key,
        parentKey: c.Parent_Key,
        isFolder: c.IsFolder,
        code: c.Code.trim(),
        description: c.Description,
        fullName: c.НаименованиеПолное,
        article: c.Артикул,
        typeKey: c.ВидНоменклатуры_Key,
        unitKey: c.ЕдиницаИзмерения_Key,
        weightNumerator: c.ВесЧислитель,
        weightDenominator: c.ВесЗнаменатель,
        inn: c.ИНН,
    }));

export type RawCatalogEntry = z.output<typeof catalogEntrySchema>;

export type ODataRecord = Record<string, unknown>;

export function parseDocument(raw: ODataRecord): RawDocument | null {
    const parsed = documentSchema.safeParse(raw);
    return parsed.success ? parsed.data : null;
}

export function parseCatalogEntry(raw: ODataRecord): RawCatalogEntry | null {
    const parsed = catalogEntrySchema.safeParse(raw);
    return parsed.success ? parsed.data : null;
}

export const collectionSchema = z.object({ value: z.array(z.record(z.unknown())) });
