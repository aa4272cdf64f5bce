// Collection names as published by the ERP's standard OData interface.
export const Catalogs = {
    nomenclatureTypes: 'Catalog_ВидыНоменклатуры',
    nomenclature: 'Catalog_Номенклатура',
    partners: 'Catalog_Партнеры',
    contractors: 'Catalog_Контрагенты',
} as const;

export const Documents = {
    purchases: 'Document_ПриобретениеТоваровУслуг',
    sales: 'Document_РеализацияТоваровУслуг',
    salesCorrections: 'Document_КорректировкаРеализации',
} as const;

export const POSTED_FILTER = 'Posted eq true';

// OData v3 datetime literal for a $filter expression over the document date
export function dateRangeFilter(dateFrom: string, dateTo: string): string {
    return `Date ge datetime'${dateFrom}T00:00:00' and Date le datetime'${dateTo}T23:59:59'`;
}

export function entityPath(entity: string): string {
    return `/${encodeURIComponent(entity)}`;
}

export function entityByKeyPath(entity: string, key: string): string {
    return `/${encodeURIComponent(entity)}(guid'${encodeURIComponent(key)}')`;
}
