// Row shapes and column lists of the reporting tables. The reporting side reads these
// tables directly, so column names are part of the contract (see sql/schema.sql).

export interface PurchasePriceRow {
    doc_date: string;
    doc_number: string;
    contractor_id: string | null;
    contractor_name: string | null;
    nomenclature_id: string;
    nomenclature_name: string | null;
    quantity: number;
    price: number;
    sum_total: number;
}

export const SaleDocType = {
    sale: 'Реализация',
    correction: 'Корректировка',
} as const;
export type SaleDocType = (typeof SaleDocType)[keyof typeof SaleDocType];

export interface SaleRow {
    doc_type: SaleDocType;
    doc_date: string;
    doc_number: string;
    doc_id: string;
    client_id: string | null;
    client_name: string | null;
    consignee_id: string | null;
    consignee_name: string | null;
    nomenclature_id: string;
    nomenclature_name: string | null;
    nomenclature_type: string | null;
    quantity: number;
    price: number;
    sum_without_vat: number;
    sum_with_vat: number;
    pallets_count: number;
    logistics_cost_fact: number;
    logistics_cost_plan: number;
}

export interface NomenclatureTypeRow {
    id: string;
    parent_id: string | null;
    name: string;
    is_folder: boolean;
}

export interface NomenclatureRow {
    id: string;
    parent_id: string | null;
    is_folder: boolean;
    code: string;
    name: string;
    full_name: string;
    article: string;
    type_id: string | null;
    unit_id: string | null;
    weight: number | null;
}

export interface ClientRow {
    id: string;
    name: string;
    inn: string;
}

export type Column<Row> = keyof Row & string;

export interface TableSpec<Row> {
    name: string;
    columns: readonly Column<Row>[];
}

export interface WindowedTableSpec<Row> extends TableSpec<Row> {
    dateColumn: Column<Row>;
}

export const purchasePricesTable: WindowedTableSpec<PurchasePriceRow> = {
    name: 'purchase_prices',
    dateColumn: 'doc_date',
    columns: ['doc_date', 'doc_number', 'contractor_id', 'contractor_name', 'nomenclature_id', 'nomenclature_name', 'quantity', 'price', 'sum_total'],
};

export const salesTable: WindowedTableSpec<SaleRow> = {
    name: 'sales',
    dateColumn: 'doc_date',
    columns: [
        'doc_type', 'doc_date', 'doc_number', 'doc_id',
        'client_id', 'client_name', 'consignee_id', 'consignee_name',
        'nomenclature_id', 'nomenclature_name', 'nomenclature_type',
        'quantity', 'price', 'sum_without_vat', 'sum_with_vat',
        'pallets_count', 'logistics_cost_fact', 'logistics_cost_plan',
    ],
};

export const nomenclatureTypesTable: TableSpec<NomenclatureTypeRow> = {
    name: 'nomenclature_types',
    columns: ['id', 'parent_id', 'name', 'is_folder'],
};

export const nomenclatureTable: TableSpec<NomenclatureRow> = {
    name: 'nomenclature',
    columns: ['id', 'parent_id', 'is_folder', 'code', 'name', 'full_name', 'article', 'type_id', 'unit_id', 'weight'],
};

export const clientsTable: TableSpec<ClientRow> = {
    name: 'clients',
    columns: ['id', 'name', 'inn'],
};
