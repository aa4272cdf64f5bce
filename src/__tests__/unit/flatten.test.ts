import { describe, it, expect, beforeEach } from 'vitest';
import { FakeODataSource } from '../mocks/odata.mock.js';
import { Catalogs } from '../../odata/entities.js';
import { parseDocument, type ODataRecord, type RawDocument } from '../../odata/schemas.js';
import { EMPTY_UUID, ReferenceResolver } from '../../sync/resolver.js';
import { flattenCorrection, flattenPurchase, flattenSale, round, type FlattenContext } from '../../sync/flatten.js';

const ITEM = '11111111-0000-4000-8000-000000000001';
const ITEM2 = '11111111-0000-4000-8000-000000000002';
const SUPPLIER = '22222222-0000-4000-8000-000000000001';
const PARTNER = '33333333-0000-4000-8000-000000000001';
const CONSIGNEE = '33333333-0000-4000-8000-000000000002';

function doc(fields: ODataRecord): RawDocument {
  const parsed = parseDocument({ Ref_Key: 'doc-1', Number: '00-000042 ', Date: '2024-05-17T09:30:00', ...fields });
  if (!parsed) throw new Error('fixture did not parse');
  return parsed;
}

describe('flatten', () => {
  let source: FakeODataSource;
  let ctx: FlattenContext;

  beforeEach(() => {
    source = new FakeODataSource({
      [Catalogs.nomenclature]: [
        { Ref_Key: ITEM, Description: 'Wheat flour' },
        { Ref_Key: ITEM2, Description: 'Rye flour' },
      ],
      [Catalogs.contractors]: [
        { Ref_Key: SUPPLIER, Description: 'Mill Co' },
        { Ref_Key: PARTNER, Description: 'Bakery (legal entity)' },
      ],
      [Catalogs.partners]: [
        { Ref_Key: PARTNER, Description: 'Bakery' },
        { Ref_Key: CONSIGNEE, Description: 'Bakery warehouse' },
      ],
    });
    ctx = { resolver: new ReferenceResolver(source), itemTypes: new Map([[ITEM, 'Goods']]) };
  });

  describe('flattenPurchase()', () => {
    it('should derive the price from the total when the ERP sends none', async () => {
      const rows = await flattenPurchase(
        doc({ Контрагент_Key: SUPPLIER, Товары: [{ Номенклатура_Key: ITEM, Количество: 10, Цена: 0, СуммаСНДС: 150 }] }),
        ctx
      );

      expect(rows).toEqual([
        {
          doc_date: '2024-05-17',
          doc_number: '00-000042',
          contractor_id: SUPPLIER,
          contractor_name: 'Mill Co',
          nomenclature_id: ITEM,
          nomenclature_name: 'Wheat flour',
          quantity: 10,
          price: 15,
          sum_total: 150,
        },
      ]);
    });

    it('should drop lines without quantity or nomenclature', async () => {
      const rows = await flattenPurchase(
        doc({
          Контрагент_Key: SUPPLIER,
          Товары: [
            { Номенклатура_Key: ITEM, Количество: 0, Цена: 5, СуммаСНДС: 0 },
            { Номенклатура_Key: ITEM, Количество: -1, Цена: 5, СуммаСНДС: -5 },
            { Номенклатура_Key: EMPTY_UUID, Количество: 3, Цена: 5, СуммаСНДС: 15 },
            { Количество: 3, Цена: 5, СуммаСНДС: 15 },
          ],
        }),
        ctx
      );

      expect(rows).toEqual([]);
    });

    it('should round quantity to 3 places and money to 2', async () => {
      const rows = await flattenPurchase(
        doc({ Товары: [{ Номенклатура_Key: ITEM, Количество: '3', Цена: 0, Сумма: 100 }] }),
        ctx
      );

      expect(rows).toHaveLength(1);
      expect(rows[0].quantity).toBe(3);
      expect(rows[0].price).toBe(33.33);
      expect(rows[0].sum_total).toBe(100);
    });

    it('should keep the ERP price when it is set', async () => {
      const rows = await flattenPurchase(
        doc({ Товары: [{ Номенклатура_Key: ITEM, Количество: 1.23456, Цена: 9.999, СуммаСНДС: 12.346 }] }),
        ctx
      );

      expect(rows[0]).toMatchObject({ quantity: 1.235, price: 10, sum_total: 12.35 });
    });

    it('should leave an empty contractor as null without a lookup', async () => {
      const rows = await flattenPurchase(
        doc({ Контрагент_Key: EMPTY_UUID, Товары: [{ Номенклатура_Key: ITEM, Количество: 1, Цена: 2, СуммаСНДС: 2 }] }),
        ctx
      );

      expect(rows[0].contractor_id).toBeNull();
      expect(rows[0].contractor_name).toBeNull();
      expect(source.lookupsFor(Catalogs.contractors)).toBe(0);
    });
  });

  describe('flattenSale()', () => {
    it('should copy header logistics onto every line', async () => {
      const rows = await flattenSale(
        doc({
          Партнер_Key: PARTNER,
          Контрагент_Key: SUPPLIER,
          Грузополучатель_Key: CONSIGNEE,
          АгросервисИТ_КоличествоПаллетов: 4,
          АгросервисИТ_ФактическаяСтоимостьТраспортныхРасходов: '1200.50',
          АгросервисИТ_ПлановаяСтоимостьТраспортныхРасходов: 1000,
          Товары: [
            { Номенклатура_Key: ITEM, Количество: 2, Цена: 60, Сумма: 100, СуммаСНДС: 120 },
            { Номенклатура_Key: ITEM2, Количество: 0, Цена: 60, Сумма: 0, СуммаСНДС: 0 },
            { Номенклатура_Key: ITEM2, Количество: -1, Цена: 50, Сумма: -41.67, СуммаСНДС: -50 },
          ],
        }),
        ctx
      );

      expect(rows).toHaveLength(2);
      expect(rows[0]).toEqual({
        doc_type: 'Реализация',
        doc_date: '2024-05-17',
        doc_number: '00-000042',
        doc_id: 'doc-1',
        client_id: PARTNER,
        client_name: 'Bakery',
        consignee_id: CONSIGNEE,
        consignee_name: 'Bakery warehouse',
        nomenclature_id: ITEM,
        nomenclature_name: 'Wheat flour',
        nomenclature_type: 'Goods',
        quantity: 2,
        price: 60,
        sum_without_vat: 100,
        sum_with_vat: 120,
        pallets_count: 4,
        logistics_cost_fact: 1200.5,
        logistics_cost_plan: 1000,
      });
      expect(rows[1]).toMatchObject({ nomenclature_id: ITEM2, nomenclature_type: null, quantity: -1, pallets_count: 4 });
    });

    it('should fall back to the contractor when the partner is empty', async () => {
      const rows = await flattenSale(
        doc({ Партнер_Key: EMPTY_UUID, Контрагент_Key: SUPPLIER, Товары: [{ Номенклатура_Key: ITEM, Количество: 1 }] }),
        ctx
      );

      expect(rows[0]).toMatchObject({ client_id: SUPPLIER, client_name: 'Mill Co', consignee_id: null, consignee_name: null });
    });
  });

  describe('flattenCorrection()', () => {
    it('should recompute the price from the tax-inclusive total and zero the logistics', async () => {
      const rows = await flattenCorrection(
        doc({
          Партнер_Key: PARTNER,
          АгросервисИТ_КоличествоПаллетов: 4,
          АгросервисИТ_ФактическаяСтоимостьТраспортныхРасходов: 300,
          Расхождения: [{ Номенклатура_Key: ITEM, Количество: 5, Цена: 99, Сумма: 41.67, СуммаСНДС: 50 }],
          Товары: [{ Номенклатура_Key: ITEM2, Количество: 1, Цена: 1, СуммаСНДС: 1 }],
        }),
        ctx
      );

      expect(rows).toHaveLength(1);
      expect(rows[0]).toMatchObject({
        doc_type: 'Корректировка',
        nomenclature_id: ITEM,
        quantity: 5,
        price: 10,
        sum_without_vat: 41.67,
        sum_with_vat: 50,
        pallets_count: 0,
        logistics_cost_fact: 0,
        logistics_cost_plan: 0,
      });
    });

    it('should keep a zero-quantity line with a zero price', async () => {
      const rows = await flattenCorrection(
        doc({ Расхождения: [{ Номенклатура_Key: ITEM, Количество: 0, СуммаСНДС: 25 }] }),
        ctx
      );

      expect(rows).toHaveLength(1);
      expect(rows[0].price).toBe(0);
      expect(rows[0].sum_with_vat).toBe(25);
    });
  });

  it('round() should round to the given number of places', () => {
    expect(round(100 / 3, 2)).toBe(33.33);
    expect(round(1.23456, 3)).toBe(1.235);
    expect(round(7, 2)).toBe(7);
  });
});
