import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { Knex } from 'knex';
import { InsufficientStockError, InvalidInputError, NotFoundError, UnitConfigurationError } from '../domain/errors';
import {
  countTable,
  createTestDatabase,
  readStock,
  seedFamily,
  seedStock,
  seedVariant,
  seedWarehouse,
} from '../test-utils/database';
import { calculateSaleTotals, getSale, listSales, processSale, ProcessSaleCommand } from './sales';

describe('calculateSaleTotals', () => {
  it('adds tax and takes off the discount', () => {
    expect(calculateSaleTotals([{ lineTotalCents: 1_000 }, { lineTotalCents: 2_500 }], 300, 800)).toEqual({
      subtotalCents: 3_500,
      totalCents: 3_000,
    });
  });
});

describe('processSale', () => {
  let db: Knex;
  let warehouseId: number;
  let familyId: number;
  let bagId: number;
  let sackId: number;

  const saleOf = (items: ProcessSaleCommand['items'], overrides: Partial<ProcessSaleCommand> = {}): ProcessSaleCommand => ({
    warehouseId,
    taxCents: 0,
    discountCents: 0,
    paymentMethod: 'cash',
    processedByUserId: 7,
    items,
    ...overrides,
  });

  beforeEach(async () => {
    db = await createTestDatabase();
    warehouseId = await seedWarehouse(db);
    familyId = await seedFamily(db);
    bagId = await seedVariant(db, familyId, { name: 'Rice 1kg', sellingPriceCents: 5_000 });
    sackId = await seedVariant(db, familyId, {
      name: 'Rice 20kg sack',
      unit: 'sack',
      sellingPriceCents: 90_000,
      conversionFactorMilli: 20_000,
    });
  });

  afterEach(async () => {
    await db.destroy();
  });

  it('deducts a converted variant from its base unit row', async () => {
    await seedStock(db, warehouseId, bagId, 100_000);

    const sale = await processSale(db, saleOf([{ variantId: sackId, quantityMilli: 2_000 }]));

    expect(await readStock(db, warehouseId, bagId)).toBe(60_000);
    expect(await readStock(db, warehouseId, sackId)).toBe(0);
    expect(sale.items).toHaveLength(1);
    expect(sale.items[0]).toMatchObject({
      variantId: sackId,
      quantityMilli: 2_000,
      unitPriceCents: 90_000,
      lineTotalCents: 180_000,
    });
    expect(sale.totalCents).toBe(180_000);
  });

  it('conserves stock across a base unit sale', async () => {
    await seedStock(db, warehouseId, bagId, 10_000);

    await processSale(db, saleOf([{ variantId: bagId, quantityMilli: 2_500 }]));
    await processSale(db, saleOf([{ variantId: bagId, quantityMilli: 1_500 }]));

    expect(await readStock(db, warehouseId, bagId)).toBe(6_000);
  });

  it('applies tax, discount and explicit prices', async () => {
    await seedStock(db, warehouseId, bagId, 10_000);

    const sale = await processSale(
      db,
      saleOf(
        [
          { variantId: bagId, quantityMilli: 2_500 },
          { variantId: bagId, quantityMilli: 1_000, unitPriceCents: 4_000 },
        ],
        { taxCents: 1_000, discountCents: 500, customerName: 'Asha' },
      ),
    );

    expect(sale.subtotalCents).toBe(16_500);
    expect(sale.totalCents).toBe(17_000);
    expect(sale.customerName).toBe('Asha');
    expect(sale.items.map((item) => item.lineTotalCents)).toEqual([12_500, 4_000]);
    expect(await readStock(db, warehouseId, bagId)).toBe(6_500);
  });

  it('refuses to oversell and leaves no trace', async () => {
    await seedStock(db, warehouseId, bagId, 10_000);

    await expect(processSale(db, saleOf([{ variantId: bagId, quantityMilli: 15_000 }]))).rejects.toBeInstanceOf(
      InsufficientStockError,
    );

    expect(await readStock(db, warehouseId, bagId)).toBe(10_000);
    expect(await countTable(db, 'sales')).toBe(0);
    expect(await countTable(db, 'sale_items')).toBe(0);
  });

  it('checks lines sharing a base unit against their combined quantity', async () => {
    await seedStock(db, warehouseId, bagId, 30_000);

    await expect(
      processSale(
        db,
        saleOf([
          { variantId: sackId, quantityMilli: 1_000 },
          { variantId: bagId, quantityMilli: 15_000 },
        ]),
      ),
    ).rejects.toMatchObject({ code: 'INSUFFICIENT_STOCK', variantId: bagId });

    expect(await readStock(db, warehouseId, bagId)).toBe(30_000);
  });

  it('rejects a discount larger than the sale', async () => {
    await seedStock(db, warehouseId, bagId, 10_000);

    await expect(
      processSale(db, saleOf([{ variantId: bagId, quantityMilli: 1_000 }], { discountCents: 6_000 })),
    ).rejects.toBeInstanceOf(InvalidInputError);

    expect(await readStock(db, warehouseId, bagId)).toBe(10_000);
  });

  it('rejects non-positive quantities', async () => {
    await expect(processSale(db, saleOf([{ variantId: bagId, quantityMilli: 0 }]))).rejects.toBeInstanceOf(
      InvalidInputError,
    );
  });

  it('reports unknown warehouses and variants', async () => {
    await expect(processSale(db, saleOf([{ variantId: bagId, quantityMilli: 1_000 }], { warehouseId: 99 }))).rejects.toMatchObject({
      code: 'WAREHOUSE_NOT_FOUND',
    });
    await expect(processSale(db, saleOf([{ variantId: 99, quantityMilli: 1_000 }]))).rejects.toMatchObject({
      code: 'PRODUCT_VARIANT_NOT_FOUND',
    });
  });

  it('fails when a family has no base unit', async () => {
    const otherFamilyId = await seedFamily(db, 'Flour');
    const bundleId = await seedVariant(db, otherFamilyId, { conversionFactorMilli: 5_000 });

    await expect(processSale(db, saleOf([{ variantId: bundleId, quantityMilli: 1_000 }]))).rejects.toBeInstanceOf(
      UnitConfigurationError,
    );
  });

  it('reads sales back singly and by page', async () => {
    await seedStock(db, warehouseId, bagId, 10_000);
    const first = await processSale(
      db,
      saleOf([{ variantId: bagId, quantityMilli: 1_000 }], { createdAt: new Date('2026-03-01T10:00:00Z') }),
    );
    const second = await processSale(
      db,
      saleOf([{ variantId: bagId, quantityMilli: 1_000 }], { createdAt: new Date('2026-03-02T10:00:00Z') }),
    );

    const fetched = await getSale(db, first.id);
    expect(fetched.items).toHaveLength(1);
    expect(fetched.createdAt.toISOString()).toBe('2026-03-01T10:00:00.000Z');

    const page = await listSales(db, { offset: 0, limit: 1 });
    expect(page.total).toBe(2);
    expect(page.items.map((sale) => sale.id)).toEqual([second.id]);

    const filtered = await listSales(db, { from: new Date('2026-03-02T00:00:00Z'), offset: 0, limit: 10 });
    expect(filtered.items.map((sale) => sale.id)).toEqual([second.id]);

    await expect(getSale(db, 404)).rejects.toBeInstanceOf(NotFoundError);
  });
});
