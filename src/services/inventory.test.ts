import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { Knex } from 'knex';
import { InsufficientStockError, InvalidInputError } from '../domain/errors';
import { createTestDatabase, readStock, seedFamily, seedStock, seedVariant, seedWarehouse } from '../test-utils/database';
import {
  adjustStock,
  expiryCutoff,
  getInventoryLevel,
  listExpiring,
  listLevels,
  listLevelsForVariant,
  listLowStock,
} from './inventory';

describe('expiryCutoff', () => {
  it('adds whole days in UTC', () => {
    expect(expiryCutoff(7, new Date('2026-06-01T12:00:00Z'))).toBe('2026-06-08');
    expect(expiryCutoff(0, new Date('2026-12-31T23:00:00Z'))).toBe('2026-12-31');
  });
});

describe('inventory queries', () => {
  let db: Knex;
  let storeId: number;
  let depotId: number;
  let variantIds: number[];

  beforeEach(async () => {
    db = await createTestDatabase();
    storeId = await seedWarehouse(db, 'Store');
    depotId = await seedWarehouse(db, 'Depot', 'distribution_center');
    const familyId = await seedFamily(db);
    variantIds = [];
    for (let index = 0; index < 4; index += 1) {
      variantIds.push(await seedVariant(db, familyId, { name: `Rice lot ${index}` }));
    }
  });

  afterEach(async () => {
    await db.destroy();
  });

  const variant = (index: number): number => {
    const id = variantIds[index];
    if (id === undefined) {
      throw new Error(`no variant seeded at ${index}`);
    }
    return id;
  };

  it('pages levels by warehouse then variant', async () => {
    await seedStock(db, depotId, variant(0), 1_000);
    await seedStock(db, storeId, variant(1), 2_000);
    await seedStock(db, storeId, variant(0), 3_000);

    const firstPage = await listLevels(db, { offset: 0, limit: 2 });
    expect(firstPage.total).toBe(3);
    expect(firstPage.items.map((level) => [level.warehouseId, level.variantId])).toEqual([
      [storeId, variant(0)],
      [storeId, variant(1)],
    ]);

    const depotOnly = await listLevels(db, { warehouseId: depotId, offset: 0, limit: 10 });
    expect(depotOnly.items.map((level) => level.quantityMilli)).toEqual([1_000]);

    const byVariant = await listLevelsForVariant(db, variant(0));
    expect(byVariant.map((level) => level.warehouseId)).toEqual([storeId, depotId]);
  });

  it('reads a missing level as empty', async () => {
    expect(await getInventoryLevel(db, storeId, variant(2))).toEqual({
      id: 0,
      warehouseId: storeId,
      variantId: variant(2),
      quantityMilli: 0,
      batchNumber: null,
      expiryDate: null,
    });
    await expect(getInventoryLevel(db, 99, variant(2))).rejects.toMatchObject({ code: 'WAREHOUSE_NOT_FOUND' });
  });

  it('lists stocked rows expiring within the window', async () => {
    await seedStock(db, storeId, variant(0), 1_000, { expiryDate: '2026-06-05', batchNumber: 'B-1' });
    await seedStock(db, storeId, variant(1), 1_000, { expiryDate: '2026-06-08' });
    await seedStock(db, storeId, variant(2), 1_000, { expiryDate: '2026-06-20' });
    await seedStock(db, storeId, variant(3), 0, { expiryDate: '2026-05-30' });

    const expiring = await listExpiring(db, 7, new Date('2026-06-01T12:00:00Z'));

    expect(expiring.map((level) => [level.variantId, level.expiryDate, level.batchNumber])).toEqual([
      [variant(0), '2026-06-05', 'B-1'],
      [variant(1), '2026-06-08', null],
    ]);
    await expect(listExpiring(db, -1)).rejects.toBeInstanceOf(InvalidInputError);
  });

  it('lists levels strictly below the threshold', async () => {
    await seedStock(db, storeId, variant(0), 4_999);
    await seedStock(db, storeId, variant(1), 5_000);
    await seedStock(db, storeId, variant(2), 1_000);
    await seedStock(db, depotId, variant(3), 0);

    expect((await listLowStock(db, 5_000)).map((level) => level.variantId)).toEqual([
      variant(3),
      variant(2),
      variant(0),
    ]);
    expect((await listLowStock(db, 5_000, storeId)).map((level) => level.variantId)).toEqual([variant(2), variant(0)]);
  });

  it('adjusts a level and records batch details', async () => {
    const level = await adjustStock(db, {
      warehouseId: storeId,
      variantId: variant(0),
      deltaMilli: 2_500,
      batchNumber: 'LOT-9',
      expiryDate: '2026-09-30',
    });

    expect(level).toMatchObject({ quantityMilli: 2_500, batchNumber: 'LOT-9', expiryDate: '2026-09-30' });

    const reduced = await adjustStock(db, { warehouseId: storeId, variantId: variant(0), deltaMilli: -500 });
    expect(reduced).toMatchObject({ quantityMilli: 2_000, batchNumber: 'LOT-9' });
  });

  it('refuses adjustments below zero', async () => {
    await seedStock(db, storeId, variant(0), 1_000);

    await expect(
      adjustStock(db, { warehouseId: storeId, variantId: variant(0), deltaMilli: -1_001 }),
    ).rejects.toBeInstanceOf(InsufficientStockError);
    await expect(
      adjustStock(db, { warehouseId: storeId, variantId: variant(1), deltaMilli: -1 }),
    ).rejects.toBeInstanceOf(InsufficientStockError);

    expect(await readStock(db, storeId, variant(0))).toBe(1_000);
  });
});
