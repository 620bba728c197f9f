import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { Knex } from 'knex';
import { InvalidInputError } from '../domain/errors';
import {
  countTable,
  createTestDatabase,
  readStock,
  seedFamily,
  seedSupplier,
  seedVariant,
  seedWarehouse,
} from '../test-utils/database';
import { listCollections, recordCollection } from './collections';

describe('recordCollection', () => {
  let db: Knex;
  let mainWarehouseId: number;
  let depotId: number;
  let supplierId: number;
  let milkId: number;

  beforeEach(async () => {
    db = await createTestDatabase();
    mainWarehouseId = await seedWarehouse(db, 'Main warehouse');
    depotId = await seedWarehouse(db, 'Depot', 'distribution_center');
    supplierId = await seedSupplier(db);
    milkId = await seedVariant(db, await seedFamily(db, 'Milk'), { unit: 'litre' });
  });

  afterEach(async () => {
    await db.destroy();
  });

  it('credits the default warehouse when none is named', async () => {
    const collection = await recordCollection(
      db,
      { variantId: milkId, supplierId, agentId: 12, weightMilli: 12_500, notes: 'morning round' },
      { defaultWarehouseId: mainWarehouseId },
    );

    expect(collection.warehouseId).toBe(mainWarehouseId);
    expect(collection.weightMilli).toBe(12_500);
    expect(collection.notes).toBe('morning round');
    expect(await readStock(db, mainWarehouseId, milkId)).toBe(12_500);
  });

  it('credits a named warehouse and accumulates', async () => {
    const options = { defaultWarehouseId: mainWarehouseId };
    await recordCollection(db, { variantId: milkId, supplierId, agentId: 12, warehouseId: depotId, weightMilli: 4_000 }, options);
    await recordCollection(db, { variantId: milkId, supplierId, agentId: 12, warehouseId: depotId, weightMilli: 1_250 }, options);

    expect(await readStock(db, depotId, milkId)).toBe(5_250);
    expect(await readStock(db, mainWarehouseId, milkId)).toBe(0);
  });

  it('rejects non-positive weights', async () => {
    await expect(
      recordCollection(db, { variantId: milkId, supplierId, agentId: 12, weightMilli: 0 }, { defaultWarehouseId: mainWarehouseId }),
    ).rejects.toBeInstanceOf(InvalidInputError);
  });

  it('writes nothing when a reference is missing', async () => {
    await expect(
      recordCollection(db, { variantId: milkId, supplierId: 99, agentId: 12, weightMilli: 1_000 }, { defaultWarehouseId: mainWarehouseId }),
    ).rejects.toMatchObject({ code: 'SUPPLIER_NOT_FOUND' });
    await expect(
      recordCollection(db, { variantId: milkId, supplierId, agentId: 12, weightMilli: 1_000 }, { defaultWarehouseId: 99 }),
    ).rejects.toMatchObject({ code: 'WAREHOUSE_NOT_FOUND' });

    expect(await countTable(db, 'collections')).toBe(0);
  });

  it('lists newest first', async () => {
    const options = { defaultWarehouseId: mainWarehouseId };
    const older = await recordCollection(
      db,
      { variantId: milkId, supplierId, agentId: 12, weightMilli: 1_000, collectedAt: new Date('2026-05-01T06:00:00Z') },
      options,
    );
    const newer = await recordCollection(
      db,
      { variantId: milkId, supplierId, agentId: 12, weightMilli: 1_000, collectedAt: new Date('2026-05-02T06:00:00Z') },
      options,
    );

    const page = await listCollections(db, { offset: 0, limit: 10 });
    expect(page.total).toBe(2);
    expect(page.items.map((collection) => collection.id)).toEqual([newer.id, older.id]);
    expect(page.items[1]?.collectedAt.toISOString()).toBe('2026-05-01T06:00:00.000Z');
  });
});
