import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { Knex } from 'knex';
import { InsufficientStockError, InvalidInputError } from '../domain/errors';
import { createTestDatabase, readStock, seedFamily, seedStock, seedVariant, seedWarehouse } from '../test-utils/database';
import { adjustLevel, applyAdjustments, getLevel, isCheckViolation, lockLevels } from './stockLedger';

describe('stock ledger', () => {
  let db: Knex;
  let warehouseId: number;
  let riceId: number;
  let oilId: number;

  beforeEach(async () => {
    db = await createTestDatabase();
    warehouseId = await seedWarehouse(db);
    riceId = await seedVariant(db, await seedFamily(db, 'Rice'));
    oilId = await seedVariant(db, await seedFamily(db, 'Oil'), { unit: 'litre' });
  });

  afterEach(async () => {
    await db.destroy();
  });

  it('reads an absent row as zero', async () => {
    expect(await getLevel(db, warehouseId, riceId)).toBe(0);
  });

  it('creates the row on the first credit and adds to it afterwards', async () => {
    await adjustLevel(db, warehouseId, riceId, 1_500, { batchNumber: 'R-1' });
    await adjustLevel(db, warehouseId, riceId, 2_250);

    expect(await getLevel(db, warehouseId, riceId)).toBe(3_750);
    const row = await db('inventory_levels').where({ warehouse_id: warehouseId, variant_id: riceId }).first('batch_number');
    expect(row).toEqual({ batch_number: 'R-1' });
  });

  it('refuses debits past zero and debits of absent rows', async () => {
    await seedStock(db, warehouseId, riceId, 1_000);

    await expect(adjustLevel(db, warehouseId, riceId, -1_001)).rejects.toBeInstanceOf(InsufficientStockError);
    await expect(adjustLevel(db, warehouseId, oilId, -1)).rejects.toBeInstanceOf(InsufficientStockError);
    expect(await readStock(db, warehouseId, riceId)).toBe(1_000);

    await adjustLevel(db, warehouseId, riceId, -1_000);
    expect(await readStock(db, warehouseId, riceId)).toBe(0);
  });

  it('refuses non-finite and unsafe deltas without writing', async () => {
    await seedStock(db, warehouseId, riceId, 1_000);

    await expect(adjustLevel(db, warehouseId, riceId, Number.POSITIVE_INFINITY)).rejects.toBeInstanceOf(
      InvalidInputError,
    );
    await expect(adjustLevel(db, warehouseId, riceId, Number.NaN)).rejects.toBeInstanceOf(InvalidInputError);
    await expect(adjustLevel(db, warehouseId, riceId, 2 ** 53)).rejects.toBeInstanceOf(InvalidInputError);
    await expect(adjustLevel(db, warehouseId, oilId, 0.5)).rejects.toBeInstanceOf(InvalidInputError);

    expect(await readStock(db, warehouseId, riceId)).toBe(1_000);
    expect(await readStock(db, warehouseId, oilId)).toBe(0);
  });

  it('folds adjustments per variant before writing', async () => {
    await seedStock(db, warehouseId, riceId, 1_000);

    await applyAdjustments(db, warehouseId, [
      { variantId: riceId, deltaMilli: -1_500 },
      { variantId: oilId, deltaMilli: 750 },
      { variantId: riceId, deltaMilli: 2_000 },
    ]);

    expect(await readStock(db, warehouseId, riceId)).toBe(1_500);
    expect(await readStock(db, warehouseId, oilId)).toBe(750);
  });

  it('reads locked levels for every requested variant', async () => {
    await seedStock(db, warehouseId, oilId, 400);

    const levels = await db.transaction((trx) => lockLevels(trx, warehouseId, [oilId, riceId, oilId]));

    expect(Array.from(levels.entries())).toEqual([
      [riceId, 0],
      [oilId, 400],
    ]);
  });

  it('recognises check violations from either driver', () => {
    expect(isCheckViolation(Object.assign(new Error('check'), { code: '23514' }))).toBe(true);
    expect(isCheckViolation(Object.assign(new Error('check'), { code: 'SQLITE_CONSTRAINT_CHECK' }))).toBe(true);
    expect(isCheckViolation(Object.assign(new Error('unique'), { code: '23505' }))).toBe(false);
    expect(isCheckViolation('23514')).toBe(false);
  });
});
