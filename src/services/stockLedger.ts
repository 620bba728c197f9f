import { Knex } from 'knex';
import { InsufficientStockError, InvalidInputError } from '../domain/errors';
import { InventoryLevelRow } from '../db/tables';
import { readInteger } from '../utils/fixedPoint';
import { combineAdjustments, LedgerAdjustment } from '../utils/stock';

const TABLE = 'inventory_levels';

export type ReadLevelOptions = {
  /** Hold a row lock until the surrounding transaction ends. */
  forUpdate?: boolean;
};

export type LevelDetails = {
  batchNumber?: string | null;
  expiryDate?: string | null;
};

const CHECK_VIOLATION_CODES = new Set(['23514', 'SQLITE_CONSTRAINT_CHECK']);

export const isCheckViolation = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && typeof error.code === 'string' && CHECK_VIOLATION_CODES.has(error.code);

/** Quantity on hand in thousandths; an absent row is zero stock. */
export const getLevel = async (
  db: Knex,
  warehouseId: number,
  variantId: number,
  options: ReadLevelOptions = {},
): Promise<number> => {
  const query = db<InventoryLevelRow>(TABLE)
    .where({ warehouse_id: warehouseId, variant_id: variantId })
    .first('quantity_milli');

  const row = await (options.forUpdate ? query.forUpdate() : query);
  return row ? readInteger(row.quantity_milli) : 0;
};

const detailColumns = (details: LevelDetails) => ({
  ...(details.batchNumber !== undefined ? { batch_number: details.batchNumber } : {}),
  ...(details.expiryDate !== undefined ? { expiry_date: details.expiryDate } : {}),
});

/**
 * Adds `deltaMilli` to the row in a single statement. Increments upsert the
 * row; decrements only ever update an existing one, since an absent row holds
 * nothing to take away. The non-negative check constraint turns any decrement
 * past zero into {@link InsufficientStockError}.
 */
export const adjustLevel = async (
  db: Knex,
  warehouseId: number,
  variantId: number,
  deltaMilli: number,
  details: LevelDetails = {},
): Promise<void> => {
  if (!Number.isSafeInteger(deltaMilli)) {
    throw new InvalidInputError(`Stock adjustment for variant ${variantId} is out of range`);
  }

  try {
    if (deltaMilli >= 0) {
      await db<InventoryLevelRow>(TABLE)
        .insert({
          warehouse_id: warehouseId,
          variant_id: variantId,
          quantity_milli: deltaMilli,
          ...detailColumns(details),
        })
        .onConflict(['warehouse_id', 'variant_id'])
        .merge({
          quantity_milli: db.raw('?? + ?', [`${TABLE}.quantity_milli`, deltaMilli]),
          ...detailColumns(details),
        });
      return;
    }

    const updated = await db<InventoryLevelRow>(TABLE)
      .where({ warehouse_id: warehouseId, variant_id: variantId })
      .update({
        quantity_milli: db.raw('?? + ?', ['quantity_milli', deltaMilli]),
        ...detailColumns(details),
      });

    if (updated === 0) {
      throw new InsufficientStockError(warehouseId, variantId);
    }
  } catch (error) {
    if (isCheckViolation(error)) {
      throw new InsufficientStockError(warehouseId, variantId);
    }
    throw error;
  }
};

/** Applies one statement per variant after folding repeated variants together. */
export const applyAdjustments = async (
  db: Knex,
  warehouseId: number,
  adjustments: LedgerAdjustment[],
): Promise<void> => {
  for (const adjustment of combineAdjustments(adjustments)) {
    if (adjustment.deltaMilli !== 0) {
      await adjustLevel(db, warehouseId, adjustment.variantId, adjustment.deltaMilli);
    }
  }
};

/**
 * Reads each variant's level under a row lock, in ascending variant order so
 * concurrent writers acquire locks in the same sequence.
 */
export const lockLevels = async (
  db: Knex,
  warehouseId: number,
  variantIds: number[],
): Promise<Map<number, number>> => {
  const levels = new Map<number, number>();
  const ordered = Array.from(new Set(variantIds)).sort((left, right) => left - right);

  for (const variantId of ordered) {
    levels.set(variantId, await getLevel(db, warehouseId, variantId, { forUpdate: true }));
  }

  return levels;
};
