import { Knex } from 'knex';
import { InsufficientStockError, InvalidInputError } from '../domain/errors';
import { countRows } from '../db/count';
import { InventoryLevelRow, toInventoryLevel } from '../db/tables';
import { InventoryLevel, Page } from '../types/entities';
import { requireVariant, requireWarehouse } from './catalog';
import { adjustLevel, LevelDetails, lockLevels } from './stockLedger';

const DAY_MS = 24 * 60 * 60 * 1000;

export type ListLevelsQuery = {
  warehouseId?: number;
  offset: number;
  limit: number;
};

export const listLevels = async (db: Knex, query: ListLevelsQuery): Promise<Page<InventoryLevel>> => {
  const filtered = () => {
    const builder = db<InventoryLevelRow>('inventory_levels');
    if (query.warehouseId !== undefined) {
      builder.where('warehouse_id', query.warehouseId);
    }
    return builder;
  };

  const total = await countRows(filtered());
  const rows = await filtered()
    .orderBy('warehouse_id', 'asc')
    .orderBy('variant_id', 'asc')
    .offset(query.offset)
    .limit(query.limit);

  return { items: rows.map(toInventoryLevel), total };
};

export const listLevelsForVariant = async (db: Knex, variantId: number): Promise<InventoryLevel[]> => {
  await requireVariant(db, variantId);
  const rows = await db<InventoryLevelRow>('inventory_levels')
    .where({ variant_id: variantId })
    .orderBy('warehouse_id', 'asc');
  return rows.map(toInventoryLevel);
};

/** A missing row reads as an empty level rather than an error. */
export const getInventoryLevel = async (db: Knex, warehouseId: number, variantId: number): Promise<InventoryLevel> => {
  await requireWarehouse(db, warehouseId);
  await requireVariant(db, variantId);

  const row = await db<InventoryLevelRow>('inventory_levels')
    .where({ warehouse_id: warehouseId, variant_id: variantId })
    .first();

  if (row) {
    return toInventoryLevel(row);
  }
  return { id: 0, warehouseId, variantId, quantityMilli: 0, batchNumber: null, expiryDate: null };
};

export const expiryCutoff = (days: number, now: Date): string =>
  new Date(now.getTime() + days * DAY_MS).toISOString().slice(0, 10);

/** Stocked rows whose expiry date falls on or before `days` from now, already expired ones included. */
export const listExpiring = async (db: Knex, days: number, now: Date = new Date()): Promise<InventoryLevel[]> => {
  if (!Number.isInteger(days) || days < 0) {
    throw new InvalidInputError('days must be a non-negative whole number');
  }

  const rows = await db<InventoryLevelRow>('inventory_levels')
    .whereNotNull('expiry_date')
    .where('expiry_date', '<=', expiryCutoff(days, now))
    .where('quantity_milli', '>', 0)
    .orderBy('expiry_date', 'asc')
    .orderBy('id', 'asc');

  return rows.map(toInventoryLevel);
};

/** Levels strictly below the threshold, lowest first. */
export const listLowStock = async (
  db: Knex,
  thresholdMilli: number,
  warehouseId?: number,
): Promise<InventoryLevel[]> => {
  const builder = db<InventoryLevelRow>('inventory_levels').where('quantity_milli', '<', thresholdMilli);
  if (warehouseId !== undefined) {
    builder.where('warehouse_id', warehouseId);
  }
  const rows = await builder.orderBy('quantity_milli', 'asc').orderBy('id', 'asc');
  return rows.map(toInventoryLevel);
};

export type AdjustStockCommand = LevelDetails & {
  warehouseId: number;
  variantId: number;
  deltaMilli: number;
};

/** Manual correction of one level, refused when it would take the level below zero. */
export const adjustStock = async (db: Knex, command: AdjustStockCommand): Promise<InventoryLevel> =>
  db.transaction(async (trx) => {
    await requireWarehouse(trx, command.warehouseId);
    await requireVariant(trx, command.variantId);

    const onHand = await lockLevels(trx, command.warehouseId, [command.variantId]);
    if ((onHand.get(command.variantId) ?? 0) + command.deltaMilli < 0) {
      throw new InsufficientStockError(command.warehouseId, command.variantId);
    }

    await adjustLevel(trx, command.warehouseId, command.variantId, command.deltaMilli, {
      batchNumber: command.batchNumber,
      expiryDate: command.expiryDate,
    });

    return getInventoryLevel(trx, command.warehouseId, command.variantId);
  });
