import knex, { Knex } from 'knex';
import { up } from '../db/migrations/001_inventory_schema';
import { InsertedId, InventoryLevelRow } from '../db/tables';
import { WarehouseType } from '../types/entities';
import { readInteger } from '../utils/fixedPoint';

/**
 * An in-memory SQLite database, migrated unless asked otherwise. A single
 * pooled connection keeps every query, transactions included, on the same
 * in-memory file.
 */
export const createTestDatabase = async (options: { migrate?: boolean } = {}): Promise<Knex> => {
  const db = knex({
    client: 'better-sqlite3',
    connection: { filename: ':memory:' },
    useNullAsDefault: true,
    pool: { min: 1, max: 1 },
    log: {
      // SQLite has no row locks; knex warns on every FOR UPDATE it drops.
      warn: () => undefined,
    },
  });

  if (options.migrate ?? true) {
    await up(db);
  }
  return db;
};

const insertId = async (db: Knex, table: string, row: Record<string, unknown>): Promise<number> => {
  const [inserted] = await db(table).insert(row).returning<InsertedId[]>('id');
  if (!inserted) {
    throw new Error(`Insert into ${table} returned no id`);
  }
  return readInteger(inserted.id);
};

export const seedWarehouse = (db: Knex, name = 'Main warehouse', type: WarehouseType = 'store') =>
  insertId(db, 'warehouses', { name, type, address: null });

export const seedSupplier = (db: Knex, name = 'Hillside Farms') =>
  insertId(db, 'suppliers', { name, phone: null, location: null });

export const seedFamily = async (db: Knex, name = 'Rice') => {
  const categoryId = await insertId(db, 'categories', { name: 'Staples' });
  return insertId(db, 'product_families', { category_id: categoryId, name, description: null });
};

export type SeedVariantOptions = {
  name?: string;
  sku?: string;
  unit?: string;
  sellingPriceCents?: number;
  costPriceCents?: number;
  conversionFactorMilli?: number;
};

let skuCounter = 0;

export const seedVariant = (db: Knex, familyId: number, options: SeedVariantOptions = {}) => {
  skuCounter += 1;
  return insertId(db, 'product_variants', {
    family_id: familyId,
    name: options.name ?? `Variant ${skuCounter}`,
    sku: options.sku ?? `SKU-${skuCounter}`,
    barcode: null,
    unit: options.unit ?? 'kg',
    cost_price_cents: options.costPriceCents ?? 0,
    selling_price_cents: options.sellingPriceCents ?? 0,
    is_manufactured: false,
    conversion_factor_milli: options.conversionFactorMilli ?? 1000,
  });
};

export const seedStock = async (
  db: Knex,
  warehouseId: number,
  variantId: number,
  quantityMilli: number,
  details: { batchNumber?: string; expiryDate?: string } = {},
) => {
  await db('inventory_levels').insert({
    warehouse_id: warehouseId,
    variant_id: variantId,
    quantity_milli: quantityMilli,
    batch_number: details.batchNumber ?? null,
    expiry_date: details.expiryDate ?? null,
  });
};

/** Current quantity in thousandths, zero when no row exists. */
export const readStock = async (db: Knex, warehouseId: number, variantId: number): Promise<number> => {
  const row = await db<Pick<InventoryLevelRow, 'warehouse_id' | 'variant_id' | 'quantity_milli'>>('inventory_levels')
    .where({ warehouse_id: warehouseId, variant_id: variantId })
    .first('quantity_milli');
  return row ? readInteger(row.quantity_milli) : 0;
};

export const countTable = async (db: Knex, table: string): Promise<number> => {
  const rows = await db(table).select('id');
  return rows.length;
};
