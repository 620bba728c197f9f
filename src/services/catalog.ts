import { Knex } from 'knex';
import {
  categoryNotFound,
  ConflictError,
  familyNotFound,
  supplierNotFound,
  variantNotFound,
  warehouseNotFound,
} from '../domain/errors';
import { countRows } from '../db/count';
import {
  CategoryRow,
  InsertedId,
  ProductFamilyRow,
  ProductVariantRow,
  SupplierRow,
  toCategory,
  toProductFamily,
  toProductVariant,
  toSupplier,
  toWarehouse,
  WarehouseRow,
} from '../db/tables';
import { Category, Page, ProductFamily, ProductVariant, Supplier, Warehouse, WarehouseType } from '../types/entities';
import { readInteger } from '../utils/fixedPoint';
import { findBaseUnits, isBaseUnit } from './unitResolution';

export const findWarehouse = async (db: Knex, id: number): Promise<Warehouse | null> => {
  const row = await db<WarehouseRow>('warehouses').where({ id }).first();
  return row ? toWarehouse(row) : null;
};

export const requireWarehouse = async (db: Knex, id: number): Promise<Warehouse> => {
  const warehouse = await findWarehouse(db, id);
  if (!warehouse) {
    throw warehouseNotFound(id);
  }
  return warehouse;
};

const insertedId = (rows: InsertedId[], table: string): number => {
  const [inserted] = rows;
  if (!inserted) {
    throw new Error(`Insert into ${table} returned no id`);
  }
  return readInteger(inserted.id);
};

export type CreateWarehouseCommand = {
  name: string;
  type: WarehouseType;
  address?: string | null;
};

export const createWarehouse = async (db: Knex, command: CreateWarehouseCommand): Promise<Warehouse> => {
  const rows = await db<WarehouseRow>('warehouses')
    .insert({ name: command.name, type: command.type, address: command.address ?? null })
    .returning<InsertedId[]>('id');
  return requireWarehouse(db, insertedId(rows, 'warehouses'));
};

export const listWarehouses = async (db: Knex, type?: WarehouseType): Promise<Warehouse[]> => {
  const query = db<WarehouseRow>('warehouses').orderBy('id', 'asc');
  const rows = await (type ? query.where({ type }) : query);
  return rows.map(toWarehouse);
};

export const requireSupplier = async (db: Knex, id: number): Promise<Supplier> => {
  const row = await db<SupplierRow>('suppliers').where({ id }).first();
  if (!row) {
    throw supplierNotFound(id);
  }
  return toSupplier(row);
};

export type CreateSupplierCommand = {
  name: string;
  phone?: string | null;
  location?: string | null;
};

export const createSupplier = async (db: Knex, command: CreateSupplierCommand): Promise<Supplier> => {
  const rows = await db<SupplierRow>('suppliers')
    .insert({ name: command.name, phone: command.phone ?? null, location: command.location ?? null })
    .returning<InsertedId[]>('id');
  return requireSupplier(db, insertedId(rows, 'suppliers'));
};

export const listSuppliers = async (db: Knex, query: { offset: number; limit: number }): Promise<Page<Supplier>> => {
  const total = await countRows(db<SupplierRow>('suppliers'));
  const rows = await db<SupplierRow>('suppliers').orderBy('id', 'asc').offset(query.offset).limit(query.limit);
  return { items: rows.map(toSupplier), total };
};

export const requireCategory = async (db: Knex, id: number): Promise<Category> => {
  const row = await db<CategoryRow>('categories').where({ id }).first();
  if (!row) {
    throw categoryNotFound(id);
  }
  return toCategory(row);
};

export const createCategory = async (db: Knex, name: string): Promise<Category> => {
  const rows = await db<CategoryRow>('categories').insert({ name }).returning<InsertedId[]>('id');
  return requireCategory(db, insertedId(rows, 'categories'));
};

export const listCategories = async (db: Knex): Promise<Category[]> => {
  const rows = await db<CategoryRow>('categories').orderBy('id', 'asc');
  return rows.map(toCategory);
};

export const findVariant = async (db: Knex, id: number): Promise<ProductVariant | null> => {
  const row = await db<ProductVariantRow>('product_variants').where({ id }).first();
  return row ? toProductVariant(row) : null;
};

export const requireVariant = async (db: Knex, id: number): Promise<ProductVariant> => {
  const variant = await findVariant(db, id);
  if (!variant) {
    throw variantNotFound(id);
  }
  return variant;
};

export const requireFamily = async (db: Knex, id: number): Promise<ProductFamily> => {
  const row = await db<ProductFamilyRow>('product_families').where({ id }).first();
  if (!row) {
    throw familyNotFound(id);
  }
  return toProductFamily(row);
};

/**
 * Row lock on a family, held until the surrounding transaction ends. Variant
 * writers take it before checking the family's base units.
 */
export const lockFamily = (db: Knex, id: number) =>
  db<ProductFamilyRow>('product_families').where({ id }).first('id').forUpdate();

export type CreateFamilyCommand = {
  categoryId: number;
  name: string;
  description?: string | null;
};

export const createFamily = async (db: Knex, command: CreateFamilyCommand): Promise<ProductFamily> =>
  db.transaction(async (trx) => {
    await requireCategory(trx, command.categoryId);
    const rows = await trx<ProductFamilyRow>('product_families')
      .insert({ category_id: command.categoryId, name: command.name, description: command.description ?? null })
      .returning<InsertedId[]>('id');
    return requireFamily(trx, insertedId(rows, 'product_families'));
  });

export type ListFamiliesQuery = {
  categoryId?: number;
  offset: number;
  limit: number;
};

export const listFamilies = async (db: Knex, query: ListFamiliesQuery): Promise<Page<ProductFamily>> => {
  const filtered = () => {
    const builder = db<ProductFamilyRow>('product_families');
    if (query.categoryId !== undefined) {
      builder.where('category_id', query.categoryId);
    }
    return builder;
  };

  const total = await countRows(filtered());
  const rows = await filtered().orderBy('id', 'asc').offset(query.offset).limit(query.limit);
  return { items: rows.map(toProductFamily), total };
};

/** Ascending id, which is the tie-break order unit resolution relies on. */
export const listFamilyVariants = async (db: Knex, familyId: number): Promise<ProductVariant[]> => {
  const rows = await db<ProductVariantRow>('product_variants').where({ family_id: familyId }).orderBy('id', 'asc');
  return rows.map(toProductVariant);
};

export type CreateVariantCommand = {
  familyId: number;
  name: string;
  sku: string;
  barcode?: string;
  unit: string;
  costPriceCents: number;
  sellingPriceCents: number;
  isManufactured: boolean;
  conversionFactorMilli: number;
};

export const createVariant = async (db: Knex, command: CreateVariantCommand): Promise<ProductVariant> =>
  db.transaction(async (trx) => {
    const family = await lockFamily(trx, command.familyId);
    if (!family) {
      throw familyNotFound(command.familyId);
    }

    const skuOwner = await trx<ProductVariantRow>('product_variants').where({ sku: command.sku }).first('id');
    if (skuOwner) {
      throw new ConflictError(`SKU ${command.sku} already exists`);
    }

    if (command.barcode) {
      const barcodeOwner = await trx<ProductVariantRow>('product_variants')
        .where({ barcode: command.barcode })
        .first('id');
      if (barcodeOwner) {
        throw new ConflictError(`Barcode ${command.barcode} already exists`);
      }
    }

    if (isBaseUnit(command)) {
      const siblings = await listFamilyVariants(trx, command.familyId);
      const [existingBase] = findBaseUnits(command.familyId, siblings);
      if (existingBase) {
        throw new ConflictError(
          `Product family ${command.familyId} already has base unit variant ${existingBase.id}`,
        );
      }
    }

    const rows = await trx<ProductVariantRow>('product_variants')
      .insert({
        family_id: command.familyId,
        name: command.name,
        sku: command.sku,
        barcode: command.barcode ?? null,
        unit: command.unit,
        cost_price_cents: command.costPriceCents,
        selling_price_cents: command.sellingPriceCents,
        is_manufactured: command.isManufactured,
        conversion_factor_milli: command.conversionFactorMilli,
      })
      .returning<InsertedId[]>('id');

    return requireVariant(trx, insertedId(rows, 'product_variants'));
  });
