import {
  Category,
  Collection,
  InventoryLevel,
  InventoryTransfer,
  InventoryTransferItem,
  PaymentMethodValues,
  Procurement,
  ProcurementItem,
  ProcurementStatusValues,
  ProductFamily,
  ProductVariant,
  Sale,
  SaleItem,
  Supplier,
  TransferStatusValues,
  Warehouse,
  WarehouseTypeValues,
} from '../types/entities';
import { readInteger } from '../utils/fixedPoint';

// Integer columns come back as numbers from SQLite and as strings from pg BIGINT.
type IntegerColumn = number | string;
// Timestamps come back as Date from pg and as epoch milliseconds from SQLite.
type TimestampColumn = Date | number | string;
// Dates come back as Date from pg and as the inserted string from SQLite.
type DateColumn = Date | string | null;

export type WarehouseRow = {
  id: IntegerColumn;
  name: string;
  type: string;
  address: string | null;
};

export type SupplierRow = {
  id: IntegerColumn;
  name: string;
  phone: string | null;
  location: string | null;
};

export type CategoryRow = {
  id: IntegerColumn;
  name: string;
};

export type ProductFamilyRow = {
  id: IntegerColumn;
  category_id: IntegerColumn;
  name: string;
  description: string | null;
};

export type ProductVariantRow = {
  id: IntegerColumn;
  family_id: IntegerColumn;
  name: string;
  sku: string;
  barcode: string | null;
  unit: string;
  cost_price_cents: IntegerColumn;
  selling_price_cents: IntegerColumn;
  is_manufactured: boolean | number;
  conversion_factor_milli: IntegerColumn;
};

export type InventoryLevelRow = {
  id: IntegerColumn;
  warehouse_id: IntegerColumn;
  variant_id: IntegerColumn;
  quantity_milli: IntegerColumn;
  batch_number: string | null;
  expiry_date: DateColumn;
};

export type SaleRow = {
  id: IntegerColumn;
  warehouse_id: IntegerColumn;
  customer_name: string | null;
  subtotal_cents: IntegerColumn;
  tax_cents: IntegerColumn;
  discount_cents: IntegerColumn;
  total_cents: IntegerColumn;
  payment_method: string;
  processed_by_user_id: IntegerColumn;
  created_at: TimestampColumn;
};

export type SaleItemRow = {
  id: IntegerColumn;
  sale_id: IntegerColumn;
  position: IntegerColumn;
  variant_id: IntegerColumn;
  quantity_milli: IntegerColumn;
  unit_price_cents: IntegerColumn;
  line_total_cents: IntegerColumn;
};

export type ProcurementRow = {
  id: IntegerColumn;
  supplier_id: IntegerColumn;
  warehouse_id: IntegerColumn;
  ordered_by_user_id: IntegerColumn;
  created_at: TimestampColumn;
  expected_delivery: DateColumn;
  status: string;
};

export type ProcurementItemRow = {
  id: IntegerColumn;
  procurement_id: IntegerColumn;
  variant_id: IntegerColumn;
  quantity_ordered_milli: IntegerColumn;
  quantity_received_milli: IntegerColumn;
  unit_cost_cents: IntegerColumn;
};

export type CollectionRow = {
  id: IntegerColumn;
  variant_id: IntegerColumn;
  supplier_id: IntegerColumn;
  agent_id: IntegerColumn;
  warehouse_id: IntegerColumn;
  weight_milli: IntegerColumn;
  collected_at: TimestampColumn;
  notes: string | null;
};

export type InventoryTransferRow = {
  id: IntegerColumn;
  source_warehouse_id: IntegerColumn;
  destination_warehouse_id: IntegerColumn;
  authorized_by_user_id: IntegerColumn;
  transferred_at: TimestampColumn;
  status: string;
};

export type InventoryTransferItemRow = {
  id: IntegerColumn;
  transfer_id: IntegerColumn;
  variant_id: IntegerColumn;
  quantity_milli: IntegerColumn;
};

export type InsertedId = { id: IntegerColumn };

const readEnum = <T extends string>(values: readonly T[], value: string, column: string): T => {
  const match = values.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new TypeError(`Unexpected ${column} value: ${value}`);
  }
  return match;
};

export const readTimestamp = (value: TimestampColumn): Date => {
  if (value instanceof Date) {
    return value;
  }
  return new Date(typeof value === 'string' && /^\d+$/.test(value) ? Number(value) : value);
};

const pad = (value: number) => String(value).padStart(2, '0');

/** Normalises a DATE column to `YYYY-MM-DD`. pg parses DATE into local midnight. */
export const readDateOnly = (value: DateColumn): string | null => {
  if (value === null) {
    return null;
  }
  if (value instanceof Date) {
    return `${value.getFullYear()}-${pad(value.getMonth() + 1)}-${pad(value.getDate())}`;
  }
  return value.slice(0, 10);
};

export const toWarehouse = (row: WarehouseRow): Warehouse => ({
  id: readInteger(row.id),
  name: row.name,
  type: readEnum(WarehouseTypeValues, row.type, 'warehouses.type'),
  address: row.address,
});

export const toSupplier = (row: SupplierRow): Supplier => ({
  id: readInteger(row.id),
  name: row.name,
  phone: row.phone,
  location: row.location,
});

export const toCategory = (row: CategoryRow): Category => ({
  id: readInteger(row.id),
  name: row.name,
});

export const toProductFamily = (row: ProductFamilyRow): ProductFamily => ({
  id: readInteger(row.id),
  categoryId: readInteger(row.category_id),
  name: row.name,
  description: row.description,
});

export const toProductVariant = (row: ProductVariantRow): ProductVariant => ({
  id: readInteger(row.id),
  familyId: readInteger(row.family_id),
  name: row.name,
  sku: row.sku,
  barcode: row.barcode,
  unit: row.unit,
  costPriceCents: readInteger(row.cost_price_cents),
  sellingPriceCents: readInteger(row.selling_price_cents),
  isManufactured: Boolean(row.is_manufactured),
  conversionFactorMilli: readInteger(row.conversion_factor_milli),
});

export const toInventoryLevel = (row: InventoryLevelRow): InventoryLevel => ({
  id: readInteger(row.id),
  warehouseId: readInteger(row.warehouse_id),
  variantId: readInteger(row.variant_id),
  quantityMilli: readInteger(row.quantity_milli),
  batchNumber: row.batch_number,
  expiryDate: readDateOnly(row.expiry_date),
});

export const toSaleItem = (row: SaleItemRow): SaleItem => ({
  id: readInteger(row.id),
  saleId: readInteger(row.sale_id),
  variantId: readInteger(row.variant_id),
  quantityMilli: readInteger(row.quantity_milli),
  unitPriceCents: readInteger(row.unit_price_cents),
  lineTotalCents: readInteger(row.line_total_cents),
});

export const toSale = (row: SaleRow, items: SaleItemRow[]): Sale => ({
  id: readInteger(row.id),
  warehouseId: readInteger(row.warehouse_id),
  customerName: row.customer_name,
  subtotalCents: readInteger(row.subtotal_cents),
  taxCents: readInteger(row.tax_cents),
  discountCents: readInteger(row.discount_cents),
  totalCents: readInteger(row.total_cents),
  paymentMethod: readEnum(PaymentMethodValues, row.payment_method, 'sales.payment_method'),
  processedByUserId: readInteger(row.processed_by_user_id),
  createdAt: readTimestamp(row.created_at),
  items: items.map(toSaleItem),
});

export const toProcurementItem = (row: ProcurementItemRow): ProcurementItem => ({
  id: readInteger(row.id),
  procurementId: readInteger(row.procurement_id),
  variantId: readInteger(row.variant_id),
  quantityOrderedMilli: readInteger(row.quantity_ordered_milli),
  quantityReceivedMilli: readInteger(row.quantity_received_milli),
  unitCostCents: readInteger(row.unit_cost_cents),
});

export const toProcurement = (row: ProcurementRow, items: ProcurementItemRow[]): Procurement => ({
  id: readInteger(row.id),
  supplierId: readInteger(row.supplier_id),
  warehouseId: readInteger(row.warehouse_id),
  orderedByUserId: readInteger(row.ordered_by_user_id),
  createdAt: readTimestamp(row.created_at),
  expectedDelivery: readDateOnly(row.expected_delivery),
  status: readEnum(ProcurementStatusValues, row.status, 'procurements.status'),
  items: items.map(toProcurementItem),
});

export const toCollection = (row: CollectionRow): Collection => ({
  id: readInteger(row.id),
  variantId: readInteger(row.variant_id),
  supplierId: readInteger(row.supplier_id),
  agentId: readInteger(row.agent_id),
  warehouseId: readInteger(row.warehouse_id),
  weightMilli: readInteger(row.weight_milli),
  collectedAt: readTimestamp(row.collected_at),
  notes: row.notes,
});

export const toTransferItem = (row: InventoryTransferItemRow): InventoryTransferItem => ({
  id: readInteger(row.id),
  transferId: readInteger(row.transfer_id),
  variantId: readInteger(row.variant_id),
  quantityMilli: readInteger(row.quantity_milli),
});

export const toTransfer = (row: InventoryTransferRow, items: InventoryTransferItemRow[]): InventoryTransfer => ({
  id: readInteger(row.id),
  sourceWarehouseId: readInteger(row.source_warehouse_id),
  destinationWarehouseId: readInteger(row.destination_warehouse_id),
  authorizedByUserId: readInteger(row.authorized_by_user_id),
  transferredAt: readTimestamp(row.transferred_at),
  status: readEnum(TransferStatusValues, row.status, 'inventory_transfers.status'),
  items: items.map(toTransferItem),
});
