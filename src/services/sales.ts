import { Knex } from 'knex';
import { InsufficientStockError, InvalidInputError, NotFoundError } from '../domain/errors';
import { countRows } from '../db/count';
import { InsertedId, SaleItemRow, SaleRow, toSale } from '../db/tables';
import { Page, PaymentMethod, ProductVariant, Sale } from '../types/entities';
import { lineTotalCents, readInteger } from '../utils/fixedPoint';
import { findShortfall, LedgerAdjustment, toRequirements } from '../utils/stock';
import { listFamilyVariants, requireVariant, requireWarehouse } from './catalog';
import { applyAdjustments, lockLevels } from './stockLedger';
import { isBaseUnit, resolveBaseQuantity } from './unitResolution';

export type SaleLineCommand = {
  variantId: number;
  quantityMilli: number;
  /** Falls back to the variant's selling price. */
  unitPriceCents?: number;
};

export type ProcessSaleCommand = {
  warehouseId: number;
  customerName?: string | null;
  taxCents: number;
  discountCents: number;
  paymentMethod: PaymentMethod;
  processedByUserId: number;
  items: SaleLineCommand[];
  createdAt?: Date;
};

type PricedLine = {
  variantId: number;
  quantityMilli: number;
  unitPriceCents: number;
  lineTotalCents: number;
};

export type SaleTotals = {
  subtotalCents: number;
  totalCents: number;
};

export const calculateSaleTotals = (
  lines: Array<Pick<PricedLine, 'lineTotalCents'>>,
  taxCents: number,
  discountCents: number,
): SaleTotals => {
  const subtotalCents = lines.reduce((total, line) => total + line.lineTotalCents, 0);
  return { subtotalCents, totalCents: subtotalCents + taxCents - discountCents };
};

const resolveLine = async (db: Knex, variant: ProductVariant, quantityMilli: number) => {
  const siblings = isBaseUnit(variant) ? [] : await listFamilyVariants(db, variant.familyId);
  return resolveBaseQuantity(variant, quantityMilli, siblings);
};

const loadSale = async (db: Knex, id: number): Promise<Sale | null> => {
  const row = await db<SaleRow>('sales').where({ id }).first();
  if (!row) {
    return null;
  }
  const items = await db<SaleItemRow>('sale_items').where({ sale_id: id }).orderBy('position', 'asc');
  return toSale(row, items);
};

/**
 * Records a sale and takes its stock out of the warehouse in one transaction.
 * Every line is resolved to its family's base unit and checked against a
 * locked ledger read before anything is written; lines sharing a base unit
 * are checked against their combined quantity.
 */
export const processSale = async (db: Knex, command: ProcessSaleCommand): Promise<Sale> =>
  db.transaction(async (trx) => {
    await requireWarehouse(trx, command.warehouseId);

    const pricedLines: PricedLine[] = [];
    const deductions: LedgerAdjustment[] = [];

    for (const item of command.items) {
      if (item.quantityMilli <= 0) {
        throw new InvalidInputError(`Quantity for variant ${item.variantId} must be greater than zero`);
      }

      const variant = await requireVariant(trx, item.variantId);
      const resolved = await resolveLine(trx, variant, item.quantityMilli);
      const unitPriceCents = item.unitPriceCents ?? variant.sellingPriceCents;

      pricedLines.push({
        variantId: variant.id,
        quantityMilli: item.quantityMilli,
        unitPriceCents,
        lineTotalCents: lineTotalCents(item.quantityMilli, unitPriceCents),
      });
      deductions.push({ variantId: resolved.baseVariantId, deltaMilli: -resolved.baseQuantityMilli });
    }

    const requirements = toRequirements(deductions);
    const onHand = await lockLevels(
      trx,
      command.warehouseId,
      requirements.map((requirement) => requirement.variantId),
    );
    const shortfall = findShortfall(requirements, onHand);
    if (shortfall) {
      throw new InsufficientStockError(command.warehouseId, shortfall.variantId);
    }

    const totals = calculateSaleTotals(pricedLines, command.taxCents, command.discountCents);
    if (!Number.isSafeInteger(totals.subtotalCents) || !Number.isSafeInteger(totals.totalCents)) {
      throw new InvalidInputError('Sale total is out of range');
    }
    if (totals.totalCents < 0) {
      throw new InvalidInputError('Discount cannot exceed the sale subtotal plus tax');
    }

    const [inserted] = await trx<SaleRow>('sales')
      .insert({
        warehouse_id: command.warehouseId,
        customer_name: command.customerName ?? null,
        subtotal_cents: totals.subtotalCents,
        tax_cents: command.taxCents,
        discount_cents: command.discountCents,
        total_cents: totals.totalCents,
        payment_method: command.paymentMethod,
        processed_by_user_id: command.processedByUserId,
        created_at: command.createdAt ?? new Date(),
      })
      .returning<InsertedId[]>('id');

    if (!inserted) {
      throw new Error('Sale insert returned no id');
    }
    const saleId = readInteger(inserted.id);

    await trx<SaleItemRow>('sale_items').insert(
      pricedLines.map((line, position) => ({
        sale_id: saleId,
        position,
        variant_id: line.variantId,
        quantity_milli: line.quantityMilli,
        unit_price_cents: line.unitPriceCents,
        line_total_cents: line.lineTotalCents,
      })),
    );

    await applyAdjustments(trx, command.warehouseId, deductions);

    const sale = await loadSale(trx, saleId);
    if (!sale) {
      throw new Error(`Sale ${saleId} vanished inside its own transaction`);
    }
    return sale;
  });

export const getSale = async (db: Knex, id: number): Promise<Sale> => {
  const sale = await loadSale(db, id);
  if (!sale) {
    throw new NotFoundError('SALE_NOT_FOUND', `Sale ${id} not found`);
  }
  return sale;
};

export type ListSalesQuery = {
  warehouseId?: number;
  from?: Date;
  to?: Date;
  offset: number;
  limit: number;
};

export const listSales = async (db: Knex, query: ListSalesQuery): Promise<Page<Sale>> => {
  const filtered = () => {
    const builder = db<SaleRow>('sales');
    if (query.warehouseId !== undefined) {
      builder.where('warehouse_id', query.warehouseId);
    }
    if (query.from) {
      builder.where('created_at', '>=', query.from);
    }
    if (query.to) {
      builder.where('created_at', '<=', query.to);
    }
    return builder;
  };

  const total = await countRows(filtered());
  const rows = await filtered()
    .orderBy('created_at', 'desc')
    .orderBy('id', 'desc')
    .offset(query.offset)
    .limit(query.limit);

  const saleIds = rows.map((row) => readInteger(row.id));
  const itemRows =
    saleIds.length > 0
      ? await db<SaleItemRow>('sale_items').whereIn('sale_id', saleIds).orderBy('position', 'asc')
      : [];

  return {
    items: rows.map((row) =>
      toSale(
        row,
        itemRows.filter((item) => readInteger(item.sale_id) === readInteger(row.id)),
      ),
    ),
    total,
  };
};
