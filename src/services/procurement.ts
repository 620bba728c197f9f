import { Knex } from 'knex';
import { InvalidInputError, InvalidTransitionError, NotFoundError } from '../domain/errors';
import { countRows } from '../db/count';
import { InsertedId, ProcurementItemRow, ProcurementRow, toProcurement } from '../db/tables';
import { Page, Procurement, ProcurementItem, ProcurementStatus, ProcurementStatusValues } from '../types/entities';
import { calculateTotalCostCents, readInteger } from '../utils/fixedPoint';
import { combineAdjustments } from '../utils/stock';
import { requireSupplier, requireVariant, requireWarehouse } from './catalog';
import { adjustLevel } from './stockLedger';

export type ProcurementItemCommand = {
  variantId: number;
  quantityOrderedMilli: number;
  unitCostCents: number;
};

export type CreateProcurementCommand = {
  supplierId: number;
  warehouseId: number;
  orderedByUserId: number;
  expectedDelivery?: string | null;
  status?: ProcurementStatus;
  items: ProcurementItemCommand[];
  createdAt?: Date;
};

export type ReceiveItemCommand = {
  itemId: number;
  quantityReceivedMilli: number;
};

const TERMINAL_STATUSES: ReadonlySet<ProcurementStatus> = new Set(['received', 'cancelled']);

export const isProcurementStatus = (value: string): value is ProcurementStatus =>
  ProcurementStatusValues.some((status) => status === value);

export const isTerminalStatus = (status: ProcurementStatus): boolean => TERMINAL_STATUSES.has(status);

/**
 * Transitions are caller driven and may skip steps, but nothing leaves a
 * terminal status and a status is never re-entered.
 */
export const canTransition = (from: ProcurementStatus, to: ProcurementStatus): boolean =>
  from !== to && !isTerminalStatus(from);

/** What entering `received` credits for one line. */
export const receivableQuantity = (item: Pick<ProcurementItem, 'quantityOrderedMilli' | 'quantityReceivedMilli'>) =>
  item.quantityReceivedMilli !== 0 ? item.quantityReceivedMilli : item.quantityOrderedMilli;

const loadProcurement = async (db: Knex, id: number, options: { forUpdate?: boolean } = {}) => {
  const query = db<ProcurementRow>('procurements').where({ id }).first();
  const row = await (options.forUpdate ? query.forUpdate() : query);
  if (!row) {
    return null;
  }
  const items = await db<ProcurementItemRow>('procurement_items').where({ procurement_id: id }).orderBy('id', 'asc');
  return toProcurement(row, items);
};

const requireProcurement = async (db: Knex, id: number, options: { forUpdate?: boolean } = {}) => {
  const procurement = await loadProcurement(db, id, options);
  if (!procurement) {
    throw new NotFoundError('PROCUREMENT_NOT_FOUND', `Procurement ${id} not found`);
  }
  return procurement;
};

export const createProcurement = async (db: Knex, command: CreateProcurementCommand): Promise<Procurement> =>
  db.transaction(async (trx) => {
    await requireSupplier(trx, command.supplierId);
    await requireWarehouse(trx, command.warehouseId);

    for (const item of command.items) {
      if (item.quantityOrderedMilli <= 0) {
        throw new InvalidInputError(`Quantity ordered for variant ${item.variantId} must be greater than zero`);
      }
      await requireVariant(trx, item.variantId);
    }

    if (!Number.isSafeInteger(calculateTotalCostCents(command.items))) {
      throw new InvalidInputError('Procurement total cost is out of range');
    }

    // Creating straight into `received` would bypass the ledger credit.
    const status = command.status ?? 'pending';
    if (isTerminalStatus(status)) {
      throw new InvalidInputError(`A procurement cannot be created as ${status}`);
    }

    const [inserted] = await trx<ProcurementRow>('procurements')
      .insert({
        supplier_id: command.supplierId,
        warehouse_id: command.warehouseId,
        ordered_by_user_id: command.orderedByUserId,
        created_at: command.createdAt ?? new Date(),
        expected_delivery: command.expectedDelivery ?? null,
        status,
      })
      .returning<InsertedId[]>('id');

    if (!inserted) {
      throw new Error('Procurement insert returned no id');
    }
    const procurementId = readInteger(inserted.id);

    await trx<ProcurementItemRow>('procurement_items').insert(
      command.items.map((item) => ({
        procurement_id: procurementId,
        variant_id: item.variantId,
        quantity_ordered_milli: item.quantityOrderedMilli,
        quantity_received_milli: 0,
        unit_cost_cents: item.unitCostCents,
      })),
    );

    return requireProcurement(trx, procurementId);
  });

export const getProcurement = async (db: Knex, id: number): Promise<Procurement> => requireProcurement(db, id);

/**
 * Moves a procurement to `status`. Entering `received` credits every line to
 * the procurement's warehouse before the status is written, in the same
 * transaction, so a failed credit leaves the status untouched.
 */
export const updateProcurementStatus = async (db: Knex, id: number, status: string): Promise<Procurement> => {
  if (!isProcurementStatus(status)) {
    throw new InvalidInputError(`Unknown procurement status: ${status}`, { status });
  }

  return db.transaction(async (trx) => {
    const procurement = await requireProcurement(trx, id, { forUpdate: true });

    if (!canTransition(procurement.status, status)) {
      throw new InvalidTransitionError(procurement.status, status);
    }

    if (status === 'received') {
      const credits = combineAdjustments(
        procurement.items.map((item) => ({ variantId: item.variantId, deltaMilli: receivableQuantity(item) })),
      );
      for (const credit of credits) {
        await adjustLevel(trx, procurement.warehouseId, credit.variantId, credit.deltaMilli);
      }
    }

    await trx<ProcurementRow>('procurements').where({ id }).update({ status });

    return requireProcurement(trx, id);
  });
};

/**
 * Records delivered quantities per line. The ledger is not touched: stock is
 * credited only when the procurement moves to `received`.
 */
export const receiveProcurementItems = async (
  db: Knex,
  id: number,
  items: ReceiveItemCommand[],
): Promise<Procurement> =>
  db.transaction(async (trx) => {
    const procurement = await requireProcurement(trx, id, { forUpdate: true });

    if (isTerminalStatus(procurement.status)) {
      throw new InvalidInputError(`Procurement ${id} is ${procurement.status} and cannot take receipts`);
    }

    const lineIds = new Set(procurement.items.map((item) => item.id));
    for (const item of items) {
      if (!lineIds.has(item.itemId)) {
        throw new InvalidInputError(`Item ${item.itemId} does not belong to procurement ${id}`, {
          itemId: String(item.itemId),
        });
      }
      if (item.quantityReceivedMilli < 0) {
        throw new InvalidInputError(`Received quantity for item ${item.itemId} cannot be negative`);
      }
    }

    for (const item of items) {
      await trx<ProcurementItemRow>('procurement_items')
        .where({ id: item.itemId, procurement_id: id })
        .update({ quantity_received_milli: item.quantityReceivedMilli });
    }

    return requireProcurement(trx, id);
  });

export type ListProcurementsQuery = {
  supplierId?: number;
  status?: ProcurementStatus;
  offset: number;
  limit: number;
};

export const listProcurements = async (db: Knex, query: ListProcurementsQuery): Promise<Page<Procurement>> => {
  const filtered = () => {
    const builder = db<ProcurementRow>('procurements');
    if (query.supplierId !== undefined) {
      builder.where('supplier_id', query.supplierId);
    }
    if (query.status) {
      builder.where('status', query.status);
    }
    return builder;
  };

  const total = await countRows(filtered());
  const rows = await filtered()
    .orderBy('created_at', 'desc')
    .orderBy('id', 'desc')
    .offset(query.offset)
    .limit(query.limit);

  const ids = rows.map((row) => readInteger(row.id));
  const itemRows =
    ids.length > 0
      ? await db<ProcurementItemRow>('procurement_items').whereIn('procurement_id', ids).orderBy('id', 'asc')
      : [];

  return {
    items: rows.map((row) =>
      toProcurement(
        row,
        itemRows.filter((item) => readInteger(item.procurement_id) === readInteger(row.id)),
      ),
    ),
    total,
  };
};
