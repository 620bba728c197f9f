import { Knex } from 'knex';
import { InsufficientStockError, InvalidInputError, NotFoundError, SameWarehouseError } from '../domain/errors';
import { countRows } from '../db/count';
import { InsertedId, InventoryTransferItemRow, InventoryTransferRow, toTransfer } from '../db/tables';
import { InventoryTransfer, Page } from '../types/entities';
import { readInteger } from '../utils/fixedPoint';
import { findShortfall, LedgerAdjustment, toRequirements } from '../utils/stock';
import { requireVariant, requireWarehouse } from './catalog';
import { applyAdjustments, lockLevels } from './stockLedger';

export type TransferLineCommand = {
  variantId: number;
  quantityMilli: number;
};

export type TransferStockCommand = {
  sourceWarehouseId: number;
  destinationWarehouseId: number;
  authorizedByUserId: number;
  items: TransferLineCommand[];
  transferredAt?: Date;
};

const loadTransfer = async (db: Knex, id: number): Promise<InventoryTransfer | null> => {
  const row = await db<InventoryTransferRow>('inventory_transfers').where({ id }).first();
  if (!row) {
    return null;
  }
  const items = await db<InventoryTransferItemRow>('inventory_transfer_items')
    .where({ transfer_id: id })
    .orderBy('id', 'asc');
  return toTransfer(row, items);
};

/**
 * Moves stock between two warehouses. Either every line moves or nothing
 * does: the source is checked under lock against the summed quantity per
 * variant before the transfer row, the debit and the credit are written.
 */
export const transferStock = async (db: Knex, command: TransferStockCommand): Promise<InventoryTransfer> => {
  if (command.sourceWarehouseId === command.destinationWarehouseId) {
    throw new SameWarehouseError();
  }

  return db.transaction(async (trx) => {
    await requireWarehouse(trx, command.sourceWarehouseId);
    await requireWarehouse(trx, command.destinationWarehouseId);

    const debits: LedgerAdjustment[] = [];
    for (const item of command.items) {
      if (item.quantityMilli <= 0) {
        throw new InvalidInputError(`Transfer quantity for variant ${item.variantId} must be greater than zero`);
      }
      await requireVariant(trx, item.variantId);
      debits.push({ variantId: item.variantId, deltaMilli: -item.quantityMilli });
    }

    const requirements = toRequirements(debits);
    const onHand = await lockLevels(
      trx,
      command.sourceWarehouseId,
      requirements.map((requirement) => requirement.variantId),
    );
    const shortfall = findShortfall(requirements, onHand);
    if (shortfall) {
      throw new InsufficientStockError(command.sourceWarehouseId, shortfall.variantId);
    }

    const [inserted] = await trx<InventoryTransferRow>('inventory_transfers')
      .insert({
        source_warehouse_id: command.sourceWarehouseId,
        destination_warehouse_id: command.destinationWarehouseId,
        authorized_by_user_id: command.authorizedByUserId,
        transferred_at: command.transferredAt ?? new Date(),
        status: 'pending',
      })
      .returning<InsertedId[]>('id');

    if (!inserted) {
      throw new Error('Transfer insert returned no id');
    }
    const transferId = readInteger(inserted.id);

    await trx<InventoryTransferItemRow>('inventory_transfer_items').insert(
      command.items.map((item) => ({
        transfer_id: transferId,
        variant_id: item.variantId,
        quantity_milli: item.quantityMilli,
      })),
    );

    await applyAdjustments(trx, command.sourceWarehouseId, debits);
    await applyAdjustments(
      trx,
      command.destinationWarehouseId,
      debits.map((debit) => ({ variantId: debit.variantId, deltaMilli: -debit.deltaMilli })),
    );

    await trx<InventoryTransferRow>('inventory_transfers').where({ id: transferId }).update({ status: 'completed' });

    const transfer = await loadTransfer(trx, transferId);
    if (!transfer) {
      throw new Error(`Transfer ${transferId} vanished inside its own transaction`);
    }
    return transfer;
  });
};

export const getTransfer = async (db: Knex, id: number): Promise<InventoryTransfer> => {
  const transfer = await loadTransfer(db, id);
  if (!transfer) {
    throw new NotFoundError('TRANSFER_NOT_FOUND', `Transfer ${id} not found`);
  }
  return transfer;
};

export type ListTransfersQuery = {
  warehouseId?: number;
  offset: number;
  limit: number;
};

export const listTransfers = async (db: Knex, query: ListTransfersQuery): Promise<Page<InventoryTransfer>> => {
  const filtered = () => {
    const builder = db<InventoryTransferRow>('inventory_transfers');
    const { warehouseId } = query;
    if (warehouseId !== undefined) {
      builder.where((scope) =>
        scope.where('source_warehouse_id', warehouseId).orWhere('destination_warehouse_id', warehouseId),
      );
    }
    return builder;
  };

  const total = await countRows(filtered());
  const rows = await filtered()
    .orderBy('transferred_at', 'desc')
    .orderBy('id', 'desc')
    .offset(query.offset)
    .limit(query.limit);

  const ids = rows.map((row) => readInteger(row.id));
  const itemRows =
    ids.length > 0
      ? await db<InventoryTransferItemRow>('inventory_transfer_items').whereIn('transfer_id', ids).orderBy('id', 'asc')
      : [];

  return {
    items: rows.map((row) =>
      toTransfer(
        row,
        itemRows.filter((item) => readInteger(item.transfer_id) === readInteger(row.id)),
      ),
    ),
    total,
  };
};
