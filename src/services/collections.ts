import { Knex } from 'knex';
import { InvalidInputError } from '../domain/errors';
import { countRows } from '../db/count';
import { CollectionRow, InsertedId, toCollection } from '../db/tables';
import { Collection, Page } from '../types/entities';
import { readInteger } from '../utils/fixedPoint';
import { requireSupplier, requireVariant, requireWarehouse } from './catalog';
import { adjustLevel } from './stockLedger';

export type RecordCollectionCommand = {
  variantId: number;
  supplierId: number;
  agentId: number;
  warehouseId?: number;
  weightMilli: number;
  collectedAt?: Date;
  notes?: string | null;
};

export type CollectionOptions = {
  /** Where collections land when the agent does not name a warehouse. */
  defaultWarehouseId: number;
};

/**
 * Books a field collection and credits its weight to the warehouse ledger.
 * The weight is credited as-is against the collected variant.
 */
export const recordCollection = async (
  db: Knex,
  command: RecordCollectionCommand,
  options: CollectionOptions,
): Promise<Collection> => {
  if (command.weightMilli <= 0) {
    throw new InvalidInputError('Collected weight must be greater than zero');
  }

  const warehouseId = command.warehouseId ?? options.defaultWarehouseId;

  return db.transaction(async (trx) => {
    await requireVariant(trx, command.variantId);
    await requireSupplier(trx, command.supplierId);
    await requireWarehouse(trx, warehouseId);

    const [inserted] = await trx<CollectionRow>('collections')
      .insert({
        variant_id: command.variantId,
        supplier_id: command.supplierId,
        agent_id: command.agentId,
        warehouse_id: warehouseId,
        weight_milli: command.weightMilli,
        collected_at: command.collectedAt ?? new Date(),
        notes: command.notes ?? null,
      })
      .returning<InsertedId[]>('id');

    if (!inserted) {
      throw new Error('Collection insert returned no id');
    }

    await adjustLevel(trx, warehouseId, command.variantId, command.weightMilli);

    const row = await trx<CollectionRow>('collections').where({ id: readInteger(inserted.id) }).first();
    if (!row) {
      throw new Error(`Collection ${String(inserted.id)} vanished inside its own transaction`);
    }
    return toCollection(row);
  });
};

export type ListCollectionsQuery = {
  supplierId?: number;
  offset: number;
  limit: number;
};

export const listCollections = async (db: Knex, query: ListCollectionsQuery): Promise<Page<Collection>> => {
  const filtered = () => {
    const builder = db<CollectionRow>('collections');
    if (query.supplierId !== undefined) {
      builder.where('supplier_id', query.supplierId);
    }
    return builder;
  };

  const total = await countRows(filtered());
  const rows = await filtered()
    .orderBy('collected_at', 'desc')
    .orderBy('id', 'desc')
    .offset(query.offset)
    .limit(query.limit);

  return { items: rows.map(toCollection), total };
};
