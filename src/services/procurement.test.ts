import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { Knex } from 'knex';
import { InvalidInputError, InvalidTransitionError } from '../domain/errors';
import {
  createTestDatabase,
  readStock,
  seedFamily,
  seedSupplier,
  seedVariant,
  seedWarehouse,
} from '../test-utils/database';
import {
  canTransition,
  createProcurement,
  CreateProcurementCommand,
  getProcurement,
  listProcurements,
  receivableQuantity,
  receiveProcurementItems,
  updateProcurementStatus,
} from './procurement';

describe('procurement rules', () => {
  it('never leaves a terminal status', () => {
    expect(canTransition('pending', 'received')).toBe(true);
    expect(canTransition('ordered', 'partial')).toBe(true);
    expect(canTransition('partial', 'cancelled')).toBe(true);
    expect(canTransition('received', 'pending')).toBe(false);
    expect(canTransition('cancelled', 'approved')).toBe(false);
    expect(canTransition('approved', 'approved')).toBe(false);
  });

  it('credits received quantities when recorded and ordered quantities otherwise', () => {
    expect(receivableQuantity({ quantityOrderedMilli: 100_000, quantityReceivedMilli: 0 })).toBe(100_000);
    expect(receivableQuantity({ quantityOrderedMilli: 100_000, quantityReceivedMilli: 60_000 })).toBe(60_000);
  });
});

describe('procurement processor', () => {
  let db: Knex;
  let warehouseId: number;
  let supplierId: number;
  let riceId: number;

  const orderOf = (
    quantityOrderedMilli: number,
    overrides: Partial<CreateProcurementCommand> = {},
  ): CreateProcurementCommand => ({
    supplierId,
    warehouseId,
    orderedByUserId: 3,
    items: [{ variantId: riceId, quantityOrderedMilli, unitCostCents: 4_200 }],
    ...overrides,
  });

  beforeEach(async () => {
    db = await createTestDatabase();
    warehouseId = await seedWarehouse(db);
    supplierId = await seedSupplier(db);
    riceId = await seedVariant(db, await seedFamily(db));
  });

  afterEach(async () => {
    await db.destroy();
  });

  it('creates pending procurements', async () => {
    const procurement = await createProcurement(db, orderOf(100_000, { expectedDelivery: '2026-04-01' }));

    expect(procurement.status).toBe('pending');
    expect(procurement.expectedDelivery).toBe('2026-04-01');
    expect(procurement.items).toEqual([
      {
        id: procurement.items[0]?.id,
        procurementId: procurement.id,
        variantId: riceId,
        quantityOrderedMilli: 100_000,
        quantityReceivedMilli: 0,
        unitCostCents: 4_200,
      },
    ]);
    expect(await readStock(db, warehouseId, riceId)).toBe(0);
  });

  it('credits the ordered quantity when received without item receipts', async () => {
    const procurement = await createProcurement(db, orderOf(100_000));

    const received = await updateProcurementStatus(db, procurement.id, 'received');

    expect(received.status).toBe('received');
    expect(await readStock(db, warehouseId, riceId)).toBe(100_000);
  });

  it('credits the recorded quantity after a partial receipt', async () => {
    const procurement = await createProcurement(db, orderOf(100_000));
    const [line] = procurement.items;
    if (!line) {
      throw new Error('expected a procurement line');
    }

    const partial = await receiveProcurementItems(db, procurement.id, [{ itemId: line.id, quantityReceivedMilli: 60_000 }]);
    expect(partial.items[0]?.quantityReceivedMilli).toBe(60_000);
    expect(await readStock(db, warehouseId, riceId)).toBe(0);

    await updateProcurementStatus(db, procurement.id, 'partial');
    await updateProcurementStatus(db, procurement.id, 'received');

    expect(await readStock(db, warehouseId, riceId)).toBe(60_000);
  });

  it('refuses transitions out of terminal statuses without touching stock', async () => {
    const procurement = await createProcurement(db, orderOf(10_000));
    await updateProcurementStatus(db, procurement.id, 'received');

    await expect(updateProcurementStatus(db, procurement.id, 'received')).rejects.toBeInstanceOf(
      InvalidTransitionError,
    );
    await expect(updateProcurementStatus(db, procurement.id, 'pending')).rejects.toBeInstanceOf(
      InvalidTransitionError,
    );
    expect(await readStock(db, warehouseId, riceId)).toBe(10_000);

    const cancelled = await createProcurement(db, orderOf(10_000));
    await updateProcurementStatus(db, cancelled.id, 'cancelled');
    await expect(updateProcurementStatus(db, cancelled.id, 'received')).rejects.toBeInstanceOf(
      InvalidTransitionError,
    );
    expect(await readStock(db, warehouseId, riceId)).toBe(10_000);
  });

  it('rejects unknown statuses', async () => {
    const procurement = await createProcurement(db, orderOf(10_000));
    await expect(updateProcurementStatus(db, procurement.id, 'shipped')).rejects.toBeInstanceOf(InvalidInputError);
  });

  it('validates receipts', async () => {
    const procurement = await createProcurement(db, orderOf(10_000));
    const [line] = procurement.items;
    if (!line) {
      throw new Error('expected a procurement line');
    }

    await expect(
      receiveProcurementItems(db, procurement.id, [{ itemId: line.id + 100, quantityReceivedMilli: 1_000 }]),
    ).rejects.toBeInstanceOf(InvalidInputError);
    await expect(
      receiveProcurementItems(db, procurement.id, [{ itemId: line.id, quantityReceivedMilli: -1 }]),
    ).rejects.toBeInstanceOf(InvalidInputError);

    await updateProcurementStatus(db, procurement.id, 'cancelled');
    await expect(
      receiveProcurementItems(db, procurement.id, [{ itemId: line.id, quantityReceivedMilli: 1_000 }]),
    ).rejects.toBeInstanceOf(InvalidInputError);
  });

  it('validates new procurements', async () => {
    await expect(createProcurement(db, orderOf(0))).rejects.toBeInstanceOf(InvalidInputError);
    await expect(createProcurement(db, orderOf(1_000, { supplierId: 99 }))).rejects.toMatchObject({
      code: 'SUPPLIER_NOT_FOUND',
    });
    await expect(createProcurement(db, orderOf(1_000, { status: 'received' }))).rejects.toBeInstanceOf(
      InvalidInputError,
    );
  });

  it('lists and fetches procurements', async () => {
    const first = await createProcurement(db, orderOf(1_000, { createdAt: new Date('2026-02-01T00:00:00Z') }));
    const second = await createProcurement(db, orderOf(2_000, { createdAt: new Date('2026-02-02T00:00:00Z') }));
    await updateProcurementStatus(db, first.id, 'approved');

    const approved = await listProcurements(db, { status: 'approved', offset: 0, limit: 10 });
    expect(approved.total).toBe(1);
    expect(approved.items.map((procurement) => procurement.id)).toEqual([first.id]);

    const all = await listProcurements(db, { supplierId, offset: 0, limit: 10 });
    expect(all.items.map((procurement) => procurement.id)).toEqual([second.id, first.id]);
    expect(all.items[0]?.items[0]?.quantityOrderedMilli).toBe(2_000);

    expect((await getProcurement(db, second.id)).status).toBe('pending');
    await expect(getProcurement(db, 404)).rejects.toMatchObject({ code: 'PROCUREMENT_NOT_FOUND' });
  });
});
