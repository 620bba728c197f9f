import { FastifyInstance } from 'fastify';
import { actingUserId, requireAuth } from '../middleware/authGuard';
import {
  adjustStock,
  getInventoryLevel,
  listExpiring,
  listLevels,
  listLevelsForVariant,
  listLowStock,
} from '../services/inventory';
import { getTransfer, listTransfers, transferStock } from '../services/transfers';
import {
  AdjustStockBodySchema,
  CreateTransferBodySchema,
  ExpiringQuerySchema,
  LevelParamsSchema,
  ListLevelsQuerySchema,
  ListTransfersQuerySchema,
  LowStockQuerySchema,
  VariantLevelsParamsSchema,
} from '../types/inventoryContracts';
import { IdParamsSchema } from '../types/sharedContracts';
import { toMilli } from '../utils/fixedPoint';
import { presentLevel, presentTransfer } from '../utils/presenters';
import { ok, paged, toOffset } from '../utils/response';

const registerInventoryRoutes = async (fastify: FastifyInstance): Promise<void> => {
  fastify.get('/api/inventory', { preHandler: requireAuth }, async (request) => {
    const query = ListLevelsQuerySchema.parse(request.query);
    const page = await listLevels(fastify.db, { warehouseId: query.warehouseId, ...toOffset(query) });
    return paged(page.items.map(presentLevel), query, page.total);
  });

  fastify.get(
    '/api/inventory/warehouses/:warehouseId/variants/:variantId',
    { preHandler: requireAuth },
    async (request) => {
      const params = LevelParamsSchema.parse(request.params);
      return ok(presentLevel(await getInventoryLevel(fastify.db, params.warehouseId, params.variantId)));
    },
  );

  fastify.get('/api/inventory/variants/:variantId', { preHandler: requireAuth }, async (request) => {
    const params = VariantLevelsParamsSchema.parse(request.params);
    const levels = await listLevelsForVariant(fastify.db, params.variantId);
    return ok(levels.map(presentLevel));
  });

  fastify.get('/api/inventory/expiring', { preHandler: requireAuth }, async (request) => {
    const query = ExpiringQuerySchema.parse(request.query);
    const levels = await listExpiring(fastify.db, query.days);
    return ok(levels.map(presentLevel));
  });

  fastify.get('/api/inventory/low-stock', { preHandler: requireAuth }, async (request) => {
    const query = LowStockQuerySchema.parse(request.query);
    const threshold = query.threshold ?? fastify.stockSettings.lowStockThreshold;
    const levels = await listLowStock(fastify.db, toMilli(threshold), query.warehouseId);
    return ok(levels.map(presentLevel));
  });

  fastify.post('/api/inventory/adjust', { preHandler: requireAuth }, async (request) => {
    const body = AdjustStockBodySchema.parse(request.body);

    const level = await adjustStock(fastify.db, {
      warehouseId: body.warehouseId,
      variantId: body.variantId,
      deltaMilli: toMilli(body.delta),
      batchNumber: body.batchNumber,
      expiryDate: body.expiryDate,
    });

    request.log.info(
      {
        warehouseId: level.warehouseId,
        variantId: level.variantId,
        deltaMilli: toMilli(body.delta),
        userId: actingUserId(request),
      },
      'Inventory adjusted',
    );
    return ok(presentLevel(level), 'Inventory adjusted');
  });

  fastify.post('/api/inventory/transfers', { preHandler: requireAuth }, async (request, reply) => {
    const body = CreateTransferBodySchema.parse(request.body);

    const transfer = await transferStock(fastify.db, {
      sourceWarehouseId: body.sourceWarehouseId,
      destinationWarehouseId: body.destinationWarehouseId,
      authorizedByUserId: actingUserId(request),
      items: body.items.map((item) => ({ variantId: item.variantId, quantityMilli: toMilli(item.quantity) })),
    });

    request.log.info(
      {
        transferId: transfer.id,
        sourceWarehouseId: transfer.sourceWarehouseId,
        destinationWarehouseId: transfer.destinationWarehouseId,
      },
      'Stock transferred',
    );
    reply.code(201).send(ok(presentTransfer(transfer), 'Stock transferred'));
  });

  fastify.get('/api/inventory/transfers', { preHandler: requireAuth }, async (request) => {
    const query = ListTransfersQuerySchema.parse(request.query);
    const page = await listTransfers(fastify.db, { warehouseId: query.warehouseId, ...toOffset(query) });
    return paged(page.items.map(presentTransfer), query, page.total);
  });

  fastify.get('/api/inventory/transfers/:id', { preHandler: requireAuth }, async (request) => {
    const params = IdParamsSchema.parse(request.params);
    return ok(presentTransfer(await getTransfer(fastify.db, params.id)));
  });
};

export default registerInventoryRoutes;
