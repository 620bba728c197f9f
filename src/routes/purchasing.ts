import { FastifyInstance } from 'fastify';
import { actingUserId, requireAuth } from '../middleware/authGuard';
import {
  createProcurement,
  getProcurement,
  listProcurements,
  receiveProcurementItems,
  updateProcurementStatus,
} from '../services/procurement';
import {
  CreateProcurementBodySchema,
  ListProcurementsQuerySchema,
  ReceiveProcurementBodySchema,
  UpdateProcurementStatusBodySchema,
} from '../types/purchasingContracts';
import { IdParamsSchema } from '../types/sharedContracts';
import { toCents, toMilli } from '../utils/fixedPoint';
import { presentProcurement } from '../utils/presenters';
import { ok, paged, toOffset } from '../utils/response';

const registerPurchasingRoutes = async (fastify: FastifyInstance): Promise<void> => {
  fastify.post('/api/procurements', { preHandler: requireAuth }, async (request, reply) => {
    const body = CreateProcurementBodySchema.parse(request.body);

    const procurement = await createProcurement(fastify.db, {
      supplierId: body.supplierId,
      warehouseId: body.warehouseId,
      orderedByUserId: actingUserId(request),
      expectedDelivery: body.expectedDelivery ?? null,
      items: body.items.map((item) => ({
        variantId: item.variantId,
        quantityOrderedMilli: toMilli(item.quantityOrdered),
        unitCostCents: toCents(item.unitCost),
      })),
    });

    request.log.info({ procurementId: procurement.id, supplierId: procurement.supplierId }, 'Procurement created');
    reply.code(201).send(ok(presentProcurement(procurement), 'Procurement created'));
  });

  fastify.get('/api/procurements', { preHandler: requireAuth }, async (request) => {
    const query = ListProcurementsQuerySchema.parse(request.query);
    const page = await listProcurements(fastify.db, {
      supplierId: query.supplierId,
      status: query.status,
      ...toOffset(query),
    });
    return paged(page.items.map(presentProcurement), query, page.total);
  });

  fastify.get('/api/procurements/:id', { preHandler: requireAuth }, async (request) => {
    const params = IdParamsSchema.parse(request.params);
    return ok(presentProcurement(await getProcurement(fastify.db, params.id)));
  });

  fastify.patch('/api/procurements/:id/status', { preHandler: requireAuth }, async (request) => {
    const params = IdParamsSchema.parse(request.params);
    const body = UpdateProcurementStatusBodySchema.parse(request.body);

    const procurement = await updateProcurementStatus(fastify.db, params.id, body.status);

    request.log.info({ procurementId: procurement.id, status: procurement.status }, 'Procurement status updated');
    return ok(presentProcurement(procurement), 'Procurement status updated');
  });

  fastify.post('/api/procurements/:id/receive', { preHandler: requireAuth }, async (request) => {
    const params = IdParamsSchema.parse(request.params);
    const body = ReceiveProcurementBodySchema.parse(request.body);

    const procurement = await receiveProcurementItems(
      fastify.db,
      params.id,
      body.items.map((item) => ({ itemId: item.itemId, quantityReceivedMilli: toMilli(item.quantityReceived) })),
    );

    request.log.info({ procurementId: procurement.id, lines: body.items.length }, 'Procurement receipts recorded');
    return ok(presentProcurement(procurement), 'Procurement receipts recorded');
  });
};

export default registerPurchasingRoutes;
