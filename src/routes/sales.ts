import { FastifyInstance } from 'fastify';
import { actingUserId, requireAuth } from '../middleware/authGuard';
import { getSale, listSales, processSale } from '../services/sales';
import { CreateSaleBodySchema, ListSalesQuerySchema } from '../types/salesContracts';
import { IdParamsSchema } from '../types/sharedContracts';
import { toCents, toMilli } from '../utils/fixedPoint';
import { presentSale } from '../utils/presenters';
import { ok, paged, toOffset } from '../utils/response';

const registerSalesRoutes = async (fastify: FastifyInstance): Promise<void> => {
  fastify.post('/api/sales', { preHandler: requireAuth }, async (request, reply) => {
    const body = CreateSaleBodySchema.parse(request.body);

    const sale = await processSale(fastify.db, {
      warehouseId: body.warehouseId,
      customerName: body.customerName ?? null,
      taxCents: toCents(body.taxAmount),
      discountCents: toCents(body.discountAmount),
      paymentMethod: body.paymentMethod,
      processedByUserId: actingUserId(request),
      items: body.items.map((item) => ({
        variantId: item.variantId,
        quantityMilli: toMilli(item.quantity),
        unitPriceCents: item.unitPrice === undefined ? undefined : toCents(item.unitPrice),
      })),
    });

    request.log.info(
      { saleId: sale.id, warehouseId: sale.warehouseId, totalCents: sale.totalCents },
      'Sale processed',
    );
    reply.code(201).send(ok(presentSale(sale), 'Sale processed'));
  });

  fastify.get('/api/sales', { preHandler: requireAuth }, async (request) => {
    const query = ListSalesQuerySchema.parse(request.query);
    const page = await listSales(fastify.db, {
      warehouseId: query.warehouseId,
      from: query.from,
      to: query.to,
      ...toOffset(query),
    });
    return paged(page.items.map(presentSale), query, page.total);
  });

  fastify.get('/api/sales/:id', { preHandler: requireAuth }, async (request) => {
    const params = IdParamsSchema.parse(request.params);
    return ok(presentSale(await getSale(fastify.db, params.id)));
  });
};

export default registerSalesRoutes;
