import { FastifyInstance } from 'fastify';
import { actingUserId, requireAuth } from '../middleware/authGuard';
import { listCollections, recordCollection } from '../services/collections';
import { CreateCollectionBodySchema, ListCollectionsQuerySchema } from '../types/collectionContracts';
import { toMilli } from '../utils/fixedPoint';
import { presentCollection } from '../utils/presenters';
import { ok, paged, toOffset } from '../utils/response';

const registerCollectionRoutes = async (fastify: FastifyInstance): Promise<void> => {
  fastify.post('/api/collections', { preHandler: requireAuth }, async (request, reply) => {
    const body = CreateCollectionBodySchema.parse(request.body);

    const collection = await recordCollection(
      fastify.db,
      {
        variantId: body.variantId,
        supplierId: body.supplierId,
        agentId: actingUserId(request),
        warehouseId: body.warehouseId,
        weightMilli: toMilli(body.weight),
        collectedAt: body.collectedAt,
        notes: body.notes ?? null,
      },
      { defaultWarehouseId: fastify.stockSettings.defaultWarehouseId },
    );

    request.log.info(
      { collectionId: collection.id, warehouseId: collection.warehouseId, weightMilli: collection.weightMilli },
      'Collection recorded',
    );
    reply.code(201).send(ok(presentCollection(collection), 'Collection recorded'));
  });

  fastify.get('/api/collections', { preHandler: requireAuth }, async (request) => {
    const query = ListCollectionsQuerySchema.parse(request.query);
    const page = await listCollections(fastify.db, { supplierId: query.supplierId, ...toOffset(query) });
    return paged(page.items.map(presentCollection), query, page.total);
  });
};

export default registerCollectionRoutes;
