import { FastifyInstance } from 'fastify';
import { requireAuth } from '../middleware/authGuard';
import {
  createCategory,
  createFamily,
  createSupplier,
  createVariant,
  createWarehouse,
  listCategories,
  listFamilies,
  listFamilyVariants,
  listSuppliers,
  listWarehouses,
  requireCategory,
  requireFamily,
  requireSupplier,
  requireVariant,
  requireWarehouse,
} from '../services/catalog';
import {
  CreateCategoryBodySchema,
  CreateFamilyBodySchema,
  CreateSupplierBodySchema,
  CreateVariantBodySchema,
  CreateWarehouseBodySchema,
  FamilyVariantsParamsSchema,
  ListFamiliesQuerySchema,
  ListWarehousesQuerySchema,
} from '../types/catalogContracts';
import { IdParamsSchema } from '../types/sharedContracts';
import { toCents, toMilli } from '../utils/fixedPoint';
import { presentVariant } from '../utils/presenters';
import { ok, paged, PaginationQuerySchema, toOffset } from '../utils/response';

const registerCatalogRoutes = async (fastify: FastifyInstance): Promise<void> => {
  fastify.get('/api/warehouses', { preHandler: requireAuth }, async (request) => {
    const query = ListWarehousesQuerySchema.parse(request.query);
    return ok(await listWarehouses(fastify.db, query.type));
  });

  fastify.get('/api/warehouses/:id', { preHandler: requireAuth }, async (request) => {
    const params = IdParamsSchema.parse(request.params);
    return ok(await requireWarehouse(fastify.db, params.id));
  });

  fastify.post('/api/warehouses', { preHandler: requireAuth }, async (request, reply) => {
    const body = CreateWarehouseBodySchema.parse(request.body);
    const warehouse = await createWarehouse(fastify.db, body);
    request.log.info({ warehouseId: warehouse.id, type: warehouse.type }, 'Warehouse created');
    reply.code(201).send(ok(warehouse, 'Warehouse created'));
  });

  fastify.get('/api/suppliers', { preHandler: requireAuth }, async (request) => {
    const query = PaginationQuerySchema.parse(request.query);
    const page = await listSuppliers(fastify.db, toOffset(query));
    return paged(page.items, query, page.total);
  });

  fastify.get('/api/suppliers/:id', { preHandler: requireAuth }, async (request) => {
    const params = IdParamsSchema.parse(request.params);
    return ok(await requireSupplier(fastify.db, params.id));
  });

  fastify.post('/api/suppliers', { preHandler: requireAuth }, async (request, reply) => {
    const body = CreateSupplierBodySchema.parse(request.body);
    const supplier = await createSupplier(fastify.db, body);
    request.log.info({ supplierId: supplier.id }, 'Supplier created');
    reply.code(201).send(ok(supplier, 'Supplier created'));
  });

  fastify.get('/api/categories', { preHandler: requireAuth }, async () => ok(await listCategories(fastify.db)));

  fastify.get('/api/categories/:id', { preHandler: requireAuth }, async (request) => {
    const params = IdParamsSchema.parse(request.params);
    return ok(await requireCategory(fastify.db, params.id));
  });

  fastify.post('/api/categories', { preHandler: requireAuth }, async (request, reply) => {
    const body = CreateCategoryBodySchema.parse(request.body);
    const category = await createCategory(fastify.db, body.name);
    request.log.info({ categoryId: category.id }, 'Category created');
    reply.code(201).send(ok(category, 'Category created'));
  });

  fastify.get('/api/families', { preHandler: requireAuth }, async (request) => {
    const query = ListFamiliesQuerySchema.parse(request.query);
    const page = await listFamilies(fastify.db, { categoryId: query.categoryId, ...toOffset(query) });
    return paged(page.items, query, page.total);
  });

  fastify.get('/api/families/:id', { preHandler: requireAuth }, async (request) => {
    const params = IdParamsSchema.parse(request.params);
    return ok(await requireFamily(fastify.db, params.id));
  });

  fastify.post('/api/families', { preHandler: requireAuth }, async (request, reply) => {
    const body = CreateFamilyBodySchema.parse(request.body);
    const family = await createFamily(fastify.db, body);
    request.log.info({ familyId: family.id, categoryId: family.categoryId }, 'Product family created');
    reply.code(201).send(ok(family, 'Product family created'));
  });

  fastify.get('/api/variants/:id', { preHandler: requireAuth }, async (request) => {
    const params = IdParamsSchema.parse(request.params);
    return ok(presentVariant(await requireVariant(fastify.db, params.id)));
  });

  fastify.get('/api/families/:id/variants', { preHandler: requireAuth }, async (request) => {
    const params = FamilyVariantsParamsSchema.parse(request.params);
    await requireFamily(fastify.db, params.id);
    const variants = await listFamilyVariants(fastify.db, params.id);
    return ok(variants.map(presentVariant));
  });

  fastify.post('/api/variants', { preHandler: requireAuth }, async (request, reply) => {
    const body = CreateVariantBodySchema.parse(request.body);

    const variant = await createVariant(fastify.db, {
      familyId: body.familyId,
      name: body.name,
      sku: body.sku,
      barcode: body.barcode,
      unit: body.unit,
      costPriceCents: toCents(body.costPrice),
      sellingPriceCents: toCents(body.sellingPrice),
      isManufactured: body.isManufactured,
      conversionFactorMilli: toMilli(body.conversionFactor),
    });

    request.log.info({ variantId: variant.id, familyId: variant.familyId }, 'Variant created');
    reply.code(201).send(ok(presentVariant(variant), 'Variant created'));
  });
};

export default registerCatalogRoutes;
