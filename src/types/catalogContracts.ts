import { z } from 'zod';
import { WarehouseTypeValues } from './entities';
import { amountSchema, finiteNumberSchema, idSchema, MAX_CONVERSION_FACTOR } from './sharedContracts';
import { PaginationQuerySchema } from '../utils/response';

export const FamilyVariantsParamsSchema = z.object({
  id: idSchema('id'),
});

export const CreateVariantBodySchema = z.object({
  familyId: idSchema('familyId'),
  name: z.string().trim().min(1, 'name is required').max(100),
  sku: z.string().trim().min(1, 'sku is required').max(100),
  barcode: z.string().trim().min(1).max(100).optional(),
  unit: z.string().trim().min(1).max(30).default('unit'),
  costPrice: amountSchema('costPrice').default(0),
  sellingPrice: amountSchema('sellingPrice').default(0),
  isManufactured: z.boolean().default(false),
  // How many base units one of this variant holds; 1 marks the base unit.
  conversionFactor: finiteNumberSchema('conversionFactor')
    .min(0, 'conversionFactor must be non-negative')
    .max(MAX_CONVERSION_FACTOR, `conversionFactor cannot exceed ${MAX_CONVERSION_FACTOR}`)
    .default(1),
});

export type CreateVariantBody = z.infer<typeof CreateVariantBodySchema>;

const nameSchema = z.string().trim().min(2, 'name must be at least 2 characters').max(100);

export const CreateWarehouseBodySchema = z.object({
  name: nameSchema,
  type: z.enum(WarehouseTypeValues),
  address: z.string().trim().max(500).optional(),
});

export const ListWarehousesQuerySchema = z.object({
  type: z.enum(WarehouseTypeValues).optional(),
});

export const CreateSupplierBodySchema = z.object({
  name: nameSchema,
  phone: z.string().trim().max(20).optional(),
  location: z.string().trim().max(200).optional(),
});

export const CreateCategoryBodySchema = z.object({
  name: nameSchema,
});

export const CreateFamilyBodySchema = z.object({
  categoryId: idSchema('categoryId'),
  name: nameSchema,
  description: z.string().trim().max(2000).optional(),
});

export const ListFamiliesQuerySchema = PaginationQuerySchema.extend({
  categoryId: idSchema('categoryId').optional(),
});
