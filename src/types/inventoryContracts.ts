import { z } from 'zod';
import { dateOnlySchema, idSchema, MAX_QUANTITY, quantitySchema, signedQuantitySchema } from './sharedContracts';
import { PaginationQuerySchema } from '../utils/response';

export const ListLevelsQuerySchema = PaginationQuerySchema.extend({
  warehouseId: idSchema('warehouseId').optional(),
});

export const LevelParamsSchema = z.object({
  warehouseId: idSchema('warehouseId'),
  variantId: idSchema('variantId'),
});

export const VariantLevelsParamsSchema = z.object({
  variantId: idSchema('variantId'),
});

export const ExpiringQuerySchema = z.object({
  days: z.coerce.number().int().min(0).max(3650).default(30),
});

export const LowStockQuerySchema = z.object({
  threshold: z.coerce.number().finite().min(0).max(MAX_QUANTITY).optional(),
  warehouseId: idSchema('warehouseId').optional(),
});

export const AdjustStockBodySchema = z.object({
  warehouseId: idSchema('warehouseId'),
  variantId: idSchema('variantId'),
  delta: signedQuantitySchema('delta'),
  batchNumber: z.string().trim().min(1).max(100).optional(),
  expiryDate: dateOnlySchema.optional(),
});

export type AdjustStockBody = z.infer<typeof AdjustStockBodySchema>;

export const CreateTransferBodySchema = z.object({
  sourceWarehouseId: idSchema('sourceWarehouseId'),
  destinationWarehouseId: idSchema('destinationWarehouseId'),
  items: z
    .array(
      z.object({
        variantId: idSchema('variantId'),
        quantity: quantitySchema('quantity'),
      }),
    )
    .min(1, 'At least one item is required'),
});

export type CreateTransferBody = z.infer<typeof CreateTransferBodySchema>;

export const ListTransfersQuerySchema = PaginationQuerySchema.extend({
  warehouseId: idSchema('warehouseId').optional(),
});
