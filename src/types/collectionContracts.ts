import { z } from 'zod';
import { finiteNumberSchema, idSchema, MAX_QUANTITY } from './sharedContracts';
import { PaginationQuerySchema } from '../utils/response';

// A weight of zero or less is refused by the recorder, which owns that rule.
export const CreateCollectionBodySchema = z.object({
  variantId: idSchema('variantId'),
  supplierId: idSchema('supplierId'),
  warehouseId: idSchema('warehouseId').optional(),
  weight: finiteNumberSchema('weight').max(MAX_QUANTITY, `weight cannot exceed ${MAX_QUANTITY}`),
  collectedAt: z.coerce.date().optional(),
  notes: z.string().trim().max(2000).optional(),
});

export type CreateCollectionBody = z.infer<typeof CreateCollectionBodySchema>;

export const ListCollectionsQuerySchema = PaginationQuerySchema.extend({
  supplierId: idSchema('supplierId').optional(),
});
