import { z } from 'zod';
import { ProcurementStatusValues } from './entities';
import {
  amountSchema,
  dateOnlySchema,
  finiteNumberSchema,
  idSchema,
  MAX_QUANTITY,
  quantitySchema,
} from './sharedContracts';
import { PaginationQuerySchema } from '../utils/response';

const ProcurementItemSchema = z.object({
  variantId: idSchema('variantId'),
  quantityOrdered: quantitySchema('quantityOrdered'),
  unitCost: amountSchema('unitCost'),
});

export const CreateProcurementBodySchema = z.object({
  supplierId: idSchema('supplierId'),
  warehouseId: idSchema('warehouseId'),
  expectedDelivery: dateOnlySchema.optional(),
  items: z.array(ProcurementItemSchema).min(1, 'At least one item is required'),
});

export type CreateProcurementBody = z.infer<typeof CreateProcurementBodySchema>;

// Unknown statuses are left to the processor so they surface as INVALID_INPUT.
export const UpdateProcurementStatusBodySchema = z.object({
  status: z.string().trim().min(1, 'status is required'),
});

export const ReceiveProcurementBodySchema = z.object({
  items: z
    .array(
      z.object({
        itemId: idSchema('itemId'),
        quantityReceived: finiteNumberSchema('quantityReceived').max(
          MAX_QUANTITY,
          `quantityReceived cannot exceed ${MAX_QUANTITY}`,
        ),
      }),
    )
    .min(1, 'At least one receipt item is required'),
});

export type ReceiveProcurementBody = z.infer<typeof ReceiveProcurementBodySchema>;

export const ListProcurementsQuerySchema = PaginationQuerySchema.extend({
  supplierId: idSchema('supplierId').optional(),
  status: z.enum(ProcurementStatusValues).optional(),
});
