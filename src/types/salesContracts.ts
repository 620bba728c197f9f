import { z } from 'zod';
import { PaymentMethodValues } from './entities';
import { amountSchema, idSchema, quantitySchema } from './sharedContracts';
import { PaginationQuerySchema } from '../utils/response';

export const SaleItemInputSchema = z.object({
  variantId: idSchema('variantId'),
  quantity: quantitySchema('quantity'),
  unitPrice: amountSchema('unitPrice').optional(),
});

export type SaleItemInput = z.infer<typeof SaleItemInputSchema>;

export const CreateSaleBodySchema = z.object({
  warehouseId: idSchema('warehouseId'),
  customerName: z.string().trim().min(1).max(255).optional(),
  taxAmount: amountSchema('taxAmount').default(0),
  discountAmount: amountSchema('discountAmount').default(0),
  paymentMethod: z.enum(PaymentMethodValues),
  items: z.array(SaleItemInputSchema).min(1, 'At least one item is required'),
});

export type CreateSaleBody = z.infer<typeof CreateSaleBodySchema>;

export const ListSalesQuerySchema = PaginationQuerySchema.extend({
  warehouseId: idSchema('warehouseId').optional(),
  from: z.coerce.date().optional(),
  to: z.coerce.date().optional(),
});

export type ListSalesQuery = z.infer<typeof ListSalesQuerySchema>;
