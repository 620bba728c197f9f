import { z } from 'zod';

export const idSchema = (label: string) =>
  z.coerce.number().int(`${label} must be an integer`).positive(`${label} must be a positive integer`);

export const IdParamsSchema = z.object({
  id: idSchema('id'),
});

export type IdParams = z.infer<typeof IdParamsSchema>;

// Quantities and amounts travel as decimals and are held to three and two
// places. The bounds keep scaled values, and their products, safe integers.
export const MAX_QUANTITY = 1_000_000;
export const MAX_AMOUNT = 1_000_000;
export const MAX_CONVERSION_FACTOR = 1_000;

export const finiteNumberSchema = (label: string) =>
  z.number({ coerce: true }).finite(`${label} must be a finite number`);

export const quantitySchema = (label: string) =>
  finiteNumberSchema(label)
    .positive(`${label} must be greater than zero`)
    .max(MAX_QUANTITY, `${label} cannot exceed ${MAX_QUANTITY}`);

export const signedQuantitySchema = (label: string) =>
  finiteNumberSchema(label)
    .min(-MAX_QUANTITY, `${label} cannot be below -${MAX_QUANTITY}`)
    .max(MAX_QUANTITY, `${label} cannot exceed ${MAX_QUANTITY}`)
    .refine((value) => value !== 0, `${label} cannot be zero`);

export const amountSchema = (label: string) =>
  finiteNumberSchema(label)
    .min(0, `${label} must be non-negative`)
    .max(MAX_AMOUNT, `${label} cannot exceed ${MAX_AMOUNT}`);

export const dateOnlySchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Dates must use YYYY-MM-DD');
