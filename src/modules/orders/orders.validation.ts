import { z } from 'zod';

const idSchema = z.union([z.string(), z.number()]);

// Validation schemas for the Orders module. Ids are resolved against the
// database afterwards; malformed ids simply do not resolve.
export const createOrderSchema = z.object({
  customer_id: idSchema.nullish(),
  product_ids: z
    .array(idSchema, { invalid_type_error: 'product_ids must be a list of ids' })
    .nullish()
    .transform(ids => ids ?? []),
});
