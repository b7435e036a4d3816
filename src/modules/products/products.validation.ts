import { z } from 'zod';

export const productIdParamSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const createProductSchema = z.object({
  name: z.string().trim().min(1, 'Product name is required'),
  brand: z.string().trim().max(255).nullable().optional(),
  unit_price: z.number().nonnegative('Unit price cannot be negative'),
  min_stock: z.number().int().positive('Minimum stock must be at least 1').default(1),
  initial_stock: z.number().int().nonnegative().optional(),
});
