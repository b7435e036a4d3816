import { z } from 'zod';
import { DEFAULT_CART_ID } from './cart.sessions';

export const cartIdSchema = z.string().trim().min(1).max(64).default(DEFAULT_CART_ID);

export const cartProductParamSchema = z.object({
  productId: z.coerce.number().int().positive(),
});

// Quantity 0 keeps the line visible without buying it
export const cartItemSchema = z.object({
  quantity: z.number().int().nonnegative('Quantity cannot be negative'),
  unit_price: z.number().nonnegative('Unit price cannot be negative').optional(),
});
