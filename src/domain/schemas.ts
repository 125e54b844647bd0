/**
 * Input validation schemas
 */

import { z } from 'zod';

export const ProductInputSchema = z.object({
  id: z.string().min(1, 'Product ID is required'),
  name: z.string().min(1, 'Name is required'),
  category: z.string().min(1).default('General'),
  sku: z.string().min(1).nullable().default(null),
  description: z.string().optional(),
  price: z.number().nonnegative('Price cannot be negative'),
  availableQuantity: z.number().int().nonnegative('Quantity cannot be negative'),
  lowStockThreshold: z.number().int().nonnegative().optional(),
});

export type ProductInput = z.input<typeof ProductInputSchema>;

export const CartLineSchema = z.object({
  productId: z.string().min(1, 'must reference a product'),
  quantity: z
    .number({ invalid_type_error: 'must be a number' })
    .int('must be a whole number')
    .positive('must be greater than zero'),
});

export const CartLinesSchema = z.array(CartLineSchema).min(1, 'must contain at least one item');

export type CartLine = z.infer<typeof CartLineSchema>;
