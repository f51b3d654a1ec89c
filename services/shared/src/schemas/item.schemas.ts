import { Decimal } from 'decimal.js';
import { z } from 'zod';
import { SKU_PATTERN } from '../domain/value-objects/sku';

/** Column limits: price is NUMERIC(10, 2), stock columns are INTEGER. */
export const MAX_ITEM_PRICE = 99_999_999.99;
export const MAX_STOCK_QUANTITY = 2_147_483_647;

export const itemIdSchema = z.string().uuid('Item ID must be a valid UUID');

const priceSchema = z
     .number()
     .nonnegative('Price cannot be negative')
     .max(MAX_ITEM_PRICE, `Price cannot exceed ${MAX_ITEM_PRICE}`)
     .refine((value) => new Decimal(value).decimalPlaces() <= 2, {
          message: 'Price cannot have more than 2 decimal places',
     });

const itemDetailsSchema = z.object({
     name: z.string().min(1, 'Name is required').max(200, 'Name cannot exceed 200 characters'),
     description: z.string().max(1000, 'Description cannot exceed 1000 characters').default(''),
     price: priceSchema,
     category: z
          .string()
          .min(1, 'Category is required')
          .max(100, 'Category cannot exceed 100 characters'),
});

export const createItemSchema = itemDetailsSchema.extend({
     sku: z
          .string()
          .min(1, 'SKU is required')
          .max(50, 'SKU cannot exceed 50 characters')
          .regex(SKU_PATTERN, 'SKU must contain only uppercase letters, numbers, and hyphens'),
     currency: z
          .string()
          .regex(/^[A-Za-z]{3}$/, 'Currency must be a 3-letter code')
          .default('USD'),
     initialStock: z
          .number()
          .int('Initial stock must be a whole number')
          .min(0, 'Initial stock cannot be negative')
          .max(MAX_STOCK_QUANTITY, `Initial stock cannot exceed ${MAX_STOCK_QUANTITY}`),
});

export const updateItemSchema = itemDetailsSchema.extend({
     itemId: itemIdSchema,
});

export const stockQuantitySchema = z.object({
     itemId: itemIdSchema,
     quantity: z
          .number()
          .int('Quantity must be a whole number')
          .positive('Quantity must be greater than zero')
          .max(MAX_STOCK_QUANTITY, `Quantity cannot exceed ${MAX_STOCK_QUANTITY}`),
     orderId: z
          .string()
          .min(1, 'Order reference cannot be empty')
          .max(100, 'Order reference cannot exceed 100 characters')
          .optional(),
});

export const adjustStockSchema = z.object({
     itemId: itemIdSchema,
     newQuantity: z
          .number()
          .int('New quantity must be a whole number')
          .min(0, 'New quantity cannot be negative')
          .max(MAX_STOCK_QUANTITY, `New quantity cannot exceed ${MAX_STOCK_QUANTITY}`),
     reason: z
          .string()
          .min(1, 'Adjustment reason is required')
          .max(500, 'Adjustment reason cannot exceed 500 characters'),
});

export type CreateItemCommand = z.input<typeof createItemSchema>;
export type UpdateItemCommand = z.input<typeof updateItemSchema>;
export type StockQuantityCommand = z.infer<typeof stockQuantitySchema>;
export type AdjustStockCommand = z.infer<typeof adjustStockSchema>;
