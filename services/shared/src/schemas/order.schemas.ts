import { z } from 'zod';

// Keeps the worst-case total inside orders.total_amount NUMERIC(12, 2).
export const MAX_ORDER_LINES = 100;

export const orderIdSchema = z.string().uuid('Order ID must be a valid UUID');

export const orderItemInputSchema = z.object({
     productId: z
          .string()
          .min(1, 'Product ID is required')
          .max(50, 'Product ID cannot exceed 50 characters'),
     itemId: z.string().uuid('Item ID must be a valid UUID').optional(),
     quantity: z
          .number()
          .int('Quantity must be a whole number')
          .min(1, 'Quantity must be at least 1')
          .max(1000, 'Quantity cannot exceed 1000'),
     unitPrice: z
          .number()
          .positive('Unit price must be greater than zero')
          .max(10000, 'Unit price cannot exceed 10000'),
});

export const createOrderSchema = z.object({
     customerId: z
          .string()
          .min(1, 'Customer ID is required')
          .max(100, 'Customer ID cannot exceed 100 characters'),
     items: z
          .array(orderItemInputSchema)
          .min(1, 'Order must contain at least one item')
          .max(MAX_ORDER_LINES, `Order cannot contain more than ${MAX_ORDER_LINES} items`),
});

export const updateOrderSchema = createOrderSchema.extend({
     orderId: orderIdSchema,
});

export const shipOrderSchema = z.object({
     orderId: orderIdSchema,
     trackingNumber: z
          .string()
          .min(1, 'Tracking number is required')
          .max(100, 'Tracking number cannot exceed 100 characters'),
});

export const cancelOrderSchema = z.object({
     orderId: orderIdSchema,
     reason: z.string().max(500, 'Cancel reason cannot exceed 500 characters').optional(),
});

export type OrderItemInput = z.infer<typeof orderItemInputSchema>;
export type CreateOrderCommand = z.infer<typeof createOrderSchema>;
export type UpdateOrderCommand = z.infer<typeof updateOrderSchema>;
export type ShipOrderCommand = z.infer<typeof shipOrderSchema>;
export type CancelOrderCommand = z.infer<typeof cancelOrderSchema>;
