import type { OrderStatus } from '../domain/order';

export interface OrderItemDto {
     id: string;
     productId: string;
     itemId: string | null;
     quantity: number;
     unitPrice: number;
     totalPrice: number;
}

export interface OrderDto {
     id: string;
     customerId: string;
     orderDate: Date;
     status: OrderStatus;
     items: OrderItemDto[];
     totalAmount: number;
     trackingNumber: string | null;
     createdAt: Date;
     updatedAt: Date;
     concurrencyToken: string;
}
