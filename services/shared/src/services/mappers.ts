import type { Item } from '../domain/item';
import type { Order } from '../domain/order';
import type { ItemDto } from '../types/item.types';
import type { OrderDto } from '../types/order.types';

export function toOrderDto(order: Order): OrderDto {
     return {
          id: order.id,
          customerId: order.customerId,
          orderDate: order.orderDate,
          status: order.status,
          items: order.items.map((item) => ({
               id: item.id,
               productId: item.productId,
               itemId: item.itemId,
               quantity: item.quantity,
               unitPrice: item.unitPrice.amount,
               totalPrice: item.totalPrice.amount,
          })),
          totalAmount: order.totalAmount.amount,
          trackingNumber: order.trackingNumber,
          createdAt: order.createdAt,
          updatedAt: order.updatedAt,
          concurrencyToken: order.concurrencyToken,
     };
}

export function toItemDto(item: Item): ItemDto {
     return {
          id: item.id,
          sku: item.sku.value,
          name: item.name,
          description: item.description,
          price: item.price.amount,
          currency: item.price.currency,
          availableStock: item.stockLevel.available,
          reservedStock: item.stockLevel.reserved,
          totalStock: item.stockLevel.total,
          category: item.category,
          isActive: item.isActive,
          createdAt: item.createdAt,
          updatedAt: item.updatedAt,
          concurrencyToken: item.concurrencyToken,
     };
}
