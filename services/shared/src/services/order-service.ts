import type { Bindings } from 'pino';
import { withUnitOfWork } from '../db/unit-of-work';
import { Order, isOrderStatus } from '../domain/order';
import { OrderItem } from '../domain/order-item';
import type { EventPublisher, UnitOfWork, UnitOfWorkRunner } from '../domain/repositories';
import { AmqpEventPublisher } from '../messaging/event-publisher';
import {
     cancelOrderSchema,
     createOrderSchema,
     orderIdSchema,
     shipOrderSchema,
     updateOrderSchema,
     type CancelOrderCommand,
     type CreateOrderCommand,
     type OrderItemInput,
     type ShipOrderCommand,
     type UpdateOrderCommand,
} from '../schemas/order.schemas';
import type { OrderDto } from '../types/order.types';
import { OrderNotFoundError, ValidationError, errorKindOf } from '../utils/errors';
import { createChildLogger } from '../utils/logger';
import { validateOrThrow } from '../utils/validation';
import { toOrderDto } from './mappers';

function toOrderItem(input: OrderItemInput): OrderItem {
     return OrderItem.create({
          productId: input.productId,
          itemId: input.itemId,
          quantity: input.quantity,
          unitPrice: input.unitPrice,
     });
}

export class OrderService {
     private readonly log = createChildLogger({ component: 'order-service' });

     constructor(
          private readonly runInUnitOfWork: UnitOfWorkRunner = withUnitOfWork,
          private readonly publisher: EventPublisher = new AmqpEventPublisher()
     ) {}

     /**
      * Create a Pending order. OrderCreated is published after the transaction
      * commits.
      */
     async createOrder(command: CreateOrderCommand): Promise<OrderDto> {
          return this.run('createOrder', { customerId: command.customerId }, async () => {
               const input = validateOrThrow(createOrderSchema, command, 'CreateOrder');
               const order = await this.commit(async (uow) => {
                    const created = Order.create(input.customerId, input.items.map(toOrderItem));
                    await uow.orders.add(created);
                    await uow.orders.saveChanges();
                    return created;
               });
               return toOrderDto(order);
          });
     }

     async getOrder(orderId: string): Promise<OrderDto | null> {
          const id = validateOrThrow(orderIdSchema, orderId, 'OrderId');
          const order = await this.runInUnitOfWork((uow) => uow.orders.getById(id));
          return order ? toOrderDto(order) : null;
     }

     async getOrdersByCustomer(customerId: string): Promise<OrderDto[]> {
          const orders = await this.runInUnitOfWork((uow) => uow.orders.getByCustomer(customerId));
          return orders.map(toOrderDto);
     }

     async getOrdersByStatus(status: string): Promise<OrderDto[]> {
          if (!isOrderStatus(status)) {
               throw ValidationError.forField('status', `Unknown order status '${status}'`);
          }
          const orders = await this.runInUnitOfWork((uow) => uow.orders.getByStatus(status));
          return orders.map(toOrderDto);
     }

     async updateOrder(command: UpdateOrderCommand): Promise<OrderDto> {
          return this.run('updateOrder', { orderId: command.orderId }, async () => {
               const input = validateOrThrow(updateOrderSchema, command, 'UpdateOrder');
               return this.mutate(input.orderId, (order) =>
                    order.update(input.customerId, input.items.map(toOrderItem))
               );
          });
     }

     async validateOrder(orderId: string): Promise<OrderDto> {
          return this.transition('validateOrder', orderId, (order) => order.validate());
     }

     async processPayment(orderId: string): Promise<OrderDto> {
          return this.transition('processPayment', orderId, (order) => order.processPayment());
     }

     async startPayment(orderId: string): Promise<OrderDto> {
          return this.transition('startPayment', orderId, (order) => order.startPayment());
     }

     async confirmPayment(orderId: string): Promise<OrderDto> {
          return this.transition('confirmPayment', orderId, (order) => order.confirmPayment());
     }

     async shipOrder(command: ShipOrderCommand): Promise<OrderDto> {
          return this.run('shipOrder', { orderId: command.orderId }, async () => {
               const input = validateOrThrow(shipOrderSchema, command, 'ShipOrder');
               return this.mutate(input.orderId, (order) => order.markShipped(input.trackingNumber));
          });
     }

     async markDelivered(orderId: string): Promise<OrderDto> {
          return this.transition('markDelivered', orderId, (order) => order.markDelivered());
     }

     async cancelOrder(command: CancelOrderCommand): Promise<OrderDto> {
          return this.run('cancelOrder', { orderId: command.orderId }, async () => {
               const input = validateOrThrow(cancelOrderSchema, command, 'CancelOrder');
               return this.mutate(input.orderId, (order) => order.cancel(input.reason));
          });
     }

     /** Soft delete. The order disappears from every query; no event is raised. */
     async deleteOrder(orderId: string): Promise<void> {
          await this.run('deleteOrder', { orderId }, async () => {
               const id = validateOrThrow(orderIdSchema, orderId, 'OrderId');
               await this.runInUnitOfWork(async (uow) => {
                    const order = await this.load(uow, id);
                    await uow.orders.softDelete(order);
                    await uow.orders.saveChanges();
               });
          });
     }

     private transition(
          operation: string,
          orderId: string,
          apply: (order: Order) => void
     ): Promise<OrderDto> {
          return this.run(operation, { orderId }, async () => {
               const id = validateOrThrow(orderIdSchema, orderId, 'OrderId');
               return this.mutate(id, apply);
          });
     }

     private async mutate(orderId: string, apply: (order: Order) => void): Promise<OrderDto> {
          const order = await this.commit(async (uow) => {
               const loaded = await this.load(uow, orderId);
               apply(loaded);
               await uow.orders.update(loaded);
               await uow.orders.saveChanges();
               return loaded;
          });
          return toOrderDto(order);
     }

     private async load(uow: UnitOfWork, orderId: string): Promise<Order> {
          const order = await uow.orders.getById(orderId);
          if (!order) {
               throw new OrderNotFoundError(orderId);
          }
          return order;
     }

     /** Run `work` in a unit of work, then publish the events it buffered. */
     private async commit(work: (uow: UnitOfWork) => Promise<Order>): Promise<Order> {
          const order = await this.runInUnitOfWork(work);
          for (const event of order.drainEvents()) {
               await this.publisher.publish(event);
          }
          return order;
     }

     private async run<T>(operation: string, context: Bindings, action: () => Promise<T>): Promise<T> {
          try {
               const result = await action();
               this.log.info({ operation, ...context }, 'Order command completed');
               return result;
          } catch (err) {
               const kind = errorKindOf(err);
               if (kind === 'unexpected') {
                    this.log.error({ err, operation, ...context }, 'Order command failed');
               } else {
                    this.log.warn({ err, operation, kind, ...context }, 'Order command rejected');
               }
               throw err;
          }
     }
}
