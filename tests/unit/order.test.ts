import { Order, OrderStatus } from '@orderflow/shared/src/domain/order';
import { OrderItem } from '@orderflow/shared/src/domain/order-item';
import {
     BusinessRuleError,
     InvalidOrderStateError,
     ValidationError,
} from '@orderflow/shared/src/utils/errors';
import { captureError } from '../helpers/captureError';

function lineItems(): OrderItem[] {
     return [
          OrderItem.create({ productId: 'P-1', quantity: 2, unitPrice: 10 }),
          OrderItem.create({ productId: 'P-2', quantity: 1, unitPrice: 15.5 }),
     ];
}

function orderIn(status: OrderStatus): Order {
     const order = Order.create('customer-1', lineItems());
     const steps: Partial<Record<OrderStatus, () => void>> = {
          [OrderStatus.Validated]: () => order.validate(),
          [OrderStatus.PaymentProcessing]: () => {
               order.validate();
               order.startPayment();
          },
          [OrderStatus.Paid]: () => {
               order.validate();
               order.processPayment();
          },
          [OrderStatus.Shipped]: () => {
               order.validate();
               order.processPayment();
               order.markShipped('TRACK-1');
          },
          [OrderStatus.Delivered]: () => {
               order.validate();
               order.processPayment();
               order.markShipped('TRACK-1');
               order.markDelivered();
          },
          [OrderStatus.Cancelled]: () => order.cancel(),
     };
     steps[status]?.();
     order.clearEvents();
     return order;
}

describe('OrderItem', () => {
     it('should compute the line total', () => {
          const item = OrderItem.create({ productId: 'P-1', quantity: 3, unitPrice: 19.99 });
          expect(item.totalPrice.amount).toBe(59.97);
          expect(item.itemId).toBeNull();
     });

     it.each([
          [{ productId: '', quantity: 1, unitPrice: 1 }, 'Product ID cannot be empty'],
          [{ productId: 'P', quantity: 0, unitPrice: 1 }, 'Quantity must be a whole number greater than zero'],
          [{ productId: 'P', quantity: 1.5, unitPrice: 1 }, 'Quantity must be a whole number greater than zero'],
          [{ productId: 'P', quantity: 1, unitPrice: 0 }, 'Unit price must be greater than zero'],
     ])('should reject %p', (props, message) => {
          expect(() => OrderItem.create(props)).toThrow(message);
     });
});

describe('Order', () => {
     describe('create', () => {
          it('should start Pending with the summed total', () => {
               const order = Order.create('customer-1', lineItems());

               expect(order.status).toBe(OrderStatus.Pending);
               expect(order.totalAmount.amount).toBe(35.5);
               expect(order.items).toHaveLength(2);
               expect(order.trackingNumber).toBeNull();
               expect(order.orderDate).toEqual(order.createdAt);
          });

          it('should raise OrderCreated', () => {
               const order = Order.create('customer-1', lineItems());

               expect(order.domainEvents).toHaveLength(1);
               expect(order.domainEvents[0]).toMatchObject({
                    type: 'OrderCreated',
                    aggregateType: 'Order',
                    aggregateId: order.id,
                    payload: { orderId: order.id, customerId: 'customer-1', totalAmount: 35.5 },
               });
          });

          it('should reject an empty customer or no items', () => {
               expect(() => Order.create('  ', lineItems())).toThrow(ValidationError);
               expect(() => Order.create('customer-1', [])).toThrow(
                    'Order must contain at least one item'
               );
               expect(() => Order.create('c'.repeat(101), lineItems())).toThrow(
                    'Customer ID cannot exceed 100 characters'
               );
          });
     });

     describe('full lifecycle', () => {
          it('should move Pending to Delivered and then refuse cancellation', () => {
               const order = Order.create('customer-1', lineItems());
               expect(order.totalAmount.amount).toBe(35.5);

               order.validate();
               expect(order.status).toBe(OrderStatus.Validated);

               order.processPayment();
               expect(order.status).toBe(OrderStatus.Paid);

               order.markShipped('TRACK1');
               expect(order.status).toBe(OrderStatus.Shipped);
               expect(order.trackingNumber).toBe('TRACK1');

               order.markDelivered();
               expect(order.status).toBe(OrderStatus.Delivered);
               expect(order.isTerminal).toBe(true);

               expect(() => order.cancel()).toThrow(BusinessRuleError);
               expect(order.status).toBe(OrderStatus.Delivered);

               expect(order.drainEvents().map((event) => event.type)).toEqual([
                    'OrderCreated',
                    'OrderValidated',
                    'OrderPaid',
                    'OrderShipped',
                    'OrderDelivered',
               ]);
          });

          it('should support the two-phase payment flow', () => {
               const order = orderIn(OrderStatus.Validated);

               order.startPayment();
               expect(order.status).toBe(OrderStatus.PaymentProcessing);

               order.confirmPayment();
               expect(order.status).toBe(OrderStatus.Paid);

               expect(order.drainEvents()).toEqual([
                    expect.objectContaining({
                         type: 'OrderPaymentStarted',
                         payload: { orderId: order.id, customerId: 'customer-1', amount: 35.5 },
                    }),
                    expect.objectContaining({
                         type: 'OrderPaid',
                         payload: { orderId: order.id, customerId: 'customer-1', amount: 35.5 },
                    }),
               ]);
          });
     });

     describe('transition guards', () => {
          type Operation = [string, (order: Order) => void, OrderStatus[]];

          const operations: Operation[] = [
               ['validate', (order) => order.validate(), [OrderStatus.Pending]],
               ['processPayment', (order) => order.processPayment(), [OrderStatus.Validated]],
               ['startPayment', (order) => order.startPayment(), [OrderStatus.Validated]],
               ['confirmPayment', (order) => order.confirmPayment(), [OrderStatus.PaymentProcessing]],
               ['markShipped', (order) => order.markShipped('TRACK-9'), [OrderStatus.Paid]],
               ['markDelivered', (order) => order.markDelivered(), [OrderStatus.Shipped]],
               [
                    'cancel',
                    (order) => order.cancel(),
                    [
                         OrderStatus.Pending,
                         OrderStatus.Validated,
                         OrderStatus.PaymentProcessing,
                         OrderStatus.Paid,
                         OrderStatus.Shipped,
                    ],
               ],
               [
                    'update',
                    (order) => order.update('customer-2', lineItems()),
                    [OrderStatus.Pending, OrderStatus.Validated],
               ],
          ];

          const allStatuses = Object.values(OrderStatus);

          for (const [name, apply, allowed] of operations) {
               for (const status of allStatuses) {
                    if (allowed.includes(status)) {
                         it(`${name} should succeed from ${status}`, () => {
                              const order = orderIn(status);
                              apply(order);
                              expect(order.domainEvents).toHaveLength(1);
                         });
                    } else {
                         it(`${name} should fail from ${status} without side effects`, () => {
                              const order = orderIn(status);
                              const token = order.concurrencyToken;
                              const updatedAt = order.updatedAt;

                              const error = captureError(() => apply(order));

                              expect(error).toBeInstanceOf(InvalidOrderStateError);
                              expect(order.status).toBe(status);
                              expect(order.concurrencyToken).toBe(token);
                              expect(order.updatedAt).toBe(updatedAt);
                              expect(order.domainEvents).toHaveLength(0);
                         });
                    }
               }
          }
     });

     describe('mutation bookkeeping', () => {
          it('should regenerate the token and raise exactly one event per transition', () => {
               const order = orderIn(OrderStatus.Pending);
               const token = order.concurrencyToken;

               order.validate();

               expect(order.concurrencyToken).not.toBe(token);
               expect(order.domainEvents).toHaveLength(1);
          });

          it('should hand out events only once when drained', () => {
               const order = Order.create('customer-1', lineItems());

               expect(order.drainEvents()).toHaveLength(1);
               expect(order.drainEvents()).toHaveLength(0);
          });
     });

     describe('update', () => {
          it('should replace items and recompute the total without changing status', () => {
               const order = orderIn(OrderStatus.Validated);

               order.update('customer-2', [
                    OrderItem.create({ productId: 'P-3', quantity: 4, unitPrice: 2.25 }),
               ]);

               expect(order.status).toBe(OrderStatus.Validated);
               expect(order.customerId).toBe('customer-2');
               expect(order.totalAmount.amount).toBe(9);
               expect(order.domainEvents[0]).toMatchObject({
                    type: 'OrderUpdated',
                    payload: { customerId: 'customer-2', totalAmount: 9 },
               });
          });
     });

     describe('markShipped', () => {
          it('should require a tracking number', () => {
               const order = orderIn(OrderStatus.Paid);

               expect(() => order.markShipped('   ')).toThrow('Tracking number is required');
               expect(order.status).toBe(OrderStatus.Paid);
          });

          it('should reject an overlong tracking number', () => {
               const order = orderIn(OrderStatus.Paid);

               expect(() => order.markShipped('T'.repeat(101))).toThrow(ValidationError);
          });
     });

     describe('cancel', () => {
          it('should record the reason and the previous status', () => {
               const order = orderIn(OrderStatus.Paid);

               order.cancel('Customer changed their mind');

               expect(order.status).toBe(OrderStatus.Cancelled);
               expect(order.domainEvents[0]).toMatchObject({
                    type: 'OrderCancelled',
                    payload: {
                         orderId: order.id,
                         reason: 'Customer changed their mind',
                         previousStatus: OrderStatus.Paid,
                    },
               });
          });

          it('should use a null reason when none is given', () => {
               const order = orderIn(OrderStatus.Pending);
               order.cancel();
               expect(order.domainEvents[0]).toMatchObject({ payload: { reason: null } });
          });
     });

     describe('snapshot', () => {
          it('should round-trip through restore without events', () => {
               const original = orderIn(OrderStatus.Shipped);

               const restored = Order.restore(original.toSnapshot());

               expect(restored.toSnapshot()).toEqual(original.toSnapshot());
               expect(restored.domainEvents).toHaveLength(0);
          });

          it('should recompute the total from the restored items', () => {
               const { totalAmount, ...persisted } = orderIn(OrderStatus.Paid).toSnapshot();

               const restored = Order.restore(persisted);

               expect(totalAmount).toBe(35.5);
               expect(restored.totalAmount.amount).toBe(35.5);
          });
     });
});
