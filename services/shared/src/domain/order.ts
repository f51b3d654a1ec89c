import { ValidationError, InvalidOrderStateError } from '../utils/errors';
import { AggregateRoot, newAggregateMetadata, type AggregateMetadata } from './aggregate-root';
import { createDomainEvent, type OrderEvent } from './events';
import { OrderItem, type OrderItemSnapshot } from './order-item';
import { Money } from './value-objects/money';

export const OrderStatus = {
     Pending: 'Pending',
     Validated: 'Validated',
     PaymentProcessing: 'PaymentProcessing',
     Paid: 'Paid',
     Shipped: 'Shipped',
     Delivered: 'Delivered',
     Cancelled: 'Cancelled',
} as const;

export type OrderStatus = (typeof OrderStatus)[keyof typeof OrderStatus];

export const ORDER_STATUSES: readonly OrderStatus[] = Object.values(OrderStatus);

export const TERMINAL_ORDER_STATUSES: readonly OrderStatus[] = [
     OrderStatus.Delivered,
     OrderStatus.Cancelled,
];

/** Statuses in which line items and customer may still be edited. */
export const EDITABLE_ORDER_STATUSES: readonly OrderStatus[] = [
     OrderStatus.Pending,
     OrderStatus.Validated,
];

export const CANCELLABLE_ORDER_STATUSES: readonly OrderStatus[] = ORDER_STATUSES.filter(
     (status) => !TERMINAL_ORDER_STATUSES.includes(status)
);

export const CUSTOMER_ID_MAX_LENGTH = 100;
export const TRACKING_NUMBER_MAX_LENGTH = 100;
export const CANCEL_REASON_MAX_LENGTH = 500;

export interface OrderSnapshot {
     id: string;
     customerId: string;
     orderDate: Date;
     status: OrderStatus;
     items: OrderItemSnapshot[];
     totalAmount: number;
     trackingNumber: string | null;
     createdAt: Date;
     updatedAt: Date;
     concurrencyToken: string;
}

/** Persisted order state; the total is always recomputed from the items. */
export type RestorableOrder = Omit<OrderSnapshot, 'totalAmount'>;

function assertCustomerId(customerId: string): void {
     if (customerId.trim().length === 0) {
          throw ValidationError.forField('customerId', 'Customer ID cannot be empty', 'too_small');
     }
     if (customerId.length > CUSTOMER_ID_MAX_LENGTH) {
          throw ValidationError.forField(
               'customerId',
               `Customer ID cannot exceed ${CUSTOMER_ID_MAX_LENGTH} characters`,
               'too_big'
          );
     }
}

function assertItems(items: readonly OrderItem[]): void {
     if (items.length === 0) {
          throw ValidationError.forField('items', 'Order must contain at least one item', 'too_small');
     }
}

/**
 * Order aggregate and its lifecycle:
 *
 *   Pending -> Validated -> PaymentProcessing -> Paid -> Shipped -> Delivered
 *
 * Any non-terminal status may move to Cancelled. Each transition stamps
 * `updatedAt`, regenerates the concurrency token and buffers one event.
 */
export class Order extends AggregateRoot<OrderEvent> {
     private _customerId: string;
     private _status: OrderStatus;
     private _items: OrderItem[];
     private _totalAmount: Money;
     private _trackingNumber: string | null;
     readonly orderDate: Date;

     private constructor(
          metadata: AggregateMetadata,
          customerId: string,
          orderDate: Date,
          status: OrderStatus,
          items: OrderItem[],
          trackingNumber: string | null
     ) {
          super(metadata);
          this._customerId = customerId;
          this.orderDate = orderDate;
          this._status = status;
          this._items = items;
          this._totalAmount = Order.calculateTotal(items);
          this._trackingNumber = trackingNumber;
     }

     static create(customerId: string, items: readonly OrderItem[]): Order {
          assertCustomerId(customerId);
          assertItems(items);

          const metadata = newAggregateMetadata();
          const order = new Order(
               metadata,
               customerId,
               metadata.createdAt,
               OrderStatus.Pending,
               [...items],
               null
          );

          order.raise(
               createDomainEvent('OrderCreated', 'Order', order.id, {
                    orderId: order.id,
                    customerId: order.customerId,
                    totalAmount: order.totalAmount.amount,
               })
          );
          return order;
     }

     /** Rebuild a persisted order. No events are raised. */
     static restore(snapshot: RestorableOrder): Order {
          return new Order(
               {
                    id: snapshot.id,
                    createdAt: snapshot.createdAt,
                    updatedAt: snapshot.updatedAt,
                    concurrencyToken: snapshot.concurrencyToken,
               },
               snapshot.customerId,
               snapshot.orderDate,
               snapshot.status,
               snapshot.items.map((item) => OrderItem.restore(item)),
               snapshot.trackingNumber
          );
     }

     get customerId(): string {
          return this._customerId;
     }

     get status(): OrderStatus {
          return this._status;
     }

     get items(): readonly OrderItem[] {
          return [...this._items];
     }

     get totalAmount(): Money {
          return this._totalAmount;
     }

     get trackingNumber(): string | null {
          return this._trackingNumber;
     }

     get isTerminal(): boolean {
          return TERMINAL_ORDER_STATUSES.includes(this._status);
     }

     /**
      * Replace the customer and line items. Only allowed before payment starts;
      * the status is left as is.
      */
     update(customerId: string, items: readonly OrderItem[]): void {
          this.assertStatus('update', EDITABLE_ORDER_STATUSES);
          assertCustomerId(customerId);
          assertItems(items);

          this._customerId = customerId;
          this._items = [...items];
          this._totalAmount = Order.calculateTotal(this._items);
          this.touch();

          this.raise(
               createDomainEvent('OrderUpdated', 'Order', this.id, {
                    orderId: this.id,
                    customerId: this._customerId,
                    totalAmount: this._totalAmount.amount,
               })
          );
     }

     validate(): void {
          this.assertStatus('validate', [OrderStatus.Pending]);
          this.transitionTo(OrderStatus.Validated);

          this.raise(
               createDomainEvent('OrderValidated', 'Order', this.id, {
                    orderId: this.id,
                    customerId: this._customerId,
               })
          );
     }

     /**
      * Synchronous payment flow: Validated -> PaymentProcessing -> Paid in one call.
      * Only OrderPaid is raised.
      */
     processPayment(): void {
          this.assertStatus('process payment for', [OrderStatus.Validated]);
          this.transitionTo(OrderStatus.PaymentProcessing);
          this.transitionTo(OrderStatus.Paid);
          this.raisePaid();
     }

     /** First half of a two-phase payment driven by an external coordinator. */
     startPayment(): void {
          this.assertStatus('start payment for', [OrderStatus.Validated]);
          this.transitionTo(OrderStatus.PaymentProcessing);

          this.raise(
               createDomainEvent('OrderPaymentStarted', 'Order', this.id, {
                    orderId: this.id,
                    customerId: this._customerId,
                    amount: this._totalAmount.amount,
               })
          );
     }

     confirmPayment(): void {
          this.assertStatus('confirm payment for', [OrderStatus.PaymentProcessing]);
          this.transitionTo(OrderStatus.Paid);
          this.raisePaid();
     }

     markShipped(trackingNumber: string): void {
          this.assertStatus('ship', [OrderStatus.Paid]);
          if (trackingNumber.trim().length === 0) {
               throw ValidationError.forField(
                    'trackingNumber',
                    'Tracking number is required',
                    'too_small'
               );
          }
          if (trackingNumber.length > TRACKING_NUMBER_MAX_LENGTH) {
               throw ValidationError.forField(
                    'trackingNumber',
                    `Tracking number cannot exceed ${TRACKING_NUMBER_MAX_LENGTH} characters`,
                    'too_big'
               );
          }

          this._trackingNumber = trackingNumber;
          this.transitionTo(OrderStatus.Shipped);

          this.raise(
               createDomainEvent('OrderShipped', 'Order', this.id, {
                    orderId: this.id,
                    customerId: this._customerId,
                    trackingNumber,
               })
          );
     }

     markDelivered(): void {
          this.assertStatus('deliver', [OrderStatus.Shipped]);
          this.transitionTo(OrderStatus.Delivered);

          this.raise(
               createDomainEvent('OrderDelivered', 'Order', this.id, {
                    orderId: this.id,
                    customerId: this._customerId,
               })
          );
     }

     cancel(reason?: string): void {
          this.assertStatus('cancel', CANCELLABLE_ORDER_STATUSES);
          if (reason !== undefined && reason.length > CANCEL_REASON_MAX_LENGTH) {
               throw ValidationError.forField(
                    'reason',
                    `Cancel reason cannot exceed ${CANCEL_REASON_MAX_LENGTH} characters`,
                    'too_big'
               );
          }

          const previousStatus = this._status;
          this.transitionTo(OrderStatus.Cancelled);

          this.raise(
               createDomainEvent('OrderCancelled', 'Order', this.id, {
                    orderId: this.id,
                    customerId: this._customerId,
                    reason: reason ?? null,
                    previousStatus,
               })
          );
     }

     toSnapshot(): OrderSnapshot {
          return {
               id: this.id,
               customerId: this._customerId,
               orderDate: this.orderDate,
               status: this._status,
               items: this._items.map((item) => item.toSnapshot()),
               totalAmount: this._totalAmount.amount,
               trackingNumber: this._trackingNumber,
               createdAt: this.createdAt,
               updatedAt: this.updatedAt,
               concurrencyToken: this.concurrencyToken,
          };
     }

     private raisePaid(): void {
          this.raise(
               createDomainEvent('OrderPaid', 'Order', this.id, {
                    orderId: this.id,
                    customerId: this._customerId,
                    amount: this._totalAmount.amount,
               })
          );
     }

     private assertStatus(operation: string, allowed: readonly OrderStatus[]): void {
          if (!allowed.includes(this._status)) {
               throw new InvalidOrderStateError(operation, this._status, allowed);
          }
     }

     private transitionTo(status: OrderStatus): void {
          this._status = status;
          this.touch();
     }

     private static calculateTotal(items: readonly OrderItem[]): Money {
          return Money.sum(items.map((item) => item.totalPrice));
     }
}

export function isOrderStatus(value: string): value is OrderStatus {
     return ORDER_STATUSES.some((status) => status === value);
}
