import { v4 as uuidv4 } from 'uuid';

export type AggregateType = 'Order' | 'Item';

/**
 * Immutable record of a state change. The payload shapes below are consumed by
 * message subscribers and must stay stable.
 */
export interface DomainEvent<TType extends string = string, TPayload extends object = object> {
     readonly eventId: string;
     readonly type: TType;
     readonly aggregateType: AggregateType;
     readonly aggregateId: string;
     readonly occurredAt: string;
     readonly payload: Readonly<TPayload>;
}

// Order events

export interface OrderCreatedPayload {
     orderId: string;
     customerId: string;
     totalAmount: number;
}

export type OrderUpdatedPayload = OrderCreatedPayload;

export interface OrderValidatedPayload {
     orderId: string;
     customerId: string;
}

export interface OrderPaymentPayload {
     orderId: string;
     customerId: string;
     amount: number;
}

export interface OrderShippedPayload {
     orderId: string;
     customerId: string;
     trackingNumber: string;
}

export interface OrderDeliveredPayload {
     orderId: string;
     customerId: string;
}

export interface OrderCancelledPayload {
     orderId: string;
     customerId: string;
     reason: string | null;
     previousStatus: string;
}

export type OrderCreatedEvent = DomainEvent<'OrderCreated', OrderCreatedPayload>;
export type OrderUpdatedEvent = DomainEvent<'OrderUpdated', OrderUpdatedPayload>;
export type OrderValidatedEvent = DomainEvent<'OrderValidated', OrderValidatedPayload>;
export type OrderPaymentStartedEvent = DomainEvent<'OrderPaymentStarted', OrderPaymentPayload>;
export type OrderPaidEvent = DomainEvent<'OrderPaid', OrderPaymentPayload>;
export type OrderShippedEvent = DomainEvent<'OrderShipped', OrderShippedPayload>;
export type OrderDeliveredEvent = DomainEvent<'OrderDelivered', OrderDeliveredPayload>;
export type OrderCancelledEvent = DomainEvent<'OrderCancelled', OrderCancelledPayload>;

export type OrderEvent =
     | OrderCreatedEvent
     | OrderUpdatedEvent
     | OrderValidatedEvent
     | OrderPaymentStartedEvent
     | OrderPaidEvent
     | OrderShippedEvent
     | OrderDeliveredEvent
     | OrderCancelledEvent;

// Item events

export interface ItemDetailsPayload {
     itemId: string;
     sku: string;
     name: string;
     price: number;
}

export interface StockQuantityPayload {
     itemId: string;
     sku: string;
     quantity: number;
}

export interface StockAdjustedPayload {
     itemId: string;
     sku: string;
     oldQuantity: number;
     newQuantity: number;
}

export interface ItemStatusPayload {
     itemId: string;
     sku: string;
}

export type ItemCreatedEvent = DomainEvent<'ItemCreated', ItemDetailsPayload>;
export type ItemUpdatedEvent = DomainEvent<'ItemUpdated', ItemDetailsPayload>;
export type StockReservedEvent = DomainEvent<'StockReserved', StockQuantityPayload>;
export type StockReleasedEvent = DomainEvent<'StockReleased', StockQuantityPayload>;
export type StockCommittedEvent = DomainEvent<'StockCommitted', StockQuantityPayload>;
export type StockAdjustedEvent = DomainEvent<'StockAdjusted', StockAdjustedPayload>;
export type ItemDeactivatedEvent = DomainEvent<'ItemDeactivated', ItemStatusPayload>;
export type ItemActivatedEvent = DomainEvent<'ItemActivated', ItemStatusPayload>;

export type ItemEvent =
     | ItemCreatedEvent
     | ItemUpdatedEvent
     | StockReservedEvent
     | StockReleasedEvent
     | StockCommittedEvent
     | StockAdjustedEvent
     | ItemDeactivatedEvent
     | ItemActivatedEvent;

export function createDomainEvent<TType extends string, TPayload extends object>(
     type: TType,
     aggregateType: AggregateType,
     aggregateId: string,
     payload: TPayload
): DomainEvent<TType, TPayload> {
     return {
          eventId: uuidv4(),
          type,
          aggregateType,
          aggregateId,
          occurredAt: new Date().toISOString(),
          payload,
     };
}
