import { z } from 'zod';
import { OrderStatus } from '@orderflow/shared/src/domain/order';
import type { OrderService } from '@orderflow/shared/src/services/order-service';
import { InvalidOrderStateError } from '@orderflow/shared/src/utils/errors';
import { createChildLogger, type Logger } from '@orderflow/shared/src/utils/logger';
import { validateOrThrow } from '@orderflow/shared/src/utils/validation';

export type OrderLifecycleService = Pick<OrderService, 'getOrder' | 'validateOrder' | 'cancelOrder'>;

export const VALIDATION_FAILED_REASON = 'Order failed validation';

const eventEnvelopeSchema = z.object({
     eventId: z.string().min(1),
     type: z.string().min(1),
     aggregateType: z.enum(['Order', 'Item']),
     aggregateId: z.string().min(1),
     occurredAt: z.string(),
     payload: z.record(z.unknown()),
});

const orderPayloadSchema = z
     .object({
          orderId: z.string().uuid(),
          customerId: z.string(),
     })
     .passthrough();

export type EventEnvelope = z.infer<typeof eventEnvelopeSchema>;

export type HandleOutcome = 'handled' | 'skipped' | 'ignored';

export function parseEnvelope(content: Buffer): EventEnvelope {
     const raw: unknown = JSON.parse(content.toString());
     return validateOrThrow(eventEnvelopeSchema, raw, 'Event envelope');
}

/**
 * Reacts to order lifecycle events. Handlers reload the order and check its
 * status first, so a redelivered message is harmless.
 */
export class OrderEventHandlers {
     private readonly log: Logger;

     constructor(
          private readonly orders: OrderLifecycleService,
          log: Logger = createChildLogger({ component: 'order-events-worker' })
     ) {
          this.log = log;
     }

     async handle(envelope: EventEnvelope): Promise<HandleOutcome> {
          const context = { eventId: envelope.eventId, type: envelope.type };

          switch (envelope.type) {
               case 'OrderCreated':
                    return this.onOrderCreated(envelope);
               case 'OrderPaid':
               case 'OrderShipped':
               case 'OrderDelivered':
               case 'OrderCancelled': {
                    const payload = validateOrThrow(orderPayloadSchema, envelope.payload, envelope.type);
                    this.log.info({ ...context, payload }, 'Order lifecycle event received');
                    return 'handled';
               }
               case 'OrderUpdated':
               case 'OrderValidated':
               case 'OrderPaymentStarted':
                    this.log.debug(context, 'No handler for event, acknowledging');
                    return 'ignored';
               default:
                    this.log.warn(context, 'Unknown event type, acknowledging');
                    return 'ignored';
          }
     }

     private async onOrderCreated(envelope: EventEnvelope): Promise<HandleOutcome> {
          const { orderId } = validateOrThrow(orderPayloadSchema, envelope.payload, envelope.type);
          const order = await this.orders.getOrder(orderId);

          if (!order) {
               this.log.warn({ orderId }, 'Order from OrderCreated no longer exists');
               return 'skipped';
          }
          if (order.status !== OrderStatus.Pending) {
               this.log.info({ orderId, status: order.status }, 'Order already processed, skipping');
               return 'skipped';
          }

          try {
               if (order.items.length > 0 && order.totalAmount > 0) {
                    await this.orders.validateOrder(orderId);
                    this.log.info({ orderId }, 'Order validated');
               } else {
                    await this.orders.cancelOrder({ orderId, reason: VALIDATION_FAILED_REASON });
                    this.log.warn({ orderId }, 'Order cancelled after failed validation');
               }
          } catch (error) {
               // Another writer moved the order on after it was read.
               if (error instanceof InvalidOrderStateError) {
                    this.log.info({ orderId, err: error }, 'Order left Pending concurrently, skipping');
                    return 'skipped';
               }
               throw error;
          }
          return 'handled';
     }
}
