import type { Options } from 'amqplib';
import type { DomainEvent } from '../domain/events';
import type { EventPublisher } from '../domain/repositories';
import { createChildLogger } from '../utils/logger';
import { ORDERFLOW_EVENTS_EXCHANGE, publishEvent } from './client';

type Publish = (
     exchange: string,
     routingKey: string,
     payload: object,
     options: Options.Publish
) => Promise<void>;

const log = createChildLogger({ component: 'event-publisher' });

export function routingKeyFor(event: DomainEvent): string {
     return `${event.aggregateType.toLowerCase()}.${event.type}`;
}

/**
 * Publishes domain events to the topic exchange. The event id doubles as the
 * AMQP message id so consumers can de-duplicate redeliveries.
 */
export class AmqpEventPublisher implements EventPublisher {
     constructor(
          private readonly send: Publish = publishEvent,
          private readonly exchange: string = ORDERFLOW_EVENTS_EXCHANGE
     ) {}

     async publish(event: DomainEvent): Promise<void> {
          const routingKey = routingKeyFor(event);
          await this.send(this.exchange, routingKey, event, {
               messageId: event.eventId,
               type: event.type,
               timestamp: Date.parse(event.occurredAt),
          });
          log.debug({ eventId: event.eventId, routingKey }, 'Domain event published');
     }
}
