import { v4 as uuidv4 } from 'uuid';
import type { DomainEvent } from './events';

export interface AggregateMetadata {
     id: string;
     createdAt: Date;
     updatedAt: Date;
     concurrencyToken: string;
}

export function newAggregateMetadata(): AggregateMetadata {
     const now = new Date();
     return { id: uuidv4(), createdAt: now, updatedAt: now, concurrencyToken: uuidv4() };
}

/**
 * Base for aggregates that buffer the events raised by their own operations.
 *
 * Events are only handed out through `drainEvents()`, which a collaborator calls
 * once per unit of work after the aggregate has been persisted.
 */
export abstract class AggregateRoot<TEvent extends DomainEvent> {
     readonly id: string;
     readonly createdAt: Date;
     private _updatedAt: Date;
     private _concurrencyToken: string;
     private pendingEvents: TEvent[] = [];

     protected constructor(metadata: AggregateMetadata) {
          this.id = metadata.id;
          this.createdAt = metadata.createdAt;
          this._updatedAt = metadata.updatedAt;
          this._concurrencyToken = metadata.concurrencyToken;
     }

     get updatedAt(): Date {
          return this._updatedAt;
     }

     /** Opaque version tag; a new value after every mutation. */
     get concurrencyToken(): string {
          return this._concurrencyToken;
     }

     get domainEvents(): readonly TEvent[] {
          return [...this.pendingEvents];
     }

     drainEvents(): TEvent[] {
          const drained = this.pendingEvents;
          this.pendingEvents = [];
          return drained;
     }

     clearEvents(): void {
          this.pendingEvents = [];
     }

     /** Stamp the mutation and regenerate the concurrency token. */
     protected touch(): void {
          this._updatedAt = new Date();
          this._concurrencyToken = uuidv4();
     }

     protected raise(event: TEvent): void {
          this.pendingEvents.push(event);
     }
}
