import type { DomainEvent } from './events';
import type { Item } from './item';
import type { Order, OrderStatus } from './order';

/**
 * Persistence contract for an aggregate. Writes are staged by `add`/`update`
 * and become durable on `saveChanges`.
 *
 * `update` must detect a stale concurrency token and surface it as a
 * ConcurrencyConflictError, either when staged or when saved.
 */
export interface Repository<TAggregate> {
     getById(id: string): Promise<TAggregate | null>;
     add(aggregate: TAggregate): Promise<void>;
     update(aggregate: TAggregate): Promise<void>;
     saveChanges(): Promise<void>;
}

export interface ItemRepository extends Repository<Item> {
     getBySku(sku: string): Promise<Item | null>;
     skuExists(sku: string): Promise<boolean>;
}

export interface OrderRepository extends Repository<Order> {
     getByCustomer(customerId: string): Promise<Order[]>;
     getByStatus(status: OrderStatus): Promise<Order[]>;
     softDelete(order: Order): Promise<void>;
}

export interface UnitOfWork {
     orders: OrderRepository;
     items: ItemRepository;
}

/** Runs `work` against repositories that share one transaction. */
export type UnitOfWorkRunner = <T>(work: (uow: UnitOfWork) => Promise<T>) => Promise<T>;

export interface EventPublisher {
     publish(event: DomainEvent): Promise<void>;
}
