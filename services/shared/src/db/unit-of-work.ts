import type { UnitOfWork } from '../domain/repositories';
import { withTransaction } from './client';
import { PgItemRepository } from './repositories/item-repository';
import { PgOrderRepository } from './repositories/order-repository';

/**
 * Run `work` inside one PostgreSQL transaction with both repositories bound to
 * it. Resolves only after COMMIT succeeded.
 */
export function withUnitOfWork<T>(work: (uow: UnitOfWork) => Promise<T>): Promise<T> {
     return withTransaction((client) =>
          work({
               orders: new PgOrderRepository(client),
               items: new PgItemRepository(client),
          })
     );
}
