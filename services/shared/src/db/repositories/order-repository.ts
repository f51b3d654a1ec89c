import type { PoolClient } from 'pg';
import { Order, isOrderStatus, type OrderStatus } from '../../domain/order';
import type { OrderItemSnapshot } from '../../domain/order-item';
import type { OrderRepository } from '../../domain/repositories';
import { ConcurrencyConflictError } from '../../utils/errors';
import { logger } from '../../utils/logger';

interface OrderRow {
     id: string;
     customer_id: string;
     order_date: Date;
     status: string;
     tracking_number: string | null;
     created_at: Date;
     updated_at: Date;
     concurrency_token: string;
}

interface OrderItemRow {
     id: string;
     order_id: string;
     product_id: string;
     item_id: string | null;
     quantity: number;
     unit_price: string;
}

const ORDER_COLUMNS = `
     id, customer_id, order_date, status, tracking_number,
     created_at, updated_at, concurrency_token
`;

type PendingWrite = () => Promise<void>;

/**
 * PostgreSQL order repository bound to one transaction client. Orders own
 * their rows in order_items; those are rewritten on every update.
 */
export class PgOrderRepository implements OrderRepository {
     private readonly loadedTokens = new Map<string, string>();
     private pendingWrites: PendingWrite[] = [];

     constructor(private readonly client: PoolClient) {}

     async getById(id: string): Promise<Order | null> {
          const { rows } = await this.client.query<OrderRow>(
               `SELECT ${ORDER_COLUMNS} FROM orders WHERE id = $1 AND is_deleted = FALSE`,
               [id]
          );
          const [order] = await this.hydrate(rows);
          return order ?? null;
     }

     async getByCustomer(customerId: string): Promise<Order[]> {
          const { rows } = await this.client.query<OrderRow>(
               `
      SELECT ${ORDER_COLUMNS}
      FROM orders
      WHERE customer_id = $1 AND is_deleted = FALSE
      ORDER BY order_date DESC
    `,
               [customerId]
          );
          return this.hydrate(rows);
     }

     async getByStatus(status: OrderStatus): Promise<Order[]> {
          const { rows } = await this.client.query<OrderRow>(
               `
      SELECT ${ORDER_COLUMNS}
      FROM orders
      WHERE status = $1 AND is_deleted = FALSE
      ORDER BY order_date
    `,
               [status]
          );
          return this.hydrate(rows);
     }

     async add(order: Order): Promise<void> {
          this.pendingWrites.push(() => this.insert(order));
     }

     async update(order: Order): Promise<void> {
          const expectedToken = this.expectedTokenFor(order);
          this.pendingWrites.push(() => this.write(order, expectedToken));
     }

     async softDelete(order: Order): Promise<void> {
          const expectedToken = this.expectedTokenFor(order);
          this.pendingWrites.push(async () => {
               const result = await this.client.query(
                    `
        UPDATE orders
        SET is_deleted = TRUE,
            deleted_at = NOW()
        WHERE id = $1 AND concurrency_token = $2 AND is_deleted = FALSE
      `,
                    [order.id, expectedToken]
               );
               if (!result.rowCount) {
                    throw new ConcurrencyConflictError('Order', order.id);
               }
               this.loadedTokens.delete(order.id);
          });
     }

     async saveChanges(): Promise<void> {
          const writes = this.pendingWrites;
          this.pendingWrites = [];
          for (const write of writes) {
               await write();
          }
     }

     private expectedTokenFor(order: Order): string {
          const expectedToken = this.loadedTokens.get(order.id);
          if (expectedToken === undefined) {
               throw new Error(`Order ${order.id} was not loaded through this repository`);
          }
          return expectedToken;
     }

     private async insert(order: Order): Promise<void> {
          const snapshot = order.toSnapshot();
          await this.client.query(
               `
      INSERT INTO orders (
        id, customer_id, order_date, status, total_amount, tracking_number,
        created_at, updated_at, concurrency_token
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
    `,
               [
                    snapshot.id,
                    snapshot.customerId,
                    snapshot.orderDate,
                    snapshot.status,
                    order.totalAmount.toDecimal().toFixed(2),
                    snapshot.trackingNumber,
                    snapshot.createdAt,
                    snapshot.updatedAt,
                    snapshot.concurrencyToken,
               ]
          );
          await this.insertItems(snapshot.id, snapshot.items);
          this.loadedTokens.set(snapshot.id, snapshot.concurrencyToken);
     }

     private async write(order: Order, expectedToken: string): Promise<void> {
          const snapshot = order.toSnapshot();
          const result = await this.client.query(
               `
      UPDATE orders
      SET customer_id = $1,
          status = $2,
          total_amount = $3,
          tracking_number = $4,
          updated_at = $5,
          concurrency_token = $6
      WHERE id = $7 AND concurrency_token = $8 AND is_deleted = FALSE
    `,
               [
                    snapshot.customerId,
                    snapshot.status,
                    order.totalAmount.toDecimal().toFixed(2),
                    snapshot.trackingNumber,
                    snapshot.updatedAt,
                    snapshot.concurrencyToken,
                    snapshot.id,
                    expectedToken,
               ]
          );

          if (!result.rowCount) {
               logger.warn({ orderId: snapshot.id, expectedToken }, 'Stale order concurrency token');
               throw new ConcurrencyConflictError('Order', snapshot.id);
          }

          await this.client.query(`DELETE FROM order_items WHERE order_id = $1`, [snapshot.id]);
          await this.insertItems(snapshot.id, snapshot.items);
          this.loadedTokens.set(snapshot.id, snapshot.concurrencyToken);
     }

     private async insertItems(orderId: string, items: OrderItemSnapshot[]): Promise<void> {
          for (const [position, item] of items.entries()) {
               await this.client.query(
                    `
        INSERT INTO order_items (
          id, order_id, position, product_id, item_id, quantity, unit_price
        ) VALUES ($1, $2, $3, $4, $5, $6, $7)
      `,
                    [
                         item.id,
                         orderId,
                         position,
                         item.productId,
                         item.itemId,
                         item.quantity,
                         item.unitPrice.toFixed(2),
                    ]
               );
          }
     }

     private async hydrate(rows: OrderRow[]): Promise<Order[]> {
          if (rows.length === 0) {
               return [];
          }

          const { rows: itemRows } = await this.client.query<OrderItemRow>(
               `
      SELECT id, order_id, product_id, item_id, quantity, unit_price
      FROM order_items
      WHERE order_id = ANY($1::uuid[])
      ORDER BY order_id, position
    `,
               [rows.map((row) => row.id)]
          );

          const itemsByOrder = new Map<string, OrderItemSnapshot[]>();
          for (const itemRow of itemRows) {
               const items = itemsByOrder.get(itemRow.order_id) ?? [];
               items.push({
                    id: itemRow.id,
                    productId: itemRow.product_id,
                    itemId: itemRow.item_id,
                    quantity: itemRow.quantity,
                    unitPrice: Number(itemRow.unit_price),
               });
               itemsByOrder.set(itemRow.order_id, items);
          }

          return rows.map((row) => {
               if (!isOrderStatus(row.status)) {
                    throw new Error(`Order ${row.id} has unknown status '${row.status}'`);
               }
               this.loadedTokens.set(row.id, row.concurrency_token);
               return Order.restore({
                    id: row.id,
                    customerId: row.customer_id,
                    orderDate: row.order_date,
                    status: row.status,
                    items: itemsByOrder.get(row.id) ?? [],
                    trackingNumber: row.tracking_number,
                    createdAt: row.created_at,
                    updatedAt: row.updated_at,
                    concurrencyToken: row.concurrency_token,
               });
          });
     }
}
