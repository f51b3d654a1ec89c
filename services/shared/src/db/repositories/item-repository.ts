import type { PoolClient } from 'pg';
import { Item } from '../../domain/item';
import type { ItemRepository } from '../../domain/repositories';
import { ConcurrencyConflictError, DuplicateSkuError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { isUniqueViolation } from './pg-errors';

interface ItemRow {
     id: string;
     sku: string;
     name: string;
     description: string;
     price: string;
     currency: string;
     available_stock: number;
     reserved_stock: number;
     category: string;
     is_active: boolean;
     created_at: Date;
     updated_at: Date;
     concurrency_token: string;
}

const ITEM_COLUMNS = `
     id, sku, name, description, price, currency,
     available_stock, reserved_stock, category, is_active,
     created_at, updated_at, concurrency_token
`;

type PendingWrite = () => Promise<void>;

/**
 * PostgreSQL item repository bound to one transaction client.
 *
 * The token observed when an item is loaded is remembered; `saveChanges`
 * only updates the row if it still carries that token.
 */
export class PgItemRepository implements ItemRepository {
     private readonly loadedTokens = new Map<string, string>();
     private pendingWrites: PendingWrite[] = [];

     constructor(private readonly client: PoolClient) {}

     async getById(id: string): Promise<Item | null> {
          const { rows } = await this.client.query<ItemRow>(
               `SELECT ${ITEM_COLUMNS} FROM items WHERE id = $1`,
               [id]
          );
          return rows.length > 0 ? this.track(rows[0]) : null;
     }

     async getBySku(sku: string): Promise<Item | null> {
          const { rows } = await this.client.query<ItemRow>(
               `SELECT ${ITEM_COLUMNS} FROM items WHERE sku = $1`,
               [sku]
          );
          return rows.length > 0 ? this.track(rows[0]) : null;
     }

     async skuExists(sku: string): Promise<boolean> {
          const { rows } = await this.client.query<{ exists: boolean }>(
               `SELECT EXISTS (SELECT 1 FROM items WHERE sku = $1) AS exists`,
               [sku]
          );
          return rows.length > 0 && rows[0].exists;
     }

     async add(item: Item): Promise<void> {
          this.pendingWrites.push(() => this.insert(item));
     }

     async update(item: Item): Promise<void> {
          const expectedToken = this.loadedTokens.get(item.id);
          if (expectedToken === undefined) {
               throw new Error(`Item ${item.id} was not loaded through this repository`);
          }
          this.pendingWrites.push(() => this.write(item, expectedToken));
     }

     async saveChanges(): Promise<void> {
          const writes = this.pendingWrites;
          this.pendingWrites = [];
          for (const write of writes) {
               await write();
          }
     }

     private async insert(item: Item): Promise<void> {
          const snapshot = item.toSnapshot();
          try {
               await this.client.query(
                    `
        INSERT INTO items (
          id, sku, name, description, price, currency,
          available_stock, reserved_stock, category, is_active,
          created_at, updated_at, concurrency_token
        ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13)
      `,
                    [
                         snapshot.id,
                         snapshot.sku,
                         snapshot.name,
                         snapshot.description,
                         item.price.toDecimal().toFixed(2),
                         snapshot.currency,
                         snapshot.available,
                         snapshot.reserved,
                         snapshot.category,
                         snapshot.isActive,
                         snapshot.createdAt,
                         snapshot.updatedAt,
                         snapshot.concurrencyToken,
                    ]
               );
          } catch (err) {
               if (isUniqueViolation(err, 'ix_items_sku')) {
                    throw new DuplicateSkuError(snapshot.sku);
               }
               throw err;
          }
          this.loadedTokens.set(snapshot.id, snapshot.concurrencyToken);
     }

     private async write(item: Item, expectedToken: string): Promise<void> {
          const snapshot = item.toSnapshot();
          const result = await this.client.query(
               `
      UPDATE items
      SET name = $1,
          description = $2,
          price = $3,
          currency = $4,
          available_stock = $5,
          reserved_stock = $6,
          category = $7,
          is_active = $8,
          updated_at = $9,
          concurrency_token = $10
      WHERE id = $11 AND concurrency_token = $12
    `,
               [
                    snapshot.name,
                    snapshot.description,
                    item.price.toDecimal().toFixed(2),
                    snapshot.currency,
                    snapshot.available,
                    snapshot.reserved,
                    snapshot.category,
                    snapshot.isActive,
                    snapshot.updatedAt,
                    snapshot.concurrencyToken,
                    snapshot.id,
                    expectedToken,
               ]
          );

          if (!result.rowCount) {
               logger.warn({ itemId: snapshot.id, expectedToken }, 'Stale item concurrency token');
               throw new ConcurrencyConflictError('Item', snapshot.id);
          }
          this.loadedTokens.set(snapshot.id, snapshot.concurrencyToken);
     }

     private track(row: ItemRow): Item {
          this.loadedTokens.set(row.id, row.concurrency_token);
          return Item.restore({
               id: row.id,
               sku: row.sku,
               name: row.name,
               description: row.description,
               price: Number(row.price),
               currency: row.currency,
               available: row.available_stock,
               reserved: row.reserved_stock,
               category: row.category,
               isActive: row.is_active,
               createdAt: row.created_at,
               updatedAt: row.updated_at,
               concurrencyToken: row.concurrency_token,
          });
     }
}
