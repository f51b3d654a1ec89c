import type { Bindings } from 'pino';
import { withUnitOfWork } from '../db/unit-of-work';
import { Item } from '../domain/item';
import type { EventPublisher, UnitOfWork, UnitOfWorkRunner } from '../domain/repositories';
import { Price } from '../domain/value-objects/price';
import { Sku } from '../domain/value-objects/sku';
import { AmqpEventPublisher } from '../messaging/event-publisher';
import {
     adjustStockSchema,
     createItemSchema,
     itemIdSchema,
     stockQuantitySchema,
     updateItemSchema,
     type AdjustStockCommand,
     type CreateItemCommand,
     type StockQuantityCommand,
     type UpdateItemCommand,
} from '../schemas/item.schemas';
import type { ItemDto } from '../types/item.types';
import { DuplicateSkuError, ItemNotFoundError, errorKindOf } from '../utils/errors';
import { createChildLogger } from '../utils/logger';
import { validateOrThrow } from '../utils/validation';
import { toItemDto } from './mappers';

type StockOperation = 'reserveStock' | 'releaseStock' | 'commitStock';

export class ItemService {
     private readonly log = createChildLogger({ component: 'item-service' });

     constructor(
          private readonly runInUnitOfWork: UnitOfWorkRunner = withUnitOfWork,
          private readonly publisher: EventPublisher = new AmqpEventPublisher()
     ) {}

     async createItem(command: CreateItemCommand): Promise<ItemDto> {
          return this.run('createItem', { sku: command.sku }, async () => {
               const input = validateOrThrow(createItemSchema, command, 'CreateItem');
               const item = await this.commit(async (uow) => {
                    if (await uow.items.skuExists(input.sku)) {
                         throw new DuplicateSkuError(input.sku);
                    }

                    const created = Item.create({
                         sku: Sku.of(input.sku),
                         name: input.name,
                         description: input.description,
                         price: Price.of(input.price, input.currency),
                         category: input.category,
                         initialStock: input.initialStock,
                    });
                    await uow.items.add(created);
                    await uow.items.saveChanges();
                    return created;
               });
               return toItemDto(item);
          });
     }

     async getItem(itemId: string): Promise<ItemDto | null> {
          const id = validateOrThrow(itemIdSchema, itemId, 'ItemId');
          const item = await this.runInUnitOfWork((uow) => uow.items.getById(id));
          return item ? toItemDto(item) : null;
     }

     async getItemBySku(sku: string): Promise<ItemDto | null> {
          const item = await this.runInUnitOfWork((uow) => uow.items.getBySku(sku));
          return item ? toItemDto(item) : null;
     }

     async updateItem(command: UpdateItemCommand): Promise<ItemDto> {
          return this.run('updateItem', { itemId: command.itemId }, async () => {
               const input = validateOrThrow(updateItemSchema, command, 'UpdateItem');
               return this.mutate(input.itemId, (item) =>
                    item.update({
                         name: input.name,
                         description: input.description,
                         price: Price.of(input.price, item.price.currency),
                         category: input.category,
                    })
               );
          });
     }

     async reserveStock(command: StockQuantityCommand): Promise<ItemDto> {
          return this.changeStock('reserveStock', command);
     }

     async releaseStock(command: StockQuantityCommand): Promise<ItemDto> {
          return this.changeStock('releaseStock', command);
     }

     /** Permanently remove reserved units, e.g. once an order has shipped. */
     async commitStock(command: StockQuantityCommand): Promise<ItemDto> {
          return this.changeStock('commitStock', command);
     }

     async adjustStock(command: AdjustStockCommand): Promise<ItemDto> {
          const context = {
               itemId: command.itemId,
               newQuantity: command.newQuantity,
               reason: command.reason,
          };
          return this.run('adjustStock', context, async () => {
               const input = validateOrThrow(adjustStockSchema, command, 'AdjustStock');
               return this.mutate(input.itemId, (item) => item.adjustStock(input.newQuantity));
          });
     }

     async deactivateItem(itemId: string): Promise<ItemDto> {
          return this.run('deactivateItem', { itemId }, async () => {
               const id = validateOrThrow(itemIdSchema, itemId, 'ItemId');
               return this.mutate(id, (item) => item.deactivate());
          });
     }

     async activateItem(itemId: string): Promise<ItemDto> {
          return this.run('activateItem', { itemId }, async () => {
               const id = validateOrThrow(itemIdSchema, itemId, 'ItemId');
               return this.mutate(id, (item) => item.activate());
          });
     }

     private changeStock(operation: StockOperation, command: StockQuantityCommand): Promise<ItemDto> {
          const context = {
               itemId: command.itemId,
               quantity: command.quantity,
               orderId: command.orderId,
          };
          return this.run(operation, context, async () => {
               const input = validateOrThrow(stockQuantitySchema, command, 'StockQuantity');
               return this.mutate(input.itemId, (item) => item[operation](input.quantity));
          });
     }

     private async mutate(itemId: string, apply: (item: Item) => void): Promise<ItemDto> {
          const item = await this.commit(async (uow) => {
               const loaded = await uow.items.getById(itemId);
               if (!loaded) {
                    throw new ItemNotFoundError(itemId);
               }
               apply(loaded);
               await uow.items.update(loaded);
               await uow.items.saveChanges();
               return loaded;
          });
          return toItemDto(item);
     }

     private async commit(work: (uow: UnitOfWork) => Promise<Item>): Promise<Item> {
          const item = await this.runInUnitOfWork(work);
          for (const event of item.drainEvents()) {
               await this.publisher.publish(event);
          }
          return item;
     }

     private async run<T>(operation: string, context: Bindings, action: () => Promise<T>): Promise<T> {
          try {
               const result = await action();
               this.log.info({ operation, ...context }, 'Item command completed');
               return result;
          } catch (err) {
               const kind = errorKindOf(err);
               if (kind === 'unexpected') {
                    this.log.error({ err, operation, ...context }, 'Item command failed');
               } else {
                    this.log.warn({ err, operation, kind, ...context }, 'Item command rejected');
               }
               throw err;
          }
     }
}
