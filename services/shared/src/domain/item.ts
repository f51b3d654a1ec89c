import { ValidationError, InactiveItemError } from '../utils/errors';
import { AggregateRoot, newAggregateMetadata, type AggregateMetadata } from './aggregate-root';
import { createDomainEvent, type ItemEvent } from './events';
import { Price } from './value-objects/price';
import { Sku } from './value-objects/sku';
import { StockLevel } from './value-objects/stock-level';

export const ITEM_NAME_MAX_LENGTH = 200;
export const ITEM_DESCRIPTION_MAX_LENGTH = 1000;
export const ITEM_CATEGORY_MAX_LENGTH = 100;

export interface ItemDetails {
     name: string;
     description: string;
     price: Price;
     category: string;
}

export interface CreateItemProps extends Omit<ItemDetails, 'description'> {
     sku: Sku;
     description?: string;
     initialStock: number;
}

export interface ItemSnapshot {
     id: string;
     sku: string;
     name: string;
     description: string;
     price: number;
     currency: string;
     available: number;
     reserved: number;
     category: string;
     isActive: boolean;
     createdAt: Date;
     updatedAt: Date;
     concurrencyToken: string;
}

function assertText(field: string, value: string, maxLength: number, required: boolean): void {
     if (required && value.trim().length === 0) {
          throw ValidationError.forField(field, `Item ${field} cannot be empty`, 'too_small');
     }
     if (value.length > maxLength) {
          throw ValidationError.forField(
               field,
               `Item ${field} cannot exceed ${maxLength} characters`,
               'too_big'
          );
     }
}

function assertDetails(details: ItemDetails): void {
     assertText('name', details.name, ITEM_NAME_MAX_LENGTH, true);
     assertText('description', details.description, ITEM_DESCRIPTION_MAX_LENGTH, false);
     assertText('category', details.category, ITEM_CATEGORY_MAX_LENGTH, true);
}

/**
 * Catalog item with its stock partition.
 *
 * SKU uniqueness across items is checked by the persistence layer before an
 * item is created; the aggregate cannot see its siblings.
 */
export class Item extends AggregateRoot<ItemEvent> {
     readonly sku: Sku;
     private _details: ItemDetails;
     private _stockLevel: StockLevel;
     private _isActive: boolean;

     private constructor(
          metadata: AggregateMetadata,
          sku: Sku,
          details: ItemDetails,
          stockLevel: StockLevel,
          isActive: boolean
     ) {
          super(metadata);
          this.sku = sku;
          this._details = details;
          this._stockLevel = stockLevel;
          this._isActive = isActive;
     }

     static create(props: CreateItemProps): Item {
          const details: ItemDetails = {
               name: props.name,
               description: props.description ?? '',
               price: props.price,
               category: props.category,
          };
          assertDetails(details);
          const stockLevel = StockLevel.of(props.initialStock);

          const item = new Item(newAggregateMetadata(), props.sku, details, stockLevel, true);
          item.raise(
               createDomainEvent('ItemCreated', 'Item', item.id, {
                    itemId: item.id,
                    sku: item.sku.value,
                    name: details.name,
                    price: details.price.amount,
               })
          );
          return item;
     }

     /** Rebuild a persisted item. No events are raised. */
     static restore(snapshot: ItemSnapshot): Item {
          return new Item(
               {
                    id: snapshot.id,
                    createdAt: snapshot.createdAt,
                    updatedAt: snapshot.updatedAt,
                    concurrencyToken: snapshot.concurrencyToken,
               },
               Sku.of(snapshot.sku),
               {
                    name: snapshot.name,
                    description: snapshot.description,
                    price: Price.of(snapshot.price, snapshot.currency),
                    category: snapshot.category,
               },
               StockLevel.of(snapshot.available, snapshot.reserved),
               snapshot.isActive
          );
     }

     get name(): string {
          return this._details.name;
     }

     get description(): string {
          return this._details.description;
     }

     get price(): Price {
          return this._details.price;
     }

     get category(): string {
          return this._details.category;
     }

     get stockLevel(): StockLevel {
          return this._stockLevel;
     }

     get isActive(): boolean {
          return this._isActive;
     }

     /**
      * Replace name, description, price and category together. A call that
      * changes nothing raises no event and keeps the concurrency token.
      */
     update(details: ItemDetails): void {
          this.assertActive('update');
          assertDetails(details);

          const current = this._details;
          const hasChanges =
               current.name !== details.name ||
               current.description !== details.description ||
               !current.price.equals(details.price) ||
               current.category !== details.category;

          if (!hasChanges) {
               return;
          }

          this._details = { ...details };
          this.touch();

          this.raise(
               createDomainEvent('ItemUpdated', 'Item', this.id, {
                    itemId: this.id,
                    sku: this.sku.value,
                    name: details.name,
                    price: details.price.amount,
               })
          );
     }

     reserveStock(quantity: number): void {
          this.assertActive('reserve stock for');
          this.applyStock(this._stockLevel.reserve(quantity));
          this.raise(
               createDomainEvent('StockReserved', 'Item', this.id, {
                    itemId: this.id,
                    sku: this.sku.value,
                    quantity,
               })
          );
     }

     releaseStock(quantity: number): void {
          this.assertActive('release stock for');
          this.applyStock(this._stockLevel.release(quantity));
          this.raise(
               createDomainEvent('StockReleased', 'Item', this.id, {
                    itemId: this.id,
                    sku: this.sku.value,
                    quantity,
               })
          );
     }

     commitStock(quantity: number): void {
          this.assertActive('commit stock for');
          this.applyStock(this._stockLevel.commit(quantity));
          this.raise(
               createDomainEvent('StockCommitted', 'Item', this.id, {
                    itemId: this.id,
                    sku: this.sku.value,
                    quantity,
               })
          );
     }

     adjustStock(newAvailable: number): void {
          this.assertActive('adjust stock for');
          const oldQuantity = this._stockLevel.available;
          this.applyStock(this._stockLevel.adjust(newAvailable));
          this.raise(
               createDomainEvent('StockAdjusted', 'Item', this.id, {
                    itemId: this.id,
                    sku: this.sku.value,
                    oldQuantity,
                    newQuantity: newAvailable,
               })
          );
     }

     deactivate(): void {
          if (!this._isActive) {
               return;
          }

          this._isActive = false;
          this.touch();
          this.raise(
               createDomainEvent('ItemDeactivated', 'Item', this.id, {
                    itemId: this.id,
                    sku: this.sku.value,
               })
          );
     }

     activate(): void {
          if (this._isActive) {
               return;
          }

          this._isActive = true;
          this.touch();
          this.raise(
               createDomainEvent('ItemActivated', 'Item', this.id, {
                    itemId: this.id,
                    sku: this.sku.value,
               })
          );
     }

     toSnapshot(): ItemSnapshot {
          return {
               id: this.id,
               sku: this.sku.value,
               name: this._details.name,
               description: this._details.description,
               price: this._details.price.amount,
               currency: this._details.price.currency,
               available: this._stockLevel.available,
               reserved: this._stockLevel.reserved,
               category: this._details.category,
               isActive: this._isActive,
               createdAt: this.createdAt,
               updatedAt: this.updatedAt,
               concurrencyToken: this.concurrencyToken,
          };
     }

     private applyStock(next: StockLevel): void {
          this._stockLevel = next;
          this.touch();
     }

     private assertActive(operation: string): void {
          if (!this._isActive) {
               throw new InactiveItemError(this.id, operation);
          }
     }
}
