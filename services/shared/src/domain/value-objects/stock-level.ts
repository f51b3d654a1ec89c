import {
     BusinessRuleError,
     InsufficientStockError,
     ValidationError,
} from '../../utils/errors';

function assertCount(value: number, field: string): void {
     if (!Number.isInteger(value)) {
          throw ValidationError.forField(field, `${field} must be a whole number`, 'invalid_type');
     }
     if (value < 0) {
          throw ValidationError.forField(field, `${field} cannot be negative`, 'too_small');
     }
}

function assertPositiveQuantity(quantity: number, operation: string): void {
     if (!Number.isInteger(quantity) || quantity <= 0) {
          throw ValidationError.forField(
               'quantity',
               `${operation} quantity must be a positive whole number`,
               'too_small'
          );
     }
}

/**
 * Partition of an item's on-hand stock into available and reserved units.
 *
 * Every transition returns a new StockLevel; a rejected transition leaves the
 * receiver untouched.
 */
export class StockLevel {
     private constructor(
          readonly available: number,
          readonly reserved: number
     ) {}

     static of(available: number, reserved: number = 0): StockLevel {
          assertCount(available, 'available');
          assertCount(reserved, 'reserved');
          return new StockLevel(available, reserved);
     }

     get total(): number {
          return this.available + this.reserved;
     }

     reserve(quantity: number): StockLevel {
          assertPositiveQuantity(quantity, 'Reserve');
          if (quantity > this.available) {
               throw new InsufficientStockError(
                    `Cannot reserve ${quantity} items. Only ${this.available} available.`,
                    quantity,
                    this.available
               );
          }
          return new StockLevel(this.available - quantity, this.reserved + quantity);
     }

     /** Return reserved units to available stock. */
     release(quantity: number): StockLevel {
          assertPositiveQuantity(quantity, 'Release');
          this.assertReserved(quantity, 'release');
          return new StockLevel(this.available + quantity, this.reserved - quantity);
     }

     /** Remove reserved units from inventory permanently (e.g. shipped). */
     commit(quantity: number): StockLevel {
          assertPositiveQuantity(quantity, 'Commit');
          this.assertReserved(quantity, 'commit');
          return new StockLevel(this.available, this.reserved - quantity);
     }

     /** Manual correction of available stock; reservations are kept. */
     adjust(newAvailable: number): StockLevel {
          assertCount(newAvailable, 'newAvailable');
          return new StockLevel(newAvailable, this.reserved);
     }

     equals(other: StockLevel): boolean {
          return this.available === other.available && this.reserved === other.reserved;
     }

     toString(): string {
          return `Available: ${this.available}, Reserved: ${this.reserved}`;
     }

     private assertReserved(quantity: number, operation: string): void {
          if (quantity > this.reserved) {
               throw new BusinessRuleError(
                    `Cannot ${operation} ${quantity} items. Only ${this.reserved} reserved.`,
                    'INSUFFICIENT_RESERVED_STOCK'
               );
          }
     }
}
