import { v4 as uuidv4 } from 'uuid';
import { ValidationError } from '../utils/errors';
import { Money } from './value-objects/money';
import type { DecimalInput } from './value-objects/decimal';

export interface OrderItemProps {
     productId: string;
     itemId?: string | null;
     quantity: number;
     unitPrice: Money | DecimalInput;
}

export interface OrderItemSnapshot {
     id: string;
     productId: string;
     itemId: string | null;
     quantity: number;
     unitPrice: number;
}

/**
 * Line of an order. `itemId` optionally points at a catalog Item; it is a
 * reference only and the order never loads it.
 */
export class OrderItem {
     private constructor(
          readonly id: string,
          readonly productId: string,
          readonly itemId: string | null,
          readonly quantity: number,
          readonly unitPrice: Money
     ) {}

     static create(props: OrderItemProps): OrderItem {
          if (props.productId.trim().length === 0) {
               throw ValidationError.forField('productId', 'Product ID cannot be empty', 'too_small');
          }
          if (!Number.isInteger(props.quantity) || props.quantity <= 0) {
               throw ValidationError.forField(
                    'quantity',
                    'Quantity must be a whole number greater than zero',
                    'too_small'
               );
          }

          const unitPrice = props.unitPrice instanceof Money ? props.unitPrice : Money.of(props.unitPrice);
          if (unitPrice.isZero()) {
               throw ValidationError.forField(
                    'unitPrice',
                    'Unit price must be greater than zero',
                    'too_small'
               );
          }

          return new OrderItem(uuidv4(), props.productId, props.itemId ?? null, props.quantity, unitPrice);
     }

     static restore(snapshot: OrderItemSnapshot): OrderItem {
          return new OrderItem(
               snapshot.id,
               snapshot.productId,
               snapshot.itemId,
               snapshot.quantity,
               Money.of(snapshot.unitPrice)
          );
     }

     get totalPrice(): Money {
          return this.unitPrice.multiply(this.quantity);
     }

     toSnapshot(): OrderItemSnapshot {
          return {
               id: this.id,
               productId: this.productId,
               itemId: this.itemId,
               quantity: this.quantity,
               unitPrice: this.unitPrice.amount,
          };
     }
}
