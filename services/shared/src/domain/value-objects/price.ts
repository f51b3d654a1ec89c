import type { Decimal } from 'decimal.js';
import { ValidationError } from '../../utils/errors';
import { CURRENCY_SCALE, type DecimalInput, parseAmount, roundCurrency } from './decimal';

export const DEFAULT_CURRENCY = 'USD';

/**
 * Catalog price of an item: a non-negative amount in an explicit currency.
 */
export class Price {
     private constructor(
          private readonly value: Decimal,
          readonly currency: string
     ) {}

     static of(amount: DecimalInput, currency: string = DEFAULT_CURRENCY): Price {
          const parsed = parseAmount(amount, 'price');
          if (parsed.lessThan(0)) {
               throw ValidationError.forField('price', 'Price cannot be negative', 'too_small');
          }

          const normalizedCurrency = currency.trim().toUpperCase();
          if (normalizedCurrency.length === 0) {
               throw ValidationError.forField('currency', 'Currency cannot be empty', 'too_small');
          }

          return new Price(roundCurrency(parsed), normalizedCurrency);
     }

     get amount(): number {
          return this.value.toNumber();
     }

     toDecimal(): Decimal {
          return this.value;
     }

     equals(other: Price): boolean {
          return this.value.equals(other.value) && this.currency === other.currency;
     }

     toString(): string {
          return `${this.value.toFixed(CURRENCY_SCALE)} ${this.currency}`;
     }
}
