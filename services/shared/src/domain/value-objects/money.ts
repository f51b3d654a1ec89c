import { Decimal } from 'decimal.js';
import { ValidationError } from '../../utils/errors';
import { CURRENCY_SCALE, type DecimalInput, parseAmount, roundCurrency } from './decimal';

/**
 * Single-currency monetary amount used by orders. Never negative, always rounded to cents.
 */
export class Money {
     private constructor(private readonly value: Decimal) {}

     static of(amount: DecimalInput): Money {
          const parsed = parseAmount(amount, 'amount');
          if (parsed.lessThan(0)) {
               throw ValidationError.forField('amount', 'Money amount cannot be negative', 'too_small');
          }
          return new Money(roundCurrency(parsed));
     }

     static zero(): Money {
          return new Money(new Decimal(0));
     }

     static sum(amounts: Iterable<Money>): Money {
          let total = new Decimal(0);
          for (const money of amounts) {
               total = total.plus(money.value);
          }
          return Money.of(total);
     }

     get amount(): number {
          return this.value.toNumber();
     }

     toDecimal(): Decimal {
          return this.value;
     }

     add(other: Money): Money {
          return Money.of(this.value.plus(other.value));
     }

     subtract(other: Money): Money {
          return Money.of(this.value.minus(other.value));
     }

     multiply(factor: DecimalInput): Money {
          return Money.of(this.value.times(parseAmount(factor, 'factor')));
     }

     isZero(): boolean {
          return this.value.isZero();
     }

     isGreaterThan(other: Money): boolean {
          return this.value.greaterThan(other.value);
     }

     equals(other: Money): boolean {
          return this.value.equals(other.value);
     }

     toString(): string {
          return `$${this.value.toFixed(CURRENCY_SCALE)}`;
     }

     toJSON(): number {
          return this.amount;
     }
}
