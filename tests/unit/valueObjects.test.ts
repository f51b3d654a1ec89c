import { Money } from '@orderflow/shared/src/domain/value-objects/money';
import { Price } from '@orderflow/shared/src/domain/value-objects/price';
import { Sku } from '@orderflow/shared/src/domain/value-objects/sku';
import { ValidationError } from '@orderflow/shared/src/utils/errors';

describe('Money', () => {
     it('should round to cents half-up on construction', () => {
          expect(Money.of(10.005).amount).toBe(10.01);
          expect(Money.of(10.004).amount).toBe(10);
          expect(Money.of('19.999').toString()).toBe('$20.00');
     });

     it('should add without binary floating point drift', () => {
          const total = Money.of(0.1).add(Money.of(0.2));
          expect(total.amount).toBe(0.3);
          expect(total.toString()).toBe('$0.30');
     });

     it('should multiply and sum', () => {
          expect(Money.of(10).multiply(2).amount).toBe(20);
          expect(Money.sum([Money.of(20), Money.of(15.5)]).amount).toBe(35.5);
          expect(Money.sum([]).isZero()).toBe(true);
     });

     it('should reject negative amounts', () => {
          expect(() => Money.of(-0.01)).toThrow(ValidationError);
          expect(() => Money.of(5).subtract(Money.of(6))).toThrow('Money amount cannot be negative');
     });

     it('should reject non-numeric and non-finite input', () => {
          expect(() => Money.of('abc')).toThrow(ValidationError);
          expect(() => Money.of(Number.POSITIVE_INFINITY)).toThrow('amount must be a finite number');
     });

     it('should compare by value', () => {
          expect(Money.of(12.5).equals(Money.of('12.50'))).toBe(true);
          expect(Money.of(13).isGreaterThan(Money.of(12.99))).toBe(true);
          expect(Money.zero().isZero()).toBe(true);
     });

     it('should serialise as a plain number', () => {
          expect(JSON.stringify({ total: Money.of(35.5) })).toBe('{"total":35.5}');
     });
});

describe('Price', () => {
     it('should default to USD', () => {
          const price = Price.of(25.99);
          expect(price.amount).toBe(25.99);
          expect(price.currency).toBe('USD');
          expect(price.toString()).toBe('25.99 USD');
     });

     it('should normalise the currency code', () => {
          expect(Price.of(1, ' eur ').currency).toBe('EUR');
     });

     it('should allow a zero price but not a negative one', () => {
          expect(Price.of(0).amount).toBe(0);
          expect(() => Price.of(-1)).toThrow('Price cannot be negative');
     });

     it('should reject a blank currency', () => {
          expect(() => Price.of(1, '   ')).toThrow('Currency cannot be empty');
     });

     it('should compare amount and currency', () => {
          expect(Price.of(5).equals(Price.of(5.001))).toBe(true);
          expect(Price.of(5, 'USD').equals(Price.of(5, 'EUR'))).toBe(false);
     });
});

describe('Sku', () => {
     it('should accept uppercase letters, digits and hyphens', () => {
          expect(Sku.of('PROD-001').value).toBe('PROD-001');
          expect(Sku.of('A'.repeat(50)).value).toHaveLength(50);
     });

     it.each([
          ['', 'SKU cannot be empty'],
          ['   ', 'SKU cannot be empty'],
          ['A'.repeat(51), 'SKU cannot exceed 50 characters'],
          ['prod-001', 'SKU must contain only uppercase letters, numbers, and hyphens'],
          ['PROD_001', 'SKU must contain only uppercase letters, numbers, and hyphens'],
     ])('should reject %p', (value, message) => {
          expect(() => Sku.of(value)).toThrow(message);
     });

     it('should compare by value', () => {
          expect(Sku.of('ABC').equals(Sku.of('ABC'))).toBe(true);
          expect(Sku.of('ABC').toString()).toBe('ABC');
     });
});
