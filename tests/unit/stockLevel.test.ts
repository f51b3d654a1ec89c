import { StockLevel } from '@orderflow/shared/src/domain/value-objects/stock-level';
import {
     BusinessRuleError,
     InsufficientStockError,
     ValidationError,
} from '@orderflow/shared/src/utils/errors';
import { captureError } from '../helpers/captureError';

describe('StockLevel', () => {
     describe('construction', () => {
          it('should default reserved to zero', () => {
               const level = StockLevel.of(100);
               expect(level.available).toBe(100);
               expect(level.reserved).toBe(0);
               expect(level.total).toBe(100);
          });

          it.each([
               [-1, 0],
               [0, -1],
               [1.5, 0],
               [0, 0.5],
          ])('should reject available=%p reserved=%p', (available, reserved) => {
               expect(() => StockLevel.of(available, reserved)).toThrow(ValidationError);
          });
     });

     describe('reserve', () => {
          it('should move units from available to reserved', () => {
               const level = StockLevel.of(100).reserve(30);
               expect(level.available).toBe(70);
               expect(level.reserved).toBe(30);
          });

          it('should allow reserving everything that is available', () => {
               const level = StockLevel.of(10).reserve(10);
               expect(level.available).toBe(0);
               expect(level.reserved).toBe(10);
          });

          it('should reject more than available and leave the receiver unchanged', () => {
               const level = StockLevel.of(10);

               expect(() => level.reserve(20)).toThrow(InsufficientStockError);
               expect(() => level.reserve(20)).toThrow('Cannot reserve 20 items. Only 10 available.');
               expect(level.equals(StockLevel.of(10, 0))).toBe(true);
          });

          it.each([0, -5, 2.5])('should reject quantity %p', (quantity) => {
               expect(() => StockLevel.of(10).reserve(quantity)).toThrow(ValidationError);
          });
     });

     describe('release', () => {
          it('should return reserved units to available', () => {
               const level = StockLevel.of(70, 30).release(10);
               expect(level.available).toBe(80);
               expect(level.reserved).toBe(20);
          });

          it('should reject releasing more than reserved', () => {
               const level = StockLevel.of(70, 5);
               expect(() => level.release(6)).toThrow(BusinessRuleError);
               expect(() => level.release(6)).toThrow('Cannot release 6 items. Only 5 reserved.');
          });
     });

     describe('commit', () => {
          it('should remove reserved units permanently', () => {
               const level = StockLevel.of(70, 30).commit(30);
               expect(level.available).toBe(70);
               expect(level.reserved).toBe(0);
               expect(level.total).toBe(70);
          });

          it('should reject committing more than reserved', () => {
               const error = captureError(() => StockLevel.of(70, 1).commit(2));
               expect(error).toBeInstanceOf(BusinessRuleError);
               expect(error).toMatchObject({ code: 'INSUFFICIENT_RESERVED_STOCK' });
          });
     });

     describe('adjust', () => {
          it('should replace available and keep reservations', () => {
               const level = StockLevel.of(70, 30).adjust(5);
               expect(level.available).toBe(5);
               expect(level.reserved).toBe(30);
          });

          it('should accept zero and reject negatives', () => {
               expect(StockLevel.of(3).adjust(0).available).toBe(0);
               expect(() => StockLevel.of(3).adjust(-1)).toThrow(ValidationError);
          });
     });

     describe('laws', () => {
          const levels: Array<[number, number]> = [
               [0, 0],
               [1, 0],
               [10, 5],
               [100, 0],
               [3, 97],
          ];
          const quantities = [1, 2, 3, 10, 50, 101];

          it('should never go negative and preserve total on reserve/release', () => {
               for (const [available, reserved] of levels) {
                    const level = StockLevel.of(available, reserved);
                    for (const quantity of quantities) {
                         if (quantity <= available) {
                              const reservedLevel = level.reserve(quantity);
                              expect(reservedLevel.available).toBeGreaterThanOrEqual(0);
                              expect(reservedLevel.total).toBe(level.total);
                              expect(reservedLevel.release(quantity).equals(level)).toBe(true);
                         } else {
                              expect(() => level.reserve(quantity)).toThrow(InsufficientStockError);
                         }

                         if (quantity <= reserved) {
                              const released = level.release(quantity);
                              expect(released.reserved).toBeGreaterThanOrEqual(0);
                              expect(released.total).toBe(level.total);
                              expect(level.commit(quantity).total).toBe(level.total - quantity);
                         } else {
                              expect(() => level.release(quantity)).toThrow(BusinessRuleError);
                              expect(() => level.commit(quantity)).toThrow(BusinessRuleError);
                         }
                    }
               }
          });
     });
});
