import { ValidationError } from '../../utils/errors';

export const SKU_MAX_LENGTH = 50;
export const SKU_PATTERN = /^[A-Z0-9-]+$/;

/**
 * Stock keeping unit. Uppercase letters, digits and hyphens only.
 */
export class Sku {
     private constructor(readonly value: string) {}

     static of(value: string): Sku {
          if (value.trim().length === 0) {
               throw ValidationError.forField('sku', 'SKU cannot be empty', 'too_small');
          }
          if (value.length > SKU_MAX_LENGTH) {
               throw ValidationError.forField(
                    'sku',
                    `SKU cannot exceed ${SKU_MAX_LENGTH} characters`,
                    'too_big'
               );
          }
          if (!SKU_PATTERN.test(value)) {
               throw ValidationError.forField(
                    'sku',
                    'SKU must contain only uppercase letters, numbers, and hyphens',
                    'invalid_string'
               );
          }
          return new Sku(value);
     }

     equals(other: Sku): boolean {
          return this.value === other.value;
     }

     toString(): string {
          return this.value;
     }
}
