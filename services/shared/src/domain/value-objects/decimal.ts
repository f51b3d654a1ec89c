import { Decimal } from 'decimal.js';
import { ValidationError } from '../../utils/errors';

export type DecimalInput = Decimal.Value;

export const CURRENCY_SCALE = 2;

/**
 * Parse a numeric input into a finite Decimal, raising a field-level ValidationError otherwise.
 */
export function parseAmount(value: DecimalInput, field: string): Decimal {
     let parsed: Decimal;
     try {
          parsed = new Decimal(value);
     } catch {
          throw ValidationError.forField(field, `${field} must be a number`, 'invalid_type');
     }

     if (!parsed.isFinite()) {
          throw ValidationError.forField(field, `${field} must be a finite number`, 'invalid_type');
     }

     return parsed;
}

export function roundCurrency(value: Decimal): Decimal {
     return value.toDecimalPlaces(CURRENCY_SCALE, Decimal.ROUND_HALF_UP);
}
