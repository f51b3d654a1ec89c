// Error taxonomy for domain, persistence and application layers.
// Callers branch on `kind` (or `code`), never on the message text.

export type ErrorKind = 'validation' | 'business_rule' | 'not_found' | 'concurrency_conflict';

export interface ValidationIssue {
     field: string;
     message: string;
     code: string;
}

export abstract class DomainError extends Error {
     abstract readonly kind: ErrorKind;

     constructor(
          message: string,
          public readonly code: string,
          public readonly statusCode: number
     ) {
          super(message);
          this.name = this.constructor.name;
          Error.captureStackTrace(this, this.constructor);
     }
}

/**
 * Malformed input to a constructor or operation (empty string, negative quantity, length out of range).
 */
export class ValidationError extends DomainError {
     readonly kind = 'validation' as const;

     constructor(
          message: string,
          public readonly details: ValidationIssue[] = [],
          code: string = 'VALIDATION_FAILED'
     ) {
          super(message, code, 400);
     }

     static forField(field: string, message: string, code: string = 'invalid'): ValidationError {
          return new ValidationError(message, [{ field, message, code }]);
     }
}

/**
 * Legal input that the aggregate's current state does not allow.
 */
export class BusinessRuleError extends DomainError {
     readonly kind = 'business_rule' as const;

     constructor(message: string, code: string = 'BUSINESS_RULE_VIOLATION') {
          super(message, code, 409);
     }
}

export class InvalidOrderStateError extends BusinessRuleError {
     constructor(
          public readonly operation: string,
          public readonly currentStatus: string,
          public readonly allowedStatuses: readonly string[]
     ) {
          super(
               `Cannot ${operation} an order in status ${currentStatus} (allowed: ${
                    allowedStatuses.length > 0 ? allowedStatuses.join(', ') : 'none'
               })`,
               'INVALID_ORDER_STATE'
          );
     }
}

export class InsufficientStockError extends BusinessRuleError {
     constructor(
          message: string,
          public readonly requested: number,
          public readonly available: number
     ) {
          super(message, 'INSUFFICIENT_STOCK');
     }
}

export class InactiveItemError extends BusinessRuleError {
     constructor(
          public readonly itemId: string,
          operation: string
     ) {
          super(`Cannot ${operation} inactive item ${itemId}`, 'ITEM_INACTIVE');
     }
}

export class DuplicateSkuError extends BusinessRuleError {
     constructor(public readonly sku: string) {
          super(`Item with SKU '${sku}' already exists`, 'DUPLICATE_SKU');
     }
}

export class NotFoundError extends DomainError {
     readonly kind = 'not_found' as const;

     constructor(message: string, code: string) {
          super(message, code, 404);
     }
}

export class OrderNotFoundError extends NotFoundError {
     constructor(public readonly orderId: string) {
          super(`Order ${orderId} not found`, 'ORDER_NOT_FOUND');
     }
}

export class ItemNotFoundError extends NotFoundError {
     constructor(public readonly itemId: string) {
          super(`Item ${itemId} not found`, 'ITEM_NOT_FOUND');
     }
}

/**
 * Raised by a repository when the stored concurrency token no longer matches
 * the one observed at load time.
 */
export class ConcurrencyConflictError extends DomainError {
     readonly kind = 'concurrency_conflict' as const;

     constructor(
          public readonly aggregateType: 'Order' | 'Item',
          public readonly aggregateId: string
     ) {
          super(
               `${aggregateType} ${aggregateId} was modified by another writer. Reload and try again.`,
               'CONCURRENCY_CONFLICT',
               409
          );
     }
}

export function isDomainError(error: unknown): error is DomainError {
     return error instanceof DomainError;
}

export function errorKindOf(error: unknown): ErrorKind | 'unexpected' {
     return isDomainError(error) ? error.kind : 'unexpected';
}
