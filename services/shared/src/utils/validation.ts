import { ZodError, type ZodType, type ZodTypeDef } from 'zod';
import { ValidationError, type ValidationIssue } from './errors';

/**
 * Parse `data` with a zod schema, converting failures into a ValidationError
 * with one issue per offending field.
 */
export function validateOrThrow<TOutput, TInput = TOutput>(
     schema: ZodType<TOutput, ZodTypeDef, TInput>,
     data: unknown,
     label: string = 'Command'
): TOutput {
     try {
          return schema.parse(data);
     } catch (error) {
          if (error instanceof ZodError) {
               const details = toValidationIssues(error);
               throw new ValidationError(`${label} validation failed`, details);
          }
          throw error;
     }
}

export function toValidationIssues(error: ZodError): ValidationIssue[] {
     return error.issues.map((issue) => ({
          field: issue.path.length > 0 ? issue.path.join('.') : '(root)',
          message: issue.message,
          code: issue.code,
     }));
}
