/**
 * Validation Utilities
 *
 * Common validation helpers used across services
 */

import { type } from 'arktype';

export interface ValidationFailure {
  errors: string[];
}

/**
 * Normalizes an arktype schema result into either the validated value or an errors object
 *
 * @example
 * ```typescript
 * const schema = type({ ruleId: 'string', priority: 'number.integer' });
 *
 * const result = validateInput(schema(input));
 * if (isValidationFailure(result)) throw new ValidationFailureError(result.errors.join('; '));
 * ```
 */
export function validateInput<T>(
  schemaResult: T | InstanceType<typeof type.errors>,
): T | ValidationFailure {
  if (schemaResult instanceof type.errors) {
    return { errors: [schemaResult.summary] };
  }

  return schemaResult;
}

export function isValidationFailure(value: unknown): value is ValidationFailure {
  return (
    typeof value === 'object' &&
    value !== null &&
    'errors' in value &&
    Array.isArray(value.errors) &&
    Object.keys(value).length === 1
  );
}
