/**
 * Validation Utilities
 *
 * Arktype helpers shared by config, snapshot and request parsing
 */

import { ArkErrors } from 'arktype';

/**
 * Unwraps an arktype validation result into the value or a standard errors object
 *
 * @example
 * ```typescript
 * import { type } from 'arktype';
 *
 * const schema = type({ name: 'string', age: 'number' });
 * const result = validateInput(schema(input));
 * if ('errors' in result) { ... }
 * ```
 */
export function validateInput<T>(schemaResult: T | ArkErrors): T | { errors: string[] } {
  if (schemaResult instanceof ArkErrors) {
    return { errors: [schemaResult.summary] };
  }
  return schemaResult;
}

/**
 * Type guard for the errors branch of validateInput
 */
export function isValidationFailure<T>(result: T | { errors: string[] }): result is { errors: string[] } {
  return typeof result === 'object' && result !== null && 'errors' in result && Array.isArray(result.errors);
}
