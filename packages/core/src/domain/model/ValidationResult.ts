/** Reasons a single field rejects a value. */
export type FieldErrorCode = 'NON_NULLABLE' | 'TYPE_MISMATCH' | 'PARSE_ERROR' | 'INVALID_OPTION';

/** Error codes produced by field and record validation. */
export type ValidationErrorCode = FieldErrorCode | 'UNKNOWN_FIELD';

/** A single validation error for a specific field. */
export interface ValidationError {
  /** Name of the field that failed validation. */
  readonly field: string;
  /** Human-readable error message. */
  readonly message: string;
  /** Machine-readable error code. */
  readonly code: ValidationErrorCode;
  /** The value that caused the validation failure. */
  readonly value?: unknown;
}

/** Result of validating a single record against a model. */
export interface ValidationResult {
  readonly isValid: boolean;
  readonly errors: readonly ValidationError[];
  /** Coerced values, in model field order. Only present on a valid result. */
  readonly parsed?: Record<string, unknown>;
}

/** Create a passing validation result, optionally carrying coerced data. */
export function validResult(parsed?: Record<string, unknown>): ValidationResult {
  return parsed !== undefined ? { isValid: true, errors: [], parsed } : { isValid: true, errors: [] };
}

/** Create a failing validation result with the given errors. */
export function invalidResult(errors: readonly ValidationError[]): ValidationResult {
  return { isValid: false, errors };
}

/** Errors for one field name. */
export function errorsFor(errors: readonly ValidationError[], field: string): readonly ValidationError[] {
  return errors.filter((e) => e.field === field);
}
