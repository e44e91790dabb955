import type { FieldErrorCode, ValidationError } from '../model/ValidationResult.js';

/** Thrown by `validate()` when a value cannot be interpreted under a field's type and constraints. */
export class FieldValidationError extends Error {
  override readonly name = 'FieldValidationError';

  constructor(
    /** Name of the field that rejected the value. */
    readonly field: string,
    /** Machine-readable reason. */
    readonly code: FieldErrorCode,
    message: string,
    /** The rejected input. */
    readonly value?: unknown,
  ) {
    super(message);
  }

  /** Plain error record, as collected in a `ValidationResult`. */
  toValidationError(): ValidationError {
    return { field: this.field, message: this.message, code: this.code, value: this.value };
  }
}
