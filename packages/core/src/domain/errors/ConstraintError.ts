/** Thrown at construction when a field's constraints are missing or malformed. */
export class ConstraintError extends Error {
  override readonly name = 'ConstraintError';

  constructor(
    /** Name of the field being constructed. */
    readonly fieldName: string,
    /** Constraint key that was rejected. */
    readonly constraint: string,
    message: string,
  ) {
    super(message);
  }
}
