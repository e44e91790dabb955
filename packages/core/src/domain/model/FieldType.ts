import { ConstraintError } from '../errors/ConstraintError.js';
import { FieldValidationError } from '../errors/FieldValidationError.js';
import type { FieldErrorCode } from './ValidationResult.js';

/** Constraint map as given at construction. Each variant interprets the keys it knows. */
export type FieldConstraints = Readonly<Record<string, unknown>>;

/** Constraint keys shared by every variant. */
export type BaseConstraints = {
  /** Whether `null`/`undefined` is an acceptable value. Default: `false`. */
  readonly nullable?: boolean;
};

/** Settings derived from constraints once, at construction. */
export interface FieldSettings {
  readonly nullable: boolean;
}

/** Plain description of a field, accepted by `FieldTypeRegistry.create()`. */
export interface FieldDescriptor {
  /** Registered type tag, e.g. `'text'`. */
  readonly type: string;
  readonly name: string;
  readonly constraints?: FieldConstraints;
  readonly uid?: string;
}

/** Outcome of `FieldType.check()`. */
export type FieldResult<T> =
  | { readonly ok: true; readonly value: T | null }
  | { readonly ok: false; readonly error: FieldValidationError };

/**
 * Base class for every field type variant.
 *
 * Constraints are ingested exactly once, in the constructor, into a frozen
 * settings object. `validate()` applies the shared nullability rule and then
 * hands non-null values to the variant's `coerce()`.
 */
export abstract class FieldType<T = unknown, S extends FieldSettings = FieldSettings> {
  /** Type tag of the variant, equal to the class's static `TYPE_TAG`. */
  abstract readonly type: string;
  /** Frozen copy of the constraints given at construction. */
  readonly constraints: FieldConstraints;
  protected readonly settings: Readonly<S>;

  constructor(
    readonly name: string,
    constraints?: FieldConstraints,
    readonly uid?: string,
  ) {
    this.constraints = Object.freeze({ ...(constraints ?? {}) });
    this.settings = Object.freeze(this.ingestConstraints(this.constraints));
  }

  get nullable(): boolean {
    return this.settings.nullable;
  }

  /**
   * Coerce `value` to the variant's canonical representation.
   *
   * @returns the coerced value, or `null` for an absent value on a nullable field
   * @throws FieldValidationError when the value cannot be interpreted
   */
  validate(value: unknown): T | null {
    if (value === null || value === undefined) {
      if (!this.nullable) {
        this.reject('NON_NULLABLE', `Field '${this.name}' is not nullable`, value);
      }
      return null;
    }
    return this.coerce(value);
  }

  /** Like `validate()`, but returns the validation failure instead of throwing it. */
  check(value: unknown): FieldResult<T> {
    try {
      return { ok: true, value: this.validate(value) };
    } catch (error) {
      if (error instanceof FieldValidationError) {
        return { ok: false, error };
      }
      throw error;
    }
  }

  describe(): FieldDescriptor {
    const descriptor: FieldDescriptor = { type: this.type, name: this.name, constraints: this.constraints };
    return this.uid !== undefined ? { ...descriptor, uid: this.uid } : descriptor;
  }

  /** Derive the variant's settings from its constraints. Called once, from the constructor. */
  protected abstract ingestConstraints(constraints: FieldConstraints): S;

  /** Variant-specific coercion of a non-null value. */
  protected abstract coerce(value: NonNullable<unknown>): T;

  /** Settings shared by every variant. */
  protected ingestBaseConstraints(constraints: FieldConstraints): FieldSettings {
    const nullable = constraints['nullable'] ?? false;
    if (typeof nullable !== 'boolean') {
      throw new ConstraintError(this.name, 'nullable', `Field '${this.name}': 'nullable' must be a boolean`);
    }
    return { nullable };
  }

  protected reject(code: FieldErrorCode, message: string, value: unknown): never {
    throw new FieldValidationError(this.name, code, message, value);
  }
}

/** A concrete, constructible field type variant. */
export interface FieldTypeClass<F extends FieldType = FieldType> {
  readonly TYPE_TAG: string;
  new (name: string, constraints?: FieldConstraints, uid?: string): F;
}

export function isFieldType(value: unknown): value is FieldType {
  return value instanceof FieldType;
}
