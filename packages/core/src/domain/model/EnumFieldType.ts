import { ConstraintError } from '../errors/ConstraintError.js';
import { FieldType } from './FieldType.js';
import type { BaseConstraints, FieldConstraints, FieldSettings } from './FieldType.js';

export type EnumConstraints = BaseConstraints & {
  /** Allowed values. Each one is stored in its `String()` form. */
  readonly options: readonly unknown[];
};

export interface EnumSettings extends FieldSettings {
  readonly options: readonly string[];
}

/** One of a fixed, ordered list of string options. */
export class EnumFieldType extends FieldType<string, EnumSettings> {
  static readonly TYPE_TAG = 'enum';
  readonly type = EnumFieldType.TYPE_TAG;

  get options(): readonly string[] {
    return this.settings.options;
  }

  protected ingestConstraints(constraints: FieldConstraints): EnumSettings {
    const options = constraints['options'];
    if (options === undefined) {
      throw new ConstraintError(this.name, 'options', `Field '${this.name}': no options defined for enum`);
    }
    if (!Array.isArray(options) || options.length === 0) {
      throw new ConstraintError(this.name, 'options', `Field '${this.name}': 'options' must be a non-empty array`);
    }

    return {
      ...this.ingestBaseConstraints(constraints),
      options: Object.freeze(options.map((option: unknown) => String(option))),
    };
  }

  protected coerce(value: NonNullable<unknown>): string {
    const match = this.options.find((option) => option === value);
    if (match === undefined) {
      return this.reject('INVALID_OPTION', `Field '${this.name}': non valid option '${String(value)}'`, value);
    }
    return match;
  }
}

export function enumField(name: string, constraints: EnumConstraints, uid?: string): EnumFieldType {
  return new EnumFieldType(name, constraints, uid);
}
