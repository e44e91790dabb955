import { FieldType } from './FieldType.js';
import type { BaseConstraints, FieldConstraints, FieldSettings } from './FieldType.js';

export type NumberConstraints = BaseConstraints;

// Stricter than common float parsers: 'nan' and '_' digit grouping are refused.
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;
const INFINITY_PATTERN = /^([+-]?)inf(inity)?$/i;

/** Parse decimal text the way a float literal reads. Returns `undefined` for anything else. */
export function parseDecimal(text: string): number | undefined {
  const trimmed = text.trim();
  if (DECIMAL_PATTERN.test(trimmed)) return Number(trimmed);

  const infinity = INFINITY_PATTERN.exec(trimmed);
  if (infinity) return infinity[1] === '-' ? -Infinity : Infinity;

  return undefined;
}

/** Floating-point number, from a number, a bigint or decimal text. */
export class NumberFieldType extends FieldType<number> {
  static readonly TYPE_TAG = 'number';
  readonly type = NumberFieldType.TYPE_TAG;

  protected ingestConstraints(constraints: FieldConstraints): FieldSettings {
    return this.ingestBaseConstraints(constraints);
  }

  protected coerce(value: NonNullable<unknown>): number {
    if (typeof value === 'string') {
      const parsed = parseDecimal(value);
      if (parsed === undefined) {
        return this.reject('PARSE_ERROR', `Field '${this.name}': '${value}' is not a valid number`, value);
      }
      return parsed;
    }

    if (typeof value === 'bigint') return Number(value);

    if (typeof value === 'number') {
      if (isNaN(value)) {
        return this.reject('PARSE_ERROR', `Field '${this.name}': NaN is not a valid number`, value);
      }
      return value;
    }

    return this.reject('TYPE_MISMATCH', `Field '${this.name}' expects a number or numeric text, got ${typeof value}`, value);
  }
}

export function numberField(name: string, constraints?: NumberConstraints, uid?: string): NumberFieldType {
  return new NumberFieldType(name, constraints, uid);
}
