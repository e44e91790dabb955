import { ConstraintError } from '../errors/ConstraintError.js';
import { DatePattern } from '../services/DatePattern.js';
import { CalendarDate } from './CalendarDate.js';
import { FieldType } from './FieldType.js';
import type { BaseConstraints, FieldConstraints, FieldSettings } from './FieldType.js';

export const DEFAULT_DATE_PATTERN = '%Y-%m-%d';

/** `format` value that switches a date field to Unix timestamps (seconds, UTC). */
export const TIMESTAMP_FORMAT = 'timestamp';

export type DateConstraints = BaseConstraints & {
  /** A `%Y-%m-%d` style pattern, or `'timestamp'`. Default: `'%Y-%m-%d'`. */
  readonly format?: string;
};

/** How a date field reads values that are not already dates. */
export type DateFormat = { readonly kind: 'pattern'; readonly pattern: string } | { readonly kind: 'timestamp' };

const TIMESTAMP_MODE: DateFormat = Object.freeze({ kind: 'timestamp' as const });

export interface DateSettings extends FieldSettings {
  readonly format: DateFormat;
  readonly parser?: DatePattern;
}

/**
 * Calendar date, stored as a {@link CalendarDate}.
 *
 * `CalendarDate` values pass through, `Date` values are truncated to their UTC
 * date, and everything else is read according to the field's format: text
 * through the pattern, or numbers as epoch seconds.
 */
export class DateFieldType extends FieldType<CalendarDate, DateSettings> {
  static readonly TYPE_TAG = 'date';
  readonly type = DateFieldType.TYPE_TAG;

  get format(): DateFormat {
    return this.settings.format;
  }

  protected ingestConstraints(constraints: FieldConstraints): DateSettings {
    const base = this.ingestBaseConstraints(constraints);
    const format = constraints['format'] ?? DEFAULT_DATE_PATTERN;

    if (typeof format !== 'string') {
      throw new ConstraintError(this.name, 'format', `Field '${this.name}': 'format' must be a string`);
    }
    if (format === TIMESTAMP_FORMAT) {
      return { ...base, format: TIMESTAMP_MODE };
    }

    const mode: DateFormat = { kind: 'pattern', pattern: format };
    return { ...base, format: Object.freeze(mode), parser: this.compile(format) };
  }

  protected coerce(value: NonNullable<unknown>): CalendarDate {
    if (value instanceof CalendarDate) return value;

    if (value instanceof Date) {
      return CalendarDate.fromDate(value) ?? this.reject('PARSE_ERROR', `Field '${this.name}': invalid Date`, value);
    }

    const { parser } = this.settings;
    if (parser) {
      if (typeof value !== 'string') {
        return this.reject('TYPE_MISMATCH', `Field '${this.name}': expected string, got ${typeof value}`, value);
      }
      return (
        parser.parse(value) ??
        this.reject('PARSE_ERROR', `Field '${this.name}': '${value}' does not match format '${parser.pattern}'`, value)
      );
    }

    if (typeof value !== 'number') {
      return this.reject('TYPE_MISMATCH', `Field '${this.name}': non valid timestamp ${String(value)}`, value);
    }
    return (
      CalendarDate.fromEpochSeconds(value) ??
      this.reject('PARSE_ERROR', `Field '${this.name}': non valid timestamp ${String(value)}`, value)
    );
  }

  private compile(pattern: string): DatePattern {
    try {
      return DatePattern.compile(pattern);
    } catch (error) {
      if (error instanceof SyntaxError) {
        throw new ConstraintError(this.name, 'format', `Field '${this.name}': ${error.message}`);
      }
      throw error;
    }
  }
}

export function dateField(name: string, constraints?: DateConstraints, uid?: string): DateFieldType {
  return new DateFieldType(name, constraints, uid);
}
