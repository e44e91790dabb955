import { invalidResult, validResult } from '@fieldspec/core';
import type { FieldValidationError, ModelDefinition, ValidationError, ValidationResult } from '@fieldspec/core';
import type { EventBus } from '../../application/EventBus.js';
import { readField } from '../model/Record.js';
import type { RawRecord } from '../model/Record.js';

export interface RecordValidatorConfig {
  /** When `true`, keys that are not fields of the model produce `UNKNOWN_FIELD` errors. */
  readonly strict?: boolean;
  /** Receives `field:rejected`, `record:validated`, `record:rejected` and `batch:validated` events. */
  readonly eventBus?: EventBus;
}

/** Outcome of `validateMany()`. `results` is index-aligned with the input. */
export interface RecordBatchSummary {
  readonly total: number;
  readonly valid: number;
  readonly invalid: number;
  readonly results: readonly ValidationResult[];
}

/**
 * Validates whole records against a model definition.
 *
 * Every field is checked, in model order, so one result carries all of a
 * record's errors. Absent keys count as `null`. `parsed` holds the coerced
 * values and is only present when the record is valid.
 */
export class RecordValidator {
  private readonly fieldNames: ReadonlySet<string>;

  constructor(
    readonly model: ModelDefinition,
    private readonly config: RecordValidatorConfig = {},
  ) {
    this.fieldNames = new Set(model.fieldNames);
  }

  validate(record: RawRecord, recordIndex = 0): ValidationResult {
    const errors: ValidationError[] = [];
    const entries: [string, unknown][] = [];
    const rejections: FieldValidationError[] = [];

    for (const field of this.model.fields) {
      const result = field.check(readField(record, field.name));
      if (result.ok) {
        entries.push([field.name, result.value]);
      } else {
        rejections.push(result.error);
        errors.push(result.error.toValidationError());
      }
    }

    if (this.config.strict) {
      for (const key of Object.keys(record)) {
        if (!this.fieldNames.has(key)) {
          errors.push({
            field: key,
            message: `Unknown field '${key}' is not allowed in strict mode`,
            code: 'UNKNOWN_FIELD',
            value: record[key],
          });
        }
      }
    }

    // fromEntries defines own properties, so a field named `__proto__` keeps its value.
    const result = errors.length === 0 ? validResult(Object.fromEntries(entries)) : invalidResult(errors);
    this.emitOutcome(recordIndex, result, rejections);
    return result;
  }

  validateMany(records: readonly RawRecord[]): RecordBatchSummary {
    const results = records.map((record, index) => this.validate(record, index));
    const valid = results.filter((r) => r.isValid).length;
    const summary: RecordBatchSummary = {
      total: results.length,
      valid,
      invalid: results.length - valid,
      results,
    };

    this.config.eventBus?.emit({
      type: 'batch:validated',
      model: this.model.name,
      total: summary.total,
      valid: summary.valid,
      invalid: summary.invalid,
      timestamp: Date.now(),
    });

    return summary;
  }

  private emitOutcome(recordIndex: number, result: ValidationResult, rejections: readonly FieldValidationError[]): void {
    const bus = this.config.eventBus;
    if (!bus) return;
    const model = this.model.name;

    if (result.isValid) {
      if (!bus.hasListeners('record:validated')) return;
      bus.emit({ type: 'record:validated', model, recordIndex, parsed: result.parsed ?? {}, timestamp: Date.now() });
      return;
    }

    if (bus.hasListeners('field:rejected')) {
      for (const error of rejections) {
        bus.emit({ type: 'field:rejected', model, recordIndex, field: error.field, error, timestamp: Date.now() });
      }
    }
    if (bus.hasListeners('record:rejected')) {
      bus.emit({ type: 'record:rejected', model, recordIndex, errors: result.errors, timestamp: Date.now() });
    }
  }
}
