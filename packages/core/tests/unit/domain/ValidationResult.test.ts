import { describe, it, expect } from 'vitest';
import { validResult, invalidResult, errorsFor } from '../../../src/domain/model/ValidationResult.js';
import type { ValidationError } from '../../../src/domain/model/ValidationResult.js';
import { FieldValidationError } from '../../../src/domain/errors/FieldValidationError.js';

describe('ValidationResult helpers', () => {
  describe('validResult / invalidResult', () => {
    it('should create a passing result', () => {
      const result = validResult();
      expect(result.isValid).toBe(true);
      expect(result.errors).toHaveLength(0);
      expect(result).not.toHaveProperty('parsed');
    });

    it('should carry parsed data', () => {
      expect(validResult({ a: 1 })).toEqual({ isValid: true, errors: [], parsed: { a: 1 } });
    });

    it('should create a failing result with errors', () => {
      const errors: ValidationError[] = [{ field: 'a', message: 'err', code: 'NON_NULLABLE' }];
      const result = invalidResult(errors);
      expect(result.isValid).toBe(false);
      expect(result.errors).toEqual(errors);
    });
  });

  describe('errorsFor', () => {
    it('should filter errors by field', () => {
      const errors: ValidationError[] = [
        { field: 'a', message: 'x', code: 'TYPE_MISMATCH' },
        { field: 'b', message: 'y', code: 'PARSE_ERROR' },
        { field: 'a', message: 'z', code: 'UNKNOWN_FIELD' },
      ];
      expect(errorsFor(errors, 'a').map((e) => e.message)).toEqual(['x', 'z']);
      expect(errorsFor(errors, 'c')).toEqual([]);
    });
  });

  describe('FieldValidationError.toValidationError', () => {
    it('should copy field, message, code and value', () => {
      const error = new FieldValidationError('price', 'PARSE_ERROR', 'bad number', 'foo');
      expect(error.name).toBe('FieldValidationError');
      expect(error).toBeInstanceOf(Error);
      expect(error.toValidationError()).toEqual({
        field: 'price',
        message: 'bad number',
        code: 'PARSE_ERROR',
        value: 'foo',
      });
    });
  });
});
