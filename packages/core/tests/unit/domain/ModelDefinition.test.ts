import { describe, it, expect } from 'vitest';
import { ModelDefinition } from '../../../src/domain/model/ModelDefinition.js';
import type { FieldType } from '../../../src/domain/model/FieldType.js';
import { TextFieldType } from '../../../src/domain/model/TextFieldType.js';
import { NumberFieldType } from '../../../src/domain/model/NumberFieldType.js';
import { DateFieldType } from '../../../src/domain/model/DateFieldType.js';
import { EnumFieldType } from '../../../src/domain/model/EnumFieldType.js';
import { defineModel } from '../../../src/domain/services/defineModel.js';
import { FieldTypeRegistry } from '../../../src/domain/services/FieldTypeRegistry.js';
import { ConfigurationError, describeValueType } from '../../../src/domain/errors/ConfigurationError.js';
import { ConstraintError } from '../../../src/domain/errors/ConstraintError.js';

class Plain {}

describe('ModelDefinition', () => {
  const name = new TextFieldType('name');
  const price = new NumberFieldType('price', { nullable: true });
  const born = new DateFieldType('born');
  const color = new EnumFieldType('color', { options: ['red', 'green'] });

  it('should keep fields in input order', () => {
    const model = new ModelDefinition('product', [color, name, born, price], 'm-1');
    expect(model.name).toBe('product');
    expect(model.uid).toBe('m-1');
    expect(model.fields).toEqual([color, name, born, price]);
    expect(model.fieldNames).toEqual(['color', 'name', 'born', 'price']);
  });

  it('should not share the caller array', () => {
    const fields: FieldType[] = [name, price];
    const model = new ModelDefinition('product', fields);
    fields.push(born);
    expect(model.fields).toHaveLength(2);
    expect(Object.isFrozen(model.fields)).toBe(true);
  });

  it('should accept an empty field list', () => {
    expect(new ModelDefinition('empty', []).fields).toEqual([]);
  });

  it('should allow duplicate names and look up the first', () => {
    const other = new TextFieldType('name', { nullable: true });
    const model = new ModelDefinition('people', [name, other]);
    expect(model.fields).toHaveLength(2);
    expect(model.field('name')).toBe(name);
    expect(model.field('missing')).toBeUndefined();
  });

  it('should reject an element that is not a field type', () => {
    expect(() => new ModelDefinition('product', [name, { name: 'price' }])).toThrow(ConfigurationError);
    expect(() => new ModelDefinition('product', [name, { name: 'price' }])).toThrow(
      "Model 'product': non valid type Object at field index 1",
    );
  });

  it('should name the first offending element', () => {
    expect(() => new ModelDefinition('product', [new Plain(), 'price'])).toThrow(
      "Model 'product': non valid type Plain at field index 0",
    );
    expect(() => new ModelDefinition('product', [name, null])).toThrow('non valid type null at field index 1');
    expect(() => new ModelDefinition('product', [TextFieldType])).toThrow('non valid type Function at field index 0');
  });
});

describe('describeValueType', () => {
  it('should describe primitives, null and instances', () => {
    expect(describeValueType('x')).toBe('string');
    expect(describeValueType(1)).toBe('number');
    expect(describeValueType(undefined)).toBe('undefined');
    expect(describeValueType(null)).toBe('null');
    expect(describeValueType([])).toBe('Array');
    expect(describeValueType(new Plain())).toBe('Plain');
    expect(describeValueType(Object.create(null))).toBe('object');
  });
});

describe('defineModel', () => {
  it('should build fields from descriptors through the default registry', () => {
    const model = defineModel(
      'product',
      [
        { type: 'text', name: 'name' },
        { type: 'number', name: 'price', constraints: { nullable: true } },
        { type: 'enum', name: 'color', constraints: { options: ['red'] }, uid: 'c' },
      ],
      { uid: 'p' },
    );

    expect(model.uid).toBe('p');
    expect(model.fieldNames).toEqual(['name', 'price', 'color']);
    expect(model.fields[1]).toBeInstanceOf(NumberFieldType);
    expect(model.fields[2]?.uid).toBe('c');
  });

  it('should use the given registry', () => {
    const registry = new FieldTypeRegistry([TextFieldType]);
    expect(() => defineModel('m', [{ type: 'number', name: 'n' }], { registry })).toThrow(
      "Unknown field type 'number' for field 'n'",
    );
  });

  it('should surface constraint errors', () => {
    expect(() => defineModel('m', [{ type: 'enum', name: 'color' }])).toThrow(ConstraintError);
  });
});
