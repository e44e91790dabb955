// Field types
export { FieldType, isFieldType } from './domain/model/FieldType.js';
export type {
  BaseConstraints,
  FieldConstraints,
  FieldDescriptor,
  FieldResult,
  FieldSettings,
  FieldTypeClass,
} from './domain/model/FieldType.js';
export { TextFieldType, textField } from './domain/model/TextFieldType.js';
export type { TextConstraints } from './domain/model/TextFieldType.js';
export { NumberFieldType, numberField, parseDecimal } from './domain/model/NumberFieldType.js';
export type { NumberConstraints } from './domain/model/NumberFieldType.js';
export { DateFieldType, dateField, DEFAULT_DATE_PATTERN, TIMESTAMP_FORMAT } from './domain/model/DateFieldType.js';
export type { DateConstraints, DateFormat, DateSettings } from './domain/model/DateFieldType.js';
export { EnumFieldType, enumField } from './domain/model/EnumFieldType.js';
export type { EnumConstraints, EnumSettings } from './domain/model/EnumFieldType.js';
export { CalendarDate } from './domain/model/CalendarDate.js';

// Models
export { ModelDefinition } from './domain/model/ModelDefinition.js';
export { defineModel } from './domain/services/defineModel.js';
export type { DefineModelOptions } from './domain/services/defineModel.js';

// Registry
export { FieldTypeRegistry, BUILTIN_TYPES, createDefaultRegistry, fieldTypes } from './domain/services/FieldTypeRegistry.js';
export { DatePattern } from './domain/services/DatePattern.js';

// Validation results and errors
export type {
  FieldErrorCode,
  ValidationError,
  ValidationErrorCode,
  ValidationResult,
} from './domain/model/ValidationResult.js';
export { validResult, invalidResult, errorsFor } from './domain/model/ValidationResult.js';
export { ConstraintError } from './domain/errors/ConstraintError.js';
export { FieldValidationError } from './domain/errors/FieldValidationError.js';
export { ConfigurationError, describeValueType } from './domain/errors/ConfigurationError.js';
