// Record validation
export { RecordValidator } from './domain/services/RecordValidator.js';
export type { RecordValidatorConfig, RecordBatchSummary } from './domain/services/RecordValidator.js';
export type { RawRecord } from './domain/model/Record.js';
export { readField } from './domain/model/Record.js';

// Events
export { EventBus } from './application/EventBus.js';
export type { EventBusConfig, Unsubscribe } from './application/EventBus.js';
export { isEventOfType } from './domain/events/DomainEvents.js';
export type {
  FieldRejectedEvent,
  DomainEvent,
  EventType,
  EventPayload,
  RecordValidatedEvent,
  RecordRejectedEvent,
  BatchValidatedEvent,
} from './domain/events/DomainEvents.js';

// Re-export commonly used types from @fieldspec/core for convenience
export type { ValidationResult, ValidationError, ValidationErrorCode } from '@fieldspec/core';
export { ModelDefinition, defineModel, validResult, invalidResult } from '@fieldspec/core';
