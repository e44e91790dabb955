import type { FieldValidationError, ValidationError } from '@fieldspec/core';

/** Emitted for each field of a record that rejects its value. */
export interface FieldRejectedEvent {
  readonly type: 'field:rejected';
  readonly model: string;
  /** Zero-based position of the record in the validated list. */
  readonly recordIndex: number;
  readonly field: string;
  readonly error: FieldValidationError;
  readonly timestamp: number;
}

/** Emitted for each record that passes every field of the model. */
export interface RecordValidatedEvent {
  readonly type: 'record:validated';
  readonly model: string;
  readonly recordIndex: number;
  readonly parsed: Record<string, unknown>;
  readonly timestamp: number;
}

/** Emitted after the field events of a record that failed at least one check. */
export interface RecordRejectedEvent {
  readonly type: 'record:rejected';
  readonly model: string;
  readonly recordIndex: number;
  readonly errors: readonly ValidationError[];
  readonly timestamp: number;
}

/** Emitted once `validateMany()` has gone through every record. */
export interface BatchValidatedEvent {
  readonly type: 'batch:validated';
  readonly model: string;
  readonly total: number;
  readonly valid: number;
  readonly invalid: number;
  readonly timestamp: number;
}

export type DomainEvent = FieldRejectedEvent | RecordValidatedEvent | RecordRejectedEvent | BatchValidatedEvent;

export type EventType = DomainEvent['type'];

export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;

export function isEventOfType<T extends EventType>(event: DomainEvent, type: T): event is EventPayload<T> {
  return event.type === type;
}
