import type { ValidationError } from '../model/ValidationError.js';

/** Emitted when `Schema.validate()` starts. `schemaName` is the nested context name, if any. */
export interface ValidationStartedEvent {
  readonly type: 'validation:started';
  readonly schemaName: string | undefined;
  readonly fieldCount: number;
  readonly timestamp: number;
}

/**
 * How a single field came out of validation.
 *
 * - `missing`: required field absent
 * - `defaulted`: absent, default inserted, then validated
 * - `skipped`: optional field absent without a default
 * - `empty`: present but blank
 */
export type FieldOutcome = 'valid' | 'invalid' | 'missing' | 'defaulted' | 'skipped' | 'empty';

/** Emitted once per declared field, in declaration order. */
export interface FieldValidatedEvent {
  readonly type: 'field:validated';
  readonly schemaName: string | undefined;
  readonly field: string;
  readonly outcome: FieldOutcome;
  readonly errors: readonly ValidationError[];
  readonly timestamp: number;
}

/** Emitted when `Schema.validate()` returns. */
export interface ValidationCompletedEvent {
  readonly type: 'validation:completed';
  readonly schemaName: string | undefined;
  readonly isValid: boolean;
  readonly errorCount: number;
  readonly fatalCount: number;
  readonly timestamp: number;
}

/** Emitted by a config loader after a document has been read, parsed and validated. */
export interface ConfigLoadedEvent {
  readonly type: 'config:loaded';
  /** Human-readable description of where the document came from. */
  readonly source: string;
  readonly isValid: boolean;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent = ValidationStartedEvent | FieldValidatedEvent | ValidationCompletedEvent | ConfigLoadedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;

export function isEventOfType<T extends EventType>(event: DomainEvent, type: T): event is EventPayload<T> {
  return event.type === type;
}
