// Schema model
export { Schema } from './domain/model/Schema.js';
export type { SchemaValidateOptions } from './domain/model/Schema.js';
export { Field, whenType } from './domain/model/Field.js';
export type { FieldOptions, FieldValidation, TypeBranch } from './domain/model/Field.js';
export { Types } from './domain/model/ValueType.js';
export type { ValueType, ValueKind } from './domain/model/ValueType.js';
export { createConstraint, createFormatConstraint } from './domain/model/Constraint.js';
export type { Constraint, FormatConstraint, FieldConstraint, ConstraintContext } from './domain/model/Constraint.js';
export { NamedValue, isJsonValue, isJsonObject, isPlainObject } from './domain/model/JsonValue.js';
export type { JsonValue, JsonObject } from './domain/model/JsonValue.js';

// Diagnostics
export type {
  ValidationError,
  ValidationErrorCode,
  ValidationErrorExtras,
  ValidationResult,
} from './domain/model/ValidationError.js';
export {
  Severity,
  createError,
  toResult,
  validResult,
  invalidResult,
  hasFatal,
  getFatal,
  getWarnings,
  getInfo,
  formatError,
} from './domain/model/ValidationError.js';

// Exceptions
export {
  ErrorCode,
  ConfguardError,
  SchemaConfigurationError,
  InvalidArgumentError,
  UnsupportedOperationError,
} from './domain/errors.js';

// Conversion
export { ValueConverter } from './domain/services/ValueConverter.js';
export type { CastResult, ValueConverterOptions } from './domain/services/ValueConverter.js';
export {
  DateTimeFormatRegistry,
  DEFAULT_DATE_TIME_FORMATS,
  isValidDateTimeFormat,
  parseWithFormat,
} from './domain/services/DateTimeFormatRegistry.js';
export type { DateTimeFormatRegistryOptions } from './domain/services/DateTimeFormatRegistry.js';
export {
  stringifyValue,
  toJsonValue,
  isNullOrEmptyValue,
  equivalentJsonType,
  memberNames,
} from './domain/services/valueRendering.js';

// Ports (for custom translators)
export type { Translator } from './domain/ports/Translator.js';

// Infrastructure adapters (built-in translators)
export { JsonTranslator } from './infrastructure/translators/JsonTranslator.js';
export type { JsonTranslatorOptions } from './infrastructure/translators/JsonTranslator.js';
export { MapTranslator } from './infrastructure/translators/MapTranslator.js';
export type { MapTranslatorOptions } from './infrastructure/translators/MapTranslator.js';
export { RecordTranslator } from './infrastructure/translators/RecordTranslator.js';
export type { RecordTranslatorOptions } from './infrastructure/translators/RecordTranslator.js';

// Constraint library
export * from './constraints/index.js';

// Events (for loaders and other extension packages)
export { EventBus } from './application/EventBus.js';
export type { EventHandler, WildcardHandler } from './application/EventBus.js';
export type {
  DomainEvent,
  EventType,
  EventPayload,
  FieldOutcome,
  ValidationStartedEvent,
  FieldValidatedEvent,
  ValidationCompletedEvent,
  ConfigLoadedEvent,
} from './domain/events/DomainEvents.js';
export { isEventOfType } from './domain/events/DomainEvents.js';
