/**
 * Error codes carried by the exceptions this library throws.
 *
 * Exceptions are reserved for mistakes in how a schema or translator is used.
 * Problems in the data being validated are reported as `ValidationError`
 * diagnostics instead.
 */
export const ErrorCode = {
  SCHEMA_CONFIGURATION: 'SCHEMA_CONFIGURATION',
  INVALID_ARGUMENT: 'INVALID_ARGUMENT',
  UNSUPPORTED_OPERATION: 'UNSUPPORTED_OPERATION',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/** Base class for every exception thrown by the library. */
export class ConfguardError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'ConfguardError';
    this.code = code;
  }
}

/** Thrown while defining a schema: empty names, duplicate fields, unusable defaults. */
export class SchemaConfigurationError extends ConfguardError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ErrorCode.SCHEMA_CONFIGURATION, options);
    this.name = 'SchemaConfigurationError';
  }
}

/** Thrown when a factory or helper receives arguments it cannot work with. */
export class InvalidArgumentError extends ConfguardError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ErrorCode.INVALID_ARGUMENT, options);
    this.name = 'InvalidArgumentError';
  }
}

/** Thrown when a translator is asked for something its representation cannot do. */
export class UnsupportedOperationError extends ConfguardError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ErrorCode.UNSUPPORTED_OPERATION, options);
    this.name = 'UnsupportedOperationError';
  }
}
