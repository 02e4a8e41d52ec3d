import { InvalidArgumentError } from '../errors.js';

/** Severity of a diagnostic. Only `fatal` blocks acceptance of the validated data. */
export const Severity = {
  INFO: 'info',
  WARNING: 'warning',
  FATAL: 'fatal',
} as const;

export type Severity = (typeof Severity)[keyof typeof Severity];

/** Machine-readable codes produced by field and schema validation. */
export type ValidationErrorCode =
  | 'REQUIRED'
  | 'NULL_OR_EMPTY'
  | 'TYPE_MISMATCH'
  | 'CONSTRAINT'
  | 'UNKNOWN_FIELD'
  | 'CONTEXT';

/** A single diagnostic produced while validating a collection. */
export interface ValidationError {
  /** Human-readable message. Never empty. */
  readonly message: string;
  readonly severity: Severity;
  /** Name of the field the diagnostic belongs to. Nested fields use `outer.inner`, elements `name[i]`. */
  readonly field?: string;
  /** Defaults to `'CONSTRAINT'` for errors built by constraints. */
  readonly code?: ValidationErrorCode;
  /** The value that caused the diagnostic, when one is at hand. */
  readonly value?: unknown;
}

/** Optional parts of a diagnostic accepted by `createError()`. */
export type ValidationErrorExtras = Pick<ValidationError, 'field' | 'code' | 'value'>;

/** Result of validating one collection against a schema. */
export interface ValidationResult {
  /** `true` when no diagnostic has `fatal` severity. */
  readonly isValid: boolean;
  readonly errors: readonly ValidationError[];
}

/**
 * Build a diagnostic. Severity defaults to `fatal`.
 *
 * @throws InvalidArgumentError when `message` is empty or whitespace.
 */
export function createError(
  message: string,
  severity: Severity = Severity.FATAL,
  extras?: ValidationErrorExtras,
): ValidationError {
  if (message.trim() === '') {
    throw new InvalidArgumentError('Validation error message cannot be empty or whitespace');
  }

  return {
    message,
    severity,
    code: extras?.code ?? 'CONSTRAINT',
    ...(extras?.field !== undefined ? { field: extras.field } : {}),
    ...(extras && 'value' in extras ? { value: extras.value } : {}),
  };
}

/** Create a result from a complete error list. */
export function toResult(errors: readonly ValidationError[]): ValidationResult {
  return { isValid: !hasFatal(errors), errors };
}

/** Create a passing result with no diagnostics. */
export function validResult(): ValidationResult {
  return { isValid: true, errors: [] };
}

/** Create a failing result with the given errors. */
export function invalidResult(errors: readonly ValidationError[]): ValidationResult {
  return { isValid: false, errors };
}

/** Return `true` if the list contains at least one `fatal` diagnostic. */
export function hasFatal(errors: readonly ValidationError[]): boolean {
  return errors.some((e) => e.severity === Severity.FATAL);
}

/** Filter to only `fatal` diagnostics. */
export function getFatal(errors: readonly ValidationError[]): readonly ValidationError[] {
  return errors.filter((e) => e.severity === Severity.FATAL);
}

/** Filter to only `warning` diagnostics. */
export function getWarnings(errors: readonly ValidationError[]): readonly ValidationError[] {
  return errors.filter((e) => e.severity === Severity.WARNING);
}

/** Filter to only `info` diagnostics. */
export function getInfo(errors: readonly ValidationError[]): readonly ValidationError[] {
  return errors.filter((e) => e.severity === Severity.INFO);
}

/** Render a diagnostic as `[severity] field: message`. */
export function formatError(error: ValidationError): string {
  return error.field !== undefined
    ? `[${error.severity}] ${error.field}: ${error.message}`
    : `[${error.severity}] ${error.message}`;
}
