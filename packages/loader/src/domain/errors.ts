import type { ValidationError } from '@confguard/core';
import { formatError, getFatal } from '@confguard/core';

/** Thrown by a `ConfigParser` when the document text cannot be turned into a configuration object. */
export class ConfigParseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'ConfigParseError';
  }
}

/** Thrown by `ConfigLoader.loadOrThrow()` when the loaded document has fatal diagnostics. */
export class ConfigValidationError extends Error {
  readonly source: string;
  readonly errors: readonly ValidationError[];

  constructor(source: string, errors: readonly ValidationError[]) {
    const lines = getFatal(errors).map(formatError);
    super([`Configuration from ${source} is invalid:`, ...lines].join('\n'));
    this.name = 'ConfigValidationError';
    this.source = source;
    this.errors = errors;
  }
}
