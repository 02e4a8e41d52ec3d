import type { FormatConstraint } from '../domain/model/Constraint.js';
import { createFormatConstraint } from '../domain/model/Constraint.js';
import { createError, Severity } from '../domain/model/ValidationError.js';
import { InvalidArgumentError } from '../domain/errors.js';
import { assertDateTimeFormat, parseWithFormat } from '../domain/services/DateTimeFormatRegistry.js';

/**
 * Require the raw text of a date/time value to match one of `formats` exactly
 * (date-fns tokens, e.g. `yyyy-MM-dd`).
 *
 * The field must still cast to `DateTime`, so every format listed here should
 * also be registered on the translator's converter.
 *
 * @throws InvalidArgumentError when no format is given or a format is not a usable date-fns pattern.
 */
export function constrainDateTimeFormat(...formats: string[]): FormatConstraint {
  if (formats.length === 0) {
    throw new InvalidArgumentError('constrainDateTimeFormat requires at least one format');
  }
  formats.forEach(assertDateTimeFormat);
  const listed = formats.join(', ');
  return createFormatConstraint(`constrainDateTimeFormat(${listed})`, (text, fieldName) =>
    formats.some((format) => parseWithFormat(text, format) !== undefined)
      ? []
      : [
          createError(`Field ${fieldName} with value ${text} is not in a valid DateTime format. Valid DateTime formats: ${listed}`, Severity.FATAL, {
            value: text,
          }),
        ],
  );
}
