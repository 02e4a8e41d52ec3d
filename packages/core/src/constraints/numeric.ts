import type { Constraint } from '../domain/model/Constraint.js';
import { createConstraint } from '../domain/model/Constraint.js';
import { createError, Severity } from '../domain/model/ValidationError.js';
import { InvalidArgumentError } from '../domain/errors.js';

/** Number of digits after the decimal point, accounting for exponent notation (`1.5e-7` has 8). */
export function fractionalDigits(value: number): number {
  const [mantissa = '', exponentText] = String(value).toLowerCase().split('e');
  const fraction = mantissa.split('.')[1] ?? '';
  const exponent = exponentText !== undefined ? Number(exponentText) : 0;
  return Math.max(0, fraction.length - exponent);
}

/** Limit the digits after the decimal point. */
export function constrainDigits(upperBound: number): Constraint<number> {
  if (!Number.isInteger(upperBound) || upperBound < 0) {
    throw new InvalidArgumentError(`Digit limit must be a non-negative integer, got ${upperBound}`);
  }
  return createConstraint<number>(`constrainDigits(${upperBound})`, (value, fieldName) =>
    fractionalDigits(value) > upperBound
      ? [
          createError(
            `Field ${fieldName} with value ${value} is invalid. Value can have no more than ${upperBound} digits after the decimal.`,
            Severity.FATAL,
            { value },
          ),
        ]
      : [],
  );
}
