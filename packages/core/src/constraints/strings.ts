import type { Constraint } from '../domain/model/Constraint.js';
import { createConstraint } from '../domain/model/Constraint.js';
import { createError, Severity } from '../domain/model/ValidationError.js';
import { InvalidArgumentError } from '../domain/errors.js';
import { stringifyValue } from '../domain/services/valueRendering.js';

function sameValue(a: unknown, b: unknown): boolean {
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();
  return a === b;
}

function assertLength(bound: number, label: string): void {
  if (!Number.isInteger(bound) || bound < 0) {
    throw new InvalidArgumentError(`${label} must be a non-negative integer, got ${bound}`);
  }
}

/**
 * Passes when the value equals one of `acceptableValues`. Dates are equal when
 * they denote the same instant.
 */
export function allowValues<T>(...acceptableValues: T[]): Constraint<T> {
  if (acceptableValues.length === 0) {
    throw new InvalidArgumentError('allowValues requires at least one value');
  }
  const listed = acceptableValues.map((v) => stringifyValue(v)).join(', ');
  return createConstraint<T>(`allowValues(${listed})`, (value, fieldName) =>
    acceptableValues.some((candidate) => sameValue(candidate, value))
      ? []
      : [createError(`Field ${fieldName} with value ${stringifyValue(value)} is not valid. Valid values: ${listed}`, Severity.FATAL, { value })],
  );
}

/** One fatal error per forbidden substring found in the value. */
export function forbidSubstrings(...forbiddenSubstrings: string[]): Constraint<string> {
  if (forbiddenSubstrings.length === 0) {
    throw new InvalidArgumentError('forbidSubstrings requires at least one substring');
  }
  if (forbiddenSubstrings.some((s) => s === '')) {
    throw new InvalidArgumentError('forbidSubstrings cannot forbid the empty string');
  }
  return createConstraint<string>(`forbidSubstrings(${forbiddenSubstrings.join(', ')})`, (value, fieldName) =>
    forbiddenSubstrings
      .filter((s) => value.includes(s))
      .map((s) => createError(`Field ${fieldName} with value ${value} contains forbidden substring "${s}"`, Severity.FATAL, { value })),
  );
}

export function constrainStringLengthLowerBound(lowerBound: number): Constraint<string> {
  assertLength(lowerBound, 'Lower bound');
  return createConstraint<string>(`constrainStringLengthLowerBound(${lowerBound})`, (value, fieldName) =>
    value.length < lowerBound
      ? [
          createError(
            `Field ${fieldName} with value ${value} must have a length of at least ${lowerBound}. Actual length: ${value.length}`,
            Severity.FATAL,
            { value },
          ),
        ]
      : [],
  );
}

export function constrainStringLengthUpperBound(upperBound: number): Constraint<string> {
  assertLength(upperBound, 'Upper bound');
  return createConstraint<string>(`constrainStringLengthUpperBound(${upperBound})`, (value, fieldName) =>
    value.length > upperBound
      ? [
          createError(
            `Field ${fieldName} with value ${value} must have a length of at most ${upperBound}. Actual length: ${value.length}`,
            Severity.FATAL,
            { value },
          ),
        ]
      : [],
  );
}

/** Inclusive length range. */
export function constrainStringLength(lowerBound: number, upperBound: number): Constraint<string> {
  assertLength(lowerBound, 'Lower bound');
  assertLength(upperBound, 'Upper bound');
  if (lowerBound > upperBound) {
    throw new InvalidArgumentError(`Lower bound ${lowerBound} must not be greater than upper bound ${upperBound}`);
  }
  return createConstraint<string>(`constrainStringLength(${lowerBound}, ${upperBound})`, (value, fieldName) =>
    value.length < lowerBound || value.length > upperBound
      ? [
          createError(
            `Field ${fieldName} with value ${value} must have a length of at least ${lowerBound} and at most ${upperBound}. Actual length: ${value.length}`,
            Severity.FATAL,
            { value },
          ),
        ]
      : [],
  );
}

/**
 * Passes when at least one pattern matches the whole value. Global and sticky
 * flags are ignored.
 */
export function constrainStringWithRegexExact(...patterns: RegExp[]): Constraint<string> {
  if (patterns.length === 0) {
    throw new InvalidArgumentError('constrainStringWithRegexExact requires at least one pattern');
  }
  const anchored = patterns.map((p) => new RegExp(`^(?:${p.source})$`, p.flags.replace(/[gy]/g, '')));
  const listed = patterns.map(String).join(' ');

  return createConstraint<string>(`constrainStringWithRegexExact(${listed})`, (value, fieldName) => {
    if (anchored.some((p) => p.test(value))) return [];
    const message =
      patterns.length === 1
        ? `Field ${fieldName} with value ${value} is not an exact match to pattern ${listed}`
        : `Field ${fieldName} with value ${value} is not an exact match to any pattern: ${listed}`;
    return [createError(message, Severity.FATAL, { value })];
  });
}
