import type { Constraint } from '../domain/model/Constraint.js';
import { createConstraint } from '../domain/model/Constraint.js';
import { createError, Severity } from '../domain/model/ValidationError.js';
import { InvalidArgumentError } from '../domain/errors.js';
import { stringifyValue } from '../domain/services/valueRendering.js';

/** Values with a natural order. Dates compare by timestamp. */
export type Comparable = number | bigint | string | Date;

function ordinal(value: number | bigint | Date): number | bigint {
  return value instanceof Date ? value.getTime() : value;
}

export function compareValues(a: Comparable, b: Comparable): number {
  if (typeof a === 'string' || typeof b === 'string') {
    const x = stringifyValue(a);
    const y = stringifyValue(b);
    return x < y ? -1 : x > y ? 1 : 0;
  }
  const x = ordinal(a);
  const y = ordinal(b);
  return x < y ? -1 : x > y ? 1 : 0;
}

function assertOrdered(low: Comparable, high: Comparable): void {
  if (compareValues(low, high) > 0) {
    throw new InvalidArgumentError(
      `Lower bound ${stringifyValue(low)} must not be greater than upper bound ${stringifyValue(high)}`,
    );
  }
}

function inRange(value: Comparable, low: Comparable, high: Comparable): boolean {
  return compareValues(value, low) >= 0 && compareValues(value, high) <= 0;
}

export function constrainValueLowerBound(lowerBound: number): Constraint<number>;
export function constrainValueLowerBound(lowerBound: bigint): Constraint<bigint>;
export function constrainValueLowerBound(lowerBound: string): Constraint<string>;
export function constrainValueLowerBound(lowerBound: Date): Constraint<Date>;
export function constrainValueLowerBound(lowerBound: Comparable): Constraint<Comparable> {
  const bound = stringifyValue(lowerBound);
  return createConstraint<Comparable>(`constrainValueLowerBound(${bound})`, (value, fieldName) =>
    compareValues(value, lowerBound) < 0
      ? [createError(`Field ${fieldName} with value ${stringifyValue(value)} is less than enforced lower bound ${bound}`, Severity.FATAL, { value })]
      : [],
  );
}

export function constrainValueUpperBound(upperBound: number): Constraint<number>;
export function constrainValueUpperBound(upperBound: bigint): Constraint<bigint>;
export function constrainValueUpperBound(upperBound: string): Constraint<string>;
export function constrainValueUpperBound(upperBound: Date): Constraint<Date>;
export function constrainValueUpperBound(upperBound: Comparable): Constraint<Comparable> {
  const bound = stringifyValue(upperBound);
  return createConstraint<Comparable>(`constrainValueUpperBound(${bound})`, (value, fieldName) =>
    compareValues(value, upperBound) > 0
      ? [createError(`Field ${fieldName} with value ${stringifyValue(value)} is greater than enforced upper bound ${bound}`, Severity.FATAL, { value })]
      : [],
  );
}

/**
 * Inclusive range check.
 *
 * @throws InvalidArgumentError when `lowerBound` is greater than `upperBound`.
 */
export function constrainValue(lowerBound: number, upperBound: number): Constraint<number>;
export function constrainValue(lowerBound: bigint, upperBound: bigint): Constraint<bigint>;
export function constrainValue(lowerBound: string, upperBound: string): Constraint<string>;
export function constrainValue(lowerBound: Date, upperBound: Date): Constraint<Date>;
export function constrainValue(lowerBound: Comparable, upperBound: Comparable): Constraint<Comparable> {
  assertOrdered(lowerBound, upperBound);
  const low = stringifyValue(lowerBound);
  const high = stringifyValue(upperBound);
  return createConstraint<Comparable>(`constrainValue(${low}, ${high})`, (value, fieldName) =>
    inRange(value, lowerBound, upperBound)
      ? []
      : [
          createError(
            `Field ${fieldName} with value ${stringifyValue(value)} is invalid. Value must be greater than or equal to ${low} and less than or equal to ${high}`,
            Severity.FATAL,
            { value },
          ),
        ],
  );
}

/**
 * Passes when the value falls inside any of the inclusive `[low, high]` domains.
 *
 * @throws InvalidArgumentError when no domain is given or a domain is inverted.
 */
export function constrainValueDomains(...domains: [number, number][]): Constraint<number>;
export function constrainValueDomains(...domains: [bigint, bigint][]): Constraint<bigint>;
export function constrainValueDomains(...domains: [string, string][]): Constraint<string>;
export function constrainValueDomains(...domains: [Date, Date][]): Constraint<Date>;
export function constrainValueDomains(...domains: [Comparable, Comparable][]): Constraint<Comparable> {
  if (domains.length === 0) {
    throw new InvalidArgumentError('constrainValueDomains requires at least one domain');
  }
  for (const [low, high] of domains) assertOrdered(low, high);

  const listed = domains.map(([low, high]) => `[${stringifyValue(low)}, ${stringifyValue(high)}]`).join(' ');
  return createConstraint<Comparable>(`constrainValueDomains(${listed})`, (value, fieldName) =>
    domains.some(([low, high]) => inRange(value, low, high))
      ? []
      : [
          createError(
            `Field ${fieldName} with value ${stringifyValue(value)} is invalid. Value must fall within one of the following domains, inclusive: ${listed}`,
            Severity.FATAL,
            { value },
          ),
        ],
  );
}
