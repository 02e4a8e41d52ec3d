import type { Constraint } from '../domain/model/Constraint.js';
import { createConstraint } from '../domain/model/Constraint.js';
import { createError } from '../domain/model/ValidationError.js';
import { InvalidArgumentError } from '../domain/errors.js';

/** Anything with an element count: arrays, maps, sets and plain objects (by key count). */
export type Countable = readonly unknown[] | ReadonlyMap<unknown, unknown> | ReadonlySet<unknown> | object;

export function countOf(value: Countable): number {
  if (Array.isArray(value)) return value.length;
  if (value instanceof Map || value instanceof Set) return value.size;
  return Object.keys(value).length;
}

function assertCount(bound: number, label: string): void {
  if (!Number.isInteger(bound) || bound < 0) {
    throw new InvalidArgumentError(`${label} must be a non-negative integer, got ${bound}`);
  }
}

export function constrainCollectionCountLowerBound(lowerBound: number): Constraint<Countable> {
  assertCount(lowerBound, 'Lower bound');
  return createConstraint<Countable>(`constrainCollectionCountLowerBound(${lowerBound})`, (value, fieldName) => {
    const count = countOf(value);
    return count < lowerBound
      ? [createError(`Collection ${fieldName} contains ${count} values, but must contain at least ${lowerBound} values.`)]
      : [];
  });
}

export function constrainCollectionCountUpperBound(upperBound: number): Constraint<Countable> {
  assertCount(upperBound, 'Upper bound');
  return createConstraint<Countable>(`constrainCollectionCountUpperBound(${upperBound})`, (value, fieldName) => {
    const count = countOf(value);
    return count > upperBound
      ? [createError(`Collection ${fieldName} contains ${count} values, but must contain at most ${upperBound} values.`)]
      : [];
  });
}

/** Inclusive element count range. */
export function constrainCollectionCount(lowerBound: number, upperBound: number): Constraint<Countable> {
  assertCount(lowerBound, 'Lower bound');
  assertCount(upperBound, 'Upper bound');
  if (lowerBound > upperBound) {
    throw new InvalidArgumentError(`Lower bound ${lowerBound} must not be greater than upper bound ${upperBound}`);
  }
  return createConstraint<Countable>(`constrainCollectionCount(${lowerBound}, ${upperBound})`, (value, fieldName) => {
    const count = countOf(value);
    return count < lowerBound || count > upperBound
      ? [
          createError(
            `Collection ${fieldName} contains ${count} values, but must contain between ${lowerBound} and ${upperBound} values.`,
          ),
        ]
      : [];
  });
}
