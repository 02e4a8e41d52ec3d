import type { Constraint } from '../domain/model/Constraint.js';
import type { ValidationError } from '../domain/model/ValidationError.js';
import { createConstraint } from '../domain/model/Constraint.js';
import { createError, hasFatal, Severity } from '../domain/model/ValidationError.js';
import { InvalidArgumentError } from '../domain/errors.js';
import { stringifyValue } from '../domain/services/valueRendering.js';

/**
 * Passes when at least one of `constraints` produces no fatal error. The
 * first passing alternative's warnings and info entries are kept. When every
 * alternative fails, a single fatal error summarises all of them.
 *
 * @throws InvalidArgumentError when fewer than two constraints are given.
 */
export function matchAny<T>(...constraints: Constraint<T>[]): Constraint<T> {
  if (constraints.length < 2) {
    throw new InvalidArgumentError('matchAny requires at least 2 constraints');
  }

  const name = `matchAny(${constraints.map((c) => c.name).join(', ')})`;
  return createConstraint<T>(name, (value, fieldName, context) => {
    const failures: ValidationError[] = [];

    for (const constraint of constraints) {
      const errors = constraint.evaluate(value, fieldName, context);
      if (!hasFatal(errors)) return errors;
      failures.push(...errors.filter((e) => e.severity === Severity.FATAL));
    }

    const reasons = failures.map((e) => e.message).join(' | ');
    return [
      createError(`Field ${fieldName} with value ${stringifyValue(value)} did not satisfy any of ${constraints.length} alternatives: ${reasons}`, Severity.FATAL, {
        value,
      }),
    ];
  });
}
