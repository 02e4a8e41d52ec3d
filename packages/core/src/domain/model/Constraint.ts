import type { ValidationError } from './ValidationError.js';
import type { ValueConverter } from '../services/ValueConverter.js';
import { InvalidArgumentError } from '../errors.js';

/** What a constraint may rely on besides the value itself. */
export interface ConstraintContext {
  /** Converter of the translator driving the validation. Nested casts go through it. */
  readonly converter: ValueConverter;
}

/**
 * A named predicate over a field's cast value.
 *
 * `evaluate` must be a pure function of its arguments: it returns the
 * diagnostics for the value and never throws.
 */
export interface Constraint<T> {
  readonly kind: 'value';
  readonly name: string;
  readonly evaluate: (value: T, fieldName: string, context: ConstraintContext) => ValidationError[];
}

/**
 * A constraint over the text form of the raw value rather than the cast
 * value, e.g. how a date was written.
 */
export interface FormatConstraint {
  readonly kind: 'format';
  readonly name: string;
  readonly evaluate: (text: string, fieldName: string, context: ConstraintContext) => ValidationError[];
}

/** Anything that can be attached to a field of type `T`. */
export type FieldConstraint<T> = Constraint<T> | FormatConstraint;

function assertName(name: string): void {
  if (name.trim() === '') {
    throw new InvalidArgumentError('Constraint name cannot be empty or whitespace');
  }
}

export function createConstraint<T>(name: string, evaluate: Constraint<T>['evaluate']): Constraint<T> {
  assertName(name);
  return { kind: 'value', name, evaluate };
}

export function createFormatConstraint(name: string, evaluate: FormatConstraint['evaluate']): FormatConstraint {
  assertName(name);
  return { kind: 'format', name, evaluate };
}
