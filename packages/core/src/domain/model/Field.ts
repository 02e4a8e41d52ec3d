import type { ConstraintContext, FieldConstraint } from './Constraint.js';
import type { ValidationError } from './ValidationError.js';
import type { ValueType } from './ValueType.js';
import type { Translator } from '../ports/Translator.js';
import { createError, Severity } from './ValidationError.js';
import { SchemaConfigurationError } from '../errors.js';
import { ValueConverter } from '../services/ValueConverter.js';

/**
 * One accepted value type of a field together with the constraints that apply
 * when the value casts to it.
 */
export interface TypeBranch<T> {
  readonly type: ValueType<T>;
  /**
   * Cast the value under `key` and run the branch constraints.
   * Returns `undefined` when the cast fails.
   */
  validate<C>(collection: C, key: string, translator: Translator<C>): ValidationError[] | undefined;
}

/** Pair a value type with the constraints to run when a value casts to it. */
export function whenType<T>(type: ValueType<T>, constraints: readonly FieldConstraint<T>[] = []): TypeBranch<T> {
  return {
    type,
    validate<C>(collection: C, key: string, translator: Translator<C>): ValidationError[] | undefined {
      const cast = translator.tryCastValue(collection, key, type);
      if (!cast.success) return undefined;

      const context: ConstraintContext = { converter: translator.converter };
      const errors: ValidationError[] = [];
      let text: string | undefined;

      for (const constraint of constraints) {
        try {
          if (constraint.kind === 'value') {
            errors.push(...constraint.evaluate(cast.value, key, context));
          } else {
            text ??= translator.collectionValueToString(collection, key);
            errors.push(...constraint.evaluate(text, key, context));
          }
        } catch (err) {
          const reason = err instanceof Error ? err.message : String(err);
          errors.push(createError(`Constraint ${constraint.name} could not evaluate field ${key}: ${reason}`));
        }
      }

      return errors;
    },
  };
}

/** Options for a `Field`. */
export interface FieldOptions<T> {
  /** When `true`, a missing value is a fatal error. Default: `true`, or `false` when `defaultValue` is set. */
  readonly required?: boolean;
  /** Value inserted into the collection when the field is missing. Implies `required: false`. */
  readonly defaultValue?: T;
  /** When `true`, a blank value on a required field is a warning instead of a fatal error. Default: `false`. */
  readonly allowNull?: boolean;
  /** Constraints run in declaration order against the cast value. */
  readonly constraints?: readonly FieldConstraint<T>[];
}

/** Per-field outcome of `Field.validate()`. */
export interface FieldValidation {
  /** `empty` when the value was blank and validation stopped before casting. */
  readonly outcome: 'valid' | 'invalid' | 'empty';
  readonly errors: readonly ValidationError[];
}

/**
 * A named, typed slot of a schema.
 *
 * Immutable once built; the same instance can be shared by schemas and
 * validations running side by side.
 *
 * @example
 * ```typescript
 * const port = new Field('port', 'TCP port the server listens on', Types.integer, {
 *   constraints: [constrainValue(1, 65535)],
 * });
 * const timeout = new Field('timeout', 'Seconds, or "none"', Types.integer).orType(Types.string, [allowValues('none')]);
 * ```
 */
export class Field<T = unknown> {
  readonly name: string;
  readonly helpText: string;
  readonly required: boolean;
  readonly allowNull: boolean;
  readonly defaultValue: T | undefined;
  private readonly branches: readonly TypeBranch<T>[];

  constructor(name: string, helpText: string, type: ValueType<T> | readonly TypeBranch<T>[], options?: FieldOptions<T>) {
    if (name.trim() === '') {
      throw new SchemaConfigurationError('Field name cannot be empty or whitespace');
    }
    if (helpText.trim() === '') {
      throw new SchemaConfigurationError(`Help text of field ${name} cannot be empty or whitespace`);
    }

    this.name = name;
    this.helpText = helpText;
    this.allowNull = options?.allowNull ?? false;
    this.defaultValue = options?.defaultValue === undefined ? undefined : copyDefault(name, options.defaultValue);
    this.branches = 'kind' in type ? [whenType(type, options?.constraints)] : this.checkBranches(type, options);

    const hasDefault = this.defaultValue !== undefined;
    if (options?.required === true && hasDefault) {
      throw new SchemaConfigurationError(`Field ${name} cannot be required and carry a default value`);
    }
    this.required = options?.required ?? !hasDefault;

    if (hasDefault) this.checkDefault();
  }

  /** Internal names of the accepted types, in the order casts are attempted. */
  get typeNames(): readonly string[] {
    return this.branches.map((b) => b.type.name);
  }

  get hasDefault(): boolean {
    return this.defaultValue !== undefined;
  }

  /**
   * Return a copy of this field that also accepts `type`. Types are tried in
   * declaration order; the first successful cast selects the constraints.
   */
  orType<U>(type: ValueType<U>, constraints: readonly FieldConstraint<U>[] = []): Field<T | U> {
    const branches: readonly TypeBranch<T | U>[] = [...this.branches, whenType(type, constraints)];
    return new Field<T | U>(this.name, this.helpText, branches, {
      required: this.hasDefault ? undefined : this.required,
      defaultValue: this.defaultValue,
      allowNull: this.allowNull,
    });
  }

  /**
   * Validate the value stored under this field's name: blank check, cast,
   * then every constraint of the matching type. Presence is the schema's job.
   */
  validate<C>(collection: C, translator: Translator<C>): FieldValidation {
    if (translator.fieldValueIsNullOrEmpty(collection, this.name)) {
      if (!this.required) return { outcome: 'empty', errors: [] };
      const severity = this.allowNull ? Severity.WARNING : Severity.FATAL;
      return {
        outcome: 'empty',
        errors: [createError(`Value of field ${this.name} is null or empty.`, severity, { field: this.name, code: 'NULL_OR_EMPTY' })],
      };
    }

    for (const branch of this.branches) {
      const branchErrors = branch.validate(collection, this.name, translator);
      if (branchErrors === undefined) continue;

      const errors = branchErrors.map((e) => (e.field !== undefined ? e : { ...e, field: this.name }));
      return { outcome: errors.some((e) => e.severity === Severity.FATAL) ? 'invalid' : 'valid', errors };
    }

    const raw = translator.collectionValueToString(collection, this.name);
    const expected = this.typeNames.map((name) => translator.getEquivalentType(name)).join(', ');
    return {
      outcome: 'invalid',
      errors: [
        createError(`Field ${this.name} with value ${raw} is an incorrect type. Expected one of: ${expected}`, Severity.FATAL, {
          field: this.name,
          code: 'TYPE_MISMATCH',
          value: raw,
        }),
      ],
    };
  }

  /**
   * Write a fresh copy of the default value into `collection` under this
   * field's name. Mutating the inserted value never reaches the field.
   */
  insertDefault<C>(collection: C, translator: Translator<C>): void {
    if (this.defaultValue === undefined) {
      throw new SchemaConfigurationError(`Field ${this.name} has no default value to insert`);
    }
    translator.insertFieldValue(collection, this.name, structuredClone(this.defaultValue));
  }

  toString(): string {
    return this.name;
  }

  private checkBranches(branches: readonly TypeBranch<T>[], options?: Pick<FieldOptions<T>, 'constraints'>): readonly TypeBranch<T>[] {
    if (branches.length === 0) {
      throw new SchemaConfigurationError(`Field ${this.name} must accept at least one type`);
    }
    if (options?.constraints !== undefined) {
      throw new SchemaConfigurationError(`Field ${this.name} lists its types with whenType(); give constraints per type there`);
    }
    const names = branches.map((b) => b.type.name);
    const duplicate = names.find((n, i) => names.indexOf(n) !== i);
    if (duplicate !== undefined) {
      throw new SchemaConfigurationError(`Field ${this.name} already accepts type ${duplicate}`);
    }
    return branches;
  }

  private checkDefault(): void {
    const converter = new ValueConverter();
    const castable = this.branches.some((b) => converter.cast(this.defaultValue, b.type).success);
    if (!castable) {
      throw new SchemaConfigurationError(
        `Default value of field ${this.name} cannot be cast to any of: ${this.typeNames.join(', ')}`,
      );
    }
  }
}

function copyDefault<T>(fieldName: string, value: T): T {
  try {
    return structuredClone(value);
  } catch (err) {
    throw new SchemaConfigurationError(`Default value of field ${fieldName} cannot be copied`, { cause: err });
  }
}
