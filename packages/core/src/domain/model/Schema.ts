import type { Field } from './Field.js';
import type { JsonObject } from './JsonValue.js';
import type { ValidationError, ValidationResult } from './ValidationError.js';
import type { Translator } from '../ports/Translator.js';
import type { EventType, FieldOutcome } from '../events/DomainEvents.js';
import type { EventHandler, WildcardHandler } from '../../application/EventBus.js';
import { EventBus } from '../../application/EventBus.js';
import { createError, hasFatal, Severity, toResult } from './ValidationError.js';
import { SchemaConfigurationError, UnsupportedOperationError } from '../errors.js';

/** Options for a single `Schema.validate()` call. */
export interface SchemaValidateOptions {
  /**
   * Name of the field this collection sits under when validated as a nested
   * schema. Messages read "Input <name> ..." and a trailing info entry reports
   * when the nested validation failed.
   */
  readonly name?: string;
  /** When `true`, keys the schema does not declare are reported as info instead of fatal. Default: `false`. */
  readonly allowUnrecognized?: boolean;
}

interface FieldReport {
  readonly outcome: FieldOutcome;
  readonly errors: readonly ValidationError[];
}

/**
 * An ordered set of fields and the orchestration to validate a collection
 * against them.
 *
 * `validate()` keeps no per-call state on the instance, so one schema can
 * check any number of collections, through any translator.
 *
 * @example
 * ```typescript
 * const schema = new Schema([
 *   new Field('host', 'Hostname to bind', Types.string),
 *   new Field('port', 'TCP port', Types.integer, { defaultValue: 8080 }),
 * ]);
 * const result = schema.validate(JSON.parse(text), new JsonTranslator());
 * ```
 */
export class Schema {
  private readonly fields = new Map<string, Field<unknown>>();
  private readonly eventBus = new EventBus();

  constructor(fields: readonly Field<unknown>[] = []) {
    this.addFields(...fields);
  }

  get size(): number {
    return this.fields.size;
  }

  /** Declared field names, in declaration order. */
  get fieldNames(): string[] {
    return [...this.fields.keys()];
  }

  hasField(name: string): boolean {
    return this.fields.has(name);
  }

  getField(name: string): Field<unknown> | undefined {
    return this.fields.get(name);
  }

  addField(field: Field<unknown>): this {
    return this.addFields(field);
  }

  /** Add several fields. Nothing is added if any name is already taken or repeated. */
  addFields(...fields: Field<unknown>[]): this {
    const seen = new Set<string>();
    for (const field of fields) {
      if (this.fields.has(field.name) || seen.has(field.name)) {
        throw new SchemaConfigurationError(`Schema already contains a field named ${field.name}`);
      }
      seen.add(field.name);
    }
    for (const field of fields) {
      this.fields.set(field.name, field);
    }
    return this;
  }

  removeField(name: string): this {
    return this.removeFields(name);
  }

  /** Remove several fields. Nothing is removed if any name is unknown. */
  removeFields(...names: string[]): this {
    const missing = names.find((name) => !this.fields.has(name));
    if (missing !== undefined) {
      throw new SchemaConfigurationError(`Schema does not contain a field named ${missing}`);
    }
    for (const name of names) {
      this.fields.delete(name);
    }
    return this;
  }

  /** A new schema with the same fields. Event subscriptions are not copied. */
  clone(): Schema {
    return new Schema([...this.fields.values()]);
  }

  /** Object keyed by field name whose values are the help texts, prefixed `Optional - ` for optional fields. */
  generateTemplate(): JsonObject {
    const template: JsonObject = {};
    for (const field of this.fields.values()) {
      template[field.name] = field.required ? field.helpText : `Optional - ${field.helpText}`;
    }
    return template;
  }

  /** Subscribe to validation events of the given type. */
  on<T extends EventType>(type: T, handler: EventHandler<T>): this {
    this.eventBus.on(type, handler);
    return this;
  }

  /** Subscribe to all validation events. */
  onAny(handler: WildcardHandler): this {
    this.eventBus.onAny(handler);
    return this;
  }

  off<T extends EventType>(type: T, handler: EventHandler<T>): this {
    this.eventBus.off(type, handler);
    return this;
  }

  offAny(handler: WildcardHandler): this {
    this.eventBus.offAny(handler);
    return this;
  }

  /**
   * Validate `collection` through `translator`. Every declared field is
   * checked and every problem reported; nothing short-circuits.
   *
   * Absent optional fields that carry a default get it written into
   * `collection` before they are validated.
   *
   * @throws UnsupportedOperationError when a default cannot be written into `collection`.
   */
  validate<C>(collection: C, translator: Translator<C>, options?: SchemaValidateOptions): ValidationResult {
    const schemaName = options?.name;
    const errors: ValidationError[] = [];

    this.eventBus.emit({ type: 'validation:started', schemaName, fieldCount: this.fields.size, timestamp: Date.now() });

    for (const field of this.fields.values()) {
      const report = this.validateField(field, collection, translator, schemaName);
      errors.push(...report.errors);
      this.eventBus.emit({
        type: 'field:validated',
        schemaName,
        field: field.name,
        outcome: report.outcome,
        errors: report.errors,
        timestamp: Date.now(),
      });
    }

    errors.push(...this.checkUnrecognized(collection, translator, options));

    if (schemaName !== undefined && hasFatal(errors)) {
      errors.push(createError(`Validation for ${schemaName} failed.`, Severity.INFO, { field: schemaName, code: 'CONTEXT' }));
    }

    const result = toResult(errors);
    this.eventBus.emit({
      type: 'validation:completed',
      schemaName,
      isValid: result.isValid,
      errorCount: errors.length,
      fatalCount: errors.filter((e) => e.severity === Severity.FATAL).length,
      timestamp: Date.now(),
    });
    return result;
  }

  private validateField<C>(field: Field<unknown>, collection: C, translator: Translator<C>, schemaName: string | undefined): FieldReport {
    let defaulted = false;

    if (!translator.collectionContains(collection, field.name)) {
      if (field.required) {
        const subject = schemaName !== undefined ? `Input ${schemaName}` : 'Input collection';
        return {
          outcome: 'missing',
          errors: [
            createError(`${subject} is missing required field ${field.name}: ${field.helpText}`, Severity.FATAL, {
              field: field.name,
              code: 'REQUIRED',
            }),
          ],
        };
      }
      if (!field.hasDefault) return { outcome: 'skipped', errors: [] };

      field.insertDefault(collection, translator);
      defaulted = true;
    }

    const { outcome, errors } = field.validate(collection, translator);
    if (!hasFatal(errors)) {
      return { outcome: defaulted && outcome === 'valid' ? 'defaulted' : outcome, errors };
    }
    return {
      outcome,
      errors: [...errors, createError(field.helpText, Severity.INFO, { field: field.name, code: 'CONTEXT' })],
    };
  }

  private checkUnrecognized<C>(collection: C, translator: Translator<C>, options?: SchemaValidateOptions): ValidationError[] {
    let keys: string[];
    try {
      keys = translator.getCollectionKeys(collection);
    } catch (err) {
      if (err instanceof UnsupportedOperationError) return [];
      throw err;
    }

    const severity = options?.allowUnrecognized === true ? Severity.INFO : Severity.FATAL;
    const subject = options?.name !== undefined ? `Input ${options.name}` : 'Input collection';
    return keys
      .filter((key) => !this.fields.has(key))
      .map((key) =>
        createError(`${subject} contains unrecognized field ${key}.`, severity, { field: key, code: 'UNKNOWN_FIELD' }),
      );
  }
}
