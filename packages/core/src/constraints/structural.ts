import type { Constraint } from '../domain/model/Constraint.js';
import type { JsonObject } from '../domain/model/JsonValue.js';
import type { Schema } from '../domain/model/Schema.js';
import type { ValidationError } from '../domain/model/ValidationError.js';
import type { ValueType } from '../domain/model/ValueType.js';
import { createConstraint } from '../domain/model/Constraint.js';
import { createError, Severity } from '../domain/model/ValidationError.js';
import { equivalentJsonType, stringifyValue } from '../domain/services/valueRendering.js';
import { JsonTranslator } from '../infrastructure/translators/JsonTranslator.js';

/**
 * Cast every element of an array to `elementType` and run `constraints`
 * against it. Element diagnostics are attributed to `name[i]`.
 */
export function applyConstraintsToEach<E>(elementType: ValueType<E>, ...constraints: Constraint<E>[]): Constraint<readonly unknown[]> {
  const names = constraints.map((c) => c.name).join(', ');
  return createConstraint<readonly unknown[]>(`applyConstraintsToEach(${elementType.name}; ${names})`, (items, fieldName, context) => {
    const errors: ValidationError[] = [];

    items.forEach((item, index) => {
      const elementName = `${fieldName}[${index}]`;
      const cast = context.converter.cast(item, elementType);
      if (!cast.success) {
        errors.push(
          createError(
            `Value ${stringifyValue(item)} in array ${fieldName} is an incorrect type. Expected value type: ${equivalentJsonType(elementType.name)}`,
            Severity.FATAL,
            { field: elementName, code: 'TYPE_MISMATCH', value: item },
          ),
        );
        return;
      }

      for (const constraint of constraints) {
        for (const error of constraint.evaluate(cast.value, elementName, context)) {
          errors.push(error.field !== undefined ? error : { ...error, field: elementName });
        }
      }
    });

    return errors;
  });
}

export interface ApplySchemaOptions {
  /** Passed to the nested `Schema.validate()`. Default: `false`. */
  readonly allowUnrecognized?: boolean;
}

/**
 * Validate a nested object against `schema`. Nested diagnostics are
 * attributed to `outer.inner`, and defaults are written into the nested object.
 */
export function applySchema(schema: Schema, options?: ApplySchemaOptions): Constraint<JsonObject> {
  return createConstraint<JsonObject>(`applySchema(${schema.fieldNames.join(', ')})`, (value, fieldName, context) => {
    const translator = new JsonTranslator({ converter: context.converter });
    const result = schema.validate(value, translator, { name: fieldName, allowUnrecognized: options?.allowUnrecognized });

    return result.errors.map((error) => {
      if (error.field === undefined || error.field === fieldName) return { ...error, field: fieldName };
      return { ...error, field: `${fieldName}.${error.field}` };
    });
  });
}
