import type { JsonObject, JsonValue } from '../../domain/model/JsonValue.js';
import type { ValueType } from '../../domain/model/ValueType.js';
import type { Translator } from '../../domain/ports/Translator.js';
import type { CastResult } from '../../domain/services/ValueConverter.js';
import { isPlainObject } from '../../domain/model/JsonValue.js';
import { InvalidArgumentError, UnsupportedOperationError } from '../../domain/errors.js';
import { ValueConverter } from '../../domain/services/ValueConverter.js';
import { equivalentJsonType, isNullOrEmptyValue, stringifyValue, toJsonValue } from '../../domain/services/valueRendering.js';

export interface JsonTranslatorOptions {
  /** Converter used for casts. Default: a new converter with the ISO-8601 date/time formats. */
  readonly converter?: ValueConverter;
}

function isObjectNode(value: JsonValue): value is JsonObject {
  return isPlainObject(value);
}

/**
 * Translator over an already-parsed JSON tree (`JSON.parse` output).
 *
 * Only object nodes have keys; any other node is a keyless collection in
 * which every field is absent.
 */
export class JsonTranslator implements Translator<JsonValue> {
  readonly converter: ValueConverter;

  constructor(options?: JsonTranslatorOptions) {
    this.converter = options?.converter ?? new ValueConverter();
  }

  collectionContains(collection: JsonValue, key: string): boolean {
    return this.lookup(collection, key) !== undefined;
  }

  getCollectionKeys(collection: JsonValue): string[] {
    if (!isObjectNode(collection)) {
      throw new UnsupportedOperationError(`A JSON ${describeNode(collection)} has no keys`);
    }
    return Object.keys(collection).filter((key) => collection[key] !== undefined);
  }

  collectionValueToString(collection: JsonValue, key: string): string {
    return stringifyValue(this.lookup(collection, key));
  }

  fieldValueIsNullOrEmpty(collection: JsonValue, key: string): boolean {
    return isNullOrEmptyValue(this.lookup(collection, key));
  }

  tryCastValue<T>(collection: JsonValue, key: string, type: ValueType<T>): CastResult<T> {
    return this.converter.cast(this.lookup(collection, key), type);
  }

  /**
   * Write `value` as a JSON node. Dates become ISO strings, maps and class
   * instances become objects.
   *
   * @throws UnsupportedOperationError when `collection` is not an object or cannot take the key.
   * @throws InvalidArgumentError when `value` has no JSON form.
   */
  insertFieldValue(collection: JsonValue, key: string, value: unknown): void {
    if (!isObjectNode(collection)) {
      throw new UnsupportedOperationError(`Cannot insert field ${key} into a JSON ${describeNode(collection)}`);
    }
    if (Object.isFrozen(collection) || (!Object.hasOwn(collection, key) && !Object.isExtensible(collection))) {
      throw new UnsupportedOperationError(`Cannot insert field ${key} into a read-only JSON object`);
    }

    const node = toJsonValue(value);
    if (node === undefined) {
      throw new InvalidArgumentError(`Value for field ${key} cannot be represented as JSON`);
    }
    collection[key] = node;
  }

  getEquivalentType(typeName: string): string {
    return equivalentJsonType(typeName);
  }

  private lookup(collection: JsonValue, key: string): JsonValue | undefined {
    if (!isObjectNode(collection) || !Object.hasOwn(collection, key)) return undefined;
    return collection[key];
  }
}

function describeNode(node: JsonValue): string {
  if (node === null) return 'null';
  if (Array.isArray(node)) return 'array';
  return typeof node;
}
