import type { ValueType } from '../../domain/model/ValueType.js';
import type { Translator } from '../../domain/ports/Translator.js';
import type { CastResult } from '../../domain/services/ValueConverter.js';
import { ValueConverter } from '../../domain/services/ValueConverter.js';
import { equivalentJsonType, isNullOrEmptyValue, stringifyValue } from '../../domain/services/valueRendering.js';

export interface MapTranslatorOptions {
  /** Converter used for casts. Default: a new converter with the ISO-8601 date/time formats. */
  readonly converter?: ValueConverter;
}

/** Translator over a `Map` keyed by field name. Values are stored as given. */
export class MapTranslator implements Translator<Map<string, unknown>> {
  readonly converter: ValueConverter;

  constructor(options?: MapTranslatorOptions) {
    this.converter = options?.converter ?? new ValueConverter();
  }

  collectionContains(collection: Map<string, unknown>, key: string): boolean {
    return collection.get(key) !== undefined;
  }

  getCollectionKeys(collection: Map<string, unknown>): string[] {
    return [...collection.entries()].filter(([, value]) => value !== undefined).map(([key]) => key);
  }

  collectionValueToString(collection: Map<string, unknown>, key: string): string {
    return stringifyValue(collection.get(key));
  }

  fieldValueIsNullOrEmpty(collection: Map<string, unknown>, key: string): boolean {
    return isNullOrEmptyValue(collection.get(key));
  }

  tryCastValue<T>(collection: Map<string, unknown>, key: string, type: ValueType<T>): CastResult<T> {
    return this.converter.cast(collection.get(key), type);
  }

  insertFieldValue(collection: Map<string, unknown>, key: string, value: unknown): void {
    collection.set(key, value);
  }

  getEquivalentType(typeName: string): string {
    return equivalentJsonType(typeName);
  }
}
