import type { ValueType } from '../model/ValueType.js';
import type { CastResult, ValueConverter } from '../services/ValueConverter.js';

/**
 * Port between field/schema logic and the physical shape of a collection of
 * named values (a parsed JSON object, a `Map`, a class instance, ...).
 *
 * Implementations hold no state about the collections they read: every
 * operation is a function of `(collection, key)`. A value is present under a
 * key when the key exists and its value is not `undefined`.
 */
export interface Translator<C> {
  /** Converter used for casts; also handed to constraints that cast nested values. */
  readonly converter: ValueConverter;

  /** `true` if a value is present under `key`. Never throws for absent keys. */
  collectionContains(collection: C, key: string): boolean;

  /**
   * All keys holding a value, in the collection's natural order.
   *
   * @throws UnsupportedOperationError when the collection has no key concept.
   */
  getCollectionKeys(collection: C): string[];

  /** Text rendering of the value under `key`. The key is assumed to exist. */
  collectionValueToString(collection: C, key: string): string;

  /** `true` if the value under `key` is absent, `null`, blank or an empty structure. */
  fieldValueIsNullOrEmpty(collection: C, key: string): boolean;

  /** Cast the value under `key` to `type`. Never throws. */
  tryCastValue<T>(collection: C, key: string, type: ValueType<T>): CastResult<T>;

  /**
   * Write `value` under `key`, creating the key if needed.
   *
   * @throws UnsupportedOperationError when the collection cannot be written.
   */
  insertFieldValue(collection: C, key: string, value: unknown): void;

  /** User-facing label for an internal type name, used in diagnostics. */
  getEquivalentType(typeName: string): string;
}
