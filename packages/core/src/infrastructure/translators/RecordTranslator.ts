import type { ValueType } from '../../domain/model/ValueType.js';
import type { Translator } from '../../domain/ports/Translator.js';
import type { CastResult } from '../../domain/services/ValueConverter.js';
import { UnsupportedOperationError } from '../../domain/errors.js';
import { ValueConverter } from '../../domain/services/ValueConverter.js';
import {
  equivalentJsonType,
  isNullOrEmptyValue,
  memberNames,
  stringifyValue,
} from '../../domain/services/valueRendering.js';

export interface RecordTranslatorOptions {
  /** Converter used for casts. Default: a new converter with the ISO-8601 date/time formats. */
  readonly converter?: ValueConverter;
}

/**
 * Translator over plain objects and class instances. Members are own
 * enumerable properties plus accessors declared on the prototype chain.
 * A member whose getter throws reads as absent.
 */
export class RecordTranslator implements Translator<object> {
  readonly converter: ValueConverter;

  constructor(options?: RecordTranslatorOptions) {
    this.converter = options?.converter ?? new ValueConverter();
  }

  collectionContains(collection: object, key: string): boolean {
    return this.read(collection, key) !== undefined;
  }

  getCollectionKeys(collection: object): string[] {
    return memberNames(collection).filter((key) => this.read(collection, key) !== undefined);
  }

  collectionValueToString(collection: object, key: string): string {
    return stringifyValue(this.read(collection, key));
  }

  fieldValueIsNullOrEmpty(collection: object, key: string): boolean {
    return isNullOrEmptyValue(this.read(collection, key));
  }

  tryCastValue<T>(collection: object, key: string, type: ValueType<T>): CastResult<T> {
    return this.converter.cast(this.read(collection, key), type);
  }

  /**
   * Assign a member. Values are stored as given.
   *
   * @throws UnsupportedOperationError for read-only members and non-extensible records.
   */
  insertFieldValue(collection: object, key: string, value: unknown): void {
    const descriptor = findDescriptor(collection, key);

    if (descriptor === undefined) {
      if (!Object.isExtensible(collection)) {
        throw new UnsupportedOperationError(`Cannot add member ${key} to a non-extensible record`);
      }
    } else if (descriptor.get !== undefined || descriptor.set !== undefined) {
      if (descriptor.set === undefined) {
        throw new UnsupportedOperationError(`Member ${key} is read-only`);
      }
    } else if (descriptor.writable !== true) {
      throw new UnsupportedOperationError(`Member ${key} is read-only`);
    }

    if (!Reflect.set(collection, key, value)) {
      throw new UnsupportedOperationError(`Cannot assign member ${key}`);
    }
  }

  getEquivalentType(typeName: string): string {
    return equivalentJsonType(typeName);
  }

  private read(collection: object, key: string): unknown {
    if (!memberNames(collection).includes(key)) return undefined;
    try {
      return Reflect.get(collection, key);
    } catch {
      return undefined;
    }
  }
}

function findDescriptor(target: object, key: string): PropertyDescriptor | undefined {
  let current: unknown = target;
  while (current !== null && typeof current === 'object') {
    const descriptor = Object.getOwnPropertyDescriptor(current, key);
    if (descriptor) return descriptor;
    current = Object.getPrototypeOf(current);
  }
  return undefined;
}
