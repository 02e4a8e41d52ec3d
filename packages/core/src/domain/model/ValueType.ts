import type { JsonObject } from './JsonValue.js';
import { isJsonObject } from './JsonValue.js';

/** Conversion family a descriptor belongs to. Selects the cast rule applied to raw values. */
export type ValueKind = 'string' | 'integer' | 'number' | 'boolean' | 'date' | 'object' | 'array';

/**
 * Runtime descriptor of a field's value type.
 *
 * `name` is the internal scalar name (`Int32`, `String`, ...) that translators
 * map to a user-facing label. `is()` recognises values that already have the
 * type and narrows every cast result.
 */
export interface ValueType<T> {
  readonly kind: ValueKind;
  readonly name: string;
  /** Declared element type of an `array` descriptor. */
  readonly element?: ValueType<unknown>;
  is(value: unknown): value is T;
}

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

function isValidDate(value: unknown): value is Date {
  return value instanceof Date && !Number.isNaN(value.getTime());
}

function array(): ValueType<unknown[]>;
function array<E>(element: ValueType<E>): ValueType<E[]>;
function array<E>(element?: ValueType<E>): ValueType<E[]> | ValueType<unknown[]> {
  if (!element) {
    return {
      kind: 'array',
      name: 'Array',
      is: (value: unknown): value is unknown[] => Array.isArray(value),
    };
  }

  const elementType = element;
  return {
    kind: 'array',
    name: `Array<${elementType.name}>`,
    element: elementType,
    is: (value: unknown): value is E[] => Array.isArray(value) && value.every((item) => elementType.is(item)),
  };
}

/** Built-in value type descriptors. */
export const Types = {
  string: {
    kind: 'string',
    name: 'String',
    is: (value: unknown): value is string => typeof value === 'string',
  } satisfies ValueType<string>,

  /** 32-bit signed integer. */
  integer: {
    kind: 'integer',
    name: 'Int32',
    is: (value: unknown): value is number =>
      typeof value === 'number' && Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX,
  } satisfies ValueType<number>,

  /** Integer within the safe-integer range. */
  long: {
    kind: 'integer',
    name: 'Int64',
    is: (value: unknown): value is number => typeof value === 'number' && Number.isSafeInteger(value),
  } satisfies ValueType<number>,

  /** Finite floating-point number. */
  number: {
    kind: 'number',
    name: 'Double',
    is: (value: unknown): value is number => typeof value === 'number' && Number.isFinite(value),
  } satisfies ValueType<number>,

  boolean: {
    kind: 'boolean',
    name: 'Boolean',
    is: (value: unknown): value is boolean => typeof value === 'boolean',
  } satisfies ValueType<boolean>,

  date: {
    kind: 'date',
    name: 'DateTime',
    is: isValidDate,
  } satisfies ValueType<Date>,

  /** Structured object, represented as a JSON object tree. */
  object: {
    kind: 'object',
    name: 'Object',
    is: isJsonObject,
  } satisfies ValueType<JsonObject>,

  /** Ordered sequence. With an element type every element is cast to it. */
  array,
};
