import type { JsonObject, JsonValue } from '../model/JsonValue.js';
import { NamedValue } from '../model/JsonValue.js';

/**
 * Names of the members of an object value: its own enumerable string keys
 * followed by accessors declared along its prototype chain (class getters).
 */
export function memberNames(value: object): string[] {
  const names = new Set(Object.keys(value));

  let proto: unknown = Object.getPrototypeOf(value);
  while (proto !== null && proto !== Object.prototype && typeof proto === 'object') {
    for (const [name, descriptor] of Object.entries(Object.getOwnPropertyDescriptors(proto))) {
      if (name !== 'constructor' && descriptor.get) names.add(name);
    }
    proto = Object.getPrototypeOf(proto);
  }

  return [...names];
}

/**
 * Convert an arbitrary value into a JSON tree. Dates become ISO strings,
 * `Map`s become objects, `Set`s become arrays and class instances become
 * objects of their members. Object members holding `undefined` are dropped.
 *
 * Returns `undefined` when the value (or anything inside it) has no JSON
 * form: functions, symbols, non-finite numbers, unsafe bigints, cycles.
 */
export function toJsonValue(value: unknown): JsonValue | undefined {
  return convert(value, new Set<object>());
}

function convert(value: unknown, ancestors: Set<object>): JsonValue | undefined {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value === 'bigint') {
    const asNumber = Number(value);
    return Number.isSafeInteger(asNumber) ? asNumber : undefined;
  }
  if (typeof value !== 'object') return undefined;
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? undefined : value.toISOString();
  if (ancestors.has(value)) return undefined;

  ancestors.add(value);
  try {
    if (Array.isArray(value) || value instanceof Set) {
      const items: JsonValue[] = [];
      for (const item of value) {
        const converted = convert(item, ancestors);
        if (converted === undefined) return undefined;
        items.push(converted);
      }
      return items;
    }

    const entries: Array<[string, unknown]> =
      value instanceof Map
        ? [...value.entries()].map(([k, v]): [string, unknown] => [String(k), v])
        : value instanceof NamedValue
          ? [[value.name, value.value]]
          : memberNames(value).map((name): [string, unknown] => [name, Reflect.get(value, name)]);

    const result: JsonObject = {};
    for (const [key, member] of entries) {
      if (member === undefined) continue;
      const converted = convert(member, ancestors);
      if (converted === undefined) return undefined;
      result[key] = converted;
    }
    return result;
  } finally {
    ancestors.delete(value);
  }
}

/**
 * Best-effort text rendering shared by every translator: strings as-is,
 * scalars through `String()`, dates as ISO strings, structures as compact JSON.
 */
export function stringifyValue(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') return String(value);
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
  if (value instanceof NamedValue) return `${value.name}: ${stringifyValue(value.value)}`;

  const json = toJsonValue(value);
  return json !== undefined ? JSON.stringify(json) : String(value);
}

/**
 * `true` for `undefined`, `null`, blank strings, empty arrays, maps, sets and
 * objects without members. A `NamedValue` is empty when its name is blank or
 * its value is empty; a `NamedValue` nested inside another one is judged by
 * its text rendering only.
 */
export function isNullOrEmptyValue(value: unknown): boolean {
  return isEmptyAtDepth(value, 0);
}

function isEmptyAtDepth(value: unknown, depth: number): boolean {
  if (value === undefined || value === null) return true;
  if (typeof value === 'string') return value.trim() === '';
  if (typeof value !== 'object') return false;
  if (value instanceof NamedValue) {
    if (depth > 0) return stringifyValue(value).trim() === '';
    return value.name.trim() === '' || isEmptyAtDepth(value.value, depth + 1);
  }
  if (Array.isArray(value)) return value.length === 0;
  if (value instanceof Map || value instanceof Set) return value.size === 0;
  if (value instanceof Date) return false;
  return memberNames(value).length === 0;
}

const JSON_TYPE_LABELS: Readonly<Record<string, string>> = {
  Int32: 'Json Number',
  Int64: 'Json Number',
  Double: 'Json Number',
  String: 'Json String',
  Boolean: 'Json Boolean',
  DateTime: 'Json String (DateTime)',
  Object: 'Json Object',
  Array: 'Json Array',
};

/** Map an internal type name (`Int32`, `Array<String>`, ...) to its JSON label. Unknown names pass through. */
export function equivalentJsonType(typeName: string): string {
  if (typeName.startsWith('Array<')) return 'Json Array';
  return JSON_TYPE_LABELS[typeName] ?? typeName;
}
