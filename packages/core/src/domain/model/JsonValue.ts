/** A value of an already-parsed JSON tree, as produced by `JSON.parse`. */
export type JsonValue = null | boolean | number | string | JsonValue[] | JsonObject;

/** A JSON object node. */
export interface JsonObject {
  [key: string]: JsonValue;
}

/** Return `true` for objects created by a literal, `Object.create(null)` or `JSON.parse`. */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Deep check that `value` is a JSON tree (finite numbers, plain objects, arrays). */
export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') return true;
  if (typeof value === 'number') return Number.isFinite(value);
  if (Array.isArray(value)) return value.every(isJsonValue);
  return isJsonObject(value);
}

/** Deep check that `value` is a JSON object node. */
export function isJsonObject(value: unknown): value is JsonObject {
  if (!isPlainObject(value)) return false;
  return Object.values(value).every(isJsonValue);
}

/**
 * A named-property wrapper: a value carried together with the name it was
 * declared under. The null/empty check looks one level inside it.
 */
export class NamedValue {
  constructor(
    readonly name: string,
    readonly value: unknown,
  ) {}

  toString(): string {
    return `${this.name}: ${String(this.value)}`;
  }
}
