import type { ValueType } from '../model/ValueType.js';
import { isPlainObject } from '../model/JsonValue.js';
import { DateTimeFormatRegistry } from './DateTimeFormatRegistry.js';
import { stringifyValue, toJsonValue } from './valueRendering.js';

/** Outcome of a cast attempt. A failed cast carries no value. */
export type CastResult<T> = { readonly success: true; readonly value: T } | { readonly success: false };

const FAILED: CastResult<never> = { success: false };

const INTEGER_LITERAL = /^[+-]?\d+$/;

export interface ValueConverterOptions {
  /** Registry consulted for `DateTime` casts. Default: a new registry seeded with ISO-8601 formats. */
  readonly dateTimeFormats?: DateTimeFormatRegistry;
}

/**
 * Coerces raw collection values into the type a field declares.
 *
 * Rules, first applicable wins:
 * 1. the value already has the type: returned unchanged
 * 2. `string` target: rendered with `stringifyValue`
 * 3. `date` target: parsed with the registered date/time formats
 * 4. `object` target: members walked into a JSON object tree
 * 5. `array` target: elements cast to the declared element type, or copied
 * 6. numeric and boolean targets: converted from their text form
 *
 * `cast()` never throws; anything that goes wrong is a failed cast.
 */
export class ValueConverter {
  readonly dateTimeFormats: DateTimeFormatRegistry;

  constructor(options?: ValueConverterOptions) {
    this.dateTimeFormats = options?.dateTimeFormats ?? new DateTimeFormatRegistry();
  }

  /**
   * Register a date/time pattern on this converter's registry.
   *
   * @throws InvalidArgumentError when `format` is not a usable date-fns pattern.
   */
  registerDateTimeFormat(format: string): void {
    this.dateTimeFormats.register(format);
  }

  cast<T>(raw: unknown, type: ValueType<T>): CastResult<T> {
    try {
      if (type.is(raw)) return { success: true, value: raw };
      if (raw === undefined || raw === null) return FAILED;

      const converted = this.convert(raw, type);
      return converted !== undefined && type.is(converted) ? { success: true, value: converted } : FAILED;
    } catch {
      return FAILED;
    }
  }

  private convert(raw: unknown, type: ValueType<unknown>): unknown {
    switch (type.kind) {
      case 'string':
        return stringifyValue(raw);
      case 'date':
        return this.toDate(raw);
      case 'object':
        return this.toStructured(raw);
      case 'array':
        return this.toSequence(raw, type.element);
      case 'integer':
        return this.toInteger(raw);
      case 'number':
        return this.toNumber(raw);
      case 'boolean':
        return this.toBoolean(raw);
      default:
        return undefined;
    }
  }

  private toDate(raw: unknown): Date | undefined {
    if (raw instanceof Date) return undefined;
    if (typeof raw !== 'string' && typeof raw !== 'number') return undefined;
    return this.dateTimeFormats.parse(String(raw).trim());
  }

  private toStructured(raw: unknown): unknown {
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw) || raw instanceof Date || raw instanceof Set) {
      return undefined;
    }
    const json = toJsonValue(raw);
    return isPlainObject(json) ? json : undefined;
  }

  private toSequence(raw: unknown, element: ValueType<unknown> | undefined): unknown[] | undefined {
    if (!Array.isArray(raw)) return undefined;
    if (!element) return [...raw];

    const items: unknown[] = [];
    for (const item of raw) {
      const result = this.cast(item, element);
      if (!result.success) return undefined;
      items.push(result.value);
    }
    return items;
  }

  private toInteger(raw: unknown): number | undefined {
    if (typeof raw === 'bigint') return Number(raw);
    if (typeof raw !== 'string') return undefined;
    const text = raw.trim();
    return INTEGER_LITERAL.test(text) ? Number(text) : undefined;
  }

  private toNumber(raw: unknown): number | undefined {
    if (typeof raw === 'bigint') return Number(raw);
    if (typeof raw !== 'string') return undefined;
    const text = raw.trim();
    if (text === '') return undefined;
    const value = Number(text);
    return Number.isFinite(value) ? value : undefined;
  }

  private toBoolean(raw: unknown): boolean | undefined {
    if (typeof raw !== 'string') return undefined;
    const text = raw.trim().toLowerCase();
    if (text === 'true') return true;
    if (text === 'false') return false;
    return undefined;
  }
}
