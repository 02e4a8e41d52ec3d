import { format as formatDate, isValid, parse } from 'date-fns';
import { InvalidArgumentError } from '../errors.js';

/** ISO-8601 shapes every new registry understands. */
export const DEFAULT_DATE_TIME_FORMATS: readonly string[] = [
  "yyyy-MM-dd'T'HH:mm:ss.SSSXXX",
  "yyyy-MM-dd'T'HH:mm:ssXXX",
  "yyyy-MM-dd'T'HH:mm:ss.SSS",
  "yyyy-MM-dd'T'HH:mm:ss",
  "yyyy-MM-dd'T'HH:mm",
  'yyyy-MM-dd HH:mm:ss',
  'yyyy-MM-dd',
];

const REFERENCE_DATE = new Date(2000, 0, 1);

/**
 * `true` when date-fns accepts `format` as a pattern. date-fns only rejects
 * bad tokens once it reaches them, so the pattern is checked by formatting a
 * fixed date with it.
 */
export function isValidDateTimeFormat(format: string): boolean {
  if (format.trim() === '') return false;
  try {
    formatDate(REFERENCE_DATE, format);
    return true;
  } catch {
    return false;
  }
}

/** Throw `InvalidArgumentError` unless date-fns accepts `format`. */
export function assertDateTimeFormat(format: string): void {
  if (!isValidDateTimeFormat(format)) {
    throw new InvalidArgumentError(`Invalid date/time format: ${format}`);
  }
}

/**
 * Parse `text` with exactly one date-fns pattern. Returns `undefined` when it
 * does not match or the pattern is unusable.
 */
export function parseWithFormat(text: string, format: string): Date | undefined {
  try {
    const parsed = parse(text, format, REFERENCE_DATE);
    return isValid(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

export interface DateTimeFormatRegistryOptions {
  /** Formats to start with. Default: `DEFAULT_DATE_TIME_FORMATS`. Pass `[]` for an empty registry. */
  readonly formats?: readonly string[];
}

/**
 * Ordered, append-only list of date/time patterns consulted when a value is
 * cast to `DateTime`. Patterns are tried in registration order and the first
 * match wins.
 *
 * Register formats while configuring the application. The list is replaced
 * rather than mutated on every change, so a lookup that is already running
 * keeps the snapshot it started with.
 */
export class DateTimeFormatRegistry {
  private snapshot: readonly string[];

  /** @throws InvalidArgumentError when a format is not a usable date-fns pattern. */
  constructor(options?: DateTimeFormatRegistryOptions) {
    const formats = options?.formats ?? DEFAULT_DATE_TIME_FORMATS;
    formats.forEach(assertDateTimeFormat);
    this.snapshot = [...new Set(formats)];
  }

  /**
   * Append a pattern. Registering a pattern twice keeps its first position.
   *
   * @throws InvalidArgumentError when `format` is not a usable date-fns pattern.
   */
  register(format: string): void {
    assertDateTimeFormat(format);
    if (this.snapshot.includes(format)) return;
    this.snapshot = [...this.snapshot, format];
  }

  /** Remove a pattern. Returns `false` if it was not registered. */
  deregister(format: string): boolean {
    if (!this.snapshot.includes(format)) return false;
    this.snapshot = this.snapshot.filter((f) => f !== format);
    return true;
  }

  has(format: string): boolean {
    return this.snapshot.includes(format);
  }

  /** Registered patterns in lookup order. */
  get formats(): readonly string[] {
    return this.snapshot;
  }

  /** Parse `text` with the first registered pattern that accepts it. */
  parse(text: string): Date | undefined {
    for (const format of this.snapshot) {
      const parsed = parseWithFormat(text, format);
      if (parsed) return parsed;
    }
    return undefined;
  }
}
