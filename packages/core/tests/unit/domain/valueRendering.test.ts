import { describe, it, expect } from 'vitest';
import {
  equivalentJsonType,
  isNullOrEmptyValue,
  memberNames,
  stringifyValue,
  toJsonValue,
} from '../../../src/domain/services/valueRendering.js';
import { NamedValue } from '../../../src/domain/model/JsonValue.js';

class Server {
  host = 'localhost';

  get url(): string {
    return `http://${this.host}`;
  }
}

describe('valueRendering', () => {
  describe('stringifyValue', () => {
    it('should render scalars as text', () => {
      expect(stringifyValue(null)).toBe('');
      expect(stringifyValue(undefined)).toBe('');
      expect(stringifyValue('abc')).toBe('abc');
      expect(stringifyValue(12)).toBe('12');
      expect(stringifyValue(false)).toBe('false');
    });

    it('should render dates, named values and structures', () => {
      expect(stringifyValue(new Date(Date.UTC(2021, 8, 3)))).toBe('2021-09-03T00:00:00.000Z');
      expect(stringifyValue(new NamedValue('retries', 3))).toBe('retries: 3');
      expect(stringifyValue([1, 'x'])).toBe('[1,"x"]');
      expect(stringifyValue(new Map([['k', 1]]))).toBe('{"k":1}');
    });
  });

  describe('isNullOrEmptyValue', () => {
    it('should treat absent, blank and empty values as empty', () => {
      for (const value of [undefined, null, '', '   ', [], {}, new Map(), new Set()]) {
        expect(isNullOrEmptyValue(value)).toBe(true);
      }
    });

    it('should not treat zero, false or dates as empty', () => {
      for (const value of [0, false, 'x', [0], new Date(0)]) {
        expect(isNullOrEmptyValue(value)).toBe(false);
      }
    });

    it('should look one level inside a named value', () => {
      expect(isNullOrEmptyValue(new NamedValue('retries', ''))).toBe(true);
      expect(isNullOrEmptyValue(new NamedValue(' ', 3))).toBe(true);
      expect(isNullOrEmptyValue(new NamedValue('retries', 3))).toBe(false);
    });

    it('should judge a nested named value by its text only', () => {
      expect(isNullOrEmptyValue(new NamedValue('outer', new NamedValue('inner', '')))).toBe(false);
    });
  });

  describe('toJsonValue', () => {
    it('should convert sets, maps and class instances', () => {
      expect(toJsonValue(new Set([1, 2]))).toEqual([1, 2]);
      expect(toJsonValue(new Map([['a', new Date(Date.UTC(2020, 0, 1))]]))).toEqual({ a: '2020-01-01T00:00:00.000Z' });
      expect(toJsonValue(new Server())).toEqual({ host: 'localhost', url: 'http://localhost' });
    });

    it('should drop undefined members', () => {
      expect(toJsonValue({ a: 1, b: undefined })).toEqual({ a: 1 });
    });

    it('should return undefined for values without a JSON form', () => {
      const cyclic: Record<string, unknown> = {};
      cyclic['self'] = cyclic;

      expect(toJsonValue(cyclic)).toBeUndefined();
      expect(toJsonValue({ run: () => 1 })).toBeUndefined();
      expect(toJsonValue(Number.NaN)).toBeUndefined();
    });
  });

  it('should list own keys and prototype getters as members', () => {
    expect(memberNames(new Server())).toEqual(['host', 'url']);
  });

  it('should map internal type names to JSON labels', () => {
    expect(equivalentJsonType('Int32')).toBe('Json Number');
    expect(equivalentJsonType('Double')).toBe('Json Number');
    expect(equivalentJsonType('String')).toBe('Json String');
    expect(equivalentJsonType('DateTime')).toBe('Json String (DateTime)');
    expect(equivalentJsonType('Array<String>')).toBe('Json Array');
    expect(equivalentJsonType('Custom')).toBe('Custom');
  });
});
