import { describe, it, expect } from 'vitest';
import {
  createError,
  formatError,
  getFatal,
  getInfo,
  getWarnings,
  hasFatal,
  invalidResult,
  Severity,
  toResult,
  validResult,
} from '../../../src/domain/model/ValidationError.js';
import type { ValidationError } from '../../../src/domain/model/ValidationError.js';
import { InvalidArgumentError } from '../../../src/domain/errors.js';

const mixed: ValidationError[] = [
  { field: 'a', message: 'bad', severity: 'fatal', code: 'TYPE_MISMATCH' },
  { field: 'b', message: 'odd', severity: 'warning', code: 'CONSTRAINT' },
  { field: 'c', message: 'note', severity: 'info', code: 'CONTEXT' },
];

describe('ValidationError helpers', () => {
  describe('createError', () => {
    it('should default to fatal severity and the CONSTRAINT code', () => {
      expect(createError('Value too large')).toEqual({ message: 'Value too large', severity: 'fatal', code: 'CONSTRAINT' });
    });

    it('should keep the given severity, field, code and value', () => {
      const error = createError('Blank value', Severity.WARNING, { field: 'host', code: 'NULL_OR_EMPTY', value: '' });
      expect(error).toEqual({ message: 'Blank value', severity: 'warning', field: 'host', code: 'NULL_OR_EMPTY', value: '' });
    });

    it('should keep an explicit undefined value', () => {
      const error = createError('Nothing there', Severity.INFO, { value: undefined });
      expect('value' in error).toBe(true);
    });

    it('should reject an empty or whitespace message', () => {
      expect(() => createError('')).toThrow(InvalidArgumentError);
      expect(() => createError('   ')).toThrow(InvalidArgumentError);
    });
  });

  describe('severity filters', () => {
    it('should detect fatal errors', () => {
      expect(hasFatal(mixed)).toBe(true);
      expect(hasFatal(mixed.slice(1))).toBe(false);
      expect(hasFatal([])).toBe(false);
    });

    it('should split errors by severity', () => {
      expect(getFatal(mixed).map((e) => e.field)).toEqual(['a']);
      expect(getWarnings(mixed).map((e) => e.field)).toEqual(['b']);
      expect(getInfo(mixed).map((e) => e.field)).toEqual(['c']);
    });
  });

  describe('results', () => {
    it('should build a result whose validity follows fatal errors only', () => {
      expect(toResult(mixed).isValid).toBe(false);
      expect(toResult(mixed.slice(1))).toEqual({ isValid: true, errors: mixed.slice(1) });
    });

    it('should build valid and invalid results', () => {
      expect(validResult()).toEqual({ isValid: true, errors: [] });
      expect(invalidResult(mixed)).toEqual({ isValid: false, errors: mixed });
    });
  });

  describe('formatError', () => {
    it('should prefix the severity and the field', () => {
      expect(formatError(createError('is required', Severity.FATAL, { field: 'port' }))).toBe('[fatal] port: is required');
    });

    it('should omit the field when there is none', () => {
      expect(formatError(createError('Validation for db failed.', Severity.INFO))).toBe('[info] Validation for db failed.');
    });
  });
});
