import { describe, it, expect } from 'vitest';
import { Field, whenType } from '../../../src/domain/model/Field.js';
import { Types } from '../../../src/domain/model/ValueType.js';
import { createConstraint } from '../../../src/domain/model/Constraint.js';
import { JsonTranslator } from '../../../src/infrastructure/translators/JsonTranslator.js';
import { MapTranslator } from '../../../src/infrastructure/translators/MapTranslator.js';
import { RecordTranslator } from '../../../src/infrastructure/translators/RecordTranslator.js';
import { SchemaConfigurationError } from '../../../src/domain/errors.js';
import { constrainValue, constrainValueLowerBound } from '../../../src/constraints/comparable.js';
import { allowValues } from '../../../src/constraints/strings.js';
import { constrainDateTimeFormat } from '../../../src/constraints/dates.js';
import type { JsonObject } from '../../../src/domain/model/JsonValue.js';

describe('Field', () => {
  const translator = new JsonTranslator();
  const port = new Field('port', 'TCP port the server listens on', Types.integer, {
    constraints: [constrainValue(1, 65535)],
  });

  describe('construction', () => {
    it('should be required unless a default is given', () => {
      expect(port.required).toBe(true);
      expect(new Field('port', 'TCP port', Types.integer, { defaultValue: 8080 }).required).toBe(false);
      expect(new Field('port', 'TCP port', Types.integer, { required: false }).required).toBe(false);
    });

    it('should reject empty names and help texts', () => {
      expect(() => new Field('', 'TCP port', Types.integer)).toThrow(SchemaConfigurationError);
      expect(() => new Field('port', '  ', Types.integer)).toThrow(SchemaConfigurationError);
    });

    it('should reject a required field with a default', () => {
      expect(() => new Field('port', 'TCP port', Types.integer, { required: true, defaultValue: 80 })).toThrow(
        'Field port cannot be required and carry a default value',
      );
    });

    it('should reject a default that does not fit the type', () => {
      expect(() => new Field('port', 'TCP port', Types.integer, { defaultValue: 2.5 })).toThrow(SchemaConfigurationError);
    });
  });

  describe('validate', () => {
    it('should pass a value that casts and meets every constraint', () => {
      expect(port.validate({ port: '8080' }, translator)).toEqual({ outcome: 'valid', errors: [] });
    });

    it('should report constraint failures tagged with the field name', () => {
      const { outcome, errors } = port.validate({ port: 70000 }, translator);

      expect(outcome).toBe('invalid');
      expect(errors).toEqual([
        {
          message:
            'Field port with value 70000 is invalid. Value must be greater than or equal to 1 and less than or equal to 65535',
          severity: 'fatal',
          code: 'CONSTRAINT',
          value: 70000,
          field: 'port',
        },
      ]);
    });

    it('should report a failed cast with the expected type and raw value', () => {
      const { errors } = port.validate({ port: 'abc' }, translator);

      expect(errors).toEqual([
        {
          message: 'Field port with value abc is an incorrect type. Expected one of: Json Number',
          severity: 'fatal',
          code: 'TYPE_MISMATCH',
          field: 'port',
          value: 'abc',
        },
      ]);
    });

    it('should run every constraint even after one fails', () => {
      const field = new Field('mode', 'Run mode', Types.string, {
        constraints: [allowValues('safe', 'fast'), constrainDateTimeFormat('yyyy')],
      });

      const { errors } = field.validate({ mode: 'slow' }, translator);
      expect(errors.map((e) => e.message)).toEqual([
        'Field mode with value slow is not valid. Valid values: safe, fast',
        'Field mode with value slow is not in a valid DateTime format. Valid DateTime formats: yyyy',
      ]);
    });

    it('should report a blank required value as fatal, or as a warning when nulls are allowed', () => {
      expect(port.validate({ port: '' }, translator).errors).toEqual([
        { message: 'Value of field port is null or empty.', severity: 'fatal', code: 'NULL_OR_EMPTY', field: 'port' },
      ]);

      const lenient = new Field('port', 'TCP port', Types.integer, { allowNull: true });
      const { outcome, errors } = lenient.validate({ port: null }, translator);
      expect(outcome).toBe('empty');
      expect(errors.map((e) => e.severity)).toEqual(['warning']);
    });

    it('should skip a blank optional value', () => {
      const optional = new Field('port', 'TCP port', Types.integer, { required: false });
      expect(optional.validate({ port: '  ' }, translator)).toEqual({ outcome: 'empty', errors: [] });
    });

    it('should check the raw text for format constraints', () => {
      const since = new Field('since', 'Start date', Types.date, { constraints: [constrainDateTimeFormat('yyyy-MM-dd')] });

      expect(since.validate({ since: '2021-09-03' }, translator).errors).toEqual([]);
      expect(since.validate({ since: '2021-09-03T10:00:00' }, translator).errors.map((e) => e.message)).toEqual([
        'Field since with value 2021-09-03T10:00:00 is not in a valid DateTime format. Valid DateTime formats: yyyy-MM-dd',
      ]);
    });

    it('should turn a throwing constraint into a fatal error', () => {
      const field = new Field('port', 'TCP port', Types.integer, {
        constraints: [
          createConstraint<number>('explode', () => {
            throw new Error('boom');
          }),
        ],
      });

      expect(field.validate({ port: 1 }, translator).errors).toEqual([
        { message: 'Constraint explode could not evaluate field port: boom', severity: 'fatal', code: 'CONSTRAINT', field: 'port' },
      ]);
    });
  });

  describe('alternative types', () => {
    const timeout = new Field('timeout', 'Seconds, or "none"', Types.integer, {
      constraints: [constrainValueLowerBound(1)],
    }).orType(Types.string, [allowValues('none')]);

    it('should list the accepted types in order', () => {
      expect(timeout.typeNames).toEqual(['Int32', 'String']);
    });

    it('should apply the constraints of the first type the value casts to', () => {
      expect(timeout.validate({ timeout: 30 }, translator).errors).toEqual([]);
      expect(timeout.validate({ timeout: 'none' }, translator).errors).toEqual([]);
      expect(timeout.validate({ timeout: 0 }, translator).errors.map((e) => e.message)).toEqual([
        'Field timeout with value 0 is less than enforced lower bound 1',
      ]);
      expect(timeout.validate({ timeout: 'never' }, translator).errors.map((e) => e.message)).toEqual([
        'Field timeout with value never is not valid. Valid values: none',
      ]);
    });

    it('should list every accepted type when no cast succeeds', () => {
      const flag = new Field<number | boolean>('flag', 'Level or switch', [whenType(Types.integer), whenType(Types.boolean)]);

      expect(flag.validate({ flag: 'abc' }, translator).errors.map((e) => e.message)).toEqual([
        'Field flag with value abc is an incorrect type. Expected one of: Json Number, Json Boolean',
      ]);
    });

    it('should reject a type that is already accepted', () => {
      expect(() => timeout.orType(Types.integer)).toThrow('Field timeout already accepts type Int32');
    });

    it('should keep required, default and null handling', () => {
      const retries = new Field('retries', 'Retry count', Types.integer, { defaultValue: 3 }).orType(Types.string);

      expect(retries.required).toBe(false);
      expect(retries.defaultValue).toBe(3);
    });
  });

  it('should insert its default value', () => {
    const retries = new Field('retries', 'Retry count', Types.integer, { defaultValue: 3 });
    const doc: JsonObject = {};

    retries.insertDefault(doc, translator);

    expect(doc).toEqual({ retries: 3 });
    expect(() => port.insertDefault(doc, translator)).toThrow(SchemaConfigurationError);
  });

  describe('default values', () => {
    it('should insert a fresh copy into each map', () => {
      const tags = new Field('tags', 'Labels', Types.array(Types.string), { defaultValue: ['a'] });
      const mapTranslator = new MapTranslator();
      const first = new Map<string, unknown>();
      const second = new Map<string, unknown>();

      tags.insertDefault(first, mapTranslator);
      const inserted = first.get('tags');
      if (Array.isArray(inserted)) inserted.push('leaked');
      tags.insertDefault(second, mapTranslator);

      expect(first.get('tags')).toEqual(['a', 'leaked']);
      expect(second.get('tags')).toEqual(['a']);
      expect(tags.defaultValue).toEqual(['a']);
    });

    it('should insert a fresh copy into each record', () => {
      const limits = new Field('limits', 'Resource limits', Types.object, { defaultValue: { cpu: 2 } });
      const recordTranslator = new RecordTranslator();
      const first: Record<string, unknown> = {};
      const second: Record<string, unknown> = {};

      limits.insertDefault(first, recordTranslator);
      limits.insertDefault(second, recordTranslator);

      expect(first['limits']).toEqual({ cpu: 2 });
      expect(first['limits']).not.toBe(second['limits']);
    });

    it('should not follow later changes to the value it was built with', () => {
      const initial = ['a'];
      const tags = new Field('tags', 'Labels', Types.array(Types.string), { defaultValue: initial });

      initial.push('changed');

      expect(tags.defaultValue).toEqual(['a']);
    });
  });
});
