import { describe, it, expect } from 'vitest';
import { Schema } from '../../src/domain/model/Schema.js';
import { Field } from '../../src/domain/model/Field.js';
import { Types } from '../../src/domain/model/ValueType.js';
import { getFatal } from '../../src/domain/model/ValidationError.js';
import { JsonTranslator } from '../../src/infrastructure/translators/JsonTranslator.js';
import { MapTranslator } from '../../src/infrastructure/translators/MapTranslator.js';
import { RecordTranslator } from '../../src/infrastructure/translators/RecordTranslator.js';
import { allowValues, constrainCollectionCountUpperBound, constrainValue } from '../../src/constraints/index.js';
import type { JsonObject } from '../../src/domain/model/JsonValue.js';

function workerSchema(): Schema {
  return new Schema([
    new Field('host', 'Hostname', Types.string),
    new Field('port', 'TCP port', Types.integer),
    new Field('retries', 'Retry count', Types.integer, { constraints: [constrainValue(0, 10)] }),
    new Field('mode', 'Run mode', Types.string, { constraints: [allowValues('safe', 'slow')] }),
    new Field('region', 'Deployment region', Types.string),
    new Field('tags', 'Labels', Types.array(Types.string), { constraints: [constrainCollectionCountUpperBound(2)] }),
    new Field('timeout', 'Seconds', Types.integer, { defaultValue: 30 }),
  ]);
}

function sample(): JsonObject {
  return { host: 'api', port: 'abc', retries: 12, mode: 'fast', tags: ['a', 'b', 'c'] };
}

describe('translator parity', () => {
  it('should produce the same diagnostics for a JSON tree, a map and a record', () => {
    const schema = workerSchema();

    const json = sample();
    const map = new Map<string, unknown>(Object.entries(sample()));
    const record: Record<string, unknown> = { ...sample() };

    const fromJson = schema.validate(json, new JsonTranslator());
    const fromMap = schema.validate(map, new MapTranslator());
    const fromRecord = schema.validate(record, new RecordTranslator());

    expect(fromMap).toEqual(fromJson);
    expect(fromRecord).toEqual(fromJson);
    expect(getFatal(fromJson.errors).map((e) => e.field)).toEqual(['port', 'retries', 'mode', 'region', 'tags']);
  });

  it('should insert the default into every representation', () => {
    const schema = workerSchema();
    const json = sample();
    const map = new Map<string, unknown>(Object.entries(sample()));
    const record: Record<string, unknown> = { ...sample() };

    schema.validate(json, new JsonTranslator());
    schema.validate(map, new MapTranslator());
    schema.validate(record, new RecordTranslator());

    expect(json['timeout']).toBe(30);
    expect(map.get('timeout')).toBe(30);
    expect(record['timeout']).toBe(30);
  });
});
