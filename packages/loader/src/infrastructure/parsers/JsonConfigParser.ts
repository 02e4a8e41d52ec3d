import type { JsonObject } from '@confguard/core';
import { isJsonObject } from '@confguard/core';
import type { ConfigParser } from '../../domain/ports/ConfigParser.js';
import { ConfigParseError } from '../../domain/errors.js';

/** Parser for JSON configuration documents. The top level must be an object. Zero dependencies. */
export class JsonConfigParser implements ConfigParser {
  parse(text: string): JsonObject {
    const content = text.replace(/^\uFEFF/, '').trim();
    if (content === '') {
      throw new ConfigParseError('Configuration document is empty');
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ConfigParseError(`Configuration document is not valid JSON: ${reason}`, { cause: err });
    }

    if (!isJsonObject(parsed)) {
      throw new ConfigParseError(`Configuration document must be a JSON object, found ${describeTopLevel(parsed)}`);
    }
    return parsed;
  }
}

function describeTopLevel(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'an array';
  return `a ${typeof value}`;
}
