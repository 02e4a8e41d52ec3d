import type { JsonObject } from '@confguard/core';

/**
 * Port for turning document text into a JSON object tree.
 *
 * Implement this interface to support other formats (YAML, TOML, ...). The
 * parser must throw `ConfigParseError` when the text is not a usable
 * configuration document; the loader reports that as a diagnostic.
 */
export interface ConfigParser {
  parse(text: string): JsonObject;
}
