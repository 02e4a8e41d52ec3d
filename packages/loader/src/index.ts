// Facade
export { ConfigLoader } from './ConfigLoader.js';
export type { ConfigLoaderConfig, ConfigLoadResult } from './ConfigLoader.js';

// Errors
export { ConfigParseError, ConfigValidationError } from './domain/errors.js';

// Ports
export type { ConfigSource, SourceMetadata } from './domain/ports/ConfigSource.js';
export type { ConfigParser } from './domain/ports/ConfigParser.js';

// Adapters
export { BufferSource } from './infrastructure/sources/BufferSource.js';
export { FilePathSource } from './infrastructure/sources/FilePathSource.js';
export type { FilePathSourceOptions } from './infrastructure/sources/FilePathSource.js';
export { JsonConfigParser } from './infrastructure/parsers/JsonConfigParser.js';
