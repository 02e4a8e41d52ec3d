import {
  EventBus,
  JsonTranslator,
  Severity,
  createError,
  type EventHandler,
  type EventType,
  type JsonObject,
  type Schema,
  type SchemaValidateOptions,
  type ValidationError,
  type WildcardHandler,
} from '@confguard/core';
import type { ConfigSource } from './domain/ports/ConfigSource.js';
import type { ConfigParser } from './domain/ports/ConfigParser.js';
import { ConfigParseError, ConfigValidationError } from './domain/errors.js';
import { JsonConfigParser } from './infrastructure/parsers/JsonConfigParser.js';

/** Configuration for a `ConfigLoader`. */
export interface ConfigLoaderConfig {
  /** Schema the loaded document is validated against. */
  readonly schema: Schema;
  /** Parser for the document text. Default: `JsonConfigParser`. */
  readonly parser?: ConfigParser;
  /**
   * Translator used for validation. Pass one built with a custom
   * `ValueConverter` to accept extra date/time formats. Default: `new JsonTranslator()`.
   */
  readonly translator?: JsonTranslator;
  /** Options forwarded to every `Schema.validate()` call. */
  readonly validateOptions?: SchemaValidateOptions;
}

/** Outcome of `ConfigLoader.load()`. */
export interface ConfigLoadResult {
  /** The parsed document with defaults filled in, or `undefined` when it could not be parsed. */
  readonly config: JsonObject | undefined;
  readonly isValid: boolean;
  readonly errors: readonly ValidationError[];
}

/**
 * Facade that reads a configuration document, parses it and validates it
 * against a schema.
 *
 * The loader validates a clone of the given schema, so subscriptions made on
 * the loader see every schema event without touching the caller's schema.
 *
 * @example
 * ```typescript
 * const loader = new ConfigLoader({ schema }).from(new FilePathSource('./service.json'));
 * const config = await loader.loadOrThrow();
 * ```
 */
export class ConfigLoader {
  private readonly schema: Schema;
  private readonly parser: ConfigParser;
  private readonly translator: JsonTranslator;
  private readonly validateOptions: SchemaValidateOptions | undefined;
  private readonly eventBus = new EventBus();
  private source: ConfigSource | null = null;

  constructor(config: ConfigLoaderConfig) {
    this.schema = config.schema.clone().onAny((event) => this.eventBus.emit(event));
    this.parser = config.parser ?? new JsonConfigParser();
    this.translator = config.translator ?? new JsonTranslator();
    this.validateOptions = config.validateOptions;
  }

  /** Set the document source. Returns `this` for chaining. */
  from(source: ConfigSource): this {
    this.source = source;
    return this;
  }

  /**
   * Read, parse and validate the document. Parse failures are reported as a
   * single fatal `TYPE_MISMATCH` diagnostic; read failures propagate.
   */
  async load(): Promise<ConfigLoadResult> {
    const source = this.requireSource();
    const text = await source.read();

    let document: JsonObject;
    try {
      document = this.parser.parse(text);
    } catch (err) {
      if (!(err instanceof ConfigParseError)) throw err;
      this.emitLoaded(source, false);
      return {
        config: undefined,
        isValid: false,
        errors: [createError(err.message, Severity.FATAL, { code: 'TYPE_MISMATCH' })],
      };
    }

    const result = this.schema.validate(document, this.translator, this.validateOptions);
    this.emitLoaded(source, result.isValid);
    return { config: document, isValid: result.isValid, errors: result.errors };
  }

  /**
   * Like `load()`, but returns only the configuration.
   *
   * @throws ConfigValidationError when the document has fatal diagnostics.
   */
  async loadOrThrow(): Promise<JsonObject> {
    const result = await this.load();
    if (!result.isValid || result.config === undefined) {
      throw new ConfigValidationError(describeSource(this.requireSource()), result.errors);
    }
    return result.config;
  }

  /** Pretty-printed JSON object mapping every field to its help text. */
  generateTemplate(): string {
    return JSON.stringify(this.schema.generateTemplate(), null, 2);
  }

  /** Subscribe to a specific event type. */
  on<T extends EventType>(type: T, handler: EventHandler<T>): this {
    this.eventBus.on(type, handler);
    return this;
  }

  /** Subscribe to all events. */
  onAny(handler: WildcardHandler): this {
    this.eventBus.onAny(handler);
    return this;
  }

  off<T extends EventType>(type: T, handler: EventHandler<T>): this {
    this.eventBus.off(type, handler);
    return this;
  }

  offAny(handler: WildcardHandler): this {
    this.eventBus.offAny(handler);
    return this;
  }

  private requireSource(): ConfigSource {
    if (!this.source) {
      throw new Error('Source must be configured. Call .from(source) first.');
    }
    return this.source;
  }

  private emitLoaded(source: ConfigSource, isValid: boolean): void {
    this.eventBus.emit({ type: 'config:loaded', source: describeSource(source), isValid, timestamp: Date.now() });
  }
}

function describeSource(source: ConfigSource): string {
  return source.metadata().fileName ?? 'unnamed source';
}
