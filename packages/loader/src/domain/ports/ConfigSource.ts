/** Metadata about a configuration source, used to describe it in events and errors. */
export interface SourceMetadata {
  readonly fileName?: string;
  readonly fileSize?: number;
}

/**
 * Port for reading a configuration document from any origin (file, buffer,
 * environment, remote store).
 *
 * Configuration documents are small, so `read()` returns the whole text at once.
 */
export interface ConfigSource {
  /** Return the full document text. */
  read(): Promise<string>;
  metadata(): SourceMetadata;
}
