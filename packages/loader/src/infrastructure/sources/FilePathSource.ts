import { statSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import type { ConfigSource, SourceMetadata } from '../../domain/ports/ConfigSource.js';

export interface FilePathSourceOptions {
  /** Encoding for reading the file. Default: 'utf-8'. */
  readonly encoding?: BufferEncoding;
}

/** Configuration source that reads a local file. Node.js only. */
export class FilePathSource implements ConfigSource {
  private readonly filePath: string;
  private readonly encoding: BufferEncoding;

  constructor(filePath: string, options?: FilePathSourceOptions) {
    this.filePath = filePath;
    this.encoding = options?.encoding ?? 'utf-8';
  }

  read(): Promise<string> {
    return readFile(this.filePath, { encoding: this.encoding });
  }

  metadata(): SourceMetadata {
    const stats = statSync(this.filePath);
    return {
      fileName: basename(this.filePath),
      fileSize: stats.size,
    };
  }
}
