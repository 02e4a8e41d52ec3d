import type { ConfigSource, SourceMetadata } from '../../domain/ports/ConfigSource.js';

/** Configuration source over an in-memory string or Buffer. */
export class BufferSource implements ConfigSource {
  private readonly content: string;
  private readonly meta: SourceMetadata;

  constructor(data: string | Buffer, metadata?: Pick<SourceMetadata, 'fileName'>) {
    this.content = typeof data === 'string' ? data : data.toString('utf-8');
    this.meta = {
      fileName: metadata?.fileName ?? 'buffer-input',
      fileSize: this.content.length,
    };
  }

  read(): Promise<string> {
    return Promise.resolve(this.content);
  }

  metadata(): SourceMetadata {
    return this.meta;
  }
}
