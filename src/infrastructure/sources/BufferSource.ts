import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';
import { detectMimeType } from '../detectMimeType.js';

export interface BufferSourceOptions {
  /** Name used as the source location. A `.gz` suffix marks gzip-compressed data. Default: `'buffer-input'`. */
  readonly fileName?: string;
}

/** In-memory data source. Can be read any number of times. */
export class BufferSource implements DataSource {
  private readonly content: Buffer;
  private readonly meta: SourceMetadata;

  constructor(data: string | Buffer, options?: BufferSourceOptions) {
    this.content = typeof data === 'string' ? Buffer.from(data, 'utf-8') : data;
    const fileName = options?.fileName ?? 'buffer-input';
    this.meta = {
      location: fileName,
      fileName,
      fileSize: this.content.length,
      mimeType: detectMimeType(fileName),
    };
  }

  async *read(): AsyncIterable<Buffer> {
    yield await Promise.resolve(this.content);
  }

  metadata(): SourceMetadata {
    return this.meta;
  }
}
