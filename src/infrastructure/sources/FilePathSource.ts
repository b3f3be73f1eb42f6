import { createReadStream, statSync } from 'node:fs';
import { basename } from 'node:path';
import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';
import { detectMimeType } from '../detectMimeType.js';

export interface FilePathSourceOptions {
  /** Chunk size in bytes for streaming reads. Default: 65536 (64KB). */
  readonly highWaterMark?: number;
}

/** Data source that streams from a local file path using `createReadStream`. Each `read()` reopens the file. */
export class FilePathSource implements DataSource {
  private readonly filePath: string;
  private readonly highWaterMark: number;

  constructor(filePath: string, options?: FilePathSourceOptions) {
    this.filePath = filePath;
    this.highWaterMark = options?.highWaterMark ?? 65536;
  }

  async *read(): AsyncIterable<Buffer> {
    const stream = createReadStream(this.filePath, { highWaterMark: this.highWaterMark });

    try {
      for await (const chunk of stream) {
        yield Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      }
    } finally {
      stream.destroy();
    }
  }

  metadata(): SourceMetadata {
    const stats = statSync(this.filePath, { throwIfNoEntry: false });
    return {
      location: this.filePath,
      fileName: basename(this.filePath),
      fileSize: stats?.size,
      mimeType: detectMimeType(this.filePath),
    };
  }
}
