import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';
import { IOError } from '../../domain/errors.js';
import { detectMimeType } from '../detectMimeType.js';

export interface UrlSourceOptions {
  /** Custom HTTP headers to send with the request. */
  readonly headers?: Readonly<Record<string, string>>;
  /** Time allowed until the response headers arrive, in milliseconds. Default: no limit. */
  readonly timeout?: number;
  /** File name for metadata. Default: extracted from URL path. */
  readonly fileName?: string;
}

/**
 * Data source that fetches data from a URL using the Fetch API.
 *
 * Every `read()` issues a new request. Requires a runtime with global `fetch`.
 */
export class UrlSource implements DataSource {
  private readonly url: string;
  private readonly headers: Readonly<Record<string, string>>;
  private readonly timeout: number | undefined;
  private readonly fileNameOverride: string | undefined;

  constructor(url: string, options?: UrlSourceOptions) {
    this.url = url;
    this.headers = options?.headers ?? {};
    this.timeout = options?.timeout;
    this.fileNameOverride = options?.fileName;
  }

  async *read(): AsyncIterable<Buffer> {
    const response = await this.fetchWithTimeout();

    if (!response.ok) {
      throw new IOError(`UrlSource: HTTP ${String(response.status)} ${response.statusText} for ${this.url}`);
    }

    if (!response.body) {
      yield Buffer.from(await response.arrayBuffer());
      return;
    }

    const reader = response.body.getReader();
    let drained = false;

    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) {
          drained = true;
          break;
        }
        yield Buffer.from(value);
      }
    } finally {
      // A consumer that stops early leaves the connection open until the body is cancelled.
      if (!drained) await reader.cancel();
      reader.releaseLock();
    }
  }

  metadata(): SourceMetadata {
    const fileName = this.fileNameOverride ?? this.extractFileName();
    return {
      location: this.url,
      fileName,
      mimeType: detectMimeType(fileName),
    };
  }

  private async fetchWithTimeout(): Promise<Response> {
    if (this.timeout === undefined) {
      return fetch(this.url, { headers: { ...this.headers } });
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort();
    }, this.timeout);

    try {
      return await fetch(this.url, {
        headers: { ...this.headers },
        signal: controller.signal,
      });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private extractFileName(): string {
    try {
      const segments = new URL(this.url).pathname.split('/');
      const last = segments[segments.length - 1];
      return last && last.length > 0 ? decodeURIComponent(last) : 'remote-file';
    } catch {
      return 'remote-file';
    }
  }
}
