import { fileURLToPath } from 'node:url';
import type { DataSource } from '../../domain/ports/DataSource.js';
import { ConfigurationError, errorMessage } from '../../domain/errors.js';
import { FilePathSource } from './FilePathSource.js';
import { UrlSource } from './UrlSource.js';

const SCHEME = /^([a-z][a-z\d+.-]*):\/\//i;

/**
 * Turn a path or URL into a data source.
 *
 * `http(s)://` → `UrlSource`, `file://` and scheme-less paths → `FilePathSource`.
 *
 * @throws ConfigurationError for an empty location, an unsupported scheme or an unparseable URL.
 */
export function resolveSource(location: string): DataSource {
  if (location.trim() === '') {
    throw new ConfigurationError('Invalid source: empty location');
  }

  const scheme = SCHEME.exec(location)?.[1]?.toLowerCase();
  if (scheme === undefined) {
    return new FilePathSource(location);
  }

  let url: URL;
  try {
    url = new URL(location);
  } catch (error) {
    throw new ConfigurationError(`Invalid url: ${location}`, errorMessage(error));
  }

  switch (scheme) {
    case 'http':
    case 'https':
      return new UrlSource(url.href);
    case 'file':
      return new FilePathSource(fileURLToPath(url));
    default:
      throw new ConfigurationError(`Unsupported source scheme "${scheme}": ${location}`);
  }
}
