import { Readable } from 'node:stream';
import { StringDecoder } from 'node:string_decoder';
import { createGunzip } from 'node:zlib';
import type { DataSource } from '../domain/ports/DataSource.js';

const URL_SCHEME = /^[a-z][a-z\d+.-]*:\/\//i;
const LINE_BREAK = /\r\n|\r|\n/;

/** Gzip is detected from the location's `.gz` suffix only (the URL path for URLs). */
export function isGzipped(location: string): boolean {
  return pathOf(location).toLowerCase().endsWith('.gz');
}

function pathOf(location: string): string {
  if (!URL_SCHEME.test(location)) return location;
  try {
    return new URL(location).pathname;
  } catch {
    return location;
  }
}

/**
 * Read a source as UTF-8 lines, gunzipping first when the location ends in `.gz`.
 * Lines end at `\n`, `\r\n` or a lone `\r`.
 *
 * The underlying streams are destroyed on every exit path, including a
 * consumer that stops early and a failing source.
 */
export async function* readLines(source: DataSource): AsyncGenerator<string, void, undefined> {
  const raw = Readable.from(source.read());
  let input: Readable = raw;

  if (isGzipped(source.metadata().location)) {
    const gunzip = createGunzip();
    raw.on('error', (error) => gunzip.destroy(error));
    input = raw.pipe(gunzip);
  }

  const decoder = new StringDecoder('utf8');
  let pending = '';

  try {
    for await (const chunk of input) {
      pending += Buffer.isBuffer(chunk) ? decoder.write(chunk) : String(chunk);
      // a final \r may be the first half of \r\n
      const heldCr = pending.endsWith('\r');
      const lines = (heldCr ? pending.slice(0, -1) : pending).split(LINE_BREAK);
      pending = (lines.pop() ?? '') + (heldCr ? '\r' : '');
      yield* lines;
    }
    pending += decoder.end();
    if (pending.length > 0) {
      const lines = pending.split(LINE_BREAK);
      if (lines[lines.length - 1] === '') lines.pop();
      yield* lines;
    }
  } finally {
    input.destroy();
    raw.destroy();
  }
}
