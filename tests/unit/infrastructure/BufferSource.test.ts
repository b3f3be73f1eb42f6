import { describe, it, expect } from 'vitest';
import { BufferSource } from '../../../src/infrastructure/sources/BufferSource.js';
import { detectMimeType } from '../../../src/infrastructure/detectMimeType.js';

async function readAll(source: BufferSource): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of source.read()) {
    chunks.push(chunk);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

describe('BufferSource', () => {
  it('should yield string content as UTF-8 bytes', async () => {
    expect(await readAll(new BufferSource('@relation café\n'))).toBe('@relation café\n');
  });

  it('should be readable more than once', async () => {
    const source = new BufferSource(Buffer.from('abc'));

    expect(await readAll(source)).toBe('abc');
    expect(await readAll(source)).toBe('abc');
  });

  it('should describe itself with a default name', () => {
    expect(new BufferSource('abcd').metadata()).toEqual({
      location: 'buffer-input',
      fileName: 'buffer-input',
      fileSize: 4,
      mimeType: 'text/plain',
    });
  });

  it('should use the given file name as location', () => {
    const meta = new BufferSource('', { fileName: 'weather.arff' }).metadata();

    expect(meta.location).toBe('weather.arff');
    expect(meta.mimeType).toBe('text/x-arff');
  });
});

describe('detectMimeType()', () => {
  it('should map known extensions', () => {
    expect(detectMimeType('weather.arff')).toBe('text/x-arff');
    expect(detectMimeType('WEATHER.ARFF')).toBe('text/x-arff');
    expect(detectMimeType('weather.arff.gz')).toBe('application/gzip');
  });

  it('should default to text/plain', () => {
    expect(detectMimeType('weather.txt')).toBe('text/plain');
    expect(detectMimeType('no-extension')).toBe('text/plain');
  });
});
