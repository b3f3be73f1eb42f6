import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { writeFileSync, mkdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { FilePathSource } from '../../../src/infrastructure/sources/FilePathSource.js';

const TEST_DIR = join(tmpdir(), 'arff-dataset-test-filepathsource');

beforeAll(() => {
  mkdirSync(TEST_DIR, { recursive: true });
});

afterAll(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

function writeTempFile(name: string, content: string): string {
  const filePath = join(TEST_DIR, name);
  writeFileSync(filePath, content, 'utf-8');
  return filePath;
}

async function readAll(source: FilePathSource): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of source.read()) {
    chunks.push(chunk);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

describe('FilePathSource', () => {
  describe('read()', () => {
    it('should stream file content as chunks', async () => {
      const filePath = writeTempFile('read-basic.arff', '@relation r\n@attribute a numeric\n@data\n1\n');
      const content = await readAll(new FilePathSource(filePath));

      expect(content).toBe('@relation r\n@attribute a numeric\n@data\n1\n');
    });

    it('should stream large content in multiple chunks', async () => {
      const content = `@relation r\n@attribute a numeric\n@data\n${'12.5\n'.repeat(5000)}`;
      const filePath = writeTempFile('read-large.arff', content);

      // Use small highWaterMark to force multiple chunks
      const source = new FilePathSource(filePath, { highWaterMark: 256 });

      const chunks: Buffer[] = [];
      for await (const chunk of source.read()) {
        chunks.push(chunk);
      }

      expect(chunks.length).toBeGreaterThan(1);
      expect(Buffer.concat(chunks).toString('utf-8')).toBe(content);
    });

    it('should reopen the file on every read', async () => {
      const filePath = writeTempFile('read-twice.arff', 'abc');
      const source = new FilePathSource(filePath);

      expect(await readAll(source)).toBe('abc');
      expect(await readAll(source)).toBe('abc');
    });

    it('should reject for a missing file', async () => {
      const source = new FilePathSource(join(TEST_DIR, 'missing.arff'));
      await expect(readAll(source)).rejects.toMatchObject({ code: 'ENOENT' });
    });
  });

  describe('metadata()', () => {
    it('should return location, file name and size', () => {
      const content = '@relation r\n';
      const filePath = writeTempFile('meta.arff', content);

      expect(new FilePathSource(filePath).metadata()).toEqual({
        location: filePath,
        fileName: 'meta.arff',
        fileSize: Buffer.byteLength(content),
        mimeType: 'text/x-arff',
      });
    });

    it('should detect gzip mime type', () => {
      const filePath = writeTempFile('detect.arff.gz', '');
      expect(new FilePathSource(filePath).metadata().mimeType).toBe('application/gzip');
    });

    it('should leave the size unset for a missing file', () => {
      const meta = new FilePathSource(join(TEST_DIR, 'missing.arff')).metadata();

      expect(meta.fileName).toBe('missing.arff');
      expect(meta.fileSize).toBeUndefined();
    });
  });
});
