import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { UrlSource } from '../../../src/infrastructure/sources/UrlSource.js';
import { IOError } from '../../../src/domain/errors.js';

// Mock the global fetch
const mockFetch = vi.fn();

beforeEach(() => {
  mockFetch.mockReset();
  vi.stubGlobal('fetch', mockFetch);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

function createMockResponse(body: string, options?: { status?: number; statusText?: string }): Response {
  const status = options?.status ?? 200;
  const statusText = options?.statusText ?? 'OK';

  return {
    ok: status >= 200 && status < 300,
    status,
    statusText,
    headers: new Headers(),
    body: null,
    arrayBuffer: () => Promise.resolve(Uint8Array.from(Buffer.from(body, 'utf-8')).buffer),
  } as unknown as Response;
}

function createStreamResponse(chunks: string[]): Response {
  let index = 0;
  const reader = {
    read: (): Promise<{ done: boolean; value?: Uint8Array }> => {
      if (index >= chunks.length) {
        return Promise.resolve({ done: true });
      }
      const chunk = chunks[index];
      index++;
      return Promise.resolve({ done: false, value: new TextEncoder().encode(chunk) });
    },
    cancel: vi.fn(() => Promise.resolve()),
    releaseLock: vi.fn(),
  };

  return {
    ok: true,
    status: 200,
    statusText: 'OK',
    headers: new Headers(),
    body: {
      getReader: () => reader,
    },
  } as unknown as Response;
}

async function readAll(source: UrlSource): Promise<Buffer[]> {
  const chunks: Buffer[] = [];
  for await (const chunk of source.read()) {
    chunks.push(chunk);
  }
  return chunks;
}

describe('UrlSource', () => {
  describe('read()', () => {
    it('should yield the whole payload when body is null', async () => {
      const content = '@relation r\n@data\n';
      mockFetch.mockResolvedValue(createMockResponse(content));

      const chunks = await readAll(new UrlSource('https://example.com/data.arff'));

      expect(chunks).toHaveLength(1);
      expect(chunks[0]?.toString('utf-8')).toBe(content);
      expect(mockFetch).toHaveBeenCalledWith('https://example.com/data.arff', { headers: {} });
    });

    it('should stream response body when available', async () => {
      mockFetch.mockResolvedValue(createStreamResponse(['@relation r\n', '@attribute a numeric\n']));

      const chunks = await readAll(new UrlSource('https://example.com/data.arff'));

      expect(chunks).toHaveLength(2);
      expect(Buffer.concat(chunks).toString('utf-8')).toBe('@relation r\n@attribute a numeric\n');
    });

    it('should cancel the body when the consumer stops early', async () => {
      const response = createStreamResponse(['@relation r\n', '@data\n', '1\n']);
      const reader = response.body?.getReader();
      mockFetch.mockResolvedValue(response);

      for await (const chunk of new UrlSource('https://example.com/data.arff').read()) {
        expect(chunk.toString('utf-8')).toBe('@relation r\n');
        break;
      }

      expect(reader?.cancel).toHaveBeenCalledTimes(1);
      expect(reader?.releaseLock).toHaveBeenCalledTimes(1);
    });

    it('should not cancel a body that was read to the end', async () => {
      const response = createStreamResponse(['@relation r\n']);
      const reader = response.body?.getReader();
      mockFetch.mockResolvedValue(response);

      await readAll(new UrlSource('https://example.com/data.arff'));

      expect(reader?.cancel).not.toHaveBeenCalled();
      expect(reader?.releaseLock).toHaveBeenCalledTimes(1);
    });

    it('should throw an IOError on HTTP error responses', async () => {
      mockFetch.mockResolvedValue(createMockResponse('Not Found', { status: 404, statusText: 'Not Found' }));

      const source = new UrlSource('https://example.com/missing.arff');

      await expect(readAll(source)).rejects.toBeInstanceOf(IOError);
      await expect(readAll(source)).rejects.toThrow('UrlSource: HTTP 404 Not Found for https://example.com/missing.arff');
    });

    it('should pass custom headers to fetch', async () => {
      mockFetch.mockResolvedValue(createMockResponse('data'));

      await readAll(new UrlSource('https://example.com/data.arff', { headers: { Authorization: 'Bearer test-token' } }));

      expect(mockFetch).toHaveBeenCalledWith('https://example.com/data.arff', {
        headers: { Authorization: 'Bearer test-token' },
      });
    });

    it('should issue a new request on every read', async () => {
      mockFetch.mockImplementation(() => Promise.resolve(createMockResponse('data')));
      const source = new UrlSource('https://example.com/data.arff');

      await readAll(source);
      await readAll(source);

      expect(mockFetch).toHaveBeenCalledTimes(2);
    });
  });

  describe('timeout', () => {
    it('should attach an abort signal when a timeout is set', async () => {
      mockFetch.mockResolvedValue(createMockResponse('data'));

      await readAll(new UrlSource('https://example.com/data.arff', { timeout: 5000 }));

      expect(mockFetch).toHaveBeenCalledWith(
        'https://example.com/data.arff',
        expect.objectContaining({ signal: expect.any(AbortSignal) as AbortSignal }),
      );
    });
  });

  describe('metadata()', () => {
    it('should use the URL as location and extract the file name', () => {
      expect(new UrlSource('https://example.com/files/weather.arff').metadata()).toEqual({
        location: 'https://example.com/files/weather.arff',
        fileName: 'weather.arff',
        mimeType: 'text/x-arff',
      });
    });

    it('should use the file name override when provided', () => {
      const meta = new UrlSource('https://example.com/download?id=7', { fileName: 'weather.arff' }).metadata();
      expect(meta.fileName).toBe('weather.arff');
    });

    it('should fall back to a generic file name', () => {
      expect(new UrlSource('https://example.com/').metadata().fileName).toBe('remote-file');
      expect(new UrlSource('not-a-url').metadata().fileName).toBe('remote-file');
    });
  });
});
