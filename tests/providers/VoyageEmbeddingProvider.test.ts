import { describe, it, expect, beforeEach, afterAll, vi } from 'vitest';
import { VoyageEmbeddingProvider } from '../../src/providers/VoyageEmbeddingProvider.js';
import { AIProviderError } from '../../src/errors.js';

const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

function embeddingsResponse(embeddings: number[][], order?: number[]) {
  const indices = order ?? embeddings.map((_, i) => i);
  return {
    ok: true,
    status: 200,
    json: async () => ({
      object: 'list',
      data: indices.map((index) => ({ object: 'embedding', embedding: embeddings[index], index })),
      model: 'voyage-4-lite',
      usage: { total_tokens: 12 },
    }),
  };
}

function requestBody(call: number) {
  return JSON.parse(mockFetch.mock.calls[call][1].body);
}

describe('VoyageEmbeddingProvider', () => {
  let provider: VoyageEmbeddingProvider;

  beforeEach(() => {
    mockFetch.mockReset();
    provider = new VoyageEmbeddingProvider({ apiKey: 'test-key' });
  });

  afterAll(() => {
    vi.unstubAllGlobals();
  });

  it('should default to 1024 dimensions', () => {
    expect(provider.dimensions).toBe(1024);
    expect(provider.name).toBe('voyage');
  });

  describe('generate', () => {
    it('should embed a document by default', async () => {
      mockFetch.mockResolvedValueOnce(embeddingsResponse([[0.1, 0.2, 0.3]]));

      expect(await provider.generate('Port strike')).toEqual([0.1, 0.2, 0.3]);

      const [url, opts] = mockFetch.mock.calls[0];
      expect(url).toBe('https://api.voyageai.com/v1/embeddings');
      expect(opts.headers.Authorization).toBe('Bearer test-key');
      expect(requestBody(0)).toEqual({
        input: ['Port strike'],
        model: 'voyage-4-lite',
        input_type: 'document',
        truncation: true,
      });
    });

    it('should embed a search query with the query input type', async () => {
      mockFetch.mockResolvedValueOnce(embeddingsResponse([[0.4]]));
      await provider.generate('strikes in ports', 'query');

      expect(requestBody(0).input_type).toBe('query');
    });

    it('should send output_dimension only for a non-default size', async () => {
      const custom = new VoyageEmbeddingProvider({ apiKey: 'test-key', dimensions: 512 });
      mockFetch.mockResolvedValueOnce(embeddingsResponse([[0.1]]));
      await custom.generate('text');

      expect(requestBody(0).output_dimension).toBe(512);
    });

    it('should surface the API error detail as a provider error', async () => {
      mockFetch.mockResolvedValueOnce({
        ok: false,
        status: 401,
        statusText: 'Unauthorized',
        json: async () => ({ detail: 'Invalid API key' }),
      });

      const err = await provider.generate('text').catch((e: unknown) => e);
      expect(err).toBeInstanceOf(AIProviderError);
      expect(err).toMatchObject({
        message: 'Voyage API error (401): Invalid API key',
        details: { provider: 'voyage', status: 401 },
      });
    });

    it('should fall back to the status text when the error body is not JSON', async () => {
      mockFetch.mockResolvedValueOnce({
        ok: false,
        status: 503,
        statusText: 'Service Unavailable',
        json: async () => {
          throw new SyntaxError('Unexpected token');
        },
      });

      await expect(provider.generate('text')).rejects.toThrow(
        'Voyage API error (503): Service Unavailable'
      );
    });

    it('should reject a reply without embeddings', async () => {
      mockFetch.mockResolvedValueOnce({ ok: true, status: 200, json: async () => ({ data: 'none' }) });

      await expect(provider.generate('text')).rejects.toThrow(
        'Voyage returned a malformed embeddings reply'
      );
    });
  });

  describe('generateBatch', () => {
    it('should not call the API for an empty batch', async () => {
      expect(await provider.generateBatch([])).toEqual([]);
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('should restore input order from the response indices', async () => {
      const embeddings = [[1], [2], [3]];
      mockFetch.mockResolvedValueOnce(embeddingsResponse(embeddings, [2, 0, 1]));

      expect(await provider.generateBatch(['a', 'b', 'c'])).toEqual(embeddings);
    });

    it('should split large batches into chunks of 128', async () => {
      const texts = Array.from({ length: 130 }, (_, i) => `item ${i}`);
      mockFetch
        .mockResolvedValueOnce(embeddingsResponse(texts.slice(0, 128).map((_, i) => [i])))
        .mockResolvedValueOnce(embeddingsResponse([[128], [129]]));

      const vectors = await provider.generateBatch(texts);

      expect(mockFetch).toHaveBeenCalledTimes(2);
      expect(requestBody(1).input).toEqual(['item 128', 'item 129']);
      expect(vectors).toHaveLength(130);
      expect(vectors[129]).toEqual([129]);
    });

    it('should reject a response with the wrong number of embeddings', async () => {
      mockFetch.mockResolvedValueOnce(embeddingsResponse([[1]]));

      await expect(provider.generateBatch(['a', 'b'])).rejects.toThrow(
        'Voyage returned 1 embeddings for 2 inputs'
      );
    });
  });
});
