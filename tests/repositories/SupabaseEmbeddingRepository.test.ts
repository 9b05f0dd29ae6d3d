import { describe, it, expect, vi } from 'vitest';
import { createClient } from '@supabase/supabase-js';
import { SupabaseEmbeddingRepository } from '../../src/repositories/SupabaseEmbeddingRepository.js';

const TOTAL = 1002;
const indexed = Array.from({ length: TOTAL }, (_, i) => `uuid-${String(i).padStart(4, '0')}`);

function createRepository() {
  const fetch = vi.fn(async (input: string | URL | Request) => {
    const url = new URL(input instanceof Request ? input.url : input);
    const offset = Number(url.searchParams.get('offset') ?? 0);
    const limit = Number(url.searchParams.get('limit') ?? TOTAL);
    const page = indexed.slice(offset, offset + limit).map((uuid) => ({ uuid }));
    return new Response(JSON.stringify(page), {
      status: 200,
      headers: { 'Content-Type': 'application/json' },
    });
  });
  const db = createClient('http://localhost:54321', 'test-key', {
    auth: { persistSession: false, autoRefreshToken: false },
    global: { fetch },
  });
  return { fetch, repo: new SupabaseEmbeddingRepository(db) };
}

describe('SupabaseEmbeddingRepository', () => {
  describe('listIndexed', () => {
    it('should read every page of indexed uuids', async () => {
      const { fetch, repo } = createRepository();

      const uuids = await repo.listIndexed('summary');

      expect(uuids).toHaveLength(TOTAL);
      expect(uuids[TOTAL - 1]).toBe('uuid-1001');
      expect(fetch).toHaveBeenCalledTimes(2);
      const second = new URL(String(fetch.mock.calls[1][0]));
      expect(second.pathname).toBe('/rest/v1/intelligence_embeddings');
      expect(second.searchParams.get('span')).toBe('eq.summary');
      expect(second.searchParams.get('offset')).toBe('1000');
      expect(second.searchParams.get('limit')).toBe('1000');
    });
  });
});
