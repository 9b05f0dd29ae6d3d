/**
 * Voyage AI embeddings over plain fetch (voyage-4-lite, 1024 dims by default).
 * Stored spans are sent as `document` and search text as `query`.
 */

import { z } from 'zod';
import { AIProviderError } from '../errors.js';
import type { EmbeddingPurpose, IEmbeddingProvider } from './IEmbeddingProvider.js';

const ENDPOINT = 'https://api.voyageai.com/v1/embeddings';
const DEFAULT_MODEL = 'voyage-4-lite';
const NATIVE_DIMENSIONS = 1024;
const BATCH_LIMIT = 128;

const embeddingsReplySchema = z.object({
  data: z.array(z.object({ index: z.number().int(), embedding: z.array(z.number()) })),
});

export interface VoyageEmbeddingProviderOptions {
  apiKey?: string;
  model?: string;
  /** Values other than 1024 are sent as `output_dimension`. */
  dimensions?: number;
}

export class VoyageEmbeddingProvider implements IEmbeddingProvider {
  readonly name = 'voyage';
  readonly dimensions: number;
  private readonly apiKey: string;
  private readonly model: string;

  constructor(options: VoyageEmbeddingProviderOptions = {}) {
    this.apiKey = options.apiKey ?? process.env.VOYAGE_API_KEY ?? '';
    this.model = options.model ?? DEFAULT_MODEL;
    this.dimensions = options.dimensions ?? NATIVE_DIMENSIONS;
  }

  async generate(text: string, purpose: EmbeddingPurpose = 'document'): Promise<number[]> {
    const [vector] = await this.generateBatch([text], purpose);
    return vector;
  }

  async generateBatch(texts: string[], purpose: EmbeddingPurpose = 'document'): Promise<number[][]> {
    const out: number[][] = [];
    for (let start = 0; start < texts.length; start += BATCH_LIMIT) {
      out.push(...(await this.embed(texts.slice(start, start + BATCH_LIMIT), purpose)));
    }
    return out;
  }

  private async embed(input: string[], purpose: EmbeddingPurpose): Promise<number[][]> {
    const res = await fetch(ENDPOINT, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        input,
        model: this.model,
        input_type: purpose,
        truncation: true,
        ...(this.dimensions !== NATIVE_DIMENSIONS && { output_dimension: this.dimensions }),
      }),
    });

    if (!res.ok) {
      const body: unknown = await res.json().catch(() => null);
      const detail =
        typeof body === 'object' && body !== null && 'detail' in body
          ? String(body.detail)
          : res.statusText || 'no detail';
      throw new AIProviderError(`Voyage API error (${res.status}): ${detail}`, {
        provider: this.name,
        status: res.status,
      });
    }

    const parsed = embeddingsReplySchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new AIProviderError('Voyage returned a malformed embeddings reply', {
        provider: this.name,
      });
    }
    const { data } = parsed.data;
    if (data.length !== input.length) {
      throw new AIProviderError(`Voyage returned ${data.length} embeddings for ${input.length} inputs`, {
        provider: this.name,
      });
    }
    return [...data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
  }
}
