/**
 * OpenAI embeddings (text-embedding-3-small, 1536 dims by default).
 * One vector space serves stored spans and search text alike.
 */

import OpenAI from 'openai';
import { AIProviderError, httpStatusOf } from '../errors.js';
import type { EmbeddingPurpose, IEmbeddingProvider } from './IEmbeddingProvider.js';

const DEFAULT_MODEL = 'text-embedding-3-small';
const DEFAULT_DIMENSIONS = 1536;
const BATCH_LIMIT = 256;
/** Characters kept per input; stays under the 8191-token limit. */
const INPUT_CHAR_LIMIT = 24_000;

export interface OpenAIEmbeddingProviderOptions {
  apiKey?: string;
  baseURL?: string;
  model?: string;
  dimensions?: number;
}

export class OpenAIEmbeddingProvider implements IEmbeddingProvider {
  readonly name = 'openai';
  readonly dimensions: number;
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(options: OpenAIEmbeddingProviderOptions = {}) {
    this.client = new OpenAI({
      apiKey: options.apiKey ?? process.env.OPENAI_API_KEY,
      baseURL: options.baseURL,
    });
    this.model = options.model ?? DEFAULT_MODEL;
    this.dimensions = options.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async generate(text: string, purpose?: EmbeddingPurpose): Promise<number[]> {
    const [vector] = await this.generateBatch([text], purpose);
    return vector;
  }

  async generateBatch(texts: string[], _purpose?: EmbeddingPurpose): Promise<number[][]> {
    const out: number[][] = [];
    for (let start = 0; start < texts.length; start += BATCH_LIMIT) {
      out.push(...(await this.embed(texts.slice(start, start + BATCH_LIMIT))));
    }
    return out;
  }

  private async embed(input: string[]): Promise<number[][]> {
    const response = await this.client.embeddings
      .create({
        model: this.model,
        input: input.map((text) => text.slice(0, INPUT_CHAR_LIMIT)),
        dimensions: this.dimensions,
      })
      .catch((err: unknown) => {
        const status = httpStatusOf(err);
        throw new AIProviderError(
          `Embedding request failed: ${err instanceof Error ? err.message : String(err)}`,
          { provider: this.name, model: this.model, ...(status !== undefined && { status }) }
        );
      });

    if (response.data.length !== input.length) {
      throw new AIProviderError(
        `OpenAI returned ${response.data.length} embeddings for ${input.length} inputs`,
        { provider: this.name, model: this.model }
      );
    }
    return [...response.data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
  }
}
