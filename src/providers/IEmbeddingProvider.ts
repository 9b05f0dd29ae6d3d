/**
 * Embedding provider interface.
 * Turns text into fixed-dimension vectors for similarity search.
 */

/** Documents are embedded for storage; queries for lookup. Some providers embed them differently. */
export type EmbeddingPurpose = 'document' | 'query';

export interface IEmbeddingProvider {
  readonly name: string;
  readonly dimensions: number;

  generate(text: string, purpose?: EmbeddingPurpose): Promise<number[]>;

  generateBatch(texts: string[], purpose?: EmbeddingPurpose): Promise<number[][]>;
}
