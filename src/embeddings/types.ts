// src/embeddings/types.ts
// Embedding provider contract.

import type { EmbeddingsProviderName } from '../config';

export interface EmbeddingProvider {
  readonly name: EmbeddingsProviderName;
  readonly dimensions: number;
  /** One vector per input text, in input order */
  embed(texts: string[]): Promise<number[][]>;
}

/**
 * The slice of the OpenAI client used for embeddings.
 * Tests pass a fake implementing only this.
 */
export interface EmbeddingsApi {
  embeddings: {
    create(params: {
      model: string;
      input: string[];
      dimensions?: number;
    }): Promise<{ data: Array<{ embedding: number[]; index: number }> }>;
  };
}
