// src/embeddings/openaiEmbedding.ts
import OpenAI from 'openai';
import type { EmbeddingProvider, EmbeddingsApi } from './types';

export interface OpenAIEmbeddingOptions {
  apiKey?: string;
  model: string;
  dimensions: number;
  /** Injected client (tests); otherwise built from apiKey */
  client?: EmbeddingsApi;
}

function buildClient(apiKey: string | undefined): EmbeddingsApi {
  if (!apiKey) {
    throw new Error('OPENAI_API_KEY is not set. Set it in your environment to use the OpenAI embeddings provider.');
  }
  return new OpenAI({ apiKey });
}

/**
 * Embeddings via the OpenAI embeddings endpoint, requesting vectors of the
 * configured dimensionality.
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'openai' as const;
  readonly dimensions: number;
  private readonly model: string;
  private readonly client: EmbeddingsApi;

  constructor(opts: OpenAIEmbeddingOptions) {
    this.model = opts.model;
    this.dimensions = opts.dimensions;
    this.client = opts.client ?? buildClient(opts.apiKey);
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    const resp = await this.client.embeddings.create({
      model: this.model,
      input: texts,
      dimensions: this.dimensions,
    });

    const ordered = [...resp.data].sort((a, b) => a.index - b.index);
    if (ordered.length !== texts.length) {
      throw new Error(`Embeddings response had ${ordered.length} vectors for ${texts.length} inputs`);
    }
    for (const item of ordered) {
      if (item.embedding.length !== this.dimensions) {
        throw new Error(
          `Embeddings response dimension ${item.embedding.length} does not match ${this.dimensions}`
        );
      }
    }
    return ordered.map((item) => item.embedding);
  }
}
