// src/embeddings/index.ts
// Embedding provider selection.
//
// The OpenAI provider is tried once under a timeout at startup. If that call
// fails or times out, the deterministic hash provider is used instead. A
// provider that answered at startup but fails later falls back to the hash
// embedding for that call only.

import { config } from '../config';
import { createLogger } from '../observability';
import { HashEmbeddingProvider } from './hashEmbedding';
import { OpenAIEmbeddingProvider } from './openaiEmbedding';
import type { EmbeddingProvider, EmbeddingsApi } from './types';
import type { EmbeddingsProviderName } from '../config';

export type { EmbeddingProvider, EmbeddingsApi } from './types';
export { HashEmbeddingProvider, hashEmbedding, HASH_EMBEDDING_DIMENSIONS } from './hashEmbedding';
export { OpenAIEmbeddingProvider } from './openaiEmbedding';

const log = createLogger('embeddings');

/* ============= Timeout Helper ============= */

export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  errorMessage: string
): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => reject(new Error(errorMessage)), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}

/* ============= Per-call Fallback ============= */

/**
 * Wraps a real provider; any failing call is answered by the hash provider.
 */
export class FallbackEmbeddingProvider implements EmbeddingProvider {
  readonly name: EmbeddingsProviderName;
  readonly dimensions: number;
  private readonly fallback: HashEmbeddingProvider;

  constructor(private readonly primary: EmbeddingProvider) {
    this.name = primary.name;
    this.dimensions = primary.dimensions;
    this.fallback = new HashEmbeddingProvider(primary.dimensions);
  }

  async embed(texts: string[]): Promise<number[][]> {
    try {
      return await this.primary.embed(texts);
    } catch (err) {
      log.warn(
        { err, provider: this.primary.name, count: texts.length },
        'Embedding call failed, using deterministic embedding'
      );
      return this.fallback.embed(texts);
    }
  }
}

/* ============= Initialization ============= */

export interface EmbeddingInitOptions {
  provider?: EmbeddingsProviderName;
  apiKey?: string;
  model?: string;
  dimensions?: number;
  timeoutMs?: number;
  /** Injected OpenAI-compatible client (tests) */
  client?: EmbeddingsApi;
}

/**
 * Build the embedding provider. Never throws: any initialization problem
 * yields the deterministic hash provider.
 */
export async function initEmbeddingProvider(
  opts: EmbeddingInitOptions = {}
): Promise<EmbeddingProvider> {
  const providerName = opts.provider ?? config.embeddings.provider;
  const dimensions = opts.dimensions ?? config.embeddings.dimensions;

  if (providerName === 'hash') {
    return new HashEmbeddingProvider(dimensions);
  }

  const timeoutMs = opts.timeoutMs ?? config.embeddings.initTimeoutMs;
  try {
    const provider = new OpenAIEmbeddingProvider({
      apiKey: opts.apiKey ?? config.embeddings.openaiKey,
      model: opts.model ?? config.embeddings.model,
      dimensions,
      client: opts.client,
    });
    await withTimeout(
      provider.embed(['embedding provider check']),
      timeoutMs,
      `Embedding provider initialization timed out after ${timeoutMs}ms`
    );
    log.info({ provider: providerName, dimensions }, 'Embedding provider ready');
    return new FallbackEmbeddingProvider(provider);
  } catch (err) {
    log.warn({ err, provider: providerName }, 'Embedding provider unavailable, using deterministic embedding');
    return new HashEmbeddingProvider(dimensions);
  }
}
