// src/embeddings/hashEmbedding.ts
// Deterministic pseudo-embedding: a unit-length normal vector seeded by the
// SHA-256 of the text. Same text, same vector; carries no semantics.

import { gaussian, mulberry32, seedToUint32 } from './deterministic';
import type { EmbeddingProvider } from './types';

export const HASH_EMBEDDING_DIMENSIONS = 384;

export function hashEmbedding(text: string, dimensions = HASH_EMBEDDING_DIMENSIONS): number[] {
  const rnd = mulberry32(seedToUint32(text));
  const vector = Array.from({ length: dimensions }, () => gaussian(rnd));
  const norm = Math.sqrt(vector.reduce((sum, x) => sum + x * x, 0));
  return norm > 0 ? vector.map((x) => x / norm) : vector;
}

export class HashEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'hash' as const;

  constructor(readonly dimensions: number = HASH_EMBEDDING_DIMENSIONS) {}

  embed(texts: string[]): Promise<number[][]> {
    return Promise.resolve(texts.map((t) => hashEmbedding(t, this.dimensions)));
  }
}
