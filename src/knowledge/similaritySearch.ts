// src/knowledge/similaritySearch.ts
// Vector similarity retrieval over stored invoices.
//
// The query is embedded and compared against stored invoice vectors.
// When the index cannot serve the requested count, the request is halved
// and retried down to a single result; after that the result is empty.

import type { EmbeddingProvider } from '../embeddings';
import type { InvoiceRecordJson } from '../extractors/types';
import { createLogger } from '../observability';
import { metadataToJson, type InvoicesStore } from '../store/invoices';
import { VectorIndexError, type InvoiceVectorIndex, type VectorHit } from '../store/invoiceVectors';

const log = createLogger('knowledge/similaritySearch');

export const MAX_SIMILAR_RESULTS = 20;

export interface SimilarInvoice {
  id: string;
  record: InvoiceRecordJson;
  document: string;
  /** 1 is identical, 0 is unrelated */
  relevanceScore: number;
}

export interface SimilaritySearchDeps {
  store: InvoicesStore;
  vectors: InvoiceVectorIndex;
  embeddings: EmbeddingProvider;
}

async function queryWithBackoff(
  vectors: InvoiceVectorIndex,
  queryVector: number[],
  requested: number
): Promise<VectorHit[]> {
  let k = requested;
  for (;;) {
    try {
      return await vectors.query(queryVector, k);
    } catch (err) {
      if (!(err instanceof VectorIndexError)) throw err;
      if (k <= 1) {
        log.warn({ err, requested }, 'Vector index could not serve a single result');
        return [];
      }
      k = Math.max(1, Math.floor(k / 2));
      log.debug({ k, reason: err.name }, 'Reducing similar-invoice request and retrying');
    }
  }
}

/**
 * Invoices most similar to `query`, closest first. Never throws.
 */
export async function retrieveSimilar(
  deps: SimilaritySearchDeps,
  query: string,
  limit = 5
): Promise<SimilarInvoice[]> {
  const requested = Math.min(limit, MAX_SIMILAR_RESULTS);
  if (requested < 1) return [];

  try {
    const [queryVector] = await deps.embeddings.embed([query]);
    if (!queryVector) return [];

    const hits = await queryWithBackoff(deps.vectors, queryVector, requested);

    const results: SimilarInvoice[] = [];
    for (const hit of hits) {
      const stored = await deps.store.getById(hit.id);
      if (!stored) continue;
      results.push({
        id: stored.id,
        record: metadataToJson(stored.metadata),
        document: stored.document,
        relevanceScore: Math.max(0, 1 - hit.distance),
      });
    }
    return results;
  } catch (err) {
    log.error({ err, query }, 'Similar-invoice retrieval failed');
    return [];
  }
}
