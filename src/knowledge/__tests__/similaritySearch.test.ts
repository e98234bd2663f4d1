import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { IN_MEMORY, openDatabase, type SqliteAdapter } from '../../db';
import { HashEmbeddingProvider, hashEmbedding, type EmbeddingProvider } from '../../embeddings';
import { createInvoicesStore, type InvoiceMetadata, type InvoicesStore } from '../../store/invoices';
import { createInvoiceVectorIndex, type InvoiceVectorIndex } from '../../store/invoiceVectors';
import { retrieveSimilar } from '../similaritySearch';

const DIMS = 16;

const DOCS: Record<string, string> = {
  Acme_1: 'Invoice 1 Acme Ltd piano performance',
  Beta_2: 'Invoice 2 Beta Events string quartet',
  Gamma_3: 'Invoice 3 Gamma Hall DJ set',
};

function meta(clientName: string): InvoiceMetadata {
  return {
    client_name: clientName,
    client_address: 'unknown',
    invoice_number: '1',
    invoice_date: 'unknown',
    invoice_amount: 'unknown',
    services: '[]',
    source_file: 'test.txt',
  };
}

let db: SqliteAdapter;
let store: InvoicesStore;
let vectors: InvoiceVectorIndex;
let embeddings: EmbeddingProvider;

beforeEach(() => {
  db = openDatabase(IN_MEMORY);
  store = createInvoicesStore(db);
  vectors = createInvoiceVectorIndex(db);
  embeddings = new HashEmbeddingProvider(DIMS);
});

afterEach(async () => {
  await db.close();
});

async function seed(): Promise<void> {
  for (const [id, document] of Object.entries(DOCS)) {
    await store.upsert({ id, metadata: meta(id.split('_')[0]), document });
    await vectors.upsert(id, hashEmbedding(document, DIMS));
  }
}

/* ============= retrieveSimilar ============= */

describe('retrieveSimilar', () => {
  it('ranks the identical document first', async () => {
    await seed();
    const results = await retrieveSimilar({ store, vectors, embeddings }, DOCS.Beta_2, 3);
    expect(results).toHaveLength(3);
    expect(results[0].id).toBe('Beta_2');
    expect(results[0].relevanceScore).toBeCloseTo(1, 6);
    expect(results[0].document).toBe(DOCS.Beta_2);
    expect(results[0].record.client_name).toBe('Beta');
    expect(results[1].relevanceScore).toBeLessThanOrEqual(results[0].relevanceScore);
    expect(results[2].relevanceScore).toBeLessThanOrEqual(results[1].relevanceScore);
  });

  it('halves the request until the index can serve it', async () => {
    await seed();
    // 10 -> 5 -> 2 with three stored vectors
    const results = await retrieveSimilar({ store, vectors, embeddings }, 'piano', 10);
    expect(results).toHaveLength(2);
  });

  it('returns an empty list for an empty index', async () => {
    expect(await retrieveSimilar({ store, vectors, embeddings }, 'anything', 5)).toEqual([]);
  });

  it('returns an empty list when stored vectors have another dimensionality', async () => {
    await store.upsert({ id: 'Flat_1', metadata: meta('Flat'), document: 'flat' });
    await vectors.upsert('Flat_1', [1, 0]);
    expect(await retrieveSimilar({ store, vectors, embeddings }, 'flat', 1)).toEqual([]);
  });

  it('returns an empty list when the query cannot be embedded', async () => {
    await seed();
    const failing: EmbeddingProvider = {
      name: 'hash',
      dimensions: DIMS,
      embed: () => Promise.reject(new Error('embedding backend down')),
    };
    expect(await retrieveSimilar({ store, vectors, embeddings: failing }, 'piano', 2)).toEqual([]);
  });

  it('returns nothing for a non-positive limit', async () => {
    await seed();
    expect(await retrieveSimilar({ store, vectors, embeddings }, 'piano', 0)).toEqual([]);
  });
});
