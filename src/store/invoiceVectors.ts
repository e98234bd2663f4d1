// src/store/invoiceVectors.ts
// Embedding vectors for stored invoices, with exact cosine nearest-neighbour
// search. Rows cascade-delete with their invoice.
//
// Table: invoice_vectors

import type { DbAdapter } from '../db';

/* ---------- Errors ---------- */

/** Query-engine limit exceeded; callers may retry with a smaller request */
export class VectorIndexError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'VectorIndexError';
  }
}

export class IndexCapacityError extends VectorIndexError {
  constructor(
    public readonly requested: number,
    public readonly available: number
  ) {
    super(`Requested ${requested} neighbours but the index holds ${available}`);
    this.name = 'IndexCapacityError';
  }
}

export class DimensionMismatchError extends VectorIndexError {
  constructor(
    public readonly expected: number,
    public readonly actual: number
  ) {
    super(`Vector dimension ${actual} does not match index dimension ${expected}`);
    this.name = 'DimensionMismatchError';
  }
}

/* ---------- Types ---------- */

export interface VectorHit {
  id: string;
  /** Cosine distance, 1 - cosine similarity */
  distance: number;
}

interface VectorRow {
  id: string;
  dimensions: number;
  vector_json: string;
}

/* ---------- Math ---------- */

export function cosineDistance(a: readonly number[], b: readonly number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 1;
  return 1 - dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

function parseVector(json: string): number[] {
  try {
    const parsed: unknown = JSON.parse(json);
    if (Array.isArray(parsed) && parsed.every((x): x is number => typeof x === 'number')) {
      return parsed;
    }
  } catch {
    return [];
  }
  return [];
}

/* ---------- Index ---------- */

export interface InvoiceVectorIndex {
  upsert(id: string, vector: readonly number[]): Promise<void>;
  /**
   * The k nearest stored vectors by cosine distance, closest first.
   * @throws IndexCapacityError when k exceeds the number of stored vectors
   * @throws DimensionMismatchError when a stored vector's size differs from the query's
   */
  query(vector: readonly number[], k: number): Promise<VectorHit[]>;
  count(): Promise<number>;
}

export function createInvoiceVectorIndex(db: DbAdapter): InvoiceVectorIndex {
  return {
    async upsert(id, vector) {
      await db.run(
        `INSERT INTO invoice_vectors (id, dimensions, vector_json) VALUES (?, ?, ?)
         ON CONFLICT(id) DO UPDATE SET
           dimensions = excluded.dimensions,
           vector_json = excluded.vector_json`,
        [id, vector.length, JSON.stringify(vector)]
      );
    },

    async query(vector, k) {
      const rows = await db.queryAll<VectorRow>(
        `SELECT id, dimensions, vector_json FROM invoice_vectors`
      );
      if (k > rows.length) {
        throw new IndexCapacityError(k, rows.length);
      }

      const hits: VectorHit[] = [];
      for (const row of rows) {
        const stored = parseVector(row.vector_json);
        if (row.dimensions !== vector.length || stored.length !== vector.length) {
          throw new DimensionMismatchError(row.dimensions, vector.length);
        }
        hits.push({ id: row.id, distance: cosineDistance(vector, stored) });
      }

      hits.sort((a, b) => a.distance - b.distance);
      return hits.slice(0, k);
    },

    async count() {
      const row = await db.queryOne<{ n: number }>(`SELECT COUNT(*) AS n FROM invoice_vectors`);
      return row?.n ?? 0;
    },
  };
}
