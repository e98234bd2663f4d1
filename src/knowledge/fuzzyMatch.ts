// src/knowledge/fuzzyMatch.ts
// Fuzzy client-name lookup over the stored invoice records.
//
// Scoring precedence (first applicable branch decides):
//   exact (case-insensitive)          -> 1.0
//   query is a substring of the name  -> len(query) / len(name) * 0.9
//   query (<= 5 chars) spells the initials of the name's first words -> 0.8

import type { InvoiceRecordJson } from '../extractors/types';
import { createLogger } from '../observability';
import { metadataToJson, type InvoicesStore, type StoredInvoice } from '../store/invoices';

const log = createLogger('knowledge/fuzzyMatch');

export const EXACT_SCORE = 1.0;
export const SUBSTRING_WEIGHT = 0.9;
export const INITIALS_SCORE = 0.8;
export const MAX_INITIALS_LENGTH = 5;

export interface InvoiceMatch {
  id: string;
  score: number;
  record: InvoiceRecordJson;
  stored: StoredInvoice;
}

/**
 * Score a query against one client name. 0 means no match.
 */
export function scoreClientMatch(query: string, clientName: string): number {
  const q = query.toLowerCase();
  const name = clientName.toLowerCase();

  if (q === name) return EXACT_SCORE;

  if (name.includes(q)) {
    return (query.length / clientName.length) * SUBSTRING_WEIGHT;
  }

  if (query.length <= MAX_INITIALS_LENGTH) {
    const words = clientName.split(/\s+/).filter(Boolean);
    if (words.length >= query.length) {
      const initials = words
        .slice(0, query.length)
        .map((w) => w[0])
        .join('')
        .toLowerCase();
      if (initials === q) return INITIALS_SCORE;
    }
  }

  return 0;
}

/**
 * Rank stored records by client-name similarity to `query`.
 * Ties keep insertion order. A read failure yields an empty list.
 */
export async function searchInvoices(
  store: InvoicesStore,
  query: string,
  limit = 5
): Promise<InvoiceMatch[]> {
  let all: StoredInvoice[];
  try {
    all = await store.listAll();
  } catch (err) {
    log.error({ err, query }, 'Failed to read invoice records for search');
    return [];
  }

  const matches: InvoiceMatch[] = [];
  for (const stored of all) {
    const clientName = stored.metadata.client_name;
    if (!clientName) continue;

    const score = scoreClientMatch(query, clientName);
    if (score > 0) {
      matches.push({ id: stored.id, score, record: metadataToJson(stored.metadata), stored });
    }
  }

  // Array.prototype.sort is stable
  matches.sort((a, b) => b.score - a.score);
  return matches.slice(0, Math.max(0, limit));
}
