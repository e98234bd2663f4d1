// src/knowledge/invoiceIngester.ts
// Invoice ingestion: extract a record from document text and persist it with
// its embedding; process a directory of documents; rebuild the whole store.
//
// Per-document failures never abort a batch. They are logged and collected
// in the result's `errors` array.

import fs from 'node:fs/promises';
import path from 'node:path';
import type { DbAdapter } from '../db';
import type { EmbeddingProvider } from '../embeddings';
import { buildRecordId, extractInvoiceRecord, type ClientRoster, type InvoiceRecord } from '../extractors';
import { createChildLogger, createLogger } from '../observability';
import { recordToMetadata, type InvoicesStore } from '../store/invoices';
import type { InvoiceVectorIndex } from '../store/invoiceVectors';
import { isSupportedDocument, readDocumentText, type TextSource } from './documentText';

const log = createLogger('knowledge/invoiceIngester');

/* ---------- Types ---------- */

export interface IngestDeps {
  db: DbAdapter;
  store: InvoicesStore;
  vectors: InvoiceVectorIndex;
  embeddings: EmbeddingProvider;
  roster: ClientRoster;
  /** Defaults to readDocumentText */
  textSource?: TextSource;
}

export interface StoreInvoiceResult {
  id: string;
  record: InvoiceRecord;
  /** Set when the record could not be written */
  error?: string;
}

export interface IngestError {
  file: string;
  error: string;
}

export interface ProcessDirectoryResult {
  directory: string;
  /** Supported documents found */
  found: number;
  stored: number;
  failed: number;
  ids: string[];
  errors: IngestError[];
}

export interface ReprocessResult extends ProcessDirectoryResult {
  /** Records deleted before reprocessing */
  cleared: number;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/* ---------- Single document ---------- */

/**
 * Extract and persist one invoice. Re-storing the same client and invoice
 * number overwrites the earlier record. Write failures are reported in
 * `error`, never thrown.
 */
export async function storeInvoice(
  deps: IngestDeps,
  text: string,
  sourceFile: string
): Promise<StoreInvoiceResult> {
  const record = extractInvoiceRecord(text, sourceFile, deps.roster);
  const id = buildRecordId(record.clientName, record.invoiceNumber);

  try {
    const [vector] = await deps.embeddings.embed([text]);
    await deps.db.transaction(async () => {
      await deps.store.upsert({ id, metadata: recordToMetadata(record), document: text });
      if (vector) await deps.vectors.upsert(id, vector);
    });
    log.info({ id, sourceFile: record.sourceFile }, 'Stored invoice');
    return { id, record };
  } catch (err) {
    log.error({ err, id, sourceFile: record.sourceFile }, 'Failed to store invoice');
    return { id, record, error: `Failed to store in database: ${errorMessage(err)}` };
  }
}

/* ---------- Directory ---------- */

async function listDocuments(dirPath: string): Promise<string[]> {
  const entries = await fs.readdir(dirPath, { withFileTypes: true });
  return entries
    .filter((e) => e.isFile() && isSupportedDocument(e.name))
    .map((e) => e.name)
    .sort();
}

/**
 * Ingest every .pdf and .txt document in `dirPath`, in sorted name order.
 */
export async function processDirectory(
  deps: IngestDeps,
  dirPath: string
): Promise<ProcessDirectoryResult> {
  const result: ProcessDirectoryResult = {
    directory: dirPath,
    found: 0,
    stored: 0,
    failed: 0,
    ids: [],
    errors: [],
  };

  let files: string[];
  try {
    files = await listDocuments(dirPath);
  } catch (err) {
    log.warn({ err, dirPath }, 'Invoice directory is not readable');
    result.errors.push({ file: dirPath, error: `Directory not readable: ${errorMessage(err)}` });
    return result;
  }

  result.found = files.length;
  if (files.length === 0) {
    log.info({ dirPath }, 'No invoice documents found');
    return result;
  }

  const textSource = deps.textSource ?? readDocumentText;
  log.info({ dirPath, count: files.length }, 'Processing invoice documents');

  for (const file of files) {
    const fileLog = createChildLogger(log, { file });
    const filePath = path.join(dirPath, file);
    let text: string;
    try {
      text = await textSource(filePath);
    } catch (err) {
      fileLog.warn({ err }, 'Failed to read document text');
      result.failed++;
      result.errors.push({ file, error: `Failed to extract text: ${errorMessage(err)}` });
      continue;
    }

    if (!text.trim()) {
      fileLog.warn('Document has no extractable text');
      result.failed++;
      result.errors.push({ file, error: 'Document has no extractable text' });
      continue;
    }

    const stored = await storeInvoice(deps, text, filePath);
    if (stored.error) {
      result.failed++;
      result.errors.push({ file, error: stored.error });
    } else {
      result.stored++;
      result.ids.push(stored.id);
    }
  }

  log.info(
    { dirPath, found: result.found, stored: result.stored, failed: result.failed },
    'Invoice directory processed'
  );
  return result;
}

/**
 * Delete every stored record, then ingest `dirPath` again.
 */
export async function reprocessAll(deps: IngestDeps, dirPath: string): Promise<ReprocessResult> {
  let cleared = 0;
  const clearErrors: IngestError[] = [];
  try {
    const ids = await deps.store.listIds();
    cleared = await deps.db.transaction(() => deps.store.deleteIds(ids));
    log.info({ cleared }, 'Cleared invoice store');
  } catch (err) {
    log.error({ err }, 'Failed to clear invoice store');
    clearErrors.push({ file: '(store)', error: `Failed to clear store: ${errorMessage(err)}` });
  }

  const processed = await processDirectory(deps, dirPath);
  return { ...processed, cleared, errors: [...clearErrors, ...processed.errors] };
}
