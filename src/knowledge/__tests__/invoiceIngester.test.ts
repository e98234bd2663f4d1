import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { IN_MEMORY, openDatabase, type SqliteAdapter } from '../../db';
import { HashEmbeddingProvider } from '../../embeddings';
import { loadClientRoster } from '../../extractors';
import { createInvoicesStore } from '../../store/invoices';
import { createInvoiceVectorIndex } from '../../store/invoiceVectors';
import { readDocumentText, UnsupportedDocumentError } from '../documentText';
import { processDirectory, reprocessAll, storeInvoice, type IngestDeps } from '../invoiceIngester';

const SAMPLE = [
  'Invoice Number: INV-2024-07',
  'Date: 14/03/2024',
  'Bill To: Acme Ltd',
  '10 High Street',
  'Description',
  'Piano performance £250.00',
].join('\n');

const withNumber = (num: string): string => SAMPLE.replace('INV-2024-07', num);

const roster = loadClientRoster();

let tmpDir: string;
let db: SqliteAdapter;
let deps: IngestDeps;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'invoice-ingest-'));
  db = openDatabase(IN_MEMORY);
  deps = {
    db,
    store: createInvoicesStore(db),
    vectors: createInvoiceVectorIndex(db),
    embeddings: new HashEmbeddingProvider(8),
    roster,
  };
});

afterEach(async () => {
  await db.close();
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function writeFiles(files: Record<string, string>): void {
  for (const [name, content] of Object.entries(files)) {
    fs.writeFileSync(path.join(tmpDir, name), content);
  }
}

/* ============= storeInvoice ============= */

describe('storeInvoice', () => {
  it('stores the record with its document and vector', async () => {
    const result = await storeInvoice(deps, SAMPLE, '/inbox/acme.pdf');
    expect(result.error).toBeUndefined();
    expect(result.id).toBe('Acme_Ltd_INV-2024-07');

    const stored = await deps.store.getById('Acme_Ltd_INV-2024-07');
    expect(stored?.metadata.client_name).toBe('Acme Ltd');
    expect(stored?.metadata.source_file).toBe('acme.pdf');
    expect(stored?.document).toBe(SAMPLE);
    expect(await deps.vectors.count()).toBe(1);
  });

  it('overwrites the record for the same client and invoice number', async () => {
    await storeInvoice(deps, SAMPLE, 'first.pdf');
    await storeInvoice(deps, SAMPLE, 'second.pdf');
    expect(await deps.store.count()).toBe(1);
    expect((await deps.store.getById('Acme_Ltd_INV-2024-07'))?.metadata.source_file).toBe('second.pdf');
  });

  it('reports write failures instead of throwing', async () => {
    await db.close();
    const result = await storeInvoice(deps, SAMPLE, 'acme.pdf');
    expect(result.id).toBe('Acme_Ltd_INV-2024-07');
    expect(result.error).toMatch(/^Failed to store in database: /);
  });
});

/* ============= processDirectory ============= */

describe('processDirectory', () => {
  it('ingests supported documents in name order and collects failures', async () => {
    writeFiles({
      'b.txt': withNumber('INV-2024-08'),
      'a.txt': SAMPLE,
      'empty.txt': '   \n',
      'notes.md': 'not an invoice',
    });

    const result = await processDirectory(deps, tmpDir);
    expect(result.found).toBe(3);
    expect(result.stored).toBe(2);
    expect(result.failed).toBe(1);
    expect(result.ids).toEqual(['Acme_Ltd_INV-2024-07', 'Acme_Ltd_INV-2024-08']);
    expect(result.errors).toEqual([{ file: 'empty.txt', error: 'Document has no extractable text' }]);
    expect(await deps.store.listIds()).toEqual(['Acme_Ltd_INV-2024-07', 'Acme_Ltd_INV-2024-08']);
  });

  it('keeps going when one document cannot be read', async () => {
    writeFiles({ 'a.txt': SAMPLE, 'b.txt': withNumber('INV-2024-08') });
    deps.textSource = async (filePath) => {
      if (filePath.endsWith('a.txt')) throw new Error('corrupt file');
      return fs.readFileSync(filePath, 'utf8');
    };

    const result = await processDirectory(deps, tmpDir);
    expect(result.stored).toBe(1);
    expect(result.ids).toEqual(['Acme_Ltd_INV-2024-08']);
    expect(result.errors).toEqual([{ file: 'a.txt', error: 'Failed to extract text: corrupt file' }]);
  });

  it('reports an unreadable directory without throwing', async () => {
    const missing = path.join(tmpDir, 'missing');
    const result = await processDirectory(deps, missing);
    expect(result.found).toBe(0);
    expect(result.stored).toBe(0);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0].file).toBe(missing);
    expect(result.errors[0].error).toMatch(/^Directory not readable: /);
  });

  it('returns an empty result for a directory without documents', async () => {
    writeFiles({ 'readme.md': 'nothing here' });
    const result = await processDirectory(deps, tmpDir);
    expect(result).toEqual({ directory: tmpDir, found: 0, stored: 0, failed: 0, ids: [], errors: [] });
  });
});

/* ============= reprocessAll ============= */

describe('reprocessAll', () => {
  it('clears stale records and rebuilds from the directory', async () => {
    await storeInvoice(deps, withNumber('INV-OLD-1'), 'old.txt');
    writeFiles({ 'a.txt': SAMPLE, 'b.txt': withNumber('INV-2024-08') });

    const result = await reprocessAll(deps, tmpDir);
    expect(result.cleared).toBe(1);
    expect(result.stored).toBe(2);
    expect(await deps.store.listIds()).toEqual(['Acme_Ltd_INV-2024-07', 'Acme_Ltd_INV-2024-08']);
    expect(await deps.vectors.count()).toBe(2);
  });

  it('leaves the same records when run twice', async () => {
    writeFiles({ 'a.txt': SAMPLE, 'b.txt': withNumber('INV-2024-08') });
    await reprocessAll(deps, tmpDir);
    const second = await reprocessAll(deps, tmpDir);
    expect(second.cleared).toBe(2);
    expect(await deps.store.count()).toBe(2);
  });
});

/* ============= readDocumentText ============= */

describe('readDocumentText', () => {
  it('reads .txt files verbatim', async () => {
    writeFiles({ 'a.txt': SAMPLE });
    expect(await readDocumentText(path.join(tmpDir, 'a.txt'))).toBe(SAMPLE);
  });

  it('rejects unsupported extensions', async () => {
    await expect(readDocumentText(path.join(tmpDir, 'notes.md'))).rejects.toBeInstanceOf(
      UnsupportedDocumentError
    );
  });
});
