import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect } from 'vitest';
import { IN_MEMORY } from '../db';
import { HashEmbeddingProvider } from '../embeddings';
import { ClientRosterError, EMPTY_ROSTER } from '../extractors';
import { createInvoiceIndex } from '../invoiceIndex';

const SAMPLE = [
  'Invoice Number: INV-2024-07',
  'Date: 14/03/2024',
  'Bill To: Acme Ltd',
  '10 High Street',
  'Description',
  'Piano performance £250.00',
].join('\n');

describe('createInvoiceIndex', () => {
  it('ingests, searches and lists through one object', async () => {
    const index = await createInvoiceIndex({
      dbPath: IN_MEMORY,
      embeddings: new HashEmbeddingProvider(8),
    });
    try {
      const stored = await index.ingestText(SAMPLE, '/inbox/acme.pdf');
      expect(stored.error).toBeUndefined();

      const [match] = await index.search('Acme');
      expect(match.id).toBe('Acme_Ltd_INV-2024-07');

      const [similar] = await index.retrieveSimilar(SAMPLE, 1);
      expect(similar.id).toBe('Acme_Ltd_INV-2024-07');

      expect(await index.listClients()).toEqual([
        { clientName: 'Acme Ltd', address: '10 High Street', invoiceCount: 1, latestInvoice: '14/03/2024' },
      ]);

      const updated = await index.updateClient('Acme Ltd', { email: 'billing@acme.test' });
      expect(updated.success).toBe(true);
      const details = await index.getClientDetails('Acme Ltd');
      expect(details.success && details.clientInfo.email).toBe('billing@acme.test');
    } finally {
      await index.close();
    }
  });

  it('builds the hash provider from embedding options', async () => {
    const index = await createInvoiceIndex({
      dbPath: IN_MEMORY,
      roster: EMPTY_ROSTER,
      embeddingOptions: { provider: 'hash', dimensions: 4 },
    });
    expect(index.embeddings.name).toBe('hash');
    expect(index.embeddings.dimensions).toBe(4);
    await index.close();
  });

  it('rejects a malformed roster file', async () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'invoice-index-'));
    const rosterPath = path.join(tmpDir, 'roster.json');
    fs.writeFileSync(rosterPath, '{ not json');
    try {
      await expect(
        createInvoiceIndex({ dbPath: IN_MEMORY, rosterPath, embeddings: new HashEmbeddingProvider(4) })
      ).rejects.toBeInstanceOf(ClientRosterError);
    } finally {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  });
});
