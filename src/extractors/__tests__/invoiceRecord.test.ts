import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect } from 'vitest';
import {
  buildManualRecordId,
  buildRecordId,
  ClientRosterError,
  extractInvoiceRecord,
  loadClientRoster,
  parseClientRoster,
} from '../index';

const roster = loadClientRoster();

const SAMPLE = [
  'Invoice Number: INV-2024-07',
  'Date: 14/03/2024',
  'Bill To: Acme Ltd',
  '10 High Street',
  'Description',
  'Piano performance £250.00',
].join('\n');

/* ============= extractInvoiceRecord ============= */

describe('extractInvoiceRecord', () => {
  it('merges fields, client and services into one record', () => {
    const record = extractInvoiceRecord(SAMPLE, '/tmp/inbox/acme.pdf', roster);
    expect(record).toEqual({
      invoiceNumber: 'INV-2024-07',
      invoiceDate: '14/03/2024',
      invoiceAmount: '£250.00',
      clientName: 'Acme Ltd',
      clientAddress: '10 High Street',
      services: [{ serviceName: 'Piano performance', servicePrice: '£250.00' }],
      sourceFile: 'acme.pdf',
      fullText: SAMPLE,
    });
  });

  it('yields identical records for identical text', () => {
    expect(extractInvoiceRecord(SAMPLE, 'a.pdf', roster)).toEqual(
      extractInvoiceRecord(SAMPLE, 'a.pdf', roster)
    );
  });
});

/* ============= Record ids ============= */

describe('buildRecordId', () => {
  it('joins client and invoice number and replaces spaces', () => {
    expect(buildRecordId('Acme Ltd', 'INV-2024-07')).toBe('Acme_Ltd_INV-2024-07');
    expect(buildRecordId('', 'unknown')).toBe('_unknown');
  });

  it('builds manual ids from the client name', () => {
    expect(buildManualRecordId('New Client Co')).toBe('New_Client_Co_manual');
  });
});

/* ============= Client roster ============= */

describe('client roster', () => {
  it('loads the bundled roster in priority order', () => {
    expect(roster.knownClients[0]).toEqual({
      name: 'ALR Music Ltd',
      fallbackAddress: '36 Lexington Street London',
      addressAnchor: 'Lexington Street',
    });
    expect(roster.knownClients).toHaveLength(12);
    expect(roster.identityOverrides).toHaveLength(2);
    expect(roster.issuerDetails).toEqual([]);
  });

  it('defaults missing sections to empty lists', () => {
    expect(parseClientRoster({})).toEqual({
      knownClients: [],
      identityOverrides: [],
      venueKeywords: [],
      issuerDetails: [],
    });
  });

  it('rejects malformed entries', () => {
    expect(() => parseClientRoster([])).toThrow(ClientRosterError);
    expect(() => parseClientRoster({ knownClients: [{ name: '' }] })).toThrow(ClientRosterError);
    expect(() => parseClientRoster({ venueKeywords: [1, 2] })).toThrow(ClientRosterError);
    expect(() => parseClientRoster({ identityOverrides: [{ match: 'x' }] })).toThrow(ClientRosterError);
  });

  it('reports unreadable and invalid files', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'roster-'));
    try {
      expect(() => loadClientRoster(path.join(dir, 'missing.json'))).toThrow(ClientRosterError);
      const bad = path.join(dir, 'bad.json');
      fs.writeFileSync(bad, '{ not json');
      expect(() => loadClientRoster(bad)).toThrow(/not valid JSON/);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
