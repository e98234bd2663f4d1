// src/extractors/index.ts
// Invoice extraction entry point: runs the field, client and service
// extractors independently over the same text and merges the results.

import path from 'node:path';
import { resolveClient } from './clientResolver';
import { extractInvoiceFields } from './fieldExtractors';
import type { ClientRoster } from './rules/clientRoster';
import { extractServices } from './serviceExtractor';
import type { InvoiceRecord } from './types';

export * from './types';
export {
  extractInvoiceAmount,
  extractInvoiceDate,
  extractInvoiceFields,
  extractInvoiceNumber,
} from './fieldExtractors';
export { cleanClientName, resolveClient } from './clientResolver';
export { extractServices, looksLikeMisreadDate } from './serviceExtractor';
export {
  ClientRosterError,
  EMPTY_ROSTER,
  loadClientRoster,
  parseClientRoster,
  type ClientRoster,
  type IdentityOverride,
  type KnownClient,
} from './rules/clientRoster';

/* ============= Record Extraction ============= */

/**
 * Build a normalized invoice record from document text.
 * `sourceFile` is reduced to its base name.
 */
export function extractInvoiceRecord(
  text: string,
  sourceFile: string,
  roster: ClientRoster
): InvoiceRecord {
  const fields = extractInvoiceFields(text);
  const client = resolveClient(text, roster);
  const services = extractServices(text, roster);

  return {
    ...fields,
    ...client,
    services,
    sourceFile: path.basename(sourceFile),
    fullText: text,
  };
}

/**
 * Composite record id: client name and invoice number joined by "_",
 * with every space replaced by "_".
 */
export function buildRecordId(clientName: string, invoiceNumber: string): string {
  return `${clientName}_${invoiceNumber}`.replace(/ /g, '_');
}

/** Id of a manually entered client record (no invoices) */
export function buildManualRecordId(clientName: string): string {
  return `${clientName}_manual`.replace(/ /g, '_');
}
