// src/clients/reporting.ts
// Plain-text and CSV renderings of stored records for the operator scripts.

import type { InvoiceRecordJson } from '../extractors/types';
import type { ClientSummary } from './clientDirectory';

export const CLIENT_CSV_HEADERS = ['Client Name', 'Address', 'Invoice Count', 'Latest Invoice'] as const;

/**
 * Field-per-line summary of one record, services indented below.
 */
export function formatInvoiceSummary(record: InvoiceRecordJson): string[] {
  const lines = [
    `Client: ${record.client_name || 'unknown'}`,
    `Address: ${record.client_address}`,
    `Invoice #: ${record.invoice_number}`,
    `Date: ${record.invoice_date}`,
    `Amount: ${record.invoice_amount}`,
  ];
  if (record.services.length > 0) {
    lines.push('Services:');
    for (const s of record.services) {
      lines.push(`  - ${s.service_name}: ${s.service_price}`);
    }
  }
  return lines;
}

/* ---------- CSV ---------- */

// Quote values containing separators, quotes or newlines
function escapeCsv(v: string): string {
  if (v.includes(',') || v.includes('"') || v.includes('\n')) {
    return `"${v.replace(/"/g, '""')}"`;
  }
  return v;
}

/** Client listing as CSV; multi-line addresses are joined with ", " */
export function clientsToCsv(clients: readonly ClientSummary[]): string {
  const rows = clients.map((c) =>
    [c.clientName, c.address.replace(/\n/g, ', '), String(c.invoiceCount), c.latestInvoice]
      .map(escapeCsv)
      .join(',')
  );
  return [CLIENT_CSV_HEADERS.join(','), ...rows].join('\n') + '\n';
}
