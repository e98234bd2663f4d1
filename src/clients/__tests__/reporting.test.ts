import { describe, it, expect } from 'vitest';
import { clientsToCsv, formatInvoiceSummary } from '../reporting';

/* ============= formatInvoiceSummary ============= */

describe('formatInvoiceSummary', () => {
  it('lists the fields and each service', () => {
    expect(
      formatInvoiceSummary({
        client_name: 'Acme Ltd',
        client_address: '10 High Street',
        invoice_number: 'INV-2024-07',
        invoice_date: '14/03/2024',
        invoice_amount: '£250.00',
        services: [{ service_name: 'Piano performance', service_price: '£250.00' }],
        source_file: 'acme.pdf',
      })
    ).toEqual([
      'Client: Acme Ltd',
      'Address: 10 High Street',
      'Invoice #: INV-2024-07',
      'Date: 14/03/2024',
      'Amount: £250.00',
      'Services:',
      '  - Piano performance: £250.00',
    ]);
  });

  it('omits the services block when there are none', () => {
    const lines = formatInvoiceSummary({
      client_name: '',
      client_address: 'unknown',
      invoice_number: 'N/A',
      invoice_date: 'N/A',
      invoice_amount: 'N/A',
      services: [],
      source_file: 'manual_entry',
    });
    expect(lines[0]).toBe('Client: unknown');
    expect(lines).toHaveLength(5);
  });
});

/* ============= clientsToCsv ============= */

describe('clientsToCsv', () => {
  it('writes a header and one row per client', () => {
    expect(
      clientsToCsv([
        { clientName: 'Acme Ltd', address: '10 High Street\nLeeds', invoiceCount: 2, latestInvoice: '02/01/2025' },
        { clientName: 'Beta "B" Events', address: 'No address available', invoiceCount: 1, latestInvoice: 'N/A' },
      ])
    ).toBe(
      'Client Name,Address,Invoice Count,Latest Invoice\n' +
        'Acme Ltd,"10 High Street, Leeds",2,02/01/2025\n' +
        '"Beta ""B"" Events",No address available,1,N/A\n'
    );
  });

  it('writes only the header for an empty listing', () => {
    expect(clientsToCsv([])).toBe('Client Name,Address,Invoice Count,Latest Invoice\n');
  });
});
