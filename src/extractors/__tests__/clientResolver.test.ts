import { describe, it, expect } from 'vitest';
import { cleanClientName, resolveClient } from '../clientResolver';
import { EMPTY_ROSTER, loadClientRoster, type ClientRoster } from '../rules/clientRoster';

const roster = loadClientRoster();

/* ============= Known-client roster ============= */

describe('resolveClient – known clients', () => {
  it('prefers a roster client over a labeled section', () => {
    const text = ['INVOICE 0042', 'Bill To: Someone Else', 'For: Park Chinois events'].join('\n');
    expect(resolveClient(text, roster)).toEqual({
      clientName: 'Park Chinois',
      clientAddress: 'unknown',
    });
  });

  it('uses the address anchor for a client that declares one', () => {
    const text = [
      'ALR Music Ltd',
      'Accounts Department',
      '36 Lexington Street',
      'W1X 9ZZ',
      'Invoice 7',
    ].join('\n');
    expect(resolveClient(text, roster)).toEqual({
      clientName: 'ALR Music Ltd',
      clientAddress: '36 Lexington Street\nW1X 9ZZ',
    });
  });

  it('falls back to the configured address when none is found', () => {
    const text = 'Payment from ALR Music Ltd\nThank you';
    expect(resolveClient(text, roster)).toEqual({
      clientName: 'ALR Music Ltd',
      clientAddress: '36 Lexington Street London',
    });
  });
});

/* ============= Address search ============= */

describe('resolveClient – address search around a roster client', () => {
  const filler = (n: number): string[] => Array.from({ length: n }, () => 'Crew arrival notes');

  it('collects address lines within ten lines of the name', () => {
    const text = ['Sky Garden', 'Events team', 'Booking ref SG-88', 'London EC3M 8AF', 'Thank you'].join('\n');
    expect(resolveClient(text, roster)).toEqual({
      clientName: 'Sky Garden',
      clientAddress: 'London EC3M 8AF',
    });
  });

  it('excludes the line exactly ten lines below the name', () => {
    const text = ['Sky Garden', ...filler(4), 'EC3M 8AF', ...filler(4), 'Manchester M1 1AE'].join('\n');
    expect(resolveClient(text, roster)).toEqual({
      clientName: 'Sky Garden',
      clientAddress: 'EC3M 8AF',
    });
  });

  it('falls back to the first address-like line anywhere in the document', () => {
    const text = ['Sky Garden', ...filler(11), 'London EC3M 8AF', 'Manchester M1 1AE'].join('\n');
    expect(resolveClient(text, roster)).toEqual({
      clientName: 'Sky Garden',
      clientAddress: 'London EC3M 8AF',
    });
  });
});

/* ============= Labeled section ============= */

describe('resolveClient – labeled section', () => {
  it('takes the name after "Bill To" and the following lines as address', () => {
    const text = [
      'Invoice Number: INV-2024-07',
      'Date: 14/03/2024',
      'Bill To: Acme Ltd',
      '10 High Street',
      'Description',
      'Piano performance £250.00',
    ].join('\n');
    expect(resolveClient(text, roster)).toEqual({
      clientName: 'Acme Ltd',
      clientAddress: '10 High Street',
    });
  });

  it('never uses the indicator line as an address', () => {
    const text = ['Client: Northwind Trading', 'Unit 4 Dock Road', 'Total 120.00'].join('\n');
    expect(resolveClient(text, roster)).toEqual({
      clientName: 'Northwind Trading',
      clientAddress: 'Unit 4 Dock Road',
    });
  });

  it('uses the first accepted line under a details header as the name', () => {
    const text = [
      'Client Details',
      'Email: someone@example.com',
      'Rivera Studio',
      '5 Canal Way',
      'Manchester',
      'Description',
    ].join('\n');
    expect(resolveClient(text, roster)).toEqual({
      clientName: 'Rivera Studio',
      clientAddress: '5 Canal Way\nManchester',
    });
  });
});

/* ============= Positional & overrides ============= */

describe('resolveClient – fallbacks', () => {
  it('guesses a name from the first lines and drops header-like address lines', () => {
    const text = ['Jane Doe Events Ltd', '12 Market Road', 'Leeds LS1 4AB', 'Invoice 15'].join('\n');
    expect(resolveClient(text, roster)).toEqual({
      clientName: 'Jane Doe Events Ltd',
      clientAddress: '12 Market Road\nLeeds LS1 4AB',
    });
  });

  it('applies literal identity overrides as a last resort', () => {
    const custom: ClientRoster = {
      ...EMPTY_ROSTER,
      identityOverrides: [{ match: 'Warner Music', clientName: 'Warner Music UK LTD' }],
    };
    expect(resolveClient('Warner Music\nTotal 50.00', custom)).toEqual({
      clientName: 'Warner Music UK LTD',
      clientAddress: 'unknown',
    });
  });

  it('returns the unresolved defaults for empty text', () => {
    expect(resolveClient('', roster)).toEqual({ clientName: '', clientAddress: 'unknown' });
  });
});

/* ============= cleanClientName ============= */

describe('cleanClientName', () => {
  it('removes tax references and embedded dates', () => {
    expect(cleanClientName('Acme Ltd UTR: 123456789 20/2/2025')).toBe('Acme Ltd');
  });

  it('removes embedded invoice number phrases', () => {
    expect(cleanClientName('Acme Invoice No: 42')).toBe('Acme');
  });
});
