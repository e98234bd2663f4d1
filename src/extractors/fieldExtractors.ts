// src/extractors/fieldExtractors.ts
// Invoice number, date and amount extraction.
//
// Each extractor is pure and total: it returns the first match of its ordered
// rule table, or "unknown".

import {
  AMOUNT_FALLBACK_KEYWORD,
  AMOUNT_FALLBACK_VALUE,
  INVOICE_AMOUNT_RULES,
  INVOICE_DATE_RULES,
  INVOICE_NUMBER_RULES,
} from './rules/fieldPatterns';
import { firstMatch, UNKNOWN, type InvoiceFields } from './types';

export function extractInvoiceNumber(text: string): string {
  return firstMatch(INVOICE_NUMBER_RULES, text)?.value ?? UNKNOWN;
}

/** Raw matched date text; the format is preserved */
export function extractInvoiceDate(text: string): string {
  return firstMatch(INVOICE_DATE_RULES, text)?.value ?? UNKNOWN;
}

/**
 * Total amount with its currency symbol. Thousands separators are removed
 * before matching, so "£1,250.00" yields "£1250.00".
 */
export function extractInvoiceAmount(text: string): string {
  const normalized = text.replace(/,/g, '');

  const hit = firstMatch(INVOICE_AMOUNT_RULES, normalized);
  if (hit) return hit.value;

  const lines = normalized.split('\n');
  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i];
    if (!AMOUNT_FALLBACK_KEYWORD.test(line)) continue;
    const m = AMOUNT_FALLBACK_VALUE.exec(line);
    if (m?.[1]) return `£${m[1]}`;
  }

  return UNKNOWN;
}

export function extractInvoiceFields(text: string): InvoiceFields {
  return {
    invoiceNumber: extractInvoiceNumber(text),
    invoiceDate: extractInvoiceDate(text),
    invoiceAmount: extractInvoiceAmount(text),
  };
}
