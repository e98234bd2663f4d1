// src/extractors/rules/servicePatterns.ts
// Pattern tables for billable service line extraction.

import { escapeRegExp, type PatternRule } from '../types';
import type { CurrencySymbol } from './fieldPatterns';

export interface PriceMatch {
  /** Numeric text as written, e.g. "250.00" or "300" */
  amount: string;
  symbol: CurrencySymbol;
}

function toSymbol(value: string | undefined): CurrencySymbol {
  return value === '$' || value === '€' ? value : '£';
}

/** Ordered price rules; a number without a symbol is priced in pounds */
export const PRICE_RULES: readonly PatternRule<PriceMatch>[] = [
  {
    label: 'symbol_prefix',
    pattern: /([£$€])\s*(\d+(?:\.\d{2})?)/,
    extract: (m) => ({ amount: m[2] ?? '', symbol: toSymbol(m[1]) }),
  },
  {
    // A symbol after the number, or a bare number ending the line
    label: 'symbol_suffix',
    pattern: /(\d+(?:\.\d{2})?)\s*(?:([£$€])|$)/,
    extract: (m) => ({ amount: m[1] ?? '', symbol: toSymbol(m[2]) }),
  },
  {
    label: 'bare',
    pattern: /(\d+(?:\.\d{2})?)/,
    extract: (m) => ({ amount: m[1] ?? '', symbol: '£' }),
  },
];

/** Currency amounts scrubbed from a candidate description */
export const CURRENCY_AMOUNT = /[£$€]\s*\d+(?:\.\d{2})?/g;

export const SECTION_START: readonly RegExp[] = [
  /description/i,
  /item/i,
  /service/i,
  /product/i,
  /work\s+performed/i,
];

export const SECTION_END: readonly RegExp[] = [
  /subtotal/i,
  /total/i,
  /balance/i,
  /amount\s+due/i,
  /payment\s+terms/i,
  /thank\s+you/i,
];

/** Descriptions matching any of these are addresses, contacts or bookkeeping text */
export const SERVICE_EXCLUDES: readonly RegExp[] = [
  /\b\d+\s+[A-Za-z\s]+(?:road|street|avenue|lane|way)\b/i,
  /\b[A-Z]{1,2}\d{1,2}[A-Z]?\s?\d[A-Z]{2}\b/i,
  /\bLondon\b/i,
  /\b07\d{9}\b/,
  /\b\d{5}\s?\d{6}\b/,
  /\S+@\S+\.\S+/,
  /invoice\s+\d+/i,
  /date|number|payment|due|total|amount|utr|account|bank|sort|code|iban|swift/i,
];

export const INVOICE_NUMBER_ONLY = /^INVOICE\s+\d+$/i;
export const TOTAL_LIKE = /total|subtotal|balance|amount\s+due/i;

/* ---------- Date-as-price guards ---------- */

export const YEAR_PRICE = /^\d{4}$/;
export const SHORT_DECIMAL_PRICE = /^\d{1,2}\.\d{2}$/;
export const TWO_DIGIT_DECIMAL_PRICE = /^\d{2}\.\d{2}$/;
export const DECIMAL_IN_TEXT = /\d{1,2}\.\d{2}/;
export const DOTTED_DATE_IN_TEXT = /\d{2}\.\d{2}(?:\.\d{2})?/;
export const SHORT_DATE_IN_TEXT = /\d{2}[.-]\d{2}[.-]\d{2}|\d{2}\/\d{2}\/\d{2}/;
export const LEADING_DOTTED_DATE = /^\d{2}\.\d{2}\.\d{2}/;

/* ---------- Positive service patterns ---------- */

const EVENT_KEYWORDS =
  /\b(?:gig|performance|recording|session|piano|quartet|trio|music|band|choir|concert|event|solo)\b/i;
const DATED_EVENT = /\d{1,2}[/\-.]\d{1,2}[/\-.]\d{2,4}\s+.*(?:gig|performance|piano|quartet|trio|band|choir)/i;

/**
 * Build the positive service patterns. Venue names come from the client roster.
 */
export function buildServicePatterns(venueKeywords: readonly string[]): RegExp[] {
  const patterns = [EVENT_KEYWORDS];
  const venues = venueKeywords.map((v) => v.trim()).filter(Boolean);
  if (venues.length > 0) {
    patterns.push(new RegExp(`\\b(?:${venues.map(escapeRegExp).join('|')})\\b`, 'i'));
  }
  patterns.push(DATED_EVENT);
  return patterns;
}

export const MIN_SERVICE_PRICE = 10;
export const MAX_SERVICE_PRICE = 2000;
export const MIN_NAME_LENGTH = 5;
export const MAX_NAME_WORDS = 10;
