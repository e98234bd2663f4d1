// src/extractors/rules/clientPatterns.ts
// Pattern tables for client identity resolution.

/** Lines that open a client details block */
export const CLIENT_INDICATORS: readonly RegExp[] = [
  /bill\s+to/i,
  /invoice\s+to/i,
  /client\s*:/i,
  /client\s*name/i,
  /customer\s*:/i,
  /recipient\s*:/i,
  /billed\s+to/i,
  /client\s+details/i,
  /customer\s+details/i,
];

/** Text following one of these labels on an indicator line is the client name */
export const CLIENT_LABEL_NAME =
  /(?:bill(?:ed)?\s+to|invoice\s+to|client\s*name|client\s*:|customer\s*:|recipient\s*:)\s*:?\s*(.*)/i;

/** Lines that close a client details block */
export const CLIENT_SECTION_END: readonly RegExp[] = [
  /invoice\s+details/i,
  /description/i,
  /item/i,
  /quantity/i,
  /amount/i,
  /price/i,
  /total/i,
  /payment\s+terms/i,
  /due\s+date/i,
  /service/i,
];

/** Header-like lines that are never a client name */
export const CLIENT_LINE_EXCLUDES: readonly RegExp[] = [
  /^invoice\b/i,
  /^bill\s+to/i,
  /^date/i,
  /^number/i,
  /^payment\s+terms/i,
  /^due\s+date/i,
  /^utr/i,
  /^email/i,
  /^phone/i,
  /^tel/i,
  /^fax/i,
  /^vat/i,
  /^tax/i,
];

/* ---------- Name cleanup ---------- */

export const UTR_REFERENCE = /\b(?:UTR|utr)[\s:-]+(?:\d{9,10}|XXXXXXXXX|[0-9X]{9,10})\b/g;
export const EMBEDDED_DATE = /\d{1,2}\/\d{1,2}\/\d{2,4}/g;
export const EMBEDDED_INVOICE_NUMBER = /invoice\s*(?:#|number|num|no|no\.)?[:;]?\s*\d+/gi;

/** A name-like line has no run of five or more digits */
export const LONG_DIGIT_RUN = /\d{5,}/;

/* ---------- Address detection ---------- */

export const ADDRESS_PATTERNS: readonly RegExp[] = [
  /\b\d+\s+[A-Za-z\s]+(?:street|st|road|rd|avenue|ave|lane|ln|drive|dr|way|place|pl|court|ct)\b/i,
  /\b[A-Z]{1,2}\d{1,2}[A-Z]?\s?\d[A-Z]{2}\b/i,
  /\b(?:London|Manchester|Birmingham|Leeds|Glasgow|Edinburgh|Liverpool|Bristol|Sheffield|Newcastle|Nottingham|Cardiff|Belfast)\b/i,
];

/** Mis-captured header lines dropped from the final address */
export const ADDRESS_REJECT =
  /invoice|date|number|payment|due|total|amount|service|description|quantity|price|utr/i;

export const ADDRESS_WINDOW = 10;
export const ADDRESS_MAX_LINE_LENGTH = 100;
export const ANCHOR_CONTINUATION_MAX_LENGTH = 30;
export const POSITIONAL_SCAN_LINES = 10;
export const POSITIONAL_MIN_WORDS = 3;
export const POSITIONAL_MAX_WORDS = 7;
export const POSITIONAL_ADDRESS_LINES = 3;
