// src/extractors/types.ts
// Invoice extraction: shared types, sentinels and rule helpers

/* ============= Sentinels ============= */

/** Field was not resolved from the document text */
export const UNKNOWN = 'unknown';

/** Field does not apply (manually entered client without invoices) */
export const NOT_APPLICABLE = 'N/A';

/* ============= Extracted Shapes ============= */

export interface ServiceLine {
  serviceName: string;
  /** Amount with its currency symbol prefix, e.g. "£250.00" */
  servicePrice: string;
}

export interface InvoiceFields {
  invoiceNumber: string;
  invoiceDate: string;
  invoiceAmount: string;
}

export interface ClientInfo {
  /** Empty string when unresolved */
  clientName: string;
  /** Newline-joined address lines, or "unknown" */
  clientAddress: string;
}

/**
 * Normalized structured representation of one invoice.
 */
export interface InvoiceRecord extends InvoiceFields, ClientInfo {
  services: ServiceLine[];
  sourceFile: string;
  fullText: string;
}

/* ============= Persisted / API Shape ============= */

/** Scalar values a stored record's metadata may hold */
export type MetadataValue = string | number | boolean;

/** Serialized service line (persisted and API form) */
export interface ServiceLineJson {
  service_name: string;
  service_price: string;
}

/**
 * Output record schema. Also the persisted metadata schema, except that
 * `services` is JSON text when persisted.
 */
export interface InvoiceRecordJson {
  client_name: string;
  client_address: string;
  invoice_number: string;
  invoice_date: string;
  invoice_amount: string;
  services: ServiceLineJson[];
  source_file: string;
  /** Contact fields and other manually entered values */
  [extra: string]: MetadataValue | ServiceLineJson[];
}

/* ============= Rule Tables ============= */

/**
 * One entry of an ordered pattern table. Tables are evaluated in order and
 * the first rule whose pattern matches anywhere in the input wins.
 */
export interface PatternRule<T> {
  /** Short machine-readable label, used in debug logs and tests */
  label: string;
  pattern: RegExp;
  extract: (match: RegExpExecArray) => T;
}

/**
 * Evaluate an ordered rule table against `input`.
 * Returns the first rule's extraction, or undefined when no rule matches.
 */
export function firstMatch<T>(
  rules: readonly PatternRule<T>[],
  input: string
): { rule: PatternRule<T>; value: T; match: RegExpExecArray } | undefined {
  for (const rule of rules) {
    const match = rule.pattern.exec(input);
    if (match) {
      return { rule, value: rule.extract(match), match };
    }
  }
  return undefined;
}

/** True when any pattern in the list matches the input */
export function matchesAny(patterns: readonly RegExp[], input: string): boolean {
  return patterns.some((p) => p.test(input));
}

/** First capture group, trimmed. Empty string when the group did not participate. */
export function group1(match: RegExpExecArray): string {
  return (match[1] ?? '').trim();
}

/** Split text into trimmed, non-empty lines */
export function nonEmptyLines(text: string): string[] {
  return text
    .trim()
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/** Whitespace-separated word count (empty string has zero words) */
export function wordCount(value: string): number {
  const trimmed = value.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

/** Escape a literal string for use inside a RegExp */
export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
