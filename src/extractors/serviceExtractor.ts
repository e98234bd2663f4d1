// src/extractors/serviceExtractor.ts
// Billable service line extraction.
//
// Pass 1 reads the line-item section (between a "Description"/"Item" header
// and a "Total"/"Thank you" footer). Pass 2 runs only when pass 1 finds
// nothing and scans every line for event-like descriptions with a price.

import type { ClientRoster } from './rules/clientRoster';
import {
  buildServicePatterns,
  CURRENCY_AMOUNT,
  DECIMAL_IN_TEXT,
  DOTTED_DATE_IN_TEXT,
  INVOICE_NUMBER_ONLY,
  LEADING_DOTTED_DATE,
  MAX_NAME_WORDS,
  MAX_SERVICE_PRICE,
  MIN_NAME_LENGTH,
  MIN_SERVICE_PRICE,
  PRICE_RULES,
  SECTION_END,
  SECTION_START,
  SERVICE_EXCLUDES,
  SHORT_DATE_IN_TEXT,
  SHORT_DECIMAL_PRICE,
  TOTAL_LIKE,
  TWO_DIGIT_DECIMAL_PRICE,
  YEAR_PRICE,
  type PriceMatch,
} from './rules/servicePatterns';
import { firstMatch, matchesAny, nonEmptyLines, wordCount, type ServiceLine } from './types';

type ServiceContext = Pick<ClientRoster, 'venueKeywords' | 'issuerDetails'>;

/* ============= Validation ============= */

function scrubAmounts(value: string): string {
  return value.replace(CURRENCY_AMOUNT, '').trim();
}

function mentionsIssuer(desc: string, issuerDetails: readonly string[]): boolean {
  const lower = desc.toLowerCase();
  return issuerDetails.some((detail) => lower.includes(detail.toLowerCase()));
}

/** Rejections shared by both passes */
function isRejectedDescription(desc: string, issuerDetails: readonly string[]): boolean {
  if (matchesAny(SERVICE_EXCLUDES, desc)) return true;
  if (INVOICE_NUMBER_ONLY.test(desc)) return true;
  if (desc.length < MIN_NAME_LENGTH || wordCount(desc) > MAX_NAME_WORDS) return true;
  return mentionsIssuer(desc, issuerDetails);
}

/**
 * True when the "price" is more likely a year or a date fragment,
 * e.g. "28.04" taken from "28.04.23 - Trio - Venue".
 */
export function looksLikeMisreadDate(price: string, desc: string): boolean {
  if (YEAR_PRICE.test(price)) return true;
  if (SHORT_DECIMAL_PRICE.test(price)) {
    if (Number(price) < 100) return true;
    if (DECIMAL_IN_TEXT.test(desc)) return true;
  }
  if (TWO_DIGIT_DECIMAL_PRICE.test(price)) {
    if (DOTTED_DATE_IN_TEXT.test(desc) || SHORT_DATE_IN_TEXT.test(desc)) return true;
    if (desc.startsWith(`${price}.`) || LEADING_DOTTED_DATE.test(desc)) return true;
  }
  return desc.startsWith(price) || desc.endsWith(price);
}

function inPriceRange(amount: string): boolean {
  const value = Number(amount);
  return Number.isFinite(value) && value >= MIN_SERVICE_PRICE && value <= MAX_SERVICE_PRICE;
}

function toServiceLine(desc: string, price: PriceMatch): ServiceLine {
  return { serviceName: desc, servicePrice: `${price.symbol}${price.amount}` };
}

/* ============= Passes ============= */

function structuredPass(lines: string[], ctx: ServiceContext): ServiceLine[] {
  const services: ServiceLine[] = [];
  const seen = new Set<string>();
  let inSection = false;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];

    if (!inSection) {
      // The header line itself is skipped
      if (matchesAny(SECTION_START, line)) inSection = true;
      continue;
    }

    if (matchesAny(SECTION_END, line)) {
      inSection = false;
      continue;
    }

    const hit = firstMatch(PRICE_RULES, line);
    if (!hit) continue;

    let desc = line.slice(0, hit.match.index).trim();
    if (!desc && i > 0) desc = lines[i - 1];
    desc = scrubAmounts(desc);

    const price = hit.value;
    if (isRejectedDescription(desc, ctx.issuerDetails)) continue;
    if (looksLikeMisreadDate(price.amount, desc)) continue;
    if (seen.has(desc) || !inPriceRange(price.amount)) continue;

    // Inside the section a positive service pattern is not required
    services.push(toServiceLine(desc, price));
    seen.add(desc);
  }

  return services;
}

function fallbackPass(lines: string[], ctx: ServiceContext, servicePatterns: RegExp[]): ServiceLine[] {
  const services: ServiceLine[] = [];
  const seen = new Set<string>();

  for (const line of lines) {
    const desc = scrubAmounts(line);
    if (isRejectedDescription(desc, ctx.issuerDetails)) continue;
    if (!matchesAny(servicePatterns, desc) || desc.length <= 3) continue;
    if (TOTAL_LIKE.test(desc)) continue;

    for (const rule of PRICE_RULES) {
      const m = rule.pattern.exec(line);
      if (!m) continue;
      const price = rule.extract(m);
      if (YEAR_PRICE.test(price.amount) || !inPriceRange(price.amount)) continue;
      if (seen.has(desc)) break;
      services.push(toServiceLine(desc, price));
      seen.add(desc);
      break;
    }
  }

  return services;
}

/* ============= Entry Point ============= */

/**
 * Billable service lines in document order, deduplicated by name.
 * Every returned price lies within [10, 2000].
 */
export function extractServices(text: string, ctx: ServiceContext): ServiceLine[] {
  const lines = nonEmptyLines(text);
  const structured = structuredPass(lines, ctx);
  if (structured.length > 0) return structured;
  return fallbackPass(lines, ctx, buildServicePatterns(ctx.venueKeywords));
}
