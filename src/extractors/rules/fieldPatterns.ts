// src/extractors/rules/fieldPatterns.ts
// Ordered pattern tables for invoice number, date and amount.
// Order is priority: the first rule that matches anywhere in the text wins.

import { group1, type PatternRule } from '../types';

/* ============= Invoice Number ============= */

const INVOICE_ID = String.raw`([A-Za-z0-9][\w\-./]+)`;

function numberRule(label: string, prefix: string): PatternRule<string> {
  return {
    label,
    pattern: new RegExp(prefix + INVOICE_ID, 'i'),
    extract: group1,
  };
}

export const INVOICE_NUMBER_RULES: readonly PatternRule<string>[] = [
  numberRule('labeled', String.raw`invoice\s*(?:#|number|num|no|no\.)\s*[:;]?\s*`),
  numberRule('inv_labeled_spaced', String.raw`(?:invoice|inv)(?:\s*#|\s+number|\s+num|\s+no|\s+no\.)?\s*[:;]?\s*`),
  numberRule('inv_labeled', String.raw`(?:invoice|inv)(?:\s*#|\s+number|\s+num|\s+no|\s+no\.)?[:;]?\s*`),
  numberRule('inv_loose', String.raw`(?:invoice|inv)[\s#:]*`),
  numberRule('bare_prefix', String.raw`(?:#|number|num|no|no\.)[:;]?\s*`),
  numberRule('invoice_optional_label', String.raw`invoice\s*(?:number|num|no|no\.)?[:;]?\s*`),
];

/* ============= Invoice Date ============= */

const NUMERIC_DATE = String.raw`(\d{1,2}[/-]\d{1,2}[/-]\d{2,4})`;
const MONTH_NAME_DATE = String.raw`(\d{1,2}\s+(?:Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)[a-z]*\.?\s+\d{2,4})`;

const DATE_LABELS: ReadonlyArray<[string, string]> = [
  ['invoice_date', String.raw`(?:invoice|payment)\s*date\s*[:;]?\s*`],
  ['date_of', String.raw`date\s*(?:of\s*invoice|issued|created)?\s*[:;]?\s*`],
  ['dated', String.raw`dated?\s*[:;]?\s*`],
];

function labeledDateRules(kind: string, datePattern: string): PatternRule<string>[] {
  return DATE_LABELS.map(([label, prefix]) => ({
    label: `${label}_${kind}`,
    pattern: new RegExp(prefix + datePattern, 'i'),
    extract: group1,
  }));
}

export const INVOICE_DATE_RULES: readonly PatternRule<string>[] = [
  ...labeledDateRules('numeric', NUMERIC_DATE),
  ...labeledDateRules('month_name', MONTH_NAME_DATE),
  // Bare dates are case-sensitive
  { label: 'bare_numeric', pattern: new RegExp(NUMERIC_DATE), extract: group1 },
  { label: 'bare_month_name', pattern: new RegExp(MONTH_NAME_DATE), extract: group1 },
];

/* ============= Invoice Amount ============= */

export type CurrencySymbol = '£' | '$' | '€';

interface CurrencyForm {
  symbol: CurrencySymbol;
  /** Regex source matching the symbol or its ISO code */
  marker: string;
  /** Regex source matching the symbol alone */
  literal: string;
}

const CURRENCIES: readonly CurrencyForm[] = [
  { symbol: '£', marker: '(?:£|GBP)', literal: '£' },
  { symbol: '$', marker: String.raw`(?:\$|USD)`, literal: String.raw`\$` },
  { symbol: '€', marker: '(?:€|EUR)', literal: '€' },
];

const TOTAL_LABEL = String.raw`(?:total|amount|sum|invoice\s*total)\s*(?:due|payable|:)?\s*`;

/** Prefix the implied symbol when the captured amount does not carry it */
function withSymbol(symbol: CurrencySymbol): (match: RegExpExecArray) => string {
  return (match) => {
    const amount = group1(match);
    return amount.includes(symbol) ? amount : `${symbol}${amount}`;
  };
}

function currencyRules(form: CurrencyForm): PatternRule<string>[] {
  const extract = withSymbol(form.symbol);
  return [
    {
      label: `labeled_${form.symbol}`,
      pattern: new RegExp(`${TOTAL_LABEL}${form.marker}?\\s*(${form.literal}?\\s*\\d+\\.\\d{2})`, 'i'),
      extract,
    },
    {
      label: `symbol_${form.symbol}`,
      pattern: new RegExp(`${form.marker}\\s*(\\d+\\.\\d{2})`, 'i'),
      extract,
    },
    {
      label: `line_start_${form.symbol}`,
      pattern: new RegExp(`(?:^|\\n)${form.marker}\\s*(\\d+\\.\\d{2})(?:\\s|$)`),
      extract,
    },
  ];
}

/** Applied after thousands-separator commas have been stripped */
export const INVOICE_AMOUNT_RULES: readonly PatternRule<string>[] = [
  ...CURRENCIES.flatMap(currencyRules),
  {
    label: 'labeled_bare',
    pattern: new RegExp(`${TOTAL_LABEL}(\\d+\\.\\d{2})`, 'i'),
    extract: withSymbol('£'),
  },
];

/** Bottom-up fallback: a line mentioning a total, then its first decimal amount */
export const AMOUNT_FALLBACK_KEYWORD = /total|amount|sum|due|payable/i;
export const AMOUNT_FALLBACK_VALUE = /(\d+\.\d{2})/;
