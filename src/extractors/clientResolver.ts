// src/extractors/clientResolver.ts
// Client identity resolution: name and address from free invoice text.
//
// Stages, first success wins:
//   1. known-client roster (whole-word, case-insensitive)
//   2. labeled "Bill To" / "Client:" section
//   3. positional guess in the first lines of the document
//   4. literal identity overrides from the roster
// The name is then cleaned and, when no address lines were collected,
// the address is searched for around the name's line.

import {
  ADDRESS_MAX_LINE_LENGTH,
  ADDRESS_PATTERNS,
  ADDRESS_REJECT,
  ADDRESS_WINDOW,
  ANCHOR_CONTINUATION_MAX_LENGTH,
  CLIENT_INDICATORS,
  CLIENT_LABEL_NAME,
  CLIENT_LINE_EXCLUDES,
  CLIENT_SECTION_END,
  EMBEDDED_DATE,
  EMBEDDED_INVOICE_NUMBER,
  LONG_DIGIT_RUN,
  POSITIONAL_ADDRESS_LINES,
  POSITIONAL_MAX_WORDS,
  POSITIONAL_MIN_WORDS,
  POSITIONAL_SCAN_LINES,
  UTR_REFERENCE,
} from './rules/clientPatterns';
import type { ClientRoster } from './rules/clientRoster';
import {
  escapeRegExp,
  matchesAny,
  nonEmptyLines,
  UNKNOWN,
  wordCount,
  type ClientInfo,
} from './types';

/** Name found by one of the stages, with the line it was found on */
interface NameCandidate {
  name: string;
  lineIndex: number;
  addressLines: string[];
}

/* ============= Stages ============= */

function findKnownClient(text: string, lines: string[], roster: ClientRoster): NameCandidate | null {
  for (const client of roster.knownClients) {
    const pattern = new RegExp(`\\b${escapeRegExp(client.name)}\\b`, 'i');
    if (pattern.test(text)) {
      return {
        name: client.name,
        lineIndex: lines.findIndex((line) => pattern.test(line)),
        addressLines: [],
      };
    }
  }
  return null;
}

function scanLabeledSection(lines: string[]): NameCandidate | null {
  let inSection = false;
  let name = '';
  let lineIndex = -1;
  const addressLines: string[] = [];

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];

    if (matchesAny(CLIENT_INDICATORS, line)) {
      inSection = true;
      if (!name) {
        const labeled = CLIENT_LABEL_NAME.exec(line)?.[1]?.trim() ?? '';
        if (labeled) name = labeled;
        lineIndex = i;
      }
      continue;
    }

    if (!inSection) continue;

    if (matchesAny(CLIENT_SECTION_END, line)) {
      inSection = false;
      if (name) break;
      continue;
    }

    if (matchesAny(CLIENT_LINE_EXCLUDES, line)) continue;

    if (!name) {
      name = line;
      lineIndex = i;
    } else if (line !== name) {
      addressLines.push(line);
    }
  }

  return name ? { name, lineIndex, addressLines } : null;
}

function guessFromPosition(lines: string[]): NameCandidate | null {
  const head = lines.slice(0, POSITIONAL_SCAN_LINES);
  for (let i = 0; i < head.length; i++) {
    const line = head[i];
    if (matchesAny(CLIENT_LINE_EXCLUDES, line)) continue;

    const words = wordCount(line);
    if (words < POSITIONAL_MIN_WORDS || words > POSITIONAL_MAX_WORDS) continue;
    if (LONG_DIGIT_RUN.test(line)) continue;

    const addressLines = lines
      .slice(i + 1, i + 1 + POSITIONAL_ADDRESS_LINES)
      .filter((next) => next !== line);
    return { name: line, lineIndex: i, addressLines };
  }
  return null;
}

function applyIdentityOverrides(
  text: string,
  lines: string[],
  roster: ClientRoster
): NameCandidate | null {
  for (const override of roster.identityOverrides) {
    if (text.includes(override.match)) {
      return {
        name: override.clientName,
        lineIndex: lines.findIndex((line) => line.includes(override.match)),
        addressLines: [],
      };
    }
  }
  return null;
}

/* ============= Cleanup ============= */

export function cleanClientName(name: string): string {
  let cleaned = name.replace(UTR_REFERENCE, '').trim();
  cleaned = cleaned.replace(EMBEDDED_DATE, '').trim();
  cleaned = cleaned.replace(EMBEDDED_INVOICE_NUMBER, '').trim();
  return cleaned;
}

function looksLikeAddress(line: string): boolean {
  return line.length < ADDRESS_MAX_LINE_LENGTH && matchesAny(ADDRESS_PATTERNS, line);
}

function findAddressLines(
  name: string,
  lineIndex: number,
  lines: string[],
  roster: ClientRoster
): string[] {
  const found: string[] = [];
  const anchored = roster.knownClients.find((c) => c.addressAnchor && name.includes(c.name));

  if (anchored?.addressAnchor) {
    const anchor = anchored.addressAnchor;
    const at = lines.findIndex((line) => line.includes(anchor));
    if (at >= 0) {
      found.push(lines[at]);
      const next = lines[at + 1];
      if (next !== undefined && next.length < ANCHOR_CONTINUATION_MAX_LENGTH) {
        found.push(next);
      }
    }
  } else {
    const start = Math.max(0, lineIndex - ADDRESS_WINDOW);
    const end = Math.min(lines.length, lineIndex + ADDRESS_WINDOW);
    for (let i = start; i < end; i++) {
      if (i !== lineIndex && looksLikeAddress(lines[i])) found.push(lines[i]);
    }
  }

  if (found.length === 0) {
    const first = lines.find((line, i) => i !== lineIndex && looksLikeAddress(line));
    if (first !== undefined) found.push(first);
  }

  return found;
}

function finalizeAddress(name: string, candidates: string[], roster: ClientRoster): string {
  const kept = candidates
    .map((line) => line.replace(UTR_REFERENCE, '').trim())
    .filter((line) => !ADDRESS_REJECT.test(line));

  if (kept.length === 0 && name) {
    const fallback = roster.knownClients.find((c) => c.fallbackAddress && name.includes(c.name));
    if (fallback?.fallbackAddress) kept.push(fallback.fallbackAddress);
  }

  return kept.length > 0 ? kept.join('\n') : UNKNOWN;
}

/* ============= Entry Point ============= */

/**
 * Resolve the client's name and address.
 * `clientName` is empty and `clientAddress` is "unknown" when unresolved.
 */
export function resolveClient(text: string, roster: ClientRoster): ClientInfo {
  const lines = nonEmptyLines(text);

  const candidate =
    findKnownClient(text, lines, roster) ??
    scanLabeledSection(lines) ??
    guessFromPosition(lines) ??
    applyIdentityOverrides(text, lines, roster);

  if (!candidate) {
    return { clientName: '', clientAddress: UNKNOWN };
  }

  const name = cleanClientName(candidate.name);
  let addressLines = candidate.addressLines;

  if (name && candidate.lineIndex >= 0 && addressLines.length === 0) {
    addressLines = findAddressLines(name, candidate.lineIndex, lines, roster);
  }

  return {
    clientName: name,
    clientAddress: finalizeAddress(name, addressLines, roster),
  };
}
