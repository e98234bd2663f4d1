// src/extractors/rules/clientRoster.ts
// Known-client roster: recurring clients, identity overrides, venue names
// and the issuer's own details. Loaded from JSON and validated on load.

import fs from 'node:fs';
import { config } from '../../config';
import { createLogger } from '../../observability';

const log = createLogger('extractors/clientRoster');

/* ============= Types ============= */

export interface KnownClient {
  name: string;
  /** Used when no address can be found for a client whose name contains `name` */
  fallbackAddress?: string;
  /** Distinctive fragment of the client's address line */
  addressAnchor?: string;
}

export interface IdentityOverride {
  /** Case-sensitive literal searched for in the document */
  match: string;
  clientName: string;
}

export interface ClientRoster {
  knownClients: KnownClient[];
  identityOverrides: IdentityOverride[];
  venueKeywords: string[];
  /** Issuer's own address/phone/email fragments */
  issuerDetails: string[];
}

export class ClientRosterError extends Error {
  constructor(source: string, reason: string) {
    super(`Invalid client roster (${source}): ${reason}`);
    this.name = 'ClientRosterError';
  }
}

export const EMPTY_ROSTER: ClientRoster = {
  knownClients: [],
  identityOverrides: [],
  venueKeywords: [],
  issuerDetails: [],
};

/* ============= Validation ============= */

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

function isOptionalString(value: unknown): value is string | undefined {
  return value === undefined || typeof value === 'string';
}

function readStringList(raw: Record<string, unknown>, key: string, source: string): string[] {
  const value = raw[key];
  if (value === undefined) return [];
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new ClientRosterError(source, `"${key}" must be an array of strings`);
  }
  return value;
}

function readKnownClients(raw: Record<string, unknown>, source: string): KnownClient[] {
  const value = raw.knownClients;
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    throw new ClientRosterError(source, '"knownClients" must be an array');
  }
  return value.map((entry, i) => {
    if (
      !isRecord(entry) ||
      !isNonEmptyString(entry.name) ||
      !isOptionalString(entry.fallbackAddress) ||
      !isOptionalString(entry.addressAnchor)
    ) {
      throw new ClientRosterError(source, `knownClients[${i}] must have a non-empty "name"`);
    }
    const client: KnownClient = { name: entry.name };
    if (entry.fallbackAddress) client.fallbackAddress = entry.fallbackAddress;
    if (entry.addressAnchor) client.addressAnchor = entry.addressAnchor;
    return client;
  });
}

function readOverrides(raw: Record<string, unknown>, source: string): IdentityOverride[] {
  const value = raw.identityOverrides;
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    throw new ClientRosterError(source, '"identityOverrides" must be an array');
  }
  return value.map((entry, i) => {
    if (!isRecord(entry) || !isNonEmptyString(entry.match) || !isNonEmptyString(entry.clientName)) {
      throw new ClientRosterError(
        source,
        `identityOverrides[${i}] must have non-empty "match" and "clientName"`
      );
    }
    return { match: entry.match, clientName: entry.clientName };
  });
}

/**
 * Validate a parsed roster document.
 * @throws ClientRosterError when the shape is wrong
 */
export function parseClientRoster(raw: unknown, source = 'inline'): ClientRoster {
  if (!isRecord(raw)) {
    throw new ClientRosterError(source, 'expected a JSON object');
  }
  return {
    knownClients: readKnownClients(raw, source),
    identityOverrides: readOverrides(raw, source),
    venueKeywords: readStringList(raw, 'venueKeywords', source),
    issuerDetails: readStringList(raw, 'issuerDetails', source).filter((d) => d.trim()),
  };
}

/**
 * Load and validate a roster file. Defaults to the configured roster path.
 * @throws ClientRosterError when the file is unreadable or malformed
 */
export function loadClientRoster(filePath: string = config.roster.path): ClientRoster {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf8');
  } catch (err) {
    throw new ClientRosterError(filePath, err instanceof Error ? err.message : String(err));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ClientRosterError(filePath, `not valid JSON (${err instanceof Error ? err.message : String(err)})`);
  }

  const roster = parseClientRoster(parsed, filePath);
  log.debug(
    { filePath, knownClients: roster.knownClients.length, overrides: roster.identityOverrides.length },
    'Client roster loaded'
  );
  return roster;
}
