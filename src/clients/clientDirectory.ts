// src/clients/clientDirectory.ts
// Client views over the invoice store: look up, update and add clients,
// list every invoice, and summarise the distinct clients.
//
// A client is the set of records sharing a client_name. Lookups go through
// the fuzzy matcher and act on the top-ranked record.

import type { DbAdapter } from '../db';
import type { EmbeddingProvider } from '../embeddings';
import { buildManualRecordId } from '../extractors';
import {
  escapeRegExp,
  NOT_APPLICABLE,
  UNKNOWN,
  type InvoiceRecordJson,
  type MetadataValue,
  type ServiceLineJson,
} from '../extractors/types';
import { searchInvoices, type InvoiceMatch } from '../knowledge/fuzzyMatch';
import { createLogger } from '../observability';
import {
  isCoreField,
  metadataToJson,
  type InvoiceMetadata,
  type InvoicesStore,
} from '../store/invoices';
import type { InvoiceVectorIndex } from '../store/invoiceVectors';

const log = createLogger('clients/clientDirectory');

export const MANUAL_SOURCE_FILE = 'manual_entry';
export const NO_ADDRESS = 'No address available';

/* ============= Types ============= */

export interface ClientDirectoryDeps {
  db: DbAdapter;
  store: InvoicesStore;
  vectors: InvoiceVectorIndex;
  embeddings: EmbeddingProvider;
  /** Issuer's own address/phone/email fragments, kept out of listings */
  issuerDetails?: readonly string[];
}

/** Caller-supplied field values, e.g. { email: 'a@b.test', phone: '0100' } */
export type FieldUpdates = Record<string, unknown>;

export interface ClientFailure {
  success: false;
  message: string;
}

export interface UpdateClientSuccess {
  success: true;
  message: string;
  clientName: string;
  updatedFields: FieldUpdates;
}

export interface AddClientSuccess {
  success: true;
  message: string;
  clientName: string;
  clientInfo: FieldUpdates;
}

export type UpdateClientResult = UpdateClientSuccess | ClientFailure;

/** An existing client is updated instead of added */
export type AddClientResult = AddClientSuccess | UpdateClientResult;

export type ClientDetailsResult =
  | { success: true; message: string; clientInfo: InvoiceRecordJson }
  | ClientFailure;

export interface ClientSummary {
  clientName: string;
  address: string;
  invoiceCount: number;
  latestInvoice: string;
}

/* ============= Value Coercion ============= */

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Accepts snake_case or camelCase service entries */
function toServiceLineJson(entry: unknown): ServiceLineJson | null {
  if (!isRecord(entry)) return null;
  const name = entry.service_name ?? entry.serviceName;
  const price = entry.service_price ?? entry.servicePrice;
  if (typeof name !== 'string' || typeof price !== 'string') return null;
  return { service_name: name, service_price: price };
}

/**
 * Coerce one caller-supplied value into a storable metadata value.
 * A services list becomes JSON text.
 */
export function coerceFieldValue(key: string, value: unknown): MetadataValue {
  if (key === 'services' && Array.isArray(value)) {
    const lines = value
      .map(toServiceLineJson)
      .filter((line): line is ServiceLineJson => line !== null);
    return JSON.stringify(lines);
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'object' && value !== null) {
    return JSON.stringify(value);
  }
  return String(value);
}

/** Merge updates into a copy of `metadata`; core fields are stored as text */
export function mergeMetadata(metadata: InvoiceMetadata, updates: FieldUpdates): InvoiceMetadata {
  const merged: InvoiceMetadata = { ...metadata };
  for (const [key, value] of Object.entries(updates)) {
    const coerced = coerceFieldValue(key, value);
    merged[key] = isCoreField(key) ? String(coerced) : coerced;
  }
  return merged;
}

/** "address" is accepted as an alias of client_address */
function normalizeAddressAlias(fields: FieldUpdates): FieldUpdates {
  if (!('address' in fields)) return fields;
  const { address, ...rest } = fields;
  return { ...rest, client_address: address };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/* ============= Update ============= */

async function applyUpdates(
  deps: ClientDirectoryDeps,
  match: InvoiceMatch,
  updates: FieldUpdates
): Promise<UpdateClientResult> {
  const clientName = match.stored.metadata.client_name;
  try {
    const merged = mergeMetadata(match.stored.metadata, updates);
    const written = await deps.store.replaceMetadata(match.id, merged);
    if (!written) {
      return { success: false, message: `Could not find record for client: ${clientName}` };
    }
    log.info({ id: match.id, fields: Object.keys(updates) }, 'Updated client');
    return {
      success: true,
      message: `Successfully updated client: ${clientName}`,
      clientName,
      updatedFields: updates,
    };
  } catch (err) {
    log.error({ err, id: match.id }, 'Failed to update client');
    return { success: false, message: `Error updating client in database: ${errorMessage(err)}` };
  }
}

/**
 * Merge `updates` into the best-matching client's record (last write wins).
 */
export async function updateClientInfo(
  deps: ClientDirectoryDeps,
  clientName: string,
  updates: FieldUpdates
): Promise<UpdateClientResult> {
  const [best] = await searchInvoices(deps.store, clientName, 1);
  if (!best) {
    return { success: false, message: `No client found with name: ${clientName}` };
  }
  return applyUpdates(deps, best, normalizeAddressAlias(updates));
}

/* ============= Add ============= */

function manualDocument(clientName: string, fields: FieldUpdates): string {
  let doc = `Client: ${clientName}\n`;
  if ('address' in fields) doc += `Address: ${String(fields.address)}\n`;
  if ('email' in fields) doc += `Email: ${String(fields.email)}\n`;
  return doc;
}

/**
 * Add a client without invoices. An existing client (by fuzzy match) is
 * updated with `fields` instead.
 */
export async function addClient(
  deps: ClientDirectoryDeps,
  clientName: string,
  fields: FieldUpdates
): Promise<AddClientResult> {
  const [existing] = await searchInvoices(deps.store, clientName, 1);
  if (existing) {
    log.info({ clientName, matched: existing.stored.metadata.client_name }, 'Client exists, updating');
    return applyUpdates(deps, existing, normalizeAddressAlias(fields));
  }

  const { address, ...rest } = fields;
  const base: InvoiceMetadata = {
    client_name: clientName,
    client_address: address === undefined ? '' : String(address),
    invoice_number: NOT_APPLICABLE,
    invoice_date: NOT_APPLICABLE,
    invoice_amount: NOT_APPLICABLE,
    services: '[]',
    source_file: MANUAL_SOURCE_FILE,
  };
  const metadata = mergeMetadata(base, rest);
  const id = buildManualRecordId(clientName);
  const document = manualDocument(clientName, fields);

  try {
    const [vector] = await deps.embeddings.embed([document]);
    await deps.db.transaction(async () => {
      await deps.store.upsert({ id, metadata, document });
      if (vector) await deps.vectors.upsert(id, vector);
    });
    log.info({ id }, 'Added client');
    return {
      success: true,
      message: `Successfully added new client: ${clientName}`,
      clientName,
      clientInfo: fields,
    };
  } catch (err) {
    log.error({ err, id }, 'Failed to add client');
    return { success: false, message: `Error adding client to database: ${errorMessage(err)}` };
  }
}

/* ============= Read Views ============= */

export async function getClientDetails(
  deps: Pick<ClientDirectoryDeps, 'store'>,
  clientName: string
): Promise<ClientDetailsResult> {
  const [best] = await searchInvoices(deps.store, clientName, 1);
  if (!best) {
    return { success: false, message: `No client found with name: ${clientName}` };
  }
  return {
    success: true,
    message: `Found client: ${best.record.client_name}`,
    clientInfo: best.record,
  };
}

/** Every stored record in API form. A read failure yields an empty list. */
export async function getAllInvoices(deps: Pick<ClientDirectoryDeps, 'store'>): Promise<InvoiceRecordJson[]> {
  try {
    const all = await deps.store.listAll();
    return all.map((s) => metadataToJson(s.metadata));
  } catch (err) {
    log.error({ err }, 'Failed to read invoices');
    return [];
  }
}

/* ============= Client Listing ============= */

const NUMERIC_ONLY = /^\d+$/;
const DATE_ONLY = /^\d{1,2}[/\-.]\d{1,2}[/\-.]\d{2,4}$/;
const NON_CLIENT_PREFIX = /^(and|as|ul\.|description|invoice|expenses|purchase|po:)/;
const STREET_PREFIX = /^\d+\s+[A-Za-z\s]+(road|street|avenue|lane|drive|way|place|court)/;
const MOBILE_NUMBER = /\b07\d{9}\b/g;
const EMAIL_ADDRESS = /\S+@\S+\.\S+/g;
const DMY_DATE = /^(\d{1,2})[/\-.](\d{1,2})[/\-.](\d{2,4})$/;

function mentionsAny(value: string, details: readonly string[]): boolean {
  const lower = value.toLowerCase();
  return details.some((d) => lower.includes(d.toLowerCase()));
}

/** False for names that are dates, numbers, addresses or header text */
export function isValidClientName(name: string, issuerDetails: readonly string[] = []): boolean {
  if (name.length < 3) return false;
  if (NUMERIC_ONLY.test(name) || DATE_ONLY.test(name)) return false;
  const lower = name.toLowerCase();
  if (NON_CLIENT_PREFIX.test(lower) || STREET_PREFIX.test(lower)) return false;
  return !mentionsAny(name, issuerDetails);
}

export function cleanClientAddress(address: string, issuerDetails: readonly string[] = []): string {
  let cleaned = address.replace(MOBILE_NUMBER, '').replace(EMAIL_ADDRESS, '');
  for (const detail of issuerDetails) {
    cleaned = cleaned.replace(new RegExp(escapeRegExp(detail), 'gi'), '');
  }
  cleaned = cleaned
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/^,\s*/, '')
    .replace(/,\s*,/g, ',');

  const lower = cleaned.toLowerCase();
  return !cleaned || lower === 'london' || lower === UNKNOWN ? NO_ADDRESS : cleaned;
}

/** Comparable [year, month, day] for D/M/Y dates; two-digit years are 20xx */
function parseDmy(value: string): [number, number, number] | null {
  const m = DMY_DATE.exec(value.trim());
  if (!m) return null;
  const year = Number(m[3]);
  return [m[3].length === 2 ? 2000 + year : year, Number(m[2]), Number(m[1])];
}

/** True when `candidate` is later than `current` */
export function isLaterInvoiceDate(candidate: string, current: string): boolean {
  const a = parseDmy(candidate);
  const b = parseDmy(current);
  if (a && b) {
    for (let i = 0; i < 3; i++) {
      if (a[i] !== b[i]) return a[i] > b[i];
    }
    return false;
  }
  if (a) return true;
  if (b) return false;
  return candidate > current;
}

/**
 * Distinct clients with their invoice count, first-seen address and latest
 * invoice date, sorted by name.
 */
export async function listClients(
  deps: Pick<ClientDirectoryDeps, 'store' | 'issuerDetails'>
): Promise<ClientSummary[]> {
  const issuerDetails = deps.issuerDetails ?? [];
  const invoices = await getAllInvoices(deps);

  const byName = new Map<string, ClientSummary>();
  for (const invoice of invoices) {
    const name = invoice.client_name.trim();
    if (!name || name === UNKNOWN) continue;

    const summary = byName.get(name);
    if (!summary) {
      byName.set(name, {
        clientName: name,
        address: invoice.client_address,
        invoiceCount: 1,
        latestInvoice: invoice.invoice_date,
      });
      continue;
    }
    summary.invoiceCount++;
    if (isLaterInvoiceDate(invoice.invoice_date, summary.latestInvoice)) {
      summary.latestInvoice = invoice.invoice_date;
    }
  }

  return [...byName.values()]
    .filter((s) => isValidClientName(s.clientName, issuerDetails))
    .map((s) => ({ ...s, address: cleanClientAddress(s.address, issuerDetails) }))
    .sort((a, b) => (a.clientName < b.clientName ? -1 : a.clientName > b.clientName ? 1 : 0));
}
