// src/store/invoices.ts
// Invoice record store.
//
// Table: invoices
// One row per record, keyed by the composite "<client>_<invoice number>" id.
// Core metadata fields live in typed columns; services are JSON text; any
// other (manually entered) metadata lives in extra_json.

import type { DbAdapter } from '../db';
import { createLogger } from '../observability';
import type {
  InvoiceRecord,
  InvoiceRecordJson,
  MetadataValue,
  ServiceLine,
  ServiceLineJson,
} from '../extractors/types';

const log = createLogger('store/invoices');

/* ---------- Types ---------- */

/** Persisted metadata map; `services` is JSON text */
export interface InvoiceMetadata {
  client_name: string;
  client_address: string;
  invoice_number: string;
  invoice_date: string;
  invoice_amount: string;
  services: string;
  source_file: string;
  [extra: string]: MetadataValue;
}

// Domain type (camelCase, for API)
export interface StoredInvoice {
  id: string;
  metadata: InvoiceMetadata;
  document: string;
  createdAt: string; // ISO string
  updatedAt: string; // ISO string
}

// Row type (snake_case, matches DB)
interface InvoiceRow {
  id: string;
  client_name: string;
  client_address: string;
  invoice_number: string;
  invoice_date: string;
  invoice_amount: string;
  services_json: string;
  source_file: string;
  extra_json: string;
  document: string;
  created_at: number;
  updated_at: number;
}

export interface UpsertInvoiceInput {
  id: string;
  metadata: InvoiceMetadata;
  document: string;
}

const CORE_FIELDS = [
  'client_name',
  'client_address',
  'invoice_number',
  'invoice_date',
  'invoice_amount',
  'services',
  'source_file',
] as const;

type CoreField = (typeof CORE_FIELDS)[number];

export function isCoreField(key: string): key is CoreField {
  return (CORE_FIELDS as readonly string[]).includes(key);
}

/* ---------- JSON Helpers ---------- */

/** Safely parse JSON with fallback */
function parseJson(json: string | null, fallback: unknown): unknown {
  if (!json) return fallback;
  try {
    return JSON.parse(json);
  } catch {
    return fallback;
  }
}

function isMetadataValue(value: unknown): value is MetadataValue {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function isServiceLineJson(value: unknown): value is ServiceLineJson {
  if (typeof value !== 'object' || value === null) return false;
  const entry: Record<string, unknown> = { ...value };
  return typeof entry.service_name === 'string' && typeof entry.service_price === 'string';
}

/** Decode persisted services JSON; malformed text yields an empty list */
export function decodeServices(json: string): ServiceLineJson[] {
  const parsed = parseJson(json, []);
  return Array.isArray(parsed) ? parsed.filter(isServiceLineJson) : [];
}

export function encodeServices(services: readonly ServiceLine[]): string {
  const lines: ServiceLineJson[] = services.map((s) => ({
    service_name: s.serviceName,
    service_price: s.servicePrice,
  }));
  return JSON.stringify(lines);
}

/* ---------- Converters ---------- */

/** Persisted metadata for an extracted record */
export function recordToMetadata(record: InvoiceRecord): InvoiceMetadata {
  return {
    client_name: record.clientName,
    client_address: record.clientAddress,
    invoice_number: record.invoiceNumber,
    invoice_date: record.invoiceDate,
    invoice_amount: record.invoiceAmount,
    services: encodeServices(record.services),
    source_file: record.sourceFile,
  };
}

/** API form: services decoded into a list */
export function metadataToJson(metadata: InvoiceMetadata): InvoiceRecordJson {
  return { ...metadata, services: decodeServices(metadata.services) };
}

function rowToStoredInvoice(row: InvoiceRow): StoredInvoice {
  const extras = parseJson(row.extra_json, {});
  const metadata: InvoiceMetadata = {
    client_name: row.client_name,
    client_address: row.client_address,
    invoice_number: row.invoice_number,
    invoice_date: row.invoice_date,
    invoice_amount: row.invoice_amount,
    services: row.services_json,
    source_file: row.source_file,
  };
  if (typeof extras === 'object' && extras !== null && !Array.isArray(extras)) {
    for (const [key, value] of Object.entries(extras)) {
      if (!isCoreField(key) && isMetadataValue(value)) metadata[key] = value;
    }
  }
  return {
    id: row.id,
    metadata,
    document: row.document,
    createdAt: new Date(row.created_at).toISOString(),
    updatedAt: new Date(row.updated_at).toISOString(),
  };
}

function extrasOf(metadata: InvoiceMetadata): Record<string, MetadataValue> {
  const extras: Record<string, MetadataValue> = {};
  for (const [key, value] of Object.entries(metadata)) {
    if (!isCoreField(key)) extras[key] = value;
  }
  return extras;
}

function coreParams(metadata: InvoiceMetadata): string[] {
  return [
    metadata.client_name,
    metadata.client_address,
    metadata.invoice_number,
    metadata.invoice_date,
    metadata.invoice_amount,
    metadata.services,
    metadata.source_file,
    JSON.stringify(extrasOf(metadata)),
  ];
}

/* ---------- Store ---------- */

export interface InvoicesStore {
  /** Insert or overwrite the record with this id */
  upsert(input: UpsertInvoiceInput): Promise<StoredInvoice>;
  getById(id: string): Promise<StoredInvoice | null>;
  /** Every record in insertion order */
  listAll(): Promise<StoredInvoice[]>;
  listIds(): Promise<string[]>;
  /** Replace the metadata of an existing record; false when the id is absent */
  replaceMetadata(id: string, metadata: InvoiceMetadata): Promise<boolean>;
  /** Returns the number of deleted rows */
  deleteIds(ids: readonly string[]): Promise<number>;
  count(): Promise<number>;
}

export function createInvoicesStore(db: DbAdapter): InvoicesStore {
  async function getById(id: string): Promise<StoredInvoice | null> {
    const row = await db.queryOne<InvoiceRow>(`SELECT * FROM invoices WHERE id = ?`, [id]);
    return row ? rowToStoredInvoice(row) : null;
  }

  return {
    async upsert(input) {
      const now = Date.now();
      await db.run(
        `INSERT INTO invoices (
          id, client_name, client_address, invoice_number, invoice_date,
          invoice_amount, services_json, source_file, extra_json, document,
          created_at, updated_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET
          client_name = excluded.client_name,
          client_address = excluded.client_address,
          invoice_number = excluded.invoice_number,
          invoice_date = excluded.invoice_date,
          invoice_amount = excluded.invoice_amount,
          services_json = excluded.services_json,
          source_file = excluded.source_file,
          extra_json = excluded.extra_json,
          document = excluded.document,
          updated_at = excluded.updated_at`,
        [input.id, ...coreParams(input.metadata), input.document, now, now]
      );
      const stored = await getById(input.id);
      if (!stored) {
        throw new Error(`Invoice ${input.id} missing after upsert`);
      }
      return stored;
    },

    getById,

    async listAll() {
      const rows = await db.queryAll<InvoiceRow>(
        `SELECT * FROM invoices ORDER BY created_at ASC, rowid ASC`
      );
      return rows.map(rowToStoredInvoice);
    },

    async listIds() {
      const rows = await db.queryAll<{ id: string }>(
        `SELECT id FROM invoices ORDER BY created_at ASC, rowid ASC`
      );
      return rows.map((r) => r.id);
    },

    async replaceMetadata(id, metadata) {
      const result = await db.run(
        `UPDATE invoices SET
          client_name = ?, client_address = ?, invoice_number = ?, invoice_date = ?,
          invoice_amount = ?, services_json = ?, source_file = ?, extra_json = ?,
          updated_at = ?
        WHERE id = ?`,
        [...coreParams(metadata), Date.now(), id]
      );
      return result.changes > 0;
    },

    async deleteIds(ids) {
      if (ids.length === 0) return 0;
      let deleted = 0;
      for (const id of ids) {
        const result = await db.run(`DELETE FROM invoices WHERE id = ?`, [id]);
        deleted += result.changes;
      }
      log.debug({ requested: ids.length, deleted }, 'Deleted invoice records');
      return deleted;
    },

    async count() {
      const row = await db.queryOne<{ n: number }>(`SELECT COUNT(*) AS n FROM invoices`);
      return row?.n ?? 0;
    },
  };
}
