// src/db/index.ts
// Database bootstrap: opens the invoice record store and ensures its schema.
//
// Recovery follows get-or-create semantics:
//   1. open the existing database file
//   2. on failure, create a fresh one (creating parent directories)
//   3. on failure, try opening the existing file once more
//   4. on failure, throw StoreUnavailableError (fatal)

import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { createLogger } from '../observability';
import { SqliteAdapter } from './sqlite';

export type { DbAdapter, RunResult } from './types';
export { SqliteAdapter } from './sqlite';

const log = createLogger('db');

export const IN_MEMORY = ':memory:';

/** Thrown when the record store cannot be opened or created */
export class StoreUnavailableError extends Error {
  constructor(dbPath: string, cause: unknown) {
    super(
      `Invoice store unavailable at ${dbPath}: ${cause instanceof Error ? cause.message : String(cause)}`
    );
    this.name = 'StoreUnavailableError';
  }
}

/* ---------- Schema ---------- */

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS invoices (
  id TEXT PRIMARY KEY,
  client_name TEXT NOT NULL,
  client_address TEXT NOT NULL,
  invoice_number TEXT NOT NULL,
  invoice_date TEXT NOT NULL,
  invoice_amount TEXT NOT NULL,
  services_json TEXT NOT NULL DEFAULT '[]',
  source_file TEXT NOT NULL,
  extra_json TEXT NOT NULL DEFAULT '{}',
  document TEXT NOT NULL,
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_invoices_client ON invoices(client_name);

CREATE TABLE IF NOT EXISTS invoice_vectors (
  id TEXT PRIMARY KEY,
  dimensions INTEGER NOT NULL,
  vector_json TEXT NOT NULL,
  FOREIGN KEY (id) REFERENCES invoices(id) ON DELETE CASCADE
);
`;

function applySchema(rawDb: Database.Database): void {
  rawDb.pragma('foreign_keys = ON');
  rawDb.exec(SCHEMA_SQL);
}

/* ---------- Open / Create ---------- */

function openExisting(dbPath: string): Database.Database {
  if (dbPath === IN_MEMORY) {
    throw new Error('in-memory database has no existing file');
  }
  const rawDb = new Database(dbPath, { fileMustExist: true });
  try {
    rawDb.pragma('journal_mode = WAL');
    applySchema(rawDb);
    return rawDb;
  } catch (err) {
    rawDb.close();
    throw err;
  }
}

function createFresh(dbPath: string): Database.Database {
  if (dbPath !== IN_MEMORY) {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const rawDb = new Database(dbPath);
  try {
    if (dbPath !== IN_MEMORY) rawDb.pragma('journal_mode = WAL');
    applySchema(rawDb);
    return rawDb;
  } catch (err) {
    rawDb.close();
    throw err;
  }
}

/**
 * Open (or create) the invoice record store.
 * Pass ':memory:' for an ephemeral store (tests).
 *
 * @throws StoreUnavailableError when both opening and creating fail
 */
export function openDatabase(dbPath: string): SqliteAdapter {
  try {
    return new SqliteAdapter(openExisting(dbPath));
  } catch (openErr) {
    if (dbPath !== IN_MEMORY) {
      log.info({ dbPath, err: openErr }, 'No usable invoice store found, creating one');
    }
    try {
      return new SqliteAdapter(createFresh(dbPath));
    } catch (createErr) {
      log.error({ dbPath, err: createErr }, 'Failed to create invoice store');
      try {
        return new SqliteAdapter(openExisting(dbPath));
      } catch (finalErr) {
        log.fatal({ dbPath, err: finalErr }, 'Invoice store unavailable');
        throw new StoreUnavailableError(dbPath, finalErr);
      }
    }
  }
}
