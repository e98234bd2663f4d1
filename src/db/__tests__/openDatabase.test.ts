import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { IN_MEMORY, openDatabase, StoreUnavailableError } from '../index';

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'invoice-db-'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('openDatabase', () => {
  it('creates a fresh store, including parent directories', async () => {
    const dbPath = path.join(tmpDir, 'nested', 'invoices.db');
    const db = openDatabase(dbPath);
    expect(fs.existsSync(dbPath)).toBe(true);
    const tables = await db.queryAll<{ name: string }>(
      `SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name`
    );
    expect(tables.map((t) => t.name)).toEqual(['invoice_vectors', 'invoices']);
    await db.close();
  });

  it('reopens an existing store with its data', async () => {
    const dbPath = path.join(tmpDir, 'invoices.db');
    const first = openDatabase(dbPath);
    await first.run(
      `INSERT INTO invoices (id, client_name, client_address, invoice_number, invoice_date,
        invoice_amount, source_file, document, created_at, updated_at)
       VALUES ('x', 'X', 'unknown', '1', 'unknown', 'unknown', 'x.pdf', '', 0, 0)`
    );
    await first.close();

    const second = openDatabase(dbPath);
    const row = await second.queryOne<{ n: number }>(`SELECT COUNT(*) AS n FROM invoices`);
    expect(row?.n).toBe(1);
    await second.close();
  });

  it('opens an ephemeral in-memory store', async () => {
    const db = openDatabase(IN_MEMORY);
    const row = await db.queryOne<{ n: number }>(`SELECT COUNT(*) AS n FROM invoices`);
    expect(row?.n).toBe(0);
    await db.close();
  });

  it('fails with StoreUnavailableError when the store cannot be opened or created', () => {
    const blocker = path.join(tmpDir, 'not-a-directory');
    fs.writeFileSync(blocker, 'plain file');
    expect(() => openDatabase(path.join(blocker, 'sub', 'invoices.db'))).toThrow(StoreUnavailableError);
  });

  it('reports the rows changed by a statement', async () => {
    const db = openDatabase(IN_MEMORY);
    const inserted = await db.run(
      `INSERT INTO invoices (id, client_name, client_address, invoice_number, invoice_date,
        invoice_amount, source_file, document, created_at, updated_at)
       VALUES ('x', 'X', 'unknown', '1', 'unknown', 'unknown', 'x.pdf', '', 0, 0)`
    );
    expect(inserted).toEqual({ changes: 1 });
    expect(await db.run(`DELETE FROM invoices WHERE id = ?`, ['missing'])).toEqual({ changes: 0 });
    await db.close();
  });

  it('rolls back a failed transaction', async () => {
    const db = openDatabase(IN_MEMORY);
    await expect(
      db.transaction(async (tx) => {
        await tx.run(
          `INSERT INTO invoices (id, client_name, client_address, invoice_number, invoice_date,
            invoice_amount, source_file, document, created_at, updated_at)
           VALUES ('x', 'X', 'unknown', '1', 'unknown', 'unknown', 'x.pdf', '', 0, 0)`
        );
        throw new Error('abort');
      })
    ).rejects.toThrow('abort');
    const row = await db.queryOne<{ n: number }>(`SELECT COUNT(*) AS n FROM invoices`);
    expect(row?.n).toBe(0);
    await db.close();
  });
});
