// src/db/types.ts
// Async access to the invoice database, as seen by the store modules

/* ---------- Result Types ---------- */

export interface RunResult {
  /** Rows inserted, updated or deleted by the statement */
  changes: number;
}

/* ---------- DbAdapter Interface ---------- */

/**
 * Store modules talk to the invoice database through this interface only.
 * SQL uses '?' placeholders; params are bound in order.
 */
export interface DbAdapter {
  /** First matching row, or undefined */
  queryOne<T = Record<string, unknown>>(
    sql: string,
    params?: unknown[]
  ): Promise<T | undefined>;

  queryAll<T = Record<string, unknown>>(
    sql: string,
    params?: unknown[]
  ): Promise<T[]>;

  /** INSERT, UPDATE or DELETE */
  run(sql: string, params?: unknown[]): Promise<RunResult>;

  /**
   * Run `fn` inside BEGIN/COMMIT. A rejection rolls back and is rethrown.
   * Nested calls are not supported.
   */
  transaction<T>(fn: (tx: DbAdapter) => Promise<T>): Promise<T>;

  close(): Promise<void>;
}
