/* src/config.ts
   Centralized config & storage roots */
import path from 'node:path';
import 'dotenv/config';

const env = (name: string, fallback?: string) =>
  (process.env[name] ?? fallback ?? '').toString();

const envInt = (name: string, fallback: number) => {
  const n = parseInt(env(name), 10);
  return Number.isFinite(n) && n > 0 ? n : fallback;
};

export type EmbeddingsProviderName = 'hash' | 'openai';

function parseProvider(value: string): EmbeddingsProviderName {
  return value === 'openai' ? 'openai' : 'hash';
}

// Default home of the database file
const storageRoot = path.resolve(process.cwd(), env('STORAGE_ROOT', 'storage'));

export const config = {
  // ── Database ─────────────────────────────────────────────────────
  database: {
    path: env('INVOICE_DB_PATH')
      ? path.resolve(process.cwd(), env('INVOICE_DB_PATH'))
      : path.join(storageRoot, 'invoices.db'),
  },

  // ── Source documents ─────────────────────────────────────────────
  invoices: {
    dir: path.resolve(process.cwd(), env('INVOICES_DIR', 'invoices')),
  },

  // ── Known-client roster ──────────────────────────────────────────
  roster: {
    path: path.resolve(process.cwd(), env('CLIENT_ROSTER_PATH', 'data/client_roster.json')),
  },

  // ── Embeddings ───────────────────────────────────────────────────
  embeddings: {
    provider: parseProvider(env('EMBEDDINGS_PROVIDER', 'hash')),
    openaiKey: env('OPENAI_API_KEY'),
    model: env('EMBEDDINGS_MODEL', 'text-embedding-3-small'),
    dimensions: 384,
    initTimeoutMs: envInt('EMBEDDINGS_INIT_TIMEOUT_MS', 10_000),
  },
} as const;

export type AppConfig = typeof config;
