// src/invoiceIndex.ts
// Wires the database, embeddings and client roster into one object that
// exposes ingestion, lookup and client maintenance.

import { config } from './config';
import { openDatabase, type DbAdapter } from './db';
import { initEmbeddingProvider, type EmbeddingInitOptions, type EmbeddingProvider } from './embeddings';
import { loadClientRoster, type ClientRoster, type InvoiceRecordJson } from './extractors';
import {
  addClient,
  getAllInvoices,
  getClientDetails,
  listClients,
  updateClientInfo,
  type AddClientResult,
  type ClientDetailsResult,
  type ClientDirectoryDeps,
  type ClientSummary,
  type FieldUpdates,
  type UpdateClientResult,
} from './clients/clientDirectory';
import { searchInvoices, type InvoiceMatch } from './knowledge/fuzzyMatch';
import type { TextSource } from './knowledge/documentText';
import {
  processDirectory,
  reprocessAll,
  storeInvoice,
  type IngestDeps,
  type ProcessDirectoryResult,
  type ReprocessResult,
  type StoreInvoiceResult,
} from './knowledge/invoiceIngester';
import { retrieveSimilar, type SimilarInvoice } from './knowledge/similaritySearch';
import { createLogger } from './observability';
import { createInvoicesStore, type InvoicesStore } from './store/invoices';
import { createInvoiceVectorIndex, type InvoiceVectorIndex } from './store/invoiceVectors';

const log = createLogger('invoiceIndex');

export interface InvoiceIndexOptions {
  /** Database file, or ':memory:'. Defaults to config.database.path */
  dbPath?: string;
  /** Already-loaded roster; otherwise read from rosterPath */
  roster?: ClientRoster;
  /** Defaults to config.roster.path */
  rosterPath?: string;
  /** Ready provider; otherwise initialized from `embeddingOptions` and config */
  embeddings?: EmbeddingProvider;
  embeddingOptions?: EmbeddingInitOptions;
  textSource?: TextSource;
}

export interface InvoiceIndex {
  readonly db: DbAdapter;
  readonly store: InvoicesStore;
  readonly vectors: InvoiceVectorIndex;
  readonly embeddings: EmbeddingProvider;
  readonly roster: ClientRoster;

  ingestText(text: string, sourceFile: string): Promise<StoreInvoiceResult>;
  processDirectory(dirPath?: string): Promise<ProcessDirectoryResult>;
  reprocessAll(dirPath?: string): Promise<ReprocessResult>;

  search(query: string, limit?: number): Promise<InvoiceMatch[]>;
  retrieveSimilar(query: string, limit?: number): Promise<SimilarInvoice[]>;

  updateClient(clientName: string, updates: FieldUpdates): Promise<UpdateClientResult>;
  addClient(clientName: string, fields: FieldUpdates): Promise<AddClientResult>;
  getClientDetails(clientName: string): Promise<ClientDetailsResult>;
  getAllInvoices(): Promise<InvoiceRecordJson[]>;
  listClients(): Promise<ClientSummary[]>;

  close(): Promise<void>;
}

/**
 * Open the record store and build the index.
 * @throws StoreUnavailableError when the database cannot be opened or created
 * @throws ClientRosterError when the roster file is malformed
 */
export async function createInvoiceIndex(options: InvoiceIndexOptions = {}): Promise<InvoiceIndex> {
  const roster = options.roster ?? loadClientRoster(options.rosterPath ?? config.roster.path);
  const dbPath = options.dbPath ?? config.database.path;
  const db = openDatabase(dbPath);
  const embeddings = options.embeddings ?? (await initEmbeddingProvider(options.embeddingOptions));

  const store = createInvoicesStore(db);
  const vectors = createInvoiceVectorIndex(db);

  const ingestDeps: IngestDeps = { db, store, vectors, embeddings, roster, textSource: options.textSource };
  const clientDeps: ClientDirectoryDeps = {
    db,
    store,
    vectors,
    embeddings,
    issuerDetails: roster.issuerDetails,
  };

  log.info({ dbPath, embeddings: embeddings.name }, 'Invoice index ready');

  return {
    db,
    store,
    vectors,
    embeddings,
    roster,

    ingestText: (text, sourceFile) => storeInvoice(ingestDeps, text, sourceFile),
    processDirectory: (dirPath = config.invoices.dir) => processDirectory(ingestDeps, dirPath),
    reprocessAll: (dirPath = config.invoices.dir) => reprocessAll(ingestDeps, dirPath),

    search: (query, limit = 5) => searchInvoices(store, query, limit),
    retrieveSimilar: (query, limit = 5) => retrieveSimilar({ store, vectors, embeddings }, query, limit),

    updateClient: (clientName, updates) => updateClientInfo(clientDeps, clientName, updates),
    addClient: (clientName, fields) => addClient(clientDeps, clientName, fields),
    getClientDetails: (clientName) => getClientDetails(clientDeps, clientName),
    getAllInvoices: () => getAllInvoices(clientDeps),
    listClients: () => listClients(clientDeps),

    close: () => db.close(),
  };
}
