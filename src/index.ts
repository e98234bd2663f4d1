// src/index.ts
// Public API

export { config, type AppConfig } from './config';
export { createInvoiceIndex, type InvoiceIndex, type InvoiceIndexOptions } from './invoiceIndex';
export { openDatabase, StoreUnavailableError, IN_MEMORY, type DbAdapter } from './db';
export * from './extractors';
export * from './store';
export {
  FallbackEmbeddingProvider,
  HashEmbeddingProvider,
  hashEmbedding,
  initEmbeddingProvider,
  OpenAIEmbeddingProvider,
  type EmbeddingInitOptions,
  type EmbeddingProvider,
  type EmbeddingsApi,
} from './embeddings';
export { scoreClientMatch, searchInvoices, type InvoiceMatch } from './knowledge/fuzzyMatch';
export { retrieveSimilar, type SimilarInvoice } from './knowledge/similaritySearch';
export {
  processDirectory,
  reprocessAll,
  storeInvoice,
  type IngestDeps,
  type IngestError,
  type ProcessDirectoryResult,
  type ReprocessResult,
  type StoreInvoiceResult,
} from './knowledge/invoiceIngester';
export { readDocumentText, UnsupportedDocumentError, type TextSource } from './knowledge/documentText';
export {
  addClient,
  getAllInvoices,
  getClientDetails,
  listClients,
  updateClientInfo,
  type AddClientResult,
  type ClientDetailsResult,
  type ClientSummary,
  type FieldUpdates,
  type UpdateClientResult,
} from './clients/clientDirectory';
export { createLogger, logger } from './observability';
