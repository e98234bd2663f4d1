// src/store/index.ts
export {
  createInvoicesStore,
  decodeServices,
  encodeServices,
  isCoreField,
  metadataToJson,
  recordToMetadata,
  type InvoiceMetadata,
  type InvoicesStore,
  type StoredInvoice,
  type UpsertInvoiceInput,
} from './invoices';
export {
  cosineDistance,
  createInvoiceVectorIndex,
  DimensionMismatchError,
  IndexCapacityError,
  VectorIndexError,
  type InvoiceVectorIndex,
  type VectorHit,
} from './invoiceVectors';
