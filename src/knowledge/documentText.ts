// src/knowledge/documentText.ts
// Plain text for a source document.
//
// .txt files are read verbatim (already-extracted text); .pdf files go
// through the PDF text layer. Anything else is unsupported.

import fs from 'node:fs/promises';
import path from 'node:path';

/** Supplies the plain text of a document on disk */
export type TextSource = (filePath: string) => Promise<string>;

export const SUPPORTED_EXTENSIONS = ['.pdf', '.txt'] as const;

export class UnsupportedDocumentError extends Error {
  constructor(filePath: string) {
    super(`Unsupported document type: ${path.basename(filePath)}`);
    this.name = 'UnsupportedDocumentError';
  }
}

export function isSupportedDocument(fileName: string): boolean {
  const ext = path.extname(fileName).toLowerCase();
  return SUPPORTED_EXTENSIONS.some((e) => e === ext);
}

export const readDocumentText: TextSource = async (filePath) => {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === '.txt') {
    return fs.readFile(filePath, 'utf8');
  }
  if (ext === '.pdf') {
    const buffer = await fs.readFile(filePath);
    const { readPdfText } = await import('./pdfText');
    return readPdfText(buffer);
  }
  throw new UnsupportedDocumentError(filePath);
};
