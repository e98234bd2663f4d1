// src/knowledge/pdfText.ts
// PDF text layer extraction via pdf-parse. Loaded lazily by documentText.ts.

import pdfParse from 'pdf-parse';

/** Concatenated text of every page; pages without a text layer contribute nothing */
export async function readPdfText(buffer: Buffer): Promise<string> {
  const parsed = await pdfParse(buffer);
  return parsed.text;
}
