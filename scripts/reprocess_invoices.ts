// scripts/reprocess_invoices.ts
// Purpose: Delete every stored invoice record and ingest the directory again.
// Run after changing the extraction rules or the client roster.
// Usage:
//   npx tsx scripts/reprocess_invoices.ts
//   npx tsx scripts/reprocess_invoices.ts --dir=./invoices

import { createInvoiceIndex } from '../src/invoiceIndex';

type Flags = { dir?: string; db?: string };
function parseFlags(argv: string[]): Flags {
  const f: Flags = {};
  for (const a of argv.slice(2)) {
    if (a.startsWith('--dir=')) f.dir = a.split('=')[1];
    else if (a.startsWith('--db=')) f.db = a.split('=')[1];
  }
  return f;
}

async function main() {
  const { dir, db } = parseFlags(process.argv);
  const index = await createInvoiceIndex({ dbPath: db });

  try {
    const result = await index.reprocessAll(dir);
    for (const e of result.errors) {
      console.log(`FAIL  ${e.file}  ${e.error}`);
    }
    console.log(
      JSON.stringify(
        {
          directory: result.directory,
          cleared: result.cleared,
          found: result.found,
          stored: result.stored,
          failed: result.failed,
          total: await index.store.count(),
        },
        null,
        2
      )
    );
    if (result.failed > 0) process.exitCode = 1;
  } finally {
    await index.close();
  }
}

if (require.main === module) {
  main().catch(err => { console.error(err); process.exit(1); });
}
