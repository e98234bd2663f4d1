// scripts/process_invoices.ts
// Purpose: Ingest every .pdf/.txt invoice in a directory into the record store,
// then search for a few client names to check what was stored.
// Usage:
//   npx tsx scripts/process_invoices.ts
//   npx tsx scripts/process_invoices.ts --dir=./invoices --db=./storage/invoices.db
//   npx tsx scripts/process_invoices.ts --check="Acme Ltd,Sky Garden"

import { formatInvoiceSummary } from '../src/clients/reporting';
import { createInvoiceIndex, type InvoiceIndex } from '../src/invoiceIndex';

const DEFAULT_CHECK_NAMES = ['ALR Music', 'Warner Music', 'Peninsula', 'Sky Garden'];

type Flags = { dir?: string; db?: string; check: string[]; verbose: boolean };
function parseFlags(argv: string[]): Flags {
  const f: Flags = { check: DEFAULT_CHECK_NAMES, verbose: false };
  for (const a of argv.slice(2)) {
    if (a.startsWith('--dir=')) f.dir = a.split('=')[1];
    else if (a.startsWith('--db=')) f.db = a.split('=')[1];
    else if (a.startsWith('--check=')) {
      f.check = a.slice('--check='.length).split(',').map((n) => n.trim()).filter(Boolean);
    } else if (a === '--verbose' || a === '-v') f.verbose = true;
  }
  return f;
}

async function searchCheck(index: InvoiceIndex, names: string[]) {
  console.log('\nSearch check:');
  for (const name of names) {
    console.log(`\nSearching for client: ${name}`);
    const matches = await index.search(name, 2);
    if (matches.length === 0) {
      console.log(`  No results found for ${name}`);
      continue;
    }
    matches.forEach((m, i) => {
      console.log(`  Result ${i + 1} (score ${m.score.toFixed(2)}):`);
      for (const line of formatInvoiceSummary(m.record)) console.log(`    ${line}`);
    });
  }
}

async function main() {
  const { dir, db, check, verbose } = parseFlags(process.argv);
  const index = await createInvoiceIndex({ dbPath: db });

  try {
    const result = await index.processDirectory(dir);

    if (verbose) {
      for (const id of result.ids) console.log(`STORED  ${id}`);
    }
    for (const e of result.errors) {
      console.log(`FAIL    ${e.file}  ${e.error}`);
    }

    console.log(
      JSON.stringify(
        { directory: result.directory, found: result.found, stored: result.stored, failed: result.failed },
        null,
        2
      )
    );

    await searchCheck(index, check);
    console.log(`\nTotal records in store: ${await index.store.count()}`);
  } finally {
    await index.close();
  }
}

if (require.main === module) {
  main().catch(err => { console.error(err); process.exit(1); });
}
