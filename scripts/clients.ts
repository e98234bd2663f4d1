// scripts/clients.ts
// Purpose: Inspect and maintain client details in the invoice store.
// Usage:
//   npx tsx scripts/clients.ts list
//   npx tsx scripts/clients.ts list --csv=clients.csv
//   npx tsx scripts/clients.ts get "Acme Ltd"
//   npx tsx scripts/clients.ts search acme --limit=3
//   npx tsx scripts/clients.ts similar "piano performance"
//   npx tsx scripts/clients.ts add "New Client" --email=a@b.test --address="5 Park Lane"
//   npx tsx scripts/clients.ts update "Acme" --phone=0100 --notes="Pays late"

import fs from 'node:fs';
import type { FieldUpdates } from '../src/clients/clientDirectory';
import { clientsToCsv } from '../src/clients/reporting';
import { createInvoiceIndex, type InvoiceIndex } from '../src/invoiceIndex';

const FIELD_FLAGS = ['email', 'address', 'phone', 'notes'] as const;

type Flags = {
  command?: string;
  name?: string;
  db?: string;
  csv?: string;
  limit: number;
  fields: FieldUpdates;
};
function parseFlags(argv: string[]): Flags {
  const f: Flags = { limit: 5, fields: {} };
  const positional: string[] = [];
  for (const a of argv.slice(2)) {
    if (a.startsWith('--db=')) f.db = a.slice('--db='.length);
    else if (a.startsWith('--csv=')) f.csv = a.slice('--csv='.length);
    else if (a.startsWith('--limit=')) f.limit = Number(a.slice('--limit='.length)) || 5;
    else if (a.startsWith('--')) {
      const [key, ...rest] = a.slice(2).split('=');
      if (FIELD_FLAGS.some((k) => k === key)) f.fields[key] = rest.join('=');
    } else positional.push(a);
  }
  [f.command, f.name] = positional;
  return f;
}

function print(value: unknown) {
  console.log(JSON.stringify(value, null, 2));
}

async function run(index: InvoiceIndex, flags: Flags): Promise<boolean> {
  const { command, name, csv, limit, fields } = flags;

  switch (command) {
    case 'list': {
      const clients = await index.listClients();
      for (const c of clients) {
        console.log(`${c.clientName}  (${c.invoiceCount} invoices, latest ${c.latestInvoice})`);
        console.log(`  ${c.address.replace(/\n/g, ', ')}`);
      }
      console.log(`${clients.length} clients`);
      if (csv) {
        fs.writeFileSync(csv, clientsToCsv(clients));
        console.log(`Client list exported to ${csv}`);
      }
      return true;
    }
    case 'get': {
      if (!name) break;
      const result = await index.getClientDetails(name);
      print(result);
      return result.success;
    }
    case 'search': {
      if (!name) break;
      const matches = await index.search(name, limit);
      print(matches.map((m) => ({ id: m.id, score: m.score, client: m.record.client_name })));
      return true;
    }
    case 'similar': {
      if (!name) break;
      const similar = await index.retrieveSimilar(name, limit);
      print(similar.map((s) => ({ id: s.id, relevance: s.relevanceScore, client: s.record.client_name })));
      return true;
    }
    case 'add': {
      if (!name) break;
      const result = await index.addClient(name, fields);
      print(result);
      return result.success;
    }
    case 'update': {
      if (!name || Object.keys(fields).length === 0) break;
      const result = await index.updateClient(name, fields);
      print(result);
      return result.success;
    }
  }

  console.error(
    'Usage: clients.ts <list | get NAME | search QUERY | similar QUERY | add NAME | update NAME> ' +
      '[--email=] [--address=] [--phone=] [--notes=] [--limit=N] [--csv=PATH] [--db=PATH]'
  );
  return false;
}

async function main() {
  const flags = parseFlags(process.argv);
  const index = await createInvoiceIndex({ dbPath: flags.db });
  try {
    const ok = await run(index, flags);
    if (!ok) process.exitCode = 1;
  } finally {
    await index.close();
  }
}

if (require.main === module) {
  main().catch(err => { console.error(err); process.exit(1); });
}
