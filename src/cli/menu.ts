/**
 * Interactive menu - `procure-agent menu`
 */

import * as readline from 'readline';
import { CatalogError } from '../catalog';
import { placeTestCall } from '../telephony/twilio';
import { formatCycleResult, formatHistory, formatInventory, formatStatus, formatVendors } from './report';
import type { Runtime } from './runtime';

let rl: readline.Interface;

function question(prompt: string): Promise<string> {
  return new Promise((resolve) => {
    rl.question(prompt, (answer) => resolve(answer.trim()));
  });
}

function yesNo(prompt: string): Promise<boolean> {
  return new Promise((resolve) => {
    rl.question(`${prompt} (y/n): `, (answer) => resolve(answer.trim().toLowerCase().startsWith('y')));
  });
}

const OPTIONS = [
  ['1', 'Run procurement cycle'],
  ['2', 'Collect quotes only'],
  ['3', 'Show inventory'],
  ['4', 'Show vendors'],
  ['5', 'Show history'],
  ['6', 'Export CSV report'],
  ['7', 'Place test call'],
  ['8', 'Status'],
  ['0', 'Exit'],
] as const;

async function handle(choice: string, runtime: Runtime): Promise<boolean> {
  switch (choice) {
    case '1':
    case '2': {
      const catalog = await runtime.loadCatalog();
      const result = await runtime.cycle.run(catalog, { quotesOnly: choice === '2' });
      console.log(`\n${formatCycleResult(result)}\n`);
      return true;
    }
    case '3':
      console.log(`\n${formatInventory(await runtime.loadCatalog())}\n`);
      return true;
    case '4':
      console.log(`\n${formatVendors(await runtime.loadCatalog(), runtime.config)}\n`);
      return true;
    case '5':
      console.log(`\n${formatHistory(runtime.ledger.load())}\n`);
      return true;
    case '6': {
      const written = runtime.ledger.exportCsv();
      console.log(`\n  Report written to ${written}\n`);
      return true;
    }
    case '7': {
      if (!(await yesNo(`  Call ${runtime.config.allowedPhoneNumber || '(no allowed number)'} now?`))) return true;
      const result = await placeTestCall(runtime.telephony, runtime.config.companyName);
      console.log(`\n  Test call: ${result.status}${result.status === 'placed' ? ` (${result.callId})` : ''}\n`);
      return true;
    }
    case '8': {
      const catalog = await runtime.loadCatalog().catch((err: unknown) => {
        if (err instanceof CatalogError) return null;
        throw err;
      });
      console.log(`\n${formatStatus(runtime.config, catalog, runtime.ledger.summary())}\n`);
      return true;
    }
    case '0':
    case 'q':
      return false;
    default:
      console.log('  \x1b[33mUnknown option\x1b[0m');
      return true;
  }
}

export async function runMenu(runtime: Runtime): Promise<void> {
  rl = readline.createInterface({ input: process.stdin, output: process.stdout });

  console.log(`\n\x1b[1m${runtime.config.companyName} Procurement\x1b[0m\n`);
  try {
    let keepGoing = true;
    while (keepGoing) {
      for (const [key, label] of OPTIONS) {
        console.log(`  ${key}. ${label}`);
      }
      const choice = await question('\nSelect an option: ');
      try {
        keepGoing = await handle(choice, runtime);
      } catch (err) {
        console.error(`\n  \x1b[31mError:\x1b[0m ${err instanceof Error ? err.message : String(err)}\n`);
      }
    }
  } finally {
    rl.close();
  }
}
