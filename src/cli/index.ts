#!/usr/bin/env node
/**
 * procure-agent CLI
 *
 * Commands:
 * - procure-agent run         - Check inventory, collect quotes, order, record
 * - procure-agent inventory   - Show stock levels
 * - procure-agent vendors     - Show vendors with scores
 * - procure-agent history     - Show recorded cycles
 * - procure-agent export      - Write the CSV report
 * - procure-agent test-call   - Call the allowed number
 * - procure-agent test-email  - Send a test email
 * - procure-agent status      - Show configuration and ledger totals
 * - procure-agent menu        - Interactive menu
 */

// Keep pino quiet in the interactive menu
if (process.argv.includes('menu')) {
  process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'warn';
}

import { Command, InvalidArgumentError } from 'commander';
import { ConfigError, loadConfig, type CollectionGranularity, type ProcurementConfig } from '../utils/config';
import { CatalogError } from '../catalog';
import { LedgerError } from '../ledger';
import { logger } from '../utils/logger';
import { createRuntime, type RuntimeOptions } from './runtime';

const program = new Command();

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled promise rejection');
});
process.on('uncaughtException', (error) => {
  logger.error({ error }, 'Uncaught exception');
  process.exit(1);
});

function fail(message: string): never {
  console.error(`\n  \x1b[31mError:\x1b[0m ${message}\n`);
  process.exit(1);
}

/**
 * Load config and run an action. Configuration, catalog and ledger errors
 * end the process with exit code 1.
 */
async function withConfig(action: (config: Readonly<ProcurementConfig>) => Promise<void>): Promise<void> {
  try {
    const config = loadConfig({ configPath: program.opts<{ config?: string }>().config });
    await action(config);
  } catch (err) {
    if (err instanceof ConfigError || err instanceof CatalogError || err instanceof LedgerError) {
      fail(err.message);
    }
    throw err;
  }
}

function parseGranularity(value: string): CollectionGranularity {
  if (value === 'batch' || value === 'per-item') return value;
  throw new InvalidArgumentError('Expected "batch" or "per-item".');
}

program
  .name('procure-agent')
  .description('Automated procurement: inventory checks, vendor quotes and purchase orders')
  .version('0.1.0')
  .option('-c, --config <path>', 'JSON config file (default: procure.json)');

// ============================================================================
// run - One procurement cycle
// ============================================================================
program
  .command('run')
  .description('Run one procurement cycle')
  .option('--quotes-only', 'Collect and compare quotes without placing the order')
  .option('--simulate', 'Use catalog prices instead of calling vendors')
  .option('--granularity <mode>', 'Quote per vendor ("batch") or per item ("per-item")', parseGranularity)
  .action((options: { quotesOnly?: boolean; simulate?: boolean; granularity?: CollectionGranularity }) =>
    withConfig(async (config) => {
      const { formatCycleResult } = await import('./report');
      const effective: Readonly<ProcurementConfig> = options.granularity
        ? { ...config, collection: { ...config.collection, granularity: options.granularity } }
        : config;

      const runtimeOptions: RuntimeOptions = {
        simulate: options.simulate,
        onTransition: ({ to }) => logger.debug({ state: to }, 'Cycle state'),
      };
      const runtime = createRuntime(effective, runtimeOptions);
      const catalog = await runtime.loadCatalog();
      const result = await runtime.cycle.run(catalog, { quotesOnly: options.quotesOnly });
      console.log(`\n${formatCycleResult(result)}\n`);
    }),
  );

// ============================================================================
// inventory / vendors - Catalog views
// ============================================================================
program
  .command('inventory')
  .description('Show inventory with stock status')
  .action(() =>
    withConfig(async (config) => {
      const { formatInventory } = await import('./report');
      const catalog = await createRuntime(config).loadCatalog();
      console.log(`\n${formatInventory(catalog)}\n`);
    }),
  );

program
  .command('vendors')
  .description('Show vendors with scores and call eligibility')
  .action(() =>
    withConfig(async (config) => {
      const { formatVendors } = await import('./report');
      const catalog = await createRuntime(config).loadCatalog();
      console.log(`\n${formatVendors(catalog, config)}\n`);
    }),
  );

// ============================================================================
// history / export - Ledger views
// ============================================================================
program
  .command('history')
  .description('Show recent procurement cycles')
  .option('-n, --limit <count>', 'Number of records to show', '10')
  .action((options: { limit: string }) =>
    withConfig(async (config) => {
      const { formatHistory } = await import('./report');
      const limit = parseInt(options.limit, 10);
      const records = createRuntime(config).ledger.load();
      console.log(`\n${formatHistory(records, Number.isFinite(limit) && limit > 0 ? limit : 10)}\n`);
    }),
  );

program
  .command('export')
  .argument('[file]', 'Output CSV path (default: configured report file)')
  .description('Export the ledger as a CSV report')
  .action((file: string | undefined) =>
    withConfig(async (config) => {
      const ledger = createRuntime(config).ledger;
      ledger.load();
      const written = ledger.exportCsv(file ?? config.paths.reportFile);
      console.log(`\n  Exported ${ledger.all().length} record(s) to ${written}\n`);
    }),
  );

// ============================================================================
// test-call / test-email - Verify integrations
// ============================================================================
program
  .command('test-call')
  .description('Place a test call to the allowed number')
  .action(() =>
    withConfig(async (config) => {
      const { placeTestCall } = await import('../telephony/twilio');
      const result = await placeTestCall(createRuntime(config).telephony, config.companyName);
      switch (result.status) {
        case 'placed':
          console.log(`\n  \x1b[32m✓\x1b[0m Test call placed (${result.callId})\n`);
          return;
        case 'blocked':
          fail(`Call blocked: "${result.to}" is not the allowed number`);
        case 'unconfigured':
          fail('Twilio credentials are not configured');
        case 'failed':
          fail(`Test call failed: ${result.error}`);
      }
    }),
  );

program
  .command('test-email')
  .argument('[to]', 'Recipient (default: procurement email)')
  .description('Send a test email through the configured provider')
  .action((to: string | undefined) =>
    withConfig(async (config) => {
      const { emailConfigFrom, sendTestEmail } = await import('../notifications/email');
      const recipient = to ?? config.procurementEmail;
      const result = await sendTestEmail(emailConfigFrom(config), recipient, config.companyName);
      if (!result.success) {
        fail(`Test email failed: ${result.error ?? 'unknown error'}`);
      }
      console.log(`\n  \x1b[32m✓\x1b[0m Test email sent to ${recipient} via ${result.provider}\n`);
    }),
  );

// ============================================================================
// status - Configuration and ledger totals
// ============================================================================
program
  .command('status')
  .description('Show integration status, catalog and ledger totals')
  .action(() =>
    withConfig(async (config) => {
      const { formatStatus } = await import('./report');
      const runtime = createRuntime(config);
      const catalog = await runtime.loadCatalog().catch((err: unknown) => {
        if (err instanceof CatalogError) {
          logger.warn({ path: err.path }, err.message);
          return null;
        }
        throw err;
      });
      console.log(`\n${formatStatus(config, catalog, runtime.ledger.summary())}\n`);
    }),
  );

// ============================================================================
// menu - Interactive
// ============================================================================
program
  .command('menu')
  .description('Interactive menu')
  .option('--simulate', 'Use catalog prices instead of calling vendors')
  .action((options: { simulate?: boolean }) =>
    withConfig(async (config) => {
      const { runMenu } = await import('./menu');
      await runMenu(createRuntime(config, { simulate: options.simulate }));
    }),
  );

program.parseAsync().catch((err: unknown) => {
  logger.error({ err }, 'Command failed');
  process.exit(1);
});
