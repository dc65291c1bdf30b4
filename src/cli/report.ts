/**
 * Terminal output for the CLI - plain strings, printed by the caller
 */

import type { Catalog, ProcurementRecord } from '../types';
import type { ProcurementConfig } from '../utils/config';
import { isEmailConfigured, isTelephonyConfigured } from '../utils/config';
import { isAuthorizedVendor, stockStatus, summarizeCatalog } from '../catalog';
import { rankVendors } from '../procurement/scoring';
import type { CycleResult } from '../procurement/cycle';
import type { LedgerSummary } from '../ledger';
import { formatCurrency } from '../export/formats';

const bold = (s: string): string => `\x1b[1m${s}\x1b[0m`;
const green = (s: string): string => `\x1b[32m${s}\x1b[0m`;
const yellow = (s: string): string => `\x1b[33m${s}\x1b[0m`;
const red = (s: string): string => `\x1b[31m${s}\x1b[0m`;
const gray = (s: string): string => `\x1b[90m${s}\x1b[0m`;

function pad(value: string | number, width: number): string {
  const str = String(value);
  return str.length >= width ? str.slice(0, width) : str + ' '.repeat(width - str.length);
}

function padLeft(value: string | number, width: number): string {
  const str = String(value);
  return str.length >= width ? str : ' '.repeat(width - str.length) + str;
}

// =============================================================================
// INVENTORY
// =============================================================================

export function formatInventory(catalog: Catalog): string {
  const lines = [bold('Inventory'), ''];
  lines.push(`  ${pad('ID', 8)} ${pad('Item', 24)} ${padLeft('Stock', 7)} ${padLeft('Min', 6)} ${padLeft('Reorder', 8)}  Status`);
  for (const item of catalog.inventory) {
    const status = stockStatus(item);
    const label = status === 'LOW' ? red(status) : status === 'MEDIUM' ? yellow(status) : green(status);
    lines.push(
      `  ${pad(item.id, 8)} ${pad(item.name, 24)} ${padLeft(item.currentStock, 7)} ${padLeft(item.minThreshold, 6)} ${padLeft(item.reorderQuantity, 8)}  ${label}`,
    );
  }
  const low = catalog.inventory.filter((i) => stockStatus(i) === 'LOW').length;
  lines.push('', `  ${low} of ${catalog.inventory.length} item(s) at or below reorder threshold`);
  return lines.join('\n');
}

// =============================================================================
// VENDORS
// =============================================================================

export function formatVendors(catalog: Catalog, config: Readonly<ProcurementConfig>): string {
  const lines = [bold('Vendors'), ''];
  const ranked = new Map(
    rankVendors(catalog, catalog.inventory, config.allowedPhoneNumber, config.scoring.weights).map((r) => [
      r.vendor.id,
      r.breakdown.score,
    ]),
  );

  lines.push(`  ${pad('ID', 8)} ${pad('Vendor', 24)} ${padLeft('Rating', 6)} ${padLeft('Days', 5)}  ${pad('Terms', 10)} ${padLeft('Score', 6)}  Callable`);
  for (const vendor of catalog.vendors) {
    const score = ranked.get(vendor.id);
    const callable =
      vendor.status !== 'Active'
        ? gray('inactive')
        : isAuthorizedVendor(vendor, config.allowedPhoneNumber)
          ? green('yes')
          : gray('no');
    lines.push(
      `  ${pad(vendor.id, 8)} ${pad(vendor.name, 24)} ${padLeft(vendor.rating.toFixed(1), 6)} ${padLeft(vendor.deliveryTimeDays, 5)}  ${pad(vendor.paymentTerms, 10)} ${padLeft(score === undefined ? '-' : score.toFixed(3), 6)}  ${callable}`,
    );
  }
  return lines.join('\n');
}

// =============================================================================
// HISTORY
// =============================================================================

function statusLabel(status: ProcurementRecord['status']): string {
  switch (status) {
    case 'Completed':
      return green(status);
    case 'QuotesOnly':
      return yellow(status);
    default:
      return red(status);
  }
}

export function formatHistory(records: readonly ProcurementRecord[], limit = 10): string {
  if (records.length === 0) {
    return 'No procurement history yet.';
  }
  const recent = records.slice(-limit).reverse();
  const lines = [bold(`Procurement history (last ${recent.length} of ${records.length})`), ''];
  for (const r of recent) {
    lines.push(
      `  ${r.timestamp.slice(0, 19).replace('T', ' ')}  ${pad(r.selectedVendorName ?? '-', 20)} ${padLeft(formatCurrency(r.totalCost), 12)}  ${statusLabel(r.status)}`,
    );
    lines.push(gray(`      ${r.itemsRequired.join(', ')}${r.orderNumber ? ` | ${r.orderNumber}` : ''}`));
  }
  return lines.join('\n');
}

// =============================================================================
// CYCLE RESULT
// =============================================================================

export function formatCycleResult(result: CycleResult): string {
  if (result.outcome === 'NoActionNeeded') {
    return green('All items are above their reorder thresholds. Nothing to order.');
  }

  const lines = [bold('Procurement cycle'), ''];
  lines.push(`  Items required: ${result.itemsRequired.map((i) => i.name).join(', ')}`);
  for (const s of result.skipped) {
    lines.push(gray(`  Skipped ${s.vendorId}: ${s.reason}`));
  }

  if (result.quotes.length > 0) {
    lines.push('', '  Quotes:');
    for (const q of result.quotes) {
      const marker = result.winner?.vendorId === q.vendorId ? green('*') : ' ';
      lines.push(
        `  ${marker} ${pad(q.vendorName, 24)} ${padLeft(formatCurrency(q.totalCost), 12)}  ${gray(q.provenance)}`,
      );
    }
  }

  if (result.winner) {
    lines.push('', `  Selected: ${result.winner.vendorName} at ${formatCurrency(result.winner.totalCost)}`);
    lines.push(`  Savings:  ${formatCurrency(result.savings)}`);
  }

  const record = result.record;
  if (record) {
    if (record.orderNumber) lines.push(`  Order:    ${record.orderNumber}`);
    if (record.approvalRequired) lines.push(yellow('  Approval required: total exceeds the auto-approve threshold'));
    lines.push(`  Status:   ${statusLabel(record.status)}`);
    if (record.notes) lines.push(gray(`  ${record.notes}`));
  }
  return lines.join('\n');
}

// =============================================================================
// STATUS
// =============================================================================

export function formatStatus(
  config: Readonly<ProcurementConfig>,
  catalog: Catalog | null,
  ledger: LedgerSummary,
): string {
  const check = (ok: boolean, label: string): string => `    ${ok ? green('✓') : gray('○')} ${label}`;
  const lines = [bold(`${config.companyName} procurement status`), ''];

  lines.push('  Integrations:');
  lines.push(check(isTelephonyConfigured(config), 'Twilio telephony'));
  lines.push(check(isEmailConfigured(config), `Email (${config.email.provider})`));
  lines.push(check(Boolean(config.allowedPhoneNumber), `Allowed number ${config.allowedPhoneNumber || '(none)'}`));

  if (catalog) {
    const s = summarizeCatalog(catalog, config.allowedPhoneNumber);
    lines.push('', '  Catalog:');
    lines.push(`    Items: ${s.totalItems} (${s.itemsNeedingReorder} need reorder)`);
    lines.push(`    Vendors: ${s.totalVendors} (${s.activeVendors} active, ${s.authorizedVendors} callable)`);
    lines.push(`    Offers: ${s.totalOffers}`);
  }

  lines.push('', '  Ledger:');
  lines.push(`    Cycles recorded: ${ledger.totalCycles} (${ledger.completed} completed)`);
  lines.push(`    Total spend: ${formatCurrency(ledger.totalSpend)}`);
  lines.push(`    Total savings: ${formatCurrency(ledger.totalSavings)}`);
  if (ledger.lastUpdated) lines.push(`    Last updated: ${ledger.lastUpdated}`);

  return lines.join('\n');
}
