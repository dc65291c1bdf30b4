/**
 * Procurement Cycle - one pass of check, solicit, compare, order, record
 *
 *   Idle -> CheckingInventory -> CollectingQuotes -> ComparingQuotes
 *        -> PlacingOrder -> Recording -> Idle
 *
 * Every cycle that finds something to reorder ends with exactly one ledger
 * record. A cycle with nothing to reorder records nothing.
 */

import { randomUUID } from 'crypto';
import type {
  Catalog,
  CycleOutcome,
  InventoryItem,
  ProcurementRecord,
  RecordStatus,
  VendorQuote,
} from '../types';
import type { ProcurementConfig } from '../utils/config';
import { findVendor, itemsNeedingReorder } from '../catalog';
import { formatDate, round2 } from '../export/formats';
import type { Telephony } from '../telephony/twilio';
import type { EmailSender } from '../notifications/email';
import { createLogger } from '../utils/logger';
import { collectQuotes, type SkippedVendor } from './quotes';
import type { QuoteSource } from './quote-sources';
import { selectQuote } from './selector';
import { placeOrder, type OrderResult } from './order';

const logger = createLogger('cycle');

export type CycleState =
  | 'Idle'
  | 'CheckingInventory'
  | 'CollectingQuotes'
  | 'ComparingQuotes'
  | 'PlacingOrder'
  | 'Recording';

export interface CycleTransition {
  from: CycleState;
  to: CycleState;
  at: string;
}

export class CycleBusyError extends Error {
  constructor() {
    super('A procurement cycle is already running');
    this.name = 'CycleBusyError';
  }
}

/** Where finished cycles are recorded. ProcurementLedger implements this. */
export interface RecordSink {
  append(record: ProcurementRecord): ProcurementRecord;
}

export interface CycleDependencies {
  config: Readonly<ProcurementConfig>;
  quoteSource: QuoteSource;
  telephony: Telephony;
  email: EmailSender;
  ledger: RecordSink;
  onTransition?: (transition: CycleTransition) => void;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export interface RunOptions {
  /** Stop after comparison: no call, no email. */
  quotesOnly?: boolean;
}

export interface CycleResult {
  outcome: CycleOutcome;
  record: ProcurementRecord | null;
  itemsRequired: InventoryItem[];
  quotes: VendorQuote[];
  skipped: SkippedVendor[];
  winner: VendorQuote | null;
  savings: number;
  order: OrderResult | null;
}

export class ProcurementCycle {
  private currentState: CycleState = 'Idle';
  private transitions: CycleTransition[] = [];
  private readonly now: () => Date;

  constructor(private readonly deps: CycleDependencies) {
    this.now = deps.now ?? (() => new Date());
  }

  get state(): CycleState {
    return this.currentState;
  }

  /** Transitions of the most recent run. */
  get history(): readonly CycleTransition[] {
    return this.transitions;
  }

  private transition(to: CycleState): void {
    const entry: CycleTransition = { from: this.currentState, to, at: this.now().toISOString() };
    this.transitions.push(entry);
    this.currentState = to;
    logger.debug({ from: entry.from, to }, 'Cycle state change');
    this.deps.onTransition?.(entry);
  }

  async run(catalog: Catalog, options: RunOptions = {}): Promise<CycleResult> {
    if (this.currentState !== 'Idle') {
      throw new CycleBusyError();
    }
    this.transitions = [];

    try {
      return await this.execute(catalog, options);
    } finally {
      if (this.currentState !== 'Idle') {
        this.transition('Idle');
      }
    }
  }

  private async execute(catalog: Catalog, options: RunOptions): Promise<CycleResult> {
    const { config, quoteSource, telephony, email } = this.deps;
    const startedAt = this.now();

    this.transition('CheckingInventory');
    const items = itemsNeedingReorder(catalog);
    if (items.length === 0) {
      logger.info('All items above reorder threshold');
      this.transition('Idle');
      return {
        outcome: 'NoActionNeeded',
        record: null,
        itemsRequired: [],
        quotes: [],
        skipped: [],
        winner: null,
        savings: 0,
        order: null,
      };
    }
    logger.info({ items: items.map((i) => i.id) }, 'Items need reorder');

    this.transition('CollectingQuotes');
    const { quotes, skipped } = await collectQuotes(catalog, items, quoteSource, {
      ...config.collection,
      allowedPhoneNumber: config.allowedPhoneNumber,
      weights: config.scoring.weights,
      sleep: this.deps.sleep,
      now: this.now,
    });

    const base = {
      itemsRequired: items,
      quotes,
      skipped,
    };

    const selection = selectQuote(quotes);
    if (selection.kind === 'no-quotes') {
      const record = this.record({
        items,
        winner: null,
        savings: 0,
        quotesReceived: 0,
        status: 'NoVendorFound',
        orderNumber: null,
        order: null,
        notes: `No quotes received; ${skipped.length} vendor(s) skipped`,
        timestamp: startedAt,
      });
      return { ...base, outcome: 'NoVendorFound', record, winner: null, savings: 0, order: null };
    }

    this.transition('ComparingQuotes');
    const { winner, savings } = selection;
    logger.info(
      { vendorId: winner.vendorId, totalCost: winner.totalCost, savings },
      'Winning quote selected',
    );

    if (options.quotesOnly) {
      const record = this.record({
        items,
        winner,
        savings,
        quotesReceived: quotes.length,
        status: 'QuotesOnly',
        orderNumber: null,
        order: null,
        notes: `Quotes only; ${describeCoverage(items, winner)}`,
        timestamp: startedAt,
      });
      return { ...base, outcome: 'QuotesOnly', record, winner, savings, order: null };
    }

    const vendor = findVendor(catalog, winner.vendorId);
    if (!vendor) {
      throw new Error(`Winning vendor ${winner.vendorId} is not in the catalog`);
    }

    this.transition('PlacingOrder');
    const orderNumber = `PO-${formatDate(startedAt, 'compact')}-${vendor.id}`;
    const order = await placeOrder(
      {
        vendor,
        quote: winner,
        orderNumber,
        companyName: config.companyName,
        procurementEmail: config.procurementEmail,
      },
      telephony,
      email,
    );

    const record = this.record({
      items,
      winner,
      savings,
      quotesReceived: quotes.length,
      status: order.status,
      orderNumber,
      order,
      notes: orderNotes(items, winner, order),
      timestamp: startedAt,
    });
    return { ...base, outcome: order.status, record, winner, savings, order };
  }

  private record(input: {
    items: InventoryItem[];
    winner: VendorQuote | null;
    savings: number;
    quotesReceived: number;
    status: RecordStatus;
    orderNumber: string | null;
    order: OrderResult | null;
    notes: string;
    timestamp: Date;
  }): ProcurementRecord {
    this.transition('Recording');
    const { items, winner, order } = input;
    const totalCost = winner ? round2(winner.totalCost) : 0;

    const stored = this.deps.ledger.append({
      id: randomUUID(),
      timestamp: input.timestamp.toISOString(),
      itemsRequired: items.map((i) => i.name),
      itemIds: items.map((i) => i.id),
      selectedVendorId: winner?.vendorId ?? null,
      selectedVendorName: winner?.vendorName ?? null,
      totalCost,
      totalItems: winner ? winner.lines.reduce((sum, l) => sum + l.quantity, 0) : 0,
      savings: input.savings,
      quotesReceived: input.quotesReceived,
      status: input.status,
      callId: order?.callId ?? null,
      emailSent: order?.emailSent ?? false,
      approvalRequired: winner !== null && totalCost > this.deps.config.approval.autoApproveThreshold,
      orderNumber: input.orderNumber,
      notes: input.notes,
    });
    this.transition('Idle');
    return stored;
  }
}

function describeCoverage(items: InventoryItem[], winner: VendorQuote): string {
  const missing = items.filter((i) => !winner.itemIds.includes(i.id));
  const base = `${winner.vendorName} quoted ${winner.itemIds.length} of ${items.length} item(s)`;
  const source = winner.provenance === 'fallback-estimated' ? ' (estimated from list prices)' : '';
  return missing.length > 0
    ? `${base}${source}; not covered: ${missing.map((i) => i.name).join(', ')}`
    : `${base}${source}`;
}

function orderNotes(items: InventoryItem[], winner: VendorQuote, order: OrderResult): string {
  const parts = [describeCoverage(items, winner)];
  if (order.call === null) {
    parts.push('confirmation call skipped (telephony not configured)');
  } else if (order.call.status !== 'placed') {
    parts.push(`confirmation call ${order.call.status}`);
  }
  if (!order.emailSent) {
    parts.push(`email not sent${order.email.error ? `: ${order.email.error}` : ''}`);
  }
  return parts.join('; ');
}
