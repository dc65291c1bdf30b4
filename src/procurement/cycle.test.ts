import { describe, it, expect, vi } from 'vitest';
import { ProcurementCycle, CycleBusyError, type RecordSink, type CycleDependencies } from './cycle';
import { StaticQuoteSource, type LiveQuote, type QuoteSource } from './quote-sources';
import type { Telephony, CallResult } from '../telephony/twilio';
import type { EmailResult, EmailSender } from '../notifications/email';
import type { Catalog, ProcurementRecord } from '../types';
import { makeCatalog, makeConfig, makeItem, makeOffer, makeVendor } from '../testing/fixtures';

// Local time so the compact order-number date is stable in every timezone
const NOW = new Date(2026, 9, 19, 10, 30, 0);

class MemorySink implements RecordSink {
  readonly records: ProcurementRecord[] = [];
  append(record: ProcurementRecord): ProcurementRecord {
    this.records.push(record);
    return record;
  }
}

function setup(overrides: Partial<CycleDependencies> & { callResult?: CallResult; emailResult?: EmailResult } = {}) {
  const { callResult, emailResult, ...rest } = overrides;
  const placeCall = vi.fn(async (): Promise<CallResult> => callResult ?? { status: 'placed', callId: 'CA-ORDER' });
  const sendPurchaseOrder = vi.fn(
    async (): Promise<EmailResult> => emailResult ?? { success: true, provider: 'sendgrid', messageId: 'msg-1' },
  );
  const telephony: Telephony = { configured: true, allowedNumber: '+15550100001', placeCall };
  const email: EmailSender = { configured: true, sendPurchaseOrder };
  const ledger = new MemorySink();
  const cycle = new ProcurementCycle({
    config: makeConfig(),
    quoteSource: new StaticQuoteSource(),
    telephony,
    email,
    ledger,
    sleep: vi.fn().mockResolvedValue(undefined),
    now: () => NOW,
    ...rest,
  });
  return { cycle, ledger, placeCall, sendPurchaseOrder };
}

function twoVendorCatalog(): Catalog {
  return makeCatalog({
    vendors: [makeVendor({ id: 'V001', name: 'Metro' }), makeVendor({ id: 'V002', name: 'Prime' })],
    offers: [
      makeOffer({ vendorId: 'V001', unitPrice: 50 }),
      makeOffer({ vendorId: 'V002', unitPrice: 40 }),
    ],
  });
}

describe('ProcurementCycle', () => {
  it('orders a low-stock item from the only vendor and records it', async () => {
    const { cycle, ledger, placeCall, sendPurchaseOrder } = setup();

    const result = await cycle.run(makeCatalog());

    expect(result.outcome).toBe('Completed');
    expect(result.winner?.totalCost).toBe(5000);
    expect(placeCall).toHaveBeenCalledTimes(1);
    expect(sendPurchaseOrder).toHaveBeenCalledTimes(1);
    expect(ledger.records).toHaveLength(1);
    expect(ledger.records[0]).toMatchObject({
      timestamp: NOW.toISOString(),
      itemsRequired: ['USB Cable'],
      itemIds: ['ITM001'],
      selectedVendorId: 'V001',
      selectedVendorName: 'Metro Electronics',
      totalCost: 5000,
      totalItems: 100,
      savings: 0,
      quotesReceived: 1,
      status: 'Completed',
      callId: 'CA-ORDER',
      emailSent: true,
      approvalRequired: true,
      orderNumber: 'PO-20261019-V001',
      notes: 'Metro Electronics quoted 1 of 1 item(s)',
    });
    expect(result.record).toBe(ledger.records[0]);
  });

  it('picks the cheaper of two vendors and reports the savings', async () => {
    const { cycle, ledger, sendPurchaseOrder } = setup();

    const result = await cycle.run(twoVendorCatalog());

    expect(result.quotes).toHaveLength(2);
    expect(result.winner?.vendorId).toBe('V002');
    expect(result.savings).toBe(1000);
    expect(sendPurchaseOrder.mock.calls[0]).toEqual([
      expect.objectContaining({ orderNumber: 'PO-20261019-V002', vendor: expect.objectContaining({ id: 'V002' }) }),
    ]);
    expect(ledger.records[0]).toMatchObject({
      selectedVendorId: 'V002',
      totalCost: 4000,
      savings: 1000,
      quotesReceived: 2,
    });
  });

  it('records NoVendorFound when no vendor may be called', async () => {
    const { cycle, ledger, placeCall } = setup();
    const catalog = makeCatalog({ vendors: [makeVendor({ phone: '+15550199999' })] });

    const result = await cycle.run(catalog);

    expect(result.outcome).toBe('NoVendorFound');
    expect(result.skipped).toEqual([{ vendorId: 'V001', reason: 'unauthorized' }]);
    expect(placeCall).not.toHaveBeenCalled();
    expect(ledger.records).toHaveLength(1);
    expect(ledger.records[0]).toMatchObject({
      status: 'NoVendorFound',
      selectedVendorId: null,
      totalCost: 0,
      totalItems: 0,
      quotesReceived: 0,
      approvalRequired: false,
      orderNumber: null,
      notes: 'No quotes received; 1 vendor(s) skipped',
    });
    expect(cycle.history.map((t) => t.to)).toEqual(['CheckingInventory', 'CollectingQuotes', 'Recording', 'Idle']);
  });

  it('records NoVendorFound when every solicitation fails and fallback is off', async () => {
    const { cycle, ledger } = setup({
      config: makeConfig({ collection: { fallbackQuotes: false } }),
      quoteSource: new StaticQuoteSource({ V001: null, V002: null }),
    });

    const result = await cycle.run(twoVendorCatalog());

    expect(result).toMatchObject({ outcome: 'NoVendorFound', quotes: [], skipped: [] });
    expect(ledger.records).toHaveLength(1);
    expect(ledger.records[0]).toMatchObject({
      status: 'NoVendorFound',
      notes: 'No quotes received; 0 vendor(s) skipped',
    });
  });

  it('records nothing when stock is above every threshold', async () => {
    const { cycle, ledger } = setup();

    const result = await cycle.run(makeCatalog({ inventory: [makeItem({ currentStock: 50 })] }));

    expect(result).toMatchObject({ outcome: 'NoActionNeeded', record: null, winner: null });
    expect(ledger.records).toHaveLength(0);
    expect(cycle.history.map((t) => t.to)).toEqual(['CheckingInventory', 'Idle']);
  });

  it('walks every state for a full cycle', async () => {
    const transitions: string[] = [];
    const { cycle } = setup({ onTransition: (t) => transitions.push(`${t.from}>${t.to}`) });

    await cycle.run(makeCatalog());

    expect(transitions).toEqual([
      'Idle>CheckingInventory',
      'CheckingInventory>CollectingQuotes',
      'CollectingQuotes>ComparingQuotes',
      'ComparingQuotes>PlacingOrder',
      'PlacingOrder>Recording',
      'Recording>Idle',
    ]);
    expect(cycle.state).toBe('Idle');
  });

  it('stops after comparison in quotes-only mode', async () => {
    const { cycle, ledger, placeCall, sendPurchaseOrder } = setup();

    const result = await cycle.run(makeCatalog(), { quotesOnly: true });

    expect(result.outcome).toBe('QuotesOnly');
    expect(placeCall).not.toHaveBeenCalled();
    expect(sendPurchaseOrder).not.toHaveBeenCalled();
    expect(ledger.records[0]).toMatchObject({
      status: 'QuotesOnly',
      orderNumber: null,
      callId: null,
      emailSent: false,
      totalCost: 5000,
      notes: 'Quotes only; Metro Electronics quoted 1 of 1 item(s)',
    });
  });

  it('records EmailFailed with notes when telephony is off and email fails', async () => {
    const { cycle, ledger } = setup({
      telephony: { configured: false, allowedNumber: '', placeCall: vi.fn() },
      emailResult: { success: false, provider: 'sendgrid', error: 'SendGrid API key not configured' },
    });

    const result = await cycle.run(makeCatalog());

    expect(result.outcome).toBe('EmailFailed');
    expect(ledger.records[0].notes).toBe(
      'Metro Electronics quoted 1 of 1 item(s); confirmation call skipped (telephony not configured); ' +
        'email not sent: SendGrid API key not configured',
    );
  });

  it('does not require approval at or under the threshold', async () => {
    const { cycle, ledger } = setup();
    const catalog = makeCatalog({ offers: [makeOffer({ unitPrice: 10 })] });

    await cycle.run(catalog);

    expect(ledger.records[0]).toMatchObject({ totalCost: 1000, approvalRequired: false });
  });

  it('rejects a second run while one is in flight', async () => {
    const pending: { release?: (quote: LiveQuote | null) => void } = {};
    const slowSource: QuoteSource = {
      requestQuote: () =>
        new Promise<LiveQuote | null>((resolve) => {
          pending.release = resolve;
        }),
    };
    const { cycle } = setup({ quoteSource: slowSource });

    const first = cycle.run(makeCatalog());
    await vi.waitFor(() => expect(pending.release).toBeDefined());
    expect(cycle.state).toBe('CollectingQuotes');
    await expect(cycle.run(makeCatalog())).rejects.toBeInstanceOf(CycleBusyError);

    pending.release?.(null);
    const result = await first;
    expect(result.winner?.provenance).toBe('fallback-estimated');
    expect(cycle.state).toBe('Idle');
  });

  it('returns to Idle when recording throws', async () => {
    const { cycle } = setup({
      ledger: {
        append: () => {
          throw new Error('disk full');
        },
      },
    });

    await expect(cycle.run(makeCatalog())).rejects.toThrow('disk full');
    expect(cycle.state).toBe('Idle');
  });
});
