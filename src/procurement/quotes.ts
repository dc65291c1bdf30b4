/**
 * Quote Collector - solicits every eligible vendor and builds one quote each
 *
 * Vendors are asked one at a time, best score first, with a fixed pause
 * between solicitations. A timed-out request is aborted and must settle
 * before the next one starts. A solicitation that times out, throws or
 * comes back empty leaves gaps that the catalog price fills when fallback
 * is enabled.
 */

import type { Catalog, InventoryItem, QuoteLine, Vendor, VendorQuote } from '../types';
import type { CollectionGranularity, ScoringWeights } from '../utils/config';
import { effectivePrice, isAuthorizedVendor, offersForVendor, orderQuantity } from '../catalog';
import { sleep as defaultSleep, withTimeout } from '../infra/retry';
import { round2 } from '../export/formats';
import { createLogger } from '../utils/logger';
import { DEFAULT_WEIGHTS, scoreVendor } from './scoring';
import type { LiveQuote, QuoteRequestLine, QuoteSource } from './quote-sources';

const logger = createLogger('quotes');

export type SkipReason = 'inactive' | 'unauthorized' | 'no-matching-items';

export interface SkippedVendor {
  vendorId: string;
  reason: SkipReason;
}

export interface CollectOptions {
  granularity: CollectionGranularity;
  pauseSeconds: number;
  timeoutMs: number;
  fallbackQuotes: boolean;
  allowedPhoneNumber: string;
  weights?: ScoringWeights;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export interface CollectResult {
  quotes: VendorQuote[];
  skipped: SkippedVendor[];
}

interface EligibleVendor {
  vendor: Vendor;
  lines: QuoteRequestLine[];
  score: number;
}

function skipReason(
  catalog: Catalog,
  vendor: Vendor,
  items: InventoryItem[],
  allowedPhoneNumber: string,
): SkipReason | null {
  if (vendor.status !== 'Active') return 'inactive';
  if (!isAuthorizedVendor(vendor, allowedPhoneNumber)) return 'unauthorized';
  if (offersForVendor(catalog, vendor.id, items).length === 0) return 'no-matching-items';
  return null;
}

export async function collectQuotes(
  catalog: Catalog,
  items: InventoryItem[],
  source: QuoteSource,
  options: CollectOptions,
): Promise<CollectResult> {
  const wait = options.sleep ?? defaultSleep;
  const now = options.now ?? (() => new Date());
  const weights = options.weights ?? DEFAULT_WEIGHTS;

  const skipped: SkippedVendor[] = [];
  const eligible: EligibleVendor[] = [];

  for (const vendor of catalog.vendors) {
    const reason = skipReason(catalog, vendor, items, options.allowedPhoneNumber);
    if (reason) {
      logger.info({ vendorId: vendor.id, reason }, 'Skipping vendor');
      skipped.push({ vendorId: vendor.id, reason });
      continue;
    }
    const matches = offersForVendor(catalog, vendor.id, items);
    eligible.push({
      vendor,
      lines: matches.map(({ item, offer }) => ({ item, offer, quantity: orderQuantity(item, offer) })),
      score: scoreVendor(vendor, matches, weights),
    });
  }

  // Array.prototype.sort is stable: equal scores keep catalog order
  eligible.sort((a, b) => b.score - a.score);

  let solicitations = 0;
  const solicit = async (vendor: Vendor, lines: QuoteRequestLine[]): Promise<LiveQuote | null> => {
    if (solicitations > 0 && options.pauseSeconds > 0) {
      await wait(options.pauseSeconds * 1000);
    }
    solicitations++;
    const controller = new AbortController();
    const pending = source.requestQuote({ vendor, lines }, controller.signal);
    try {
      return await withTimeout(pending, options.timeoutMs);
    } catch (err) {
      controller.abort();
      logger.warn(
        { vendorId: vendor.id, error: err instanceof Error ? err.message : String(err) },
        'Quote solicitation failed',
      );
      // Only one call at a time: the next vendor waits until this request has settled
      await pending.catch(() => null);
      return null;
    }
  };

  const quotes: VendorQuote[] = [];

  for (const { vendor, lines, score } of eligible) {
    const prices = new Map<string, number>();
    let callId: string | null = null;

    const groups = options.granularity === 'per-item' ? lines.map((line) => [line]) : [lines];
    for (const group of groups) {
      const live = await solicit(vendor, group);
      if (!live) continue;
      callId = callId ?? live.callId;
      for (const { item } of group) {
        const price = live.prices.get(item.id);
        if (price !== undefined && Number.isFinite(price) && price > 0) {
          prices.set(item.id, price);
        }
      }
    }

    const complete = lines.every(({ item }) => prices.has(item.id));
    if (!complete && !options.fallbackQuotes) {
      logger.warn({ vendorId: vendor.id }, 'Incomplete quote and fallback disabled, no quote recorded');
      continue;
    }

    const quoteLines: QuoteLine[] = lines.map(({ item, offer, quantity }) => {
      const unitPrice = prices.get(item.id) ?? effectivePrice(offer, quantity);
      return Object.freeze({
        itemId: item.id,
        itemName: item.name,
        quantity,
        unitPrice,
        lineTotal: round2(unitPrice * quantity),
      });
    });

    const quote: VendorQuote = Object.freeze({
      vendorId: vendor.id,
      vendorName: vendor.name,
      lines: Object.freeze(quoteLines),
      itemIds: Object.freeze(quoteLines.map((l) => l.itemId)),
      totalCost: round2(quoteLines.reduce((sum, l) => sum + l.lineTotal, 0)),
      callId,
      quotedAt: now().toISOString(),
      provenance: complete ? 'voice-collected' : 'fallback-estimated',
      score,
    });

    logger.info(
      { vendorId: vendor.id, totalCost: quote.totalCost, provenance: quote.provenance },
      'Quote recorded',
    );
    quotes.push(quote);
  }

  return { quotes, skipped };
}
