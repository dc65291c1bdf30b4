/**
 * Quote sources - where per-item vendor prices come from
 *
 * VoiceQuoteSource calls the vendor and reads the prices out of the call
 * transcript. StaticQuoteSource answers from a fixed table (or the catalog
 * price) and never touches the network.
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import type { InventoryItem, Vendor, VendorItemOffer } from '../types';
import { effectivePrice } from '../catalog';
import type { Telephony } from '../telephony/twilio';
import { quoteRequestMessage } from '../telephony/messages';
import { parseSpokenQuote } from './transcript';
import { createLogger } from '../utils/logger';

const logger = createLogger('quote-sources');

// =============================================================================
// TYPES
// =============================================================================

export interface QuoteRequestLine {
  item: InventoryItem;
  offer: VendorItemOffer;
  quantity: number;
}

export interface QuoteRequest {
  vendor: Vendor;
  lines: QuoteRequestLine[];
}

/** Prices a vendor gave for the requested items. Items it skipped are absent. */
export interface LiveQuote {
  prices: Map<string, number>;
  callId: string | null;
}

export interface QuoteSource {
  /**
   * Resolves null when the vendor could not be reached or quoted nothing.
   * Must settle promptly once `signal` aborts.
   */
  requestQuote(request: QuoteRequest, signal?: AbortSignal): Promise<LiveQuote | null>;
}

export interface TranscriptProvider {
  fetchTranscript(vendor: Vendor, callId: string): Promise<string | null>;
}

// =============================================================================
// TRANSCRIPTS
// =============================================================================

/**
 * Reads `<dir>/<vendorId>.txt`. A missing file means no transcript yet.
 */
export class FileTranscriptProvider implements TranscriptProvider {
  constructor(private readonly dir: string) {}

  async fetchTranscript(vendor: Vendor): Promise<string | null> {
    const filePath = join(this.dir, `${vendor.id}.txt`);
    try {
      const text = await readFile(filePath, 'utf-8');
      return text.trim() || null;
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        logger.debug({ filePath }, 'No transcript file');
        return null;
      }
      throw err;
    }
  }
}

// =============================================================================
// VOICE
// =============================================================================

export class VoiceQuoteSource implements QuoteSource {
  constructor(
    private readonly telephony: Telephony,
    private readonly transcripts: TranscriptProvider,
    private readonly companyName: string,
  ) {}

  async requestQuote({ vendor, lines }: QuoteRequest, signal?: AbortSignal): Promise<LiveQuote | null> {
    const message = quoteRequestMessage(
      this.companyName,
      vendor,
      lines.map(({ item, quantity }) => ({ itemName: item.name, quantity, unit: item.unit })),
    );

    const call = await this.telephony.placeCall(vendor.phone, message, { signal });
    if (call.status !== 'placed') {
      logger.warn({ vendorId: vendor.id, status: call.status }, 'Quote request call not placed');
      return null;
    }

    if (signal?.aborted) {
      logger.warn({ vendorId: vendor.id, callId: call.callId }, 'Quote request abandoned after the call');
      return null;
    }

    const transcript = await this.transcripts.fetchTranscript(vendor, call.callId);
    if (!transcript) {
      logger.warn({ vendorId: vendor.id, callId: call.callId }, 'No transcript for quote call');
      return null;
    }

    const prices = parseSpokenQuote(
      transcript,
      lines.map(({ item }) => item),
    );
    if (prices.size === 0) {
      logger.warn({ vendorId: vendor.id, callId: call.callId }, 'No prices found in transcript');
      return null;
    }

    logger.info({ vendorId: vendor.id, callId: call.callId, items: prices.size }, 'Quote collected');
    return { prices, callId: call.callId };
  }
}

// =============================================================================
// STATIC
// =============================================================================

/**
 * vendorId -> itemId -> unit price. A null entry makes that vendor fail.
 */
export type StaticPriceTable = Record<string, Record<string, number> | null>;

/**
 * Deterministic source for tests and simulated runs. Vendors missing from
 * the table answer with the catalog's effective price.
 */
export class StaticQuoteSource implements QuoteSource {
  readonly requests: QuoteRequest[] = [];

  constructor(private readonly table: StaticPriceTable = {}) {}

  async requestQuote(request: QuoteRequest): Promise<LiveQuote | null> {
    this.requests.push(request);
    const { vendor, lines } = request;
    const callId = `SIM-${vendor.id}-${this.requests.length}`;

    if (!(vendor.id in this.table)) {
      const prices = new Map(
        lines.map(({ item, offer, quantity }) => [item.id, effectivePrice(offer, quantity)] as const),
      );
      return { prices, callId };
    }

    const row = this.table[vendor.id];
    if (row === null) return null;

    const prices = new Map<string, number>();
    for (const { item } of lines) {
      const price = row[item.id];
      if (price !== undefined) prices.set(item.id, price);
    }
    return { prices, callId };
  }
}
