/**
 * Vendor Scoring - weighted composite score for vendor selection
 *
 * score = w.price * price + w.rating * rating + w.delivery * delivery + w.terms * terms
 *
 * Every component is normalised to (0, 1]; higher is better. The default
 * weights are price 40%, rating 30%, delivery 20%, payment terms 10%.
 */

import type { Catalog, InventoryItem, Vendor, VendorItemOffer } from '../types';
import type { ScoringWeights } from '../utils/config';
import {
  effectivePrice,
  isAuthorizedVendor,
  offersForVendor,
  orderQuantity,
} from '../catalog';

export const DEFAULT_WEIGHTS: ScoringWeights = {
  price: 0.4,
  rating: 0.3,
  delivery: 0.2,
  terms: 0.1,
};

/** Terms score used when the payment terms text cannot be read. */
export const UNPARSABLE_TERMS_SCORE = 0.5;

export interface ScoredLine {
  item: InventoryItem;
  offer: VendorItemOffer;
}

export interface ScoreBreakdown {
  totalCost: number;
  price: number;
  rating: number;
  delivery: number;
  terms: number;
  score: number;
}

function clamp(v: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, v));
}

/**
 * Payment days from free-text terms. "COD" / "cash on delivery" are 0 days;
 * otherwise the first integer in the text ("30 days", "Net 45"). Returns
 * null when there is no number to read.
 */
export function parsePaymentDays(terms: string): number | null {
  const normalized = terms.trim().toLowerCase();
  if (normalized === 'cod' || normalized === 'cash on delivery') return 0;
  const match = normalized.match(/(\d+)/);
  if (!match) return null;
  const days = parseInt(match[1], 10);
  return Number.isFinite(days) ? days : null;
}

export function priceScore(totalCost: number): number {
  return 1 / (Math.max(0, totalCost) / 1000 + 1);
}

export function ratingScore(rating: number): number {
  return clamp(rating, 0, 5) / 5;
}

export function deliveryScore(leadTimeDays: number): number {
  return 1 / (Math.max(0, leadTimeDays) / 10 + 1);
}

export function termsScore(paymentTerms: string): number {
  const days = parsePaymentDays(paymentTerms);
  if (days === null) return UNPARSABLE_TERMS_SCORE;
  return 1 / (days / 30 + 1);
}

/**
 * Total cost of buying the given lines from the vendor at effective prices.
 */
export function totalCostFor(lines: ScoredLine[]): number {
  return lines.reduce((sum, { item, offer }) => {
    const quantity = orderQuantity(item, offer);
    return sum + effectivePrice(offer, quantity) * quantity;
  }, 0);
}

/**
 * Score a vendor for the items it can supply, with the components.
 */
export function scoreBreakdown(
  vendor: Vendor,
  lines: ScoredLine[],
  weights: ScoringWeights = DEFAULT_WEIGHTS,
): ScoreBreakdown {
  const totalCost = totalCostFor(lines);
  const price = priceScore(totalCost);
  const rating = ratingScore(vendor.rating);
  const delivery = deliveryScore(vendor.deliveryTimeDays);
  const terms = termsScore(vendor.paymentTerms);

  const score =
    weights.price * price +
    weights.rating * rating +
    weights.delivery * delivery +
    weights.terms * terms;

  return { totalCost, price, rating, delivery, terms, score };
}

export function scoreVendor(
  vendor: Vendor,
  lines: ScoredLine[],
  weights: ScoringWeights = DEFAULT_WEIGHTS,
): number {
  return scoreBreakdown(vendor, lines, weights).score;
}

export interface RankedVendor {
  vendor: Vendor;
  lines: ScoredLine[];
  breakdown: ScoreBreakdown;
}

/**
 * Active, authorized vendors carrying at least one of the items, best score
 * first. Equal scores keep catalog order.
 */
export function rankVendors(
  catalog: Catalog,
  items: InventoryItem[],
  allowedPhoneNumber: string,
  weights: ScoringWeights = DEFAULT_WEIGHTS,
): RankedVendor[] {
  const ranked: RankedVendor[] = [];
  for (const vendor of catalog.vendors) {
    if (vendor.status !== 'Active' || !isAuthorizedVendor(vendor, allowedPhoneNumber)) continue;
    const lines = offersForVendor(catalog, vendor.id, items);
    if (lines.length === 0) continue;
    ranked.push({ vendor, lines, breakdown: scoreBreakdown(vendor, lines, weights) });
  }
  return ranked.sort((a, b) => b.breakdown.score - a.breakdown.score);
}
