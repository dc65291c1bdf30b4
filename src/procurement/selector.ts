/**
 * Quote comparison - cheapest total wins
 */

import type { VendorQuote } from '../types';
import { round2 } from '../export/formats';

export type Selection =
  | {
      kind: 'selected';
      winner: VendorQuote;
      /** Most expensive quote minus the winner's, never negative. */
      savings: number;
      /** Cheapest first; equal totals keep input order. */
      ranked: VendorQuote[];
    }
  | { kind: 'no-quotes' };

export function selectQuote(quotes: readonly VendorQuote[]): Selection {
  if (quotes.length === 0) {
    return { kind: 'no-quotes' };
  }

  const ranked = [...quotes].sort((a, b) => a.totalCost - b.totalCost);
  const winner = ranked[0];
  const highest = ranked[ranked.length - 1].totalCost;

  return {
    kind: 'selected',
    winner,
    savings: Math.max(0, round2(highest - winner.totalCost)),
    ranked,
  };
}
