/**
 * Spoken quote parsing - pulls per-item unit prices out of a call transcript
 *
 * "USB cables 12 rupees per unit, wireless mouse 28 rupees each"
 *   -> { USB Cable: 12, Wireless Mouse: 28 }
 */

import type { InventoryItem } from '../types';

const CLAUSE_SPLIT = /[,;\n]|\band\b|\bthen\b/;
const THOUSANDS_SEPARATOR = /(\d),(?=\d{3}\b)/g;
const NUMBER = /\d+(?:\.\d+)?/g;
const CURRENCY_AFTER = /^\s*(?:rupees?|rs\.?|inr|dollars?|usd)\b/;
const CURRENCY_BEFORE = /(?:₹|\$|\brs\.?|\binr)\s*$/;

/** Lowercase words of 3+ letters, with a trailing plural "s" dropped. */
export function itemKeywords(name: string): string[] {
  const words = name.toLowerCase().match(/[a-z]{3,}/g) ?? [];
  return [...new Set(words.map((w) => (w.length > 3 && w.endsWith('s') ? w.slice(0, -1) : w)))];
}

/** Tokens of an item name that carry digits ("a4", "500ml", "12"). */
export function numericNameTokens(name: string): Set<string> {
  const tokens = name.toLowerCase().match(/[a-z0-9]+/g) ?? [];
  return new Set(tokens.filter((t) => /\d/.test(t)));
}

/**
 * The price in a clause: a number tagged with a currency word or symbol
 * wins, otherwise the first number. Numbers whose surrounding token is in
 * `ignored` (part of the item's own name) are never prices.
 */
export function extractPrice(clause: string, ignored: ReadonlySet<string> = new Set()): number | null {
  const candidates = [...clause.matchAll(NUMBER)].filter((match) => {
    const start = match.index ?? 0;
    const left = clause.slice(0, start).match(/[a-z0-9]*$/)?.[0] ?? '';
    const right = clause.slice(start + match[0].length).match(/^[a-z0-9]*/)?.[0] ?? '';
    return !ignored.has(`${left}${match[0]}${right}`);
  });
  if (candidates.length === 0) return null;

  for (const match of candidates) {
    const start = match.index ?? 0;
    const before = clause.slice(0, start);
    const after = clause.slice(start + match[0].length);
    if (CURRENCY_AFTER.test(after) || CURRENCY_BEFORE.test(before)) {
      return parseFloat(match[0]);
    }
  }
  return parseFloat(candidates[0][0]);
}

/**
 * Match transcript clauses to items. Each item takes the priced clause
 * sharing the most keywords with its name; ties go to the earlier clause.
 */
export function parseSpokenQuote(
  transcript: string,
  items: Array<Pick<InventoryItem, 'id' | 'name'>>,
): Map<string, number> {
  const prices = new Map<string, number>();
  const clauses = transcript
    .toLowerCase()
    .replace(THOUSANDS_SEPARATOR, '$1')
    .split(CLAUSE_SPLIT)
    .map((c) => c.trim())
    .filter((c) => c.length > 0);

  for (const item of items) {
    const keywords = itemKeywords(item.name);
    const ignored = numericNameTokens(item.name);
    let best: { hits: number; price: number } | null = null;

    for (const clause of clauses) {
      const hits = keywords.filter((k) => clause.includes(k)).length;
      if (hits === 0 || (best !== null && hits <= best.hits)) continue;
      const price = extractPrice(clause, ignored);
      if (price !== null) {
        best = { hits, price };
      }
    }

    if (best !== null && best.price > 0) {
      prices.set(item.id, best.price);
    }
  }

  return prices;
}
