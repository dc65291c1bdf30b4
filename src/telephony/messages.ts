/**
 * Spoken scripts for outbound vendor calls
 */

import type { Vendor, VendorQuote } from '../types';

export interface SpokenLine {
  itemName: string;
  quantity: number;
  unit?: string;
}

function listItems(lines: readonly SpokenLine[]): string {
  const parts = lines.map((l) => `${l.quantity} ${l.unit ? `${l.unit} of ` : 'units of '}${l.itemName}`);
  if (parts.length <= 1) return parts.join('');
  return `${parts.slice(0, -1).join(', ')} and ${parts[parts.length - 1]}`;
}

export function quoteRequestMessage(companyName: string, vendor: Vendor, lines: readonly SpokenLine[]): string {
  return (
    `Hello ${vendor.contactPerson || vendor.name}, this is the procurement team at ${companyName}. ` +
    `We would like a quotation for ${listItems(lines)}. ` +
    'Please state your unit price for each item after the tone. Thank you.'
  );
}

export function orderConfirmationMessage(
  companyName: string,
  vendor: Vendor,
  quote: VendorQuote,
  orderNumber: string,
): string {
  const total = quote.totalCost.toFixed(2);
  return (
    `Hello ${vendor.contactPerson || vendor.name}, this is ${companyName}. ` +
    `We are confirming purchase order ${orderNumber} for ${listItems(quote.lines)}, ` +
    `total ${total} rupees. A written purchase order will follow by email. Thank you.`
  );
}
