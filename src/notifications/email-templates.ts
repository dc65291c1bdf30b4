/**
 * Email Templates - purchase order confirmation
 *
 * Simple inline CSS, mobile-responsive, no external dependencies.
 */

import type { Vendor, VendorQuote } from '../types';
import { formatCurrency } from '../export/formats';

const COLORS = {
  primary: '#1a73e8',
  text: '#202124',
  textSecondary: '#5f6368',
  border: '#dadce0',
  bgLight: '#f8f9fa',
  white: '#ffffff',
} as const;

export interface PurchaseOrderEmailInput {
  companyName: string;
  procurementEmail: string;
  orderNumber: string;
  vendor: Vendor;
  quote: VendorQuote;
}

export interface RenderedEmail {
  subject: string;
  html: string;
  text: string;
}

export function escapeHtml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}

function wrapLayout(title: string, companyName: string, bodyContent: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(title)}</title>
</head>
<body style="margin: 0; padding: 0; background-color: ${COLORS.bgLight}; font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, Helvetica, Arial, sans-serif;">
  <table role="presentation" cellpadding="0" cellspacing="0" style="width: 100%; background-color: ${COLORS.bgLight};">
    <tr>
      <td style="padding: 24px 16px;">
        <table role="presentation" cellpadding="0" cellspacing="0" style="max-width: 600px; margin: 0 auto; width: 100%;">
          <tr>
            <td style="background-color: ${COLORS.primary}; border-radius: 8px 8px 0 0; padding: 20px 24px;">
              <h1 style="margin: 0; color: ${COLORS.white}; font-size: 20px; font-weight: 600;">${escapeHtml(companyName)}</h1>
            </td>
          </tr>
          <tr>
            <td style="background-color: ${COLORS.white}; border: 1px solid ${COLORS.border}; border-top: none; border-radius: 0 0 8px 8px; padding: 24px; color: ${COLORS.text};">
              ${bodyContent}
            </td>
          </tr>
        </table>
      </td>
    </tr>
  </table>
</body>
</html>`;
}

/**
 * Purchase order notice sent to the winning vendor.
 */
export function renderPurchaseOrderEmail(input: PurchaseOrderEmailInput): RenderedEmail {
  const { companyName, procurementEmail, orderNumber, vendor, quote } = input;
  const subject = `Purchase Order ${orderNumber} from ${companyName}`;

  const rows = quote.lines
    .map(
      (line) => `
                <tr>
                  <td style="padding: 6px 8px; border-bottom: 1px solid ${COLORS.border};">${escapeHtml(line.itemName)}</td>
                  <td style="padding: 6px 8px; border-bottom: 1px solid ${COLORS.border}; text-align: right;">${line.quantity}</td>
                  <td style="padding: 6px 8px; border-bottom: 1px solid ${COLORS.border}; text-align: right;">${formatCurrency(line.unitPrice)}</td>
                  <td style="padding: 6px 8px; border-bottom: 1px solid ${COLORS.border}; text-align: right;">${formatCurrency(line.lineTotal)}</td>
                </tr>`,
    )
    .join('');

  const body = `
              <p style="margin: 0 0 16px;">Dear ${escapeHtml(vendor.contactPerson || vendor.name)},</p>
              <p style="margin: 0 0 16px;">You have been selected as our supplier for the items below.</p>
              <table role="presentation" cellpadding="0" cellspacing="0" style="width: 100%; border-collapse: collapse; font-size: 14px;">
                <tr style="background-color: ${COLORS.bgLight};">
                  <th style="padding: 6px 8px; text-align: left;">Item</th>
                  <th style="padding: 6px 8px; text-align: right;">Qty</th>
                  <th style="padding: 6px 8px; text-align: right;">Unit price</th>
                  <th style="padding: 6px 8px; text-align: right;">Total</th>
                </tr>${rows}
              </table>
              <p style="margin: 16px 0 4px;"><strong>Order number:</strong> ${escapeHtml(orderNumber)}</p>
              <p style="margin: 0 0 4px;"><strong>Total:</strong> ${formatCurrency(quote.totalCost)}</p>
              <p style="margin: 0 0 4px;"><strong>Delivery timeline:</strong> ${vendor.deliveryTimeDays} days</p>
              <p style="margin: 0 0 16px;"><strong>Payment terms:</strong> ${escapeHtml(vendor.paymentTerms || 'as agreed')}</p>
              <p style="margin: 0; color: ${COLORS.textSecondary}; font-size: 13px;">A formal purchase order follows separately. Please confirm receipt to ${escapeHtml(procurementEmail)}.</p>`;

  const textLines = [
    `Dear ${vendor.contactPerson || vendor.name},`,
    '',
    'You have been selected as our supplier for the following items:',
    ...quote.lines.map(
      (line) => `- ${line.itemName}: ${line.quantity} x ${formatCurrency(line.unitPrice)} = ${formatCurrency(line.lineTotal)}`,
    ),
    '',
    `Order number: ${orderNumber}`,
    `Total: ${formatCurrency(quote.totalCost)}`,
    `Delivery timeline: ${vendor.deliveryTimeDays} days`,
    `Payment terms: ${vendor.paymentTerms || 'as agreed'}`,
    '',
    `A formal purchase order follows separately. Please confirm receipt to ${procurementEmail}.`,
    '',
    `${companyName} Procurement Team`,
  ];

  return {
    subject,
    html: wrapLayout(subject, companyName, body),
    text: textLines.join('\n'),
  };
}
