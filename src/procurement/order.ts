/**
 * Order Placer - confirmation call plus purchase order email
 *
 * The call and the email are independent: one failing (or throwing) never
 * stops the other.
 */

import type { RecordStatus, Vendor, VendorQuote } from '../types';
import type { Telephony, CallResult } from '../telephony/twilio';
import { orderConfirmationMessage } from '../telephony/messages';
import type { EmailSender, EmailResult } from '../notifications/email';
import { createLogger } from '../utils/logger';

const logger = createLogger('order');

export interface PlaceOrderInput {
  vendor: Vendor;
  quote: VendorQuote;
  orderNumber: string;
  companyName: string;
  procurementEmail: string;
}

export interface OrderResult {
  status: Extract<RecordStatus, 'Completed' | 'CallFailed' | 'EmailFailed'>;
  callId: string | null;
  emailSent: boolean;
  call: CallResult | null;
  email: EmailResult;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export async function placeOrder(
  input: PlaceOrderInput,
  telephony: Telephony,
  email: EmailSender,
): Promise<OrderResult> {
  const { vendor, quote, orderNumber, companyName, procurementEmail } = input;

  let call: CallResult | null = null;
  if (telephony.configured) {
    try {
      call = await telephony.placeCall(
        vendor.phone,
        orderConfirmationMessage(companyName, vendor, quote, orderNumber),
      );
    } catch (err) {
      call = { status: 'failed', error: errorMessage(err) };
    }
    if (call.status !== 'placed') {
      logger.warn({ vendorId: vendor.id, orderNumber, call }, 'Order confirmation call failed');
    }
  } else {
    logger.info({ vendorId: vendor.id }, 'Telephony not configured, skipping confirmation call');
  }

  let emailResult: EmailResult;
  if (!email.configured) {
    logger.info({ vendorId: vendor.id }, 'Email provider not configured, skipping purchase order email');
    emailResult = { success: false, provider: 'none', error: 'Email provider not configured' };
  } else {
    try {
      emailResult = await email.sendPurchaseOrder({ companyName, procurementEmail, orderNumber, vendor, quote });
    } catch (err) {
      emailResult = { success: false, provider: 'unknown', error: errorMessage(err) };
    }
  }
  if (email.configured && !emailResult.success) {
    logger.warn({ vendorId: vendor.id, orderNumber, error: emailResult.error }, 'Purchase order email failed');
  }

  const callId = call?.status === 'placed' ? call.callId : null;
  const emailSent = emailResult.success;

  let status: OrderResult['status'];
  if (callId !== null || emailSent) {
    status = 'Completed';
  } else if (call !== null) {
    status = 'CallFailed';
  } else {
    status = 'EmailFailed';
  }

  logger.info({ vendorId: vendor.id, orderNumber, status, callId, emailSent }, 'Order placement finished');
  return { status, callId, emailSent, call, email: emailResult };
}
