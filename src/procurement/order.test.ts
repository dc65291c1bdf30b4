import { describe, it, expect, vi } from 'vitest';
import { placeOrder, type PlaceOrderInput } from './order';
import type { Telephony, CallResult } from '../telephony/twilio';
import type { EmailResult, EmailSender } from '../notifications/email';
import { ALLOWED_NUMBER, makeQuote, makeVendor } from '../testing/fixtures';

function telephony(result: CallResult | Error, configured = true) {
  const placeCall = vi.fn(async (): Promise<CallResult> => {
    if (result instanceof Error) throw result;
    return result;
  });
  const fake: Telephony = { configured, allowedNumber: ALLOWED_NUMBER, placeCall };
  return { fake, placeCall };
}

function emailSender(result: EmailResult | Error, configured = true) {
  const sendPurchaseOrder = vi.fn(async (): Promise<EmailResult> => {
    if (result instanceof Error) throw result;
    return result;
  });
  const fake: EmailSender = { configured, sendPurchaseOrder };
  return { fake, sendPurchaseOrder };
}

const input: PlaceOrderInput = {
  vendor: makeVendor(),
  quote: makeQuote(),
  orderNumber: 'PO-20261019-V001',
  companyName: 'Acme Supplies',
  procurementEmail: 'procurement@example.com',
};

const sent: EmailResult = { success: true, provider: 'sendgrid', messageId: 'msg-1' };
const notSent: EmailResult = { success: false, provider: 'sendgrid', error: 'SendGrid API error (500)' };

describe('placeOrder', () => {
  it('completes when both the call and the email go through', async () => {
    const call = telephony({ status: 'placed', callId: 'CA1' });
    const email = emailSender(sent);

    const result = await placeOrder(input, call.fake, email.fake);

    expect(result).toMatchObject({ status: 'Completed', callId: 'CA1', emailSent: true });
    expect(call.placeCall).toHaveBeenCalledWith(
      ALLOWED_NUMBER,
      'Hello Asha Rao, this is Acme Supplies. We are confirming purchase order PO-20261019-V001 ' +
        'for 100 units of USB Cable, total 5000.00 rupees. A written purchase order will follow by email. Thank you.',
    );
    expect(email.sendPurchaseOrder).toHaveBeenCalledWith({
      companyName: 'Acme Supplies',
      procurementEmail: 'procurement@example.com',
      orderNumber: 'PO-20261019-V001',
      vendor: input.vendor,
      quote: input.quote,
    });
  });

  it('still sends the email when the call fails', async () => {
    const email = emailSender(sent);
    const result = await placeOrder(input, telephony({ status: 'failed', error: 'busy' }).fake, email.fake);

    expect(email.sendPurchaseOrder).toHaveBeenCalledTimes(1);
    expect(result).toMatchObject({ status: 'Completed', callId: null, emailSent: true });
    expect(result.call).toEqual({ status: 'failed', error: 'busy' });
  });

  it('completes on the call alone when the email fails', async () => {
    const result = await placeOrder(input, telephony({ status: 'placed', callId: 'CA2' }).fake, emailSender(notSent).fake);
    expect(result).toMatchObject({ status: 'Completed', callId: 'CA2', emailSent: false });
    expect(result.email.error).toBe('SendGrid API error (500)');
  });

  it('is CallFailed when an attempted call and the email both fail', async () => {
    const result = await placeOrder(input, telephony({ status: 'blocked', to: ALLOWED_NUMBER }).fake, emailSender(notSent).fake);
    expect(result).toMatchObject({ status: 'CallFailed', callId: null, emailSent: false });
  });

  it('is EmailFailed when telephony is off and the email fails', async () => {
    const call = telephony({ status: 'placed', callId: 'CA3' }, false);
    const result = await placeOrder(input, call.fake, emailSender(notSent).fake);

    expect(call.placeCall).not.toHaveBeenCalled();
    expect(result).toMatchObject({ status: 'EmailFailed', call: null, callId: null, emailSent: false });
  });

  it('skips the email when no provider is configured', async () => {
    const email = emailSender(sent, false);
    const result = await placeOrder(input, telephony({ status: 'placed', callId: 'CA4' }).fake, email.fake);

    expect(email.sendPurchaseOrder).not.toHaveBeenCalled();
    expect(result).toMatchObject({ status: 'Completed', callId: 'CA4', emailSent: false });
    expect(result.email).toEqual({ success: false, provider: 'none', error: 'Email provider not configured' });
  });

  it('turns thrown errors into failed results', async () => {
    const result = await placeOrder(
      input,
      telephony(new Error('socket hang up')).fake,
      emailSender(new Error('smtp down')).fake,
    );

    expect(result.status).toBe('CallFailed');
    expect(result.call).toEqual({ status: 'failed', error: 'socket hang up' });
    expect(result.email).toEqual({ success: false, provider: 'unknown', error: 'smtp down' });
  });
});
