/**
 * Email delivery - SendGrid and Mailgun HTTP APIs
 *
 * Purchase order confirmations go out through whichever provider is
 * configured. Failures come back as `{ success: false }`; nothing here throws.
 */

import { createLogger } from '../utils/logger';
import type { ProcurementConfig } from '../utils/config';
import { escapeHtml, renderPurchaseOrderEmail, type PurchaseOrderEmailInput } from './email-templates';

const logger = createLogger('email-delivery');

// =============================================================================
// TYPES
// =============================================================================

export interface EmailConfig {
  provider: 'sendgrid' | 'mailgun';
  apiKey: string;
  fromEmail: string;
  fromName?: string;
  /** Required for Mailgun */
  domain?: string;
}

export interface EmailParams {
  to: string;
  subject: string;
  html: string;
  text?: string;
}

export interface EmailResult {
  success: boolean;
  provider: string;
  messageId?: string;
  error?: string;
}

// =============================================================================
// SENDGRID
// =============================================================================

async function sendViaSendGrid(config: EmailConfig, params: EmailParams): Promise<EmailResult> {
  const { apiKey, fromEmail, fromName } = config;
  const { to, subject, html, text } = params;

  const body = {
    personalizations: [
      {
        to: [{ email: to }],
      },
    ],
    from: {
      email: fromEmail,
      ...(fromName ? { name: fromName } : {}),
    },
    subject,
    content: [
      ...(text ? [{ type: 'text/plain', value: text }] : []),
      { type: 'text/html', value: html },
    ],
  };

  try {
    const response = await fetch('https://api.sendgrid.com/v3/mail/send', {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(10_000),
    });

    if (!response.ok) {
      const errorText = await response.text().catch(() => 'Unknown error');
      logger.warn({ status: response.status, to }, 'SendGrid delivery failed');
      return {
        success: false,
        provider: 'sendgrid',
        error: `HTTP ${response.status}: ${errorText.slice(0, 500)}`,
      };
    }

    const messageId = response.headers.get('x-message-id') ?? undefined;
    logger.info({ to, messageId }, 'Email sent via SendGrid');
    return { success: true, provider: 'sendgrid', messageId };
  } catch (err) {
    const errorMsg = err instanceof Error ? err.message : String(err);
    logger.error({ err, to }, 'SendGrid delivery error');
    return { success: false, provider: 'sendgrid', error: errorMsg };
  }
}

// =============================================================================
// MAILGUN
// =============================================================================

async function sendViaMailgun(config: EmailConfig, params: EmailParams): Promise<EmailResult> {
  const { apiKey, fromEmail, fromName, domain } = config;
  const { to, subject, html, text } = params;

  if (!domain) {
    return {
      success: false,
      provider: 'mailgun',
      error: 'Mailgun domain is required',
    };
  }

  const fromStr = fromName ? `${fromName} <${fromEmail}>` : fromEmail;
  const formData = new URLSearchParams();
  formData.set('from', fromStr);
  formData.set('to', to);
  formData.set('subject', subject);
  formData.set('html', html);
  if (text) {
    formData.set('text', text);
  }

  const authToken = Buffer.from(`api:${apiKey}`).toString('base64');

  try {
    const response = await fetch(`https://api.mailgun.net/v3/${domain}/messages`, {
      method: 'POST',
      headers: {
        Authorization: `Basic ${authToken}`,
        'Content-Type': 'application/x-www-form-urlencoded',
      },
      body: formData.toString(),
      signal: AbortSignal.timeout(10_000),
    });

    if (!response.ok) {
      const errorText = await response.text().catch(() => 'Unknown error');
      logger.warn({ status: response.status, to, domain }, 'Mailgun delivery failed');
      return {
        success: false,
        provider: 'mailgun',
        error: `HTTP ${response.status}: ${errorText.slice(0, 500)}`,
      };
    }

    const data: unknown = await response.json().catch(() => ({}));
    const messageId =
      typeof data === 'object' && data !== null && 'id' in data && typeof data.id === 'string'
        ? data.id
        : undefined;
    logger.info({ to, messageId }, 'Email sent via Mailgun');
    return { success: true, provider: 'mailgun', messageId };
  } catch (err) {
    const errorMsg = err instanceof Error ? err.message : String(err);
    logger.error({ err, to, domain }, 'Mailgun delivery error');
    return { success: false, provider: 'mailgun', error: errorMsg };
  }
}

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Send an email using the configured provider (SendGrid or Mailgun).
 */
export async function sendEmail(config: EmailConfig, params: EmailParams): Promise<EmailResult> {
  if (!config.apiKey) {
    return { success: false, provider: config.provider, error: 'API key is required' };
  }
  if (!config.fromEmail) {
    return { success: false, provider: config.provider, error: 'From email is required' };
  }
  if (!params.to) {
    return { success: false, provider: config.provider, error: 'Recipient email is required' };
  }
  if (!params.subject) {
    return { success: false, provider: config.provider, error: 'Subject is required' };
  }
  if (!params.html) {
    return { success: false, provider: config.provider, error: 'HTML body is required' };
  }

  switch (config.provider) {
    case 'sendgrid':
      return sendViaSendGrid(config, params);
    case 'mailgun':
      return sendViaMailgun(config, params);
    default: {
      const provider: string = config.provider;
      return { success: false, provider, error: `Unknown email provider: ${provider}` };
    }
  }
}

/**
 * Provider settings from the loaded configuration.
 */
export function emailConfigFrom(config: ProcurementConfig): EmailConfig {
  const { provider, apiKey, fromEmail, fromName, domain } = config.email;
  return {
    provider,
    apiKey,
    fromEmail,
    fromName: fromName ?? `${config.companyName} Procurement`,
    domain,
  };
}

/**
 * Send the purchase order confirmation to the vendor's email address.
 */
export async function sendPurchaseOrderEmail(
  config: EmailConfig,
  input: PurchaseOrderEmailInput,
): Promise<EmailResult> {
  const { subject, html, text } = renderPurchaseOrderEmail(input);
  logger.debug({ vendorId: input.vendor.id, orderNumber: input.orderNumber }, 'Sending purchase order email');
  return sendEmail(config, { to: input.vendor.email, subject, html, text });
}

/**
 * Email sender for the order placer.
 */
export interface EmailSender {
  readonly configured: boolean;
  sendPurchaseOrder(input: PurchaseOrderEmailInput): Promise<EmailResult>;
}

export function createEmailSender(config: EmailConfig): EmailSender {
  return {
    configured: Boolean(config.apiKey && config.fromEmail),
    sendPurchaseOrder: (input) => sendPurchaseOrderEmail(config, input),
  };
}

/**
 * Send a test email to verify configuration.
 */
export async function sendTestEmail(config: EmailConfig, to: string, companyName: string): Promise<EmailResult> {
  const sentAt = new Date().toISOString();
  const html = `
    <div style="font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; max-width: 600px; margin: 0 auto; padding: 20px;">
      <h2 style="color: #1a73e8;">${escapeHtml(companyName)} procurement email test</h2>
      <p>Purchase order confirmations will be sent with these settings.</p>
      <div style="background: #f0f7ff; border-radius: 8px; padding: 16px; margin: 16px 0;">
        <p style="margin: 0;"><strong>Provider:</strong> ${config.provider}</p>
        <p style="margin: 4px 0 0;"><strong>From:</strong> ${escapeHtml(config.fromName ?? '')} &lt;${escapeHtml(config.fromEmail)}&gt;</p>
        <p style="margin: 4px 0 0;"><strong>Time:</strong> ${sentAt}</p>
      </div>
    </div>
  `;

  return sendEmail(config, {
    to,
    subject: `${companyName} - Email Configuration Test`,
    html,
    text: `Procurement email test\n\nProvider: ${config.provider}\nFrom: ${config.fromEmail}\nTime: ${sentAt}`,
  });
}
