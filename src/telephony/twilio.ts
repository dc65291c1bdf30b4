/**
 * Twilio voice calls over the REST API
 *
 * Every call passes the allow-list gate first: a number other than the one
 * configured allowed number is refused with a `blocked` result before any
 * credential check or network request.
 */

import { z } from 'zod';
import { createLogger } from '../utils/logger';
import { errorForStatus, isTransientError, NonRetryableError, withRetry, sleep as defaultSleep } from '../infra/retry';

const logger = createLogger('twilio');

const TWILIO_API_BASE = 'https://api.twilio.com/2010-04-01';

// =============================================================================
// TYPES
// =============================================================================

export type CallResult =
  | { status: 'placed'; callId: string }
  | { status: 'blocked'; to: string }
  | { status: 'failed'; error: string }
  | { status: 'unconfigured' };

export interface CallStatus {
  callId: string;
  status: string;
  to: string;
  from: string;
  duration: number | null;
}

export interface PlaceCallOptions {
  /** Aborting stops the request in flight and any further attempts. */
  signal?: AbortSignal;
}

/** Voice call collaborator used by the quote collector and order placer. */
export interface Telephony {
  readonly configured: boolean;
  readonly allowedNumber: string;
  placeCall(to: string, message: string, options?: PlaceCallOptions): Promise<CallResult>;
}

export interface TwilioOptions {
  accountSid: string;
  authToken: string;
  fromNumber: string;
  allowedNumber: string;
  maxRetries?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
  voice?: string;
  language?: string;
  sleep?: (ms: number) => Promise<void>;
}

const callResponseSchema = z.object({
  sid: z.string().optional(),
  status: z.string().optional(),
  to: z.string().optional(),
  from: z.string().optional(),
  duration: z.union([z.string(), z.number()]).nullish(),
});

// =============================================================================
// TWIML
// =============================================================================

function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

export function buildTwiml(message: string, voice = 'alice', language = 'en-IN'): string {
  return `<Response><Say voice="${escapeXml(voice)}" language="${escapeXml(language)}">${escapeXml(message)}</Say></Response>`;
}

// =============================================================================
// CLIENT
// =============================================================================

export class TwilioTelephony implements Telephony {
  readonly allowedNumber: string;
  private readonly options: Required<Omit<TwilioOptions, 'sleep'>>;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: TwilioOptions) {
    this.allowedNumber = options.allowedNumber.trim();
    this.options = {
      maxRetries: 3,
      retryDelayMs: 5000,
      timeoutMs: 30_000,
      voice: 'alice',
      language: 'en-IN',
      ...options,
    };
    this.sleep = options.sleep ?? defaultSleep;
  }

  get configured(): boolean {
    const { accountSid, authToken, fromNumber } = this.options;
    return Boolean(accountSid && authToken && fromNumber);
  }

  private authHeader(): string {
    const { accountSid, authToken } = this.options;
    return `Basic ${Buffer.from(`${accountSid}:${authToken}`).toString('base64')}`;
  }

  private accountUrl(path: string): string {
    return `${TWILIO_API_BASE}/Accounts/${encodeURIComponent(this.options.accountSid)}${path}`;
  }

  /**
   * Place an outbound call that speaks `message`. Never throws.
   */
  async placeCall(to: string, message: string, options: PlaceCallOptions = {}): Promise<CallResult> {
    const { signal } = options;
    const target = to.trim();
    if (!this.allowedNumber || target !== this.allowedNumber) {
      logger.warn({ to: target }, 'Blocked call to number outside the allow-list');
      return { status: 'blocked', to: target };
    }

    if (!this.configured) {
      logger.warn('Twilio credentials not configured');
      return { status: 'unconfigured' };
    }

    const { fromNumber, maxRetries, retryDelayMs, timeoutMs, voice, language } = this.options;
    const body = new URLSearchParams({
      From: fromNumber,
      To: target,
      Twiml: buildTwiml(message, voice, language),
    });

    try {
      const callId = await withRetry(
        async () => {
          if (signal?.aborted) {
            throw new NonRetryableError('Call aborted before it was placed');
          }
          const response = await fetch(this.accountUrl('/Calls.json'), {
            method: 'POST',
            headers: {
              Authorization: this.authHeader(),
              'Content-Type': 'application/x-www-form-urlencoded',
            },
            body: body.toString(),
            signal: signal ? AbortSignal.any([signal, AbortSignal.timeout(timeoutMs)]) : AbortSignal.timeout(timeoutMs),
          });

          if (response.status !== 201) {
            const errorText = await response.text().catch(() => 'Unknown error');
            throw errorForStatus(response.status, errorText);
          }

          const data = callResponseSchema.parse(await response.json());
          if (!data.sid) {
            throw new Error('Twilio response did not include a call SID');
          }
          return data.sid;
        },
        {
          maxAttempts: maxRetries,
          minDelay: retryDelayMs,
          maxDelay: retryDelayMs,
          backoffMultiplier: 1,
          jitter: 0,
          sleep: this.sleep,
          retryPredicate: (error) => !signal?.aborted && isTransientError(error),
          onRetry: ({ attempt, error, willRetry }) => {
            logger.warn({ attempt, willRetry, error: error.message }, 'Call attempt failed');
          },
        },
      );

      logger.info({ to: target, callId }, 'Call placed');
      return { status: 'placed', callId };
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      logger.error({ to: target, error }, 'All call attempts failed');
      return { status: 'failed', error };
    }
  }

  /**
   * Fetch the current status of a call. Returns null on any failure.
   */
  async getCallStatus(callId: string): Promise<CallStatus | null> {
    if (!this.configured) return null;
    try {
      const response = await fetch(this.accountUrl(`/Calls/${encodeURIComponent(callId)}.json`), {
        headers: { Authorization: this.authHeader() },
        signal: AbortSignal.timeout(10_000),
      });
      if (!response.ok) {
        logger.warn({ callId, status: response.status }, 'Failed to get call status');
        return null;
      }
      const data = callResponseSchema.parse(await response.json());
      return {
        callId: data.sid ?? callId,
        status: data.status ?? 'unknown',
        to: data.to ?? '',
        from: data.from ?? '',
        duration: data.duration != null && data.duration !== '' ? Number(data.duration) : null,
      };
    } catch (err) {
      logger.error({ err, callId }, 'Error getting call status');
      return null;
    }
  }
}

/**
 * Call the allow-listed number with a short test message.
 */
export function placeTestCall(telephony: Telephony, companyName: string): Promise<CallResult> {
  const message =
    `Hello, this is a test call from the ${companyName} procurement system. ` +
    'The automated calling system is working. Thank you.';
  return telephony.placeCall(telephony.allowedNumber, message);
}
