/**
 * Wires configuration into the collaborators a cycle needs
 */

import type { ProcurementConfig } from '../utils/config';
import { loadCatalog } from '../catalog';
import type { Catalog } from '../types';
import { TwilioTelephony } from '../telephony/twilio';
import { createEmailSender, emailConfigFrom } from '../notifications/email';
import { ProcurementLedger } from '../ledger';
import { ProcurementCycle, type CycleTransition } from '../procurement/cycle';
import {
  FileTranscriptProvider,
  StaticQuoteSource,
  VoiceQuoteSource,
  type QuoteSource,
} from '../procurement/quote-sources';

export interface RuntimeOptions {
  /** Answer quotes from catalog prices instead of calling vendors. */
  simulate?: boolean;
  onTransition?: (transition: CycleTransition) => void;
}

export interface Runtime {
  config: Readonly<ProcurementConfig>;
  telephony: TwilioTelephony;
  ledger: ProcurementLedger;
  cycle: ProcurementCycle;
  loadCatalog(): Promise<Catalog>;
}

export function createRuntime(config: Readonly<ProcurementConfig>, options: RuntimeOptions = {}): Runtime {
  const telephony = new TwilioTelephony({
    accountSid: config.telephony.accountSid,
    authToken: config.telephony.authToken,
    fromNumber: config.telephony.fromNumber,
    allowedNumber: config.allowedPhoneNumber,
    maxRetries: config.telephony.maxRetries,
    retryDelayMs: config.telephony.retryDelayMs,
    timeoutMs: config.telephony.callTimeoutMs,
  });

  const ledger = new ProcurementLedger({
    ledgerFile: config.paths.ledgerFile,
    reportFile: config.paths.reportFile,
  });

  const quoteSource: QuoteSource = options.simulate
    ? new StaticQuoteSource()
    : new VoiceQuoteSource(telephony, new FileTranscriptProvider(config.paths.transcriptsDir), config.companyName);

  const cycle = new ProcurementCycle({
    config,
    quoteSource,
    telephony,
    email: createEmailSender(emailConfigFrom(config)),
    ledger,
    onTransition: options.onTransition,
  });

  return {
    config,
    telephony,
    ledger,
    cycle,
    loadCatalog: async () => (await loadCatalog(config.paths)).catalog,
  };
}
