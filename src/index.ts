/**
 * procure-agent - library entry point
 */

export * from './types';
export { loadConfig, ConfigError, DEFAULT_CONFIG, isEmailConfigured, isTelephonyConfigured } from './utils/config';
export type { ProcurementConfig, CollectionGranularity, ScoringWeights, LoadConfigOptions } from './utils/config';
export { createLogger, logger } from './utils/logger';
export {
  loadCatalog,
  parseCatalog,
  CatalogError,
  needsReorder,
  stockStatus,
  itemsNeedingReorder,
  effectivePrice,
  isAuthorizedVendor,
  orderQuantity,
  summarizeCatalog,
} from './catalog';
export { parseCsv } from './catalog/csv-parser';
export { scoreVendor, scoreBreakdown, rankVendors, parsePaymentDays, DEFAULT_WEIGHTS } from './procurement/scoring';
export { parseSpokenQuote } from './procurement/transcript';
export {
  VoiceQuoteSource,
  StaticQuoteSource,
  FileTranscriptProvider,
} from './procurement/quote-sources';
export type { QuoteSource, QuoteRequest, LiveQuote, TranscriptProvider } from './procurement/quote-sources';
export { collectQuotes } from './procurement/quotes';
export type { CollectOptions, CollectResult, SkippedVendor, SkipReason } from './procurement/quotes';
export { selectQuote } from './procurement/selector';
export type { Selection } from './procurement/selector';
export { placeOrder } from './procurement/order';
export type { OrderResult } from './procurement/order';
export { ProcurementCycle, CycleBusyError } from './procurement/cycle';
export type { CycleResult, CycleState, CycleTransition, CycleDependencies } from './procurement/cycle';
export { TwilioTelephony, placeTestCall, buildTwiml } from './telephony/twilio';
export type { Telephony, CallResult } from './telephony/twilio';
export { sendEmail, sendPurchaseOrderEmail, createEmailSender, emailConfigFrom } from './notifications/email';
export type { EmailConfig, EmailResult, EmailSender } from './notifications/email';
export { ProcurementLedger, LedgerError } from './ledger';
export { recordsToCsv } from './ledger/csv';
