/**
 * Configuration loading and validation for the procurement agent
 *
 * Sources, lowest precedence first: built-in defaults, an optional JSON file
 * (PROCURE_CONFIG_PATH, default ./procure.json) and environment variables
 * (a .env file in the working directory is loaded through dotenv).
 *
 * The result is frozen and meant to be loaded once at startup and passed
 * down by reference.
 */

import { readFileSync, existsSync } from 'fs';
import { homedir } from 'os';
import { resolve } from 'path';
import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { createLogger } from './logger';

const logger = createLogger('config');

// =============================================================================
// SCHEMA
// =============================================================================

const weightsSchema = z
  .object({
    price: z.coerce.number().min(0).max(1),
    rating: z.coerce.number().min(0).max(1),
    delivery: z.coerce.number().min(0).max(1),
    terms: z.coerce.number().min(0).max(1),
  })
  .refine((w) => Math.abs(w.price + w.rating + w.delivery + w.terms - 1) < 1e-6, {
    message: 'Scoring weights must sum to 1',
  });

const configSchema = z.object({
  companyName: z.string().min(1),
  procurementEmail: z.string().email(),
  /** The only number calls may go to. Empty means no vendor is callable. */
  allowedPhoneNumber: z.string().trim(),
  approval: z.object({
    autoApproveThreshold: z.coerce.number().min(0),
  }),
  collection: z.object({
    granularity: z.enum(['batch', 'per-item']),
    pauseSeconds: z.coerce.number().min(0),
    timeoutMs: z.coerce.number().int().positive(),
    fallbackQuotes: z.preprocess(parseBoolean, z.boolean()),
  }),
  telephony: z.object({
    accountSid: z.string(),
    authToken: z.string(),
    fromNumber: z.string(),
    maxRetries: z.coerce.number().int().min(1).max(10),
    retryDelayMs: z.coerce.number().int().min(0).max(60_000),
    callTimeoutMs: z.coerce.number().int().positive(),
  }),
  email: z.object({
    provider: z.enum(['sendgrid', 'mailgun']),
    apiKey: z.string(),
    fromEmail: z.string(),
    fromName: z.string().optional(),
    domain: z.string().optional(),
  }),
  paths: z.object({
    inventoryCsv: z.string().min(1),
    vendorsCsv: z.string().min(1),
    offersCsv: z.string().min(1),
    ledgerFile: z.string().min(1),
    reportFile: z.string().min(1),
    transcriptsDir: z.string().min(1),
  }),
  scoring: z.object({
    weights: weightsSchema,
  }),
}).superRefine((config, ctx) => {
  const worstCase = telephonyWorstCaseMs(config.telephony);
  if (config.collection.timeoutMs < worstCase) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['collection', 'timeoutMs'],
      message: `Must be at least ${worstCase} (every call attempt timing out, plus retry delays)`,
    });
  }
});

/** Longest a single placeCall can take: every attempt times out, with the retry delays between. */
export function telephonyWorstCaseMs(telephony: {
  maxRetries: number;
  callTimeoutMs: number;
  retryDelayMs: number;
}): number {
  return telephony.maxRetries * telephony.callTimeoutMs + (telephony.maxRetries - 1) * telephony.retryDelayMs;
}

export type ProcurementConfig = z.infer<typeof configSchema>;
export type CollectionGranularity = ProcurementConfig['collection']['granularity'];
export type ScoringWeights = ProcurementConfig['scoring']['weights'];

/** Raw, pre-validation shape: every leaf may still be a string from env or JSON. */
type RawConfig = { [key: string]: unknown };

// =============================================================================
// ERRORS
// =============================================================================

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

// =============================================================================
// DEFAULTS
// =============================================================================

export const DEFAULT_CONFIG: ProcurementConfig = {
  companyName: 'Acme Supplies',
  procurementEmail: 'procurement@example.com',
  allowedPhoneNumber: '',
  approval: {
    autoApproveThreshold: 1000,
  },
  collection: {
    granularity: 'batch',
    pauseSeconds: 2,
    timeoutMs: 120_000,
    fallbackQuotes: true,
  },
  telephony: {
    accountSid: '',
    authToken: '',
    fromNumber: '',
    maxRetries: 3,
    retryDelayMs: 5000,
    callTimeoutMs: 30_000,
  },
  email: {
    provider: 'sendgrid',
    apiKey: '',
    fromEmail: '',
  },
  paths: {
    inventoryCsv: 'data/inventory.csv',
    vendorsCsv: 'data/vendors.csv',
    offersCsv: 'data/vendor_items.csv',
    ledgerFile: 'data/procurement_ledger.json',
    reportFile: 'data/procurement_report.csv',
    transcriptsDir: 'data/transcripts',
  },
  scoring: {
    weights: { price: 0.4, rating: 0.3, delivery: 0.2, terms: 0.1 },
  },
};

// =============================================================================
// HELPERS
// =============================================================================

function parseBoolean(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return value;
}

function resolveUserPath(input: string): string {
  const trimmed = input.trim();
  if (!trimmed) return trimmed;
  if (trimmed.startsWith('~')) {
    return resolve(trimmed.replace(/^~(?=$|[\\/])/, homedir()));
  }
  return resolve(trimmed);
}

function isPlainObject(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Substitute environment variables in config values.
 * Supports ${VAR_NAME} syntax.
 */
function substituteEnvVars(obj: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof obj === 'string') {
    return obj.replace(/\$\{([A-Z_][A-Z0-9_]*)\}/g, (_, varName: string) => {
      return env[varName] ?? '';
    });
  }
  if (Array.isArray(obj)) {
    return obj.map((entry) => substituteEnvVars(entry, env));
  }
  if (isPlainObject(obj)) {
    const result: RawConfig = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVars(value, env);
    }
    return result;
  }
  return obj;
}

/**
 * Deep merge two objects. Protects against prototype pollution.
 */
function deepMerge(target: RawConfig, source: RawConfig): RawConfig {
  const DANGEROUS_KEYS = new Set(['__proto__', 'constructor', 'prototype']);
  const result: RawConfig = { ...target };
  for (const key of Object.keys(source)) {
    if (DANGEROUS_KEYS.has(key)) continue;
    const sourceValue = source[key];
    const targetValue = target[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }
  return result;
}

/** Env var name -> config path. Unset variables leave the lower layers alone. */
const ENV_BINDINGS: Array<[string, string[]]> = [
  ['COMPANY_NAME', ['companyName']],
  ['PROCUREMENT_EMAIL', ['procurementEmail']],
  ['ALLOWED_PHONE_NUMBER', ['allowedPhoneNumber']],
  ['AUTO_APPROVE_THRESHOLD', ['approval', 'autoApproveThreshold']],
  ['QUOTE_GRANULARITY', ['collection', 'granularity']],
  ['QUOTE_PAUSE_SECONDS', ['collection', 'pauseSeconds']],
  ['QUOTE_TIMEOUT_MS', ['collection', 'timeoutMs']],
  ['FALLBACK_QUOTES', ['collection', 'fallbackQuotes']],
  ['TWILIO_ACCOUNT_SID', ['telephony', 'accountSid']],
  ['TWILIO_AUTH_TOKEN', ['telephony', 'authToken']],
  ['TWILIO_PHONE_NUMBER', ['telephony', 'fromNumber']],
  ['MAX_RETRIES', ['telephony', 'maxRetries']],
  ['RETRY_DELAY_MS', ['telephony', 'retryDelayMs']],
  ['CALL_TIMEOUT_MS', ['telephony', 'callTimeoutMs']],
  ['EMAIL_PROVIDER', ['email', 'provider']],
  ['EMAIL_API_KEY', ['email', 'apiKey']],
  ['EMAIL_FROM', ['email', 'fromEmail']],
  ['EMAIL_FROM_NAME', ['email', 'fromName']],
  ['MAILGUN_DOMAIN', ['email', 'domain']],
  ['INVENTORY_CSV', ['paths', 'inventoryCsv']],
  ['VENDORS_CSV', ['paths', 'vendorsCsv']],
  ['VENDOR_ITEMS_CSV', ['paths', 'offersCsv']],
  ['LEDGER_FILE', ['paths', 'ledgerFile']],
  ['REPORT_FILE', ['paths', 'reportFile']],
  ['TRANSCRIPTS_DIR', ['paths', 'transcriptsDir']],
];

function envOverrides(env: NodeJS.ProcessEnv): RawConfig {
  const overrides: RawConfig = {};
  for (const [name, path] of ENV_BINDINGS) {
    const value = env[name];
    if (value === undefined || value === '') continue;

    let node = overrides;
    for (const segment of path.slice(0, -1)) {
      const next = node[segment];
      if (isPlainObject(next)) {
        node = next;
      } else {
        const created: RawConfig = {};
        node[segment] = created;
        node = created;
      }
    }
    node[path[path.length - 1]] = value;
  }
  return overrides;
}

function readConfigFile(configPath: string): RawConfig {
  if (!existsSync(configPath)) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to parse config file ${configPath}`, [reason]);
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Config file ${configPath} must contain a JSON object`);
  }
  logger.debug({ configPath }, 'Loaded config file');
  return parsed;
}

// =============================================================================
// PUBLIC API
// =============================================================================

export interface LoadConfigOptions {
  /** Explicit JSON config path. Defaults to PROCURE_CONFIG_PATH or ./procure.json. */
  configPath?: string;
  /** Environment to read. Defaults to process.env after loading .env. */
  env?: NodeJS.ProcessEnv;
}

/**
 * Load configuration from defaults, file and environment.
 * Throws ConfigError when the merged result does not validate.
 */
export function loadConfig(options: LoadConfigOptions = {}): Readonly<ProcurementConfig> {
  if (!options.env) {
    dotenvConfig();
  }
  const env = options.env ?? process.env;
  const configPath = resolveUserPath(
    options.configPath ?? env.PROCURE_CONFIG_PATH ?? 'procure.json',
  );

  const fileConfig = substituteEnvVars(readConfigFile(configPath), env);
  const merged = deepMerge(
    deepMerge(DEFAULT_CONFIG, isPlainObject(fileConfig) ? fileConfig : {}),
    envOverrides(env),
  );

  const result = configSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
    );
    throw new ConfigError('Invalid configuration', issues);
  }

  return deepFreeze(result.data);
}

/** Whether Twilio credentials are present. */
export function isTelephonyConfigured(config: ProcurementConfig): boolean {
  const { accountSid, authToken, fromNumber } = config.telephony;
  return Boolean(accountSid && authToken && fromNumber);
}

/** Whether an email provider is usable. */
export function isEmailConfigured(config: ProcurementConfig): boolean {
  const { apiKey, fromEmail, provider, domain } = config.email;
  if (!apiKey || !fromEmail) return false;
  return provider !== 'mailgun' || Boolean(domain);
}

function deepFreeze<T>(value: T): Readonly<T> {
  if (isPlainObject(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}
