import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  loadConfig,
  ConfigError,
  DEFAULT_CONFIG,
  isEmailConfigured,
  isTelephonyConfigured,
  telephonyWorstCaseMs,
} from './config';

describe('loadConfig', () => {
  let dir: string;
  let missing: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'config-test-'));
    missing = join(dir, 'absent.json');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('returns the defaults with an empty environment', () => {
    const config = loadConfig({ configPath: missing, env: {} });
    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('applies environment overrides with coercion', () => {
    const config = loadConfig({
      configPath: missing,
      env: {
        COMPANY_NAME: 'Northwind Traders',
        ALLOWED_PHONE_NUMBER: ' +15550100001 ',
        AUTO_APPROVE_THRESHOLD: '2500',
        QUOTE_GRANULARITY: 'per-item',
        FALLBACK_QUOTES: 'no',
        MAX_RETRIES: '2',
        EMAIL_PROVIDER: 'mailgun',
        MAILGUN_DOMAIN: 'mg.example.com',
      },
    });

    expect(config.companyName).toBe('Northwind Traders');
    expect(config.allowedPhoneNumber).toBe('+15550100001');
    expect(config.approval.autoApproveThreshold).toBe(2500);
    expect(config.collection).toEqual({ ...DEFAULT_CONFIG.collection, granularity: 'per-item', fallbackQuotes: false });
    expect(config.telephony.maxRetries).toBe(2);
    expect(config.email).toMatchObject({ provider: 'mailgun', domain: 'mg.example.com' });
  });

  it('layers the JSON file under the environment and substitutes ${VAR}', () => {
    const file = join(dir, 'procure.json');
    writeFileSync(
      file,
      JSON.stringify({
        companyName: 'File Co',
        procurementEmail: 'buying@example.com',
        telephony: { authToken: '${TEST_TOKEN}' },
        scoring: { weights: { price: 0.5, rating: 0.2, delivery: 0.2, terms: 0.1 } },
      }),
    );

    const config = loadConfig({ configPath: file, env: { COMPANY_NAME: 'Env Co', TEST_TOKEN: 'test-secret' } });

    expect(config.companyName).toBe('Env Co');
    expect(config.procurementEmail).toBe('buying@example.com');
    expect(config.telephony.authToken).toBe('test-secret');
    expect(config.telephony.maxRetries).toBe(3);
    expect(config.scoring.weights.price).toBe(0.5);
  });

  it('rejects weights that do not sum to 1', () => {
    const file = join(dir, 'procure.json');
    writeFileSync(file, JSON.stringify({ scoring: { weights: { price: 0.5, rating: 0.5, delivery: 0.5, terms: 0 } } }));

    expect(() => loadConfig({ configPath: file, env: {} })).toThrow('Scoring weights must sum to 1');
  });

  it('reports every invalid field', () => {
    try {
      loadConfig({ configPath: missing, env: { PROCUREMENT_EMAIL: 'not-an-email', QUOTE_GRANULARITY: 'weekly' } });
      expect.unreachable('loadConfig should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (!(err instanceof ConfigError)) return;
      expect(err.issues).toHaveLength(2);
      expect(err.issues[0]).toMatch(/^procurementEmail: /);
      expect(err.issues[1]).toMatch(/^collection\.granularity: /);
    }
  });

  it('requires the quote timeout to outlast every call attempt', () => {
    expect(telephonyWorstCaseMs(DEFAULT_CONFIG.telephony)).toBe(100_000);
    expect(() => loadConfig({ configPath: missing, env: { QUOTE_TIMEOUT_MS: '30000' } })).toThrow(
      'collection.timeoutMs: Must be at least 100000 (every call attempt timing out, plus retry delays)',
    );
    expect(
      loadConfig({ configPath: missing, env: { QUOTE_TIMEOUT_MS: '30000', MAX_RETRIES: '1' } }).collection.timeoutMs,
    ).toBe(30000);
  });

  it('rejects a config file that is not JSON', () => {
    const file = join(dir, 'procure.json');
    writeFileSync(file, 'companyName = "x"');

    expect(() => loadConfig({ configPath: file, env: {} })).toThrow(ConfigError);
  });

  it('freezes the result', () => {
    const config = loadConfig({ configPath: missing, env: {} });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.collection)).toBe(true);
  });
});

describe('integration checks', () => {
  it('needs all three Twilio settings', () => {
    const telephony = { ...DEFAULT_CONFIG.telephony, accountSid: 'AC-test', authToken: 'test-secret' };
    expect(isTelephonyConfigured({ ...DEFAULT_CONFIG, telephony })).toBe(false);
    expect(isTelephonyConfigured({ ...DEFAULT_CONFIG, telephony: { ...telephony, fromNumber: '+15550100000' } })).toBe(true);
  });

  it('needs a domain for Mailgun', () => {
    const email = { provider: 'mailgun' as const, apiKey: 'test-key', fromEmail: 'po@example.com' };
    expect(isEmailConfigured({ ...DEFAULT_CONFIG, email })).toBe(false);
    expect(isEmailConfigured({ ...DEFAULT_CONFIG, email: { ...email, domain: 'mg.example.com' } })).toBe(true);
  });
});
