import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { DEFAULT_PRICE_REFS } from '@creditledger/core';
import { getConfig, validateConfig, type ServerConfig } from '../config.js';

describe('getConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = getConfig({});
    expect(config.port).toBe(3500);
    expect(config.storageBackend).toBe('sqlite');
    expect(config.dbPath).toBe('./creditledger.db');
    expect(config.databaseUrl).toBeUndefined();
    expect(config.lockTimeoutMs).toBe(5000);
    expect(config.providerTimeoutMs).toBe(10_000);
    expect(config.providerMaxRetries).toBe(2);
    expect(config.trialExpiryIntervalMs).toBe(3_600_000);
    expect(config.stripeSecretKey).toBeUndefined();
    expect(config.checkoutSuccessUrl).toBe('http://localhost:3000/billing/success');
    expect(config.prices).toEqual(DEFAULT_PRICE_REFS);
    expect(config.priceOverrides.size).toBe(0);
  });

  it('reads explicit values', () => {
    const config = getConfig({
      PORT: '8080',
      STORAGE_BACKEND: 'postgresql',
      DATABASE_URL: 'postgres://localhost/ledger',
      LOCK_TIMEOUT_MS: '250',
      STRIPE_SECRET_KEY: 'sk_test_placeholder',
      STRIPE_WEBHOOK_SECRET: 'test-secret',
    });
    expect(config.port).toBe(8080);
    expect(config.storageBackend).toBe('postgres');
    expect(config.databaseUrl).toBe('postgres://localhost/ledger');
    expect(config.lockTimeoutMs).toBe(250);
    expect(config.stripeSecretKey).toBe('sk_test_placeholder');
    expect(config.stripeWebhookSecret).toBe('test-secret');
  });

  it('falls back to defaults for non-numeric values', () => {
    expect(getConfig({ PORT: 'abc' }).port).toBe(3500);
  });

  it('treats empty strings as unset', () => {
    const config = getConfig({ STRIPE_SECRET_KEY: '', DATABASE_URL: '' });
    expect(config.stripeSecretKey).toBeUndefined();
    expect(config.databaseUrl).toBeUndefined();
  });

  it('merges price overrides and remembers which were explicit', () => {
    const config = getConfig({ STRIPE_PRICE_PRECISION_YEAR: 'price_live_pre_y' });
    expect(config.prices.precision_year).toBe('price_live_pre_y');
    expect(config.prices.essentials_month).toBe(DEFAULT_PRICE_REFS.essentials_month);
    expect([...config.priceOverrides]).toEqual(['precision_year']);
  });

  it('rejects an unknown storage backend', () => {
    expect(() => getConfig({ STORAGE_BACKEND: 'mysql' })).toThrow(
      "Invalid STORAGE_BACKEND: 'mysql'. Expected 'postgres', 'postgresql', or 'sqlite'.",
    );
  });
});

describe('validateConfig', () => {
  let warnSpy: MockInstance<typeof process.stdout.write>;

  beforeEach(() => {
    warnSpy = vi.spyOn(process.stdout, 'write').mockReturnValue(true);
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  function config(overrides: Partial<ServerConfig> = {}): ServerConfig {
    return { ...getConfig({}), stripeWebhookSecret: 'test-secret', ...overrides };
  }

  it('accepts the defaults with a webhook secret', () => {
    expect(() => validateConfig(config())).not.toThrow();
  });

  it('warns when running against the mock provider', () => {
    validateConfig(config());
    const lines = warnSpy.mock.calls.map((call) => String(call[0]));
    expect(lines.some((line) => line.includes('STRIPE_SECRET_KEY is not set'))).toBe(true);
  });

  it('requires DATABASE_URL for the postgres backend', () => {
    expect(() => validateConfig(config({ storageBackend: 'postgres' }))).toThrow(
      'FATAL: STORAGE_BACKEND=postgres requires DATABASE_URL to be set.',
    );
  });

  it('refuses a live key without a webhook secret', () => {
    expect(() =>
      validateConfig(config({ stripeSecretKey: 'sk_test_placeholder', stripeWebhookSecret: undefined })),
    ).toThrow(/STRIPE_SECRET_KEY is set without STRIPE_WEBHOOK_SECRET/);
  });

  it('rejects non-positive timeouts', () => {
    expect(() => validateConfig(config({ lockTimeoutMs: 0 }))).toThrow(
      'FATAL: LOCK_TIMEOUT_MS must be positive, got 0.',
    );
    expect(() => validateConfig(config({ providerTimeoutMs: -1 }))).toThrow(
      'FATAL: PROVIDER_TIMEOUT_MS must be positive, got -1.',
    );
  });

  it('rejects a negative retry count', () => {
    expect(() => validateConfig(config({ providerMaxRetries: -1 }))).toThrow(
      'FATAL: PROVIDER_MAX_RETRIES must not be negative, got -1.',
    );
  });
});
