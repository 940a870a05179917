/**
 * Server configuration: reads from environment variables with sensible defaults.
 *
 * Built once at process start and passed by reference; nothing below this
 * module reads `process.env` afterwards.
 */

import { DEFAULT_PRICE_REFS, type PriceConfig } from '@creditledger/core';
import { createLogger } from './lib/logger.js';

const log = createLogger('Config');

export type Env = Record<string, string | undefined>;

export interface ServerConfig {
  /** Port to listen on (default: 3500) */
  port: number;
  /** Storage backend: 'sqlite' (default) or 'postgres' */
  storageBackend: 'sqlite' | 'postgres';
  /** SQLite database path (default: './creditledger.db') */
  dbPath: string;
  /** PostgreSQL connection string (required for the postgres backend) */
  databaseUrl?: string;
  /** PostgreSQL pool size (default: 10) */
  pgPoolMax: number;
  /** Bound on row-lock and busy waits, in ms (default: 5000) */
  lockTimeoutMs: number;

  // ─── Payment provider ───────────────────────────────────
  /** Stripe secret key; without one the in-process mock client is used */
  stripeSecretKey?: string;
  /** Shared secret for webhook signature verification */
  stripeWebhookSecret?: string;
  /** Plan key → provider price ref (defaults merged with overrides) */
  prices: PriceConfig;
  /** Plan keys whose price ref was set explicitly in the environment */
  priceOverrides: ReadonlySet<keyof PriceConfig>;
  /** Per-request provider timeout in ms (default: 10000) */
  providerTimeoutMs: number;
  /** Network retries for provider calls (default: 2) */
  providerMaxRetries: number;

  // ─── Hosted checkout ────────────────────────────────────
  checkoutSuccessUrl: string;
  checkoutCancelUrl: string;

  /** How often expired free trials are swept, in ms (default: 3600000) */
  trialExpiryIntervalMs: number;
}

const PRICE_ENV_VARS: Record<keyof PriceConfig, string> = {
  essentials_month: 'STRIPE_PRICE_ESSENTIALS_MONTH',
  essentials_year: 'STRIPE_PRICE_ESSENTIALS_YEAR',
  precision_month: 'STRIPE_PRICE_PRECISION_MONTH',
  precision_year: 'STRIPE_PRICE_PRECISION_YEAR',
  one_time_report: 'STRIPE_PRICE_ONE_TIME_REPORT',
};

function intFrom(raw: string | undefined, fallback: number): number {
  const parsed = parseInt(raw ?? String(fallback), 10);
  return isNaN(parsed) ? fallback : parsed;
}

function readPrices(env: Env): { prices: PriceConfig; overrides: Set<keyof PriceConfig> } {
  const prices: PriceConfig = { ...DEFAULT_PRICE_REFS };
  const overrides = new Set<keyof PriceConfig>();
  for (const [key, variable] of Object.entries(PRICE_ENV_VARS)) {
    const value = env[variable];
    if (!value) continue;
    switch (key) {
      case 'essentials_month':
      case 'essentials_year':
      case 'precision_month':
      case 'precision_year':
      case 'one_time_report':
        prices[key] = value;
        overrides.add(key);
        break;
    }
  }
  return { prices, overrides };
}

/**
 * Read configuration from environment variables.
 */
export function getConfig(env: Env = process.env): ServerConfig {
  const storageBackend = (() => {
    const raw = env['STORAGE_BACKEND'];
    if (!raw) return 'sqlite' as const;
    const normalized = raw === 'postgresql' ? 'postgres' : raw;
    if (normalized !== 'postgres' && normalized !== 'sqlite') {
      throw new Error(`Invalid STORAGE_BACKEND: '${raw}'. Expected 'postgres', 'postgresql', or 'sqlite'.`);
    }
    return normalized;
  })();
  const { prices, overrides } = readPrices(env);

  return {
    port: intFrom(env['PORT'], 3500),
    storageBackend,
    dbPath: env['DB_PATH'] ?? './creditledger.db',
    databaseUrl: env['DATABASE_URL'] || undefined,
    pgPoolMax: intFrom(env['PG_POOL_MAX'], 10),
    lockTimeoutMs: intFrom(env['LOCK_TIMEOUT_MS'], 5000),

    stripeSecretKey: env['STRIPE_SECRET_KEY'] || undefined,
    stripeWebhookSecret: env['STRIPE_WEBHOOK_SECRET'] || undefined,
    prices,
    priceOverrides: overrides,
    providerTimeoutMs: intFrom(env['PROVIDER_TIMEOUT_MS'], 10_000),
    providerMaxRetries: intFrom(env['PROVIDER_MAX_RETRIES'], 2),

    checkoutSuccessUrl: env['CHECKOUT_SUCCESS_URL'] ?? 'http://localhost:3000/billing/success',
    checkoutCancelUrl: env['CHECKOUT_CANCEL_URL'] ?? 'http://localhost:3000/billing/cancel',

    trialExpiryIntervalMs: intFrom(env['TRIAL_EXPIRY_INTERVAL_MS'], 3_600_000),
  };
}

/**
 * Validate config at startup. Logs warnings and throws on fatal misconfigurations.
 */
export function validateConfig(config: ServerConfig): void {
  if (config.storageBackend === 'postgres' && !config.databaseUrl) {
    throw new Error('FATAL: STORAGE_BACKEND=postgres requires DATABASE_URL to be set.');
  }

  if (config.stripeSecretKey && !config.stripeWebhookSecret) {
    throw new Error(
      'FATAL: STRIPE_SECRET_KEY is set without STRIPE_WEBHOOK_SECRET. ' +
        'Webhooks cannot be verified, so provider state would never be reconciled.',
    );
  }

  if (config.lockTimeoutMs <= 0) {
    throw new Error(`FATAL: LOCK_TIMEOUT_MS must be positive, got ${config.lockTimeoutMs}.`);
  }
  if (config.providerTimeoutMs <= 0) {
    throw new Error(`FATAL: PROVIDER_TIMEOUT_MS must be positive, got ${config.providerTimeoutMs}.`);
  }
  if (config.trialExpiryIntervalMs <= 0) {
    throw new Error(`FATAL: TRIAL_EXPIRY_INTERVAL_MS must be positive, got ${config.trialExpiryIntervalMs}.`);
  }
  if (config.providerMaxRetries < 0) {
    throw new Error(`FATAL: PROVIDER_MAX_RETRIES must not be negative, got ${config.providerMaxRetries}.`);
  }

  if (!config.stripeSecretKey) {
    log.warn('⚠️  STRIPE_SECRET_KEY is not set. Using the in-process mock payment provider.');
  }
  if (!config.stripeWebhookSecret) {
    log.warn('⚠️  STRIPE_WEBHOOK_SECRET is not set. POST /webhooks/stripe will answer 500.');
  }
}
