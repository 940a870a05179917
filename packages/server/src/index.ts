/**
 * @creditledger/server: entitlement ledger, provider reconciliation and the
 * Hono HTTP API around them.
 *
 * Exports:
 * - createServices(deps, config): wires the billing services over a store
 * - createApp(services, config): factory that returns a configured Hono app
 * - startServer(): standalone entry point that opens storage and starts listening
 */

import { Hono } from 'hono';
import { logger } from 'hono/logger';
import { serve } from '@hono/node-server';
import { sql as sqlTag } from 'drizzle-orm';
import { getErrorMessage, PlanCatalog } from '@creditledger/core';
import { getConfig, validateConfig, type ServerConfig } from './config.js';
import { createDb } from './db/index.js';
import { runMigrations } from './db/migrate.sqlite.js';
import { runPostgresMigrations } from './db/migrate.postgres.js';
import { createPostgresConnection, verifyPostgresConnection } from './db/connection.postgres.js';
import type { LedgerStore } from './db/ledger-store.js';
import { SqliteLedgerStore } from './db/sqlite-ledger-store.js';
import { PostgresLedgerStore } from './db/postgres-ledger-store.js';
import { PostgresUserDirectory, SqliteUserDirectory, type UserDirectory } from './db/user-directory.js';
import { createStripeClient, type IStripeClient } from './billing/stripe-client.js';
import { PriceLookup } from './billing/price-lookup.js';
import { CreditService } from './billing/credit-service.js';
import { SubscriptionService } from './billing/subscription-service.js';
import { CheckoutService } from './billing/checkout-service.js';
import { WebhookReconciler } from './billing/reconciler.js';
import { billingRoutes } from './routes/billing.js';
import { webhookRoutes } from './routes/webhooks.js';
import { healthRoutes } from './routes/health.js';
import { apiBodyLimit } from './middleware/body-limit.js';
import { toErrorResponse } from './lib/error-sanitizer.js';
import { TrialExpiryJob } from './lib/trial-expiry-job.js';
import { createLogger } from './lib/logger.js';

// Re-export everything consumers may need
export { getConfig, validateConfig } from './config.js';
export type { ServerConfig } from './config.js';
export * from './billing/index.js';
export { createDb, createTestDb } from './db/index.js';
export type { SqliteDb } from './db/index.js';
export { runMigrations } from './db/migrate.sqlite.js';
export { runPostgresMigrations } from './db/migrate.postgres.js';
export { createPostgresConnection } from './db/connection.postgres.js';
export type { LedgerStore, MutateResult, SubscriptionMutator } from './db/ledger-store.js';
export { SqliteLedgerStore } from './db/sqlite-ledger-store.js';
export { PostgresLedgerStore } from './db/postgres-ledger-store.js';
export { SqliteUserDirectory, PostgresUserDirectory } from './db/user-directory.js';
export type { UserDirectory } from './db/user-directory.js';
export { TrialExpiryJob } from './lib/trial-expiry-job.js';
export { createLogger } from './lib/logger.js';

const log = createLogger('Server');

export interface ServiceDeps {
  store: LedgerStore;
  users: UserDirectory;
  stripe: IStripeClient;
  /** Storage round trip for the health check */
  ping?: () => Promise<void>;
}

export interface LedgerServices extends ServiceDeps {
  catalog: PlanCatalog;
  credits: CreditService;
  subscriptions: SubscriptionService;
  checkout: CheckoutService;
  reconciler: WebhookReconciler;
}

export function createServices(deps: ServiceDeps, config: ServerConfig): LedgerServices {
  const catalog = new PlanCatalog(config.prices);
  const prices = new PriceLookup(catalog, deps.stripe, config.priceOverrides);

  return {
    ...deps,
    catalog,
    credits: new CreditService({ store: deps.store }),
    subscriptions: new SubscriptionService({ store: deps.store, stripe: deps.stripe }),
    checkout: new CheckoutService({
      store: deps.store,
      stripe: deps.stripe,
      users: deps.users,
      prices,
      successUrl: config.checkoutSuccessUrl,
      cancelUrl: config.checkoutCancelUrl,
    }),
    reconciler: new WebhookReconciler({
      store: deps.store,
      stripe: deps.stripe,
      users: deps.users,
      catalog,
    }),
  };
}

/**
 * Create a configured Hono app with all routes and middleware.
 */
export function createApp(services: LedgerServices, config: ServerConfig) {
  const app = new Hono();

  // ─── Global error handler ──────────────────────────────
  app.onError((err, c) => {
    const { status, body } = toErrorResponse(err);
    if (status >= 500) {
      log.error('Unhandled error', { path: c.req.path, error: getErrorMessage(err) });
    }
    return c.json(body, status);
  });

  app.notFound((c) => c.json({ error: 'Not found', status: 404 }, 404));

  app.use('*', logger());
  app.use('/api/*', apiBodyLimit);
  app.use('/webhooks/*', apiBodyLimit);

  // ─── Health check (no identity) ────────────────────────
  app.route(
    '/api/health',
    healthRoutes({
      storageBackend: config.storageBackend,
      ping: services.ping ?? (async () => undefined),
    }),
  );

  // ─── Provider webhooks (signature-verified, no identity) ──
  app.route(
    '/webhooks',
    webhookRoutes({
      stripe: services.stripe,
      reconciler: services.reconciler,
      webhookSecret: config.stripeWebhookSecret,
    }),
  );

  // ─── Billing (identity required) ───────────────────────
  app.route(
    '/api/billing',
    billingRoutes({
      users: services.users,
      subscriptions: services.subscriptions,
      checkout: services.checkout,
    }),
  );

  return app;
}

interface OpenedStorage {
  store: LedgerStore;
  users: UserDirectory;
  ping: () => Promise<void>;
  close: () => Promise<void>;
}

async function openStorage(config: ServerConfig): Promise<OpenedStorage> {
  if (config.storageBackend === 'postgres') {
    if (!config.databaseUrl) {
      throw new Error('DATABASE_URL is required for the postgres backend');
    }
    const { db, sql } = createPostgresConnection({ databaseUrl: config.databaseUrl, max: config.pgPoolMax });
    await verifyPostgresConnection(sql);
    const migrations = await runPostgresMigrations(sql);
    log.info('PostgreSQL migrations complete', { applied: migrations.applied.length });
    return {
      store: new PostgresLedgerStore(db, { lockTimeoutMs: config.lockTimeoutMs }),
      users: new PostgresUserDirectory(db),
      ping: async () => {
        await sql`SELECT 1`;
      },
      close: async () => {
        await sql.end({ timeout: 5 });
      },
    };
  }

  const db = createDb({ databasePath: config.dbPath, busyTimeoutMs: config.lockTimeoutMs });
  runMigrations(db);
  return {
    store: new SqliteLedgerStore(db),
    users: new SqliteUserDirectory(db),
    ping: async () => {
      db.run(sqlTag`SELECT 1`);
    },
    close: async () => {
      db.$client.close();
    },
  };
}

/**
 * Start the server as a standalone process.
 * Opens storage, runs migrations, starts the trial sweep and starts listening.
 */
export async function startServer() {
  const config = getConfig();
  validateConfig(config);

  const storage = await openStorage(config);
  const stripe = createStripeClient(config);
  const services = createServices({ store: storage.store, users: storage.users, stripe, ping: storage.ping }, config);
  const app = createApp(services, config);

  const trialJob = new TrialExpiryJob(services.subscriptions, { intervalMs: config.trialExpiryIntervalMs });
  trialJob.start();

  log.info(`Credit ledger starting on port ${config.port}`, {
    storage: config.storageBackend,
    provider: config.stripeSecretKey ? 'stripe' : 'mock',
  });

  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    log.info(`Credit ledger listening on http://localhost:${info.port}`);
  });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info(`Received ${signal}, shutting down`);
    trialJob.stop();
    server.close(() => {
      storage
        .close()
        .then(() => process.exit(0))
        .catch((err) => {
          log.error('Failed to close storage', { error: getErrorMessage(err) });
          process.exit(1);
        });
    });
  };
  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));

  return app;
}
