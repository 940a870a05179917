/**
 * Database migration runner (SQLite).
 *
 * Uses CREATE TABLE IF NOT EXISTS for idempotent startup; the embedded
 * database is created on first start.
 */

import { sql } from 'drizzle-orm';
import type { SqliteDb } from './index.js';

/**
 * Run migrations: create all tables and indexes if they don't exist.
 */
export function runMigrations(db: SqliteDb): void {
  db.run(sql`
    CREATE TABLE IF NOT EXISTS users (
      id TEXT PRIMARY KEY,
      email TEXT NOT NULL COLLATE NOCASE,
      created_at TEXT NOT NULL
    )
  `);
  db.run(sql`CREATE UNIQUE INDEX IF NOT EXISTS idx_users_email ON users(email)`);

  db.run(sql`
    CREATE TABLE IF NOT EXISTS subscriptions (
      user_id TEXT PRIMARY KEY,
      plan TEXT NOT NULL DEFAULT 'free' CHECK (plan IN ('free', 'essentials', 'precision')),
      interval TEXT CHECK (interval IN ('month', 'year')),
      status TEXT NOT NULL DEFAULT 'inactive'
        CHECK (status IN ('inactive', 'trialing', 'active', 'past_due', 'canceled')),
      trial_start TEXT,
      trial_end TEXT,
      current_period_start TEXT,
      current_period_end TEXT,
      period_usage INTEGER NOT NULL DEFAULT 0 CHECK (period_usage >= 0),
      provider_customer_ref TEXT,
      provider_subscription_ref TEXT,
      cancel_at_period_end INTEGER NOT NULL DEFAULT 0,
      provider_period_end TEXT,
      provider_event_at TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    )
  `);
  db.run(sql`CREATE INDEX IF NOT EXISTS idx_subscriptions_customer ON subscriptions(provider_customer_ref)`);
  db.run(sql`CREATE INDEX IF NOT EXISTS idx_subscriptions_provider_sub ON subscriptions(provider_subscription_ref)`);
  db.run(sql`CREATE INDEX IF NOT EXISTS idx_subscriptions_status_trial_end ON subscriptions(status, trial_end)`);

  db.run(sql`
    CREATE TABLE IF NOT EXISTS report_purchases (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id TEXT NOT NULL,
      provider_payment_ref TEXT NOT NULL,
      amount INTEGER NOT NULL,
      consumed INTEGER NOT NULL DEFAULT 0,
      consumed_at TEXT,
      created_at TEXT NOT NULL
    )
  `);
  db.run(sql`CREATE UNIQUE INDEX IF NOT EXISTS idx_purchases_payment_ref ON report_purchases(provider_payment_ref)`);
  db.run(sql`CREATE INDEX IF NOT EXISTS idx_purchases_user_unconsumed ON report_purchases(user_id, consumed, id)`);
}
