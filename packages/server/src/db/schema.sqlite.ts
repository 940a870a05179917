/**
 * SQLite schema for the credit ledger: defined with Drizzle ORM.
 *
 * Tables: users, subscriptions, report_purchases
 * Timestamps are ISO 8601 strings in UTC.
 */

import { sqliteTable, text, integer, index, uniqueIndex } from 'drizzle-orm/sqlite-core';

// ─── Users Table (mirrored from the auth service) ─────────
export const users = sqliteTable(
  'users',
  {
    id: text('id').primaryKey(),
    email: text('email').notNull(),
    createdAt: text('created_at').notNull(),
  },
  (table) => [uniqueIndex('idx_users_email').on(table.email)],
);

// ─── Subscriptions Table ──────────────────────────────────
export const subscriptions = sqliteTable(
  'subscriptions',
  {
    userId: text('user_id').primaryKey(),
    plan: text('plan', { enum: ['free', 'essentials', 'precision'] })
      .notNull()
      .default('free'),
    interval: text('interval', { enum: ['month', 'year'] }),
    status: text('status', {
      enum: ['inactive', 'trialing', 'active', 'past_due', 'canceled'],
    })
      .notNull()
      .default('inactive'),
    trialStart: text('trial_start'),
    trialEnd: text('trial_end'),
    currentPeriodStart: text('current_period_start'),
    currentPeriodEnd: text('current_period_end'),
    periodUsage: integer('period_usage').notNull().default(0),
    providerCustomerRef: text('provider_customer_ref'),
    providerSubscriptionRef: text('provider_subscription_ref'),
    cancelAtPeriodEnd: integer('cancel_at_period_end', { mode: 'boolean' }).notNull().default(false),
    providerPeriodEnd: text('provider_period_end'),
    providerEventAt: text('provider_event_at'),
    createdAt: text('created_at').notNull(),
    updatedAt: text('updated_at').notNull(),
  },
  (table) => [
    index('idx_subscriptions_customer').on(table.providerCustomerRef),
    index('idx_subscriptions_provider_sub').on(table.providerSubscriptionRef),
    index('idx_subscriptions_status_trial_end').on(table.status, table.trialEnd),
  ],
);

// ─── Report Purchases Table ───────────────────────────────
export const reportPurchases = sqliteTable(
  'report_purchases',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    userId: text('user_id').notNull(),
    providerPaymentRef: text('provider_payment_ref').notNull(),
    amount: integer('amount').notNull(),
    consumed: integer('consumed', { mode: 'boolean' }).notNull().default(false),
    consumedAt: text('consumed_at'),
    createdAt: text('created_at').notNull(),
  },
  (table) => [
    uniqueIndex('idx_purchases_payment_ref').on(table.providerPaymentRef),
    index('idx_purchases_user_unconsumed').on(table.userId, table.consumed, table.id),
  ],
);
