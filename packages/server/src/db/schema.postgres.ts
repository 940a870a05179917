/**
 * PostgreSQL schema for the credit ledger: defined with Drizzle ORM.
 *
 * Mirror of schema.sqlite.ts with Postgres-native types:
 * - ISO text timestamps → timestamptz
 * - INTEGER booleans → boolean
 *
 * DDL lives in ./migrations; this file only describes the tables to Drizzle.
 */

import {
  pgTable,
  text,
  integer,
  boolean,
  serial,
  index,
  uniqueIndex,
  timestamp,
} from 'drizzle-orm/pg-core';

const tstz = (name: string) => timestamp(name, { withTimezone: true, mode: 'date' });

// ─── Users Table (mirrored from the auth service) ─────────
export const users = pgTable(
  'users',
  {
    id: text('id').primaryKey(),
    email: text('email').notNull(),
    createdAt: tstz('created_at').notNull().defaultNow(),
  },
  (table) => [uniqueIndex('idx_users_email').on(table.email)],
);

// ─── Subscriptions Table ──────────────────────────────────
export const subscriptions = pgTable(
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
    trialStart: tstz('trial_start'),
    trialEnd: tstz('trial_end'),
    currentPeriodStart: tstz('current_period_start'),
    currentPeriodEnd: tstz('current_period_end'),
    periodUsage: integer('period_usage').notNull().default(0),
    providerCustomerRef: text('provider_customer_ref'),
    providerSubscriptionRef: text('provider_subscription_ref'),
    cancelAtPeriodEnd: boolean('cancel_at_period_end').notNull().default(false),
    providerPeriodEnd: tstz('provider_period_end'),
    providerEventAt: tstz('provider_event_at'),
    createdAt: tstz('created_at').notNull(),
    updatedAt: tstz('updated_at').notNull(),
  },
  (table) => [
    index('idx_subscriptions_customer').on(table.providerCustomerRef),
    index('idx_subscriptions_provider_sub').on(table.providerSubscriptionRef),
    index('idx_subscriptions_status_trial_end').on(table.status, table.trialEnd),
  ],
);

// ─── Report Purchases Table ───────────────────────────────
export const reportPurchases = pgTable(
  'report_purchases',
  {
    id: serial('id').primaryKey(),
    userId: text('user_id').notNull(),
    providerPaymentRef: text('provider_payment_ref').notNull(),
    amount: integer('amount').notNull(),
    consumed: boolean('consumed').notNull().default(false),
    consumedAt: tstz('consumed_at'),
    createdAt: tstz('created_at').notNull(),
  },
  (table) => [
    uniqueIndex('idx_purchases_payment_ref').on(table.providerPaymentRef),
    index('idx_purchases_user_unconsumed').on(table.userId, table.consumed, table.id),
  ],
);
