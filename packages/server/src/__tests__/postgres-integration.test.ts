/**
 * PostgreSQL integration tests: migrations, row locking and lock timeouts.
 * Skipped unless TEST_DATABASE_URL points at a disposable database.
 */
import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import { InsufficientCreditsError, LockTimeoutError, windowFrom } from '@creditledger/core';
import { createPostgresConnection, type PostgresConnection } from '../db/connection.postgres.js';
import { runPostgresMigrations } from '../db/migrate.postgres.js';
import { PostgresLedgerStore } from '../db/postgres-ledger-store.js';
import { PostgresUserDirectory } from '../db/user-directory.js';
import { CreditService } from '../billing/credit-service.js';

const DATABASE_URL = process.env['TEST_DATABASE_URL'];
const NOW = new Date('2026-03-10T12:00:00.000Z');

describe.skipIf(!DATABASE_URL)('PostgreSQL ledger', () => {
  let conn: PostgresConnection;
  let store: PostgresLedgerStore;

  beforeAll(async () => {
    conn = createPostgresConnection({ databaseUrl: DATABASE_URL ?? '', max: 4 });
    await runPostgresMigrations(conn.sql);
  });

  afterAll(async () => {
    await conn.sql.end({ timeout: 5 });
  });

  beforeEach(async () => {
    await conn.sql`TRUNCATE subscriptions, report_purchases, users`;
    store = new PostgresLedgerStore(conn.db, { lockTimeoutMs: 200 });
  });

  it('skips migrations that were already applied', async () => {
    const again = await runPostgresMigrations(conn.sql);
    expect(again.applied).toEqual([]);
    expect(again.skipped).toEqual(['0001_ledger.sql']);
  });

  it('round-trips a subscription row', async () => {
    const window = windowFrom(NOW);
    await store.mutateSubscription('user_1', (draft) => {
      draft.plan = 'precision';
      draft.interval = 'month';
      draft.status = 'active';
      draft.currentPeriodStart = window.start;
      draft.currentPeriodEnd = window.end;
    });

    const row = await store.getSubscription('user_1');
    expect(row).toMatchObject({ plan: 'precision', interval: 'month', status: 'active', periodUsage: 0 });
    expect(row?.currentPeriodEnd?.toISOString()).toBe('2026-04-10T11:59:59.000Z');
  });

  it('records purchases idempotently', async () => {
    const first = await store.recordPurchase({ userId: 'user_1', providerPaymentRef: 'pi_1', amount: 299 });
    const second = await store.recordPurchase({ userId: 'user_1', providerPaymentRef: 'pi_1', amount: 299 });

    expect(first.created).toBe(true);
    expect(second).toMatchObject({ created: false, purchase: { id: first.purchase.id } });
    expect(await store.consumePurchase(first.purchase.id, NOW)).toEqual({ consumed: true });
    expect(await store.consumePurchase(first.purchase.id, NOW)).toEqual({ consumed: false });
  });

  it('lets only one concurrent commit take the last credit', async () => {
    const window = windowFrom(NOW);
    await store.mutateSubscription('user_1', (draft) => {
      draft.plan = 'essentials';
      draft.interval = 'month';
      draft.status = 'active';
      draft.currentPeriodStart = window.start;
      draft.currentPeriodEnd = window.end;
      draft.periodUsage = 5;
    });
    const credits = new CreditService({ store });

    const tickets = await Promise.all([credits.reserve('user_1', 1, NOW), credits.reserve('user_1', 1, NOW)]);
    const outcomes = await Promise.allSettled(tickets.map((ticket) => credits.commit(ticket, NOW)));

    expect(outcomes.filter((o) => o.status === 'fulfilled')).toHaveLength(1);
    const rejected = outcomes.find((o): o is PromiseRejectedResult => o.status === 'rejected');
    expect(rejected?.reason).toBeInstanceOf(InsufficientCreditsError);
    expect((await store.getSubscription('user_1'))?.periodUsage).toBe(6);
  });

  it('gives up on a held row lock with LockTimeoutError', async () => {
    await store.mutateSubscription('user_1', () => undefined);

    let markLocked: () => void = () => undefined;
    let release: () => void = () => undefined;
    const locked = new Promise<void>((resolve) => {
      markLocked = resolve;
    });
    const held = conn.sql.begin(async (tx) => {
      await tx`SELECT user_id FROM subscriptions WHERE user_id = ${'user_1'} FOR UPDATE`;
      markLocked();
      await new Promise<void>((resolve) => {
        release = resolve;
      });
    });

    await locked;
    try {
      await expect(store.mutateSubscription('user_1', () => undefined)).rejects.toThrow(LockTimeoutError);
    } finally {
      release();
      await held;
    }
  });

  it('matches user emails case-insensitively', async () => {
    const users = new PostgresUserDirectory(conn.db);
    await users.upsert({ id: 'user_1', email: 'Carol@Example.com' });
    expect((await users.findByEmail('carol@example.com'))?.id).toBe('user_1');
  });
});
