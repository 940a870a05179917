/**
 * PostgreSQL implementation of LedgerStore.
 *
 * Locked paths use `SELECT … FOR UPDATE` inside a transaction with a
 * `lock_timeout`, so concurrent writers for the same user queue on the row
 * and give up with LockTimeoutError once the bound passes. Transient
 * connection and serialization failures are retried via withRetry().
 */

import { and, asc, count, eq, lt, sql } from 'drizzle-orm';
import {
  LockTimeoutError,
  NotFoundError,
  type NewReportPurchase,
  type ReportPurchase,
  type SubscriptionRecord,
} from '@creditledger/core';
import type { PostgresDb } from './connection.postgres.js';
import { reportPurchases, subscriptions } from './schema.postgres.js';
import {
  defaultSubscriptionDraft,
  toDraft,
  type LedgerStore,
  type MutateResult,
  type RecordPurchaseResult,
  type SubscriptionMutator,
} from './ledger-store.js';
import { errorCode, PG_LOCK_NOT_AVAILABLE, withRetry } from '../lib/db-resilience.js';

type SubscriptionRow = typeof subscriptions.$inferSelect;
type PurchaseRow = typeof reportPurchases.$inferSelect;
type PostgresTx = Parameters<Parameters<PostgresDb['transaction']>[0]>[0];

export interface PostgresLedgerStoreOptions {
  /** Bound on row-lock waits in ms (default 5000) */
  lockTimeoutMs?: number;
}

function toSubscription(row: SubscriptionRow): SubscriptionRecord {
  return { ...row };
}

function toPurchase(row: PurchaseRow): ReportPurchase {
  return { ...row };
}

function isLockTimeout(err: unknown): boolean {
  if (errorCode(err) === PG_LOCK_NOT_AVAILABLE) return true;
  return err instanceof Error && err.cause !== undefined && isLockTimeout(err.cause);
}

export class PostgresLedgerStore implements LedgerStore {
  private readonly lockTimeoutMs: number;

  constructor(
    private db: PostgresDb,
    options: PostgresLedgerStoreOptions = {},
  ) {
    this.lockTimeoutMs = Math.max(1, Math.floor(options.lockTimeoutMs ?? 5000));
  }

  /** Transaction with a lock_timeout, retried on transient errors */
  private async locked<T>(fn: (tx: PostgresTx) => Promise<T>): Promise<T> {
    try {
      return await withRetry(() =>
        this.db.transaction(async (tx) => {
          await tx.execute(sql.raw(`SET LOCAL lock_timeout = '${this.lockTimeoutMs}ms'`));
          return fn(tx);
        }),
      );
    } catch (err) {
      if (isLockTimeout(err)) throw new LockTimeoutError();
      throw err;
    }
  }

  // ─── Subscriptions ─────────────────────────────────────────

  async getSubscription(userId: string): Promise<SubscriptionRecord | null> {
    const [row] = await this.db.select().from(subscriptions).where(eq(subscriptions.userId, userId)).limit(1);
    return row ? toSubscription(row) : null;
  }

  async findSubscriptionByProviderSubscription(subscriptionRef: string): Promise<SubscriptionRecord | null> {
    const [row] = await this.db
      .select()
      .from(subscriptions)
      .where(eq(subscriptions.providerSubscriptionRef, subscriptionRef))
      .limit(1);
    return row ? toSubscription(row) : null;
  }

  async findSubscriptionByProviderCustomer(customerRef: string): Promise<SubscriptionRecord | null> {
    const [row] = await this.db
      .select()
      .from(subscriptions)
      .where(eq(subscriptions.providerCustomerRef, customerRef))
      .orderBy(asc(subscriptions.createdAt))
      .limit(1);
    return row ? toSubscription(row) : null;
  }

  async mutateSubscription<R>(userId: string, mutator: SubscriptionMutator<R>): Promise<MutateResult<R>> {
    return this.locked(async (tx) => {
      const now = new Date();
      await tx
        .insert(subscriptions)
        .values({ userId, ...defaultSubscriptionDraft(), createdAt: now, updatedAt: now })
        .onConflictDoNothing();

      const [row] = await tx
        .select()
        .from(subscriptions)
        .where(eq(subscriptions.userId, userId))
        .for('update');
      if (!row) {
        throw new Error(`Subscription row for ${userId} vanished inside its transaction`);
      }

      const current = toSubscription(row);
      const draft = toDraft(current);
      const result = mutator(draft, current);

      const [saved] = await tx
        .update(subscriptions)
        .set({ ...draft, updatedAt: now })
        .where(eq(subscriptions.userId, userId))
        .returning();
      if (!saved) {
        throw new Error(`Subscription row for ${userId} was not updated`);
      }

      return { subscription: toSubscription(saved), result };
    });
  }

  async listExpiredTrials(now: Date): Promise<SubscriptionRecord[]> {
    const rows = await this.db
      .select()
      .from(subscriptions)
      .where(
        and(
          eq(subscriptions.plan, 'free'),
          eq(subscriptions.status, 'trialing'),
          lt(subscriptions.trialEnd, now),
        ),
      );
    return rows.map(toSubscription);
  }

  // ─── One-time purchases ────────────────────────────────────

  async oldestUnconsumedPurchase(userId: string): Promise<ReportPurchase | null> {
    const [row] = await this.db
      .select()
      .from(reportPurchases)
      .where(and(eq(reportPurchases.userId, userId), eq(reportPurchases.consumed, false)))
      .orderBy(asc(reportPurchases.id))
      .limit(1);
    return row ? toPurchase(row) : null;
  }

  async listPurchases(userId: string): Promise<ReportPurchase[]> {
    const rows = await this.db
      .select()
      .from(reportPurchases)
      .where(eq(reportPurchases.userId, userId))
      .orderBy(asc(reportPurchases.id));
    return rows.map(toPurchase);
  }

  async countUnconsumedPurchases(userId: string): Promise<number> {
    const [row] = await this.db
      .select({ total: count() })
      .from(reportPurchases)
      .where(and(eq(reportPurchases.userId, userId), eq(reportPurchases.consumed, false)));
    return row?.total ?? 0;
  }

  async recordPurchase(input: NewReportPurchase, now: Date = new Date()): Promise<RecordPurchaseResult> {
    return this.locked(async (tx) => {
      const [inserted] = await tx
        .insert(reportPurchases)
        .values({
          userId: input.userId,
          providerPaymentRef: input.providerPaymentRef,
          amount: input.amount,
          consumed: false,
          createdAt: now,
        })
        .onConflictDoNothing({ target: reportPurchases.providerPaymentRef })
        .returning();
      if (inserted) {
        return { created: true, purchase: toPurchase(inserted) };
      }

      const [existing] = await tx
        .select()
        .from(reportPurchases)
        .where(eq(reportPurchases.providerPaymentRef, input.providerPaymentRef))
        .limit(1);
      if (!existing) {
        throw new Error(`Purchase ${input.providerPaymentRef} conflicted but could not be read back`);
      }
      return { created: false, purchase: toPurchase(existing) };
    });
  }

  async consumePurchase(purchaseId: number, now: Date): Promise<{ consumed: boolean }> {
    return this.locked(async (tx) => {
      const [row] = await tx
        .select()
        .from(reportPurchases)
        .where(eq(reportPurchases.id, purchaseId))
        .for('update');
      if (!row) {
        throw new NotFoundError(`Report purchase ${purchaseId} not found`);
      }
      if (row.consumed) {
        return { consumed: false };
      }
      await tx
        .update(reportPurchases)
        .set({ consumed: true, consumedAt: now })
        .where(eq(reportPurchases.id, purchaseId));
      return { consumed: true };
    });
  }
}
