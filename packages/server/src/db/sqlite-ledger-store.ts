/**
 * SQLite implementation of LedgerStore.
 *
 * Write transactions start with BEGIN IMMEDIATE, which takes the database
 * write lock up front. That lock is the per-row lock of this backend; waits
 * for it are bounded by the connection's `busy_timeout`.
 */

import { and, asc, count, eq, lt } from 'drizzle-orm';
import {
  LockTimeoutError,
  NotFoundError,
  type NewReportPurchase,
  type ReportPurchase,
  type SubscriptionDraft,
  type SubscriptionRecord,
} from '@creditledger/core';
import type { SqliteDb } from './index.js';
import { reportPurchases, subscriptions } from './schema.sqlite.js';
import {
  defaultSubscriptionDraft,
  toDraft,
  type LedgerStore,
  type MutateResult,
  type RecordPurchaseResult,
  type SubscriptionMutator,
} from './ledger-store.js';
import { errorCode } from '../lib/db-resilience.js';

type SubscriptionRow = typeof subscriptions.$inferSelect;
type PurchaseRow = typeof reportPurchases.$inferSelect;
type SqliteTx = Parameters<Parameters<SqliteDb['transaction']>[0]>[0];

// ─── Helpers ───────────────────────────────────────────────

function toIso(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}

function fromIso(value: string | null): Date | null {
  return value === null ? null : new Date(value);
}

function toSubscription(row: SubscriptionRow): SubscriptionRecord {
  return {
    userId: row.userId,
    plan: row.plan,
    interval: row.interval,
    status: row.status,
    trialStart: fromIso(row.trialStart),
    trialEnd: fromIso(row.trialEnd),
    currentPeriodStart: fromIso(row.currentPeriodStart),
    currentPeriodEnd: fromIso(row.currentPeriodEnd),
    periodUsage: row.periodUsage,
    providerCustomerRef: row.providerCustomerRef,
    providerSubscriptionRef: row.providerSubscriptionRef,
    cancelAtPeriodEnd: row.cancelAtPeriodEnd,
    providerPeriodEnd: fromIso(row.providerPeriodEnd),
    providerEventAt: fromIso(row.providerEventAt),
    createdAt: new Date(row.createdAt),
    updatedAt: new Date(row.updatedAt),
  };
}

function toColumns(draft: SubscriptionDraft) {
  return {
    plan: draft.plan,
    interval: draft.interval,
    status: draft.status,
    trialStart: toIso(draft.trialStart),
    trialEnd: toIso(draft.trialEnd),
    currentPeriodStart: toIso(draft.currentPeriodStart),
    currentPeriodEnd: toIso(draft.currentPeriodEnd),
    periodUsage: draft.periodUsage,
    providerCustomerRef: draft.providerCustomerRef,
    providerSubscriptionRef: draft.providerSubscriptionRef,
    cancelAtPeriodEnd: draft.cancelAtPeriodEnd,
    providerPeriodEnd: toIso(draft.providerPeriodEnd),
    providerEventAt: toIso(draft.providerEventAt),
  };
}

function toPurchase(row: PurchaseRow): ReportPurchase {
  return {
    id: row.id,
    userId: row.userId,
    providerPaymentRef: row.providerPaymentRef,
    amount: row.amount,
    consumed: row.consumed,
    consumedAt: fromIso(row.consumedAt),
    createdAt: new Date(row.createdAt),
  };
}

function isBusy(err: unknown): boolean {
  const code = errorCode(err);
  if (code === 'SQLITE_BUSY' || code === 'SQLITE_LOCKED') return true;
  return err instanceof Error && err.cause !== undefined && isBusy(err.cause);
}

// ─── SqliteLedgerStore ─────────────────────────────────────

export class SqliteLedgerStore implements LedgerStore {
  constructor(private db: SqliteDb) {}

  /** Run `fn` in a BEGIN IMMEDIATE transaction, mapping busy waits to LockTimeoutError */
  private locked<T>(fn: (tx: SqliteTx) => T): T {
    try {
      return this.db.transaction(fn, { behavior: 'immediate' });
    } catch (err) {
      if (isBusy(err)) throw new LockTimeoutError();
      throw err;
    }
  }

  // ─── Subscriptions ─────────────────────────────────────────

  async getSubscription(userId: string): Promise<SubscriptionRecord | null> {
    const row = this.db.select().from(subscriptions).where(eq(subscriptions.userId, userId)).get();
    return row ? toSubscription(row) : null;
  }

  async findSubscriptionByProviderSubscription(subscriptionRef: string): Promise<SubscriptionRecord | null> {
    const row = this.db
      .select()
      .from(subscriptions)
      .where(eq(subscriptions.providerSubscriptionRef, subscriptionRef))
      .get();
    return row ? toSubscription(row) : null;
  }

  async findSubscriptionByProviderCustomer(customerRef: string): Promise<SubscriptionRecord | null> {
    const row = this.db
      .select()
      .from(subscriptions)
      .where(eq(subscriptions.providerCustomerRef, customerRef))
      .orderBy(asc(subscriptions.createdAt))
      .get();
    return row ? toSubscription(row) : null;
  }

  async mutateSubscription<R>(userId: string, mutator: SubscriptionMutator<R>): Promise<MutateResult<R>> {
    return this.locked((tx) => {
      const now = new Date().toISOString();
      tx.insert(subscriptions)
        .values({ userId, ...toColumns(defaultSubscriptionDraft()), createdAt: now, updatedAt: now })
        .onConflictDoNothing()
        .run();

      const row = tx.select().from(subscriptions).where(eq(subscriptions.userId, userId)).get();
      if (!row) {
        throw new Error(`Subscription row for ${userId} vanished inside its transaction`);
      }

      const current = toSubscription(row);
      const draft = toDraft(current);
      const result = mutator(draft, current);

      const saved = tx
        .update(subscriptions)
        .set({ ...toColumns(draft), updatedAt: now })
        .where(eq(subscriptions.userId, userId))
        .returning()
        .get();
      if (!saved) {
        throw new Error(`Subscription row for ${userId} was not updated`);
      }

      return { subscription: toSubscription(saved), result };
    });
  }

  async listExpiredTrials(now: Date): Promise<SubscriptionRecord[]> {
    const rows = this.db
      .select()
      .from(subscriptions)
      .where(
        and(
          eq(subscriptions.plan, 'free'),
          eq(subscriptions.status, 'trialing'),
          lt(subscriptions.trialEnd, now.toISOString()),
        ),
      )
      .all();
    return rows.map(toSubscription);
  }

  // ─── One-time purchases ────────────────────────────────────

  async oldestUnconsumedPurchase(userId: string): Promise<ReportPurchase | null> {
    const row = this.db
      .select()
      .from(reportPurchases)
      .where(and(eq(reportPurchases.userId, userId), eq(reportPurchases.consumed, false)))
      .orderBy(asc(reportPurchases.id))
      .limit(1)
      .get();
    return row ? toPurchase(row) : null;
  }

  async listPurchases(userId: string): Promise<ReportPurchase[]> {
    const rows = this.db
      .select()
      .from(reportPurchases)
      .where(eq(reportPurchases.userId, userId))
      .orderBy(asc(reportPurchases.id))
      .all();
    return rows.map(toPurchase);
  }

  async countUnconsumedPurchases(userId: string): Promise<number> {
    const row = this.db
      .select({ total: count() })
      .from(reportPurchases)
      .where(and(eq(reportPurchases.userId, userId), eq(reportPurchases.consumed, false)))
      .get();
    return row?.total ?? 0;
  }

  async recordPurchase(input: NewReportPurchase, now: Date = new Date()): Promise<RecordPurchaseResult> {
    return this.locked((tx) => {
      const existing = tx
        .select()
        .from(reportPurchases)
        .where(eq(reportPurchases.providerPaymentRef, input.providerPaymentRef))
        .get();
      if (existing) {
        return { created: false, purchase: toPurchase(existing) };
      }

      const inserted = tx
        .insert(reportPurchases)
        .values({
          userId: input.userId,
          providerPaymentRef: input.providerPaymentRef,
          amount: input.amount,
          consumed: false,
          createdAt: now.toISOString(),
        })
        .returning()
        .get();
      if (!inserted) {
        throw new Error(`Purchase ${input.providerPaymentRef} was not inserted`);
      }
      return { created: true, purchase: toPurchase(inserted) };
    });
  }

  async consumePurchase(purchaseId: number, now: Date): Promise<{ consumed: boolean }> {
    return this.locked((tx) => {
      const row = tx.select().from(reportPurchases).where(eq(reportPurchases.id, purchaseId)).get();
      if (!row) {
        throw new NotFoundError(`Report purchase ${purchaseId} not found`);
      }
      if (row.consumed) {
        return { consumed: false };
      }
      tx.update(reportPurchases)
        .set({ consumed: true, consumedAt: now.toISOString() })
        .where(and(eq(reportPurchases.id, purchaseId), eq(reportPurchases.consumed, false)))
        .run();
      return { consumed: true };
    });
  }
}
