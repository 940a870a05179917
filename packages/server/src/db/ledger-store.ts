/**
 * LedgerStore: persistence contract for subscription rows and one-time
 * report purchases.
 *
 * `mutateSubscription` is the only way to change a subscription row. It runs
 * the mutator while holding an exclusive lock on the user's row, so every
 * read-modify-write of usage, window or provider state is serialized per user.
 */

import type {
  NewReportPurchase,
  ReportPurchase,
  SubscriptionDraft,
  SubscriptionRecord,
} from '@creditledger/core';

/**
 * Runs under the row lock. Mutates `draft`; whatever it returns is handed back
 * to the caller. Throwing rolls the transaction back.
 */
export type SubscriptionMutator<R> = (draft: SubscriptionDraft, current: Readonly<SubscriptionRecord>) => R;

export interface MutateResult<R> {
  /** Row as committed */
  subscription: SubscriptionRecord;
  result: R;
}

export interface RecordPurchaseResult {
  /** False when the payment ref was already recorded */
  created: boolean;
  purchase: ReportPurchase;
}

export interface LedgerStore {
  /** Unlocked read */
  getSubscription(userId: string): Promise<SubscriptionRecord | null>;
  findSubscriptionByProviderSubscription(subscriptionRef: string): Promise<SubscriptionRecord | null>;
  findSubscriptionByProviderCustomer(customerRef: string): Promise<SubscriptionRecord | null>;

  /**
   * Locked read-modify-write of one user's row, creating it with defaults
   * when absent.
   */
  mutateSubscription<R>(userId: string, mutator: SubscriptionMutator<R>): Promise<MutateResult<R>>;

  /** Free-plan trials whose end is before `now` */
  listExpiredTrials(now: Date): Promise<SubscriptionRecord[]>;

  oldestUnconsumedPurchase(userId: string): Promise<ReportPurchase | null>;
  listPurchases(userId: string): Promise<ReportPurchase[]>;
  countUnconsumedPurchases(userId: string): Promise<number>;

  /** Idempotent on `providerPaymentRef` */
  recordPurchase(input: NewReportPurchase, now?: Date): Promise<RecordPurchaseResult>;

  /**
   * Mark a purchase consumed under its row lock. `{consumed: false}` when it
   * already was; `NotFoundError` for an unknown id.
   */
  consumePurchase(purchaseId: number, now: Date): Promise<{ consumed: boolean }>;
}

/** Field values of a row that has never been touched */
export function defaultSubscriptionDraft(): SubscriptionDraft {
  return {
    plan: 'free',
    interval: null,
    status: 'inactive',
    trialStart: null,
    trialEnd: null,
    currentPeriodStart: null,
    currentPeriodEnd: null,
    periodUsage: 0,
    providerCustomerRef: null,
    providerSubscriptionRef: null,
    cancelAtPeriodEnd: false,
    providerPeriodEnd: null,
    providerEventAt: null,
  };
}

/** Detached, mutable copy of the mutable fields */
export function toDraft(record: SubscriptionRecord): SubscriptionDraft {
  return {
    plan: record.plan,
    interval: record.interval,
    status: record.status,
    trialStart: record.trialStart,
    trialEnd: record.trialEnd,
    currentPeriodStart: record.currentPeriodStart,
    currentPeriodEnd: record.currentPeriodEnd,
    periodUsage: record.periodUsage,
    providerCustomerRef: record.providerCustomerRef,
    providerSubscriptionRef: record.providerSubscriptionRef,
    cancelAtPeriodEnd: record.cancelAtPeriodEnd,
    providerPeriodEnd: record.providerPeriodEnd,
    providerEventAt: record.providerEventAt,
  };
}
