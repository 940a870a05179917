/**
 * @creditledger/core — Ledger Types
 *
 * Shapes shared by the persistence layer, the credit service and the
 * webhook reconciler. Timestamps are `Date` instances in UTC.
 */

// ─── Plans ─────────────────────────────────────────────────────────

export type PlanName = 'free' | 'essentials' | 'precision';

/** Plans that can be bought through a recurring checkout */
export type PaidPlanName = Exclude<PlanName, 'free'>;

export type BillingInterval = 'month' | 'year';

/** Key of the one-time report product in the price catalog */
export const ONE_TIME_PRODUCT = 'one_time_report' as const;

export type CheckoutProduct = PaidPlanName | typeof ONE_TIME_PRODUCT;

export interface PlanSelection {
  plan: PaidPlanName;
  interval: BillingInterval;
}

// ─── Subscription ──────────────────────────────────────────────────

export type SubscriptionStatus = 'inactive' | 'trialing' | 'active' | 'past_due' | 'canceled';

export interface SubscriptionRecord {
  userId: string;
  plan: PlanName;
  /** Meaningless for the free plan */
  interval: BillingInterval | null;
  status: SubscriptionStatus;
  trialStart: Date | null;
  trialEnd: Date | null;
  /** Rolling accounting window, independent of the provider's billing period */
  currentPeriodStart: Date | null;
  currentPeriodEnd: Date | null;
  periodUsage: number;
  providerCustomerRef: string | null;
  providerSubscriptionRef: string | null;
  cancelAtPeriodEnd: boolean;
  /** End of the provider's billing period; never moves the rolling window */
  providerPeriodEnd: Date | null;
  /** `created` of the newest provider lifecycle event applied to this row */
  providerEventAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

/** Fields a locked mutator may change */
export type SubscriptionDraft = Omit<SubscriptionRecord, 'userId' | 'createdAt' | 'updatedAt'>;

// ─── One-time purchases ────────────────────────────────────────────

export interface ReportPurchase {
  /** Monotonic; FIFO redemption follows it */
  id: number;
  userId: string;
  providerPaymentRef: string;
  /** Minor currency units */
  amount: number;
  consumed: boolean;
  consumedAt: Date | null;
  createdAt: Date;
}

export interface NewReportPurchase {
  userId: string;
  providerPaymentRef: string;
  amount: number;
}

// ─── Credit tickets ────────────────────────────────────────────────

export type CreditSource = 'one_time' | 'subscription';

/**
 * Proof that credit existed when the ticket was issued. Never persisted;
 * a ticket that is not committed grants nothing.
 */
export type CreditTicket =
  | {
      readonly source: 'one_time';
      readonly purchaseId: number;
      readonly userId: string;
      readonly units: number;
    }
  | {
      readonly source: 'subscription';
      readonly userId: string;
      readonly units: number;
    };

export interface CommitResult {
  committed: boolean;
  source: CreditSource;
}

// ─── Identity (Auth collaborator) ──────────────────────────────────

export interface UserIdentity {
  id: string;
  email: string;
}
