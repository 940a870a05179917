/**
 * Subscription State Machine
 *
 * Local transitions only: starting the free trial and expiring it. The
 * provider-driven states (active, past_due, canceled) are written by the
 * webhook reconciler alone; cancel and resume here only ask the provider,
 * and the resulting webhook updates the row.
 *
 * - Trial: 14 days, no card, one report in total
 * - After trial → back to inactive (daily job)
 */

import { ulid } from 'ulid';
import {
  addUtcDays,
  capFor,
  ensurePeriod,
  isTrialActive,
  remainingCredits,
  TRIAL_DURATION_DAYS,
  ValidationError,
  windowFrom,
  type BillingInterval,
  type PlanName,
  type SubscriptionStatus,
} from '@creditledger/core';
import { defaultSubscriptionDraft, toDraft, type LedgerStore } from '../db/ledger-store.js';
import type { IStripeClient } from './stripe-client.js';
import { createLogger } from '../lib/logger.js';

const log = createLogger('SubscriptionService');

const DAY_MS = 86_400_000;

export interface SubscriptionServiceDeps {
  store: LedgerStore;
  stripe: IStripeClient;
}

export interface TrialStatus {
  active: boolean;
  start: Date | null;
  end: Date | null;
  daysRemaining: number;
}

export interface BillingOverview {
  plan: PlanName;
  interval: BillingInterval | null;
  status: SubscriptionStatus;
  trial: TrialStatus;
  window: { start: Date | null; end: Date | null };
  usage: number;
  cap: number;
  /** Subscription credits left in the current window */
  remaining: number;
  /** Unconsumed one-time report purchases */
  oneTimeCredits: number;
  cancelAtPeriodEnd: boolean;
}

export interface ProviderChangeResult {
  subscriptionRef: string;
  status: string;
  cancelAtPeriodEnd: boolean;
}

export class SubscriptionService {
  constructor(private deps: SubscriptionServiceDeps) {}

  /**
   * Start the no-card free trial. Allowed once, from inactive on the free plan.
   */
  async startFreeTrial(userId: string, now: Date = new Date()): Promise<TrialStatus> {
    const { subscription } = await this.deps.store.mutateSubscription(userId, (draft) => {
      if (draft.trialStart !== null) {
        throw new ValidationError('The free trial has already been used');
      }
      if (draft.status !== 'inactive' || draft.plan !== 'free') {
        throw new ValidationError(
          `The free trial is only available to inactive free-plan users (plan=${draft.plan}, status=${draft.status})`,
        );
      }
      const window = windowFrom(now);
      draft.status = 'trialing';
      draft.trialStart = now;
      draft.trialEnd = addUtcDays(now, TRIAL_DURATION_DAYS);
      draft.currentPeriodStart = window.start;
      draft.currentPeriodEnd = window.end;
      draft.periodUsage = 0;
    });

    log.info('Free trial started', { userId, trialEnd: subscription.trialEnd?.toISOString() });
    return {
      active: true,
      start: subscription.trialStart,
      end: subscription.trialEnd,
      daysRemaining: TRIAL_DURATION_DAYS,
    };
  }

  /**
   * Return expired free trials to inactive. Called by a daily job.
   * Returns the number of rows changed.
   */
  async expireTrials(now: Date = new Date()): Promise<number> {
    const expired = await this.deps.store.listExpiredTrials(now);
    let changed = 0;

    for (const candidate of expired) {
      const { result } = await this.deps.store.mutateSubscription(candidate.userId, (draft) => {
        // Re-checked under lock: a checkout may have landed since the scan
        if (draft.plan !== 'free' || draft.status !== 'trialing') return false;
        if (!draft.trialEnd || draft.trialEnd.getTime() >= now.getTime()) return false;
        draft.status = 'inactive';
        return true;
      });
      if (result) changed++;
    }

    if (changed > 0) {
      log.info(`Expired ${changed} free trial(s)`);
    }
    return changed;
  }

  /**
   * Entitlement summary as `reserve` would see it at `now`. Read-only: an
   * elapsed window is rolled on a copy, not persisted.
   */
  async getOverview(userId: string, now: Date = new Date()): Promise<BillingOverview> {
    const [sub, oneTimeCredits] = await Promise.all([
      this.deps.store.getSubscription(userId),
      this.deps.store.countUnconsumedPurchases(userId),
    ]);
    const view = sub ? toDraft(sub) : defaultSubscriptionDraft();
    ensurePeriod(view, now);

    const trialActive = isTrialActive(view, now);
    const daysRemaining =
      trialActive && view.trialEnd
        ? Math.max(0, Math.ceil((view.trialEnd.getTime() - now.getTime()) / DAY_MS))
        : 0;

    return {
      plan: view.plan,
      interval: view.interval,
      status: view.status,
      trial: { active: trialActive, start: view.trialStart, end: view.trialEnd, daysRemaining },
      window: { start: view.currentPeriodStart, end: view.currentPeriodEnd },
      usage: view.periodUsage,
      cap: capFor(view, now),
      remaining: remainingCredits(view, now),
      oneTimeCredits,
      cancelAtPeriodEnd: view.cancelAtPeriodEnd,
    };
  }

  /**
   * Ask the provider to cancel, at period end (default) or immediately.
   * Local state changes when the provider's webhook arrives.
   */
  async cancel(
    userId: string,
    options: { atPeriodEnd: boolean },
    idempotencyKey: string = ulid(),
  ): Promise<ProviderChangeResult> {
    const subscriptionRef = await this.requireProviderSubscription(userId);
    const updated = options.atPeriodEnd
      ? await this.deps.stripe.modifySubscription(subscriptionRef, true, idempotencyKey)
      : await this.deps.stripe.deleteSubscription(subscriptionRef, idempotencyKey);

    log.info('Cancellation requested', { userId, subscriptionRef, atPeriodEnd: options.atPeriodEnd });
    return { subscriptionRef, status: updated.status, cancelAtPeriodEnd: updated.cancelAtPeriodEnd };
  }

  /**
   * Undo a pending cancel-at-period-end.
   */
  async resume(userId: string, idempotencyKey: string = ulid()): Promise<ProviderChangeResult> {
    const subscriptionRef = await this.requireProviderSubscription(userId);
    const updated = await this.deps.stripe.modifySubscription(subscriptionRef, false, idempotencyKey);

    log.info('Resume requested', { userId, subscriptionRef });
    return { subscriptionRef, status: updated.status, cancelAtPeriodEnd: updated.cancelAtPeriodEnd };
  }

  private async requireProviderSubscription(userId: string): Promise<string> {
    const sub = await this.deps.store.getSubscription(userId);
    if (!sub?.providerSubscriptionRef) {
      throw new ValidationError('No provider subscription is linked to this account');
    }
    return sub.providerSubscriptionRef;
  }
}
