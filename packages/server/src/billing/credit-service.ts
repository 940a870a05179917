/**
 * Credit Reservation & Commit
 *
 * Two-phase protocol in front of report generation: `reserve` proves credit
 * exists and returns a ticket; `commit` spends it under the row lock once the
 * report has been produced. One-time purchases are spent before subscription
 * credits, oldest first. A ticket that is never committed leaves no trace.
 */

import {
  ensurePeriod,
  InsufficientCreditsError,
  needsPeriodRoll,
  remainingCredits,
  ValidationError,
  type CommitResult,
  type CreditTicket,
  type SubscriptionRecord,
} from '@creditledger/core';
import type { LedgerStore } from '../db/ledger-store.js';
import { createLogger } from '../lib/logger.js';

const log = createLogger('CreditService');

export interface CreditServiceDeps {
  store: LedgerStore;
}

export class CreditService {
  constructor(private deps: CreditServiceDeps) {}

  /**
   * Reserve `units` report credits for `userId`.
   *
   * An unconsumed one-time purchase covers the whole request (one purchase is
   * one report). Otherwise subscription credits must cover `units`.
   */
  async reserve(userId: string, units: number, now: Date = new Date()): Promise<CreditTicket> {
    if (!Number.isInteger(units) || units <= 0) {
      throw new ValidationError(`units must be a positive integer, got ${units}`);
    }

    const purchase = await this.deps.store.oldestUnconsumedPurchase(userId);
    if (purchase) {
      return { source: 'one_time', purchaseId: purchase.id, userId, units };
    }

    const sub = await this.currentWindow(userId, now);
    const remaining = remainingCredits(sub, now);
    if (remaining < units) {
      throw new InsufficientCreditsError(units, remaining);
    }
    return { source: 'subscription', userId, units };
  }

  /**
   * Spend a reserved ticket. Subscription tickets re-check the cap under the
   * row lock, so of two tickets reserved against the last credit only one
   * commits; the other fails with InsufficientCreditsError.
   */
  async commit(ticket: CreditTicket, now: Date = new Date()): Promise<CommitResult> {
    if (ticket.source === 'one_time') {
      const { consumed } = await this.deps.store.consumePurchase(ticket.purchaseId, now);
      if (!consumed) {
        log.warn('One-time purchase already consumed, commit is a no-op', {
          userId: ticket.userId,
          purchaseId: ticket.purchaseId,
        });
      }
      return { committed: consumed, source: 'one_time' };
    }

    await this.deps.store.mutateSubscription(ticket.userId, (draft) => {
      ensurePeriod(draft, now);
      const remaining = remainingCredits(draft, now);
      if (remaining < ticket.units) {
        throw new InsufficientCreditsError(ticket.units, remaining);
      }
      draft.periodUsage += ticket.units;
    });
    return { committed: true, source: 'subscription' };
  }

  /**
   * Subscription row whose window contains `now`. The unlocked read is used
   * as is when its window is current; otherwise the window is opened or
   * rolled under the lock.
   */
  private async currentWindow(userId: string, now: Date): Promise<SubscriptionRecord> {
    const existing = await this.deps.store.getSubscription(userId);
    if (existing && !needsPeriodRoll(existing, now)) {
      return existing;
    }
    const { subscription, result } = await this.deps.store.mutateSubscription(userId, (draft) =>
      ensurePeriod(draft, now),
    );
    if (result.rolled > 0) {
      log.info('Rolled billing window', { userId, rolled: result.rolled });
    }
    return subscription;
  }
}
