/**
 * Webhook Reconciler
 *
 * Applies decoded provider events to the ledger. Deliveries are at-least-once
 * and unordered, so every branch is an idempotent overwrite under the row
 * lock, guarded two ways:
 *
 * - a row linked to a different provider subscription ignores events for
 *   another one (`subscription_mismatch`)
 * - a lifecycle event strictly older than the newest one applied to the row
 *   is ignored (`stale_event`); equal timestamps apply, except that a
 *   cancellation wins a tie against any non-deletion event
 *
 * Events that cannot be matched to a user are acknowledged without effect.
 * Provider fetch and persistence failures propagate so the delivery is
 * answered with an error and retried.
 */

import {
  toLocalStatus,
  type CheckoutSessionPayload,
  type InvoicePayload,
  type PlanCatalog,
  type ProviderEvent,
  type ProviderSubscription,
  type ReconciliationSkip,
  type SubscriptionDraft,
} from '@creditledger/core';
import type { LedgerStore } from '../db/ledger-store.js';
import type { UserDirectory } from '../db/user-directory.js';
import type { IStripeClient } from './stripe-client.js';
import { createLogger, type Logger } from '../lib/logger.js';

const baseLog = createLogger('Reconciler');

export type ReconcileAction =
  | 'subscription_linked'
  | 'purchase_recorded'
  | 'subscription_synced'
  | 'subscription_deleted'
  | 'subscription_refreshed'
  | 'payment_failed_recorded';

export interface WebhookResult {
  handled: boolean;
  action?: ReconcileAction;
  skipped?: ReconciliationSkip;
  userId?: string;
}

export interface ReconcilerDeps {
  store: LedgerStore;
  stripe: IStripeClient;
  users: UserDirectory;
  catalog: PlanCatalog;
}

type EventOf<T extends ProviderEvent['type']> = Extract<ProviderEvent, { type: T }>;
type SubscriptionEvent = EventOf<'customer.subscription.created' | 'customer.subscription.updated' | 'customer.subscription.deleted'>;

type GuardedOutcome = 'applied' | 'stale_event' | 'subscription_mismatch';

function skip(reason: ReconciliationSkip, userId?: string): WebhookResult {
  return { handled: false, skipped: reason, ...(userId ? { userId } : {}) };
}

function isOlder(eventAt: Date, appliedAt: Date | null): boolean {
  return appliedAt !== null && eventAt.getTime() < appliedAt.getTime();
}

/** A canceled row only takes a non-deletion event that is strictly newer */
function isStale(eventAt: Date, draft: SubscriptionDraft, deletion: boolean): boolean {
  if (isOlder(eventAt, draft.providerEventAt)) return true;
  const canceled = draft.status === 'canceled' && draft.providerSubscriptionRef === null;
  return (
    !deletion && canceled && draft.providerEventAt !== null && eventAt.getTime() <= draft.providerEventAt.getTime()
  );
}

function latest(a: Date | null, b: Date): Date {
  return a !== null && a.getTime() > b.getTime() ? a : b;
}

/** Canceled status always carries the free plan and no provider subscription */
function applyCancellation(draft: SubscriptionDraft): void {
  draft.plan = 'free';
  draft.interval = null;
  draft.providerSubscriptionRef = null;
  draft.status = 'canceled';
  draft.cancelAtPeriodEnd = false;
}

export class WebhookReconciler {
  constructor(private deps: ReconcilerDeps) {}

  async apply(event: ProviderEvent): Promise<WebhookResult> {
    const log = baseLog.child({ eventId: event.id, type: event.type });
    const result = await this.dispatch(event, log);

    if (result.handled) {
      log.info(`Applied ${result.action ?? 'event'}`, { userId: result.userId });
    } else if (result.skipped === 'user_not_found') {
      log.warn('Event could not be matched to a user; acknowledged without changes');
    } else {
      log.info(`Skipped: ${result.skipped ?? 'unknown'}`, { userId: result.userId });
    }
    return result;
  }

  private async dispatch(event: ProviderEvent, log: Logger): Promise<WebhookResult> {
    switch (event.type) {
      case 'checkout.session.completed':
        return this.checkoutCompleted(event, log);
      case 'customer.subscription.created':
      case 'customer.subscription.updated':
      case 'customer.subscription.deleted':
        return this.subscriptionChanged(event);
      case 'invoice.payment_succeeded':
      case 'invoice.paid':
        return this.invoiceSucceeded(event);
      case 'invoice.payment_failed':
        return this.invoiceFailed(event);
      case 'unhandled':
        return skip('unhandled_type');
    }
  }

  // ── Checkout ──

  private async checkoutCompleted(event: EventOf<'checkout.session.completed'>, log: Logger): Promise<WebhookResult> {
    const session = event.session;
    const userId = await this.resolveSessionUser(session);
    if (!userId) return skip('user_not_found');

    if (session.mode === 'payment') {
      if (!session.paymentRef) {
        log.error('Payment checkout without a payment reference', { sessionId: session.id });
        return skip('missing_reference', userId);
      }
      const { created } = await this.deps.store.recordPurchase(
        { userId, providerPaymentRef: session.paymentRef, amount: session.amountTotal },
        event.created,
      );
      await this.linkCustomer(userId, session.customerRef);
      return created ? { handled: true, action: 'purchase_recorded', userId } : skip('duplicate', userId);
    }

    if (session.mode !== 'subscription') {
      return skip('unhandled_type', userId);
    }
    if (!session.subscriptionRef) {
      log.error('Subscription checkout without a subscription reference', { sessionId: session.id });
      return skip('missing_reference', userId);
    }

    const sub = await this.deps.stripe.retrieveSubscription(session.subscriptionRef);
    const selection = this.deps.catalog.decodePrice(sub.price, { ...session.metadata, ...sub.metadata });
    if (!selection) {
      log.warn('Could not decode a plan from the subscription price', { priceRef: sub.price?.id });
    }

    const { result } = await this.deps.store.mutateSubscription(userId, (draft): GuardedOutcome => {
      if (draft.providerSubscriptionRef !== null && draft.providerSubscriptionRef !== sub.id) {
        return 'subscription_mismatch';
      }
      if (session.customerRef) draft.providerCustomerRef = session.customerRef;
      draft.providerPeriodEnd = sub.currentPeriodEnd;
      draft.providerEventAt = latest(draft.providerEventAt, event.created);
      const status = toLocalStatus(sub.status);
      if (status === 'canceled') {
        applyCancellation(draft);
        return 'applied';
      }
      if (selection) {
        draft.plan = selection.plan;
        draft.interval = selection.interval;
      }
      draft.providerSubscriptionRef = sub.id;
      draft.status = status;
      draft.cancelAtPeriodEnd = sub.cancelAtPeriodEnd;
      return 'applied';
    });

    if (result !== 'applied') return skip(result, userId);
    return { handled: true, action: 'subscription_linked', userId };
  }

  /** metadata.user_id first, then the session's email */
  private async resolveSessionUser(session: CheckoutSessionPayload): Promise<string | null> {
    const metaUserId = session.metadata['user_id'];
    if (metaUserId) {
      const user = await this.deps.users.findById(metaUserId);
      if (user) return user.id;
    }
    if (session.email) {
      const user = await this.deps.users.findByEmail(session.email);
      if (user) return user.id;
    }
    return null;
  }

  private async linkCustomer(userId: string, customerRef: string | null): Promise<void> {
    if (!customerRef) return;
    const current = await this.deps.store.getSubscription(userId);
    if (current?.providerCustomerRef === customerRef) return;
    await this.deps.store.mutateSubscription(userId, (draft) => {
      draft.providerCustomerRef = customerRef;
    });
  }

  // ── Subscription lifecycle ──

  private async subscriptionChanged(event: SubscriptionEvent): Promise<WebhookResult> {
    const sub = event.subscription;
    const userId = await this.locateSubscriptionUser(sub);
    if (!userId) return skip('user_not_found');

    const deleted = event.type === 'customer.subscription.deleted';
    const selection = this.deps.catalog.decodePrice(sub.price, sub.metadata);

    const { result } = await this.deps.store.mutateSubscription(userId, (draft): GuardedOutcome => {
      if (draft.providerSubscriptionRef !== null && draft.providerSubscriptionRef !== sub.id) {
        return 'subscription_mismatch';
      }
      if (isStale(event.created, draft, deleted)) {
        return 'stale_event';
      }

      if (!draft.providerCustomerRef && sub.customerRef) {
        draft.providerCustomerRef = sub.customerRef;
      }
      draft.providerPeriodEnd = sub.currentPeriodEnd;
      draft.providerEventAt = event.created;

      const status = toLocalStatus(sub.status);
      if (deleted || status === 'canceled') {
        applyCancellation(draft);
        return 'applied';
      }
      if (selection) {
        draft.plan = selection.plan;
        draft.interval = selection.interval;
      }
      draft.providerSubscriptionRef = sub.id;
      draft.status = status;
      draft.cancelAtPeriodEnd = sub.cancelAtPeriodEnd;
      return 'applied';
    });

    if (result !== 'applied') return skip(result, userId);
    return { handled: true, action: deleted ? 'subscription_deleted' : 'subscription_synced', userId };
  }

  /**
   * By subscription ref, then customer ref, then metadata.user_id, then the
   * provider customer's email. The last two may match a user without a row;
   * the locked write creates it.
   */
  private async locateSubscriptionUser(sub: ProviderSubscription): Promise<string | null> {
    const bySubscription = await this.deps.store.findSubscriptionByProviderSubscription(sub.id);
    if (bySubscription) return bySubscription.userId;

    if (sub.customerRef) {
      const byCustomer = await this.deps.store.findSubscriptionByProviderCustomer(sub.customerRef);
      if (byCustomer) return byCustomer.userId;
    }

    const metaUserId = sub.metadata['user_id'];
    if (metaUserId) {
      const user = await this.deps.users.findById(metaUserId);
      if (user) return user.id;
    }

    if (sub.customerRef) {
      const customer = await this.deps.stripe.retrieveCustomer(sub.customerRef);
      if (customer?.email) {
        const user = await this.deps.users.findByEmail(customer.email);
        if (user) return user.id;
      }
    }
    return null;
  }

  // ── Invoices ──

  private async invoiceSucceeded(event: EventOf<'invoice.payment_succeeded' | 'invoice.paid'>): Promise<WebhookResult> {
    const located = await this.locateInvoiceUser(event.invoice);
    if ('skipped' in located) return located;
    const { userId, subscriptionRef } = located;

    const sub = await this.deps.stripe.retrieveSubscription(subscriptionRef);

    const { result } = await this.deps.store.mutateSubscription(userId, (draft): GuardedOutcome => {
      if (draft.providerSubscriptionRef !== subscriptionRef) return 'subscription_mismatch';

      draft.providerPeriodEnd = sub.currentPeriodEnd;
      draft.providerEventAt = latest(draft.providerEventAt, event.created);
      const status = toLocalStatus(sub.status);
      if (status === 'canceled') {
        applyCancellation(draft);
        return 'applied';
      }
      draft.status = status;
      draft.cancelAtPeriodEnd = sub.cancelAtPeriodEnd;
      return 'applied';
    });

    if (result !== 'applied') return skip(result, userId);
    return { handled: true, action: 'subscription_refreshed', userId };
  }

  private async invoiceFailed(event: EventOf<'invoice.payment_failed'>): Promise<WebhookResult> {
    const located = await this.locateInvoiceUser(event.invoice);
    if ('skipped' in located) return located;
    const { userId, subscriptionRef } = located;

    const { result } = await this.deps.store.mutateSubscription(userId, (draft): GuardedOutcome => {
      if (draft.providerSubscriptionRef !== subscriptionRef) return 'subscription_mismatch';
      if (isOlder(event.created, draft.providerEventAt)) return 'stale_event';
      draft.status = 'past_due';
      return 'applied';
    });

    if (result !== 'applied') return skip(result, userId);
    return { handled: true, action: 'payment_failed_recorded', userId };
  }

  /** Invoices are matched by the subscription they bill, nothing else */
  private async locateInvoiceUser(
    invoice: InvoicePayload,
  ): Promise<{ userId: string; subscriptionRef: string } | WebhookResult> {
    if (!invoice.subscriptionRef) return skip('missing_reference');
    const row = await this.deps.store.findSubscriptionByProviderSubscription(invoice.subscriptionRef);
    if (!row) return skip('user_not_found');
    return { userId: row.userId, subscriptionRef: invoice.subscriptionRef };
  }
}
