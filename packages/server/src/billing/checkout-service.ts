/**
 * Checkout Service
 *
 * Creates hosted checkout sessions for a plan subscription or a one-time
 * report. Nothing is granted here: entitlements change only when the
 * provider's webhook confirms payment. The only local write is the link to
 * the provider customer.
 */

import { ulid } from 'ulid';
import {
  NotFoundError,
  ONE_TIME_PRODUCT,
  ValidationError,
  type CheckoutRequest,
  type UserIdentity,
} from '@creditledger/core';
import type { LedgerStore } from '../db/ledger-store.js';
import type { UserDirectory } from '../db/user-directory.js';
import type { CheckoutMode, IStripeClient } from './stripe-client.js';
import type { PriceLookup } from './price-lookup.js';
import { createLogger } from '../lib/logger.js';

const log = createLogger('CheckoutService');

export interface CheckoutServiceDeps {
  store: LedgerStore;
  stripe: IStripeClient;
  users: UserDirectory;
  prices: PriceLookup;
  successUrl: string;
  cancelUrl: string;
}

export interface CheckoutResult {
  url: string;
  sessionId: string;
  mode: CheckoutMode;
}

export class CheckoutService {
  constructor(private deps: CheckoutServiceDeps) {}

  async createCheckout(
    userId: string,
    request: CheckoutRequest,
    idempotencyKey: string = ulid(),
  ): Promise<CheckoutResult> {
    const user = await this.deps.users.findById(userId);
    if (!user) {
      throw new NotFoundError(`User ${userId} not found`);
    }

    const metadata: Record<string, string> = { user_id: userId, plan: request.product };
    let mode: CheckoutMode;
    let priceRef: string;

    if (request.product === ONE_TIME_PRODUCT) {
      mode = 'payment';
      priceRef = await this.deps.prices.oneTimePrice();
    } else {
      if (!request.interval) {
        throw new ValidationError('interval is required for subscription plans');
      }
      await this.assertNoLiveSubscription(userId);
      mode = 'subscription';
      priceRef = await this.deps.prices.planPrice(request.product, request.interval);
      metadata['interval'] = request.interval;
    }

    const customerRef = await this.ensureCustomer(user);
    const session = await this.deps.stripe.createCheckoutSession(
      {
        mode,
        customerRef,
        priceRef,
        successUrl: this.deps.successUrl,
        cancelUrl: this.deps.cancelUrl,
        metadata,
      },
      idempotencyKey,
    );

    log.info('Checkout session created', { userId, sessionId: session.id, mode, product: request.product });
    return { url: session.url, sessionId: session.id, mode };
  }

  private async assertNoLiveSubscription(userId: string): Promise<void> {
    const sub = await this.deps.store.getSubscription(userId);
    if (sub?.providerSubscriptionRef && (sub.status === 'active' || sub.status === 'past_due')) {
      throw new ValidationError(
        `A ${sub.status} subscription already exists; cancel it before starting a new checkout`,
      );
    }
  }

  /**
   * Provider customer for `user`, created on first checkout. The creation key
   * is derived from the user id, so concurrent first checkouts resolve to the
   * same customer; the first ref stored under the lock wins.
   */
  private async ensureCustomer(user: UserIdentity): Promise<string> {
    const existing = await this.deps.store.getSubscription(user.id);
    if (existing?.providerCustomerRef) {
      return existing.providerCustomerRef;
    }

    const customer = await this.deps.stripe.createCustomer(user.email, user.id, `customer:${user.id}`);
    const { result } = await this.deps.store.mutateSubscription(user.id, (draft) => {
      if (!draft.providerCustomerRef) {
        draft.providerCustomerRef = customer.id;
      }
      return draft.providerCustomerRef;
    });
    return result;
  }
}
