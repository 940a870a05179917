/**
 * Stripe Client Abstraction
 *
 * Provides a unified interface for the payment provider with a mock
 * implementation for testing. Real Stripe calls activate when
 * STRIPE_SECRET_KEY is set.
 *
 * Every mutating call carries a caller-supplied idempotency key so a retried
 * request never creates a second customer, session or cancellation.
 */

import Stripe from 'stripe';
import {
  decodeProviderEvent,
  getErrorMessage,
  priceSchema,
  ProviderError,
  subscriptionObjectSchema,
  ValidationError,
  WebhookSignatureError,
  type ProviderEvent,
  type ProviderPrice,
  type ProviderSubscription,
} from '@creditledger/core';
import type { ServerConfig } from '../config.js';
import { signPayload, verifySignature } from './webhook-signature.js';

// ═══════════════════════════════════════════
// Types
// ═══════════════════════════════════════════

export interface ProviderCustomer {
  id: string;
  email: string | null;
  metadata: Record<string, string>;
}

export type CheckoutMode = 'subscription' | 'payment';

export interface CheckoutSessionParams {
  mode: CheckoutMode;
  customerRef: string;
  priceRef: string;
  successUrl: string;
  cancelUrl: string;
  /** Copied onto the session and onto the subscription or payment it creates */
  metadata: Record<string, string>;
}

export interface CreatedCheckoutSession {
  id: string;
  url: string;
}

// ═══════════════════════════════════════════
// Stripe Client Interface
// ═══════════════════════════════════════════

export interface IStripeClient {
  createCustomer(email: string, userId: string, idempotencyKey: string): Promise<ProviderCustomer>;
  /** Null when the customer was deleted */
  retrieveCustomer(customerRef: string): Promise<ProviderCustomer | null>;
  createCheckoutSession(params: CheckoutSessionParams, idempotencyKey: string): Promise<CreatedCheckoutSession>;
  /** Subscription with its first item's price expanded */
  retrieveSubscription(subscriptionRef: string): Promise<ProviderSubscription>;
  modifySubscription(
    subscriptionRef: string,
    cancelAtPeriodEnd: boolean,
    idempotencyKey: string,
  ): Promise<ProviderSubscription>;
  /** Cancel immediately */
  deleteSubscription(subscriptionRef: string, idempotencyKey: string): Promise<ProviderSubscription>;
  listPricesByLookupKey(lookupKey: string): Promise<ProviderPrice[]>;
  /**
   * Verify the signature over the raw payload, then decode it. Throws
   * WebhookSignatureError before anything is parsed.
   */
  constructWebhookEvent(payload: string, signature: string | undefined): ProviderEvent;
}

function decodeSubscription(raw: unknown): ProviderSubscription {
  const result = subscriptionObjectSchema.safeParse(raw);
  if (!result.success) {
    throw new ProviderError(`Unexpected subscription payload: ${result.error.issues[0]?.message ?? 'invalid'}`);
  }
  return result.data;
}

function isLiveCustomer(customer: Stripe.Customer | Stripe.DeletedCustomer): customer is Stripe.Customer {
  return customer.deleted !== true;
}

function parseJson(payload: string): unknown {
  try {
    return JSON.parse(payload);
  } catch {
    throw new ValidationError('Webhook payload is not valid JSON');
  }
}

// ═══════════════════════════════════════════
// Stripe SDK Client
// ═══════════════════════════════════════════

export interface StripeSdkClientOptions {
  secretKey: string;
  webhookSecret?: string;
  timeoutMs: number;
  maxNetworkRetries: number;
}

export class StripeSdkClient implements IStripeClient {
  private readonly stripe: Stripe;
  private readonly webhookSecret: string | undefined;

  constructor(options: StripeSdkClientOptions) {
    this.stripe = new Stripe(options.secretKey, {
      apiVersion: '2023-10-16',
      timeout: options.timeoutMs,
      maxNetworkRetries: options.maxNetworkRetries,
    });
    this.webhookSecret = options.webhookSecret;
  }

  /** Every SDK failure surfaces as ProviderError */
  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof ProviderError) throw err;
      if (err instanceof Stripe.errors.StripeError) {
        throw new ProviderError(`Stripe ${operation} failed: ${err.message}`, err.code);
      }
      throw new ProviderError(`Stripe ${operation} failed: ${getErrorMessage(err)}`);
    }
  }

  async createCustomer(email: string, userId: string, idempotencyKey: string): Promise<ProviderCustomer> {
    return this.call('customers.create', async () => {
      const customer = await this.stripe.customers.create(
        { email, metadata: { user_id: userId } },
        { idempotencyKey },
      );
      return { id: customer.id, email: customer.email, metadata: customer.metadata };
    });
  }

  async retrieveCustomer(customerRef: string): Promise<ProviderCustomer | null> {
    return this.call('customers.retrieve', async () => {
      const customer = await this.stripe.customers.retrieve(customerRef);
      if (!isLiveCustomer(customer)) return null;
      return { id: customer.id, email: customer.email, metadata: customer.metadata };
    });
  }

  async createCheckoutSession(
    params: CheckoutSessionParams,
    idempotencyKey: string,
  ): Promise<CreatedCheckoutSession> {
    return this.call('checkout.sessions.create', async () => {
      const session = await this.stripe.checkout.sessions.create(
        {
          mode: params.mode,
          customer: params.customerRef,
          line_items: [{ price: params.priceRef, quantity: 1 }],
          success_url: params.successUrl,
          cancel_url: params.cancelUrl,
          metadata: params.metadata,
          ...(params.mode === 'subscription'
            ? { subscription_data: { metadata: params.metadata } }
            : { payment_intent_data: { metadata: params.metadata } }),
        },
        { idempotencyKey },
      );
      if (!session.url) {
        throw new ProviderError(`Checkout session ${session.id} has no hosted URL`);
      }
      return { id: session.id, url: session.url };
    });
  }

  async retrieveSubscription(subscriptionRef: string): Promise<ProviderSubscription> {
    return this.call('subscriptions.retrieve', async () =>
      decodeSubscription(
        await this.stripe.subscriptions.retrieve(subscriptionRef, { expand: ['items.data.price'] }),
      ),
    );
  }

  async modifySubscription(
    subscriptionRef: string,
    cancelAtPeriodEnd: boolean,
    idempotencyKey: string,
  ): Promise<ProviderSubscription> {
    return this.call('subscriptions.update', async () =>
      decodeSubscription(
        await this.stripe.subscriptions.update(
          subscriptionRef,
          { cancel_at_period_end: cancelAtPeriodEnd },
          { idempotencyKey },
        ),
      ),
    );
  }

  async deleteSubscription(subscriptionRef: string, idempotencyKey: string): Promise<ProviderSubscription> {
    return this.call('subscriptions.cancel', async () =>
      decodeSubscription(await this.stripe.subscriptions.cancel(subscriptionRef, {}, { idempotencyKey })),
    );
  }

  async listPricesByLookupKey(lookupKey: string): Promise<ProviderPrice[]> {
    return this.call('prices.list', async () => {
      const prices = await this.stripe.prices.list({ lookup_keys: [lookupKey], active: true, limit: 1 });
      return prices.data.map((price) => priceSchema.parse(price));
    });
  }

  constructWebhookEvent(payload: string, signature: string | undefined): ProviderEvent {
    if (!this.webhookSecret) {
      throw new Error('STRIPE_WEBHOOK_SECRET is not configured');
    }
    if (!signature) {
      throw new WebhookSignatureError('Missing webhook signature header');
    }
    let event: Stripe.Event;
    try {
      event = this.stripe.webhooks.constructEvent(payload, signature, this.webhookSecret);
    } catch (err) {
      if (err instanceof Stripe.errors.StripeSignatureVerificationError) {
        throw new WebhookSignatureError(err.message);
      }
      throw new ValidationError(`Webhook payload could not be read: ${getErrorMessage(err)}`);
    }
    return decodeProviderEvent(event);
  }
}

// ═══════════════════════════════════════════
// Mock Stripe Client (for testing)
// ═══════════════════════════════════════════

export interface MockCheckoutSession extends CheckoutSessionParams {
  id: string;
  url: string;
}

export interface SeedSubscription {
  id?: string;
  customerRef: string;
  status?: ProviderSubscription['status'];
  price: ProviderPrice | null;
  currentPeriodEnd?: Date | null;
  cancelAtPeriodEnd?: boolean;
  metadata?: Record<string, string>;
}

export class MockStripeClient implements IStripeClient {
  public customers = new Map<string, ProviderCustomer>();
  public subscriptions = new Map<string, ProviderSubscription>();
  public sessions: MockCheckoutSession[] = [];
  public prices: ProviderPrice[] = [];
  /** Every idempotency key received, in call order */
  public idempotencyKeys: string[] = [];
  private customerReplies = new Map<string, ProviderCustomer>();
  private sessionReplies = new Map<string, MockCheckoutSession>();
  private pendingFailure: ProviderError | null = null;
  private idCounter = 0;

  constructor(private readonly webhookSecret?: string) {}

  private nextId(prefix: string): string {
    return `${prefix}_mock_${++this.idCounter}`;
  }

  private maybeFail(): void {
    const failure = this.pendingFailure;
    if (failure) {
      this.pendingFailure = null;
      throw failure;
    }
  }

  private requireSubscription(subscriptionRef: string): ProviderSubscription {
    const sub = this.subscriptions.get(subscriptionRef);
    if (!sub) {
      throw new ProviderError(`No such subscription: '${subscriptionRef}'`, 'resource_missing');
    }
    return sub;
  }

  async createCustomer(email: string, userId: string, idempotencyKey: string): Promise<ProviderCustomer> {
    this.maybeFail();
    this.idempotencyKeys.push(idempotencyKey);
    const replay = this.customerReplies.get(idempotencyKey);
    if (replay) return replay;
    const customer: ProviderCustomer = { id: this.nextId('cus'), email, metadata: { user_id: userId } };
    this.customers.set(customer.id, customer);
    this.customerReplies.set(idempotencyKey, customer);
    return customer;
  }

  async retrieveCustomer(customerRef: string): Promise<ProviderCustomer | null> {
    this.maybeFail();
    return this.customers.get(customerRef) ?? null;
  }

  async createCheckoutSession(
    params: CheckoutSessionParams,
    idempotencyKey: string,
  ): Promise<CreatedCheckoutSession> {
    this.maybeFail();
    this.idempotencyKeys.push(idempotencyKey);
    const replay = this.sessionReplies.get(idempotencyKey);
    if (replay) return { id: replay.id, url: replay.url };
    const id = this.nextId('cs');
    const session: MockCheckoutSession = { ...params, id, url: `https://checkout.example.test/pay/${id}` };
    this.sessions.push(session);
    this.sessionReplies.set(idempotencyKey, session);
    return { id, url: session.url };
  }

  async retrieveSubscription(subscriptionRef: string): Promise<ProviderSubscription> {
    this.maybeFail();
    return { ...this.requireSubscription(subscriptionRef) };
  }

  async modifySubscription(
    subscriptionRef: string,
    cancelAtPeriodEnd: boolean,
    idempotencyKey: string,
  ): Promise<ProviderSubscription> {
    this.maybeFail();
    this.idempotencyKeys.push(idempotencyKey);
    const sub = this.requireSubscription(subscriptionRef);
    sub.cancelAtPeriodEnd = cancelAtPeriodEnd;
    return { ...sub };
  }

  async deleteSubscription(subscriptionRef: string, idempotencyKey: string): Promise<ProviderSubscription> {
    this.maybeFail();
    this.idempotencyKeys.push(idempotencyKey);
    const sub = this.requireSubscription(subscriptionRef);
    sub.status = 'canceled';
    return { ...sub };
  }

  async listPricesByLookupKey(lookupKey: string): Promise<ProviderPrice[]> {
    this.maybeFail();
    return this.prices.filter((price) => price.lookupKey === lookupKey);
  }

  constructWebhookEvent(payload: string, signature: string | undefined): ProviderEvent {
    if (!this.webhookSecret) {
      throw new Error('STRIPE_WEBHOOK_SECRET is not configured');
    }
    verifySignature(payload, signature, this.webhookSecret);
    return decodeProviderEvent(parseJson(payload));
  }

  // ─── Test helpers ──────────────────────────────────────────

  /** Signature header the real provider would send for `payload` */
  signPayload(payload: string, timestamp?: number): string {
    if (!this.webhookSecret) {
      throw new Error('MockStripeClient was created without a webhook secret');
    }
    return signPayload(payload, this.webhookSecret, timestamp);
  }

  seedSubscription(seed: SeedSubscription): ProviderSubscription {
    const sub: ProviderSubscription = {
      id: seed.id ?? this.nextId('sub'),
      customerRef: seed.customerRef,
      status: seed.status ?? 'active',
      price: seed.price,
      currentPeriodEnd: seed.currentPeriodEnd ?? null,
      cancelAtPeriodEnd: seed.cancelAtPeriodEnd ?? false,
      metadata: seed.metadata ?? {},
    };
    this.subscriptions.set(sub.id, sub);
    return { ...sub };
  }

  seedCustomer(customer: ProviderCustomer): void {
    this.customers.set(customer.id, customer);
  }

  /** The next provider call throws ProviderError */
  failNext(message = 'Simulated provider outage', code?: string): void {
    this.pendingFailure = new ProviderError(message, code);
  }
}

// ═══════════════════════════════════════════
// Factory
// ═══════════════════════════════════════════

/**
 * Create a Stripe client. Returns MockStripeClient when no
 * STRIPE_SECRET_KEY is set (for testing/development).
 */
export function createStripeClient(config: ServerConfig): IStripeClient {
  if (!config.stripeSecretKey) {
    return new MockStripeClient(config.stripeWebhookSecret);
  }
  return new StripeSdkClient({
    secretKey: config.stripeSecretKey,
    webhookSecret: config.stripeWebhookSecret,
    timeoutMs: config.providerTimeoutMs,
    maxNetworkRetries: config.providerMaxRetries,
  });
}
