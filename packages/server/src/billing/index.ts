/**
 * Billing Module Index
 */

export {
  type IStripeClient,
  type ProviderCustomer,
  type CheckoutMode,
  type CheckoutSessionParams,
  type CreatedCheckoutSession,
  type SeedSubscription,
  StripeSdkClient,
  MockStripeClient,
  createStripeClient,
} from './stripe-client.js';

export { verifySignature, signPayload, computeSignature, DEFAULT_TOLERANCE_SECONDS } from './webhook-signature.js';

export { PriceLookup } from './price-lookup.js';

export { CreditService, type CreditServiceDeps } from './credit-service.js';

export {
  SubscriptionService,
  type SubscriptionServiceDeps,
  type TrialStatus,
  type BillingOverview,
  type ProviderChangeResult,
} from './subscription-service.js';

export {
  CheckoutService,
  type CheckoutServiceDeps,
  type CheckoutResult,
} from './checkout-service.js';

export {
  WebhookReconciler,
  type ReconcilerDeps,
  type ReconcileAction,
  type WebhookResult,
} from './reconciler.js';
