/**
 * Billing Endpoints
 *
 * GET  /api/billing           — entitlement overview
 * POST /api/billing/trial     — start the no-card free trial
 * POST /api/billing/checkout  — hosted checkout for a plan or a one-time report
 * POST /api/billing/cancel    — ask the provider to cancel ({atPeriodEnd?}, default true)
 * POST /api/billing/resume    — undo a pending cancel-at-period-end
 *
 * Every route runs behind the identity middleware.
 */

import { Hono } from 'hono';
import { cancelRequestSchema, checkoutRequestSchema } from '@creditledger/core';
import type { SubscriptionService } from '../billing/subscription-service.js';
import type { CheckoutService } from '../billing/checkout-service.js';
import type { UserDirectory } from '../db/user-directory.js';
import { identityMiddleware, type IdentityVariables } from '../middleware/identity.js';
import { validateBody } from '../middleware/validation.js';

export const IDEMPOTENCY_HEADER = 'Idempotency-Key';

export interface BillingRouteDeps {
  users: UserDirectory;
  subscriptions: SubscriptionService;
  checkout: CheckoutService;
}

export function billingRoutes(deps: BillingRouteDeps) {
  const app = new Hono<{ Variables: IdentityVariables }>();

  app.use('*', identityMiddleware(deps.users));

  app.get('/', async (c) => {
    const overview = await deps.subscriptions.getOverview(c.get('user').id);
    return c.json(overview);
  });

  app.post('/trial', async (c) => {
    const trial = await deps.subscriptions.startFreeTrial(c.get('user').id);
    return c.json({ trial }, 201);
  });

  app.post('/checkout', validateBody(checkoutRequestSchema), async (c) => {
    const session = await deps.checkout.createCheckout(
      c.get('user').id,
      c.get('validatedBody'),
      c.req.header(IDEMPOTENCY_HEADER) || undefined,
    );
    return c.json(session, 201);
  });

  app.post('/cancel', validateBody(cancelRequestSchema, { allowEmpty: true }), async (c) => {
    const { atPeriodEnd } = c.get('validatedBody');
    const result = await deps.subscriptions.cancel(
      c.get('user').id,
      { atPeriodEnd },
      c.req.header(IDEMPOTENCY_HEADER) || undefined,
    );
    return c.json(result);
  });

  app.post('/resume', async (c) => {
    const result = await deps.subscriptions.resume(
      c.get('user').id,
      c.req.header(IDEMPOTENCY_HEADER) || undefined,
    );
    return c.json(result);
  });

  return app;
}
