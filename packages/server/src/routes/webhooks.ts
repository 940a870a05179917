/**
 * Payment Provider Webhook Endpoint
 *
 * POST /webhooks/stripe — raw body + `Stripe-Signature` header.
 *
 * The signature is verified over the raw bytes before anything is parsed.
 * 400: missing or invalid signature, or a payload that cannot be decoded.
 * 500: no webhook secret configured, or the event could not be applied
 *      (the provider redelivers).
 * 200: applied, or acknowledged without effect.
 */

import { Hono } from 'hono';
import { getErrorMessage } from '@creditledger/core';
import type { IStripeClient } from '../billing/stripe-client.js';
import type { WebhookReconciler } from '../billing/reconciler.js';
import { createLogger } from '../lib/logger.js';

const log = createLogger('Webhooks');

export const SIGNATURE_HEADER = 'Stripe-Signature';

export interface WebhookRouteDeps {
  stripe: IStripeClient;
  reconciler: WebhookReconciler;
  webhookSecret?: string;
}

export function webhookRoutes(deps: WebhookRouteDeps) {
  const app = new Hono();

  app.post('/stripe', async (c) => {
    if (!deps.webhookSecret) {
      log.error('Webhook received but STRIPE_WEBHOOK_SECRET is not configured');
      return c.json({ error: 'Webhook endpoint is not configured', status: 500 }, 500);
    }

    const payload = await c.req.text();
    // Signature and decoding failures are domain errors: app.onError answers 400
    const event = deps.stripe.constructWebhookEvent(payload, c.req.header(SIGNATURE_HEADER));

    try {
      const result = await deps.reconciler.apply(event);
      return c.json({ received: true, ...result });
    } catch (err) {
      log.error('Failed to apply webhook event', {
        eventId: event.id,
        type: event.type,
        error: getErrorMessage(err),
      });
      return c.json({ error: 'Webhook processing failed', retryable: true, status: 500 }, 500);
    }
  });

  return app;
}
