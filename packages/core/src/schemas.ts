/**
 * @creditledger/core — Zod Validation Schemas
 *
 * Runtime validation for billing API inputs.
 */
import { z } from 'zod';
import { ONE_TIME_PRODUCT } from './types.js';

export const planNameSchema = z.enum(['free', 'essentials', 'precision']);

export const billingIntervalSchema = z.enum(['month', 'year']);

export const checkoutProductSchema = z.enum(['essentials', 'precision', ONE_TIME_PRODUCT]);

/**
 * Body of POST /api/billing/checkout. Plans need an interval; the one-time
 * report must not carry one.
 */
export const checkoutRequestSchema = z
  .object({
    product: checkoutProductSchema,
    interval: billingIntervalSchema.optional(),
  })
  .superRefine((body, ctx) => {
    if (body.product === ONE_TIME_PRODUCT && body.interval !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['interval'],
        message: 'The one-time report has no billing interval',
      });
    }
    if (body.product !== ONE_TIME_PRODUCT && body.interval === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['interval'],
        message: 'interval is required for subscription plans',
      });
    }
  });

export type CheckoutRequest = z.infer<typeof checkoutRequestSchema>;

export const cancelRequestSchema = z.object({
  atPeriodEnd: z.boolean().default(true),
});

export type CancelRequest = z.infer<typeof cancelRequestSchema>;
