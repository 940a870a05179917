/**
 * @creditledger/core — Provider Event Decoding
 *
 * Payment provider notifications arrive as loosely shaped JSON. They are
 * decoded once, here, into a tagged union so the reconciler matches on
 * `type` instead of probing optional keys.
 */
import { z } from 'zod';
import { ValidationError } from './errors.js';
import type { SubscriptionStatus } from './types.js';

// ─── Shared pieces ──────────────────────────────────────────────────

/** An id that may arrive expanded into its object */
const refSchema = z
  .union([z.string(), z.object({ id: z.string() }).passthrough()])
  .nullish()
  .transform((value) => (value == null ? null : typeof value === 'string' ? value : value.id));

const metadataSchema = z
  .record(z.string())
  .nullish()
  .transform((value) => value ?? {});

const unixSchema = z.number().int().nonnegative();

function fromUnix(seconds: number): Date {
  return new Date(seconds * 1000);
}

export const priceSchema = z
  .object({
    id: z.string(),
    lookup_key: z.string().nullish(),
    unit_amount: z.number().int().nullish(),
    recurring: z.object({ interval: z.string() }).passthrough().nullish(),
  })
  .passthrough()
  .transform((price) => ({
    id: price.id,
    lookupKey: price.lookup_key ?? null,
    unitAmount: price.unit_amount ?? null,
    recurringInterval: price.recurring?.interval ?? null,
  }));

export type ProviderPrice = z.output<typeof priceSchema>;

// ─── Subscription status mapping ────────────────────────────────────

export const providerSubscriptionStatusSchema = z.enum([
  'incomplete',
  'incomplete_expired',
  'trialing',
  'active',
  'past_due',
  'canceled',
  'unpaid',
  'paused',
]);

export type ProviderSubscriptionStatus = z.infer<typeof providerSubscriptionStatusSchema>;

const STATUS_MAP: Record<ProviderSubscriptionStatus, SubscriptionStatus> = {
  incomplete: 'inactive',
  incomplete_expired: 'canceled',
  trialing: 'trialing',
  active: 'active',
  past_due: 'past_due',
  canceled: 'canceled',
  unpaid: 'past_due',
  paused: 'inactive',
};

export function toLocalStatus(status: ProviderSubscriptionStatus): SubscriptionStatus {
  return STATUS_MAP[status];
}

// ─── Provider objects ───────────────────────────────────────────────

export const subscriptionObjectSchema = z
  .object({
    id: z.string(),
    customer: refSchema,
    status: providerSubscriptionStatusSchema,
    cancel_at_period_end: z.boolean().nullish(),
    current_period_end: unixSchema.nullish(),
    items: z
      .object({
        data: z.array(
          z
            .object({
              price: priceSchema,
              current_period_end: unixSchema.nullish(),
            })
            .passthrough(),
        ),
      })
      .passthrough()
      .nullish(),
    metadata: metadataSchema,
  })
  .passthrough()
  .transform((sub) => {
    const firstItem = sub.items?.data[0];
    const periodEnd = sub.current_period_end ?? firstItem?.current_period_end ?? null;
    return {
      id: sub.id,
      customerRef: sub.customer,
      status: sub.status,
      price: firstItem?.price ?? null,
      currentPeriodEnd: periodEnd === null ? null : fromUnix(periodEnd),
      cancelAtPeriodEnd: sub.cancel_at_period_end ?? false,
      metadata: sub.metadata,
    };
  });

export type ProviderSubscription = z.output<typeof subscriptionObjectSchema>;

export const checkoutSessionObjectSchema = z
  .object({
    id: z.string(),
    mode: z.enum(['payment', 'subscription', 'setup']),
    customer: refSchema,
    customer_email: z.string().nullish(),
    customer_details: z.object({ email: z.string().nullish() }).passthrough().nullish(),
    subscription: refSchema,
    payment_intent: refSchema,
    amount_total: z.number().int().nullish(),
    metadata: metadataSchema,
  })
  .passthrough()
  .transform((session) => ({
    id: session.id,
    mode: session.mode,
    customerRef: session.customer,
    email: session.customer_details?.email ?? session.customer_email ?? null,
    subscriptionRef: session.subscription,
    paymentRef: session.payment_intent,
    amountTotal: session.amount_total ?? 0,
    metadata: session.metadata,
  }));

export type CheckoutSessionPayload = z.output<typeof checkoutSessionObjectSchema>;

export const invoiceObjectSchema = z
  .object({
    id: z.string(),
    subscription: refSchema,
    customer: refSchema,
    customer_email: z.string().nullish(),
  })
  .passthrough()
  .transform((invoice) => ({
    id: invoice.id,
    subscriptionRef: invoice.subscription,
    customerRef: invoice.customer,
    email: invoice.customer_email ?? null,
  }));

export type InvoicePayload = z.output<typeof invoiceObjectSchema>;

// ─── Event union ────────────────────────────────────────────────────

export const SUBSCRIPTION_EVENT_TYPES = [
  'customer.subscription.created',
  'customer.subscription.updated',
  'customer.subscription.deleted',
] as const;

export const INVOICE_SUCCEEDED_EVENT_TYPES = ['invoice.payment_succeeded', 'invoice.paid'] as const;

interface EventBase {
  id: string;
  /** When the provider created the event */
  created: Date;
}

export type ProviderEvent =
  | (EventBase & { type: 'checkout.session.completed'; session: CheckoutSessionPayload })
  | (EventBase & {
      type: (typeof SUBSCRIPTION_EVENT_TYPES)[number];
      subscription: ProviderSubscription;
    })
  | (EventBase & { type: (typeof INVOICE_SUCCEEDED_EVENT_TYPES)[number]; invoice: InvoicePayload })
  | (EventBase & { type: 'invoice.payment_failed'; invoice: InvoicePayload })
  | (EventBase & { type: 'unhandled'; providerType: string });

export type ProviderEventType = ProviderEvent['type'];

const envelopeSchema = z
  .object({
    id: z.string().min(1),
    type: z.string().min(1),
    created: unixSchema,
    data: z.object({ object: z.unknown() }).passthrough(),
  })
  .passthrough();

function parseObject<S extends z.ZodTypeAny>(schema: S, value: unknown, type: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const first = result.error.issues[0];
    const where = first ? `${first.path.join('.')}: ${first.message}` : 'invalid object';
    throw new ValidationError(`Malformed ${type} payload (${where})`);
  }
  return result.data;
}

function isOneOf<T extends string>(list: readonly T[], value: string): value is T {
  return list.some((item) => item === value);
}

/**
 * Decode a raw provider event. Unknown event types decode to `unhandled`;
 * a known type with a malformed object throws `ValidationError`.
 */
export function decodeProviderEvent(raw: unknown): ProviderEvent {
  const envelope = parseObject(envelopeSchema, raw, 'event');
  const base: EventBase = { id: envelope.id, created: fromUnix(envelope.created) };
  const type = envelope.type;
  const object = envelope.data.object;

  if (type === 'checkout.session.completed') {
    return { ...base, type, session: parseObject(checkoutSessionObjectSchema, object, type) };
  }
  if (isOneOf(SUBSCRIPTION_EVENT_TYPES, type)) {
    return { ...base, type, subscription: parseObject(subscriptionObjectSchema, object, type) };
  }
  if (isOneOf(INVOICE_SUCCEEDED_EVENT_TYPES, type)) {
    return { ...base, type, invoice: parseObject(invoiceObjectSchema, object, type) };
  }
  if (type === 'invoice.payment_failed') {
    return { ...base, type, invoice: parseObject(invoiceObjectSchema, object, type) };
  }
  return { ...base, type: 'unhandled', providerType: type };
}
