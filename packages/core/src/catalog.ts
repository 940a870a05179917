/**
 * Plan/Price Catalog
 *
 * Static, bidirectional mapping between plan keys ("essentials_month") and
 * opaque provider price refs. Plan keys double as provider lookup keys.
 */

import { DEFAULT_PRICE_REFS, PAID_PLANS } from './constants.js';
import { ValidationError } from './errors.js';
import type { ProviderPrice } from './provider-events.js';
import { ONE_TIME_PRODUCT } from './types.js';
import type { BillingInterval, PaidPlanName, PlanSelection } from './types.js';

export type PlanKey = `${PaidPlanName}_${BillingInterval}`;

export type PriceConfig = Record<PlanKey | typeof ONE_TIME_PRODUCT, string>;

export const BILLING_INTERVALS: readonly BillingInterval[] = ['month', 'year'];

/**
 * Last-resort decoding for prices created without a lookup key.
 * Amounts are minor units (USD cents).
 */
const PRICE_AMOUNT_TABLE: ReadonlyArray<{ amount: number; interval: BillingInterval; key: PlanKey }> = [
  { amount: 399, interval: 'month', key: 'essentials_month' },
  { amount: 799, interval: 'month', key: 'precision_month' },
  { amount: 3840, interval: 'year', key: 'essentials_year' },
  { amount: 7670, interval: 'year', key: 'precision_year' },
];

export const ONE_TIME_REPORT_AMOUNT = 299;

export function isPaidPlan(value: string): value is PaidPlanName {
  return PAID_PLANS.some((plan) => plan === value);
}

export function isBillingInterval(value: string): value is BillingInterval {
  return BILLING_INTERVALS.some((interval) => interval === value);
}

export function planKey(plan: PaidPlanName, interval: BillingInterval): PlanKey {
  return `${plan}_${interval}`;
}

/** `"precision_year"` → `{plan: 'precision', interval: 'year'}`; null for anything else */
export function parsePlanKey(key: string): PlanSelection | null {
  const separator = key.lastIndexOf('_');
  if (separator <= 0) return null;
  const plan = key.slice(0, separator);
  const interval = key.slice(separator + 1);
  if (!isPaidPlan(plan) || !isBillingInterval(interval)) return null;
  return { plan, interval };
}

export class PlanCatalog {
  private readonly byPriceRef = new Map<string, PlanSelection>();

  constructor(private readonly prices: PriceConfig = { ...DEFAULT_PRICE_REFS }) {
    for (const plan of PAID_PLANS) {
      for (const interval of BILLING_INTERVALS) {
        this.byPriceRef.set(prices[planKey(plan, interval)], { plan, interval });
      }
    }
  }

  priceFor(plan: string, interval: string): string {
    if (!isPaidPlan(plan)) {
      throw new ValidationError(`Unknown paid plan '${plan}'`);
    }
    if (!isBillingInterval(interval)) {
      throw new ValidationError(`Unknown billing interval '${interval}'`);
    }
    return this.prices[planKey(plan, interval)];
  }

  oneTimePrice(): string {
    return this.prices[ONE_TIME_PRODUCT];
  }

  isOneTimePrice(priceRef: string): boolean {
    return priceRef === this.prices[ONE_TIME_PRODUCT];
  }

  /**
   * Decode a provider price back to a plan. Tries the lookup key, the
   * configured price refs, the metadata written at checkout, then the
   * amount table. The one-time price never decodes to a plan.
   */
  decodePrice(price: ProviderPrice | null, metadata: Record<string, string> = {}): PlanSelection | null {
    if (price && this.isOneTimePrice(price.id)) return null;

    if (price?.lookupKey) {
      const fromLookup = parsePlanKey(price.lookupKey);
      if (fromLookup) return fromLookup;
    }

    if (price) {
      const fromRef = this.byPriceRef.get(price.id);
      if (fromRef) return { ...fromRef };
    }

    const metaPlan = metadata['plan'];
    const metaInterval = metadata['interval'];
    if (metaPlan && metaInterval && isPaidPlan(metaPlan) && isBillingInterval(metaInterval)) {
      return { plan: metaPlan, interval: metaInterval };
    }

    if (price && price.unitAmount !== null) {
      const row = PRICE_AMOUNT_TABLE.find(
        (entry) => entry.amount === price.unitAmount && entry.interval === price.recurringInterval,
      );
      if (row) return parsePlanKey(row.key);
    }

    return null;
  }
}
