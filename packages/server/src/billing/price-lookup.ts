/**
 * Resolves the provider price ref for a checkout.
 *
 * Price refs set explicitly in the environment win. Otherwise the live price
 * is looked up by its lookup key (the plan key), falling back to the
 * catalog's default ref when the provider has none.
 */

import {
  ONE_TIME_PRODUCT,
  planKey,
  type BillingInterval,
  type PaidPlanName,
  type PlanCatalog,
  type PriceConfig,
} from '@creditledger/core';
import type { IStripeClient } from './stripe-client.js';
import { createLogger } from '../lib/logger.js';

const log = createLogger('PriceLookup');

export class PriceLookup {
  private readonly resolved = new Map<keyof PriceConfig, string>();

  constructor(
    private readonly catalog: PlanCatalog,
    private readonly stripe: IStripeClient,
    private readonly overrides: ReadonlySet<keyof PriceConfig> = new Set(),
  ) {}

  async planPrice(plan: PaidPlanName, interval: BillingInterval): Promise<string> {
    const fallback = this.catalog.priceFor(plan, interval);
    return this.resolve(planKey(plan, interval), fallback);
  }

  async oneTimePrice(): Promise<string> {
    return this.resolve(ONE_TIME_PRODUCT, this.catalog.oneTimePrice());
  }

  private async resolve(key: keyof PriceConfig, fallback: string): Promise<string> {
    if (this.overrides.has(key)) return fallback;

    const cached = this.resolved.get(key);
    if (cached) return cached;

    const [live] = await this.stripe.listPricesByLookupKey(key);
    const ref = live?.id ?? fallback;
    if (!live) {
      log.debug(`No live price for lookup key ${key}, using ${fallback}`);
    }
    this.resolved.set(key, ref);
    return ref;
  }
}
