import { describe, it, expect } from 'vitest';
import { DEFAULT_PRICE_REFS, PlanCatalog, ProviderError, type PriceConfig } from '@creditledger/core';
import { PriceLookup } from '../price-lookup.js';
import { MockStripeClient } from '../stripe-client.js';

describe('PriceLookup', () => {
  it('falls back to the catalog when the provider has no live price', async () => {
    const lookup = new PriceLookup(new PlanCatalog(), new MockStripeClient());

    expect(await lookup.planPrice('essentials', 'year')).toBe('price_ess_y_3840');
    expect(await lookup.oneTimePrice()).toBe('price_pdf_one_299');
  });

  it('uses the live price and caches it', async () => {
    const stripe = new MockStripeClient();
    stripe.prices.push({ id: 'price_live', lookupKey: 'precision_month', unitAmount: 799, recurringInterval: 'month' });
    const lookup = new PriceLookup(new PlanCatalog(), stripe);

    expect(await lookup.planPrice('precision', 'month')).toBe('price_live');
    stripe.prices.length = 0;
    expect(await lookup.planPrice('precision', 'month')).toBe('price_live');
  });

  it('never asks the provider for an overridden price', async () => {
    const stripe = new MockStripeClient();
    stripe.prices.push({ id: 'price_live', lookupKey: 'essentials_month', unitAmount: 399, recurringInterval: 'month' });
    stripe.failNext();
    const catalog = new PlanCatalog({ ...DEFAULT_PRICE_REFS, essentials_month: 'price_from_env' });
    const lookup = new PriceLookup(catalog, stripe, new Set<keyof PriceConfig>(['essentials_month']));

    expect(await lookup.planPrice('essentials', 'month')).toBe('price_from_env');
  });

  it('propagates provider failures', async () => {
    const stripe = new MockStripeClient();
    stripe.failNext();
    const lookup = new PriceLookup(new PlanCatalog(), stripe);

    await expect(lookup.oneTimePrice()).rejects.toThrow(ProviderError);
  });
});
