import { describe, it, expect } from 'vitest';
import { PlanCatalog, parsePlanKey, planKey } from '../catalog.js';
import { ValidationError } from '../errors.js';
import type { ProviderPrice } from '../provider-events.js';

function price(overrides: Partial<ProviderPrice> = {}): ProviderPrice {
  return { id: 'price_unknown', lookupKey: null, unitAmount: null, recurringInterval: null, ...overrides };
}

describe('plan keys', () => {
  it('round-trips plan and interval', () => {
    expect(planKey('precision', 'year')).toBe('precision_year');
    expect(parsePlanKey('precision_year')).toEqual({ plan: 'precision', interval: 'year' });
  });

  it('rejects unknown keys', () => {
    expect(parsePlanKey('free_month')).toBeNull();
    expect(parsePlanKey('essentials_week')).toBeNull();
    expect(parsePlanKey('one_time_report')).toBeNull();
    expect(parsePlanKey('nonsense')).toBeNull();
  });
});

describe('PlanCatalog', () => {
  const catalog = new PlanCatalog();

  it('maps plan keys to the default price refs', () => {
    expect(catalog.priceFor('essentials', 'month')).toBe('price_ess_m_399');
    expect(catalog.priceFor('precision', 'year')).toBe('price_pre_y_7670');
    expect(catalog.oneTimePrice()).toBe('price_pdf_one_299');
  });

  it('rejects the free plan and unknown intervals', () => {
    expect(() => catalog.priceFor('free', 'month')).toThrow(ValidationError);
    expect(() => catalog.priceFor('essentials', 'week')).toThrow("Unknown billing interval 'week'");
  });

  it('uses configured price refs', () => {
    const custom = new PlanCatalog({
      essentials_month: 'price_a',
      essentials_year: 'price_b',
      precision_month: 'price_c',
      precision_year: 'price_d',
      one_time_report: 'price_e',
    });
    expect(custom.priceFor('precision', 'month')).toBe('price_c');
    expect(custom.decodePrice(price({ id: 'price_d' }))).toEqual({ plan: 'precision', interval: 'year' });
  });

  describe('decodePrice', () => {
    it('prefers the lookup key', () => {
      const decoded = catalog.decodePrice(
        price({ id: 'price_ess_m_399', lookupKey: 'precision_year' }),
        { plan: 'essentials', interval: 'month' },
      );
      expect(decoded).toEqual({ plan: 'precision', interval: 'year' });
    });

    it('falls back to the configured price ref', () => {
      expect(catalog.decodePrice(price({ id: 'price_ess_y_3840' }))).toEqual({ plan: 'essentials', interval: 'year' });
    });

    it('falls back to checkout metadata', () => {
      const decoded = catalog.decodePrice(price({ id: 'price_legacy' }), { plan: 'precision', interval: 'month' });
      expect(decoded).toEqual({ plan: 'precision', interval: 'month' });
    });

    it('falls back to the amount table', () => {
      const decoded = catalog.decodePrice(price({ id: 'price_legacy', unitAmount: 799, recurringInterval: 'month' }));
      expect(decoded).toEqual({ plan: 'precision', interval: 'month' });
    });

    it('needs both amount and interval to match the table', () => {
      expect(catalog.decodePrice(price({ id: 'price_legacy', unitAmount: 799, recurringInterval: 'year' }))).toBeNull();
    });

    it('never decodes the one-time price to a plan', () => {
      expect(catalog.decodePrice(price({ id: 'price_pdf_one_299' }), { plan: 'essentials', interval: 'month' })).toBeNull();
    });

    it('uses metadata when no price is known', () => {
      expect(catalog.decodePrice(null, { plan: 'essentials', interval: 'year' })).toEqual({
        plan: 'essentials',
        interval: 'year',
      });
      expect(catalog.decodePrice(null)).toBeNull();
    });
  });
});
