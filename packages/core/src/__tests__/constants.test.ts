import { describe, it, expect } from 'vitest';
import {
  DEFAULT_PRICE_REFS,
  MONTHLY_CREDIT_CAPS,
  PAID_PLANS,
  TRIAL_DURATION_DAYS,
  TRIAL_REPORT_ALLOWANCE,
} from '../constants.js';

describe('Constants', () => {
  it('caps reports per rolling month by plan', () => {
    expect(MONTHLY_CREDIT_CAPS).toEqual({ free: 0, essentials: 6, precision: 12 });
  });

  it('runs a 14-day trial with a single report', () => {
    expect(TRIAL_DURATION_DAYS).toBe(14);
    expect(TRIAL_REPORT_ALLOWANCE).toBe(1);
  });

  it('lists only purchasable plans as paid', () => {
    expect(PAID_PLANS).toEqual(['essentials', 'precision']);
  });

  it('has a distinct default price ref for every product', () => {
    const refs = Object.values(DEFAULT_PRICE_REFS);
    expect(refs).toHaveLength(5);
    expect(new Set(refs).size).toBe(5);
  });
});
