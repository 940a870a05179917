import type { PaidPlanName, PlanName } from './types.js';

/**
 * @creditledger/core — Shared Constants
 */

/** Length of the no-card free trial */
export const TRIAL_DURATION_DAYS = 14;

/** Reports a free-plan user may run during the whole trial */
export const TRIAL_REPORT_ALLOWANCE = 1;

/** Reports per rolling month for each plan */
export const MONTHLY_CREDIT_CAPS: Record<PlanName, number> = {
  free: 0,
  essentials: 6,
  precision: 12,
};

export const PAID_PLANS: readonly PaidPlanName[] = ['essentials', 'precision'];

/** Default provider price refs, overridable per environment */
export const DEFAULT_PRICE_REFS = {
  essentials_month: 'price_ess_m_399',
  precision_month: 'price_pre_m_799',
  essentials_year: 'price_ess_y_3840',
  precision_year: 'price_pre_y_7670',
  one_time_report: 'price_pdf_one_299',
} as const;
