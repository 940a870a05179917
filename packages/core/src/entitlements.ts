import { MONTHLY_CREDIT_CAPS, TRIAL_REPORT_ALLOWANCE } from './constants.js';
import type { SubscriptionDraft } from './types.js';

type EntitlementFields = Pick<SubscriptionDraft, 'plan' | 'status' | 'trialEnd' | 'periodUsage'>;

/**
 * Whether the free-trial allowance applies at `now`.
 */
export function isTrialActive(sub: Pick<SubscriptionDraft, 'plan' | 'status' | 'trialEnd'>, now: Date): boolean {
  return (
    sub.plan === 'free' &&
    sub.status === 'trialing' &&
    sub.trialEnd !== null &&
    sub.trialEnd.getTime() >= now.getTime()
  );
}

/**
 * Credit cap of the current window. Free is 0 outside an active trial;
 * during the trial it is the lifetime trial allowance.
 */
export function capFor(sub: Pick<SubscriptionDraft, 'plan' | 'status' | 'trialEnd'>, now: Date): number {
  if (sub.plan === 'free') {
    return isTrialActive(sub, now) ? TRIAL_REPORT_ALLOWANCE : 0;
  }
  return MONTHLY_CREDIT_CAPS[sub.plan];
}

/**
 * Subscription credits left in the current window. Callers are expected to
 * have run `ensurePeriod` first.
 */
export function remainingCredits(sub: EntitlementFields, now: Date): number {
  return Math.max(0, capFor(sub, now) - sub.periodUsage);
}
