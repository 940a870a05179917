/**
 * Rolling billing windows.
 *
 * A window starts at an arbitrary instant and ends one calendar month later,
 * minus one second. Month arithmetic runs in UTC through date-fns so that
 * Jan 31 rolls to the last day of February and DST never shifts a boundary.
 */

import { addDays, addMonths, addSeconds, subSeconds } from 'date-fns';
import { UTCDate } from '@date-fns/utc';
import type { SubscriptionDraft } from './types.js';

export interface BillingWindow {
  start: Date;
  end: Date;
}

export interface EnsurePeriodResult {
  /** A window was opened because none existed */
  created: boolean;
  /** Number of elapsed windows stepped over */
  rolled: number;
}

type WindowFields = Pick<SubscriptionDraft, 'currentPeriodStart' | 'currentPeriodEnd' | 'periodUsage'>;

function toPlainDate(date: Date): Date {
  return new Date(date.getTime());
}

/**
 * Window beginning at `start`: `[start, start + 1 month - 1s]`.
 */
export function windowFrom(start: Date): BillingWindow {
  const utcStart = new UTCDate(start.getTime());
  const end = subSeconds(addMonths(utcStart, 1), 1);
  return { start: toPlainDate(utcStart), end: toPlainDate(end) };
}

/** `now + days`, in UTC calendar days */
export function addUtcDays(now: Date, days: number): Date {
  return toPlainDate(addDays(new UTCDate(now.getTime()), days));
}

export function needsPeriodRoll(sub: WindowFields, now: Date): boolean {
  if (!sub.currentPeriodStart || !sub.currentPeriodEnd) return true;
  return now.getTime() > sub.currentPeriodEnd.getTime();
}

/**
 * Make sure `sub` has a window containing `now`, mutating it in place.
 *
 * Steps one window at a time so usage resets at every boundary, even when
 * the subscription was untouched for several months. Calling it again
 * inside the current window changes nothing.
 */
export function ensurePeriod(sub: WindowFields, now: Date): EnsurePeriodResult {
  if (!sub.currentPeriodStart || !sub.currentPeriodEnd) {
    const window = windowFrom(now);
    sub.currentPeriodStart = window.start;
    sub.currentPeriodEnd = window.end;
    sub.periodUsage = 0;
    return { created: true, rolled: 0 };
  }

  let rolled = 0;
  let end = sub.currentPeriodEnd;
  while (now.getTime() > end.getTime()) {
    const next = windowFrom(toPlainDate(addSeconds(new UTCDate(end.getTime()), 1)));
    sub.currentPeriodStart = next.start;
    sub.currentPeriodEnd = next.end;
    sub.periodUsage = 0;
    end = next.end;
    rolled++;
  }

  return { created: false, rolled };
}
