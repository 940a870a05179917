import { describe, it, expect } from 'vitest';
import { ensurePeriod, needsPeriodRoll, windowFrom, addUtcDays } from '../billing-window.js';

interface WindowState {
  currentPeriodStart: Date | null;
  currentPeriodEnd: Date | null;
  periodUsage: number;
}

function blankWindow(): WindowState {
  return { currentPeriodStart: null, currentPeriodEnd: null, periodUsage: 0 };
}

describe('windowFrom', () => {
  it('ends one calendar month later minus one second', () => {
    const { start, end } = windowFrom(new Date('2024-01-15T10:00:00Z'));
    expect(start.toISOString()).toBe('2024-01-15T10:00:00.000Z');
    expect(end.toISOString()).toBe('2024-02-15T09:59:59.000Z');
  });

  it('clamps to the last day of a shorter month', () => {
    const { end } = windowFrom(new Date('2024-01-31T12:00:00Z'));
    expect(end.toISOString()).toBe('2024-02-29T11:59:59.000Z');
  });

  it('uses calendar months rather than 30 days', () => {
    const { end } = windowFrom(new Date('2023-02-01T00:00:00Z'));
    expect(end.toISOString()).toBe('2023-02-28T23:59:59.000Z');
  });

  it('keeps the UTC hour across a DST change', () => {
    const { end } = windowFrom(new Date('2024-03-01T10:00:00Z'));
    expect(end.toISOString()).toBe('2024-04-01T09:59:59.000Z');
  });
});

describe('addUtcDays', () => {
  it('adds whole days', () => {
    expect(addUtcDays(new Date('2024-01-15T10:00:00Z'), 14).toISOString()).toBe('2024-01-29T10:00:00.000Z');
  });
});

describe('ensurePeriod', () => {
  it('opens a window at now when none exists', () => {
    const sub = { ...blankWindow(), periodUsage: 3 };
    const now = new Date('2024-01-15T10:00:00Z');

    const result = ensurePeriod(sub, now);

    expect(result).toEqual({ created: true, rolled: 0 });
    expect(sub.currentPeriodStart?.toISOString()).toBe('2024-01-15T10:00:00.000Z');
    expect(sub.currentPeriodEnd?.toISOString()).toBe('2024-02-15T09:59:59.000Z');
    expect(sub.periodUsage).toBe(0);
  });

  it('is a no-op inside the current window', () => {
    const sub = blankWindow();
    ensurePeriod(sub, new Date('2024-01-15T10:00:00Z'));
    sub.periodUsage = 4;

    const again = ensurePeriod(sub, new Date('2024-01-20T00:00:00Z'));

    expect(again).toEqual({ created: false, rolled: 0 });
    expect(sub.periodUsage).toBe(4);
    expect(sub.currentPeriodStart?.toISOString()).toBe('2024-01-15T10:00:00.000Z');
  });

  it('does not roll on the last second of the window', () => {
    const sub = blankWindow();
    ensurePeriod(sub, new Date('2024-01-15T10:00:00Z'));
    sub.periodUsage = 2;

    const result = ensurePeriod(sub, new Date('2024-02-15T09:59:59Z'));

    expect(result.rolled).toBe(0);
    expect(sub.periodUsage).toBe(2);
  });

  it('steps one window per elapsed month and lands on a window containing now', () => {
    const sub = blankWindow();
    ensurePeriod(sub, new Date('2024-01-15T10:00:00Z'));
    sub.periodUsage = 5;
    const now = new Date('2024-04-20T00:00:00Z');

    const result = ensurePeriod(sub, now);

    expect(result).toEqual({ created: false, rolled: 3 });
    expect(sub.periodUsage).toBe(0);
    expect(sub.currentPeriodStart?.toISOString()).toBe('2024-04-15T10:00:00.000Z');
    expect(sub.currentPeriodEnd?.toISOString()).toBe('2024-05-15T09:59:59.000Z');
    const start = sub.currentPeriodStart?.getTime() ?? Infinity;
    const end = sub.currentPeriodEnd?.getTime() ?? -Infinity;
    expect(start).toBeLessThanOrEqual(now.getTime());
    expect(now.getTime()).toBeLessThanOrEqual(end);
  });

  it('starts each new window one second after the previous end', () => {
    const sub = blankWindow();
    ensurePeriod(sub, new Date('2024-01-15T10:00:00Z'));

    ensurePeriod(sub, new Date('2024-02-15T10:00:00Z'));

    expect(sub.currentPeriodStart?.toISOString()).toBe('2024-02-15T10:00:00.000Z');
    expect(sub.currentPeriodEnd?.toISOString()).toBe('2024-03-15T09:59:59.000Z');
  });
});

describe('needsPeriodRoll', () => {
  it('is true without a window', () => {
    expect(needsPeriodRoll(blankWindow(), new Date())).toBe(true);
  });

  it('is true only after the window end', () => {
    const sub = blankWindow();
    ensurePeriod(sub, new Date('2024-01-15T10:00:00Z'));
    expect(needsPeriodRoll(sub, new Date('2024-02-15T09:59:59Z'))).toBe(false);
    expect(needsPeriodRoll(sub, new Date('2024-02-15T10:00:00Z'))).toBe(true);
  });
});
