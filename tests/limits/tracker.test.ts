import { afterEach, describe, expect, it, vi } from 'vitest';
import { RateBudgetTracker } from '../../src/limits/tracker';

function clock(start: number) {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

const NOON = new Date(2024, 2, 5, 12, 0, 0).getTime();

describe('RateBudgetTracker', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('allows up to maxCalls per window, then asks to wait for the oldest call to expire', () => {
    const time = clock(NOON);
    const tracker = new RateBudgetTracker({ maxCalls: 2, periodMs: 60_000, now: time.now });

    expect(tracker.beforeCall(0)).toEqual({ action: 'proceed' });
    time.advance(10_000);
    expect(tracker.beforeCall(0)).toEqual({ action: 'proceed' });
    time.advance(5_000);
    expect(tracker.beforeCall(0)).toEqual({ action: 'wait', retryAfterMs: 45_000 });

    time.advance(45_000);
    expect(tracker.beforeCall(0)).toEqual({ action: 'proceed' });
    expect(tracker.getStats()).toMatchObject({ callsInWindow: 2, throttled: 1, denied: 0 });
  });

  it('denies a call that would overspend the daily budget', () => {
    const tracker = new RateBudgetTracker({ maxCalls: 100, periodMs: 60_000, dailyBudget: 1, now: clock(NOON).now });
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    expect(tracker.beforeCall(0.6).action).toBe('proceed');
    expect(tracker.beforeCall(0.5)).toEqual({ action: 'deny', reason: 'Daily budget of $1.00 exhausted ($0.6000 spent)' });
    expect(tracker.beforeCall(0.4).action).toBe('proceed');
    expect(tracker.getStats()).toMatchObject({ denied: 1, spend: 1 });
  });

  it('warns once when spend crosses the alert threshold', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const tracker = new RateBudgetTracker({ maxCalls: 100, periodMs: 60_000, dailyBudget: 1, now: clock(NOON).now });

    tracker.beforeCall(0.5);
    expect(warn).not.toHaveBeenCalled();
    tracker.beforeCall(0.3);
    tracker.beforeCall(0.1);

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith('⚠️  Budget alert: $0.8000 of $1.00 used today (80.0%)');
  });

  it('hands the alert to the onAlert hook once per day', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const time = clock(NOON);
    const alerts: string[] = [];
    const tracker = new RateBudgetTracker({
      maxCalls: 100,
      periodMs: 60_000,
      dailyBudget: 2,
      alertThreshold: 0.5,
      onAlert: message => alerts.push(message),
      now: time.now,
    });

    tracker.beforeCall(1);
    tracker.beforeCall(0.5);
    time.advance(24 * 60 * 60 * 1000);
    tracker.beforeCall(1.5);

    expect(alerts).toEqual([
      'Budget alert: $1.0000 of $2.00 used today (50.0%)',
      'Budget alert: $1.5000 of $2.00 used today (75.0%)',
    ]);
  });

  it('resets spend on a new day', () => {
    const time = clock(NOON);
    const tracker = new RateBudgetTracker({ maxCalls: 100, periodMs: 60_000, dailyBudget: 1, alertThreshold: 1, now: time.now });
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    expect(tracker.beforeCall(1).action).toBe('proceed');
    expect(tracker.beforeCall(0.1).action).toBe('deny');

    time.advance(24 * 60 * 60 * 1000);
    expect(tracker.beforeCall(0.1).action).toBe('proceed');
    expect(tracker.getStats().spend).toBeCloseTo(0.1, 10);
  });

  it('never denies without a budget', () => {
    const tracker = new RateBudgetTracker({ maxCalls: 100, periodMs: 60_000, now: clock(NOON).now });
    expect(tracker.beforeCall(1_000_000).action).toBe('proceed');
  });
});
