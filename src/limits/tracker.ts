import { format } from 'date-fns';
import { BudgetDecision, RateBudgetGate } from '../types';

export interface RateBudgetOptions {
  maxCalls: number;
  periodMs: number;
  dailyBudget?: number; // USD; unset means unlimited
  alertThreshold?: number; // fraction of dailyBudget
  onAlert?: (message: string) => void;
  now?: () => number;
}

export interface RateBudgetStats {
  callsInWindow: number;
  maxCalls: number;
  periodMs: number;
  throttled: number;
  denied: number;
  spend: number;
  dailyBudget?: number;
}

/**
 * Sliding-window call limiter plus a daily cost budget, shared by every model call in a run.
 */
export class RateBudgetTracker implements RateBudgetGate {
  private calls: number[] = [];
  private spend = 0;
  private spendDay: string;
  private alerted = false;
  private throttled = 0;
  private denied = 0;
  private readonly now: () => number;
  private readonly alertThreshold: number;

  constructor(private options: RateBudgetOptions) {
    this.now = options.now ?? Date.now;
    this.alertThreshold = options.alertThreshold ?? 0.8;
    this.spendDay = this.dayOf(this.now());
  }

  beforeCall(estimatedCost: number): BudgetDecision {
    const now = this.now();
    this.rollDay(now);
    this.prune(now);

    const { dailyBudget } = this.options;
    if (dailyBudget !== undefined && this.spend + estimatedCost > dailyBudget) {
      this.denied++;
      return {
        action: 'deny',
        reason: `Daily budget of $${dailyBudget.toFixed(2)} exhausted ($${this.spend.toFixed(4)} spent)`,
      };
    }

    if (this.calls.length >= this.options.maxCalls) {
      this.throttled++;
      const retryAfterMs = Math.max(0, this.calls[0] + this.options.periodMs - now);
      return { action: 'wait', retryAfterMs };
    }

    this.calls.push(now);
    this.spend += estimatedCost;

    if (dailyBudget !== undefined && !this.alerted && this.spend >= dailyBudget * this.alertThreshold) {
      this.alerted = true;
      const message =
        `Budget alert: $${this.spend.toFixed(4)} of $${dailyBudget.toFixed(2)} used today ` +
        `(${((this.spend / dailyBudget) * 100).toFixed(1)}%)`;
      console.warn(`⚠️  ${message}`);
      this.options.onAlert?.(message);
    }

    return { action: 'proceed' };
  }

  getStats(): RateBudgetStats {
    this.prune(this.now());
    return {
      callsInWindow: this.calls.length,
      maxCalls: this.options.maxCalls,
      periodMs: this.options.periodMs,
      throttled: this.throttled,
      denied: this.denied,
      spend: this.spend,
      dailyBudget: this.options.dailyBudget,
    };
  }

  private prune(now: number) {
    while (this.calls.length > 0 && this.calls[0] <= now - this.options.periodMs) {
      this.calls.shift();
    }
  }

  private rollDay(now: number) {
    const day = this.dayOf(now);
    if (day !== this.spendDay) {
      this.spendDay = day;
      this.spend = 0;
      this.alerted = false;
    }
  }

  private dayOf(ms: number): string {
    return format(ms, 'yyyy-MM-dd');
  }
}
