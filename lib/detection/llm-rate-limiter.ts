/**
 * LLM Rate Limiter
 * Caps model calls per key per UTC day to prevent unbounded costs.
 * State lives in the limiter instance the caller owns.
 */

import type { ModelCall } from './types';
import { ModelCallError, ModelErrorKind } from './errors';

export interface RateLimitConfig {
  dailyLimit: number;
  warningThreshold?: number; // Fraction at which to warn (e.g., 0.8 = 80%)
  now?: () => Date;
}

export interface RateLimitResult {
  allowed: boolean;
  currentCount: number;
  dailyLimit: number;
  remaining: number;
  resetAt: Date;
  warning?: string;
}

export class LLMRateLimiter {
  private counts = new Map<string, { day: string; count: number }>();
  private dailyLimit: number;
  private warningThreshold: number;
  private now: () => Date;

  constructor(config: RateLimitConfig) {
    this.dailyLimit = config.dailyLimit;
    this.warningThreshold = config.warningThreshold ?? 0.8;
    this.now = config.now ?? (() => new Date());
  }

  /**
   * Check whether `key` may make another call, and count it if so
   */
  checkAndIncrement(key = 'default'): RateLimitResult {
    const now = this.now();
    const today = now.toISOString().split('T')[0]; // YYYY-MM-DD
    const resetAt = new Date(`${today}T00:00:00.000Z`);
    resetAt.setUTCDate(resetAt.getUTCDate() + 1);

    const entry = this.counts.get(key);
    const currentCount = entry && entry.day === today ? entry.count : 0;

    if (currentCount >= this.dailyLimit) {
      return {
        allowed: false,
        currentCount,
        dailyLimit: this.dailyLimit,
        remaining: 0,
        resetAt,
        warning: `Daily LLM limit of ${this.dailyLimit} calls exceeded. Resets at midnight UTC.`,
      };
    }

    const nextCount = currentCount + 1;
    this.counts.set(key, { day: today, count: nextCount });

    const result: RateLimitResult = {
      allowed: true,
      currentCount: nextCount,
      dailyLimit: this.dailyLimit,
      remaining: this.dailyLimit - nextCount,
      resetAt,
    };

    if (nextCount / this.dailyLimit >= this.warningThreshold) {
      result.warning = `Approaching daily LLM limit: ${nextCount}/${this.dailyLimit} calls used (${Math.round((nextCount / this.dailyLimit) * 100)}%)`;
    }

    return result;
  }

  getUsage(key = 'default'): number {
    const entry = this.counts.get(key);
    const today = this.now().toISOString().split('T')[0];
    return entry && entry.day === today ? entry.count : 0;
  }
}

/**
 * Wrap a ModelCall so calls beyond the daily limit fail as rate_limited
 */
export function withDailyLimit(modelCall: ModelCall, limiter: LLMRateLimiter, key?: string): ModelCall {
  return async (prompt, options) => {
    const usage = limiter.checkAndIncrement(key);
    if (!usage.allowed) {
      throw new ModelCallError(ModelErrorKind.RATE_LIMITED, usage.warning ?? 'Daily LLM limit exceeded', {
        status: 429,
      });
    }
    return modelCall(prompt, options);
  };
}
