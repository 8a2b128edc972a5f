import { RetryConfig } from '../../types/config';
import { AttemptFailureType } from '../../types/enums';
import { AttemptFailure } from '../../types/events';

export const DEFAULT_RETRY: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 5000,
};

/**
 * What to do after a failed attempt
 */
export type RetryDecision =
  | { action: 'retry'; delayMs: number }
  | { action: 'fail' };

/**
 * Attempt budget and exponential backoff for one URL.
 *
 * Attempts are numbered from 1. After failed attempt n the wait is
 * baseDelay * 2^(n-1): 5s, 10s, 20s with the defaults.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;

  constructor(config: Partial<RetryConfig> = {}) {
    const merged = { ...DEFAULT_RETRY, ...config };
    if (!Number.isInteger(merged.maxAttempts) || merged.maxAttempts < 1) {
      throw new Error(`maxAttempts must be a positive integer, got ${merged.maxAttempts}`);
    }
    if (merged.baseDelayMs < 0) {
      throw new Error(`baseDelayMs cannot be negative, got ${merged.baseDelayMs}`);
    }
    this.maxAttempts = merged.maxAttempts;
    this.baseDelayMs = merged.baseDelayMs;
  }

  /**
   * Backoff after failed attempt `attempt`
   */
  delayFor(attempt: number): number {
    return this.baseDelayMs * 2 ** (attempt - 1);
  }

  decide(attempt: number, failure: AttemptFailure): RetryDecision {
    if (failure.type === AttemptFailureType.CANCELLED || failure.type === AttemptFailureType.BROWSER_UNAVAILABLE) {
      return { action: 'fail' };
    }
    if (attempt >= this.maxAttempts) {
      return { action: 'fail' };
    }
    return { action: 'retry', delayMs: this.delayFor(attempt) };
  }
}
