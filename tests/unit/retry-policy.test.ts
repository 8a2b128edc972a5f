import { DEFAULT_RETRY, RetryPolicy } from '../../src/core/engine/RetryPolicy';
import { AttemptFailureType } from '../../src/types/enums';

describe('RetryPolicy', () => {
  const timeout = { type: AttemptFailureType.TIMEOUT, message: 'Navigation timed out after 30000ms' };

  it('should default to three attempts and a 5s base delay', () => {
    const policy = new RetryPolicy();
    expect(policy.maxAttempts).toBe(DEFAULT_RETRY.maxAttempts);
    expect(policy.baseDelayMs).toBe(5000);
  });

  it('should double the delay after each failed attempt', () => {
    const policy = new RetryPolicy();
    expect([1, 2, 3].map((attempt) => policy.delayFor(attempt))).toEqual([5000, 10000, 20000]);
  });

  it('should retry until the attempt budget is used', () => {
    const policy = new RetryPolicy({ maxAttempts: 3, baseDelayMs: 100 });

    expect(policy.decide(1, timeout)).toEqual({ action: 'retry', delayMs: 100 });
    expect(policy.decide(2, timeout)).toEqual({ action: 'retry', delayMs: 200 });
    expect(policy.decide(3, timeout)).toEqual({ action: 'fail' });
  });

  it('should retry after a browser disconnect', () => {
    const policy = new RetryPolicy();
    const decision = policy.decide(1, { type: AttemptFailureType.BROWSER_DISCONNECTED, message: 'gone' });
    expect(decision).toEqual({ action: 'retry', delayMs: 5000 });
  });

  it('should never retry cancelled or unavailable attempts', () => {
    const policy = new RetryPolicy();
    expect(policy.decide(1, { type: AttemptFailureType.CANCELLED, message: 'Scan cancelled' })).toEqual({
      action: 'fail',
    });
    expect(policy.decide(1, { type: AttemptFailureType.BROWSER_UNAVAILABLE, message: 'halted' })).toEqual({
      action: 'fail',
    });
  });

  it('should fail immediately with a single attempt', () => {
    expect(new RetryPolicy({ maxAttempts: 1 }).decide(1, timeout)).toEqual({ action: 'fail' });
  });

  it('should reject invalid settings', () => {
    expect(() => new RetryPolicy({ maxAttempts: 0 })).toThrow('maxAttempts must be a positive integer');
    expect(() => new RetryPolicy({ baseDelayMs: -1 })).toThrow('baseDelayMs cannot be negative');
  });
});
