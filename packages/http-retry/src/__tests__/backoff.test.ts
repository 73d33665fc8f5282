import { describe, expect, it } from 'vitest';
import { ExponentialBackoff, computeBackoff, nextDelay } from '../backoff';
import type { BackoffParameters } from '../backoff';
import { MAX_TIMER_DELAY_MS, RetryConfigError, parseRetryPolicy } from '../config';

const policy = (overrides: Partial<BackoffParameters> = {}): BackoffParameters => ({
  maxRetries: 5,
  baseDelayMs: 100,
  maxDelayMs: 1_000,
  jitter: 'none',
  ...overrides,
});

describe('computeBackoff', () => {
  it('doubles from the base delay and caps at the maximum', () => {
    const delays = [0, 1, 2, 3, 4, 5].map((attempt) => computeBackoff(attempt, policy()));

    expect(delays).toEqual([100, 200, 400, 800, 1_000, 1_000]);
  });

  it('stays at the cap for very large attempt indices', () => {
    expect(computeBackoff(5_000, policy())).toBe(1_000);
  });

  it('returns zero for a zero base delay', () => {
    expect(computeBackoff(5_000, policy({ baseDelayMs: 0 }))).toBe(0);
  });
});

describe('nextDelay', () => {
  it('is deterministic without jitter', () => {
    expect(nextDelay(2, policy())).toEqual({ type: 'retry', delayMs: 400 });
    expect(nextDelay(2, policy())).toEqual(nextDelay(2, policy()));
  });

  it('never decreases as the attempt index grows', () => {
    const delays: number[] = [];
    for (let attempt = 0; attempt < 5; attempt++) {
      const decision = nextDelay(attempt, policy());
      if (decision.type === 'retry') delays.push(decision.delayMs);
    }

    expect(delays).toHaveLength(5);
    expect([...delays].sort((a, b) => a - b)).toEqual(delays);
  });

  it('stops once the retry budget is spent', () => {
    expect(nextDelay(5, policy())).toEqual({ type: 'stop' });
    expect(nextDelay(0, policy({ maxRetries: 0 }))).toEqual({ type: 'stop' });
  });

  it('scales the whole delay with full jitter', () => {
    expect(nextDelay(2, policy({ jitter: 'full' }), () => 0.5)).toEqual({ type: 'retry', delayMs: 200 });
    expect(nextDelay(2, policy({ jitter: 'full' }), () => 0)).toEqual({ type: 'retry', delayMs: 0 });
  });

  it('keeps bounded jitter between the base delay and the computed delay', () => {
    expect(nextDelay(2, policy({ jitter: 'bounded' }), () => 0)).toEqual({ type: 'retry', delayMs: 100 });
    expect(nextDelay(2, policy({ jitter: 'bounded' }), () => 0.5)).toEqual({ type: 'retry', delayMs: 250 });
  });

  it('does not consult the random source without jitter', () => {
    let calls = 0;
    nextDelay(1, policy(), () => {
      calls++;
      return 0.5;
    });

    expect(calls).toBe(0);
  });
});

describe('ExponentialBackoff', () => {
  it('fills in defaults', () => {
    expect(new ExponentialBackoff().options).toEqual({
      maxRetries: 3,
      baseDelayMs: 250,
      maxDelayMs: 60_000,
      jitter: 'full',
    });
  });

  it('retries retryable attempts within the budget', () => {
    const backoff = new ExponentialBackoff({ maxRetries: 2, baseDelayMs: 50, jitter: 'none' });

    expect(backoff.shouldRetry({ attemptIndex: 0, elapsedMs: 0, lastOutcome: 'retryable' })).toEqual({
      type: 'retry',
      delayMs: 50,
    });
    expect(backoff.shouldRetry({ attemptIndex: 1, elapsedMs: 60, lastOutcome: 'retryable' })).toEqual({
      type: 'retry',
      delayMs: 100,
    });
    expect(backoff.shouldRetry({ attemptIndex: 2, elapsedMs: 200, lastOutcome: 'retryable' })).toEqual({
      type: 'stop',
    });
  });

  it('clamps delays to the remaining elapsed-time budget', () => {
    const backoff = new ExponentialBackoff({ baseDelayMs: 100, jitter: 'none', maxElapsedMs: 250 });

    expect(backoff.shouldRetry({ attemptIndex: 1, elapsedMs: 200, lastOutcome: 'retryable' })).toEqual({
      type: 'retry',
      delayMs: 50,
    });
    expect(backoff.shouldRetry({ attemptIndex: 1, elapsedMs: 250, lastOutcome: 'retryable' })).toEqual({
      type: 'stop',
    });
  });

  it('applies the injected random source', () => {
    const backoff = new ExponentialBackoff({ baseDelayMs: 100, jitter: 'full' }, () => 0.25);

    expect(backoff.nextDelay(1)).toEqual({ type: 'retry', delayMs: 50 });
  });
});

describe('parseRetryPolicy', () => {
  it('rejects negative retry counts', () => {
    expect(() => parseRetryPolicy({ maxRetries: -1 })).toThrow(RetryConfigError);
  });

  it('rejects fractional retry counts', () => {
    expect(() => parseRetryPolicy({ maxRetries: 1.5 })).toThrow(RetryConfigError);
  });

  it('rejects a cap below the base delay', () => {
    let thrown: unknown;
    try {
      parseRetryPolicy({ baseDelayMs: 500, maxDelayMs: 100 });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(RetryConfigError);
    expect(thrown).toMatchObject({
      issues: ['maxDelayMs: maxDelayMs must be greater than or equal to baseDelayMs'],
      message: 'Invalid retry policy: maxDelayMs: maxDelayMs must be greater than or equal to baseDelayMs',
    });
  });

  it('rejects durations beyond the timer limit', () => {
    let thrown: unknown;
    try {
      parseRetryPolicy({ maxDelayMs: 3_000_000_000 });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(RetryConfigError);
    expect(thrown).toMatchObject({ issues: ['maxDelayMs: Number must be less than or equal to 2147483647'] });
    expect(() => parseRetryPolicy({ maxElapsedMs: 2_147_483_648 })).toThrow(RetryConfigError);
    expect(parseRetryPolicy({ maxDelayMs: MAX_TIMER_DELAY_MS }).maxDelayMs).toBe(MAX_TIMER_DELAY_MS);
  });

  it('keeps explicit values', () => {
    expect(parseRetryPolicy({ maxRetries: 0, baseDelayMs: 0, maxDelayMs: 0, jitter: 'bounded' })).toEqual({
      maxRetries: 0,
      baseDelayMs: 0,
      maxDelayMs: 0,
      jitter: 'bounded',
    });
  });
});
