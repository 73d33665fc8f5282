import { parseRetryPolicy } from './config';
import type { Jitter, ResolvedRetryPolicy, RetryPolicyOptions } from './config';
import type { Retryability } from './classifier';

/** Uniform sample in [0, 1). */
export type RandomSource = () => number;

export type RetryDecision = { type: 'retry'; delayMs: number } | { type: 'stop' };

/**
 * State of one logical request's retry loop, handed to the policy after every retryable
 * attempt. `attemptIndex` is the zero-based index of the attempt that just finished.
 */
export interface AttemptRecord {
  attemptIndex: number;
  elapsedMs: number;
  lastOutcome: Retryability;
}

export interface RetryPolicy {
  shouldRetry(record: AttemptRecord): RetryDecision;
}

export interface BackoffParameters {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitter: Jitter;
}

const STOP: RetryDecision = { type: 'stop' };

/**
 * `min(maxDelayMs, baseDelayMs * 2^attemptIndex)`, before jitter.
 */
export function computeBackoff(attemptIndex: number, policy: Pick<BackoffParameters, 'baseDelayMs' | 'maxDelayMs'>): number {
  // 0 * 2^n overflows to NaN once 2^n is Infinity
  if (policy.baseDelayMs === 0) return 0;
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** attemptIndex);
}

/**
 * Pure backoff decision. Given the same inputs and the same random source it always returns
 * the same decision; `random` is only consulted when jitter is enabled.
 */
export function nextDelay(
  attemptIndex: number,
  policy: BackoffParameters,
  random: RandomSource = Math.random,
): RetryDecision {
  if (attemptIndex >= policy.maxRetries) {
    return STOP;
  }

  const computed = computeBackoff(attemptIndex, policy);
  switch (policy.jitter) {
    case 'none':
      return { type: 'retry', delayMs: computed };
    case 'full':
      return { type: 'retry', delayMs: random() * computed };
    case 'bounded': {
      const floor = Math.min(policy.baseDelayMs, computed);
      return { type: 'retry', delayMs: floor + random() * (computed - floor) };
    }
  }
}

/**
 * Exponential backoff with optional jitter and an optional overall time budget.
 *
 * @example
 * ```typescript
 * const policy = new ExponentialBackoff({ maxRetries: 3, baseDelayMs: 100, jitter: 'none' });
 * policy.nextDelay(0); // { type: 'retry', delayMs: 100 }
 * policy.nextDelay(3); // { type: 'stop' }
 * ```
 */
export class ExponentialBackoff implements RetryPolicy {
  readonly options: ResolvedRetryPolicy;

  constructor(
    options: RetryPolicyOptions = {},
    private readonly random: RandomSource = Math.random,
  ) {
    this.options = parseRetryPolicy(options);
  }

  nextDelay(attemptIndex: number): RetryDecision {
    return nextDelay(attemptIndex, this.options, this.random);
  }

  shouldRetry(record: AttemptRecord): RetryDecision {
    const { maxElapsedMs } = this.options;
    if (maxElapsedMs !== undefined && record.elapsedMs >= maxElapsedMs) {
      return STOP;
    }

    const decision = this.nextDelay(record.attemptIndex);
    if (decision.type === 'retry' && maxElapsedMs !== undefined) {
      return { type: 'retry', delayMs: Math.min(decision.delayMs, maxElapsedMs - record.elapsedMs) };
    }
    return decision;
  }
}
