import { setTimeout as sleep } from 'timers/promises';
import {
  ChainError,
  describeFailure,
  errorMessage,
  extensionKey,
  logAt,
  noopLogger,
} from '@pipewright/http-middleware';
import type {
  Extensions,
  HttpRequest,
  HttpResponse,
  Logger,
  LogLevel,
  Middleware,
  Next,
} from '@pipewright/http-middleware';
import { ExponentialBackoff } from './backoff';
import type { RandomSource, RetryPolicy } from './backoff';
import { classifyOutcome, defaultClassifier } from './classifier';
import type { RetryClassifier, RetryOutcome } from './classifier';
import { MAX_TIMER_DELAY_MS, RetryConfigError } from './config';
import type { RetryPolicyOptions } from './config';
import { BodyReplayBuffer } from './replayBuffer';

/**
 * Zero-based index of the attempt currently in flight for the logical request. Written by
 * {@link RetryMiddleware} before every attempt, so inner middleware read 0 on the first
 * attempt. After the request completes it holds the index of the last attempt made, one
 * less than the number of attempts.
 */
export const retryAttemptKey = extensionKey<number>('retryAttempt');

interface RetryMiddlewareBaseOptions {
  classifier?: RetryClassifier;
  logger?: Logger;
  /** Level for retry events. Default: 'warn'. */
  logLevel?: LogLevel;
}

type BackoffOptions = RetryPolicyOptions & {
  policy?: undefined;
  /** Random source for jitter, for reproducible delays in tests. */
  random?: RandomSource;
};

type CustomPolicyOptions = { [K in Exclude<keyof BackoffOptions, 'policy'>]?: undefined } & {
  policy: RetryPolicy;
};

/**
 * Either backoff options for the built-in {@link ExponentialBackoff}, or a custom `policy`.
 * The two cannot be combined.
 */
export type RetryMiddlewareOptions = RetryMiddlewareBaseOptions & (BackoffOptions | CustomPolicyOptions);

const BACKOFF_OPTION_NAMES = ['maxRetries', 'baseDelayMs', 'maxDelayMs', 'jitter', 'maxElapsedMs', 'random'] as const;

function resolvePolicy(options: RetryMiddlewareOptions): RetryPolicy {
  if (options.policy === undefined) {
    const { maxRetries, baseDelayMs, maxDelayMs, jitter, maxElapsedMs, random } = options;
    return new ExponentialBackoff({ maxRetries, baseDelayMs, maxDelayMs, jitter, maxElapsedMs }, random);
  }

  const combined = BACKOFF_OPTION_NAMES.filter((name) => options[name] !== undefined);
  if (combined.length > 0) {
    throw new RetryConfigError(combined.map((name) => `${name}: cannot be combined with a custom policy`));
  }
  return options.policy;
}

/**
 * Retries the inner chain while the classifier calls the outcome transient and the policy
 * allows another attempt.
 *
 * Requests with a streaming body are rejected with a `replay_unsupported` error before any
 * attempt is made. Buffered bodies are captured on entry and resent identically.
 *
 * The middleware knows nothing about HTTP method semantics. Attach it to non-idempotent
 * requests only when at-least-once delivery is acceptable, or pair it with
 * `createIdempotencyMiddleware` registered outside it.
 *
 * @example
 * ```typescript
 * const client = new ClientBuilder(fetchTransport)
 *   .with(new RetryMiddleware({ maxRetries: 3, baseDelayMs: 200, jitter: 'full' }))
 *   .build();
 * ```
 */
export class RetryMiddleware implements Middleware {
  private readonly policy: RetryPolicy;
  private readonly classifier: RetryClassifier;
  private readonly logger: Logger;
  private readonly logLevel: LogLevel;

  constructor(options: RetryMiddlewareOptions = {}) {
    this.policy = resolvePolicy(options);
    this.classifier = options.classifier ?? defaultClassifier;
    this.logger = options.logger ?? noopLogger;
    this.logLevel = options.logLevel ?? 'warn';
  }

  async handle(request: HttpRequest, extensions: Extensions, next: Next): Promise<HttpResponse> {
    const buffer = BodyReplayBuffer.capture(request.body);
    if (!buffer.canReplay()) {
      throw ChainError.replayUnsupported(
        'Request body is streaming and cannot be retried; buffer it or remove the retry middleware for this request',
      );
    }

    // Snapshot before attempt 0 so inner middleware mutations do not leak into retries.
    const template = request.withBody(buffer.replay());
    const startedAt = Date.now();
    let attemptIndex = 0;
    let current = request;

    for (;;) {
      extensions.set(retryAttemptKey, attemptIndex);
      const outcome = await this.attempt(current, extensions, next);
      const retryability = classifyOutcome(outcome, this.classifier);

      if (retryability === 'retryable') {
        const decision = this.policy.shouldRetry({
          attemptIndex,
          elapsedMs: Date.now() - startedAt,
          lastOutcome: retryability,
        });

        if (decision.type === 'retry') {
          logAt(this.logger, this.logLevel, 'http.retry.scheduled', {
            method: request.method,
            url: request.url.toString(),
            attempt: attemptIndex,
            delayMs: decision.delayMs,
            reason: describeOutcome(outcome),
          });
          await this.backoff(decision.delayMs, next.signal);
          attemptIndex += 1;
          current = template.withBody(buffer.replay());
          continue;
        }

        if (attemptIndex > 0) {
          logAt(this.logger, this.logLevel, 'http.retry.exhausted', {
            method: request.method,
            url: request.url.toString(),
            attempt: attemptIndex,
            retries: attemptIndex,
            reason: describeOutcome(outcome),
          });
        }
      }

      if (outcome.type === 'error') {
        throw outcome.error;
      }
      return outcome.response;
    }
  }

  private async attempt(request: HttpRequest, extensions: Extensions, next: Next): Promise<RetryOutcome> {
    try {
      const response = await next.clone().run(request, extensions);
      return { type: 'response', response };
    } catch (error) {
      return { type: 'error', error };
    }
  }

  private async backoff(delayMs: number, signal: AbortSignal): Promise<void> {
    if (signal.aborted) {
      throw ChainError.canceled('Request was canceled before retry', signal.reason);
    }
    // Node timers cap out at MAX_TIMER_DELAY_MS, so longer waits are slept in chunks.
    for (let remaining = delayMs; remaining > 0; remaining -= MAX_TIMER_DELAY_MS) {
      try {
        await sleep(Math.min(remaining, MAX_TIMER_DELAY_MS), undefined, { signal });
      } catch (error) {
        if (signal.aborted) {
          throw ChainError.canceled('Request was canceled during retry backoff', signal.reason);
        }
        throw error;
      }
    }
  }
}

function describeOutcome(outcome: RetryOutcome): string {
  if (outcome.type === 'response') {
    return `status ${outcome.response.status}`;
  }
  return `${describeFailure(outcome.error).kind}: ${errorMessage(outcome.error)}`;
}
