import { describeFailure, isFatal } from '@pipewright/http-middleware';
import type { HttpResponse } from '@pipewright/http-middleware';

export type Retryability = 'retryable' | 'permanent';

/**
 * What one attempt produced: a response (any status) or an error.
 */
export type RetryOutcome =
  | { type: 'response'; response: HttpResponse }
  | { type: 'error'; error: unknown };

export type RetryClassifier = (outcome: RetryOutcome) => Retryability;

export const isRetryableStatus = (status: number): boolean =>
  status === 429 || (status >= 500 && status <= 599);

/**
 * Default classification:
 * - transport failures (connect, timeout, network) are retryable
 * - responses with status 429 or 5xx are retryable
 * - middleware errors are retryable when they carry a 429/5xx status or are flagged transient
 * - everything else is permanent, including successful responses
 */
export const defaultClassifier: RetryClassifier = (outcome) => {
  if (outcome.type === 'response') {
    return isRetryableStatus(outcome.response.status) ? 'retryable' : 'permanent';
  }

  const detail = describeFailure(outcome.error);
  switch (detail.kind) {
    case 'transport':
      return 'retryable';
    case 'middleware':
      if (detail.transient) return 'retryable';
      return detail.status !== undefined && isRetryableStatus(detail.status) ? 'retryable' : 'permanent';
    default:
      return 'permanent';
  }
};

/**
 * Applies `classifier`, except that contract violations, replay failures and cancellation
 * are always permanent.
 */
export function classifyOutcome(outcome: RetryOutcome, classifier: RetryClassifier): Retryability {
  if (outcome.type === 'error' && isFatal(outcome.error)) {
    return 'permanent';
  }
  return classifier(outcome);
}
