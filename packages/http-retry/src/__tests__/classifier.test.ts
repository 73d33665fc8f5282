import { ChainError, HttpResponse } from '@pipewright/http-middleware';
import { describe, expect, it, vi } from 'vitest';
import { classifyOutcome, defaultClassifier, isRetryableStatus } from '../classifier';
import type { RetryClassifier } from '../classifier';

const response = (status: number) => ({ type: 'response' as const, response: new HttpResponse({ status }) });
const failure = (error: unknown) => ({ type: 'error' as const, error });

describe('isRetryableStatus', () => {
  it('accepts 429 and the 5xx range', () => {
    expect([429, 500, 502, 503, 599].every(isRetryableStatus)).toBe(true);
  });

  it('rejects success, redirect and other client statuses', () => {
    expect([200, 204, 301, 400, 404, 408, 600].some(isRetryableStatus)).toBe(false);
  });
});

describe('defaultClassifier', () => {
  it('classifies responses by status', () => {
    expect(defaultClassifier(response(503))).toBe('retryable');
    expect(defaultClassifier(response(429))).toBe('retryable');
    expect(defaultClassifier(response(404))).toBe('permanent');
    expect(defaultClassifier(response(200))).toBe('permanent');
  });

  it('retries every transport failure', () => {
    expect(defaultClassifier(failure(ChainError.transport('connect', 'refused')))).toBe('retryable');
    expect(defaultClassifier(failure(ChainError.transport('timeout', 'slow')))).toBe('retryable');
    expect(defaultClassifier(failure(ChainError.transport('network', 'reset')))).toBe('retryable');
  });

  it('retries middleware errors that carry a retryable status or a transient flag', () => {
    expect(defaultClassifier(failure(ChainError.middleware('busy', { status: 503 })))).toBe('retryable');
    expect(defaultClassifier(failure(ChainError.middleware('flaky', { transient: true })))).toBe('retryable');
    expect(defaultClassifier(failure(ChainError.middleware('bad', { status: 400 })))).toBe('permanent');
    expect(defaultClassifier(failure(ChainError.middleware('plain')))).toBe('permanent');
  });

  it('treats foreign errors as permanent', () => {
    expect(defaultClassifier(failure(new Error('bug')))).toBe('permanent');
  });
});

describe('classifyOutcome', () => {
  it('never lets a classifier retry fatal errors', () => {
    const everything: RetryClassifier = vi.fn(() => 'retryable' as const);

    expect(classifyOutcome(failure(ChainError.canceled()), everything)).toBe('permanent');
    expect(classifyOutcome(failure(ChainError.replayUnsupported()), everything)).toBe('permanent');
    expect(
      classifyOutcome(failure(ChainError.contractViolation('next_called_twice', 'twice')), everything),
    ).toBe('permanent');
    expect(everything).not.toHaveBeenCalled();
  });

  it('defers to the classifier otherwise', () => {
    const everything: RetryClassifier = () => 'retryable';

    expect(classifyOutcome(response(404), everything)).toBe('retryable');
    expect(classifyOutcome(failure(new Error('x')), everything)).toBe('retryable');
  });
});
