import { z } from 'zod';

export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_BASE_DELAY_MS = 250;
export const DEFAULT_MAX_DELAY_MS = 60_000;

/** Longest delay a Node timer honours; anything above it fires after 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

const durationMs = () => z.number().finite().min(0).max(MAX_TIMER_DELAY_MS);

export const jitterSchema = z.enum(['none', 'full', 'bounded']);

export type Jitter = z.infer<typeof jitterSchema>;

export const retryPolicySchema = z
  .object({
    maxRetries: z.number().int().min(0).default(DEFAULT_MAX_RETRIES),
    baseDelayMs: durationMs().default(DEFAULT_BASE_DELAY_MS),
    maxDelayMs: durationMs().default(DEFAULT_MAX_DELAY_MS),
    jitter: jitterSchema.default('full'),
    /** Stop retrying once this much time has passed since the first attempt. */
    maxElapsedMs: durationMs().optional(),
  })
  .refine((policy) => policy.maxDelayMs >= policy.baseDelayMs, {
    message: 'maxDelayMs must be greater than or equal to baseDelayMs',
    path: ['maxDelayMs'],
  });

export type RetryPolicyOptions = z.input<typeof retryPolicySchema>;
export type ResolvedRetryPolicy = z.output<typeof retryPolicySchema>;

export class RetryConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid retry policy: ${issues.join('; ')}`);
    this.name = 'RetryConfigError';
    this.issues = issues;
  }
}

export function parseRetryPolicy(options: RetryPolicyOptions = {}): ResolvedRetryPolicy {
  const result = retryPolicySchema.safeParse(options);
  if (!result.success) {
    throw new RetryConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return result.data;
}
