import { ClientBuilder, consoleLogger, fetchTransport } from '@pipewright/http-middleware';
import type {
  ClientWithMiddleware,
  HttpTransport,
  Logger,
  Middleware,
  MiddlewareFn,
} from '@pipewright/http-middleware';
import { RetryMiddleware } from './RetryMiddleware';
import type { RetryMiddlewareOptions } from './RetryMiddleware';

export interface RetryingClientConfig {
  /** Default: fetchTransport. */
  transport?: HttpTransport;
  /** Registered outside the retry middleware, in order. */
  middleware?: Array<Middleware | MiddlewareFn>;
  retry?: RetryMiddlewareOptions;
  /** Default: console logger. */
  logger?: Logger;
}

/**
 * Creates a client with sensible defaults:
 * - Transport: fetch-based (via fetchTransport)
 * - Retry: 3 retries, 250ms base delay, 60s cap, full jitter, default classifier
 * - Logger: console logger, shared by the chain and the retry middleware
 *
 * The retry middleware is registered last, so every middleware passed in runs once per
 * logical request rather than once per attempt.
 *
 * @example
 * ```typescript
 * const client = createRetryingClient({ retry: { maxRetries: 5 } });
 * const res = await client.get('https://api.example.com/health').send();
 * ```
 */
export function createRetryingClient(config: RetryingClientConfig = {}): ClientWithMiddleware {
  const logger = config.logger ?? consoleLogger;
  const builder = new ClientBuilder(config.transport ?? fetchTransport).logger(logger);

  for (const middleware of config.middleware ?? []) {
    builder.with(middleware);
  }
  builder.with(new RetryMiddleware({ logger, ...config.retry }));

  return builder.build();
}
