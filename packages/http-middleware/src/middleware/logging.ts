import { describeFailure, errorMessage } from '../errors';
import type { Extensions } from '../extensions';
import type { Next } from '../chain';
import type { HttpRequest } from '../request';
import type { HttpResponse } from '../response';
import type { Logger, Middleware } from '../types';

export interface LoggingMiddlewareOptions {
  logger: Logger;
}

/**
 * Creates a middleware that logs every pass through it. Placed inside a retrying
 * middleware it logs once per attempt; placed outside, once per logical request.
 *
 * @example
 * ```typescript
 * const client = new ClientBuilder(fetchTransport)
 *   .with(createLoggingMiddleware({ logger: consoleLogger }))
 *   .build();
 * ```
 */
export function createLoggingMiddleware(opts: LoggingMiddlewareOptions): Middleware {
  const { logger } = opts;

  return {
    handle: async (request: HttpRequest, extensions: Extensions, next: Next): Promise<HttpResponse> => {
      const meta = { method: request.method, url: request.url.toString() };
      const startedAt = Date.now();
      logger.debug('http.request.start', meta);
      try {
        const response = await next.run(request, extensions);
        logger.info('http.request.success', {
          ...meta,
          status: response.status,
          durationMs: Date.now() - startedAt,
        });
        return response;
      } catch (error) {
        logger.error('http.request.failed', {
          ...meta,
          errorKind: describeFailure(error).kind,
          error: errorMessage(error),
          durationMs: Date.now() - startedAt,
        });
        throw error;
      }
    },
  };
}
