import { extensionKey } from '../extensions';
import type { Middleware } from '../types';

/**
 * Idempotency key for the logical request. Set it with
 * `builder.withExtension(idempotencyKey, '...')`.
 */
export const idempotencyKey = extensionKey<string>('idempotencyKey');

export interface IdempotencyMiddlewareOptions {
  headerName?: string; // default: "Idempotency-Key"
}

/**
 * Creates a middleware that copies the {@link idempotencyKey} extension into a request
 * header. A header already set on the request wins.
 *
 * Registered outside a retrying middleware, every attempt carries the same key, which lets
 * the server deduplicate non-idempotent requests that get resent.
 */
export function createIdempotencyMiddleware(opts?: IdempotencyMiddlewareOptions): Middleware {
  const headerName = opts?.headerName ?? 'Idempotency-Key';

  return {
    handle: (request, extensions, next) => {
      const key = extensions.get(idempotencyKey);
      if (key !== undefined && !request.headers.has(headerName)) {
        request.headers.set(headerName, key);
      }
      return next.run(request, extensions);
    },
  };
}
