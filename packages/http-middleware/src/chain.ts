import { toArrayBuffer } from './body';
import { ChainError, errorMessage } from './errors';
import { Extensions } from './extensions';
import { noopLogger } from './logger';
import type { HttpRequest } from './request';
import { HttpResponse } from './response';
import type {
  ExecuteOptions,
  HttpTransport,
  Logger,
  Middleware,
  MiddlewareFn,
  TransportRequest,
} from './types';

const CONNECT_ERROR_CODES = new Set(['ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN', 'ECONNRESET', 'EHOSTUNREACH']);
const TIMEOUT_ERROR_CODES = new Set(['ETIMEDOUT', 'UND_ERR_CONNECT_TIMEOUT', 'UND_ERR_HEADERS_TIMEOUT']);

export function toMiddleware(middleware: Middleware | MiddlewareFn): Middleware {
  return typeof middleware === 'function' ? { handle: middleware } : middleware;
}

/**
 * State shared by one middleware invocation and every continuation cloned from the `Next`
 * it was given.
 */
interface InvocationScope {
  settled: boolean;
  inFlight: boolean;
}

interface ChainRuntime {
  readonly middleware: readonly Middleware[];
  readonly transport: HttpTransport;
  readonly logger: Logger;
}

/**
 * Single-use continuation over the rest of the chain.
 *
 * `run` may be called once. Middleware that needs several passes through the inner chain
 * (retrying middleware, for instance) takes a fresh continuation per pass with `clone()`.
 * Passes are strictly sequential, and none may start after the owning middleware returned.
 */
export class Next {
  private consumed = false;

  constructor(
    private readonly runtime: ChainRuntime,
    private readonly index: number,
    private readonly scope: InvocationScope,
    readonly signal: AbortSignal,
  ) {}

  clone(): Next {
    return new Next(this.runtime, this.index, this.scope, this.signal);
  }

  async run(request: HttpRequest, extensions: Extensions): Promise<HttpResponse> {
    if (this.consumed) {
      throw ChainError.contractViolation(
        'next_called_twice',
        'next.run() was called more than once; use next.clone() for every additional pass',
      );
    }
    if (this.scope.settled) {
      throw ChainError.contractViolation(
        'next_after_return',
        'next.run() was called after the middleware had already returned',
      );
    }
    if (this.scope.inFlight) {
      throw ChainError.contractViolation(
        'concurrent_next',
        'next.run() was called while another pass through the inner chain was still running',
      );
    }

    this.consumed = true;
    this.scope.inFlight = true;
    try {
      return await dispatch(this.runtime, this.index, request, extensions, this.signal);
    } finally {
      this.scope.inFlight = false;
    }
  }
}

async function dispatch(
  runtime: ChainRuntime,
  index: number,
  request: HttpRequest,
  extensions: Extensions,
  signal: AbortSignal,
): Promise<HttpResponse> {
  if (signal.aborted) {
    throw ChainError.canceled(undefined, signal.reason);
  }

  const middleware = runtime.middleware[index];
  if (!middleware) {
    return sendToTransport(runtime, request, signal);
  }

  const scope: InvocationScope = { settled: false, inFlight: false };
  const next = new Next(runtime, index + 1, scope, signal);
  try {
    const response: unknown = await middleware.handle(request, extensions, next);
    if (!(response instanceof HttpResponse)) {
      throw ChainError.contractViolation(
        'no_response',
        `Middleware #${index} resolved without a response; it must return next.run(...) or its own response`,
      );
    }
    return response;
  } finally {
    scope.settled = true;
  }
}

async function sendToTransport(
  runtime: ChainRuntime,
  request: HttpRequest,
  signal: AbortSignal,
): Promise<HttpResponse> {
  const controller = new AbortController();
  const onAbort = () => controller.abort(signal.reason);
  signal.addEventListener('abort', onAbort, { once: true });

  let didTimeout = false;
  const timeoutHandle =
    request.timeoutMs !== undefined
      ? setTimeout(() => {
          didTimeout = true;
          controller.abort();
        }, request.timeoutMs)
      : undefined;

  const url = request.url.toString();
  const transportRequest: TransportRequest = {
    method: request.method,
    url,
    headers: new Headers(request.headers),
  };
  if (request.body.kind === 'buffered') {
    transportRequest.body = toArrayBuffer(request.body.bytes);
  } else if (request.body.kind === 'streaming') {
    transportRequest.body = request.body.stream;
  }

  runtime.logger.debug('http.transport.send', { method: request.method, url });
  try {
    const raw = await runtime.transport(transportRequest, controller.signal);
    return HttpResponse.fromRaw(raw, url);
  } catch (error) {
    const mapped = mapTransportFailure(error, { canceled: signal.aborted, timedOut: didTimeout, timeoutMs: request.timeoutMs });
    runtime.logger.debug('http.transport.failed', {
      method: request.method,
      url,
      errorKind: mapped.kind,
      error: errorMessage(error),
    });
    throw mapped;
  } finally {
    if (timeoutHandle !== undefined) clearTimeout(timeoutHandle);
    signal.removeEventListener('abort', onAbort);
  }
}

function readErrorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('code' in error && typeof error.code === 'string') return error.code;
  if ('cause' in error) return readErrorCode(error.cause);
  return undefined;
}

/**
 * Converts whatever the transport threw into the chain's error taxonomy.
 */
export function mapTransportFailure(
  error: unknown,
  state: { canceled: boolean; timedOut: boolean; timeoutMs?: number },
): ChainError {
  if (error instanceof ChainError) {
    return error;
  }
  if (state.canceled) {
    return ChainError.canceled(undefined, error);
  }
  if (state.timedOut) {
    return ChainError.transport('timeout', `Request timed out after ${state.timeoutMs}ms`, error);
  }

  const code = readErrorCode(error);
  if (code && CONNECT_ERROR_CODES.has(code)) {
    return ChainError.transport('connect', `Connection failed: ${errorMessage(error)}`, error);
  }
  if (code && TIMEOUT_ERROR_CODES.has(code)) {
    return ChainError.transport('timeout', `Transport timed out: ${errorMessage(error)}`, error);
  }
  return ChainError.transport('network', `Network error: ${errorMessage(error)}`, error);
}

/**
 * Immutable, reentrant pipeline of middleware closed by a transport.
 *
 * Middleware registered first is outermost: it sees the request before all others and the
 * response after all others.
 */
export class MiddlewareChain {
  private readonly runtime: ChainRuntime;

  constructor(middleware: ReadonlyArray<Middleware | MiddlewareFn>, transport: HttpTransport, logger: Logger = noopLogger) {
    this.runtime = {
      middleware: Object.freeze(middleware.map(toMiddleware)),
      transport,
      logger,
    };
  }

  get length(): number {
    return this.runtime.middleware.length;
  }

  execute(request: HttpRequest, options: ExecuteOptions = {}): Promise<HttpResponse> {
    const extensions = options.extensions ?? new Extensions();
    const signal = options.signal ?? new AbortController().signal;
    return dispatch(this.runtime, 0, request, extensions, signal);
  }
}
