import type { Extensions } from './extensions';
import type { HttpRequest } from './request';
import type { HttpResponse } from './response';
import type { Next } from './chain';

export type HttpMethod = 'GET' | 'HEAD' | 'OPTIONS' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type HttpHeaders = Record<string, string>;

export type QueryParams = Record<string, string | number | boolean | undefined>;

export type LoggerMeta = Record<string, unknown> & {
  method?: HttpMethod;
  url?: string;
  attempt?: number;
};

export interface Logger {
  debug(message: string, meta?: LoggerMeta): void;
  info(message: string, meta?: LoggerMeta): void;
  warn(message: string, meta?: LoggerMeta): void;
  error(message: string, meta?: LoggerMeta): void;
}

export type LogLevel = keyof Logger;

/**
 * Request body as seen by the chain.
 *
 * - `absent`: no body.
 * - `buffered`: fully materialized bytes; can be resent any number of times.
 * - `streaming`: single-consumption stream; cannot be replayed.
 */
export type RequestBody =
  | { kind: 'absent' }
  | { kind: 'buffered'; bytes: Uint8Array }
  | { kind: 'streaming'; stream: ReadableStream<Uint8Array> };

/**
 * Transport layer request structure.
 */
export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: Headers;
  body?: ArrayBuffer | ReadableStream<Uint8Array>;
}

/**
 * Transport layer raw HTTP response.
 */
export interface RawHttpResponse {
  status: number;
  headers: HeadersInit;
  body: ArrayBuffer | Uint8Array;
  url?: string;
}

/**
 * HTTP transport abstraction.
 * Takes a transport request and abort signal, returns a raw HTTP response.
 * Failures are opaque; the chain maps them onto `ChainError` kinds.
 */
export interface HttpTransport {
  (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse>;
}

/**
 * A unit of request/response interception.
 *
 * Middleware run in **registration order** on the way out and in reverse order on the way
 * back. Each invocation must either call `next.run` exactly once and return what it
 * returns (possibly after inspecting it), or short-circuit by resolving with a response
 * or rejecting with an error without calling `next` at all.
 *
 * @see ClientBuilder.with - Where to register middleware
 */
export interface Middleware {
  handle(request: HttpRequest, extensions: Extensions, next: Next): Promise<HttpResponse>;
}

export type MiddlewareFn = Middleware['handle'];

export interface ExecuteOptions {
  /** Bag for this logical request; a fresh one is created when omitted. */
  extensions?: Extensions;
  /** Cancels the logical request at any suspension point. */
  signal?: AbortSignal;
}
