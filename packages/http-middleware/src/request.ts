import { absentBody, copyBody } from './body';
import type { HttpMethod, RequestBody } from './types';

export interface HttpRequestInit {
  method: HttpMethod;
  url: string | URL;
  headers?: HeadersInit;
  body?: RequestBody;
  /** Per-attempt timeout applied by the terminal transport step. */
  timeoutMs?: number;
}

/**
 * Outbound request handed through the chain. Ownership passes to each middleware for the
 * duration of its invocation; middleware may mutate it before calling `next`.
 */
export class HttpRequest {
  method: HttpMethod;
  url: URL;
  headers: Headers;
  body: RequestBody;
  timeoutMs?: number;

  constructor(init: HttpRequestInit) {
    this.method = init.method;
    this.url = new URL(init.url);
    this.headers = new Headers(init.headers);
    this.body = init.body ?? absentBody();
    this.timeoutMs = init.timeoutMs;
  }

  /**
   * Returns an independent copy, or `undefined` when the body is streaming and therefore
   * cannot be duplicated.
   */
  tryClone(): HttpRequest | undefined {
    const body = copyBody(this.body);
    if (!body) return undefined;
    return this.withBody(body);
  }

  withBody(body: RequestBody): HttpRequest {
    return new HttpRequest({
      method: this.method,
      url: this.url,
      headers: this.headers,
      body,
      timeoutMs: this.timeoutMs,
    });
  }
}
