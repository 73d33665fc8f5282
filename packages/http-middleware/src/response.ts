import { ChainError } from './errors';
import type { RawHttpResponse } from './types';

const decoder = new TextDecoder();

/**
 * Fully buffered HTTP response. The body is read once by the terminal step, so every
 * accessor can be called any number of times.
 */
export class HttpResponse {
  readonly status: number;
  readonly headers: Headers;
  readonly url: string;
  private readonly body: Uint8Array;

  constructor(init: { status: number; headers?: HeadersInit; body?: Uint8Array | ArrayBuffer | string; url?: string }) {
    this.status = init.status;
    this.headers = new Headers(init.headers);
    this.url = init.url ?? '';
    this.body = toBytes(init.body);
  }

  static fromRaw(raw: RawHttpResponse, requestUrl: string): HttpResponse {
    return new HttpResponse({
      status: raw.status,
      headers: raw.headers,
      body: raw.body,
      url: raw.url ?? requestUrl,
    });
  }

  get ok(): boolean {
    return this.status >= 200 && this.status < 300;
  }

  bytes(): Uint8Array {
    return this.body;
  }

  text(): string {
    return decoder.decode(this.body);
  }

  json<T = unknown>(): T {
    return JSON.parse(this.text()) as T;
  }

  /**
   * Size of the buffered body. This is not the `Content-Length` header; read
   * {@link headers} for that.
   */
  contentLength(): number {
    return this.body.byteLength;
  }

  /**
   * Turns a 4xx/5xx response into a `middleware` error carrying the status, so retry
   * classifiers can still see the condition.
   */
  errorForStatus(): HttpResponse {
    if (this.status >= 400 && this.status < 600) {
      throw ChainError.middleware(`Response error: ${this.status}`, { status: this.status });
    }
    return this;
  }
}

function toBytes(body: Uint8Array | ArrayBuffer | string | undefined): Uint8Array {
  if (body === undefined) return new Uint8Array(0);
  if (typeof body === 'string') return new TextEncoder().encode(body);
  if (body instanceof ArrayBuffer) return new Uint8Array(body);
  return body;
}
