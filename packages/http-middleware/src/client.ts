import { bufferedBody, jsonBody } from './body';
import { MiddlewareChain, toMiddleware } from './chain';
import { Extensions, type ExtensionKey } from './extensions';
import { noopLogger } from './logger';
import { HttpRequest } from './request';
import type { HttpResponse } from './response';
import type {
  ExecuteOptions,
  HttpMethod,
  HttpTransport,
  Logger,
  Middleware,
  MiddlewareFn,
  QueryParams,
  RequestBody,
} from './types';

/**
 * Runs when a request is built, before any middleware. Typically seeds the extension bag
 * with defaults that individual requests may override.
 */
export interface RequestInitialiser {
  init(builder: RequestBuilder): RequestBuilder;
}

export function extensionInitialiser<T>(key: ExtensionKey<T>, value: T): RequestInitialiser {
  return {
    init: (builder) => builder.withExtension(key, value),
  };
}

/**
 * Ordered-registration builder. Registration order is the order middleware sees the
 * outgoing request.
 *
 * @example
 * ```typescript
 * const client = new ClientBuilder(fetchTransport)
 *   .with(createLoggingMiddleware({ logger }))
 *   .with(new RetryMiddleware({ maxRetries: 3 }))
 *   .build();
 *
 * const res = await client.get('https://api.example.com/items').send();
 * ```
 */
export class ClientBuilder {
  private readonly middleware: Middleware[] = [];
  private readonly initialisers: RequestInitialiser[] = [];
  private chainLogger: Logger = noopLogger;

  constructor(private readonly transport: HttpTransport) {}

  with(middleware: Middleware | MiddlewareFn): this {
    this.middleware.push(toMiddleware(middleware));
    return this;
  }

  withInit(initialiser: RequestInitialiser): this {
    this.initialisers.push(initialiser);
    return this;
  }

  logger(logger: Logger): this {
    this.chainLogger = logger;
    return this;
  }

  build(): ClientWithMiddleware {
    return new ClientWithMiddleware(
      new MiddlewareChain([...this.middleware], this.transport, this.chainLogger),
      [...this.initialisers],
    );
  }
}

export class ClientWithMiddleware {
  constructor(
    private readonly chain: MiddlewareChain,
    private readonly initialisers: readonly RequestInitialiser[] = [],
  ) {}

  request(method: HttpMethod, url: string | URL): RequestBuilder {
    let builder = new RequestBuilder(this, method, url);
    for (const initialiser of this.initialisers) {
      builder = initialiser.init(builder);
    }
    return builder;
  }

  get(url: string | URL): RequestBuilder {
    return this.request('GET', url);
  }

  head(url: string | URL): RequestBuilder {
    return this.request('HEAD', url);
  }

  post(url: string | URL): RequestBuilder {
    return this.request('POST', url);
  }

  put(url: string | URL): RequestBuilder {
    return this.request('PUT', url);
  }

  patch(url: string | URL): RequestBuilder {
    return this.request('PATCH', url);
  }

  delete(url: string | URL): RequestBuilder {
    return this.request('DELETE', url);
  }

  /**
   * Runs a prepared request through the chain. Initialisers are not applied here; they
   * only run for requests created through {@link request}.
   */
  execute(request: HttpRequest, options?: ExecuteOptions): Promise<HttpResponse> {
    return this.chain.execute(request, options);
  }
}

export class RequestBuilder {
  private readonly headerEntries = new Headers();
  private readonly url: URL;
  private requestBody?: RequestBody;
  private timeoutMs?: number;
  private abortSignal?: AbortSignal;
  private readonly extensionWrites: Array<(bag: Extensions) => void> = [];

  constructor(
    private readonly client: ClientWithMiddleware,
    private readonly method: HttpMethod,
    url: string | URL,
  ) {
    this.url = new URL(url);
  }

  header(name: string, value: string): this {
    this.headerEntries.append(name, value);
    return this;
  }

  headers(values: Record<string, string>): this {
    for (const [name, value] of Object.entries(values)) {
      this.headerEntries.set(name, value);
    }
    return this;
  }

  query(params: QueryParams): this {
    for (const [key, value] of Object.entries(params)) {
      if (value === undefined) continue;
      this.url.searchParams.set(key, String(value));
    }
    return this;
  }

  body(content: RequestBody | Uint8Array | ArrayBuffer | string): this {
    this.requestBody =
      typeof content === 'string' || content instanceof Uint8Array || content instanceof ArrayBuffer
        ? bufferedBody(content)
        : content;
    return this;
  }

  json(value: unknown): this {
    this.requestBody = jsonBody(value);
    if (!this.headerEntries.has('content-type')) {
      this.headerEntries.set('Content-Type', 'application/json');
    }
    return this;
  }

  timeout(ms: number): this {
    this.timeoutMs = ms;
    return this;
  }

  signal(signal: AbortSignal): this {
    this.abortSignal = signal;
    return this;
  }

  withExtension<T>(key: ExtensionKey<T>, value: T): this {
    this.extensionWrites.push((bag) => bag.set(key, value));
    return this;
  }

  build(): { request: HttpRequest; extensions: Extensions } {
    const request = new HttpRequest({
      method: this.method,
      url: this.url,
      headers: this.headerEntries,
      body: this.requestBody,
      timeoutMs: this.timeoutMs,
    });
    const extensions = new Extensions();
    for (const write of this.extensionWrites) {
      write(extensions);
    }
    return { request, extensions };
  }

  send(): Promise<HttpResponse> {
    const { request, extensions } = this.build();
    return this.client.execute(request, { extensions, signal: this.abortSignal });
  }
}
