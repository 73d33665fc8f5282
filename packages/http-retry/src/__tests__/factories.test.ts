import type { HttpTransport, Logger, RawHttpResponse } from '@pipewright/http-middleware';
import { describe, expect, it, vi } from 'vitest';
import { createRetryingClient } from '../factories';

const respond = (status: number): RawHttpResponse => ({ status, headers: {}, body: new ArrayBuffer(0) });

describe('createRetryingClient', () => {
  it('registers the given middleware outside the retry loop', async () => {
    const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const transport = vi
      .fn<HttpTransport>()
      .mockResolvedValueOnce(respond(503))
      .mockResolvedValueOnce(respond(200));
    const order: string[] = [];

    const client = createRetryingClient({
      transport,
      logger,
      retry: { maxRetries: 1, baseDelayMs: 1, jitter: 'none' },
      middleware: [
        (request, extensions, next) => {
          order.push('first');
          return next.run(request, extensions);
        },
        (request, extensions, next) => {
          order.push('second');
          return next.run(request, extensions);
        },
      ],
    });

    const response = await client.get('https://api.example.com/items').send();

    expect(response.status).toBe(200);
    expect(order).toEqual(['first', 'second']);
    expect(transport).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenCalledWith('http.retry.scheduled', {
      method: 'GET',
      url: 'https://api.example.com/items',
      attempt: 0,
      delayMs: 1,
      reason: 'status 503',
    });
    expect(logger.debug).toHaveBeenCalledWith('http.transport.send', {
      method: 'GET',
      url: 'https://api.example.com/items',
    });
  });

  it('lets the retry options override the shared logger', async () => {
    const shared: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const retryOnly: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const transport = vi
      .fn<HttpTransport>()
      .mockResolvedValueOnce(respond(500))
      .mockResolvedValueOnce(respond(204));

    const client = createRetryingClient({
      transport,
      logger: shared,
      retry: { baseDelayMs: 1, jitter: 'none', logger: retryOnly },
    });

    await client.delete('https://api.example.com/items/3').send();

    expect(retryOnly.warn).toHaveBeenCalledTimes(1);
    expect(shared.warn).not.toHaveBeenCalled();
  });
});
