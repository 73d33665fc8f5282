import { afterEach, describe, expect, it, vi } from 'vitest';
import { toArrayBuffer } from '../body';
import { createAxiosTransport } from '../transport/axiosTransport';
import type { AxiosInstanceLike } from '../transport/axiosTransport';
import { fetchTransport } from '../transport/fetchTransport';
import type { TransportRequest } from '../types';

const encoder = new TextEncoder();

describe('fetchTransport', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('sends the request and buffers the response', async () => {
    const fetchMock = vi.fn(async (_input: string, _init?: RequestInit) =>
      new Response('created', { status: 201, headers: { 'x-request-id': 'req-1' } }),
    );
    vi.stubGlobal('fetch', fetchMock);
    const signal = new AbortController().signal;
    const req: TransportRequest = {
      method: 'POST',
      url: 'https://api.example.com/items',
      headers: new Headers({ 'content-type': 'text/plain' }),
      body: toArrayBuffer(encoder.encode('widget')),
    };

    const raw = await fetchTransport(req, signal);

    expect(raw.status).toBe(201);
    expect(new Headers(raw.headers).get('x-request-id')).toBe('req-1');
    expect(new TextDecoder().decode(raw.body)).toBe('created');
    expect(raw.url).toBe('https://api.example.com/items');
    expect(fetchMock).toHaveBeenCalledWith('https://api.example.com/items', {
      method: 'POST',
      headers: req.headers,
      body: req.body,
      signal,
    });
  });

  it('switches to half-duplex for streaming uploads', async () => {
    const fetchMock = vi.fn(async (_input: string, _init?: RequestInit & { duplex?: string }) =>
      new Response(null, { status: 204 }),
    );
    vi.stubGlobal('fetch', fetchMock);
    const stream = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(encoder.encode('chunk'));
        controller.close();
      },
    });

    await fetchTransport(
      { method: 'PUT', url: 'https://api.example.com/upload', headers: new Headers(), body: stream },
      new AbortController().signal,
    );

    expect(fetchMock.mock.calls[0][1]?.duplex).toBe('half');
  });
});

describe('createAxiosTransport', () => {
  const createInstance = (response: Awaited<ReturnType<AxiosInstanceLike['request']>>) => {
    const request = vi.fn<AxiosInstanceLike['request']>(async () => response);
    return { instance: { request }, request };
  };

  it('accepts every status and normalizes headers', async () => {
    const { instance, request } = createInstance({
      status: 503,
      headers: { 'retry-after': 5, 'set-cookie': ['a=1', 'b=2'], 'x-empty': null },
      data: Buffer.from('unavailable'),
    });
    const transport = createAxiosTransport(instance);
    const signal = new AbortController().signal;

    const raw = await transport(
      {
        method: 'GET',
        url: 'https://api.example.com/items',
        headers: new Headers({ Accept: 'application/json' }),
      },
      signal,
    );

    expect(raw.status).toBe(503);
    expect(raw.headers).toEqual({ 'retry-after': '5', 'set-cookie': 'a=1, b=2' });
    expect(new TextDecoder().decode(raw.body)).toBe('unavailable');

    const config = request.mock.calls[0][0];
    expect(config).toMatchObject({
      url: 'https://api.example.com/items',
      method: 'GET',
      headers: { accept: 'application/json' },
      responseType: 'arraybuffer',
      signal,
    });
    expect(config.validateStatus?.(500)).toBe(true);
  });

  it('substitutes an empty body for non-binary data', async () => {
    const { instance } = createInstance({ status: 204, headers: {}, data: '' });

    const raw = await createAxiosTransport(instance)(
      { method: 'DELETE', url: 'https://api.example.com/items/1', headers: new Headers() },
      new AbortController().signal,
    );

    expect(raw.body.byteLength).toBe(0);
  });
});
