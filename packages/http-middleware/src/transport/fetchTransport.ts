import type { HttpTransport, RawHttpResponse, TransportRequest } from '../types';

/**
 * fetch-based HTTP transport.
 * Uses the global fetch API and reads the whole body before resolving.
 */
export const fetchTransport: HttpTransport = async (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse> => {
  // Streaming uploads need half-duplex mode under undici.
  const init: RequestInit & { duplex?: 'half' } = {
    method: req.method,
    headers: req.headers,
    body: req.body,
    signal,
  };
  if (req.body instanceof ReadableStream) {
    init.duplex = 'half';
  }

  const response = await fetch(req.url, init);
  const body = await response.arrayBuffer();

  return {
    status: response.status,
    headers: response.headers,
    body,
    url: response.url || req.url,
  };
};
