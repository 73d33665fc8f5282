import type { HttpHeaders, HttpTransport, RawHttpResponse, TransportRequest } from '../types';

export interface AxiosInstanceLike {
  request(config: {
    url?: string;
    method?: string;
    headers?: Record<string, string>;
    data?: unknown;
    signal?: AbortSignal;
    responseType?: 'arraybuffer';
    validateStatus?: (status: number) => boolean;
  }): Promise<{
    status: number;
    headers: Record<string, unknown>;
    data: unknown;
  }>;
}

/**
 * axios-based HTTP transport.
 * Wraps an axios instance and converts its responses to RawHttpResponse. Every status is
 * accepted so that retry classification sees 4xx/5xx responses instead of axios errors.
 */
export const createAxiosTransport = (axiosInstance: AxiosInstanceLike): HttpTransport => {
  return async (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse> => {
    const requestHeaders: HttpHeaders = {};
    req.headers.forEach((value, key) => {
      requestHeaders[key] = value;
    });

    const response = await axiosInstance.request({
      url: req.url,
      method: req.method,
      headers: requestHeaders,
      data: req.body,
      signal,
      responseType: 'arraybuffer',
      validateStatus: () => true,
    });

    // Normalize headers to plain object
    const headers: HttpHeaders = {};
    for (const [key, value] of Object.entries(response.headers ?? {})) {
      if (value === undefined || value === null) continue;
      headers[key] = Array.isArray(value) ? value.join(', ') : String(value);
    }

    return {
      status: response.status,
      headers,
      // Node's axios adapter hands back a Buffer for 'arraybuffer'
      body: response.data instanceof ArrayBuffer || response.data instanceof Uint8Array ? response.data : new ArrayBuffer(0),
    };
  };
};
