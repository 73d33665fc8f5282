import type { RequestBody } from './types';

const encoder = new TextEncoder();

export function absentBody(): RequestBody {
  return { kind: 'absent' };
}

export function bufferedBody(content: Uint8Array | ArrayBuffer | string): RequestBody {
  if (typeof content === 'string') {
    return { kind: 'buffered', bytes: encoder.encode(content) };
  }
  if (content instanceof ArrayBuffer) {
    return { kind: 'buffered', bytes: new Uint8Array(content.slice(0)) };
  }
  return { kind: 'buffered', bytes: content };
}

export function jsonBody(value: unknown): RequestBody {
  return bufferedBody(JSON.stringify(value));
}

export function streamingBody(stream: ReadableStream<Uint8Array>): RequestBody {
  return { kind: 'streaming', stream };
}

export function isReplayable(body: RequestBody): boolean {
  return body.kind !== 'streaming';
}

/**
 * Duplicates a body for another send. Streaming bodies cannot be duplicated and yield
 * `undefined`.
 */
export function copyBody(body: RequestBody): RequestBody | undefined {
  switch (body.kind) {
    case 'absent':
      return body;
    case 'buffered':
      return { kind: 'buffered', bytes: body.bytes.slice() };
    case 'streaming':
      return undefined;
  }
}

export function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const copy = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(copy).set(bytes);
  return copy;
}
