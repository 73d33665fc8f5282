export * from './types';
export * from './body';
export * from './errors';
export * from './extensions';
export { HttpRequest } from './request';
export type { HttpRequestInit } from './request';
export { HttpResponse } from './response';
export { MiddlewareChain, Next, mapTransportFailure, toMiddleware } from './chain';
export { ClientBuilder, ClientWithMiddleware, RequestBuilder, extensionInitialiser } from './client';
export type { RequestInitialiser } from './client';
export { ConsoleLogger, consoleLogger, noopLogger, logAt } from './logger';
export * from './transport/fetchTransport';
export * from './transport/axiosTransport';
export * from './middleware/logging';
export * from './middleware/idempotency';
