export * from './classifier';
export * from './config';
export * from './backoff';
export { BodyReplayBuffer } from './replayBuffer';
export { RetryMiddleware, retryAttemptKey } from './RetryMiddleware';
export type { RetryMiddlewareOptions } from './RetryMiddleware';
export { createRetryingClient } from './factories';
export type { RetryingClientConfig } from './factories';
