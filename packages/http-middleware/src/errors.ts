export type TransportFailureReason = 'connect' | 'timeout' | 'network';

export type ContractViolationKind =
  | 'next_called_twice'
  | 'next_after_return'
  | 'concurrent_next'
  | 'no_response';

/**
 * Closed taxonomy of chain failures.
 *
 * - `transport`: network/connect/timeout failure surfaced by the transport
 * - `middleware`: error returned by a middleware's own logic, optionally carrying the
 *   HTTP status it stands for or a transient flag
 * - `contract_violation`: a middleware used `next` incorrectly (programmer error)
 * - `replay_unsupported`: a request with a streaming body reached a retrying middleware
 * - `canceled`: the caller aborted the logical request
 */
export type ChainErrorDetail =
  | { kind: 'transport'; reason: TransportFailureReason }
  | { kind: 'middleware'; status?: number; transient?: boolean }
  | { kind: 'contract_violation'; violation: ContractViolationKind }
  | { kind: 'replay_unsupported' }
  | { kind: 'canceled' };

export type ChainErrorKind = ChainErrorDetail['kind'];

type DetailOf<K extends ChainErrorKind> = Extract<ChainErrorDetail, { kind: K }>;

export class ChainError<D extends ChainErrorDetail = ChainErrorDetail> extends Error {
  readonly detail: D;

  constructor(message: string, detail: D, options?: { cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ChainError';
    this.detail = detail;
  }

  get kind(): D['kind'] {
    return this.detail.kind;
  }

  static transport(
    reason: TransportFailureReason,
    message: string,
    cause?: unknown,
  ): ChainError<DetailOf<'transport'>> {
    return new ChainError(message, { kind: 'transport', reason }, { cause });
  }

  static middleware(
    message: string,
    options: { status?: number; transient?: boolean; cause?: unknown } = {},
  ): ChainError<DetailOf<'middleware'>> {
    const detail: DetailOf<'middleware'> = { kind: 'middleware' };
    if (options.status !== undefined) detail.status = options.status;
    if (options.transient !== undefined) detail.transient = options.transient;
    return new ChainError(message, detail, { cause: options.cause });
  }

  static contractViolation(
    violation: ContractViolationKind,
    message: string,
  ): ChainError<DetailOf<'contract_violation'>> {
    return new ChainError(message, { kind: 'contract_violation', violation });
  }

  static replayUnsupported(
    message = 'Request body is streaming and cannot be replayed',
  ): ChainError<DetailOf<'replay_unsupported'>> {
    return new ChainError(message, { kind: 'replay_unsupported' });
  }

  static canceled(message = 'Request was canceled', cause?: unknown): ChainError<DetailOf<'canceled'>> {
    return new ChainError(message, { kind: 'canceled' }, { cause });
  }
}

export function isChainError(error: unknown): error is ChainError;
export function isChainError<K extends ChainErrorKind>(
  error: unknown,
  kind: K,
): error is ChainError<DetailOf<K>>;
export function isChainError(error: unknown, kind?: ChainErrorKind): boolean {
  if (!(error instanceof ChainError)) return false;
  return kind === undefined || error.detail.kind === kind;
}

/**
 * Maps any thrown value onto the taxonomy. Values that are not `ChainError`s come from
 * middleware business logic.
 */
export function describeFailure(error: unknown): ChainErrorDetail {
  if (error instanceof ChainError) {
    return error.detail;
  }
  return { kind: 'middleware' };
}

/**
 * Errors that end a logical request immediately, regardless of any retry policy.
 */
export function isFatal(error: unknown): boolean {
  const { kind } = describeFailure(error);
  return kind === 'contract_violation' || kind === 'replay_unsupported' || kind === 'canceled';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
