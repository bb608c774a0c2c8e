/**
 * Exchange adapter error types.
 */

export type ExchangeErrorCode =
  /** Transport-level failure (network, timeout, exhausted instant retries) */
  | "REQUEST_FAILED"
  /** Exchange reported throttling */
  | "RATE_LIMITED"
  /** Exchange-reported application error, classify its text before recovering */
  | "REMOTE_ERROR"
  /** Precondition violation, never retried */
  | "NOT_SUPPORTED"
  /** Order request failed local validation */
  | "INVALID_ORDER"
  /** Response payload could not be read */
  | "INVALID_RESPONSE";

export class ExchangeError extends Error {
  public override readonly name = "ExchangeError";

  constructor(
    message: string,
    public readonly code: ExchangeErrorCode,
    public readonly exchange: string,
    public override readonly cause?: unknown,
  ) {
    super(message, { cause });
  }
}

const REMOTE_ERROR_CODES: ReadonlySet<ExchangeErrorCode> = new Set([
  "REQUEST_FAILED",
  "RATE_LIMITED",
  "REMOTE_ERROR",
]);

/** Errors raised by the remote side (as opposed to local precondition or payload errors). */
export const isRemoteExchangeError = (error: unknown): error is ExchangeError =>
  error instanceof ExchangeError && REMOTE_ERROR_CODES.has(error.code);
