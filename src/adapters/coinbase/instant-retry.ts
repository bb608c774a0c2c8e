/**
 * Instant retries for Coinbase's fake rate-limit errors.
 *
 * Coinbase answers some transient server-side failures with a 429 status that
 * has nothing to do with throttling. Those requests can be replayed right away;
 * real throttling is paced by the transport's own rate limiter.
 */

import type { Logger } from "@/lib/logger";
import { ExchangeError, isRemoteExchangeError } from "../errors";

export const DEFAULT_INSTANT_RETRY_ATTEMPTS = 5;

/** Marker found in the text of fake rate-limit errors. */
export const INSTANT_RETRY_ERROR_CODE = "429";

export interface InstantRetryConfig {
  /** Exchange name used in errors and logs */
  exchange: string;
  /** Total attempts, including the first one (minimum 1) */
  maxAttempts?: number;
  /** Substring of the error text that allows an instant retry */
  retrySignature?: string;
  logger?: Logger;
  /** Aborts the retry loop and any pending attempt */
  signal?: AbortSignal;
}

/**
 * Reject as soon as the signal aborts, even when the wrapped promise never settles.
 */
const raceAbort = <T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> => {
  if (!signal) {
    return promise;
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }
    promise
      .then(resolve, reject)
      .finally(() => signal.removeEventListener("abort", onAbort));
  });
};

const formatArgs = (args: readonly unknown[]): string => {
  try {
    return JSON.stringify(args);
  } catch {
    return `[${args.map(String).join(", ")}]`;
  }
};

const errorKind = (error: ExchangeError): string => `${error.name}:${error.code}`;

export const resolveMaxAttempts = (maxAttempts: number = DEFAULT_INSTANT_RETRY_ATTEMPTS): number => {
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be an integer >= 1, got ${maxAttempts}`);
  }
  return maxAttempts;
};

/**
 * Run `fn`, replaying it immediately while it fails with a remote error whose
 * text carries the retry signature.
 *
 * @param operation - Name used in logs and in the final error
 * @param args - Arguments of the operation, for diagnostics only
 * @throws {ExchangeError} `REQUEST_FAILED` once every attempt failed with the signature;
 *   any other error is rethrown unchanged on the attempt that raised it
 */
export const executeWithInstantRetry = async <T>(
  operation: string,
  args: readonly unknown[],
  fn: () => Promise<T>,
  config: InstantRetryConfig,
): Promise<T> => {
  const { exchange, retrySignature = INSTANT_RETRY_ERROR_CODE, logger, signal } = config;
  const maxAttempts = resolveMaxAttempts(config.maxAttempts);

  let lastError: ExchangeError | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    signal?.throwIfAborted();
    try {
      return await raceAbort(fn(), signal);
    } catch (error) {
      if (signal?.aborted || !isRemoteExchangeError(error)) {
        throw error;
      }
      if (!error.message.includes(retrySignature)) {
        throw error;
      }
      lastError = error;
      logger?.debug(`${retrySignature} error on ${operation} request, retrying now`, {
        exchange,
        operation,
        args: formatArgs(args),
        attempt,
        maxAttempts,
        error: `${error.message} (${errorKind(error)})`,
      });
    }
  }

  const last = lastError ? `${lastError.message} (${errorKind(lastError)})` : "none";
  throw new ExchangeError(
    `Failed ${exchange} request after ${maxAttempts} attempts on ${operation}(args=${formatArgs(args)}) ` +
      `due to ${retrySignature} error code. Last error: ${last}`,
    "REQUEST_FAILED",
    exchange,
    lastError,
  );
};

/**
 * Wrap an async operation with the instant retry policy.
 *
 * @example
 * ```typescript
 * const fetchTicker = withInstantRetry("getPriceTicker", transport.fetchTicker, {
 *   exchange: "coinbase",
 * });
 * await fetchTicker("BTC/USD");
 * ```
 */
export const withInstantRetry = <TArgs extends unknown[], TResult>(
  operation: string,
  fn: (...args: TArgs) => Promise<TResult>,
  config: InstantRetryConfig,
): ((...args: TArgs) => Promise<TResult>) => {
  resolveMaxAttempts(config.maxAttempts);
  return (...args: TArgs) => executeWithInstantRetry(operation, args, () => fn(...args), config);
};
