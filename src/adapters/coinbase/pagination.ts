/**
 * Request windows for Coinbase candle history.
 *
 * Coinbase rejects candle requests spanning more than 300 candles and returns
 * the most recent ones when no start is given, so every request carries an
 * explicit `since` and a capped `limit`.
 */

import { type TimeFrame, getTimeFrameMs } from "@/lib/time-frames";

export const MAX_PAGINATION_LIMIT = 300;

export interface PageWindow {
  since: number;
  limit: number;
}

export interface OhlcvWindowInput {
  timeFrame: TimeFrame;
  limit?: number | null;
  since?: number | null;
  /** Exchange server time in milliseconds */
  now: () => number;
  maxLimit?: number;
}

/**
 * Cap the requested limit and, without an explicit `since`, open the window
 * `limit` candles before the exchange's current time.
 *
 * @example
 * ```typescript
 * getOhlcvWindow({ timeFrame: "1m", now: () => 1_000_000 });
 * // { since: 1_000_000 - 60_000 * 300, limit: 300 }
 * ```
 */
export const getOhlcvWindow = ({
  timeFrame,
  limit,
  since,
  now,
  maxLimit = MAX_PAGINATION_LIMIT,
}: OhlcvWindowInput): PageWindow => {
  const cappedLimit = limit ? Math.min(limit, maxLimit) : maxLimit;
  if (since !== undefined && since !== null) {
    return { since, limit: cappedLimit };
  }
  return {
    since: now() - getTimeFrameMs(timeFrame) * cappedLimit,
    limit: cappedLimit,
  };
};
