/**
 * Candle time frames served by Coinbase and their durations.
 */

import * as v from "valibot";

export const TIME_FRAMES = ["1m", "5m", "15m", "30m", "1h", "2h", "6h", "1d"] as const;

export type TimeFrame = (typeof TIME_FRAMES)[number];

export const TIME_FRAME_MINUTES: Record<TimeFrame, number> = {
  "1m": 1,
  "5m": 5,
  "15m": 15,
  "30m": 30,
  "1h": 60,
  "2h": 120,
  "6h": 360,
  "1d": 1440,
};

export const timeFrameSchema = v.picklist(TIME_FRAMES);

export const isTimeFrame = (value: unknown): value is TimeFrame => v.is(timeFrameSchema, value);

const MS_PER_MINUTE = 60_000;

/** Length of one candle in milliseconds. */
export const getTimeFrameMs = (timeFrame: TimeFrame): number =>
  TIME_FRAME_MINUTES[timeFrame] * MS_PER_MINUTE;
