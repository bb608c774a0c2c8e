/**
 * Coinbase exchange adapter
 *
 * Normalizes Coinbase's quirks (fake rate-limit errors, free-text error
 * messages, incomplete orders and trades, capped candle history) behind the
 * exchange-agnostic adapter interface.
 */

export * from "./adapters";
export { createLogger, logger } from "./lib/logger";
export type { Logger, LoggerConfig, LogLevel } from "./lib/logger";
export { EnvError } from "./lib/env";
export { TIME_FRAMES, getTimeFrameMs, isTimeFrame } from "./lib/time-frames";
export type { TimeFrame } from "./lib/time-frames";
export { getQuoteAsset, parseSymbol } from "./lib/symbols";
export type { ParsedSymbol } from "./lib/symbols";
