/**
 * Coinbase adapter exports.
 */

export { createCoinbaseAdapter, DEFAULT_ACCOUNT_ID, DEFAULT_RECENT_TRADES_LIMIT } from "./adapter";
export type { CoinbaseAdapterConfig } from "./adapter";
export {
  createCcxtCoinbaseClient,
  createCcxtTransport,
  translateCcxtError,
} from "./ccxt-transport";
export type { CcxtCoinbaseClient, CcxtCoinbaseClientOptions } from "./ccxt-transport";
export { adaptCredentials } from "./credentials";
export type { AdaptedCredentials, CoinbaseCredentials } from "./credentials";
export { COINBASE_ERROR_SIGNATURES, classifyCoinbaseErrorText } from "./error-signatures";
export {
  DEFAULT_INSTANT_RETRY_ATTEMPTS,
  INSTANT_RETRY_ERROR_CODE,
  executeWithInstantRetry,
  withInstantRetry,
} from "./instant-retry";
export type { InstantRetryConfig } from "./instant-retry";
export { MAX_PAGINATION_LIMIT, getOhlcvWindow } from "./pagination";
export type { CoinbaseTransport, TransportOrderRequest } from "./transport";
