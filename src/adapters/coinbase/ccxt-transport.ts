/**
 * Coinbase transport backed by ccxt.
 *
 * ccxt handles signing, request pacing (`enableRateLimit`) and field naming;
 * this module only translates its errors into {@link ExchangeError}s.
 */

import { BaseError, NetworkError, NotSupported, RateLimitExceeded, coinbase } from "ccxt";

import { ExchangeError, type ExchangeErrorCode } from "../errors";
import type { OrderType, RequestParams } from "../types";
import { type CoinbaseCredentials, adaptCredentials } from "./credentials";
import type { CoinbaseTransport, TransportOrderRequest } from "./transport";

/** The subset of `ccxt.coinbase` the transport calls. */
export interface CcxtCoinbaseClient {
  loadMarkets(reload?: boolean): Promise<unknown>;
  milliseconds(): number;
  market(symbol: string): { info: unknown };
  v2PrivateGetUser(params?: RequestParams): Promise<unknown>;
  fetchOHLCV(
    symbol: string,
    timeframe?: string,
    since?: number,
    limit?: number,
    params?: RequestParams,
  ): Promise<unknown>;
  fetchTrades(
    symbol: string,
    since?: number,
    limit?: number,
    params?: RequestParams,
  ): Promise<unknown>;
  fetchTicker(symbol: string, params?: RequestParams): Promise<unknown>;
  fetchTickers(symbols?: string[], params?: RequestParams): Promise<unknown>;
  fetchBalance(params?: RequestParams): Promise<unknown>;
  createOrder(
    symbol: string,
    type: string,
    side: string,
    amount: number,
    price?: number,
    params?: RequestParams,
  ): Promise<unknown>;
  cancelOrder(id: string, symbol?: string, params?: RequestParams): Promise<unknown>;
  fetchOpenOrders(
    symbol?: string,
    since?: number,
    limit?: number,
    params?: RequestParams,
  ): Promise<unknown>;
  fetchOrder(id: string, symbol?: string, params?: RequestParams): Promise<unknown>;
}

const errorCodeFor = (error: BaseError): ExchangeErrorCode => {
  if (error instanceof RateLimitExceeded) {
    return "RATE_LIMITED";
  }
  if (error instanceof NetworkError) {
    return "REQUEST_FAILED";
  }
  if (error instanceof NotSupported) {
    return "NOT_SUPPORTED";
  }
  return "REMOTE_ERROR";
};

/**
 * Translate ccxt errors, keeping their message verbatim so status markers and
 * error signatures still match. Other errors are returned unchanged.
 */
export const translateCcxtError = (error: unknown, exchange: string): unknown => {
  if (error instanceof ExchangeError || !(error instanceof BaseError)) {
    return error;
  }
  return new ExchangeError(error.message, errorCodeFor(error), exchange, error);
};

/** Coinbase only takes stop-limit orders: stops are sent as limit orders with a trigger. */
const CCXT_ORDER_TYPES: Record<OrderType, string> = {
  market: "market",
  limit: "limit",
  stop_loss: "limit",
  stop_loss_limit: "limit",
  take_profit: "limit",
  take_profit_limit: "limit",
};

export const createCcxtTransport = (
  client: CcxtCoinbaseClient,
  exchange = "coinbase",
): CoinbaseTransport => {
  const call = async <T>(fn: () => Promise<T>): Promise<T> => {
    try {
      return await fn();
    } catch (error) {
      throw translateCcxtError(error, exchange);
    }
  };

  return {
    loadMarkets: async (reload) => {
      await call(() => client.loadMarkets(reload));
    },

    milliseconds: () => client.milliseconds(),

    marketInfo: (symbol) => {
      try {
        return client.market(symbol).info;
      } catch (error) {
        if (error instanceof BaseError) {
          return null;
        }
        throw error;
      }
    },

    fetchUser: () => call(() => client.v2PrivateGetUser()),

    fetchOHLCV: (symbol, timeFrame, since, limit, params) =>
      call(() => client.fetchOHLCV(symbol, timeFrame, since, limit, params)),

    fetchTrades: (symbol, limit, params) =>
      call(() => client.fetchTrades(symbol, undefined, limit, params)),

    fetchTicker: (symbol, params) => call(() => client.fetchTicker(symbol, params)),

    fetchTickers: (params) => call(() => client.fetchTickers(undefined, params)),

    fetchBalance: (params) => call(() => client.fetchBalance(params)),

    createOrder: ({ symbol, type, side, amount, price, params }: TransportOrderRequest) => {
      const stopPrice = params.stopPrice;
      const limitPrice =
        price ?? (type !== "market" && typeof stopPrice === "number" ? stopPrice : undefined);
      return call(() =>
        client.createOrder(symbol, CCXT_ORDER_TYPES[type], side, amount, limitPrice, params),
      );
    },

    cancelOrder: (orderId, symbol, params) =>
      call(() => client.cancelOrder(orderId, symbol, params)),

    fetchOpenOrders: (symbol, since, limit, params) =>
      call(() => client.fetchOpenOrders(symbol, since, limit, params)),

    fetchOrder: (orderId, symbol, params) => call(() => client.fetchOrder(orderId, symbol, params)),
  };
};

export interface CcxtCoinbaseClientOptions {
  /** Pace requests with ccxt's built-in limiter */
  enableRateLimit?: boolean;
  timeoutMs?: number;
}

/**
 * Build a `ccxt.coinbase` client from raw credentials.
 */
export const createCcxtCoinbaseClient = (
  credentials: CoinbaseCredentials,
  options: CcxtCoinbaseClientOptions = {},
): CcxtCoinbaseClient => {
  const { apiKey, secret, password, uid, token, authPrefix } = adaptCredentials(credentials);
  return new coinbase({
    apiKey,
    secret,
    password,
    uid,
    ...(token !== null && authPrefix !== null
      ? { headers: { Authorization: `${authPrefix}${token}` } }
      : {}),
    enableRateLimit: options.enableRateLimit ?? true,
    ...(options.timeoutMs !== undefined && { timeout: options.timeoutMs }),
    options: {
      // market buys are sent with the current price so ccxt can compute their cost
      createMarketBuyOrderRequiresPrice: true,
    },
  });
};
