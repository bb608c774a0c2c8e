/**
 * Coinbase adapter implementation.
 *
 * Wraps a {@link CoinbaseTransport} with instant retries on fake rate-limit
 * errors and normalizes every payload before it reaches the trading engine.
 */

import * as v from "valibot";

import { type Logger, createLogger } from "@/lib/logger";
import { isTimeFrame } from "@/lib/time-frames";
import { type ErrorSignatureTable, classifyError } from "../error-classifier";
import { ExchangeError } from "../errors";
import {
  type CallOptions,
  type CreateOrderRequest,
  type ExchangeAdapter,
  type OrderSide,
  type OrderStatus,
  type OrderType,
  type RequestParams,
  type TraderOrderType,
  createOrderRequestSchema,
} from "../types";
import { COINBASE_ERROR_SIGNATURES } from "./error-signatures";
import { type InstantRetryConfig, executeWithInstantRetry, resolveMaxAttempts } from "./instant-retry";
import {
  normalizeBalances,
  normalizeCandles,
  normalizeOrder,
  normalizeOrders,
  normalizeTicker,
  normalizeTickers,
  normalizeTrades,
} from "./normalizers";
import { getOhlcvWindow } from "./pagination";
import { CoinbaseMarketFlagsSchema, CoinbaseUserResponseSchema } from "./schemas";
import type { CoinbaseTransport, TransportOrderRequest } from "./transport";

/** Returned by `getAccountId` when Coinbase does not tell who the user is. */
export const DEFAULT_ACCOUNT_ID = "DEFAULT_ACCOUNT_ID";

export const DEFAULT_RECENT_TRADES_LIMIT = 50;

export interface CoinbaseAdapterConfig {
  transport: CoinbaseTransport;
  /** Defaults to "coinbase" */
  exchange?: string;
  logger?: Logger;
  /** Instant retry attempts per call, including the first one */
  maxAttempts?: number;
  retrySignature?: string;
  errorSignatures?: ErrorSignatureTable;
  /** Cancels every pending and later call, see {@link CallOptions} for a single one */
  signal?: AbortSignal;
}

interface OrderRoute {
  type: OrderType;
  side: OrderSide;
  /** Side taken from the request when it sets one */
  sideOverridable: boolean;
}

const ORDER_ROUTES: Record<TraderOrderType, OrderRoute> = {
  buy_market: { type: "market", side: "buy", sideOverridable: false },
  buy_limit: { type: "limit", side: "buy", sideOverridable: false },
  sell_market: { type: "market", side: "sell", sideOverridable: false },
  sell_limit: { type: "limit", side: "sell", sideOverridable: false },
  stop_loss: { type: "stop_loss", side: "sell", sideOverridable: true },
  stop_loss_limit: { type: "stop_loss_limit", side: "sell", sideOverridable: true },
  take_profit: { type: "take_profit", side: "sell", sideOverridable: true },
  take_profit_limit: { type: "take_profit_limit", side: "sell", sideOverridable: true },
};

const TRIGGERED_ORDER_TYPES: ReadonlySet<OrderType> = new Set([
  "stop_loss",
  "stop_loss_limit",
  "take_profit",
  "take_profit_limit",
]);

const mergeSignals = (
  adapterSignal: AbortSignal | undefined,
  callSignal: AbortSignal | undefined,
): AbortSignal | undefined => {
  if (adapterSignal && callSignal) {
    return AbortSignal.any([adapterSignal, callSignal]);
  }
  return adapterSignal ?? callSignal;
};

/**
 * Create a Coinbase adapter.
 *
 * @param config - Transport and retry settings
 * @returns ExchangeAdapter implementation for Coinbase
 */
export const createCoinbaseAdapter = (config: CoinbaseAdapterConfig): ExchangeAdapter => {
  const {
    transport,
    exchange = "coinbase",
    logger = createLogger({ bindings: { exchange } }),
    retrySignature,
    errorSignatures = COINBASE_ERROR_SIGNATURES,
    signal,
  } = config;

  const retryConfig: InstantRetryConfig = {
    exchange,
    maxAttempts: resolveMaxAttempts(config.maxAttempts),
    retrySignature,
    logger,
  };

  const withRetry = <T>(
    operation: string,
    args: readonly unknown[],
    fn: () => Promise<T>,
    options: CallOptions = {},
  ) =>
    executeWithInstantRetry(operation, args, fn, {
      ...retryConfig,
      signal: mergeSignals(signal, options.signal),
    });

  const invalidOrder = (message: string, cause?: unknown): ExchangeError =>
    new ExchangeError(message, "INVALID_ORDER", exchange, cause);

  const readMarketFlag = (
    symbol: string,
    orderType: TraderOrderType,
    flag: "limit_only" | "cancel_only",
  ): boolean | undefined => {
    const result = v.safeParse(CoinbaseMarketFlagsSchema, transport.marketInfo(symbol));
    const value = result.success ? result.output[flag] : undefined;
    if (value === undefined) {
      logger.error(`Missing ${flag} flag in ${symbol} market info`, undefined, {
        exchange,
        symbol,
        orderType,
      });
    }
    return value;
  };

  return {
    exchange,

    loadMarkets: async (reload = false, options) => {
      await withRetry("loadMarkets", [reload], () => transport.loadMarkets(reload), options);
    },

    isMarketOpenForOrderType: (symbol, orderType) => {
      const { type } = ORDER_ROUTES[orderType];
      if (type === "market") {
        return readMarketFlag(symbol, orderType, "limit_only") !== true;
      }
      if (type === "limit") {
        return readMarketFlag(symbol, orderType, "cancel_only") !== true;
      }
      return true;
    },

    getAccountId: async (options) => {
      try {
        const response = await withRetry("getAccountId", [], () => transport.fetchUser(), options);
        const result = v.safeParse(CoinbaseUserResponseSchema, response);
        if (result.success) {
          return result.output.data.id;
        }
        logger.error("Unexpected user payload, using default account id", undefined, {
          exchange,
          issues: result.issues.map((issue) => issue.message),
        });
      } catch (error) {
        if (!(error instanceof ExchangeError)) {
          throw error;
        }
        logger.error("Failed to fetch account id, using default account id", error, { exchange });
      }
      return DEFAULT_ACCOUNT_ID;
    },

    getBalance: async (params = {}, options) => {
      // v3 returns free and total amounts, the default only returns free ones
      const balanceParams = "v3" in params ? params : { ...params, v3: true };
      const raw = await withRetry(
        "getBalance",
        [balanceParams],
        () => transport.fetchBalance(balanceParams),
        options,
      );
      return normalizeBalances(raw);
    },

    getSymbolPrices: async (symbol, timeFrame, limit, params = {}, options) => {
      if (!isTimeFrame(timeFrame)) {
        throw new ExchangeError(
          `Unsupported time frame: ${String(timeFrame)}`,
          "NOT_SUPPORTED",
          exchange,
        );
      }
      const { since, ...rest } = params;
      const window = getOhlcvWindow({
        timeFrame,
        limit,
        since: typeof since === "number" ? since : null,
        now: () => transport.milliseconds(),
      });
      const raw = await withRetry(
        "getSymbolPrices",
        [symbol, timeFrame, limit, params],
        () => transport.fetchOHLCV(symbol, timeFrame, window.since, window.limit, rest),
        options,
      );
      return normalizeCandles(raw);
    },

    getRecentTrades: async (symbol, limit = DEFAULT_RECENT_TRADES_LIMIT, params = {}, options) => {
      const raw = await withRetry(
        "getRecentTrades",
        [symbol, limit, params],
        () => transport.fetchTrades(symbol, limit, params),
        options,
      );
      return normalizeTrades(raw);
    },

    getPriceTicker: async (symbol, params = {}, options) => {
      const raw = await withRetry(
        "getPriceTicker",
        [symbol, params],
        () => transport.fetchTicker(symbol, params),
        options,
      );
      return normalizeTicker(raw, symbol);
    },

    getAllCurrenciesPriceTicker: async (params = {}, options) => {
      const raw = await withRetry(
        "getAllCurrenciesPriceTicker",
        [params],
        () => transport.fetchTickers(params),
        options,
      );
      return normalizeTickers(raw);
    },

    createOrder: async (request: CreateOrderRequest, options?: CallOptions) => {
      const result = v.safeParse(createOrderRequestSchema, request);
      if (!result.success) {
        throw invalidOrder(
          `Invalid order request: ${result.issues.map((issue) => issue.message).join(", ")}`,
          new v.ValiError(result.issues),
        );
      }
      const { type, symbol, quantity, price, stopPrice, side, currentPrice, reduceOnly, params } =
        result.output;

      // the transport converts market buy quantities to quote cost using the price
      if (type === "buy_market" && !currentPrice) {
        throw new ExchangeError(
          `currentPrice is required for ${type} orders`,
          "NOT_SUPPORTED",
          exchange,
        );
      }

      const route = ORDER_ROUTES[type];
      if (route.type === "limit" && price === undefined) {
        throw invalidOrder(`price is required for ${type} orders`);
      }
      if (TRIGGERED_ORDER_TYPES.has(route.type) && stopPrice === undefined) {
        throw invalidOrder(`stopPrice is required for ${type} orders`);
      }

      const orderParams: RequestParams = {
        ...params,
        ...(stopPrice !== undefined && { stopPrice }),
        ...(reduceOnly && { reduceOnly: true }),
      };
      const orderRequest: TransportOrderRequest = {
        symbol,
        type: route.type,
        side: route.sideOverridable ? (side ?? route.side) : route.side,
        amount: quantity,
        price: type === "buy_market" ? currentPrice : price,
        params: orderParams,
      };

      const raw = await withRetry(
        "createOrder",
        [orderRequest],
        () => transport.createOrder(orderRequest),
        options,
      );
      return normalizeOrder(raw);
    },

    cancelOrder: async (orderId, symbol, orderType, params = {}, options): Promise<OrderStatus> => {
      const raw = await withRetry(
        "cancelOrder",
        [orderId, symbol, orderType, params],
        () => transport.cancelOrder(orderId, symbol, params),
        options,
      );
      const { status } = normalizeOrder(raw);
      return status === "open" || status === "unknown" ? "pending_cancel" : status;
    },

    getOpenOrders: async (symbol, since, limit, params = {}, options) => {
      const raw = await withRetry(
        "getOpenOrders",
        [symbol, since, limit, params],
        () => transport.fetchOpenOrders(symbol, since, limit, params),
        options,
      );
      return normalizeOrders(raw);
    },

    getOrder: async (orderId, symbol, params = {}, options) => {
      const raw = await withRetry(
        "getOrder",
        [orderId, symbol, params],
        () => transport.fetchOrder(orderId, symbol, params),
        options,
      );
      return normalizeOrder(raw);
    },

    classifyError: (error) => classifyError(error, errorSignatures),
  };
};
