/**
 * Exchange adapter exports.
 */

export type {
  BalanceEntry,
  Balances,
  CallOptions,
  Candle,
  CanonicalOrder,
  CanonicalTrade,
  CreateOrderRequest,
  ExchangeAdapter,
  Fee,
  OrderSide,
  OrderStatus,
  OrderType,
  RequestParams,
  TakerOrMaker,
  Ticker,
  TraderOrderType,
} from "./types";

export {
  ORDER_SIDES,
  ORDER_STATUSES,
  ORDER_TYPES,
  TRADER_ORDER_TYPES,
  canonicalOrderSchema,
  canonicalTradeSchema,
  createOrderRequestSchema,
  isCanonicalOrder,
  isCanonicalTrade,
  isOrderSide,
  isOrderStatus,
  isOrderType,
  orderSideSchema,
  orderStatusSchema,
  orderTypeSchema,
  traderOrderTypeSchema,
} from "./types";

export { ExchangeError, isRemoteExchangeError } from "./errors";
export type { ExchangeErrorCode } from "./errors";

export { ERROR_CATEGORIES, classifyError, classifyErrorText } from "./error-classifier";
export type {
  ClassifiedCategory,
  ErrorCategory,
  ErrorSignature,
  ErrorSignatureEntry,
  ErrorSignatureTable,
} from "./error-classifier";

// Factory function
export { createExchangeAdapter } from "./factory";
export type { ExchangeAdapterOptions } from "./factory";

// Config validation
export {
  AdapterConfigSchema,
  adapterConfigFromEnv,
  isAdapterConfig,
  parseAdapterConfig,
} from "./config";
export type { AdapterConfig } from "./config";

// Coinbase
export * from "./coinbase";
