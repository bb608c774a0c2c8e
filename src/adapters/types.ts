/**
 * Canonical exchange records and the engine-facing adapter interface.
 *
 * Every adapter hands the trading engine these shapes, whatever the exchange
 * actually returned.
 */

import * as v from "valibot";

import type { TimeFrame } from "@/lib/time-frames";
import type { ErrorCategory } from "./error-classifier";

// Enums
export const ORDER_SIDES = ["buy", "sell"] as const;

export type OrderSide = (typeof ORDER_SIDES)[number];

export const ORDER_TYPES = [
  "market",
  "limit",
  "stop_loss",
  "stop_loss_limit",
  "take_profit",
  "take_profit_limit",
] as const;

export type OrderType = (typeof ORDER_TYPES)[number];

export const ORDER_STATUSES = [
  "open",
  "closed",
  "canceled",
  "expired",
  "rejected",
  "pending_creation",
  "pending_cancel",
  "unknown",
] as const;

export type OrderStatus = (typeof ORDER_STATUSES)[number];

/** Order kinds the engine asks for; side and execution style in one value. */
export const TRADER_ORDER_TYPES = [
  "buy_market",
  "buy_limit",
  "sell_market",
  "sell_limit",
  "stop_loss",
  "stop_loss_limit",
  "take_profit",
  "take_profit_limit",
] as const;

export type TraderOrderType = (typeof TRADER_ORDER_TYPES)[number];

export type TakerOrMaker = "taker" | "maker";

// Domain Types
export interface Fee {
  cost: number | null;
  currency: string | null;
}

export interface CanonicalOrder {
  id: string;
  clientOrderId: string | null;
  symbol: string;
  side: OrderSide | null;
  type: OrderType;
  status: OrderStatus;
  price: number | null;
  stopPrice: number | null;
  amount: number | null;
  filled: number | null;
  remaining: number | null;
  cost: number | null;
  average: number | null;
  timestamp: number | null;
  fees: Fee[];
}

export interface CanonicalTrade {
  id: string;
  orderId: string | null;
  symbol: string;
  side: OrderSide | null;
  type: OrderType | null;
  takerOrMaker: TakerOrMaker | null;
  price: number | null;
  amount: number | null;
  cost: number | null;
  timestamp: number | null;
  fees: Fee[];
  status: "closed";
}

export interface Ticker {
  symbol: string;
  timestamp: number | null;
  high: number | null;
  low: number | null;
  bid: number | null;
  ask: number | null;
  open: number | null;
  close: number | null;
  last: number | null;
  baseVolume: number | null;
  quoteVolume: number | null;
}

export interface BalanceEntry {
  free: number | null;
  used: number | null;
  total: number | null;
}

export type Balances = Record<string, BalanceEntry>;

/** `[timestamp, open, high, low, close, volume]` */
export type Candle = [number, number, number, number, number, number];

// Order Creation Parameters
export interface CreateOrderRequest {
  type: TraderOrderType;
  symbol: string;
  /** Quantity in base asset units */
  quantity: number;
  price?: number;
  stopPrice?: number;
  /** Overrides the side implied by `type` (used by stop and take-profit orders) */
  side?: OrderSide;
  /** Last known market price; mandatory for market buys */
  currentPrice?: number;
  reduceOnly?: boolean;
  params?: Record<string, unknown>;
}

/** Extra exchange-specific request parameters forwarded as is. */
export type RequestParams = Record<string, unknown>;

// Valibot Schemas
export const orderSideSchema = v.picklist(ORDER_SIDES);

export const orderTypeSchema = v.picklist(ORDER_TYPES);

export const orderStatusSchema = v.picklist(ORDER_STATUSES);

export const traderOrderTypeSchema = v.picklist(TRADER_ORDER_TYPES);

const nullableNumber = v.nullable(v.number());

export const feeSchema = v.object({
  cost: nullableNumber,
  currency: v.nullable(v.string()),
});

export const canonicalOrderSchema = v.object({
  id: v.string(),
  clientOrderId: v.nullable(v.string()),
  symbol: v.string(),
  side: v.nullable(orderSideSchema),
  type: orderTypeSchema,
  status: orderStatusSchema,
  price: nullableNumber,
  stopPrice: nullableNumber,
  amount: nullableNumber,
  filled: nullableNumber,
  remaining: nullableNumber,
  cost: nullableNumber,
  average: nullableNumber,
  timestamp: nullableNumber,
  fees: v.array(feeSchema),
});

export const canonicalTradeSchema = v.object({
  id: v.string(),
  orderId: v.nullable(v.string()),
  symbol: v.string(),
  side: v.nullable(orderSideSchema),
  type: v.nullable(orderTypeSchema),
  takerOrMaker: v.nullable(v.picklist(["taker", "maker"])),
  price: nullableNumber,
  amount: nullableNumber,
  cost: nullableNumber,
  timestamp: nullableNumber,
  fees: v.array(feeSchema),
  status: v.literal("closed"),
});

export const createOrderRequestSchema = v.object({
  type: traderOrderTypeSchema,
  symbol: v.pipe(v.string(), v.minLength(1)),
  quantity: v.pipe(v.number(), v.gtValue(0)),
  price: v.optional(v.pipe(v.number(), v.gtValue(0))),
  stopPrice: v.optional(v.pipe(v.number(), v.gtValue(0))),
  side: v.optional(orderSideSchema),
  currentPrice: v.optional(v.number()),
  reduceOnly: v.optional(v.boolean()),
  params: v.optional(v.record(v.string(), v.unknown())),
});

// Type Guards (using Valibot)
export const isCanonicalOrder = (value: unknown): value is CanonicalOrder =>
  v.is(canonicalOrderSchema, value);

export const isCanonicalTrade = (value: unknown): value is CanonicalTrade =>
  v.is(canonicalTradeSchema, value);

export const isOrderStatus = (value: unknown): value is OrderStatus =>
  v.is(orderStatusSchema, value);

export const isOrderType = (value: unknown): value is OrderType => v.is(orderTypeSchema, value);

export const isOrderSide = (value: unknown): value is OrderSide => v.is(orderSideSchema, value);

/** Per-call options accepted by every remote adapter operation. */
export interface CallOptions {
  /** Cancels this call and its retry loop, alongside the adapter-wide signal */
  signal?: AbortSignal;
}

// Exchange Adapter Interface
export interface ExchangeAdapter {
  readonly exchange: string;

  // Markets
  loadMarkets(reload?: boolean, options?: CallOptions): Promise<void>;
  isMarketOpenForOrderType(symbol: string, orderType: TraderOrderType): boolean;

  // Account
  getAccountId(options?: CallOptions): Promise<string>;
  getBalance(params?: RequestParams, options?: CallOptions): Promise<Balances>;

  // Market data
  getSymbolPrices(
    symbol: string,
    timeFrame: TimeFrame,
    limit?: number,
    params?: RequestParams,
    options?: CallOptions,
  ): Promise<Candle[]>;
  getRecentTrades(
    symbol: string,
    limit?: number,
    params?: RequestParams,
    options?: CallOptions,
  ): Promise<CanonicalTrade[]>;
  getPriceTicker(symbol: string, params?: RequestParams, options?: CallOptions): Promise<Ticker>;
  getAllCurrenciesPriceTicker(
    params?: RequestParams,
    options?: CallOptions,
  ): Promise<Record<string, Ticker>>;

  // Orders
  createOrder(request: CreateOrderRequest, options?: CallOptions): Promise<CanonicalOrder>;
  cancelOrder(
    orderId: string,
    symbol: string,
    orderType: TraderOrderType,
    params?: RequestParams,
    options?: CallOptions,
  ): Promise<OrderStatus>;
  getOpenOrders(
    symbol?: string,
    since?: number,
    limit?: number,
    params?: RequestParams,
    options?: CallOptions,
  ): Promise<CanonicalOrder[]>;
  getOrder(
    orderId: string,
    symbol?: string,
    params?: RequestParams,
    options?: CallOptions,
  ): Promise<CanonicalOrder>;

  // Errors
  classifyError(error: unknown): ErrorCategory;
}
