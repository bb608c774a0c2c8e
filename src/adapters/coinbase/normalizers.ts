/**
 * Normalizers turning Coinbase transport payloads into canonical records.
 *
 * Payloads arrive with canonical field names but Coinbase-specific values:
 * missing order types (`UNKNOWN_ORDER_TYPE`), native statuses, fees without a
 * currency, trade amounts expressed in quote units. Each repair pass is
 * idempotent and a failing pass leaves the record untouched.
 */

import * as v from "valibot";

import { getQuoteAsset } from "@/lib/symbols";
import { ExchangeError } from "../errors";
import {
  type Balances,
  type BalanceEntry,
  type Candle,
  type CanonicalOrder,
  type CanonicalTrade,
  type Fee,
  type OrderSide,
  type OrderStatus,
  type OrderType,
  type TakerOrMaker,
  type Ticker,
  isOrderSide,
  isOrderStatus,
  isOrderType,
} from "../types";
import {
  type RawRecord,
  isRecord,
  readNumber,
  readRecord,
  readRecordList,
  readString,
} from "./fields";

const EXCHANGE = "coinbase";

/** Orders before type inference and status mapping. */
export interface OrderDraft extends Omit<CanonicalOrder, "type" | "status"> {
  type: OrderType | null;
  status: string | null;
}

/** Trades before their status is forced to `closed`. */
export interface TradeDraft extends Omit<CanonicalTrade, "status"> {
  status: string | null;
}

export type RepairPass<T> = (record: T) => T;

/** Run passes in order; a pass that throws is skipped. */
export const applyRepairPasses = <T>(record: T, passes: readonly RepairPass<T>[]): T =>
  passes.reduce((current, pass) => {
    try {
      return pass(current);
    } catch {
      return current;
    }
  }, record);

// Field readers

const ORDER_TYPE_ALIASES: Record<string, OrderType> = {
  stop: "stop_loss",
  stop_market: "stop_loss",
  stop_limit: "stop_loss_limit",
  "stop-limit": "stop_loss_limit",
  take_profit_market: "take_profit",
};

export const toOrderType = (value: string | null): OrderType | null => {
  if (value === null) {
    return null;
  }
  const lowered = value.toLowerCase();
  if (isOrderType(lowered)) {
    return lowered;
  }
  return ORDER_TYPE_ALIASES[lowered] ?? null;
};

const toOrderSide = (value: string | null): OrderSide | null => {
  const lowered = value?.toLowerCase();
  return isOrderSide(lowered) ? lowered : null;
};

const toTakerOrMaker = (value: string | null): TakerOrMaker | null =>
  value === "taker" || value === "maker" ? value : null;

/** Canonical status for a raw status; unmapped values become `unknown`. */
export const toOrderStatus = (value: string | null): OrderStatus => {
  if (value === null) {
    return "unknown";
  }
  const lowered = value.toLowerCase();
  if (lowered === "cancelled") {
    return "canceled";
  }
  return isOrderStatus(lowered) ? lowered : "unknown";
};

const readFee = (record: RawRecord): Fee => ({
  cost: readNumber(record, "cost"),
  currency: readString(record, "currency"),
});

const readFees = (record: RawRecord): Fee[] => {
  const fees = readRecordList(record, "fees");
  if (fees.length > 0) {
    return fees.map(readFee);
  }
  const fee = readRecord(record, "fee");
  return fee ? [readFee(fee)] : [];
};

const requireRecord = (raw: unknown, what: string): RawRecord => {
  if (!isRecord(raw)) {
    throw new ExchangeError(
      `Invalid ${what} payload: expected an object`,
      "INVALID_RESPONSE",
      EXCHANGE,
    );
  }
  return raw;
};

export const readOrderDraft = (raw: unknown): OrderDraft => {
  const record = requireRecord(raw, "order");
  return {
    id: readString(record, "id") ?? "",
    clientOrderId: readString(record, "clientOrderId"),
    symbol: readString(record, "symbol") ?? "",
    side: toOrderSide(readString(record, "side")),
    type: toOrderType(readString(record, "type")),
    status: readString(record, "status"),
    price: readNumber(record, "price"),
    stopPrice: readNumber(record, "stopPrice") ?? readNumber(record, "triggerPrice"),
    amount: readNumber(record, "amount"),
    filled: readNumber(record, "filled"),
    remaining: readNumber(record, "remaining"),
    cost: readNumber(record, "cost"),
    average: readNumber(record, "average"),
    timestamp: readNumber(record, "timestamp"),
    fees: readFees(record),
  };
};

export const readTradeDraft = (raw: unknown): TradeDraft => {
  const record = requireRecord(raw, "trade");
  return {
    id: readString(record, "id") ?? "",
    orderId: readString(record, "order") ?? readString(record, "orderId"),
    symbol: readString(record, "symbol") ?? "",
    side: toOrderSide(readString(record, "side")),
    type: toOrderType(readString(record, "type")),
    takerOrMaker: toTakerOrMaker(readString(record, "takerOrMaker")),
    price: readNumber(record, "price"),
    amount: readNumber(record, "amount"),
    cost: readNumber(record, "cost"),
    timestamp: readNumber(record, "timestamp"),
    fees: readFees(record),
    status: readString(record, "status"),
  };
};

// Repair passes

/** Coinbase omits fee currencies; its fees are always charged in the quote asset. */
export const backfillFeeCurrency = <T extends { symbol: string; fees: Fee[] }>(record: T): T => {
  if (!record.fees.some((fee) => !fee.currency)) {
    return record;
  }
  const quote = getQuoteAsset(record.symbol);
  if (!quote) {
    return record;
  }
  return {
    ...record,
    fees: record.fees.map((fee) => (fee.currency ? fee : { ...fee, currency: quote })),
  };
};

/** Stop price wins over a missing price; a plain price means a limit order. */
export const inferOrderType = (order: Pick<OrderDraft, "price" | "stopPrice">): OrderType => {
  if (order.stopPrice !== null) {
    return "stop_loss";
  }
  if (order.price === null) {
    return "market";
  }
  return "limit";
};

export const fillOrderType: RepairPass<OrderDraft> = (order) =>
  order.type === null ? { ...order, type: inferOrderType(order) } : order;

const NATIVE_ORDER_STATUSES: Record<string, OrderStatus> = {
  PENDING: "pending_creation",
  CANCEL_QUEUED: "pending_cancel",
};

export const remapOrderStatus: RepairPass<OrderDraft> = (order) => {
  const mapped = order.status === null ? undefined : NATIVE_ORDER_STATUSES[order.status];
  return mapped ? { ...order, status: mapped } : order;
};

/** Some Coinbase orders only report the filled quantity. */
export const backfillOrderAmount: RepairPass<OrderDraft> = (order) =>
  !order.amount && order.filled ? { ...order, amount: order.filled } : order;

/** Coinbase may report trade sizes in quote units; express them in base units. */
export const backfillTradeAmount: RepairPass<TradeDraft> = (trade) =>
  trade.amount === null && trade.cost && trade.price
    ? { ...trade, amount: trade.cost / trade.price }
    : trade;

/** A reported trade is a completed fill, whatever status came with it. */
export const closeTrade = (trade: TradeDraft): CanonicalTrade => ({ ...trade, status: "closed" });

const ORDER_PASSES: readonly RepairPass<OrderDraft>[] = [
  backfillFeeCurrency,
  fillOrderType,
  remapOrderStatus,
  backfillOrderAmount,
];

const TRADE_PASSES: readonly RepairPass<TradeDraft>[] = [backfillFeeCurrency, backfillTradeAmount];

// Public normalizers

/**
 * Normalize a transport order payload.
 *
 * @throws {ExchangeError} `INVALID_RESPONSE` when the payload is not an object
 */
export const normalizeOrder = (raw: unknown): CanonicalOrder => {
  const draft = applyRepairPasses(readOrderDraft(raw), ORDER_PASSES);
  return {
    ...draft,
    type: draft.type ?? inferOrderType(draft),
    status: toOrderStatus(draft.status),
  };
};

/** Normalize a list of orders, skipping entries that are not objects. */
const requireList = (raw: unknown, kind: string): unknown[] => {
  if (!Array.isArray(raw)) {
    throw new ExchangeError(`Invalid ${kind} payload: expected a list`, "INVALID_RESPONSE", EXCHANGE);
  }
  return raw;
};

/** Entries that are not objects are skipped, a payload that is not a list is rejected. */
export const normalizeOrders = (raw: unknown): CanonicalOrder[] =>
  requireList(raw, "orders").filter(isRecord).map(normalizeOrder);

export const normalizeTrade = (raw: unknown): CanonicalTrade =>
  closeTrade(applyRepairPasses(readTradeDraft(raw), TRADE_PASSES));

export const normalizeTrades = (raw: unknown): CanonicalTrade[] =>
  requireList(raw, "trades").filter(isRecord).map(normalizeTrade);

export const normalizeTicker = (raw: unknown, fallbackSymbol = ""): Ticker => {
  const record = requireRecord(raw, "ticker");
  const last = readNumber(record, "last");
  const close = readNumber(record, "close");
  return {
    symbol: readString(record, "symbol") ?? fallbackSymbol,
    timestamp: readNumber(record, "timestamp"),
    high: readNumber(record, "high"),
    low: readNumber(record, "low"),
    bid: readNumber(record, "bid"),
    ask: readNumber(record, "ask"),
    open: readNumber(record, "open"),
    close: close ?? last,
    last: last ?? close,
    baseVolume: readNumber(record, "baseVolume"),
    quoteVolume: readNumber(record, "quoteVolume"),
  };
};

/** Normalize a symbol-keyed ticker map, skipping entries that are not objects. */
export const normalizeTickers = (raw: unknown): Record<string, Ticker> => {
  const record = requireRecord(raw, "tickers");
  const tickers: Record<string, Ticker> = {};
  for (const [key, value] of Object.entries(record)) {
    if (isRecord(value)) {
      const ticker = normalizeTicker(value, key);
      tickers[ticker.symbol] = ticker;
    }
  }
  return tickers;
};

const BALANCE_META_KEYS = new Set(["info", "timestamp", "datetime", "free", "used", "total", "debt"]);

const readBalanceEntry = (record: RawRecord): BalanceEntry => {
  const free = readNumber(record, "free");
  const used = readNumber(record, "used");
  const total = readNumber(record, "total");
  return {
    free,
    used,
    total: total ?? (free !== null && used !== null ? free + used : null),
  };
};

/**
 * Normalize a balance payload into per-currency entries.
 *
 * @throws {ExchangeError} `INVALID_RESPONSE` when the payload is not an object
 */
export const normalizeBalances = (raw: unknown): Balances => {
  const record = requireRecord(raw, "balance");
  const balances: Balances = {};
  for (const [currency, value] of Object.entries(record)) {
    if (!BALANCE_META_KEYS.has(currency) && isRecord(value)) {
      balances[currency] = readBalanceEntry(value);
    }
  }
  return balances;
};

const finiteNumber = v.pipe(v.number(), v.finite());

const CandleSchema = v.tuple([
  finiteNumber,
  finiteNumber,
  finiteNumber,
  finiteNumber,
  finiteNumber,
  finiteNumber,
]);

/**
 * Normalize OHLCV rows; rows that are not six finite numbers are dropped.
 *
 * @throws {ExchangeError} `INVALID_RESPONSE` when the payload is not a list
 */
export const normalizeCandles = (raw: unknown): Candle[] => {
  const candles: Candle[] = [];
  for (const row of requireList(raw, "OHLCV")) {
    const result = v.safeParse(CandleSchema, row);
    if (result.success) {
      candles.push(result.output);
    }
  }
  return candles;
};
