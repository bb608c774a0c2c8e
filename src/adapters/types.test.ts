import { describe, expect, it } from "vitest";
import * as v from "valibot";

import {
  createOrderRequestSchema,
  isCanonicalOrder,
  isCanonicalTrade,
  isOrderSide,
  isOrderStatus,
  isOrderType,
} from "./types";

const order = {
  id: "order-123",
  clientOrderId: null,
  symbol: "BTC/USD",
  side: "buy" as const,
  type: "limit" as const,
  status: "open" as const,
  price: 64000,
  stopPrice: null,
  amount: 0.5,
  filled: 0,
  remaining: 0.5,
  cost: 0,
  average: null,
  timestamp: 1_700_000_000_000,
  fees: [{ cost: 0, currency: "USD" }],
};

describe("type guards", () => {
  describe("isCanonicalOrder", () => {
    it("should return true for valid order", () => {
      expect(isCanonicalOrder(order)).toBe(true);
    });

    it("should return false for invalid order", () => {
      expect(isCanonicalOrder(null)).toBe(false);
      expect(isCanonicalOrder({})).toBe(false);
      expect(isCanonicalOrder({ ...order, type: "UNKNOWN_ORDER_TYPE" })).toBe(false);
      expect(isCanonicalOrder({ ...order, status: "PENDING" })).toBe(false);
    });
  });

  describe("isCanonicalTrade", () => {
    const trade = {
      id: "trade-1",
      orderId: "order-123",
      symbol: "BTC/USD",
      side: "sell" as const,
      type: null,
      takerOrMaker: "taker" as const,
      price: 64000,
      amount: 0.1,
      cost: 6400,
      timestamp: 1_700_000_000_000,
      fees: [],
      status: "closed" as const,
    };

    it("should return true for valid trade", () => {
      expect(isCanonicalTrade(trade)).toBe(true);
    });

    it("should only accept closed trades", () => {
      expect(isCanonicalTrade({ ...trade, status: "open" })).toBe(false);
      expect(isCanonicalTrade({ ...trade, takerOrMaker: "both" })).toBe(false);
    });
  });

  describe("enum guards", () => {
    it("should accept canonical values only", () => {
      expect(isOrderSide("buy")).toBe(true);
      expect(isOrderSide("BUY")).toBe(false);
      expect(isOrderType("stop_loss_limit")).toBe(true);
      expect(isOrderType("stop")).toBe(false);
      expect(isOrderStatus("pending_cancel")).toBe(true);
      expect(isOrderStatus("cancelled")).toBe(false);
    });
  });
});

describe("createOrderRequestSchema", () => {
  it("should accept a limit order request", () => {
    const result = v.safeParse(createOrderRequestSchema, {
      type: "buy_limit",
      symbol: "BTC/USD",
      quantity: 0.5,
      price: 64000,
    });

    expect(result.success).toBe(true);
  });

  it("should reject unknown order types and non-positive quantities", () => {
    expect(
      v.is(createOrderRequestSchema, { type: "buy_stop", symbol: "BTC/USD", quantity: 1 }),
    ).toBe(false);
    expect(v.is(createOrderRequestSchema, { type: "sell_market", symbol: "BTC/USD", quantity: 0 })).toBe(
      false,
    );
    expect(v.is(createOrderRequestSchema, { type: "sell_market", symbol: "", quantity: 1 })).toBe(
      false,
    );
  });
});
