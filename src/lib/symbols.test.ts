import { describe, expect, it } from "vitest";

import { getQuoteAsset, parseSymbol } from "./symbols";

describe("parseSymbol", () => {
  it("should split base and quote", () => {
    expect(parseSymbol("AAVE/USD")).toEqual({ base: "AAVE", quote: "USD", settle: null });
  });

  it("should read the settlement asset", () => {
    expect(parseSymbol("BTC/USDC:USDC")).toEqual({ base: "BTC", quote: "USDC", settle: "USDC" });
  });

  it("should throw on malformed symbols", () => {
    expect(() => parseSymbol("BTC-USD")).toThrow('Invalid symbol: "BTC-USD"');
    expect(() => parseSymbol("")).toThrow();
    expect(() => parseSymbol("BTC/")).toThrow();
  });
});

describe("getQuoteAsset", () => {
  it("should return the quote asset", () => {
    expect(getQuoteAsset("ETH/EUR")).toBe("EUR");
  });

  it("should return null for malformed symbols", () => {
    expect(getQuoteAsset("ETHEUR")).toBeNull();
  });
});
