import { describe, expect, it } from "vitest";

import { classifyError, classifyErrorText } from "../error-classifier";
import { ExchangeError } from "../errors";
import { COINBASE_ERROR_SIGNATURES, classifyCoinbaseErrorText } from "./error-signatures";

describe("classifyCoinbaseErrorText", () => {
  it("should classify missing orders", () => {
    expect(classifyCoinbaseErrorText("NOT_FOUND: order with this orderID was not found")).toBe(
      "OrderNotFound",
    );
  });

  it("should require every part of a signature", () => {
    expect(classifyCoinbaseErrorText('coinbase {"error":"NOT_FOUND","message":"product"}')).toBe(
      "Unclassified",
    );
  });

  it("should classify permission errors", () => {
    expect(classifyCoinbaseErrorText("Missing required scopes")).toBe("PermissionDenied");
    expect(
      classifyCoinbaseErrorText(
        'coinbase {"error":"unknown","error_details":"Missing required scopes","message":"Missing required scopes"}',
      ),
    ).toBe("PermissionDenied");
  });

  it("should classify both non-tradable symbol signatures", () => {
    expect(classifyCoinbaseErrorText("BadRequest: target is not enabled for trading")).toBe(
      "SymbolNotTradable",
    );
    expect(classifyCoinbaseErrorText("User is not allowed to convert crypto")).toBe(
      "SymbolNotTradable",
    );
  });

  it("should classify account sync errors", () => {
    expect(
      classifyCoinbaseErrorText(
        'coinbase {"error":"INVALID_ARGUMENT","error_details":"account is not available"}',
      ),
    ).toBe("AccountSyncPending");
  });

  it("should classify missing funds", () => {
    expect(classifyCoinbaseErrorText("Insufficient balance in source account")).toBe(
      "InsufficientFunds",
    );
  });

  it("should return Unclassified for unknown texts", () => {
    expect(classifyCoinbaseErrorText("totally unrelated")).toBe("Unclassified");
    expect(classifyCoinbaseErrorText("")).toBe("Unclassified");
  });

  it("should let earlier categories win", () => {
    expect(
      classifyCoinbaseErrorText("order NOT_FOUND: insufficient balance in source account"),
    ).toBe("OrderNotFound");
  });
});

describe("classifyErrorText", () => {
  it("should use a custom table", () => {
    const table = [{ category: "InsufficientFunds" as const, signatures: [["no money"]] }];

    expect(classifyErrorText("No Money left", table)).toBe("InsufficientFunds");
    expect(classifyErrorText("Missing required scopes", table)).toBe("Unclassified");
  });

  it("should never match an empty signature", () => {
    const table = [{ category: "PermissionDenied" as const, signatures: [[]] }];

    expect(classifyErrorText("anything", table)).toBe("Unclassified");
  });
});

describe("classifyError", () => {
  it("should classify errors by message", () => {
    const error = new ExchangeError(
      "coinbase account is not available",
      "REMOTE_ERROR",
      "coinbase",
    );

    expect(classifyError(error, COINBASE_ERROR_SIGNATURES)).toBe("AccountSyncPending");
  });

  it("should classify strings and plain values", () => {
    expect(classifyError("missing required scopes", COINBASE_ERROR_SIGNATURES)).toBe(
      "PermissionDenied",
    );
    expect(classifyError({ detail: "order not_found" }, COINBASE_ERROR_SIGNATURES)).toBe(
      "OrderNotFound",
    );
    expect(classifyError(undefined, COINBASE_ERROR_SIGNATURES)).toBe("Unclassified");
  });
});
