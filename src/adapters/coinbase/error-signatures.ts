/**
 * Coinbase error texts and their categories.
 *
 * Examples of the raw texts these match:
 * - `coinbase {"error":"NOT_FOUND","error_details":"order with this orderID was not found"}`
 * - `coinbase {"error":"PERMISSION_DENIED","error_details":"Missing required scopes"}`
 * - `BadRequest: target is not enabled for trading` (account can't trade the pair)
 * - `coinbase {"error":"INVALID_ARGUMENT","error_details":"account is not available"}`
 *   (portfolio not yet synced after a trade)
 */

import {
  type ErrorCategory,
  type ErrorSignatureTable,
  classifyErrorText,
} from "../error-classifier";

export const COINBASE_ERROR_SIGNATURES: ErrorSignatureTable = [
  { category: "OrderNotFound", signatures: [["not_found", "order"]] },
  { category: "PermissionDenied", signatures: [["missing required scopes"]] },
  {
    category: "SymbolNotTradable",
    signatures: [["target is not enabled for trading"], ["user is not allowed to convert crypto"]],
  },
  { category: "AccountSyncPending", signatures: [["account is not available"]] },
  { category: "InsufficientFunds", signatures: [["insufficient balance in source account"]] },
];

export const classifyCoinbaseErrorText = (text: string): ErrorCategory =>
  classifyErrorText(text, COINBASE_ERROR_SIGNATURES);
