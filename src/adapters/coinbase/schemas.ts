/**
 * Valibot schemas for the Coinbase payloads the adapter reads directly.
 *
 * Order, trade, ticker and balance payloads go through the normalizers; these
 * cover the endpoints whose raw shape matters.
 */

import * as v from "valibot";

/** Schema for the v2 `GET /user` response */
export const CoinbaseUserResponseSchema = v.object({
  data: v.object({
    id: v.pipe(v.string(), v.minLength(1)),
  }),
});

export type CoinbaseUserResponse = v.InferOutput<typeof CoinbaseUserResponseSchema>;

/** Trading restriction flags of a v3 product */
export const CoinbaseMarketFlagsSchema = v.object({
  limit_only: v.optional(v.boolean()),
  cancel_only: v.optional(v.boolean()),
});

export type CoinbaseMarketFlags = v.InferOutput<typeof CoinbaseMarketFlagsSchema>;
