/**
 * Adapter configuration validation schemas.
 */

import * as v from "valibot";

import { getConfig } from "@/lib/config";

const nonEmptyString = v.pipe(v.string(), v.minLength(1));

export const AdapterConfigSchema = v.pipe(
  v.object({
    exchange: v.literal("coinbase"),
    apiKey: v.optional(nonEmptyString),
    apiSecret: v.optional(nonEmptyString),
    password: v.optional(nonEmptyString),
    uid: v.optional(nonEmptyString),
    /** OAuth access token, replaces the key pair */
    authToken: v.optional(nonEmptyString),
    enableRateLimit: v.optional(v.boolean(), true),
    timeoutMs: v.optional(v.pipe(v.number(), v.integer(), v.minValue(1))),
    instantRetryCount: v.optional(v.pipe(v.number(), v.integer(), v.minValue(1)), 5),
  }),
  v.check(
    (input) => (input.apiKey === undefined) === (input.apiSecret === undefined),
    "apiKey and apiSecret must be provided together",
  ),
);

export type AdapterConfig = v.InferOutput<typeof AdapterConfigSchema>;

export const parseAdapterConfig = (input: unknown): AdapterConfig =>
  v.parse(AdapterConfigSchema, input);

export const isAdapterConfig = (value: unknown): value is AdapterConfig =>
  v.is(AdapterConfigSchema, value);

const presentOrUndefined = (value: string | undefined): string | undefined =>
  value === "" ? undefined : value;

/**
 * Build the Coinbase adapter configuration from the environment.
 *
 * @throws {EnvError} when an environment variable is invalid
 * @throws {v.ValiError} when the variables do not form a valid adapter config
 */
export const adapterConfigFromEnv = (source: NodeJS.ProcessEnv = process.env): AdapterConfig => {
  const { coinbase } = getConfig(source);
  return parseAdapterConfig({
    exchange: "coinbase",
    apiKey: presentOrUndefined(coinbase.apiKey),
    apiSecret: presentOrUndefined(coinbase.apiSecret),
    password: presentOrUndefined(coinbase.password),
    uid: presentOrUndefined(coinbase.uid),
    authToken: presentOrUndefined(coinbase.authToken),
    enableRateLimit: coinbase.enableRateLimit,
    instantRetryCount: coinbase.instantRetryCount,
  });
};
