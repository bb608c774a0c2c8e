import * as v from "valibot";

import { logLevelSchema } from "../logger/schema";

const booleanStringSchema = v.pipe(
  v.picklist(["true", "false"]),
  v.transform((value) => value === "true"),
);

export const nodeEnvSchema = v.picklist(["development", "production", "test"]);

export type NodeEnv = v.InferOutput<typeof nodeEnvSchema>;

export const envSchema = v.object({
  // Runtime
  NODE_ENV: v.optional(nodeEnvSchema, "development"),

  // Logging
  LOG_LEVEL: v.optional(v.pipe(v.string(), logLevelSchema)),

  // Coinbase Advanced Trade API (CDP API keys, or an OAuth token)
  COINBASE_API_KEY: v.optional(v.string()),
  COINBASE_API_SECRET: v.optional(v.string()),
  COINBASE_API_PASSPHRASE: v.optional(v.string()),
  COINBASE_UID: v.optional(v.string()),
  COINBASE_AUTH_TOKEN: v.optional(v.string()),
  // Pace requests with the client's built-in limiter
  COINBASE_ENABLE_RATE_LIMIT: v.optional(booleanStringSchema, "true"),

  // Instant retries on Coinbase's fake rate-limit errors
  COINBASE_INSTANT_RETRY_COUNT: v.optional(
    v.pipe(v.string(), v.transform(Number), v.number(), v.integer(), v.minValue(1)),
    "5",
  ),
});

export type Env = v.InferOutput<typeof envSchema>;
