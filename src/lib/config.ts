import * as v from "valibot";

import { type NodeEnv, nodeEnvSchema, parseEnv } from "./env";
import { type LogLevel, logLevelSchema } from "./logger/schema";

export interface LoggingConfig {
  nodeEnv: NodeEnv;
  level: LogLevel;
}

/**
 * Logging settings from the environment. Never throws: invalid values fall
 * back to the defaults so that a logger can always be built.
 */
export const getLoggingConfig = (source: NodeJS.ProcessEnv = process.env): LoggingConfig => {
  const nodeEnvResult = v.safeParse(nodeEnvSchema, source.NODE_ENV);
  const nodeEnv = nodeEnvResult.success ? nodeEnvResult.output : "development";
  const levelResult = v.safeParse(logLevelSchema, source.LOG_LEVEL);
  return {
    nodeEnv,
    level: levelResult.success ? levelResult.output : nodeEnv === "production" ? "info" : "debug",
  };
};

/**
 * Full configuration, validated on every call.
 *
 * @throws {EnvError} when any variable is invalid
 */
export const getConfig = (source: NodeJS.ProcessEnv = process.env) => {
  const env = parseEnv(source);
  return {
    server: {
      nodeEnv: env.NODE_ENV,
    },
    logging: {
      level: env.LOG_LEVEL ?? (env.NODE_ENV === "production" ? "info" : "debug"),
    },
    coinbase: {
      apiKey: env.COINBASE_API_KEY,
      apiSecret: env.COINBASE_API_SECRET,
      password: env.COINBASE_API_PASSPHRASE,
      uid: env.COINBASE_UID,
      authToken: env.COINBASE_AUTH_TOKEN,
      enableRateLimit: env.COINBASE_ENABLE_RATE_LIMIT,
      instantRetryCount: env.COINBASE_INSTANT_RETRY_COUNT,
    },
  } as const;
};
