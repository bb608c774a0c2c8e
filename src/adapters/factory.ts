/**
 * Factory function for creating exchange adapters.
 */

import type { Logger } from "@/lib/logger";
import { createCcxtCoinbaseClient, createCcxtTransport, createCoinbaseAdapter } from "./coinbase";
import type { AdapterConfig } from "./config";
import type { ExchangeAdapter } from "./types";

export interface ExchangeAdapterOptions {
  logger?: Logger;
  /** Cancels pending calls of the adapter */
  signal?: AbortSignal;
}

/**
 * Create an exchange adapter based on configuration.
 *
 * @param config - Validated adapter configuration
 * @returns ExchangeAdapter instance for the specified exchange
 */
export const createExchangeAdapter = (
  config: AdapterConfig,
  options: ExchangeAdapterOptions = {},
): ExchangeAdapter => {
  switch (config.exchange) {
    case "coinbase": {
      const client = createCcxtCoinbaseClient(
        {
          apiKey: config.apiKey,
          secret: config.apiSecret,
          password: config.password,
          uid: config.uid,
          authToken: config.authToken,
        },
        { enableRateLimit: config.enableRateLimit, timeoutMs: config.timeoutMs },
      );
      return createCoinbaseAdapter({
        transport: createCcxtTransport(client, config.exchange),
        exchange: config.exchange,
        maxAttempts: config.instantRetryCount,
        logger: options.logger,
        signal: options.signal,
      });
    }
  }
};
