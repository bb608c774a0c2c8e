/**
 * Remote transport consumed by the Coinbase adapter.
 *
 * Implementations return raw payloads with canonical field names and reject
 * with `ExchangeError`: `REQUEST_FAILED`, `RATE_LIMITED`, `REMOTE_ERROR`
 * or `NOT_SUPPORTED`. Pacing requests is the transport's job.
 */

import type { OrderSide, OrderType, RequestParams } from "../types";

export interface TransportOrderRequest {
  symbol: string;
  type: OrderType;
  side: OrderSide;
  amount: number;
  price?: number;
  params: RequestParams;
}

export interface CoinbaseTransport {
  loadMarkets(reload: boolean): Promise<void>;
  /** Exchange server clock in milliseconds */
  milliseconds(): number;
  /** Raw market info of a loaded market, null when unknown */
  marketInfo(symbol: string): unknown;

  fetchUser(): Promise<unknown>;
  fetchOHLCV(
    symbol: string,
    timeFrame: string,
    since: number,
    limit: number,
    params: RequestParams,
  ): Promise<unknown>;
  fetchTrades(symbol: string, limit: number, params: RequestParams): Promise<unknown>;
  fetchTicker(symbol: string, params: RequestParams): Promise<unknown>;
  fetchTickers(params: RequestParams): Promise<unknown>;
  fetchBalance(params: RequestParams): Promise<unknown>;

  createOrder(request: TransportOrderRequest): Promise<unknown>;
  cancelOrder(orderId: string, symbol: string, params: RequestParams): Promise<unknown>;
  fetchOpenOrders(
    symbol: string | undefined,
    since: number | undefined,
    limit: number | undefined,
    params: RequestParams,
  ): Promise<unknown>;
  fetchOrder(orderId: string, symbol: string | undefined, params: RequestParams): Promise<unknown>;
}
