import { formatMarket, ValidationError, type Market } from '@ledgerline/core';
import { HttpClient, type HttpEffects } from '@ledgerline/http';
import type { Decimal } from 'decimal.js';
import { err, ok, Result } from 'neverthrow';

import { PublicEndpoint } from '../../core/endpoint.js';
import { MarketNotFoundError } from '../../core/errors.js';
import { createSingleFlight } from '../../core/exchange-utils.js';

import { BTCE_EXCHANGE_ID, fromEpochSeconds, marketToPair, pairToMarket } from './btce-utils.js';
import {
  BtceDepthSchema,
  BtceInfoSchema,
  BtcePublicTradesSchema,
  BtceTickerSchema,
  type BtceInfo,
} from './schemas.js';

export const DEFAULT_PUBLIC_LIMIT = 150;
export const MAX_PUBLIC_TRADES_LIMIT = 2000;

export interface BtceServerInfo {
  serverTime: Date;
  markets: Market[];
}

export interface BtceTickerSnapshot {
  market: Market;
  high: Decimal;
  low: Decimal;
  average: Decimal;
  volume: Decimal; // Counter currency
  baseVolume: Decimal;
  last: Decimal;
  buy: Decimal;
  sell: Decimal;
  updatedAt: Date;
}

export interface DepthLevel {
  price: Decimal;
  amount: Decimal;
}

export interface BtceDepth {
  market: Market;
  asks: DepthLevel[];
  bids: DepthLevel[];
}

export interface BtcePublicTrade {
  tradeId: string;
  side: 'buy' | 'sell';
  price: Decimal;
  amount: Decimal;
  datetime: Date;
}

export interface BtcePublicClientOptions {
  baseUrl: string;
  timeoutMs?: number | undefined;
  httpEffects?: Partial<HttpEffects> | undefined;
}

export interface BtcePublicClient {
  getInfo(): Promise<Result<BtceServerInfo, Error>>;
  /** Markets listed by `info`, loaded once per client */
  getMarkets(): Promise<Result<Market[], Error>>;
  getTicker(market: Market): Promise<Result<BtceTickerSnapshot, Error>>;
  getDepth(market: Market, limit?: number): Promise<Result<BtceDepth, Error>>;
  getTrades(market: Market, limit?: number): Promise<Result<BtcePublicTrade[], Error>>;
  /** Trade fee in percent, loaded once per client */
  getTradeFee(market: Market): Promise<Result<Decimal, Error>>;
  close(): Promise<void>;
}

function listMarkets(info: BtceInfo): Result<Market[], Error> {
  return Result.combine(Object.keys(info.pairs).map((pair) => pairToMarket(pair)));
}

function pickPair<T>(data: Record<string, T>, market: Market): Result<T, Error> {
  const entry = data[marketToPair(market)];
  return entry === undefined ? err(new MarketNotFoundError(formatMarket(market), BTCE_EXCHANGE_ID)) : ok(entry);
}

/**
 * Client of the unauthenticated BTC-e API v3 (`/info`, `/ticker`, `/depth`, `/trades`)
 */
export function createBtcePublicClient(options: BtcePublicClientOptions): BtcePublicClient {
  const httpClient = new HttpClient(
    { baseUrl: options.baseUrl, providerName: `${BTCE_EXCHANGE_ID}-public`, timeout: options.timeoutMs },
    options.httpEffects
  );
  const endpoint = new PublicEndpoint(BTCE_EXCHANGE_ID, httpClient);
  const pairs = createSingleFlight(() => endpoint.get('info', BtceInfoSchema));

  return {
    async getInfo() {
      const info = await endpoint.get('info', BtceInfoSchema);
      return info.andThen((value) =>
        listMarkets(value).map((markets) => ({ markets, serverTime: fromEpochSeconds(value.server_time) }))
      );
    },

    async getMarkets() {
      return (await pairs.get()).andThen(listMarkets);
    },

    async getTicker(market) {
      const tickers = await endpoint.get(`ticker/${marketToPair(market)}`, BtceTickerSchema);
      return tickers
        .andThen((data) => pickPair(data, market))
        .map((ticker) => ({
          market,
          high: ticker.high,
          low: ticker.low,
          average: ticker.avg,
          volume: ticker.vol,
          baseVolume: ticker.vol_cur,
          last: ticker.last,
          buy: ticker.buy,
          sell: ticker.sell,
          updatedAt: fromEpochSeconds(ticker.updated),
        }));
    },

    async getDepth(market, limit = DEFAULT_PUBLIC_LIMIT) {
      const depth = await endpoint.get(`depth/${marketToPair(market)}`, BtceDepthSchema, { limit });
      return depth
        .andThen((data) => pickPair(data, market))
        .map(({ asks, bids }) => ({
          market,
          asks: asks.map(([price, amount]) => ({ amount, price })),
          bids: bids.map(([price, amount]) => ({ amount, price })),
        }));
    },

    async getTrades(market, limit = DEFAULT_PUBLIC_LIMIT) {
      if (limit > MAX_PUBLIC_TRADES_LIMIT) {
        return err(
          new ValidationError(`Trades limit must not exceed ${MAX_PUBLIC_TRADES_LIMIT}, got ${limit}`, { limit })
        );
      }

      const trades = await endpoint.get(`trades/${marketToPair(market)}`, BtcePublicTradesSchema, { limit });
      return trades
        .andThen((data) => pickPair(data, market))
        .map((rows) =>
          rows.map((row) => ({
            tradeId: row.tid,
            side: row.type === 'bid' ? ('buy' as const) : ('sell' as const),
            price: row.price,
            amount: row.amount,
            datetime: fromEpochSeconds(row.timestamp),
          }))
        );
    },

    async getTradeFee(market) {
      return (await pairs.get()).andThen((info) => pickPair(info.pairs, market)).map((pair) => pair.fee);
    },

    async close() {
      await httpClient.close();
    },
  };
}
