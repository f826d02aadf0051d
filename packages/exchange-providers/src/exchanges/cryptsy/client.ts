import {
  createMarket,
  createOrder,
  createTrade,
  createTransaction,
  decimalToString,
  formatMarket,
  marketsEqual,
  quantize,
  type Market,
  type Order,
  type Trade,
  type Transaction,
  type TransactionKind,
} from '@ledgerline/core';
import { getExchangeEndpoints, getHttpTimeoutMs } from '@ledgerline/env';
import { HttpClient } from '@ledgerline/http';
import { getLogger } from '@ledgerline/logger';
import type { Decimal } from 'decimal.js';
import { err, ok, Result } from 'neverthrow';

import { SignedEndpoint } from '../../core/endpoint.js';
import type { EnvelopePolicy } from '../../core/envelope.js';
import { MarketNotFoundError } from '../../core/errors.js';
import * as ExchangeUtils from '../../core/exchange-utils.js';
import { NonceCounter } from '../../core/nonce.js';
import { SignedCredentialsSchema } from '../../core/schemas.js';
import type { ExchangeClientOptions, ExchangeCredentials, FundsSnapshot, IExchangeClient } from '../../core/types.js';

import { CRYPTSY_EXCHANGE_ID, DEFAULT_SERVER_TIMEZONE, parseServerDatetime, transferId } from './cryptsy-utils.js';
import {
  CryptsyCancelOrderSchema,
  CryptsyCreateOrderSchema,
  CryptsyInfoSchema,
  CryptsyMarketOrdersSchema,
  CryptsyMarketsSchema,
  CryptsyMarketTradesSchema,
  CryptsyOrdersSchema,
  CryptsyTradesSchema,
  CryptsyTransactionsSchema,
  CryptsyTransferSchema,
  CryptsyTransfersSchema,
  type CryptsyOrder,
  type CryptsyTrade,
  type CryptsyTransaction,
} from './schemas.js';

export const DEFAULT_TRADES_LIMIT = 200;

const POINTS_CURRENCY = 'Points';

/**
 * `createorder` reports `orderid`/`moreinfo` beside `success` instead of under `return`
 */
export const cryptsyEnvelopePolicy: EnvelopePolicy = {
  normalizeResponse: (method, body) =>
    method === 'createorder' && !('return' in body)
      ? { ...body, return: { moreinfo: body['moreinfo'], orderid: body['orderid'] } }
      : body,
};

export interface OrderBookLevel {
  price: Decimal;
  quantity: Decimal;
  total: Decimal;
}

export interface CryptsyOrderBook {
  market: Market;
  buyOrders: OrderBookLevel[];
  sellOrders: OrderBookLevel[];
}

export interface CryptsyMarketTrade {
  tradeId: string;
  datetime: Date;
  price: Decimal;
  quantity: Decimal;
  total: Decimal;
  initiateOrderType: string;
}

export interface CryptsyClient extends IExchangeClient {
  /** All markets, or only `market` via `mytrades` */
  getMyTrades(limit?: number, market?: Market): Promise<Result<Trade[], Error>>;
  getMyOpenOrders(market?: Market): Promise<Result<Order[], Error>>;
  getMarketOrders(market: Market): Promise<Result<CryptsyOrderBook, Error>>;
  getMarketTrades(market: Market): Promise<Result<CryptsyMarketTrade[], Error>>;
}

function transactionKind(row: CryptsyTransaction): TransactionKind | undefined {
  if (row.type === 'Withdrawal') return 'withdrawal';
  if (row.type === 'Deposit') return row.currency === POINTS_CURRENCY ? 'generic' : 'deposit';
  return undefined;
}

/**
 * Factory function that creates a Cryptsy private API client
 */
export function createCryptsyClient(
  credentials: ExchangeCredentials,
  options: ExchangeClientOptions = {}
): Result<CryptsyClient, Error> {
  return ExchangeUtils.validateCredentials(SignedCredentialsSchema, credentials, CRYPTSY_EXCHANGE_ID).map(
    ({ apiKey, secret, nonce }) => {
      const logger = getLogger('CryptsyClient');

      const httpClient = new HttpClient(
        {
          baseUrl: options.baseUrls?.trade ?? getExchangeEndpoints().cryptsyApiUrl,
          providerName: CRYPTSY_EXCHANGE_ID,
          timeout: options.timeoutMs ?? getHttpTimeoutMs(),
        },
        options.httpEffects
      );
      const endpoint = new SignedEndpoint({
        credentials: { apiKey, secret },
        exchangeId: CRYPTSY_EXCHANGE_ID,
        httpClient,
        nonces: new NonceCounter(CRYPTSY_EXCHANGE_ID, nonce ?? 0),
        policy: cryptsyEnvelopePolicy,
      });

      const marketMap = ExchangeUtils.createSingleFlight(async () => {
        const markets = await endpoint.call('getmarkets', CryptsyMarketsSchema);
        return markets.map(
          (rows) =>
            new Map(
              rows.map((row): [string, Market] => [
                row.marketid,
                createMarket(row.primary_currency_code, row.secondary_currency_code),
              ])
            )
        );
      });

      const serverTimeZone = ExchangeUtils.createSingleFlight(async () => {
        const info = await endpoint.call('getinfo', CryptsyInfoSchema);
        return info.map(({ servertimezone }) => {
          const timeZone = servertimezone ?? DEFAULT_SERVER_TIMEZONE;
          logger.debug(`Cryptsy server time zone: ${timeZone}`);
          return timeZone;
        });
      });

      async function marketIdFor(market: Market): Promise<Result<string, Error>> {
        const markets = await marketMap.get();
        return markets.andThen((map) => {
          for (const [marketId, candidate] of map) {
            if (marketsEqual(candidate, market)) {
              return ok(marketId);
            }
          }
          return err(new MarketNotFoundError(formatMarket(market), CRYPTSY_EXCHANGE_ID));
        });
      }

      /**
       * Market map and server time zone, both needed to normalize any trade or order row
       */
      async function rowContext(): Promise<Result<{ markets: Map<string, Market>; timeZone: string }, Error>> {
        const markets = await marketMap.get();
        if (markets.isErr()) {
          return err(markets.error);
        }
        const timeZone = await serverTimeZone.get();
        return timeZone.map((zone) => ({ markets: markets.value, timeZone: zone }));
      }

      function lookupMarket(markets: Map<string, Market>, marketId: string | undefined): Result<Market, Error> {
        const market = marketId === undefined ? undefined : markets.get(marketId);
        if (market) {
          return ok(market);
        }
        return err(new MarketNotFoundError(`market id ${marketId ?? '(none)'}`, CRYPTSY_EXCHANGE_ID));
      }

      function toTrade(row: CryptsyTrade, market: Market, timeZone: string): Result<Trade, Error> {
        const side = row.tradetype === 'Buy' ? 'buy' : 'sell';
        // Cryptsy charges in the counter currency; a buy's fee is restated in the base currency
        const fee =
          side === 'buy' && row.tradeprice.greaterThan(0) ? quantize(row.fee.dividedBy(row.tradeprice)) : row.fee;

        return parseServerDatetime(row.datetime, timeZone).andThen((datetime) =>
          createTrade({
            side,
            tradeId: row.tradeid,
            baseCurrency: market.baseCurrency,
            counterCurrency: market.counterCurrency,
            datetime,
            orderId: row.order_id,
            amount: row.quantity,
            price: row.tradeprice,
            fee,
          })
        );
      }

      function toOrder(row: CryptsyOrder, market: Market, timeZone: string): Result<Order, Error> {
        return parseServerDatetime(row.created, timeZone).map((datetime) =>
          createOrder({
            side: row.ordertype === 'Buy' ? 'buy' : 'sell',
            orderId: row.orderid,
            baseCurrency: market.baseCurrency,
            counterCurrency: market.counterCurrency,
            datetime,
            amount: row.quantity,
            price: row.price,
          })
        );
      }

      async function placeOrder(
        orderType: 'Buy' | 'Sell',
        market: Market,
        quantity: Decimal.Value,
        price: Decimal.Value
      ): Promise<Result<string, Error>> {
        const marketId = await marketIdFor(market);
        if (marketId.isErr()) {
          return err(marketId.error);
        }

        const created = await endpoint.call('createorder', CryptsyCreateOrderSchema, {
          marketid: marketId.value,
          ordertype: orderType,
          quantity: decimalToString(quantity),
          price: decimalToString(price),
        });
        return created.map(({ orderid, moreinfo }) => {
          const detail = moreinfo ? `: ${moreinfo}` : '';
          logger.info(`Placed ${orderType} order ${orderid} on ${formatMarket(market)}${detail}`);
          return orderid;
        });
      }

      async function getTransfers(timeZone: string): Promise<Result<Transaction[], Error>> {
        const transfers = await endpoint.call('mytransfers', CryptsyTransfersSchema);
        return transfers.andThen((rows) => {
          const transactions: Transaction[] = [];
          for (const raw of rows) {
            const parsed = ExchangeUtils.validateRawData(CryptsyTransferSchema, raw, CRYPTSY_EXCHANGE_ID);
            if (parsed.isErr()) {
              return err(parsed.error);
            }
            const transfer = parsed.value;
            if (transfer.processed !== 1) {
              continue;
            }

            const datetime = parseServerDatetime(transfer.processed_timestamp ?? transfer.req_timestamp, timeZone);
            if (datetime.isErr()) {
              return err(datetime.error);
            }

            const kind: TransactionKind =
              transfer.direction === 'in' ? 'deposit' : transfer.direction === 'out' ? 'withdrawal' : 'generic';
            transactions.push(
              createTransaction({
                kind,
                transactionId: transferId(raw),
                datetime: datetime.value,
                currency: transfer.currency,
                amount: transfer.quantity,
                address: transfer.to,
                fee: undefined,
              })
            );
          }
          return ok(transactions);
        });
      }

      return {
        exchangeId: CRYPTSY_EXCHANGE_ID,

        async getMarkets() {
          const markets = await marketMap.get();
          return markets.map((map) => [...map.values()]);
        },

        async getMyOpenOrders(market?: Market) {
          let marketId: string | undefined;
          if (market) {
            const resolved = await marketIdFor(market);
            if (resolved.isErr()) {
              return err(resolved.error);
            }
            marketId = resolved.value;
          }

          const orders =
            marketId === undefined
              ? await endpoint.call('allmyorders', CryptsyOrdersSchema)
              : await endpoint.call('myorders', CryptsyOrdersSchema, { marketid: marketId });
          if (orders.isErr()) {
            return err(orders.error);
          }

          const context = await rowContext();
          return context.andThen(({ markets, timeZone }) =>
            Result.combine(
              orders.value.map((row) =>
                lookupMarket(markets, row.marketid ?? marketId).andThen((resolved) =>
                  toOrder(row, resolved, timeZone)
                )
              )
            )
          );
        },

        async getMyTrades(limit = DEFAULT_TRADES_LIMIT, market?: Market) {
          let marketId: string | undefined;
          if (market) {
            const resolved = await marketIdFor(market);
            if (resolved.isErr()) {
              return err(resolved.error);
            }
            marketId = resolved.value;
          }

          const trades =
            marketId === undefined
              ? await endpoint.call('allmytrades', CryptsyTradesSchema, { limit })
              : await endpoint.call('mytrades', CryptsyTradesSchema, { marketid: marketId, limit });
          if (trades.isErr()) {
            return err(trades.error);
          }

          const context = await rowContext();
          return context.andThen(({ markets, timeZone }) =>
            Result.combine(
              trades.value.map((row) =>
                lookupMarket(markets, row.marketid ?? marketId).andThen((resolved) =>
                  toTrade(row, resolved, timeZone)
                )
              )
            )
          );
        },

        async cancelOrder(orderId) {
          const cancelled = await endpoint.call('cancelorder', CryptsyCancelOrderSchema, { orderid: orderId });
          return cancelled.map(() => undefined);
        },

        async buy(market, quantity, price) {
          return placeOrder('Buy', market, quantity, price);
        },

        async sell(market, quantity, price) {
          return placeOrder('Sell', market, quantity, price);
        },

        async getMyTransactions() {
          const rows = await endpoint.call('mytransactions', CryptsyTransactionsSchema);
          if (rows.isErr()) {
            return err(rows.error);
          }
          const timeZone = await serverTimeZone.get();
          if (timeZone.isErr()) {
            return err(timeZone.error);
          }

          const transactions: Transaction[] = [];
          for (const row of rows.value) {
            const kind = transactionKind(row);
            if (!kind) {
              logger.debug(`Skipping Cryptsy transaction ${row.trxid} of type ${row.type}`);
              continue;
            }
            const datetime = parseServerDatetime(row.datetime, timeZone.value);
            if (datetime.isErr()) {
              return err(datetime.error);
            }
            transactions.push(
              createTransaction({
                kind,
                transactionId: row.trxid,
                datetime: datetime.value,
                currency: row.currency,
                amount: row.amount,
                address: row.address,
                fee: row.fee,
              })
            );
          }

          const transfers = await getTransfers(timeZone.value);
          return transfers.map((moved) => [...transactions, ...moved]);
        },

        async getMyFunds() {
          const info = await endpoint.call('getinfo', CryptsyInfoSchema);
          return info.map(({ balances_available }) => {
            const snapshot: FundsSnapshot = {};
            for (const [currency, amount] of Object.entries(balances_available)) {
              snapshot[currency.toUpperCase()] = amount;
            }
            return snapshot;
          });
        },

        async getMarketOrders(market) {
          const marketId = await marketIdFor(market);
          if (marketId.isErr()) {
            return err(marketId.error);
          }

          const book = await endpoint.call('marketorders', CryptsyMarketOrdersSchema, { marketid: marketId.value });
          return book.map(({ buyorders, sellorders }) => ({
            market,
            buyOrders: buyorders.map((level) => ({
              price: level.buyprice,
              quantity: level.quantity,
              total: level.total,
            })),
            sellOrders: sellorders.map((level) => ({
              price: level.sellprice,
              quantity: level.quantity,
              total: level.total,
            })),
          }));
        },

        async getMarketTrades(market) {
          const marketId = await marketIdFor(market);
          if (marketId.isErr()) {
            return err(marketId.error);
          }

          const trades = await endpoint.call('markettrades', CryptsyMarketTradesSchema, { marketid: marketId.value });
          if (trades.isErr()) {
            return err(trades.error);
          }
          const timeZone = await serverTimeZone.get();
          return timeZone.andThen((zone) =>
            Result.combine(
              trades.value.map((row) =>
                parseServerDatetime(row.datetime, zone).map((datetime) => ({
                  tradeId: row.tradeid,
                  datetime,
                  price: row.tradeprice,
                  quantity: row.quantity,
                  total: row.total,
                  initiateOrderType: row.initiate_ordertype,
                }))
              )
            )
          );
        },

        async close() {
          await httpClient.close();
        },
      };
    }
  );
}
