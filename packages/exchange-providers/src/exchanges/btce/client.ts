import {
  createOrder,
  decimalToString,
  formatMarket,
  marketsEqual,
  type Market,
  type Order,
  type Trade,
  type Transaction,
} from '@ledgerline/core';
import { getExchangeEndpoints, getHttpTimeoutMs } from '@ledgerline/env';
import { HttpClient } from '@ledgerline/http';
import { getLogger } from '@ledgerline/logger';
import type { Decimal } from 'decimal.js';
import { err, ok, Result } from 'neverthrow';

import { SignedEndpoint } from '../../core/endpoint.js';
import type { EnvelopePolicy } from '../../core/envelope.js';
import { MarketNotFoundError, PartialReconciliationError, type ReconciliationError } from '../../core/errors.js';
import * as ExchangeUtils from '../../core/exchange-utils.js';
import { NonceCounter } from '../../core/nonce.js';
import { SignedCredentialsSchema } from '../../core/schemas.js';
import type { ExchangeClientOptions, ExchangeCredentials, FundsSnapshot, IExchangeClient } from '../../core/types.js';

import { BTCE_EXCHANGE_ID, BTCE_NONCE_LIMIT, fromEpochSeconds, marketToPair, pairToMarket } from './btce-utils.js';
import { createBtcePublicClient, type BtcePublicClient } from './public-client.js';
import {
  BtceAccountInfoSchema,
  BtceActiveOrdersSchema,
  BtceCancelOrderSchema,
  BtcePlaceOrderSchema,
  BtceTradeHistorySchema,
  BtceTransHistorySchema,
  type BtceTradeHistoryEntry,
} from './schemas.js';
import { reconcileTransactionHistory, type ReconcileOptions } from './transaction-history.js';

export const DEFAULT_HISTORY_LIMIT = 1000;

const NO_ORDERS_MESSAGE = 'no orders';

/**
 * BTC-e answers an empty order or history list with a `no orders` failure
 */
export const btceEnvelopePolicy: EnvelopePolicy = {
  translateError: (_method, message) => (message === NO_ORDERS_MESSAGE ? { result: {} } : undefined),
};

export interface AccountHistory {
  transactions: Transaction[];
  trades: Trade[];
  failures: ReconciliationError[];
}

export interface BtceClient extends IExchangeClient {
  readonly public: BtcePublicClient;
  /** Deposits, withdrawals and reconciled trades in one pass; failures are returned, not raised */
  getAccountHistory(limit?: number): Promise<Result<AccountHistory, Error>>;
}

/**
 * Factory function that creates a BTC-e trade API client
 */
export function createBtceClient(
  credentials: ExchangeCredentials,
  options: ExchangeClientOptions = {}
): Result<BtceClient, Error> {
  return ExchangeUtils.validateCredentials(SignedCredentialsSchema, credentials, BTCE_EXCHANGE_ID).map(
    ({ apiKey, secret, nonce }) => {
      const logger = getLogger('BtceClient');
      const endpoints = getExchangeEndpoints();
      const timeoutMs = options.timeoutMs ?? getHttpTimeoutMs();

      const httpClient = new HttpClient(
        {
          baseUrl: options.baseUrls?.trade ?? endpoints.btceTradeApiUrl,
          providerName: BTCE_EXCHANGE_ID,
          timeout: timeoutMs,
        },
        options.httpEffects
      );
      const publicClient = createBtcePublicClient({
        baseUrl: options.baseUrls?.public ?? endpoints.btcePublicApiUrl,
        httpEffects: options.httpEffects,
        timeoutMs,
      });
      const endpoint = new SignedEndpoint({
        credentials: { apiKey, secret },
        exchangeId: BTCE_EXCHANGE_ID,
        httpClient,
        nonces: new NonceCounter(BTCE_EXCHANGE_ID, nonce ?? 0, BTCE_NONCE_LIMIT),
        policy: btceEnvelopePolicy,
      });

      async function requireListed(market: Market): Promise<Result<string, Error>> {
        const markets = await publicClient.getMarkets();
        return markets.andThen((listed) =>
          listed.some((candidate) => marketsEqual(candidate, market))
            ? ok(marketToPair(market))
            : err(new MarketNotFoundError(formatMarket(market), BTCE_EXCHANGE_ID))
        );
      }

      async function placeOrder(
        type: 'buy' | 'sell',
        market: Market,
        quantity: Decimal.Value,
        price: Decimal.Value
      ): Promise<Result<string, Error>> {
        const pair = await requireListed(market);
        if (pair.isErr()) {
          return err(pair.error);
        }

        const placed = await endpoint.call('Trade', BtcePlaceOrderSchema, {
          pair: pair.value,
          type,
          rate: decimalToString(price),
          amount: decimalToString(quantity),
        });
        return placed.map((response) => {
          logger.info(`Placed ${type} order ${response.order_id} on ${formatMarket(market)}`);
          return response.order_id;
        });
      }

      async function reconcile(limit: number, scope: ReconcileOptions): Promise<Result<AccountHistory, Error>> {
        const history = await endpoint.call('TransHistory', BtceTransHistorySchema, { count: limit });
        if (history.isErr()) {
          return err(history.error);
        }

        let tradeHistory: Record<string, BtceTradeHistoryEntry> = {};
        if (scope.trades) {
          const trades = await endpoint.call('TradeHistory', BtceTradeHistorySchema, { count: limit });
          if (trades.isErr()) {
            return err(trades.error);
          }
          tradeHistory = trades.value;
        }

        const result = reconcileTransactionHistory(history.value, tradeHistory, scope);
        if (result.failures.length > 0) {
          logger.warn(`${result.failures.length} history entries could not be reconciled`);
        }
        return ok(result);
      }

      return {
        exchangeId: BTCE_EXCHANGE_ID,
        public: publicClient,

        async getMarkets() {
          return publicClient.getMarkets();
        },

        async getMyOpenOrders() {
          const orders = await endpoint.call('ActiveOrders', BtceActiveOrdersSchema);
          return orders.andThen((data) =>
            Result.combine(
              Object.entries(data).map(([orderId, row]) =>
                pairToMarket(row.pair).map(
                  (market): Order =>
                    createOrder({
                      side: row.type,
                      orderId,
                      baseCurrency: market.baseCurrency,
                      counterCurrency: market.counterCurrency,
                      datetime: fromEpochSeconds(row.timestamp_created),
                      amount: row.amount,
                      price: row.rate,
                    })
                )
              )
            )
          );
        },

        async getMyTrades(limit = DEFAULT_HISTORY_LIMIT) {
          const history = await reconcile(limit, { trades: true, transactions: false });
          return history.andThen(({ trades, failures }) =>
            failures.length === 0
              ? ok(trades)
              : err(
                  new PartialReconciliationError(
                    `${failures.length} of ${trades.length + failures.length} trades could not be reconciled`,
                    trades,
                    failures
                  )
                )
          );
        },

        async cancelOrder(orderId) {
          const cancelled = await endpoint.call('CancelOrder', BtceCancelOrderSchema, { order_id: orderId });
          return cancelled.map(() => undefined);
        },

        async buy(market, quantity, price) {
          return placeOrder('buy', market, quantity, price);
        },

        async sell(market, quantity, price) {
          return placeOrder('sell', market, quantity, price);
        },

        async getMyTransactions(limit = DEFAULT_HISTORY_LIMIT) {
          const history = await reconcile(limit, { trades: false, transactions: true });
          return history.map(({ transactions }) => transactions);
        },

        async getMyFunds() {
          const info = await endpoint.call('getInfo', BtceAccountInfoSchema);
          return info.map(({ funds }) => {
            const snapshot: FundsSnapshot = {};
            for (const [currency, amount] of Object.entries(funds)) {
              snapshot[currency.toUpperCase()] = amount;
            }
            return snapshot;
          });
        },

        async getAccountHistory(limit = DEFAULT_HISTORY_LIMIT) {
          return reconcile(limit, { trades: true, transactions: true });
        },

        async close() {
          await Promise.all([httpClient.close(), publicClient.close()]);
        },
      };
    }
  );
}
