import type { Market, Order, Trade, Transaction } from '@ledgerline/core';
import type { HttpEffects } from '@ledgerline/http';
import type { Decimal } from 'decimal.js';
import type { Result } from 'neverthrow';

/**
 * Generic exchange credentials type
 * Each exchange validates its own required fields via Zod schemas
 */
export type ExchangeCredentials = Record<string, string>;

/**
 * Optional wiring for a client instance. Anything left out comes from the environment.
 */
export interface ExchangeClientOptions {
  /** Replace transport side effects, e.g. a fake fetch in tests */
  httpEffects?: Partial<HttpEffects> | undefined;
  timeoutMs?: number | undefined;
  /** Override base URLs by role (`trade`, `public`) */
  baseUrls?: Partial<Record<'public' | 'trade', string>> | undefined;
}

/**
 * Available balance per uppercase currency code
 */
export type FundsSnapshot = Record<string, Decimal>;

/**
 * Base interface for exchange clients
 */
export interface IExchangeClient {
  readonly exchangeId: string;

  getMarkets(): Promise<Result<Market[], Error>>;

  getMyOpenOrders(): Promise<Result<Order[], Error>>;

  getMyTrades(limit?: number): Promise<Result<Trade[], Error>>;

  cancelOrder(orderId: string): Promise<Result<void, Error>>;

  /**
   * Place a limit buy, resolving to the exchange's order id
   */
  buy(market: Market, quantity: Decimal.Value, price: Decimal.Value): Promise<Result<string, Error>>;

  sell(market: Market, quantity: Decimal.Value, price: Decimal.Value): Promise<Result<string, Error>>;

  getMyTransactions(limit?: number): Promise<Result<Transaction[], Error>>;

  getMyFunds(): Promise<Result<FundsSnapshot, Error>>;

  /**
   * Release keep-alive connections. Idempotent.
   */
  close(): Promise<void>;
}
