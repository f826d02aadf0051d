import { createMarket, type Market } from '@ledgerline/core';
import { err, ok, type Result } from 'neverthrow';

export const BTCE_EXCHANGE_ID = 'btce';

/**
 * BTC-e refuses nonces above this value; the key must be replaced once it is reached
 */
export const BTCE_NONCE_LIMIT = 4294967294;

/**
 * `btc_usd` -> { BTC, USD }
 */
export function pairToMarket(pair: string): Result<Market, Error> {
  const parts = pair.split('_');
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    return err(new Error(`Unrecognized BTC-e pair: ${pair}`));
  }
  return ok(createMarket(parts[0], parts[1]));
}

/**
 * { BTC, USD } -> `btc_usd`
 */
export function marketToPair(market: Market): string {
  return `${market.baseCurrency}_${market.counterCurrency}`.toLowerCase();
}

/**
 * Epoch seconds -> UTC Date
 */
export function fromEpochSeconds(seconds: number): Date {
  return new Date(seconds * 1000);
}
