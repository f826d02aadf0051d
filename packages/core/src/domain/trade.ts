import type { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { ValidationError } from '../errors/index.js';

export type TradeSide = 'buy' | 'sell';

/**
 * An executed fill. The fee of a buy is paid in the base currency, the fee of a sell in the counter currency.
 */
export interface Trade {
  readonly side: TradeSide;
  readonly tradeId: string;
  readonly baseCurrency: string;
  readonly counterCurrency: string;
  readonly datetime: Date;
  readonly orderId: string;
  readonly amount: Decimal;
  readonly price: Decimal;
  readonly fee: Decimal;
  readonly feeCurrency: string;
}

export type TradeInput = Omit<Trade, 'feeCurrency'> & { feeCurrency?: string | undefined };

export function feeCurrencyFor(side: TradeSide, baseCurrency: string, counterCurrency: string): string {
  return side === 'buy' ? baseCurrency : counterCurrency;
}

/**
 * Build a Trade, enforcing finite values, amount > 0, price > 0, fee >= 0 and the fee currency of its side
 */
export function createTrade(input: TradeInput): Result<Trade, ValidationError> {
  const expectedFeeCurrency = feeCurrencyFor(input.side, input.baseCurrency, input.counterCurrency);
  const invalid = (reason: string) =>
    err(new ValidationError(`Trade ${input.tradeId} ${reason}`, { orderId: input.orderId, tradeId: input.tradeId }));

  for (const [field, value] of [
    ['amount', input.amount],
    ['price', input.price],
    ['fee', input.fee],
  ] as const) {
    if (!value.isFinite()) {
      return invalid(`${field} must be a finite number, got ${value.toFixed()}`);
    }
  }
  if (!input.amount.greaterThan(0)) {
    return invalid(`amount must be positive, got ${input.amount.toFixed()}`);
  }
  if (!input.price.greaterThan(0)) {
    return invalid(`price must be positive, got ${input.price.toFixed()}`);
  }
  if (input.fee.isNegative()) {
    return invalid(`fee must not be negative, got ${input.fee.toFixed()}`);
  }
  if (input.feeCurrency !== undefined && input.feeCurrency !== expectedFeeCurrency) {
    return invalid(`is a ${input.side}, its fee must be in ${expectedFeeCurrency} not ${input.feeCurrency}`);
  }

  return ok(Object.freeze({ ...input, feeCurrency: expectedFeeCurrency }));
}

/**
 * Counter-currency value of the fill before fees
 */
export function grossValue(trade: Trade): Decimal {
  return trade.amount.times(trade.price);
}
