import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import { ValidationError } from '../../errors/index.js';
import { createMarket, formatMarket, marketsEqual } from '../market.js';
import { createTrade, grossValue, type TradeInput } from '../trade.js';

const baseInput: TradeInput = {
  side: 'buy',
  tradeId: 't1',
  baseCurrency: 'BTC',
  counterCurrency: 'USD',
  datetime: new Date('2014-03-01T12:00:00Z'),
  orderId: '123',
  amount: new Decimal('0.5'),
  price: new Decimal('100'),
  fee: new Decimal('0.001'),
};

describe('createTrade', () => {
  it('should derive the base currency as fee currency of a buy', () => {
    const trade = createTrade(baseInput)._unsafeUnwrap();

    expect(trade.feeCurrency).toBe('BTC');
    expect(Object.isFrozen(trade)).toBe(true);
  });

  it('should derive the counter currency as fee currency of a sell', () => {
    const trade = createTrade({ ...baseInput, side: 'sell' })._unsafeUnwrap();

    expect(trade.feeCurrency).toBe('USD');
  });

  it('should reject a fee currency that contradicts the side', () => {
    const result = createTrade({ ...baseInput, feeCurrency: 'USD' });

    expect(result._unsafeUnwrapErr()).toBeInstanceOf(ValidationError);
    expect(result._unsafeUnwrapErr().message).toBe('Trade t1 is a buy, its fee must be in BTC not USD');
  });

  it('should reject a non-positive amount', () => {
    const result = createTrade({ ...baseInput, amount: new Decimal(0) });

    expect(result._unsafeUnwrapErr().message).toBe('Trade t1 amount must be positive, got 0');
  });

  it('should reject a non-positive price', () => {
    const result = createTrade({ ...baseInput, price: new Decimal('-1') });

    expect(result._unsafeUnwrapErr().message).toBe('Trade t1 price must be positive, got -1');
  });

  it('should reject a negative fee and accept a zero fee', () => {
    expect(createTrade({ ...baseInput, fee: new Decimal('-0.1') }).isErr()).toBe(true);
    expect(createTrade({ ...baseInput, fee: new Decimal(0) }).isOk()).toBe(true);
  });

  it('should reject a NaN fee', () => {
    const result = createTrade({ ...baseInput, fee: new Decimal(NaN) });

    expect(result._unsafeUnwrapErr().message).toBe('Trade t1 fee must be a finite number, got NaN');
  });

  it('should reject infinite amounts and prices', () => {
    expect(createTrade({ ...baseInput, amount: new Decimal(Infinity) })._unsafeUnwrapErr().message).toBe(
      'Trade t1 amount must be a finite number, got Infinity'
    );
    expect(createTrade({ ...baseInput, price: new Decimal(Infinity) })._unsafeUnwrapErr().message).toBe(
      'Trade t1 price must be a finite number, got Infinity'
    );
  });

  it('should compute the gross counter value', () => {
    const trade = createTrade(baseInput)._unsafeUnwrap();

    expect(grossValue(trade).toFixed()).toBe('50');
  });
});

describe('Market', () => {
  it('should normalize currency codes', () => {
    const market = createMarket(' btc', 'usd ');

    expect(market).toEqual({ baseCurrency: 'BTC', counterCurrency: 'USD' });
    expect(formatMarket(market)).toBe('BTC/USD');
  });

  it('should compare by both currencies in order', () => {
    expect(marketsEqual(createMarket('BTC', 'USD'), createMarket('btc', 'usd'))).toBe(true);
    expect(marketsEqual(createMarket('BTC', 'USD'), createMarket('USD', 'BTC'))).toBe(false);
  });
});
