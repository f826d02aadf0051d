import { describe, expect, test } from 'vitest';

import { parseTradeDescription } from '../trade-description.js';

describe('parseTradeDescription', () => {
  test('parses a buy', () => {
    expect(parseTradeDescription('0.5 BTC (-0.2%) :order:123: ... 100 USD')).toEqual({
      amount: '0.5',
      baseCurrency: 'BTC',
      counterCurrency: 'USD',
      feePercent: '0.2',
      kind: 'buy',
      orderId: '123',
      price: '100',
    });
  });

  test('parses a buy with a leading verb and lowercase codes', () => {
    expect(parseTradeDescription('Bought 1.25 ltc (-0.2%) from your order :order:55: by price 0.02 btc')).toEqual({
      amount: '1.25',
      baseCurrency: 'LTC',
      counterCurrency: 'BTC',
      feePercent: '0.2',
      kind: 'buy',
      orderId: '55',
      price: '0.02',
    });
  });

  test('parses a sell', () => {
    const description = 'Sold 0.5 BTC from your order :order:124: by price 100 USD total 49.9 USD (-0.2%)';

    expect(parseTradeDescription(description)).toEqual({
      amount: '0.5',
      baseCurrency: 'BTC',
      counterCurrency: 'USD',
      feePercent: '0.2',
      kind: 'sell',
      orderId: '124',
      price: '100',
      total: '49.9',
    });
  });

  test('keeps amount text verbatim', () => {
    const parsed = parseTradeDescription('0.50000000 BTC (-0.2%) :order:1: at 100.000 USD');

    expect(parsed).toMatchObject({ amount: '0.50000000', price: '100.000' });
  });

  test('requires the sell total in the counter currency', () => {
    const description = 'Sold 0.5 BTC from your order :order:124: by price 100 USD total 49.9 EUR (-0.2%)';

    expect(parseTradeDescription(description)).toEqual({ kind: 'none' });
  });

  test.each(['Funds deposit via bank transfer', 'BTC Payment to address 1TestAddr', ''])(
    'returns none for %j',
    (description) => {
      expect(parseTradeDescription(description)).toEqual({ kind: 'none' });
    }
  );
});
