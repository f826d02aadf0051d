import { createMarket, formatQuantized } from '@ledgerline/core';
import { Decimal } from 'decimal.js';
import { afterEach, describe, expect, test } from 'vitest';

import { createFakeExchange, type FakeExchangeRoutes } from '../../../__tests__/test-helpers.js';
import { ExchangeApiError, MarketNotFoundError, PartialReconciliationError } from '../../../core/errors.js';
import { createBtceClient, type BtceClient } from '../client.js';

const INFO =
  '{"server_time":1370814956,"pairs":{' +
  '"btc_usd":{"decimal_places":3,"min_price":0.1,"max_price":3200,"min_amount":0.01,"hidden":0,"fee":0.2},' +
  '"ltc_btc":{"decimal_places":5,"min_price":0.0001,"max_price":10,"min_amount":0.1,"hidden":0,"fee":0.2}}}';

const BUY_DESC = '0.5 BTC (-0.2%) :order:123: ... 100 USD';

const btcUsd = createMarket('BTC', 'USD');

describe('createBtceClient', () => {
  const clients: BtceClient[] = [];

  function setup(routes: FakeExchangeRoutes, credentials: Record<string, string> = {}) {
    const fake = createFakeExchange({ public: { info: INFO, ...routes.public }, signed: routes.signed });
    const client = createBtceClient(
      { apiKey: 'test-key', secret: 'test-secret', ...credentials },
      fake.options
    )._unsafeUnwrap();
    clients.push(client);
    return { client, fake };
  }

  afterEach(async () => {
    await Promise.all(clients.splice(0).map((client) => client.close()));
  });

  test('returns error with missing secret', () => {
    const result = createBtceClient({ apiKey: 'test-key' });

    expect(result._unsafeUnwrapErr().message).toMatch(/^Invalid btce credentials: /);
  });

  test('returns error for a nonce beyond the safe integer range', () => {
    const result = createBtceClient({ apiKey: 'test-key', nonce: '9007199254740993', secret: 'test-secret' });

    const message = result._unsafeUnwrapErr().message;
    expect(message).toMatch(/^Invalid btce credentials: /);
    expect(message).toContain('nonce must be a safe integer');
  });

  test('lists markets from the public info pairs', async () => {
    const { client } = setup({});

    const markets = await client.getMarkets();

    expect(markets._unsafeUnwrap()).toEqual([
      { baseCurrency: 'BTC', counterCurrency: 'USD' },
      { baseCurrency: 'LTC', counterCurrency: 'BTC' },
    ]);
  });

  describe('getMyOpenOrders', () => {
    test('maps no orders to an empty list', async () => {
      const { client } = setup({ signed: { ActiveOrders: { error: 'no orders', success: 0 } } });

      expect((await client.getMyOpenOrders())._unsafeUnwrap()).toEqual([]);
    });

    test('maps active orders', async () => {
      const { client } = setup({
        signed: {
          ActiveOrders:
            '{"success":1,"return":{"343152":{"pair":"btc_usd","type":"sell","amount":1.00000000,' +
            '"rate":3.00000000,"timestamp_created":1342448420,"status":0}}}',
        },
      });

      const [order, ...rest] = (await client.getMyOpenOrders())._unsafeUnwrap();

      expect(rest).toEqual([]);
      expect(order).toMatchObject({ baseCurrency: 'BTC', counterCurrency: 'USD', orderId: '343152', side: 'sell' });
      expect(order?.amount.toFixed()).toBe('1');
      expect(order?.price.toFixed()).toBe('3');
      expect(order?.datetime.toISOString()).toBe('2012-07-16T14:20:20.000Z');
    });
  });

  describe('getMyFunds', () => {
    test('upper-cases currencies and keeps exact amounts', async () => {
      const { client } = setup({
        signed: { getInfo: '{"success":1,"return":{"funds":{"usd":325,"btc":0.10000001},"open_orders":0}}' },
      });

      const funds = (await client.getMyFunds())._unsafeUnwrap();

      expect(Object.keys(funds)).toEqual(['USD', 'BTC']);
      expect(funds['BTC']?.toFixed()).toBe('0.10000001');
      expect(funds['USD']?.toFixed()).toBe('325');
    });

    test('surfaces remote errors', async () => {
      const { client } = setup({ signed: { getInfo: { error: 'bad request', success: 0 } } });

      const error = (await client.getMyFunds())._unsafeUnwrapErr();

      expect(error).toBeInstanceOf(ExchangeApiError);
      expect(error).toMatchObject({ exchangeId: 'btce', message: 'bad request', method: 'getInfo' });
    });
  });

  describe('orders', () => {
    test('places a buy with plain decimal strings', async () => {
      const { client, fake } = setup({
        signed: { Trade: '{"success":1,"return":{"received":0,"remains":0.00000001,"order_id":12345}}' },
      });

      const orderId = await client.buy(btcUsd, new Decimal('0.00000001'), '100.5');

      expect(orderId._unsafeUnwrap()).toBe('12345');
      expect(fake.signedBodies()).toEqual(['method=Trade&nonce=0&pair=btc_usd&type=buy&rate=100.5&amount=0.00000001']);
    });

    test('places a sell', async () => {
      const { client, fake } = setup({ signed: { Trade: { return: { order_id: 777 }, success: 1 } } });

      expect((await client.sell(createMarket('ltc', 'btc'), 2, '0.03'))._unsafeUnwrap()).toBe('777');
      expect(fake.signedBodies()).toEqual(['method=Trade&nonce=0&pair=ltc_btc&type=sell&rate=0.03&amount=2']);
    });

    test('refuses an unlisted market without signing anything', async () => {
      const { client, fake } = setup({});

      const error = (await client.sell(createMarket('DOGE', 'USD'), 1, 1))._unsafeUnwrapErr();

      expect(error).toBeInstanceOf(MarketNotFoundError);
      expect(error.message).toBe('Market not found: DOGE/USD');
      expect(fake.signedBodies()).toEqual([]);
    });

    test('cancels an order', async () => {
      const { client, fake } = setup({
        signed: { CancelOrder: { return: { funds: { btc: 1 }, order_id: 343154 }, success: 1 } },
      });

      expect((await client.cancelOrder('343154')).isOk()).toBe(true);
      expect(fake.signedBodies()).toEqual(['method=CancelOrder&nonce=0&order_id=343154']);
    });

    test('resumes from the nonce in the credentials', async () => {
      const cancelled = { return: { order_id: 1 }, success: 1 };
      const { client, fake } = setup({ signed: { CancelOrder: cancelled } }, { nonce: '50' });

      await client.cancelOrder('1');
      await client.cancelOrder('1');

      expect(fake.signedBodies()).toEqual([
        'method=CancelOrder&nonce=50&order_id=1',
        'method=CancelOrder&nonce=51&order_id=1',
      ]);
    });
  });

  describe('history', () => {
    const transHistory = {
      return: {
        '1': { amount: 0.5, currency: 'BTC', desc: BUY_DESC, status: 2, timestamp: 1000, type: 4 },
        '2': {
          amount: 1,
          currency: 'BTC',
          desc: 'BTC Payment to address 1TestAddr',
          status: 2,
          timestamp: 900,
          type: 2,
        },
      },
      success: 1,
    };
    const tradeHistory = {
      return: {
        t1: { amount: 0.5, order_id: 123, pair: 'btc_usd', rate: 100, timestamp: 1000, type: 'buy' },
      },
      success: 1,
    };

    test('getMyTransactions only reads the history feed', async () => {
      const { client, fake } = setup({ signed: { TransHistory: transHistory } });

      const transactions = (await client.getMyTransactions())._unsafeUnwrap();

      expect(fake.signedBodies()).toEqual(['method=TransHistory&nonce=0&count=1000']);
      expect(transactions).toHaveLength(1);
      expect(transactions[0]).toMatchObject({ address: '1TestAddr', kind: 'withdrawal', transactionId: '2' });
    });

    test('getMyTrades reconciles both feeds', async () => {
      const { client, fake } = setup({ signed: { TradeHistory: tradeHistory, TransHistory: transHistory } });

      const trades = (await client.getMyTrades(50))._unsafeUnwrap();

      expect(fake.signedBodies()).toEqual([
        'method=TransHistory&nonce=0&count=50',
        'method=TradeHistory&nonce=1&count=50',
      ]);
      expect(trades.map((trade) => trade.tradeId)).toEqual(['t1']);
      expect(trades[0] && formatQuantized(trades[0].fee)).toBe('0.00100000');
    });

    test('getMyTrades treats empty feeds as no trades', async () => {
      const noOrders = { error: 'no orders', success: 0 };
      const { client } = setup({ signed: { TradeHistory: noOrders, TransHistory: noOrders } });

      expect((await client.getMyTrades())._unsafeUnwrap()).toEqual([]);
    });

    test('getMyTrades reports unreconciled entries with the trades that did reconcile', async () => {
      const { client } = setup({
        signed: { TradeHistory: { error: 'no orders', success: 0 }, TransHistory: transHistory },
      });

      const error = (await client.getMyTrades())._unsafeUnwrapErr();

      expect(error).toBeInstanceOf(PartialReconciliationError);
      if (error instanceof PartialReconciliationError) {
        expect(error.message).toBe('1 of 1 trades could not be reconciled');
        expect(error.trades).toEqual([]);
        expect(error.failures.map((failure) => failure.historyId)).toEqual(['1']);
      }
    });

    test('getAccountHistory returns everything without failing the batch', async () => {
      const { client } = setup({
        signed: { TradeHistory: { error: 'no orders', success: 0 }, TransHistory: transHistory },
      });

      const history = (await client.getAccountHistory())._unsafeUnwrap();

      expect(history.transactions.map((tx) => tx.transactionId)).toEqual(['2']);
      expect(history.trades).toEqual([]);
      expect(history.failures).toHaveLength(1);
    });
  });
});
