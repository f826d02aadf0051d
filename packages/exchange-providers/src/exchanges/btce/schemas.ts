import {
  CurrencyCodeSchema,
  DecimalSchema,
  IdentifierSchema,
  IntegerSchema,
  NumericTextSchema,
} from '@ledgerline/core';
import { z } from 'zod';

const SideSchema = z.enum(['buy', 'sell']);

// ---- Public API v3 ----

export const BtcePairInfoSchema = z
  .object({
    decimal_places: IntegerSchema, // Price precision
    min_price: DecimalSchema,
    max_price: DecimalSchema,
    min_amount: DecimalSchema,
    hidden: IntegerSchema.optional(), // 1 when the pair is not listed
    fee: DecimalSchema, // Trade fee in percent
  })
  .passthrough();

export const BtceInfoSchema = z.object({
  server_time: IntegerSchema, // Epoch seconds
  pairs: z.record(z.string(), BtcePairInfoSchema),
});

export const BtceTickerSchema = z.record(
  z.string(),
  z.object({
    high: DecimalSchema,
    low: DecimalSchema,
    avg: DecimalSchema,
    vol: DecimalSchema, // Volume in the counter currency
    vol_cur: DecimalSchema, // Volume in the base currency
    last: DecimalSchema,
    buy: DecimalSchema,
    sell: DecimalSchema,
    updated: IntegerSchema,
  })
);

const DepthLevelSchema = z.tuple([DecimalSchema, DecimalSchema]); // [price, amount]

export const BtceDepthSchema = z.record(
  z.string(),
  z.object({
    asks: z.array(DepthLevelSchema),
    bids: z.array(DepthLevelSchema),
  })
);

export const BtcePublicTradesSchema = z.record(
  z.string(),
  z.array(
    z.object({
      type: z.enum(['ask', 'bid']),
      price: DecimalSchema,
      amount: DecimalSchema,
      tid: IdentifierSchema,
      timestamp: IntegerSchema,
    })
  )
);

// ---- Trade API ----

export const BtceAccountInfoSchema = z
  .object({
    funds: z.record(z.string(), DecimalSchema),
    open_orders: IntegerSchema.optional(),
    server_time: IntegerSchema.optional(),
    transaction_count: IntegerSchema.optional(),
  })
  .passthrough();

export const BtceActiveOrdersSchema = z.record(
  z.string(), // Order id
  z.object({
    pair: z.string(),
    type: SideSchema,
    amount: DecimalSchema,
    rate: DecimalSchema,
    timestamp_created: IntegerSchema,
    status: IntegerSchema.optional(),
  })
);

export const BtcePlaceOrderSchema = z
  .object({
    received: DecimalSchema.optional(),
    remains: DecimalSchema.optional(),
    order_id: IdentifierSchema, // 0 when the order filled immediately
  })
  .passthrough();

export const BtceCancelOrderSchema = z.object({ order_id: IdentifierSchema }).passthrough();

export const BtceTransHistoryEntrySchema = z.object({
  type: IntegerSchema, // 1 deposit, 2 withdrawal, 4/5 trade
  amount: DecimalSchema,
  currency: CurrencyCodeSchema,
  desc: z.string(),
  status: IntegerSchema,
  timestamp: IntegerSchema,
});

export const BtceTransHistorySchema = z.record(z.string(), BtceTransHistoryEntrySchema);

export const BtceTradeHistoryEntrySchema = z.object({
  pair: z.string(),
  type: SideSchema,
  amount: NumericTextSchema, // Kept verbatim, compared as text during reconciliation
  rate: NumericTextSchema,
  order_id: IdentifierSchema,
  is_your_order: IntegerSchema.optional(),
  timestamp: IntegerSchema,
});

export const BtceTradeHistorySchema = z.record(z.string(), BtceTradeHistoryEntrySchema);

export type BtceInfo = z.infer<typeof BtceInfoSchema>;
export type BtceTicker = z.infer<typeof BtceTickerSchema>;
export type BtceTransHistoryEntry = z.infer<typeof BtceTransHistoryEntrySchema>;
export type BtceTradeHistoryEntry = z.infer<typeof BtceTradeHistoryEntrySchema>;
