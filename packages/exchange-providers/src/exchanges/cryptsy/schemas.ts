import { CurrencyCodeSchema, DecimalSchema, IdentifierSchema, IntegerSchema } from '@ledgerline/core';
import { z } from 'zod';

const OrderTypeSchema = z.enum(['Buy', 'Sell']);

export const CryptsyMarketSchema = z
  .object({
    marketid: IdentifierSchema,
    label: z.string().optional(), // e.g. "LTC/BTC"
    primary_currency_code: CurrencyCodeSchema,
    secondary_currency_code: CurrencyCodeSchema,
  })
  .passthrough();

export const CryptsyMarketsSchema = z.array(CryptsyMarketSchema);

export const CryptsyInfoSchema = z
  .object({
    balances_available: z.record(z.string(), DecimalSchema),
    servertimezone: z.string().optional(), // IANA zone, e.g. "EST"
    serverdatetime: z.string().optional(),
  })
  .passthrough();

export const CryptsyTradeSchema = z.object({
  tradeid: IdentifierSchema,
  tradetype: OrderTypeSchema,
  datetime: z.string(),
  marketid: IdentifierSchema.optional(), // Absent from `mytrades`
  tradeprice: DecimalSchema,
  quantity: DecimalSchema,
  fee: DecimalSchema, // Always in the counter currency
  total: DecimalSchema.optional(),
  initiate_ordertype: z.string().optional(),
  order_id: IdentifierSchema,
});

export const CryptsyTradesSchema = z.array(CryptsyTradeSchema);

export const CryptsyOrderSchema = z.object({
  orderid: IdentifierSchema,
  created: z.string(),
  ordertype: OrderTypeSchema,
  marketid: IdentifierSchema.optional(), // Absent from `myorders`
  price: DecimalSchema,
  quantity: DecimalSchema,
  orig_quantity: DecimalSchema.optional(),
  total: DecimalSchema.optional(),
});

export const CryptsyOrdersSchema = z.array(CryptsyOrderSchema);

export const CryptsyCreateOrderSchema = z.object({
  orderid: IdentifierSchema,
  moreinfo: z.string().optional(),
});

// Confirmation text only
export const CryptsyCancelOrderSchema = z.unknown();

export const CryptsyTransactionSchema = z.object({
  currency: z.string(),
  datetime: z.string(),
  type: z.string(), // Deposit | Withdrawal
  address: z
    .string()
    .nullish()
    .transform((value) => value ?? ''),
  amount: DecimalSchema,
  fee: DecimalSchema,
  trxid: IdentifierSchema,
});

export const CryptsyTransactionsSchema = z.array(CryptsyTransactionSchema);

export const CryptsyTransferSchema = z.object({
  from: z.string(),
  to: z.string(),
  direction: z.string(), // in | out
  currency: z.string(),
  quantity: DecimalSchema,
  req_timestamp: z.string(),
  processed: IntegerSchema,
  processed_timestamp: z.string().nullish(),
});

// Rows are kept raw as well, the transfer id is a hash of their content
export const CryptsyTransfersSchema = z.array(z.record(z.string(), z.unknown()));

export const CryptsyMarketOrdersSchema = z.object({
  sellorders: z.array(z.object({ sellprice: DecimalSchema, quantity: DecimalSchema, total: DecimalSchema })),
  buyorders: z.array(z.object({ buyprice: DecimalSchema, quantity: DecimalSchema, total: DecimalSchema })),
});

export const CryptsyMarketTradesSchema = z.array(
  z.object({
    tradeid: IdentifierSchema,
    datetime: z.string(),
    tradeprice: DecimalSchema,
    quantity: DecimalSchema,
    total: DecimalSchema,
    initiate_ordertype: z.string(),
  })
);

export type CryptsyMarket = z.infer<typeof CryptsyMarketSchema>;
export type CryptsyTrade = z.infer<typeof CryptsyTradeSchema>;
export type CryptsyOrder = z.infer<typeof CryptsyOrderSchema>;
export type CryptsyTransaction = z.infer<typeof CryptsyTransactionSchema>;
export type CryptsyTransfer = z.infer<typeof CryptsyTransferSchema>;
