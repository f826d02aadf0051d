/**
 * Trade details recovered from a BTC-e history description.
 * Numeric fields keep the exact text of the description.
 */
export type ParsedTradeDescription =
  | {
      kind: 'buy';
      amount: string;
      baseCurrency: string;
      counterCurrency: string;
      feePercent: string;
      orderId: string;
      price: string;
    }
  | {
      kind: 'sell';
      amount: string;
      baseCurrency: string;
      counterCurrency: string;
      feePercent: string;
      orderId: string;
      price: string;
      total: string;
    }
  | { kind: 'none' };

// [Bought ]<amount> <BASE> (-<fee>%) ... :order:<id>: ... <price> <COUNTER>
const BUY_PATTERN =
  /^(?:[A-Za-z]+\s+)?(\d+(?:\.\d+)?)\s+([A-Za-z0-9]+)\s+\(-(\d+(?:\.\d+)?)%\)\s+.*?:order:(\d+):.*\s(\d+(?:\.\d+)?)\s+([A-Za-z0-9]+)\s*$/;

// [Sold ]<amount> <BASE> ... :order:<id>: ... <price> <COUNTER> total <total> <COUNTER> (-<fee>%)
const SELL_PATTERN =
  /^(?:[A-Za-z]+\s+)?(\d+(?:\.\d+)?)\s+([A-Za-z0-9]+)\s+.*?:order:(\d+):.*?\s(\d+(?:\.\d+)?)\s+([A-Za-z0-9]+)\s+total\s+(\d+(?:\.\d+)?)\s+\5\s+\(-(\d+(?:\.\d+)?)%\)\s*$/;

/**
 * Classify a history description as a buy, a sell or neither. The buy grammar is tried first.
 */
export function parseTradeDescription(text: string): ParsedTradeDescription {
  const buy = BUY_PATTERN.exec(text);
  if (buy) {
    const [, amount = '', base = '', feePercent = '', orderId = '', price = '', counter = ''] = buy;
    return {
      kind: 'buy',
      amount,
      baseCurrency: base.toUpperCase(),
      counterCurrency: counter.toUpperCase(),
      feePercent,
      orderId,
      price,
    };
  }

  const sell = SELL_PATTERN.exec(text);
  if (sell) {
    const [, amount = '', base = '', orderId = '', price = '', counter = '', total = '', feePercent = ''] = sell;
    return {
      kind: 'sell',
      amount,
      baseCurrency: base.toUpperCase(),
      counterCurrency: counter.toUpperCase(),
      feePercent,
      orderId,
      price,
      total,
    };
  }

  return { kind: 'none' };
}
