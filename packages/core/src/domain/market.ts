/**
 * Ordered (base, counter) currency pair identifying a tradeable instrument.
 * Exchanges use their own native identifiers; clients own the mapping to and from this shape.
 */
export interface Market {
  readonly baseCurrency: string;
  readonly counterCurrency: string;
}

export function createMarket(baseCurrency: string, counterCurrency: string): Market {
  return Object.freeze({
    baseCurrency: baseCurrency.trim().toUpperCase(),
    counterCurrency: counterCurrency.trim().toUpperCase(),
  });
}

export function marketsEqual(a: Market, b: Market): boolean {
  return a.baseCurrency === b.baseCurrency && a.counterCurrency === b.counterCurrency;
}

/**
 * Human-readable form, e.g. BTC/USD
 */
export function formatMarket(market: Market): string {
  return `${market.baseCurrency}/${market.counterCurrency}`;
}
