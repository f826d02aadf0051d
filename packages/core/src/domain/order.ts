import type { Decimal } from 'decimal.js';

export type OrderSide = 'buy' | 'sell';

/**
 * Snapshot of a resting, unfulfilled order. Re-fetched wholesale, never updated in place.
 */
export interface Order {
  readonly side: OrderSide;
  readonly orderId: string;
  readonly baseCurrency: string;
  readonly counterCurrency: string;
  readonly datetime: Date;
  readonly amount: Decimal;
  readonly price: Decimal;
}

export function createOrder(input: Order): Order {
  return Object.freeze({ ...input });
}
