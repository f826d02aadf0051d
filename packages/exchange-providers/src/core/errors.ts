import type { Trade } from '@ledgerline/core';

/**
 * The exchange answered, but with a failure: `success` 0, an empty body or one that does not decode.
 */
export class ExchangeApiError extends Error {
  constructor(
    message: string,
    public readonly exchangeId: string,
    public readonly method?: string
  ) {
    super(message);
    this.name = 'ExchangeApiError';
  }
}

/**
 * The exchange rejected the nonce. Fatal for the credential set: never retried.
 */
export class InvalidNonceError extends Error {
  constructor(
    message: string,
    public readonly exchangeId: string,
    public readonly sentNonce?: number
  ) {
    super(message);
    this.name = 'InvalidNonceError';
  }
}

/**
 * The key has used up its nonces, or the exchange already saw a larger one.
 * `minimumNonce` is the smallest value the exchange would still accept, when known.
 */
export class NonceLimitReachedError extends InvalidNonceError {
  constructor(
    message: string,
    exchangeId: string,
    sentNonce?: number,
    public readonly minimumNonce?: number
  ) {
    super(message, exchangeId, sentNonce);
    this.name = 'NonceLimitReachedError';
  }
}

export class MarketNotFoundError extends ExchangeApiError {
  constructor(
    public readonly market: string,
    exchangeId: string
  ) {
    super(`Market not found: ${market}`, exchangeId);
    this.name = 'MarketNotFoundError';
  }
}

/**
 * A history entry whose description parsed as a trade, but whose trade id could not be recovered.
 */
export class ReconciliationError extends Error {
  constructor(
    message: string,
    public readonly historyId: string,
    public readonly orderId: string,
    public readonly timestamp: number,
    public readonly candidateCount: number
  ) {
    super(message);
    this.name = 'ReconciliationError';
  }
}

/**
 * Carries the trades that did reconcile alongside the per-entry failures.
 */
export class PartialReconciliationError extends Error {
  constructor(
    message: string,
    public readonly trades: Trade[],
    public readonly failures: ReconciliationError[]
  ) {
    super(message);
    this.name = 'PartialReconciliationError';
  }
}
