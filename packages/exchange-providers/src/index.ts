/**
 * @ledgerline/exchange-providers
 *
 * BTC-e and Cryptsy clients over a shared signed-request protocol.
 * Responses are decoded with exact decimals and normalized into the domain model of @ledgerline/core.
 */

// Core
export { PublicEndpoint, SignedEndpoint } from './core/endpoint.js';
export type { ResponseSchema, SignedEndpointConfig } from './core/endpoint.js';
export { classifyNonceError, unwrapEnvelope } from './core/envelope.js';
export type { EnvelopeContext, EnvelopePolicy } from './core/envelope.js';
export {
  ExchangeApiError,
  InvalidNonceError,
  MarketNotFoundError,
  NonceLimitReachedError,
  PartialReconciliationError,
  ReconciliationError,
} from './core/errors.js';
export { decodeExactJson } from './core/exact-json.js';
export { createSingleFlight } from './core/exchange-utils.js';
export { createExchangeClient } from './core/factory.js';
export { NonceCounter } from './core/nonce.js';
export { SignedCredentialsSchema } from './core/schemas.js';
export { buildSignedRequest, signPayload } from './core/signing.js';
export type { ExchangeClientOptions, ExchangeCredentials, FundsSnapshot, IExchangeClient } from './core/types.js';

// BTC-e
export { btceEnvelopePolicy, createBtceClient } from './exchanges/btce/client.js';
export type { AccountHistory, BtceClient } from './exchanges/btce/client.js';
export { marketToPair, pairToMarket } from './exchanges/btce/btce-utils.js';
export { createBtcePublicClient } from './exchanges/btce/public-client.js';
export type {
  BtceDepth,
  BtcePublicClient,
  BtcePublicTrade,
  BtceServerInfo,
  BtceTickerSnapshot,
} from './exchanges/btce/public-client.js';
export { parseTradeDescription } from './exchanges/btce/trade-description.js';
export type { ParsedTradeDescription } from './exchanges/btce/trade-description.js';
export {
  extractWithdrawalAddress,
  matchTradeId,
  reconcileTransactionHistory,
} from './exchanges/btce/transaction-history.js';
export type { ReconcileOptions, ReconciliationResult } from './exchanges/btce/transaction-history.js';

// Cryptsy
export { createCryptsyClient, cryptsyEnvelopePolicy } from './exchanges/cryptsy/client.js';
export type { CryptsyClient, CryptsyMarketTrade, CryptsyOrderBook } from './exchanges/cryptsy/client.js';
export { parseServerDatetime } from './exchanges/cryptsy/cryptsy-utils.js';
