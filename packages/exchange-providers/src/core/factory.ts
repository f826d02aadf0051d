import type { Result } from 'neverthrow';
import { err } from 'neverthrow';

import { createBtceClient } from '../exchanges/btce/client.js';
import { createCryptsyClient } from '../exchanges/cryptsy/client.js';

import type { ExchangeClientOptions, ExchangeCredentials, IExchangeClient } from './types.js';

/**
 * Create an exchange client for the specified exchange.
 * Factory function that dynamically selects the appropriate client creator.
 */

const exchangeFactories: Record<
  string,
  (credentials: ExchangeCredentials, options?: ExchangeClientOptions) => Result<IExchangeClient, Error>
> = {
  btce: createBtceClient,
  cryptsy: createCryptsyClient,
};

export function createExchangeClient(
  exchangeName: string,
  credentials: ExchangeCredentials,
  options?: ExchangeClientOptions
): Result<IExchangeClient, Error> {
  const normalizedName = exchangeName.toLowerCase();

  const factory = exchangeFactories[normalizedName];
  if (factory) {
    return factory(credentials, options);
  }
  const supported = Object.keys(exchangeFactories).join(', ');
  return err(new Error(`Unknown exchange: ${exchangeName}. Supported exchanges: ${supported}`));
}
