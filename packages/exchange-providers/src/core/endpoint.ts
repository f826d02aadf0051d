import { ResponseDecodeError, type HttpClient, type QueryParams } from '@ledgerline/http';
import { getLogger, type Logger } from '@ledgerline/logger';
import { err, type Result } from 'neverthrow';
import type { ZodType, ZodTypeDef } from 'zod';

import { unwrapEnvelope, type EnvelopeContext, type EnvelopePolicy } from './envelope.js';
import { ExchangeApiError } from './errors.js';
import { decodeExactJson } from './exact-json.js';
import { validateRawData } from './exchange-utils.js';
import type { NonceCounter } from './nonce.js';
import { buildSignedRequest, type RequestFields, type SigningCredentials } from './signing.js';

export type ResponseSchema<T> = ZodType<T, ZodTypeDef, unknown>;

function toExchangeError(error: Error, context: EnvelopeContext): Error {
  if (error instanceof ResponseDecodeError) {
    return new ExchangeApiError(`Malformed response: ${error.message}`, context.exchangeId, context.method);
  }
  return error;
}

function settle<T>(
  response: Result<unknown, Error>,
  context: EnvelopeContext,
  policy: EnvelopePolicy | undefined,
  schema: ResponseSchema<T>
): Result<T, Error> {
  if (response.isErr()) {
    return err(toExchangeError(response.error, context));
  }
  return unwrapEnvelope(response.value, context, policy).andThen((payload) =>
    validateRawData(schema, payload, context.exchangeId)
  );
}

export interface SignedEndpointConfig {
  exchangeId: string;
  httpClient: HttpClient;
  credentials: SigningCredentials;
  nonces: NonceCounter;
  policy?: EnvelopePolicy | undefined;
}

/**
 * Single-URL private API: every call POSTs a signed form body naming the remote method.
 * No retries happen here; a nonce spent on a failed call stays spent.
 */
export class SignedEndpoint {
  private readonly logger: Logger;

  constructor(private readonly config: SignedEndpointConfig) {
    this.logger = getLogger(`SignedEndpoint:${config.exchangeId}`);
  }

  async call<T>(method: string, schema: ResponseSchema<T>, fields: RequestFields = {}): Promise<Result<T, Error>> {
    const { exchangeId, httpClient, credentials, nonces, policy } = this.config;

    const nonceResult = nonces.next();
    if (nonceResult.isErr()) {
      this.logger.error(nonceResult.error.message);
      return err(nonceResult.error);
    }
    const nonce = nonceResult.value;
    const context: EnvelopeContext = { exchangeId, method, nonce };

    this.logger.debug(`Signed request - Method: ${method}, Nonce: ${nonce}`);

    const { body, headers } = buildSignedRequest(method, nonce, fields, credentials);
    const response = await httpClient.post<unknown>('', body, { headers, parseBody: decodeExactJson });
    const result = settle(response, context, policy, schema);

    if (result.isErr()) {
      this.logger.warn(`Signed request failed - Method: ${method}, Error: ${result.error.message}`);
    }
    return result;
  }
}

/**
 * Unsigned GET requests, decoded under the same envelope rules
 */
export class PublicEndpoint {
  constructor(
    private readonly exchangeId: string,
    private readonly httpClient: HttpClient,
    private readonly policy?: EnvelopePolicy
  ) {}

  async get<T>(path: string, schema: ResponseSchema<T>, query?: QueryParams): Promise<Result<T, Error>> {
    const context: EnvelopeContext = { exchangeId: this.exchangeId, method: path };
    const response = await this.httpClient.get<unknown>(path, { parseBody: decodeExactJson, query });
    return settle(response, context, this.policy, schema);
  }
}
