import crypto from 'node:crypto';

import { encodeFormBody } from '@ledgerline/http';

export interface SigningCredentials {
  readonly apiKey: string;
  readonly secret: string;
}

export type RequestFields = Record<string, string | number | undefined>;

/**
 * Sign = hex HMAC-SHA512 of the exact form body, keyed with the API secret
 */
export function signPayload(body: string, secret: string): string {
  return crypto.createHmac('sha512', secret).update(body).digest('hex');
}

/**
 * Build the form body `method=..&nonce=..&<fields>` (insertion order) and its auth headers.
 */
export function buildSignedRequest(
  method: string,
  nonce: number,
  fields: RequestFields,
  auth: SigningCredentials
): { body: string; headers: Record<string, string> } {
  const body = encodeFormBody({ method, nonce, ...fields });

  return {
    body,
    headers: {
      'Content-Type': 'application/x-www-form-urlencoded',
      Key: auth.apiKey,
      Sign: signPayload(body, auth.secret),
    },
  };
}
