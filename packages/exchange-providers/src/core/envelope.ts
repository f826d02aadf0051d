import { isObject } from '@ledgerline/core';
import { err, ok, type Result } from 'neverthrow';

import { ExchangeApiError, InvalidNonceError, NonceLimitReachedError } from './errors.js';

/**
 * Per-exchange quirks applied while unwrapping `{success, return | error}` envelopes.
 */
export interface EnvelopePolicy {
  /** Turn a benign failure message into a result. Never consulted for nonce errors. */
  translateError?: ((method: string, message: string) => { result: unknown } | undefined) | undefined;
  /** Reshape a successful body before `return` is unwrapped */
  normalizeResponse?: ((method: string, body: Record<string, unknown>) => Record<string, unknown>) | undefined;
}

export interface EnvelopeContext {
  exchangeId: string;
  method: string;
  nonce?: number | undefined;
}

const INVALID_NONCE_PATTERN = /invalid nonce/i;
const STALE_NONCE_PATTERN = /on key:\s*(\d+),\s*you sent:\s*'?(\d+)/i;

function isFailureFlag(flag: unknown): boolean {
  if (flag === false) return true;
  if (typeof flag === 'number') return flag === 0;
  if (typeof flag === 'string') return flag.trim() === '0' || flag.trim().toLowerCase() === 'false';
  return false;
}

/**
 * Recognize a nonce rejection. `on key:N, you sent:M` with M <= N means the
 * exchange has already accepted N and only takes values above it.
 */
export function classifyNonceError(
  message: string,
  context: EnvelopeContext
): InvalidNonceError | NonceLimitReachedError | undefined {
  if (!INVALID_NONCE_PATTERN.test(message)) {
    return undefined;
  }

  const match = STALE_NONCE_PATTERN.exec(message);
  if (match?.[1] !== undefined && match[2] !== undefined) {
    const onKey = Number(match[1]);
    const sent = Number(match[2]);
    if (sent <= onKey) {
      return new NonceLimitReachedError(message, context.exchangeId, sent, onKey + 1);
    }
  }

  return new InvalidNonceError(message, context.exchangeId, context.nonce);
}

/**
 * Unwrap a decoded response body.
 * Failure envelopes become errors unless the policy translates them, successful ones yield `return` (or the body).
 */
export function unwrapEnvelope(
  content: unknown,
  context: EnvelopeContext,
  policy: EnvelopePolicy = {}
): Result<unknown, Error> {
  const empty = () => err(new ExchangeApiError('Empty response', context.exchangeId, context.method));

  if (Array.isArray(content)) {
    return content.length > 0 ? ok(content) : empty();
  }
  if (content === undefined || content === null || content === '') {
    return empty();
  }
  if (!isObject(content)) {
    return err(
      new ExchangeApiError(
        `Malformed response: expected an object, got ${typeof content}`,
        context.exchangeId,
        context.method
      )
    );
  }
  if (Object.keys(content).length === 0) {
    return empty();
  }

  if ('success' in content && isFailureFlag(content['success'])) {
    const rawError = content['error'];
    const message = typeof rawError === 'string' && rawError !== '' ? rawError : 'Unknown error';

    const nonceError = classifyNonceError(message, context);
    if (nonceError) {
      return err(nonceError);
    }

    const translated = policy.translateError?.(context.method, message);
    if (translated) {
      return ok(translated.result);
    }

    return err(new ExchangeApiError(message, context.exchangeId, context.method));
  }

  const body = policy.normalizeResponse ? policy.normalizeResponse(context.method, content) : content;
  return ok('return' in body ? body['return'] : body);
}
