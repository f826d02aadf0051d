// Pure exchange utility functions

import { wrapError } from '@ledgerline/core';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { ZodType, ZodTypeDef } from 'zod';

/**
 * Validate credentials against a Zod schema
 */
export function validateCredentials<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  credentials: unknown,
  exchangeId: string
): Result<T, Error> {
  const validationResult = schema.safeParse(credentials);
  if (!validationResult.success) {
    return err(new Error(`Invalid ${exchangeId} credentials: ${validationResult.error.message}`));
  }
  return ok(validationResult.data);
}

/**
 * Validate raw data against a Zod schema
 */
export function validateRawData<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  rawData: unknown,
  exchangeId: string
): Result<T, Error> {
  try {
    const parsed = schema.parse(rawData);
    return ok(parsed);
  } catch (error) {
    return wrapError(error, `${exchangeId} data validation failed`);
  }
}

export interface SingleFlight<T> {
  get(): Promise<Result<T, Error>>;
  invalidate(): void;
}

/**
 * Lazily load a value once per client lifetime. Concurrent callers share one in-flight load,
 * and a failed load is not cached so the next caller tries again.
 */
export function createSingleFlight<T>(load: () => Promise<Result<T, Error>>): SingleFlight<T> {
  let cached: { value: T } | undefined;
  let inflight: Promise<Result<T, Error>> | undefined;

  return {
    get() {
      if (cached) {
        return Promise.resolve(ok(cached.value));
      }
      if (!inflight) {
        inflight = (async () => {
          try {
            const result = await load();
            if (result.isOk()) {
              cached = { value: result.value };
            }
            return result;
          } finally {
            inflight = undefined;
          }
        })();
      }
      return inflight;
    },

    invalidate() {
      cached = undefined;
    },
  };
}
