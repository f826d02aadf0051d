import { err, ok, type Result } from 'neverthrow';

import { NonceLimitReachedError } from './errors.js';

/**
 * Strictly increasing nonce source for one credential set.
 * Allocation is a synchronous increment, so concurrent calls on one client never share a value.
 */
export class NonceCounter {
  private current: number;

  constructor(
    private readonly exchangeId: string,
    seed = 0,
    private readonly limit = Number.MAX_SAFE_INTEGER
  ) {
    if (!Number.isSafeInteger(seed) || seed < 0) {
      throw new RangeError(`Nonce seed must be a non-negative integer, got ${seed}`);
    }
    this.current = seed;
  }

  /**
   * Hand out the current value and advance. A value handed out is consumed even if the request fails.
   */
  next(): Result<number, NonceLimitReachedError> {
    if (this.current > this.limit) {
      return err(
        new NonceLimitReachedError(
          `Nonce limit ${this.limit} reached for ${this.exchangeId}; a new API key is required`,
          this.exchangeId,
          this.current
        )
      );
    }
    return ok(this.current++);
  }

  /**
   * The value the next call will use
   */
  peek(): number {
    return this.current;
  }
}
