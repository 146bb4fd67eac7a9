/**
 * Token bucket shared by every request issued through one client.
 *
 * Tokens refill continuously at `ratePerSecond` up to `burst`. Waiters that
 * lose a race for the next token simply sleep again; ordering between
 * waiters is not guaranteed.
 */

import type { RateLimitConfig, Sleep } from "../types/client.ts";
import { abortableSleep } from "../utils/sleep.ts";

export const DEFAULT_RATE_LIMIT: RateLimitConfig = { ratePerSecond: 10, burst: 20 };

export type RateLimiterConfig = RateLimitConfig & {
  /** Clock in ms (default: Date.now) */
  now?: () => number;
  sleep?: Sleep;
};

export type RateLimiter = {
  /**
   * Take one token, waiting for it if necessary.
   * Resolves false (without taking a token) when `signal` aborts first.
   */
  acquire: (signal?: AbortSignal) => Promise<boolean>;
  /** Whole tokens currently available */
  available: () => number;
};

export const createRateLimiter = (config: RateLimiterConfig): RateLimiter => {
  const { ratePerSecond, burst, now = Date.now, sleep = abortableSleep } = config;
  if (!(ratePerSecond > 0)) {
    throw new Error(`ratePerSecond must be positive, got ${ratePerSecond}`);
  }
  if (!(burst >= 1)) {
    throw new Error(`burst must be at least 1, got ${burst}`);
  }

  let tokens = burst;
  let updatedAt = now();

  const refill = (): void => {
    const t = now();
    tokens = Math.min(burst, tokens + ((t - updatedAt) / 1000) * ratePerSecond);
    updatedAt = t;
  };

  return {
    async acquire(signal) {
      for (;;) {
        if (signal?.aborted) return false;
        refill();
        if (tokens >= 1) {
          tokens -= 1;
          return true;
        }
        const waitMs = Math.ceil(((1 - tokens) / ratePerSecond) * 1000);
        if (!(await sleep(waitMs, signal))) return false;
      }
    },

    available() {
      refill();
      return Math.floor(tokens);
    },
  };
};
