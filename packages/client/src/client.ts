/**
 * Drive client
 *
 * An explicitly constructed object that owns its rate limiter. Every
 * component issuing requests receives the same transport, so one client
 * instance means one token bucket.
 */

import { createCategoryMethods, type CategoryMethods } from "./api/categories.ts";
import { createEntryMethods, type EntryMethods } from "./api/entries.ts";
import { createRateLimiter, DEFAULT_RATE_LIMIT } from "./transport/rate-limiter.ts";
import { createTransport, type Transport } from "./transport/transport.ts";
import { type ClientConfig, silentLogger } from "./types/client.ts";

export type DriveClient = {
  driveId: number;
  /** Raw request primitive, for calls not covered below */
  transport: Transport;
  entries: EntryMethods;
  categories: CategoryMethods;
};

/**
 * Create a drive client.
 */
export const createClient = (config: ClientConfig): DriveClient => {
  const { baseUrl, token, driveId, timeoutMs, retry, fetch, logger = silentLogger } = config;

  const limiter = createRateLimiter(config.rateLimit ?? DEFAULT_RATE_LIMIT);
  const transport = createTransport({
    baseUrl,
    token,
    limiter,
    logger,
    timeoutMs,
    maxAttempts: retry?.maxAttempts,
    baseDelayMs: retry?.baseDelayMs,
    fetch,
  });

  return {
    driveId,
    transport,
    entries: createEntryMethods({ transport, driveId, logger }),
    categories: createCategoryMethods({ transport, driveId }),
  };
};
