/**
 * Drive client - rate-limited, retrying HTTP access to a remote drive
 *
 * @packageDocumentation
 */

// =============================================================================
// Client
// =============================================================================

export { createClient, type DriveClient } from "./client.ts";

export type { CategoryMethods } from "./api/categories.ts";
export { createCategoryMethods } from "./api/categories.ts";
export type { EntryMethods, ListChildren } from "./api/entries.ts";
export { createEntryMethods } from "./api/entries.ts";

// =============================================================================
// Transport
// =============================================================================

export {
  createRateLimiter,
  DEFAULT_RATE_LIMIT,
  type RateLimiter,
  type RateLimiterConfig,
} from "./transport/rate-limiter.ts";
export {
  createTransport,
  DEFAULT_BASE_DELAY_MS,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_TIMEOUT_MS,
  type Transport,
  type TransportConfig,
} from "./transport/transport.ts";

// =============================================================================
// Types
// =============================================================================

export type {
  ClientConfig,
  ClientError,
  ClientErrorCode,
  FetchFunction,
  FetchResult,
  HttpMethod,
  Logger,
  RateLimitConfig,
  RetryConfig,
  Sleep,
} from "./types/client.ts";
export { silentLogger } from "./types/client.ts";

// =============================================================================
// Utilities
// =============================================================================

export { decodeEnvelope, decodeJson } from "./utils/decode.ts";
export {
  createApiError,
  createCancelledError,
  createError,
  createNetworkError,
  isClientError,
} from "./utils/errors.ts";
export { abortableSleep } from "./utils/sleep.ts";
