/**
 * Client configuration, result and error types.
 */

// ============================================================================
// Errors
// ============================================================================

/**
 * - TRANSPORT_TIMEOUT: one attempt exceeded the per-request deadline
 * - RATE_LIMITED: HTTP 429 persisted past the retry budget
 * - API_ERROR: any other HTTP status >= 400
 * - DECODE_ERROR: the body did not match the expected schema
 * - CANCELLED: the caller's signal was aborted
 * - NETWORK_ERROR: fetch or body read failed for another reason
 * - NOT_FOUND: a path segment could not be resolved
 */
export type ClientErrorCode =
  | "TRANSPORT_TIMEOUT"
  | "RATE_LIMITED"
  | "API_ERROR"
  | "DECODE_ERROR"
  | "CANCELLED"
  | "NETWORK_ERROR"
  | "NOT_FOUND";

export type ClientError = {
  code: ClientErrorCode;
  message: string;
  status?: number;
  details?: unknown;
};

/**
 * Result type for every remote operation.
 */
export type FetchResult<T> = { ok: true; data: T; status: number } | { ok: false; error: ClientError };

// ============================================================================
// Collaborators
// ============================================================================

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

/**
 * The subset of `fetch` the transport relies on.
 */
export type FetchFunction = (url: string, init: RequestInit) => Promise<Response>;

/**
 * Abortable delay. Resolves true after `ms`, false as soon as `signal` aborts.
 */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<boolean>;

/**
 * Diagnostic sink. The CLI prints these under --verbose.
 */
export type Logger = {
  debug: (message: string, fields?: Record<string, unknown>) => void;
};

export const silentLogger: Logger = {
  debug: () => {},
};

// ============================================================================
// Client Configuration
// ============================================================================

export type RateLimitConfig = {
  /** Sustained requests per second (default: 10) */
  ratePerSecond: number;
  /** Bucket capacity (default: 20) */
  burst: number;
};

export type RetryConfig = {
  /** Attempts per request when the server answers 429, first one included (default: 3) */
  maxAttempts?: number;
  /** First backoff delay, doubled after each 429 (default: 1000) */
  baseDelayMs?: number;
};

/**
 * Configuration for creating a drive client.
 */
export type ClientConfig = {
  /** Base URL of the API, without trailing slash (e.g. "https://api.example.net") */
  baseUrl: string;
  /** Static bearer token */
  token: string;
  /** Drive the client operates on */
  driveId: number;
  rateLimit?: RateLimitConfig;
  /** Per-attempt deadline in ms (default: 30000) */
  timeoutMs?: number;
  retry?: RetryConfig;
  /** Defaults to the global fetch, resolved at call time */
  fetch?: FetchFunction;
  logger?: Logger;
};
