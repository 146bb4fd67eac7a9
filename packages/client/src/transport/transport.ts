/**
 * Reliable request transport.
 *
 * One `execute` call = one logical request:
 *   rate-limiter token → fetch with per-attempt deadline → 429 backoff loop.
 *
 * Nothing here throws for remote failures; every outcome is a FetchResult.
 * Bodies are returned as raw bytes, decoding is left to the caller.
 */

import {
  type ClientError,
  type FetchFunction,
  type FetchResult,
  type HttpMethod,
  type Logger,
  type Sleep,
  silentLogger,
} from "../types/client.ts";
import {
  createApiError,
  createCancelledError,
  createError,
  createNetworkError,
} from "../utils/errors.ts";
import { abortableSleep } from "../utils/sleep.ts";
import type { RateLimiter } from "./rate-limiter.ts";

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_BASE_DELAY_MS = 1000;

const STATUS_TOO_MANY_REQUESTS = 429;

// ============================================================================
// Types
// ============================================================================

export type TransportConfig = {
  baseUrl: string;
  token: string;
  limiter: RateLimiter;
  timeoutMs?: number;
  maxAttempts?: number;
  baseDelayMs?: number;
  fetch?: FetchFunction;
  /** Used for backoff waits only */
  sleep?: Sleep;
  logger?: Logger;
};

export type Transport = {
  /**
   * Issue one request. `body`, when given, is sent as JSON.
   */
  execute: (
    method: HttpMethod,
    path: string,
    body?: unknown,
    signal?: AbortSignal
  ) => Promise<FetchResult<Uint8Array>>;
};

type AttemptOutcome =
  | { kind: "response"; status: number; body: Uint8Array }
  | { kind: "failed"; error: ClientError };

// ============================================================================
// Factory
// ============================================================================

export const createTransport = (config: TransportConfig): Transport => {
  const {
    token,
    limiter,
    timeoutMs = DEFAULT_TIMEOUT_MS,
    baseDelayMs = DEFAULT_BASE_DELAY_MS,
    sleep = abortableSleep,
    logger = silentLogger,
  } = config;
  const maxAttempts = Math.max(1, config.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
  const baseUrl = config.baseUrl.replace(/\/+$/, "");
  const fetchFn: FetchFunction = config.fetch ?? ((url, init) => fetch(url, init));

  /**
   * Single attempt. The deadline covers both the response headers and the
   * body read; the caller's signal aborts the attempt as well.
   */
  const attempt = async (
    method: HttpMethod,
    path: string,
    payload: string | undefined,
    signal: AbortSignal | undefined
  ): Promise<AttemptOutcome> => {
    if (signal?.aborted) return { kind: "failed", error: createCancelledError() };

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    const headers: Record<string, string> = {
      Authorization: `Bearer ${token}`,
      Accept: "application/json",
    };
    if (payload !== undefined) {
      headers["Content-Type"] = "application/json";
    }

    try {
      const response = await fetchFn(`${baseUrl}${path}`, {
        method,
        headers,
        body: payload,
        signal: controller.signal,
      });
      const body = new Uint8Array(await response.arrayBuffer());
      return { kind: "response", status: response.status, body };
    } catch (err) {
      // Cancellation wins over whatever the abort surfaced as.
      if (signal?.aborted) return { kind: "failed", error: createCancelledError() };
      if (timedOut) {
        return {
          kind: "failed",
          error: createError(
            "TRANSPORT_TIMEOUT",
            `request timeout after ${timeoutMs}ms: ${method} ${path}`
          ),
        };
      }
      return { kind: "failed", error: createNetworkError(err) };
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }
  };

  const execute: Transport["execute"] = async (method, path, body, signal) => {
    // Serialized once so every retry sends identical bytes.
    const payload = body === undefined ? undefined : JSON.stringify(body);

    for (let n = 0; n < maxAttempts; n++) {
      logger.debug("waiting for rate limiter", { method, path });
      if (!(await limiter.acquire(signal))) {
        return { ok: false, error: createCancelledError() };
      }

      logger.debug("sending request", { method, path, attempt: n + 1 });
      const outcome = await attempt(method, path, payload, signal);
      if (outcome.kind === "failed") {
        return { ok: false, error: outcome.error };
      }

      if (outcome.status === STATUS_TOO_MANY_REQUESTS) {
        if (n < maxAttempts - 1) {
          const delayMs = baseDelayMs * 2 ** n;
          logger.debug("rate limited, backing off", { method, path, delayMs });
          if (!(await sleep(delayMs, signal))) {
            return { ok: false, error: createCancelledError() };
          }
          continue;
        }
        break;
      }

      if (outcome.status >= 400) {
        return { ok: false, error: createApiError(outcome.status, outcome.body) };
      }

      return { ok: true, data: outcome.body, status: outcome.status };
    }

    return {
      ok: false,
      error: createError(
        "RATE_LIMITED",
        `API rate limited (429) after ${maxAttempts} attempts`,
        STATUS_TOO_MANY_REQUESTS,
        { attempts: maxAttempts }
      ),
    };
  };

  return { execute };
};
