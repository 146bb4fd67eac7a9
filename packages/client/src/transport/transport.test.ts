/**
 * Reliable request transport tests.
 */

import { describe, expect, it, vi } from "vitest";
import type { FetchFunction, Sleep } from "../types/client.ts";
import { createRateLimiter } from "./rate-limiter.ts";
import { createTransport, type TransportConfig } from "./transport.ts";

// ============================================================================
// Test Helpers
// ============================================================================

const jsonResponse = (status: number, body: unknown) =>
  new Response(JSON.stringify(body), { status });

const setup = (fetchImpl: FetchFunction, overrides: Partial<TransportConfig> = {}) => {
  const delays: number[] = [];
  const sleep: Sleep = async (ms, signal) => {
    delays.push(ms);
    return !signal?.aborted;
  };
  const fetch = vi.fn<FetchFunction>(fetchImpl);
  const transport = createTransport({
    baseUrl: "https://drive.test/",
    token: "test-secret",
    limiter: createRateLimiter({ ratePerSecond: 1000, burst: 100 }),
    sleep,
    fetch,
    ...overrides,
  });
  return { transport, fetch, delays };
};

/** A fetch that never answers and rejects once its signal aborts */
const hangingFetch: FetchFunction = (_url, init) =>
  new Promise<Response>((_, reject) => {
    init.signal?.addEventListener("abort", () => reject(new Error("This operation was aborted")));
  });

const decode = (bytes: Uint8Array) => new TextDecoder().decode(bytes);

// ============================================================================
// Requests
// ============================================================================

describe("createTransport", () => {
  it("should send the bearer token and return the raw body", async () => {
    const { transport, fetch } = setup(async () => jsonResponse(200, { result: "success" }));

    const result = await transport.execute("GET", "/3/drive/7/files/1");

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.status).toBe(200);
    expect(decode(result.data)).toBe('{"result":"success"}');

    const [url, init] = fetch.mock.calls[0] ?? [];
    expect(url).toBe("https://drive.test/3/drive/7/files/1");
    expect(init?.method).toBe("GET");
    expect(init?.headers).toEqual({
      Authorization: "Bearer test-secret",
      Accept: "application/json",
    });
    expect(init?.body).toBeUndefined();
  });

  it("should serialize a body as JSON", async () => {
    const { transport, fetch } = setup(async () => jsonResponse(200, {}));

    await transport.execute("POST", "/2/drive/7/files/categories/3", { file_ids: [4, 5] });

    const init = fetch.mock.calls[0]?.[1];
    expect(init?.body).toBe('{"file_ids":[4,5]}');
    expect(init?.headers).toEqual({
      Authorization: "Bearer test-secret",
      Accept: "application/json",
      "Content-Type": "application/json",
    });
  });

  // ==========================================================================
  // 429 handling
  // ==========================================================================

  it("should back off 1s then 2s and succeed on the third attempt", async () => {
    let calls = 0;
    const { transport, fetch, delays } = setup(async () => {
      calls++;
      return calls <= 2 ? jsonResponse(429, {}) : jsonResponse(200, { ok: 1 });
    });

    const result = await transport.execute("GET", "/x");

    expect(result.ok).toBe(true);
    expect(fetch).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([1000, 2000]);
  });

  it("should give up with RATE_LIMITED after three 429 answers", async () => {
    const { transport, fetch, delays } = setup(async () => jsonResponse(429, {}));

    const result = await transport.execute("GET", "/x");

    expect(fetch).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([1000, 2000]);
    expect(result).toEqual({
      ok: false,
      error: {
        code: "RATE_LIMITED",
        message: "API rate limited (429) after 3 attempts",
        status: 429,
        details: { attempts: 3 },
      },
    });
  });

  it("should honour a custom retry budget", async () => {
    const { transport, fetch, delays } = setup(async () => jsonResponse(429, {}), {
      maxAttempts: 2,
      baseDelayMs: 10,
    });

    const result = await transport.execute("GET", "/x");

    expect(fetch).toHaveBeenCalledTimes(2);
    expect(delays).toEqual([10]);
    expect(result.ok).toBe(false);
  });

  it("should cancel during a backoff wait", async () => {
    const controller = new AbortController();
    const { transport, fetch } = setup(
      async () => {
        controller.abort();
        return jsonResponse(429, {});
      },
      { sleep: async (_ms, signal) => !signal?.aborted }
    );

    const result = await transport.execute("GET", "/x", undefined, controller.signal);

    expect(fetch).toHaveBeenCalledTimes(1);
    expect(result).toEqual({
      ok: false,
      error: { code: "CANCELLED", message: "operation cancelled" },
    });
  });

  // ==========================================================================
  // Failures
  // ==========================================================================

  it("should map other error statuses to API_ERROR without retrying", async () => {
    const { transport, fetch } = setup(async () =>
      jsonResponse(404, {
        result: "error",
        error: { code: "object_not_found", description: "no entry 9" },
      })
    );

    const result = await transport.execute("GET", "/3/drive/7/files/9");

    expect(fetch).toHaveBeenCalledTimes(1);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe("API_ERROR");
    expect(result.error.status).toBe(404);
    expect(result.error.message).toBe("API error (404): no entry 9");
  });

  it("should fail an attempt that exceeds the deadline", async () => {
    const { transport } = setup(hangingFetch, { timeoutMs: 20 });

    const result = await transport.execute("GET", "/slow");

    expect(result).toEqual({
      ok: false,
      error: { code: "TRANSPORT_TIMEOUT", message: "request timeout after 20ms: GET /slow" },
    });
  });

  it("should report CANCELLED when the caller aborts in flight", async () => {
    const controller = new AbortController();
    const { transport } = setup(hangingFetch);

    const pending = transport.execute("GET", "/slow", undefined, controller.signal);
    setTimeout(() => controller.abort(), 5);
    const result = await pending;

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe("CANCELLED");
  });

  it("should not call fetch when already cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const { transport, fetch } = setup(async () => jsonResponse(200, {}));

    const result = await transport.execute("GET", "/x", undefined, controller.signal);

    expect(fetch).not.toHaveBeenCalled();
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe("CANCELLED");
  });

  it("should wrap other fetch failures as NETWORK_ERROR", async () => {
    const { transport } = setup(async () => {
      throw new TypeError("fetch failed");
    });

    const result = await transport.execute("GET", "/x");

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe("NETWORK_ERROR");
    expect(result.error.message).toBe("HTTP request error: fetch failed");
  });

  it("should log each attempt", async () => {
    const debug = vi.fn();
    const { transport } = setup(async () => jsonResponse(200, {}), { logger: { debug } });

    await transport.execute("GET", "/x");

    expect(debug).toHaveBeenCalledWith("waiting for rate limiter", { method: "GET", path: "/x" });
    expect(debug).toHaveBeenCalledWith("sending request", {
      method: "GET",
      path: "/x",
      attempt: 1,
    });
  });
});
