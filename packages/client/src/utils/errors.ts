/**
 * Error constructors for the drive client.
 */

import { ErrorResponseSchema } from "@dirscope/protocol";
import type { ClientError, ClientErrorCode } from "../types/client.ts";

/**
 * Create a ClientError object.
 */
export const createError = (
  code: ClientErrorCode,
  message: string,
  status?: number,
  details?: unknown
): ClientError => ({
  code,
  message,
  ...(status !== undefined ? { status } : {}),
  ...(details !== undefined ? { details } : {}),
});

/**
 * Check if an error is a ClientError.
 */
export const isClientError = (error: unknown): error is ClientError => {
  return typeof error === "object" && error !== null && "code" in error && "message" in error;
};

export const createCancelledError = (): ClientError =>
  createError("CANCELLED", "operation cancelled");

export const createNetworkError = (err: unknown): ClientError =>
  createError(
    "NETWORK_ERROR",
    err instanceof Error ? `HTTP request error: ${err.message}` : "HTTP request error",
    undefined,
    err
  );

const parseJson = (text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
};

/**
 * Create an API_ERROR from a non-2xx status and its raw body.
 *
 * The message prefers the envelope's `error.description`, then `error.code`,
 * then the raw body. The raw body is always kept in `details.body`.
 */
export const createApiError = (status: number, body: Uint8Array): ClientError => {
  const text = new TextDecoder().decode(body);
  let detail = text;

  const envelope = ErrorResponseSchema.safeParse(parseJson(text));
  if (envelope.success && envelope.data.error) {
    detail = envelope.data.error.description ?? envelope.data.error.code;
  }

  return createError("API_ERROR", `API error (${status}): ${detail}`, status, { body: text });
};
