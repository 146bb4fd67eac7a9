/**
 * Decoding of raw response bodies against protocol schemas.
 */

import { RESULT_SUCCESS } from "@dirscope/protocol";
import type { z } from "zod";
import type { FetchResult } from "../types/client.ts";
import { createError } from "./errors.ts";

const describeIssues = (issues: z.ZodIssue[]): string =>
  issues
    .map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");

/**
 * Parse `bytes` as JSON and validate it with `schema`.
 */
export const decodeJson = <S extends z.ZodTypeAny>(
  bytes: Uint8Array,
  schema: S,
  status: number
): FetchResult<z.output<S>> => {
  let raw: unknown;
  try {
    raw = JSON.parse(new TextDecoder().decode(bytes));
  } catch (err) {
    return {
      ok: false,
      error: createError(
        "DECODE_ERROR",
        `JSON parse error: ${err instanceof Error ? err.message : String(err)}`,
        status
      ),
    };
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    return {
      ok: false,
      error: createError(
        "DECODE_ERROR",
        `unexpected response: ${describeIssues(parsed.error.issues)}`,
        status,
        raw
      ),
    };
  }
  return { ok: true, data: parsed.data, status };
};

/**
 * Decode a `{ result, data }` envelope and unwrap `data`.
 * A `result` other than "success" is reported as API_ERROR.
 */
export const decodeEnvelope = <
  S extends z.ZodType<{ result: string; data: unknown }, z.ZodTypeDef, unknown>,
>(
  bytes: Uint8Array,
  schema: S,
  status: number
): FetchResult<z.output<S>["data"]> => {
  const decoded = decodeJson(bytes, schema, status);
  if (!decoded.ok) return decoded;
  if (decoded.data.result !== RESULT_SUCCESS) {
    return {
      ok: false,
      error: createError("API_ERROR", `API error: ${decoded.data.result}`, status),
    };
  }
  return { ok: true, data: decoded.data.data, status };
};
