/**
 * Envelope and identifier schemas shared by every drive endpoint.
 *
 * Every response body is wrapped as `{ "result": "success", "data": ... }`.
 * Paginated listings add `has_more` and an opaque `cursor`.
 */

import { z } from "zod";

// ============================================================================
// Identifiers
// ============================================================================

/**
 * The implicit root of every drive. It is never returned by a listing;
 * top-level entries carry it as their parent.
 */
export const ROOT_ENTRY_ID = 1;

/** Drive ids arrive as text from options and the environment */
export const DriveIdSchema = z.coerce.number().int().positive();

// ============================================================================
// Envelopes
// ============================================================================

/** Value of `result` on a successful response */
export const RESULT_SUCCESS = "success";

/**
 * Wrap a data schema in the standard `{ result, data }` envelope.
 */
export const envelopeOf = <T extends z.ZodTypeAny>(data: T) =>
  z.object({
    result: z.string(),
    data,
  });

/**
 * Wrap an item schema in the paginated listing envelope.
 *
 * `cursor` is only meaningful when `has_more` is true.
 */
export const pageOf = <T extends z.ZodTypeAny>(item: T) =>
  z.object({
    result: z.string(),
    data: z.array(item),
    has_more: z.boolean().optional().default(false),
    cursor: z.string().nullish(),
    response_at: z.number().int().optional(),
  });
