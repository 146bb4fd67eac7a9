/**
 * Error envelope returned by the drive on non-2xx responses.
 */

import { z } from "zod";

/** Rate limit exceeded */
export const RATE_LIMIT_EXCEEDED = "rate_limit_exceeded";

/** Object not found */
export const OBJECT_NOT_FOUND = "object_not_found";

/** Token missing, expired or revoked */
export const NOT_AUTHORIZED = "not_authorized";

/**
 * Standard error response schema
 */
export const ErrorResponseSchema = z.object({
  result: z.string().optional(),
  error: z
    .object({
      /** Machine-readable error code */
      code: z.string(),
      /** Human-readable description */
      description: z.string().optional(),
    })
    .optional(),
});

export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;
