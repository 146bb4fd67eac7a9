import type { ClientError, ClientErrorCode, FetchResult } from "@dirscope/client";

/**
 * Error thrown at the command boundary for a failed remote operation.
 * Keeps the client error code so the top-level handler can pick an exit code.
 */
export class CommandError extends Error {
  readonly code: ClientErrorCode;
  readonly status: number | undefined;

  constructor(error: ClientError) {
    super(error.message);
    this.name = "CommandError";
    this.code = error.code;
    this.status = error.status;
  }
}

/**
 * Return the data of a successful result, or throw its error.
 */
export function unwrap<T>(result: FetchResult<T>): T {
  if (!result.ok) {
    throw new CommandError(result.error);
  }
  return result.data;
}

export const EXIT_FAILURE = 1;
/** 128 + SIGINT */
export const EXIT_CANCELLED = 130;

export function exitCodeFor(error: unknown): number {
  return error instanceof CommandError && error.code === "CANCELLED" ? EXIT_CANCELLED : EXIT_FAILURE;
}
