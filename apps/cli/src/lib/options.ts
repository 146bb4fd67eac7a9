import { DEFAULT_CONCURRENCY, MAX_CONCURRENCY } from "@dirscope/crawler";
import { InvalidArgumentError } from "commander";
import { z } from "zod";
import type { OutputFormat } from "./output";

export const DEFAULT_WORKERS = DEFAULT_CONCURRENCY;
export const MAX_WORKERS = MAX_CONCURRENCY;

export const OUTPUT_FORMATS = ["text", "json", "yaml", "table"] as const satisfies readonly OutputFormat[];

/**
 * Options shared by every command, as declared on the root program.
 */
export const GlobalOptionsSchema = z.object({
  profile: z.string().optional(),
  baseUrl: z.string().optional(),
  driveId: z.string().optional(),
  token: z.string().optional(),
  workers: z.number().int().min(1).max(MAX_WORKERS).default(DEFAULT_WORKERS),
  format: z.enum(OUTPUT_FORMATS).default("text"),
  verbose: z.boolean().default(false),
  quiet: z.boolean().default(false),
});

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

export function parseGlobalOptions(raw: Record<string, unknown>): GlobalOptions {
  const parsed = GlobalOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join(".") ?? "options";
    throw new Error(`invalid option ${where}: ${issue?.message ?? "invalid value"}`);
  }
  return parsed.data;
}

/** commander argument parser for non-negative integers */
export function parseIntOption(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError("Not a non-negative integer.");
  }
  return Number(value);
}
