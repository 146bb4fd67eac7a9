import type { FetchFunction } from "@dirscope/client";
import type { Command } from "commander";
import { createDriveClient, type ResolvedClient } from "./client";
import { type GlobalOptions, parseGlobalOptions } from "./options";
import { createFormatter, type OutputFormatter } from "./output";

/**
 * What the entry point hands to every command.
 */
export interface CliDeps {
  /** Aborted on SIGINT / SIGTERM */
  signal: AbortSignal;
  /** Transport override, used by tests */
  fetch?: FetchFunction;
}

export interface CommandContext {
  opts: GlobalOptions;
  formatter: OutputFormatter;
  signal: AbortSignal;
  /** Resolve settings and build the client; throws when they are incomplete */
  connect: () => ResolvedClient;
}

export function commandContext(program: Command, deps: CliDeps): CommandContext {
  const opts = parseGlobalOptions(program.opts());
  const formatter = createFormatter(opts);
  return {
    opts,
    formatter,
    signal: deps.signal,
    connect: () => createDriveClient(opts, formatter, deps.fetch),
  };
}
