import { Command, CommanderError } from "commander";
import { registerConfigCommands } from "./commands/config";
import { registerLsCommand } from "./commands/ls";
import { registerScanCommand } from "./commands/scan";
import { registerStaleCommand } from "./commands/stale";
import { registerTagCommands } from "./commands/tag";
import type { CliDeps } from "./lib/context";
import { EXIT_FAILURE, exitCodeFor } from "./lib/errors";
import { DEFAULT_WORKERS, parseGlobalOptions, parseIntOption } from "./lib/options";

export function createProgram(deps: CliDeps): Command {
  const program = new Command();

  program
    .name("dirscope")
    .description("Reports over a remote drive: heavy directories, stale files, categories")
    .version("0.1.0")
    .option("-p, --profile <name>", "use specified profile")
    .option("--base-url <url>", "override API base URL")
    .option("--drive-id <id>", "override drive id")
    .option("--token <token>", "override API token")
    .option("-w, --workers <n>", "concurrent directory listings", parseIntOption, DEFAULT_WORKERS)
    .option("-f, --format <type>", "output format: text|json|yaml|table", "text")
    .option("-v, --verbose", "debug logging on stderr")
    .option("-q, --quiet", "quiet mode");

  // Reject bad global options before any command runs.
  program.hook("preAction", (thisCommand) => {
    parseGlobalOptions(thisCommand.opts());
  });

  registerLsCommand(program, deps);
  registerScanCommand(program, deps);
  registerStaleCommand(program, deps);
  registerTagCommands(program, deps);
  registerConfigCommands(program, deps);

  program.exitOverride();
  return program;
}

/**
 * Parse `argv` and run the selected command. Resolves to the process exit
 * code; command failures are printed as `Error: <message>` on stderr.
 */
export async function runProgram(argv: string[], deps: CliDeps): Promise<number> {
  const program = createProgram(deps);
  try {
    await program.parseAsync(argv);
    return 0;
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      // Help (also shown when no command is given) and --version are not failures;
      // usage errors were already printed by commander.
      const informational =
        error.code === "commander.help" ||
        error.code === "commander.helpDisplayed" ||
        error.code === "commander.version" ||
        error.exitCode === 0;
      return informational ? 0 : EXIT_FAILURE;
    }
    if (error instanceof Error) {
      console.error(`Error: ${error.message}`);
    } else {
      console.error("An unexpected error occurred");
    }
    return exitCodeFor(error);
  }
}
