import type { DriveClient } from "@dirscope/client";
import type { Command } from "commander";
import chalk from "chalk";
import ora from "ora";
import { type CliDeps, type CommandContext, commandContext } from "../lib/context";
import { crawlWithProgress } from "../lib/crawl";
import { unwrap } from "../lib/errors";
import { formatColumns } from "../lib/output";
import { resolveCategory, resolveEntryId } from "../lib/resolve";
import { applyCategory, type TagMode } from "../lib/tagging";

const HEX_COLOR = /^#[0-9a-f]{6}$/i;

function swatch(color: string): string {
  return HEX_COLOR.test(color) ? chalk.bgHex(color)("  ") : "  ";
}

/**
 * The entry itself, plus its whole subtree when `recursive`.
 */
async function collectEntryIds(
  client: DriveClient,
  entryId: number,
  recursive: boolean,
  ctx: CommandContext
): Promise<number[]> {
  const root = unwrap(await client.entries.get(entryId, ctx.signal));
  ctx.formatter.debug("collecting entries", { entryId, recursive });
  if (!recursive || root.kind !== "dir") return [root.id];

  const below = await crawlWithProgress(
    client,
    { id: root.id, name: root.name },
    { workers: ctx.opts.workers, formatter: ctx.formatter, signal: ctx.signal }
  );
  return [root.id, ...below.map((e) => e.id)];
}

async function runTag(
  program: Command,
  deps: CliDeps,
  mode: TagMode,
  categoryArg: string,
  target: string,
  recursive: boolean
): Promise<void> {
  const ctx = commandContext(program, deps);
  const { formatter, signal } = ctx;
  const { client } = ctx.connect();

  const category = await resolveCategory(client, categoryArg, signal);
  const entryId = await resolveEntryId(client, target, signal);
  const entryIds = await collectEntryIds(client, entryId, recursive, ctx);

  const verb = mode === "add" ? "Adding" : "Removing";
  const spinner = ora({
    text: `${verb} [${category.name}] 0/${entryIds.length}`,
    isSilent: formatter.isQuiet || formatter.isVerbose,
  }).start();
  const result = await applyCategory(client, {
    categoryId: category.id,
    entryIds,
    mode,
    signal,
    onProgress: (done, total) => {
      spinner.text = `${verb} [${category.name}] ${done}/${total}`;
    },
  });
  spinner.stop();
  const summary = unwrap(result);

  formatter.output({ category, mode, entries: entryIds.length, ...summary }, () =>
    mode === "add"
      ? `Done: ${summary.changed} tagged, ${summary.skipped} skipped (already tagged)`
      : `Done: ${summary.changed} untagged, ${summary.skipped} skipped (not tagged)`
  );
}

export function registerTagCommands(program: Command, deps: CliDeps): void {
  const tag = program.command("tag").description("Manage categories (tags)");

  tag
    .command("list")
    .alias("ls")
    .description("List available categories")
    .action(async () => {
      const { formatter, signal, connect } = commandContext(program, deps);
      const { client } = connect();
      const categories = unwrap(await client.categories.list(signal));

      formatter.output(categories, () => {
        if (categories.length === 0) return "No categories";
        return formatColumns(
          ["ID", "COLOR", "NAME"],
          categories.map((c) => [String(c.id), `${swatch(c.color)} ${c.color}`, c.name])
        );
      });
    });

  tag
    .command("add <category> <target>")
    .description("Add a category (name or id) to an entry (path or id)")
    .option("-r, --recursive", "apply to every entry below a directory as well", false)
    .action((categoryArg: string, target: string, cmdOpts: { recursive: boolean }) =>
      runTag(program, deps, "add", categoryArg, target, cmdOpts.recursive)
    );

  tag
    .command("rm <category> <target>")
    .alias("remove")
    .description("Remove a category (name or id) from an entry (path or id)")
    .option("-r, --recursive", "remove from every entry below a directory as well", false)
    .action((categoryArg: string, target: string, cmdOpts: { recursive: boolean }) =>
      runTag(program, deps, "remove", categoryArg, target, cmdOpts.recursive)
    );
}
