import { computeDirectoryStats, percentOf, selectDirectories } from "@dirscope/report";
import { type Command, Option } from "commander";
import { type CliDeps, commandContext } from "../lib/context";
import { crawlWithProgress } from "../lib/crawl";
import { parseIntOption } from "../lib/options";
import { formatColumns, formatPercent, formatSize } from "../lib/output";
import { resolveStartPath } from "../lib/resolve";

interface ScanOptions {
  top: number;
  threshold: number;
  all: boolean;
  sort: "size" | "files";
}

export function registerScanCommand(program: Command, deps: CliDeps): void {
  program
    .command("scan [path]")
    .description("Find directories holding many files (direct children only)")
    .option("-n, --top <n>", "show top N directories (0 = unlimited)", parseIntOption, 10)
    .option("-t, --threshold <n>", "minimum file count", parseIntOption, 100)
    .option("-a, --all", "show every directory, ignoring threshold and top", false)
    .addOption(
      new Option("-s, --sort <key>", "sort by").choices(["size", "files"]).default("size")
    )
    .action(async (arg: string | undefined, cmdOpts: ScanOptions) => {
      const { opts, formatter, signal, connect } = commandContext(program, deps);
      const { client } = connect();

      const start = await resolveStartPath(client, arg, signal);
      formatter.debug("starting scan", { startId: start.id, startName: start.name });
      const entries = await crawlWithProgress(client, start, {
        workers: opts.workers,
        formatter,
        signal,
      });

      const stats = computeDirectoryStats(entries, start);
      const selection = selectDirectories(stats.directories, {
        sort: cmdOpts.sort,
        threshold: cmdOpts.threshold,
        top: cmdOpts.top,
        all: cmdOpts.all,
      });
      if (selection.belowThreshold) {
        formatter.warn(
          `No directories with >= ${cmdOpts.threshold} files, showing top ${selection.rows.length}:`
        );
      }

      const directories = selection.rows.map((d) => ({
        files: d.fileCount,
        size: d.size,
        percent: Number(percentOf(d.size, stats.totalSize).toFixed(1)),
        id: d.id,
        name: d.name,
      }));
      const report = {
        root: start,
        belowThreshold: selection.belowThreshold,
        directories,
        totals: { files: stats.totalFiles, directories: stats.totalDirs, size: stats.totalSize },
      };

      formatter.output(
        report,
        () => {
          if (directories.length === 0) return "No directories found";
          const table = formatColumns(
            ["FILES", "SIZE", "%", "ID", "NAME"],
            directories.map((d) => [
              String(d.files),
              formatSize(d.size),
              formatPercent(d.percent),
              String(d.id),
              d.name,
            ])
          );
          const total = `Total: ${stats.totalFiles} files, ${stats.totalDirs} directories, ${formatSize(stats.totalSize)}`;
          return `${table}\n\n${total}`;
        },
        directories.map((d) => ({ ...d, size: formatSize(d.size), percent: formatPercent(d.percent) }))
      );
    });
}
