import { buildAgeReport, formatAgeDays, parseAge, percentOf } from "@dirscope/report";
import type { Command } from "commander";
import { type CliDeps, commandContext } from "../lib/context";
import { crawlWithProgress } from "../lib/crawl";
import { parseIntOption } from "../lib/options";
import { formatColumns, formatDate, formatPercent, formatSize } from "../lib/output";
import { resolveStartPath } from "../lib/resolve";

interface StaleOptions {
  age: string;
  top: number;
  minSize: number;
}

export function registerStaleCommand(program: Command, deps: CliDeps): void {
  program
    .command("stale [path]")
    .description("Report old files for retention review")
    .option("-a, --age <age>", "minimum age, e.g. 2y, 6m, 90d (bare number = years)", "2y")
    .option("-n, --top <n>", "show top N files (0 = unlimited)", parseIntOption, 20)
    .option("-m, --min-size <bytes>", "minimum file size in bytes", parseIntOption, 0)
    .action(async (arg: string | undefined, cmdOpts: StaleOptions) => {
      const { opts, formatter, signal, connect } = commandContext(program, deps);
      // Validated before any request is made.
      const thresholdDays = parseAge(cmdOpts.age);
      const { client } = connect();

      const start = await resolveStartPath(client, arg, signal);
      formatter.debug("starting stale scan", { startId: start.id, thresholdDays });
      const entries = await crawlWithProgress(client, start, {
        workers: opts.workers,
        formatter,
        signal,
      });

      const report = buildAgeReport(entries, { thresholdDays, minSize: cmdOpts.minSize });
      const shown =
        cmdOpts.top > 0 ? report.staleFiles.slice(0, cmdOpts.top) : report.staleFiles;

      const files = shown.map((f) => ({
        age: formatAgeDays(f.ageDays),
        size: f.size,
        modified: formatDate(f.lastModifiedAt),
        id: f.id,
        name: f.name,
      }));
      const data = {
        root: start,
        thresholdDays,
        buckets: report.buckets.map((b) => ({ label: b.label, count: b.count, size: b.size })),
        staleFiles: files,
        totals: {
          staleFiles: report.staleFiles.length,
          staleSize: report.staleSize,
          files: report.totalFiles,
          size: report.totalSize,
        },
      };

      formatter.output(
        data,
        () => {
          const lines: string[] = ["Age distribution:", ""];
          lines.push(
            formatColumns(
              ["RANGE", "FILES", "%", "SIZE", "%"],
              report.buckets.map((b) => [
                b.label,
                String(b.count),
                formatPercent(percentOf(b.count, report.totalFiles)),
                formatSize(b.size),
                formatPercent(percentOf(b.size, report.totalSize)),
              ])
            )
          );
          lines.push("", `Files not modified since ${cmdOpts.age}:`, "");
          if (files.length === 0) {
            lines.push("No files found");
            return lines.join("\n");
          }
          lines.push(
            formatColumns(
              ["AGE", "SIZE", "MODIFIED", "ID", "NAME"],
              files.map((f) => [f.age, formatSize(f.size), f.modified, String(f.id), f.name])
            )
          );
          const hidden = report.staleFiles.length - files.length;
          if (hidden > 0) lines.push("", `... and ${hidden} more files`);
          lines.push(
            "",
            `Total: ${report.staleFiles.length} files, ${formatSize(report.staleSize)} (of ${report.totalFiles} files, ${formatSize(report.totalSize)})`
          );
          return lines.join("\n");
        },
        files.map((f) => ({ ...f, size: formatSize(f.size) }))
      );
    });
}
